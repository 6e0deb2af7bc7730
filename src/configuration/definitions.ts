/**
 * Config registry and typing contract for the settings areas.
 *
 * Role in system:
 * - Central runtime registry used by ConfigStore.
 * - Each config key is paired with a Zod schema that supplies every default.
 *
 * Gotchas:
 * - Registration is side-effectful; modules must be imported (see `./register`).
 * - A key registered twice keeps the last schema.
 */
import { z, type ZodTypeAny } from "zod";
import { ConfigurableModule } from "./constants";

export { z };

// biome-ignore lint/suspicious/noEmptyInterface: Interface enables module augmentation per feature configs.
export interface ConfigDefinitions {
  // To be extended by module augmentations
}

export type ConfigKey = ConfigurableModule;
export type ConfigOf<K extends ConfigKey> = K extends keyof ConfigDefinitions
  ? ConfigDefinitions[K]
  : never;

export type ConfigDefinition<K extends ConfigKey = ConfigKey> = {
  key: K;
  schema: ZodTypeAny;
};

const registry = new Map<ConfigKey, ConfigDefinition>();

/**
 * Register a config key with its schema.
 *
 * @returns The same schema for type inference at the call site.
 */
export function defineConfig<K extends ConfigKey, S extends ZodTypeAny>(
  key: K,
  schema: S,
): S {
  registry.set(key, { key, schema });
  return schema;
}

export function getSchema<K extends ConfigKey>(key: K): ZodTypeAny | undefined {
  return registry.get(key)?.schema;
}

/** Every registered definition, in registration order. */
export function listConfigDefinitions(): ConfigDefinition[] {
  return [...registry.values()];
}
