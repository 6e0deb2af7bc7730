/**
 * Validated settings, loaded once at startup.
 *
 * Invariants:
 * - `load()` parses every registered area; any failing area aborts the load with
 *   a ConfigLoadError that lists all Zod issues.
 * - Before `load()` (or for an area absent from the file) `get()` returns the
 *   schema defaults.
 */
import "./register";

import {
  type ConfigKey,
  type ConfigOf,
  getSchema,
  listConfigDefinitions,
} from "./definitions";
import {
  ConfigLoadError,
  type ConfigProvider,
  Json5FileConfigProvider,
} from "./provider";

const DEFAULT_SETTINGS_PATH = "config/settings.json5";

export class ConfigStore {
  private readonly values = new Map<ConfigKey, unknown>();

  constructor(private provider: ConfigProvider) {}

  /** Swaps the provider; the next `load()` reads from it. */
  useProvider(provider: ConfigProvider): void {
    this.provider = provider;
  }

  async load(): Promise<void> {
    const raw = await this.provider.load();
    const parsed = new Map<ConfigKey, unknown>();
    const problems: string[] = [];

    for (const { key, schema } of listConfigDefinitions()) {
      const result = schema.safeParse(raw[key] ?? {});
      if (result.success) {
        parsed.set(key, result.data);
        continue;
      }
      for (const issue of result.error.issues) {
        const path = [key, ...issue.path].join(".");
        problems.push(`${path}: ${issue.message}`);
      }
    }

    if (problems.length) {
      throw new ConfigLoadError(
        `Invalid settings in ${this.provider.source}:\n  - ${problems.join("\n  - ")}`,
        this.provider.source,
      );
    }

    this.values.clear();
    for (const [key, value] of parsed) this.values.set(key, value);
    console.info(`[Config] loaded ${parsed.size} settings areas from ${this.provider.source}`);
  }

  get<K extends ConfigKey>(key: K): ConfigOf<K> {
    if (this.values.has(key)) return this.values.get(key) as ConfigOf<K>;

    const schema = getSchema(key);
    if (!schema) {
      throw new Error(`Config key '${key}' is not defined. Use defineConfig first.`);
    }
    const defaults = schema.parse({});
    this.values.set(key, defaults);
    return defaults;
  }
}

export const configStore = new ConfigStore(
  new Json5FileConfigProvider(process.env.BOT_SETTINGS_PATH ?? DEFAULT_SETTINGS_PATH),
);
