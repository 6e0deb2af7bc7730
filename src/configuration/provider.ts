/**
 * Settings providers.
 * Purpose: hand the raw (unvalidated) settings tree to ConfigStore without
 * exposing where it came from.
 */
import { readFile } from "node:fs/promises";
import JSON5 from "json5";

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigLoadError";
  }
}

export type RawSettings = Record<string, unknown>;

export interface ConfigProvider {
  /** Describes the origin, used in error messages. */
  readonly source: string;
  load(): Promise<RawSettings>;
}

const isRecord = (value: unknown): value is RawSettings =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isMissingFile = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === "ENOENT";

/**
 * Reads a JSON5 file. A missing file yields `{}` so every area falls back to its
 * defaults; unreadable or malformed content throws ConfigLoadError.
 */
export class Json5FileConfigProvider implements ConfigProvider {
  constructor(private readonly path: string) {}

  get source(): string {
    return this.path;
  }

  async load(): Promise<RawSettings> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        console.warn(`[Config] settings file not found at ${this.path}; using defaults`);
        return {};
      }
      throw new ConfigLoadError(`Cannot read settings file ${this.path}`, this.path, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON5.parse(text);
    } catch (error) {
      throw new ConfigLoadError(`Malformed settings file ${this.path}`, this.path, {
        cause: error,
      });
    }

    if (!isRecord(parsed)) {
      throw new ConfigLoadError(
        `Settings file ${this.path} must contain an object at the top level`,
        this.path,
      );
    }
    return parsed;
  }
}

/** In-memory provider for tests and embedding. */
export class StaticConfigProvider implements ConfigProvider {
  readonly source = "static";

  constructor(private readonly settings: RawSettings = {}) {}

  async load(): Promise<RawSettings> {
    return this.settings;
  }
}
