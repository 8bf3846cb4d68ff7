/**
 * Configuration
 *
 * Settings are read, lowest precedence first, from:
 *
 * 1. a config file found by cosmiconfig (`package.json#hostmark`,
 *    `.hostmarkrc`, `.hostmarkrc.json`, `hostmark.config.json`)
 * 2. `HOSTMARK_*` environment variables
 * 3. command-line flags, merged by the caller
 *
 * @example
 * ```json
 * // .hostmarkrc.json
 * { "factory": "jsx.h", "fragment": "jsx.Fragment", "importSource": "./jsx.js" }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface HostmarkConfig {
  /** Dotted path of the element constructor. Default `h`. */
  factory?: string;
  /** Dotted path of the fragment tag; `null` lowers fragments with a null tag. */
  fragment?: string | null;
  /** Module the factory is imported from in transformed output. */
  importSource?: string;
  verbose?: boolean;
}

export interface LoadedConfig {
  config: HostmarkConfig;
  /** Path of the config file that was read, if any. */
  filepath?: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filepath?: string
  ) {
    super(filepath ? `${filepath}: ${message}` : message);
    this.name = "ConfigError";
  }
}

/** Identity helper that types a config object. */
export function defineConfig(config: HostmarkConfig): HostmarkConfig {
  return config;
}

// ============================================================================
// Validation
// ============================================================================

const DOTTED_PATH = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkPath(key: string, value: unknown, filepath?: string): string {
  if (typeof value !== "string" || !DOTTED_PATH.test(value)) {
    throw new ConfigError(`'${key}' must be a dotted identifier path`, filepath);
  }
  return value;
}

/**
 * Check an untrusted config object and keep only the known keys.
 */
export function normalizeConfig(raw: unknown, filepath?: string): HostmarkConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("configuration must be an object", filepath);
  }

  const config: HostmarkConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "factory":
        config.factory = checkPath(key, value, filepath);
        break;
      case "fragment":
        config.fragment = value === null ? null : checkPath(key, value, filepath);
        break;
      case "importSource":
        if (typeof value !== "string" || value === "") {
          throw new ConfigError("'importSource' must be a non-empty string", filepath);
        }
        config.importSource = value;
        break;
      case "verbose":
        if (typeof value !== "boolean") {
          throw new ConfigError("'verbose' must be a boolean", filepath);
        }
        config.verbose = value;
        break;
      default:
        throw new ConfigError(`unknown option '${key}'`, filepath);
    }
  }
  return config;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "hostmark";

/**
 * Look for a config file in `cwd`. A file that exists but is empty yields an
 * empty config.
 */
export function loadConfigFile(cwd: string): LoadedConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `${MODULE_NAME}.config.json`,
    ],
  });

  const result = explorer.search(cwd);
  if (!result) return { config: {} };
  if (result.isEmpty) return { config: {}, filepath: result.filepath };
  return { config: normalizeConfig(result.config, result.filepath), filepath: result.filepath };
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "HOSTMARK_";

/**
 * Read overrides from the environment.
 *
 *   HOSTMARK_FACTORY=jsx.h          → { factory: "jsx.h" }
 *   HOSTMARK_FRAGMENT=null          → { fragment: null }
 *   HOSTMARK_IMPORT_SOURCE=./jsx.js → { importSource: "./jsx.js" }
 *   HOSTMARK_VERBOSE=1              → { verbose: true }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): HostmarkConfig {
  const config: HostmarkConfig = {};

  const factory = env[`${PREFIX}FACTORY`];
  if (factory) config.factory = checkPath("factory", factory);

  const fragment = env[`${PREFIX}FRAGMENT`];
  if (fragment) config.fragment = fragment === "null" ? null : checkPath("fragment", fragment);

  const importSource = env[`${PREFIX}IMPORT_SOURCE`];
  if (importSource) config.importSource = importSource;

  const verbose = env[`${PREFIX}VERBOSE`];
  if (verbose !== undefined) config.verbose = verbose === "1" || verbose === "true";

  return config;
}

/**
 * Load the effective configuration for `cwd`: file settings overlaid by
 * environment overrides.
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const fromFile = loadConfigFile(cwd);
  const config = { ...fromFile.config, ...loadConfigFromEnv(env) };
  if (config.verbose && fromFile.filepath) {
    console.log(`[hostmark] Loaded config from ${fromFile.filepath}`);
  }
  return { config, filepath: fromFile.filepath };
}
