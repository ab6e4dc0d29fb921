/**
 * Run configuration for @cutparse/parser
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: CUTPARSE_* (highest priority, for CI overrides)
 * 2. Config files: .cutparserc, .cutparserc.json, cutparse.config.js, etc.
 *    (synchronous search, so ESM-only `.mjs` config files are not read)
 * 3. package.json: "cutparse" key
 * 4. Defaults (lowest priority)
 *
 * Nothing here is global: `loadConfig` returns a value, and
 * `runOptionsFromConfig` turns it into options for a single `run` call.
 *
 * @example Config file (.cutparserc.json)
 * ```json
 * { "whitespace": "ascii", "trace": true }
 * ```
 */

import { cosmiconfigSync, type CosmiconfigResult } from "cosmiconfig";
import type { RunOptions } from "./types.js";
import { type WhitespacePolicy, unicodeWhitespace, asciiWhitespace, noWhitespace } from "./state.js";
import { consoleTraceSink } from "./trace.js";

const WHITESPACE_MODES = ["unicode", "ascii", "none"] as const;

export type WhitespaceMode = (typeof WHITESPACE_MODES)[number];

export interface CutparseConfig {
  /** Whitespace skipped between tokens */
  whitespace: WhitespaceMode;
  /** Write a trace line per parser invocation to stderr */
  trace: boolean;
}

export const DEFAULT_CONFIG: CutparseConfig = {
  whitespace: "unicode",
  trace: false,
};

/** A config file or environment variable held an unusable value. */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

const MODULE_NAME = "cutparse";
const ENV_PREFIX = "CUTPARSE_";

function isWhitespaceMode(value: unknown): value is WhitespaceMode {
  return WHITESPACE_MODES.some((mode) => mode === value);
}

/**
 * Check an object read from a config source. Unknown keys are ignored.
 *
 * @param source - Where the object came from, for error messages
 */
export function validateConfig(raw: unknown, source: string): Partial<CutparseConfig> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${source}: configuration must be an object`);
  }
  const result: Partial<CutparseConfig> = {};
  if ("whitespace" in raw && raw.whitespace !== undefined) {
    if (!isWhitespaceMode(raw.whitespace)) {
      throw new ConfigError(
        `${source}: whitespace must be one of ${WHITESPACE_MODES.join(", ")}, got ${JSON.stringify(raw.whitespace)}`,
      );
    }
    result.whitespace = raw.whitespace;
  }
  if ("trace" in raw && raw.trace !== undefined) {
    if (typeof raw.trace !== "boolean") {
      throw new ConfigError(`${source}: trace must be a boolean, got ${JSON.stringify(raw.trace)}`);
    }
    result.trace = raw.trace;
  }
  return result;
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   CUTPARSE_WHITESPACE=ascii  → { whitespace: "ascii" }
 *   CUTPARSE_TRACE=1           → { trace: true }
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<CutparseConfig> {
  const raw: Record<string, unknown> = {};

  const ws = env[`${ENV_PREFIX}WHITESPACE`];
  if (ws !== undefined && ws !== "") raw.whitespace = ws.toLowerCase();

  const trace = env[`${ENV_PREFIX}TRACE`];
  if (trace !== undefined) {
    if (trace === "1" || trace === "true") {
      raw.trace = true;
    } else if (trace === "0" || trace === "false" || trace === "") {
      raw.trace = false;
    } else {
      raw.trace = trace;
    }
  }

  return validateConfig(raw, "environment");
}

/**
 * Load configuration from the first config file found in `searchFrom`.
 * Uses cosmiconfig to search the standard locations.
 */
export function loadConfigFile(searchFrom: string = process.cwd()): {
  config: Partial<CutparseConfig>;
  filepath?: string;
} {
  let result: CosmiconfigResult;
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });
    result = explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(`Failed to load ${MODULE_NAME} config from ${searchFrom}`, { cause: error });
  }

  if (!result || result.isEmpty) return { config: {} };
  return { config: validateConfig(result.config, result.filepath), filepath: result.filepath };
}

export interface LoadConfigOptions {
  /** Directory to look for config files in (default: process.cwd()) */
  searchFrom?: string;
  /** Environment to read CUTPARSE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/** Resolve the full configuration: defaults, then file, then environment. */
export function loadConfig(options: LoadConfigOptions = {}): CutparseConfig {
  const { config: fileConfig } = loadConfigFile(options.searchFrom);
  return {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...configFromEnv(options.env),
  };
}

const POLICIES: Record<WhitespaceMode, WhitespacePolicy> = {
  unicode: unicodeWhitespace,
  ascii: asciiWhitespace,
  none: noWhitespace,
};

/**
 * Options for `run` matching a configuration.
 *
 * @param writer - Receives trace lines when tracing is on (default: console.error)
 */
export function runOptionsFromConfig(config: CutparseConfig, writer?: (line: string) => void): RunOptions {
  return {
    whitespace: POLICIES[config.whitespace],
    trace: config.trace ? consoleTraceSink(writer) : undefined,
  };
}
