// src/core/config/config.ts
// Configuration system for stackdb

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type ServerConfig = {
  /** Interface to bind */
  host: string;
  /** TCP port for HTTP and WebSocket */
  port: number;
  /** Bytes of request body read as the query */
  maxQueryBytes: number;
};

export type LogConfig = {
  /** Log every query and its outcome */
  verbose: boolean;
};

export type StackDbConfig = {
  server: ServerConfig;
  log: LogConfig;
};

export type PartialConfig = {
  server?: Partial<ServerConfig>;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: "127.0.0.1",
  port: 6060,
  maxQueryBytes: 512,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  verbose: false,
};

export const DEFAULT_CONFIG: StackDbConfig = {
  server: DEFAULT_SERVER_CONFIG,
  log: DEFAULT_LOG_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["stackdb.config.json", "stackdb.config.yaml", "stackdb.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

function intFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = parseInt(value, 10);
  return Number.isNaN(n) ? undefined : n;
}

function boolFromEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  return undefined;
}

/**
 * Load configuration from environment variables. Unset or unparsable
 * variables fall back to the defaults.
 */
export function configFromEnv(prefix = "STACKDB", env: NodeJS.ProcessEnv = process.env): StackDbConfig {
  return {
    server: {
      host: env[`${prefix}_HOST`] || DEFAULT_SERVER_CONFIG.host,
      port: intFromEnv(env[`${prefix}_PORT`]) ?? DEFAULT_SERVER_CONFIG.port,
      maxQueryBytes: intFromEnv(env[`${prefix}_MAX_QUERY_BYTES`]) ?? DEFAULT_SERVER_CONFIG.maxQueryBytes,
    },
    log: {
      verbose: boolFromEnv(env[`${prefix}_VERBOSE`]) ?? DEFAULT_LOG_CONFIG.verbose,
    },
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  return configFromObject(data);
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function pickString(obj: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "string") return v;
  }
  return undefined;
}

function pickNumber(obj: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "number") return v;
  }
  return undefined;
}

function pickBoolean(obj: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "boolean") return v;
  }
  return undefined;
}

/**
 * Create a partial configuration from a plain object (e.g., parsed JSON/YAML).
 * Both camelCase and snake_case keys are accepted; values of the wrong type
 * are ignored.
 */
export function configFromObject(data: unknown): PartialConfig {
  const root: Record<string, unknown> = isObject(data) ? data : {};
  const serverData: Record<string, unknown> = isObject(root.server) ? root.server : {};
  const logData: Record<string, unknown> = isObject(root.log) ? root.log : {};

  const server: Partial<ServerConfig> = {};
  const host = pickString(serverData, "host");
  if (host !== undefined) server.host = host;
  const port = pickNumber(serverData, "port");
  if (port !== undefined) server.port = port;
  const maxQueryBytes = pickNumber(serverData, "maxQueryBytes", "max_query_bytes");
  if (maxQueryBytes !== undefined) server.maxQueryBytes = maxQueryBytes;

  const log: Partial<LogConfig> = {};
  const verbose = pickBoolean(logData, "verbose");
  if (verbose !== undefined) log.verbose = verbose;

  return { server, log };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: StackDbConfig, ...configs: PartialConfig[]): StackDbConfig {
  let result: StackDbConfig = { server: { ...base.server }, log: { ...base.log } };

  for (const cfg of configs) {
    result = {
      server: { ...result.server, ...cfg.server },
      log: { ...result.log, ...cfg.log },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  env?: NodeJS.ProcessEnv;
}): StackDbConfig {
  let config = configFromEnv("STACKDB", options?.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    for (const p of DEFAULT_CONFIG_FILES) {
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

type YamlScalar = string | number | boolean | null;
type YamlObject = { [key: string]: YamlScalar | YamlObject };

export function parseSimpleYaml(content: string): YamlObject {
  const result: YamlObject = {};
  const stack: Array<{ obj: YamlObject; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    // Skip empty lines and comments
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    // Pop stack to find parent at correct indent level
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: YamlObject = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseYamlScalar(value);
    }
  }

  return result;
}

function parseYamlScalar(value: string): YamlScalar {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith("\"") && value.endsWith("\"")) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: StackDbConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  const { port, maxQueryBytes, host } = config.server;

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    errors.push(`port must be an integer between 0 and 65535, got ${port}`);
  }
  if (!Number.isInteger(maxQueryBytes) || maxQueryBytes < 1) {
    errors.push(`maxQueryBytes must be a positive integer, got ${maxQueryBytes}`);
  } else if (maxQueryBytes > 65536) {
    warnings.push("maxQueryBytes is above 64 KiB; queries are read as a single line");
  }
  if (host.trim() === "") {
    errors.push("host must not be empty");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
