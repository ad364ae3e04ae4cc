// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  parseSimpleYaml,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.STACKDB_HOST;
    delete process.env.STACKDB_PORT;
    delete process.env.STACKDB_MAX_QUERY_BYTES;
    delete process.env.STACKDB_VERBOSE;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    expect(configFromEnv()).toEqual(DEFAULT_CONFIG);
  });

  it("reads server settings", () => {
    process.env.STACKDB_HOST = "0.0.0.0";
    process.env.STACKDB_PORT = "7070";
    process.env.STACKDB_MAX_QUERY_BYTES = "1024";
    const config = configFromEnv();
    expect(config.server).toEqual({ host: "0.0.0.0", port: 7070, maxQueryBytes: 1024 });
  });

  it("reads verbose flag", () => {
    process.env.STACKDB_VERBOSE = "true";
    expect(configFromEnv().log.verbose).toBe(true);
    process.env.STACKDB_VERBOSE = "0";
    expect(configFromEnv().log.verbose).toBe(false);
  });

  it("ignores unparsable numbers", () => {
    process.env.STACKDB_PORT = "not-a-port";
    expect(configFromEnv().server.port).toBe(DEFAULT_CONFIG.server.port);
  });

  it("accepts a custom prefix and env object", () => {
    const config = configFromEnv("DB", { DB_PORT: "9000" });
    expect(config.server.port).toBe(9000);
    expect(config.server.host).toBe(DEFAULT_CONFIG.server.host);
  });
});

describe("configFromObject", () => {
  it("reads camelCase and snake_case keys", () => {
    expect(configFromObject({ server: { host: "h", port: 1, max_query_bytes: 64 }, log: { verbose: true } })).toEqual({
      server: { host: "h", port: 1, maxQueryBytes: 64 },
      log: { verbose: true },
    });
    expect(configFromObject({ server: { maxQueryBytes: 32 } }).server).toEqual({ maxQueryBytes: 32 });
  });

  it("ignores values of the wrong type", () => {
    expect(configFromObject({ server: { port: "80" }, log: { verbose: "yes" } })).toEqual({ server: {}, log: {} });
  });

  it("tolerates non-object input", () => {
    expect(configFromObject(null)).toEqual({ server: {}, log: {} });
    expect(configFromObject([1, 2])).toEqual({ server: {}, log: {} });
  });
});

describe("mergeConfigs", () => {
  it("lets later configs win", () => {
    const merged = mergeConfigs(DEFAULT_CONFIG, { server: { port: 1 } }, { server: { port: 2 }, log: { verbose: true } });
    expect(merged.server).toEqual({ host: "127.0.0.1", port: 2, maxQueryBytes: 512 });
    expect(merged.log.verbose).toBe(true);
  });

  it("does not modify the base", () => {
    mergeConfigs(DEFAULT_CONFIG, { server: { port: 1 } });
    expect(DEFAULT_CONFIG.server.port).toBe(6060);
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "stackdb-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads JSON", () => {
    const file = path.join(dir, "stackdb.config.json");
    fs.writeFileSync(file, JSON.stringify({ server: { port: 7000 } }));
    expect(configFromFile(file)).toEqual({ server: { port: 7000 }, log: {} });
  });

  it("loads YAML", () => {
    const file = path.join(dir, "stackdb.config.yaml");
    fs.writeFileSync(
      file,
      ["# stackdb", "server:", "  host: 0.0.0.0", "  port: 7070", "  max_query_bytes: 1024", "log:", "  verbose: true", ""].join("\n")
    );
    expect(configFromFile(file)).toEqual({
      server: { host: "0.0.0.0", port: 7070, maxQueryBytes: 1024 },
      log: { verbose: true },
    });
  });

  it("rejects missing files and unknown formats", () => {
    const missing = path.join(dir, "nope.json");
    expect(() => configFromFile(missing)).toThrow(`Config file not found: ${missing}`);
    const toml = path.join(dir, "stackdb.toml");
    fs.writeFileSync(toml, "");
    expect(() => configFromFile(toml)).toThrow("Unsupported config file format: .toml");
  });

  it("applies overrides over file over env", () => {
    const file = path.join(dir, "cfg.json");
    fs.writeFileSync(file, JSON.stringify({ server: { host: "file-host", port: 7000 } }));
    const config = loadConfig({
      configFile: file,
      env: { STACKDB_HOST: "env-host", STACKDB_PORT: "8000", STACKDB_MAX_QUERY_BYTES: "256" },
      overrides: { server: { port: 9000 } },
    });
    expect(config.server).toEqual({ host: "file-host", port: 9000, maxQueryBytes: 256 });
  });
});

describe("parseSimpleYaml", () => {
  it("parses nested maps and scalars", () => {
    expect(parseSimpleYaml("a:\n  b: 1\n  c: 'x'\nd: false\ne: 1.5\nf: null")).toEqual({
      a: { b: 1, c: "x" },
      d: false,
      e: 1.5,
      f: null,
    });
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects bad ports, sizes and hosts", () => {
    const result = validateConfig({ server: { host: " ", port: 70000, maxQueryBytes: 0 }, log: { verbose: false } });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "port must be an integer between 0 and 65535, got 70000",
      "maxQueryBytes must be a positive integer, got 0",
      "host must not be empty",
    ]);
  });

  it("warns about very large query limits", () => {
    const result = validateConfig(mergeConfigs(DEFAULT_CONFIG, { server: { maxQueryBytes: 100_000 } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["maxQueryBytes is above 64 KiB; queries are read as a single line"]);
  });
});
