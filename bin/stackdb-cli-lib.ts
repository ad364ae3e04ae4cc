// bin/stackdb-cli-lib.ts
// Shared CLI utilities for the stackdb command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { QueryEngine } from "../src/core/engine/engine";
import { formatProgram } from "../src/core/compiler/listing";
import { errorMessage, isQueryError } from "../src/core/errors";
import type { PartialConfig } from "../src/core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliMode = "serve" | "exec" | "repl";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  disasm?: boolean;
  verbose?: boolean;
  config?: string;
  host?: string;
  port?: number;
  mode?: CliMode;
  errors?: string[];
};

export type CliConfig = {
  mode: CliMode;
  verbose: boolean;
  disasm: boolean;
  code?: string;
  file?: string;
  configFile?: string;
  overrides: PartialConfig;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};
  const errors: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--disasm") {
      result.disasm = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
      result.mode = "exec";
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (arg === "--host") {
      result.host = args[++i];
    } else if (arg === "--port" || arg === "-p") {
      const raw = args[++i] ?? "";
      const port = Number(raw);
      if (raw === "" || !Number.isInteger(port)) {
        errors.push(`--port expects an integer, got '${raw}'`);
      } else {
        result.port = port;
      }
    } else if (arg === "serve" && i === 0) {
      result.mode = "serve";
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
        result.mode ??= "exec";
      }
    }
    // Ignore unknown flags
  }

  if (errors.length > 0) {
    result.errors = errors;
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
stackdb - in-memory database with a stack-based query language

USAGE:
  stackdb serve [options]            Start the HTTP/WebSocket server
  stackdb [options] <file>           Run the query in a file against an empty database
  stackdb --eval <query>             Run a query against an empty database
  stackdb                            Start an interactive shell

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <query>                 Run a query and exit
  --disasm                           Print the compiled program instead of running it
  -c, --config <file>                Read configuration from a JSON or YAML file
  --host <host>                      Interface to bind (serve)
  -p, --port <port>                  Port to listen on (serve)
  --verbose                          Log every query

SHELL COMMANDS:
  :help, :h                          Show shell help
  :quit, :q                          Exit the shell
  :disasm <query>                    Show the compiled program for a query
  :stats                             Show table and record counts

EXAMPLES:
  stackdb serve --port 6060
  stackdb --eval 'set @users:1 "name" "ada" select'
  stackdb --disasm --eval 'range 3 do @t:_ "n" it set drop end'
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(here, "..", "package.json"), "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `stackdb v${pkg.version}`;
    }
  } catch {
    // fall through to the built-in version
  }
  return "stackdb v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION / CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): CliMode {
  if (args.mode) {
    return args.mode;
  }
  if (args.eval !== undefined || args.file) {
    return "exec";
  }
  return "repl";
}

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const overrides: PartialConfig = { server: {}, log: {} };
  if (args.host !== undefined) overrides.server = { ...overrides.server, host: args.host };
  if (args.port !== undefined) overrides.server = { ...overrides.server, port: args.port };
  if (args.verbose) overrides.log = { verbose: true };

  const config: CliConfig = {
    mode: detectMode(args),
    verbose: args.verbose ?? false,
    disasm: args.disasm ?? false,
    configFile: args.config,
    overrides,
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }

  if (args.file) {
    config.file = args.file;
  }

  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run one query and return what the CLI prints: the response JSON, or the
 * program listing when `disasm` is set.
 */
export async function runQuery(
  engine: QueryEngine,
  text: string,
  disasm = false
): Promise<{ output: string; ok: boolean }> {
  if (disasm) {
    try {
      return { output: formatProgram(engine.compile(text)), ok: true };
    } catch (e) {
      if (!isQueryError(e)) throw e;
      return { output: `error: ${e.message}`, ok: false };
    }
  }

  const response = await engine.run(text);
  return { output: response.body, ok: response.tag === "Done" };
}

export type ReplResult = {
  output?: string;
  exit?: boolean;
};

/**
 * Handle one line typed into the interactive shell.
 */
export async function handleReplLine(engine: QueryEngine, line: string): Promise<ReplResult> {
  const input = line.trim();
  if (input === "") return {};

  if (input.startsWith(":")) {
    const [cmd, ...rest] = input.split(" ");
    const arg = rest.join(" ");
    switch (cmd) {
      case ":quit":
      case ":q":
        return { exit: true };
      case ":help":
      case ":h":
        return { output: getHelpText() };
      case ":disasm":
        return { output: (await runQuery(engine, arg, true)).output };
      case ":stats": {
        const stats = await engine.stats();
        return { output: `tables: ${stats.tables}, records: ${stats.records}` };
      }
      default:
        return { output: `unknown command ${cmd}; try :help` };
    }
  }

  try {
    return { output: (await runQuery(engine, input)).output };
  } catch (e) {
    return { output: `error: ${errorMessage(e)}` };
  }
}
