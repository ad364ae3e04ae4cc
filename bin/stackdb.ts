#!/usr/bin/env npx tsx
// bin/stackdb.ts
// stackdb CLI - server, one-shot execution, and interactive shell
//
// Run:  npx tsx bin/stackdb.ts [serve] [options] [file]

import * as readline from "readline";
import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  runQuery,
  handleReplLine,
  type CliConfig,
} from "./stackdb-cli-lib";
import { QueryEngine } from "../src/core/engine/engine";
import { loadConfig, validateConfig } from "../src/core/config";
import { QueryServer } from "../src/server";
import { errorMessage } from "../src/core/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return;
  }

  if (cliArgs.errors) {
    for (const err of cliArgs.errors) console.error(`Error: ${err}`);
    process.exitCode = 2;
    return;
  }

  const config = buildConfig(cliArgs);

  switch (config.mode) {
    case "serve":
      await serveMode(config);
      break;
    case "exec":
      await executeMode(config);
      break;
    case "repl":
      await replMode();
      break;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVE MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function serveMode(cli: CliConfig): Promise<void> {
  const config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    console.warn(`Warning: ${warning}`);
  }
  if (!validation.valid) {
    for (const err of validation.errors) console.error(`Error: ${err}`);
    process.exitCode = 1;
    return;
  }

  const server = new QueryServer(new QueryEngine(), config);
  await server.start();

  process.on("SIGINT", () => {
    console.log("\nShutting down...");
    server.stop().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error(`Error during shutdown: ${errorMessage(e)}`);
        process.exit(1);
      }
    );
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (file or --eval)
// ═══════════════════════════════════════════════════════════════════════════════

async function executeMode(cli: CliConfig): Promise<void> {
  let code: string;
  if (cli.file) {
    code = fs.readFileSync(cli.file, "utf8");
  } else if (cli.code !== undefined) {
    code = cli.code;
  } else {
    console.error("Error: No query or file specified");
    process.exitCode = 1;
    return;
  }

  const { output, ok } = await runQuery(new QueryEngine(), code, cli.disasm);
  console.log(output);
  if (!ok) process.exitCode = 1;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function replMode(): Promise<void> {
  const engine = new QueryEngine();
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "stackdb> ",
  });

  console.log(`${getVersion()} - type :help for commands, :quit to exit`);
  rl.prompt();

  for await (const line of rl) {
    const result = await handleReplLine(engine, line);
    if (result.output !== undefined) console.log(result.output);
    if (result.exit) break;
    rl.prompt();
  }
  rl.close();
}

main().catch((e: unknown) => {
  console.error(`Error: ${errorMessage(e)}`);
  process.exit(1);
});
