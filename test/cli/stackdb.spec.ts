// test/cli/stackdb.spec.ts
// Tests for the stackdb CLI command

import { describe, it, expect } from "vitest";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  detectMode,
  buildConfig,
  runQuery,
  handleReplLine,
} from "../../bin/stackdb-cli-lib";
import { QueryEngine } from "../../src/core/engine/engine";
import { SequentialRowIdSource } from "../../src/ports/rng";

const newEngine = () => new QueryEngine({ rows: new SequentialRowIdSource() });

describe("stackdb CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should parse --help and --version", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
    });

    it("should parse --eval with a query", () => {
      const parsed = parseCliArgs(["--eval", "@t:1 select"]);
      expect(parsed.eval).toBe("@t:1 select");
      expect(parsed.mode).toBe("exec");
    });

    it("should parse file argument", () => {
      const parsed = parseCliArgs(["--disasm", "query.sdb"]);
      expect(parsed.file).toBe("query.sdb");
      expect(parsed.disasm).toBe(true);
      expect(parsed.mode).toBe("exec");
    });

    it("should parse serve options", () => {
      const parsed = parseCliArgs(["serve", "--host", "0.0.0.0", "--port", "7070", "--config", "db.yaml", "--verbose"]);
      expect(parsed).toEqual({
        mode: "serve",
        host: "0.0.0.0",
        port: 7070,
        config: "db.yaml",
        verbose: true,
      });
    });

    it("should report a non-numeric port", () => {
      expect(parseCliArgs(["serve", "--port", "http"]).errors).toEqual(["--port expects an integer, got 'http'"]);
    });

    it("should only treat serve as a command in first position", () => {
      const parsed = parseCliArgs(["--verbose", "serve"]);
      expect(parsed.mode).toBe("exec");
      expect(parsed.file).toBe("serve");
    });

    it("should ignore unknown flags", () => {
      expect(parseCliArgs(["--unknown-flag"])).toEqual({});
    });
  });

  describe("Help and version", () => {
    it("should list every option", () => {
      const help = getHelpText();
      for (const flag of ["serve", "--help", "--version", "--eval", "--disasm", "--config", "--host", "--port", "--verbose"]) {
        expect(help).toContain(flag);
      }
    });

    it("should list shell commands", () => {
      const help = getHelpText();
      expect(help).toContain(":quit");
      expect(help).toContain(":disasm");
      expect(help).toContain(":stats");
    });

    it("should return the package version", () => {
      expect(getVersion()).toBe("stackdb v0.1.0");
    });
  });

  describe("Mode detection and configuration", () => {
    it("should default to the shell", () => {
      expect(detectMode({})).toBe("repl");
      expect(buildConfig({}).mode).toBe("repl");
    });

    it("should detect exec mode from eval or file", () => {
      expect(detectMode({ eval: "" })).toBe("exec");
      expect(detectMode({ file: "q.sdb" })).toBe("exec");
    });

    it("should turn server flags into overrides", () => {
      const config = buildConfig(parseCliArgs(["serve", "--port", "7070", "--verbose"]));
      expect(config.mode).toBe("serve");
      expect(config.overrides).toEqual({ server: { port: 7070 }, log: { verbose: true } });
    });

    it("should carry the query and file", () => {
      expect(buildConfig({ eval: "drop" }).code).toBe("drop");
      expect(buildConfig({ file: "q.sdb" }).file).toBe("q.sdb");
    });
  });

  describe("Query execution", () => {
    it("should print the response body", async () => {
      await expect(runQuery(newEngine(), "@t:1 \"k\" 2 set select")).resolves.toEqual({
        output: "{\"message\":\"OK\",\"data\":[{\"id\":\"t:1\",\"k\":2}]}",
        ok: true,
      });
    });

    it("should flag failed queries", async () => {
      await expect(runQuery(newEngine(), "nope")).resolves.toEqual({
        output: "{\"message\":\"unknown word `nope` at line 1:1\"}",
        ok: false,
      });
    });

    it("should disassemble without executing", async () => {
      const engine = newEngine();
      const { output, ok } = await runQuery(engine, "@t:1 \"k\" 2 set", true);
      expect(ok).toBe(true);
      expect(output.split("\n")[4]).toBe("4  Set".padEnd(32) + "; 1:12");
      expect(engine.db.stats()).toEqual({ tables: 0, records: 0 });
    });

    it("should report compile errors when disassembling", async () => {
      await expect(runQuery(newEngine(), "end", true)).resolves.toEqual({
        output: "error: unmatched `end` at line 1:1",
        ok: false,
      });
    });

    it("should run a multi-line program", async () => {
      const program = ["# seed", "@t:1 \"k\" 1 set drop", "@t:1 select"].join("\n");
      const { output } = await runQuery(newEngine(), program);
      expect(output).toBe("{\"message\":\"OK\",\"data\":[{\"id\":\"t:1\",\"k\":1}]}");
    });
  });

  describe("Shell", () => {
    it("should keep one database across lines", async () => {
      const engine = newEngine();
      await handleReplLine(engine, "@t:1 \"k\" 1 set drop");
      await expect(handleReplLine(engine, "@t:1 select")).resolves.toEqual({
        output: "{\"message\":\"OK\",\"data\":[{\"id\":\"t:1\",\"k\":1}]}",
      });
      await expect(handleReplLine(engine, ":stats")).resolves.toEqual({ output: "tables: 1, records: 1" });
    });

    it("should handle shell commands", async () => {
      const engine = newEngine();
      await expect(handleReplLine(engine, "   ")).resolves.toEqual({});
      await expect(handleReplLine(engine, ":q")).resolves.toEqual({ exit: true });
      await expect(handleReplLine(engine, ":disasm drop")).resolves.toEqual({
        output: ["0  Start", "1  Drop".padEnd(32) + "; 1:1", "2  End"].join("\n"),
      });
      await expect(handleReplLine(engine, ":frob")).resolves.toEqual({ output: "unknown command :frob; try :help" });
    });
  });
});
