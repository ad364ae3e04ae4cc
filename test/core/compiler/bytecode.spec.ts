// test/core/compiler/bytecode.spec.ts
// Tests for bytecode generation and loop scope resolution

import { describe, it, expect } from "vitest";
import { compileText } from "../../../src/core/compiler/bytecode";
import { CompileError } from "../../../src/core/errors";
import { VFloat, VIdentity, VInteger, VText, identity } from "../../../src/core/eval/values";
import { SequentialRowIdSource } from "../../../src/ports/rng";

const compile = (src: string) => compileText(src, new SequentialRowIdSource());

function compileError(src: string): CompileError {
  try {
    compile(src);
  } catch (e) {
    if (e instanceof CompileError) return e;
    throw e;
  }
  throw new Error(`expected \`${src}\` to fail`);
}

describe("compile", () => {
  it("wraps every program in Start and End", () => {
    const program = compile("");
    expect(program.code).toEqual([{ op: "Start" }, { op: "End" }]);
    expect(program.locations).toEqual([undefined, undefined]);
  });

  it("pushes literals", () => {
    const program = compile("1 \"a\" 2.5 @t:7");
    expect(program.code).toEqual([
      { op: "Start" },
      { op: "Push", value: VInteger(1n) },
      { op: "Push", value: VText("a") },
      { op: "Push", value: VFloat(2.5) },
      { op: "Push", value: VIdentity(identity("t", 7n)) },
      { op: "End" },
    ]);
    expect(program.locations).toEqual([
      undefined,
      { line: 1, column: 1 },
      { line: 1, column: 3 },
      { line: 1, column: 7 },
      { line: 1, column: 11 },
      undefined,
    ]);
  });

  it("draws a fresh row for @table:_ at compile time", () => {
    const program = compileText("@t:_ @t:_", new SequentialRowIdSource(10n));
    expect(program.code.slice(1, 3)).toEqual([
      { op: "Push", value: VIdentity(identity("t", 10n)) },
      { op: "Push", value: VIdentity(identity("t", 11n)) },
    ]);
  });

  it("accepts the largest unsigned 64-bit row", () => {
    const program = compile("@t:18446744073709551615");
    expect(program.code[1]).toEqual({ op: "Push", value: VIdentity(identity("t", 18446744073709551615n)) });
  });

  it("emits one instruction per operator keyword", () => {
    expect(compile("set select select_all filter drop + -").code.map((i) => i.op)).toEqual([
      "Start",
      "Set",
      "Select",
      "SelectAll",
      "Filter",
      "Drop",
      "Add",
      "Subtract",
      "End",
    ]);
  });

  it("patches a range to exit past its jump", () => {
    const program = compile("range 3 do @t:_ \"n\" it set drop end");
    expect(program.code).toEqual([
      { op: "Start" },
      { op: "Range", count: 3n, end: 8 },
      { op: "Push", value: VIdentity(identity("t", 1n)) },
      { op: "Push", value: VText("n") },
      { op: "It" },
      { op: "Set" },
      { op: "Drop" },
      { op: "Jump", target: 1 },
      { op: "End" },
    ]);
  });

  it("resolves nested ranges innermost first", () => {
    const program = compile("range 2 do range 3 do it drop end end");
    expect(program.code).toEqual([
      { op: "Start" },
      { op: "Range", count: 2n, end: 7 },
      { op: "Range", count: 3n, end: 6 },
      { op: "It" },
      { op: "Drop" },
      { op: "Jump", target: 2 },
      { op: "Jump", target: 1 },
      { op: "End" },
    ]);
  });

  it("treats do as optional", () => {
    expect(compile("range 1 end").code).toEqual([
      { op: "Start" },
      { op: "Range", count: 1n, end: 3 },
      { op: "Jump", target: 1 },
      { op: "End" },
    ]);
  });
});

describe("compile errors", () => {
  it("rejects it outside a range", () => {
    const err = compileError("1 it");
    expect(err.message).toBe("`it` used outside of a range block at line 1:3");
    expect(err.loc).toEqual({ line: 1, column: 3 });
    expect(err.code).toBe("COMPILE_ERROR");
  });

  it("rejects it after its range has closed", () => {
    expect(compileError("range 1 do end it").message).toBe("`it` used outside of a range block at line 1:16");
  });

  it("requires an integer bound after range", () => {
    expect(compileError("range x do end").message).toBe(
      "`range` at line 1:1 must be followed by an integer bound, found `x`"
    );
    expect(compileError("range").message).toBe(
      "`range` at line 1:1 must be followed by an integer bound, found end of input"
    );
  });

  it("rejects an unmatched end", () => {
    expect(compileError("drop end").message).toBe("unmatched `end` at line 1:6");
  });

  it("rejects an unclosed range", () => {
    const err = compileError("1 drop\nrange 2 do");
    expect(err.message).toBe("unclosed `range` block opened at line 2:1: missing `end`");
    expect(err.loc).toEqual({ line: 2, column: 1 });
  });

  it("rejects float literals that overflow", () => {
    const err = compileError("1 1e400");
    expect(err.message).toBe("float literal `1e400` at line 1:3 is out of range");
    expect(err.loc).toEqual({ line: 1, column: 3 });
    expect(compileError("-1e400").message).toBe("float literal `-1e400` at line 1:1 is out of range");
    expect(compile("1e308").code[1]).toEqual({ op: "Push", value: VFloat(1e308) });
  });

  it("rejects unknown words", () => {
    expect(compileError("@t:1 selec").message).toBe("unknown word `selec` at line 1:6");
  });

  it("rejects malformed identities", () => {
    expect(compileError("@t").message).toBe(
      "malformed identity `@t` at line 1:1: expected exactly one ':' between table and row"
    );
    expect(compileError("@:1").message).toBe("malformed identity `@:1` at line 1:1: empty table name");
    expect(compileError("@t:x").message).toBe(
      "malformed identity `@t:x` at line 1:1: row must be an unsigned 64-bit number or _"
    );
    expect(compileError("@t:-1").message).toBe(
      "malformed identity `@t:-1` at line 1:1: row must be an unsigned 64-bit number or _"
    );
    expect(compileError("@t:18446744073709551616").message).toBe(
      "malformed identity `@t:18446744073709551616` at line 1:1: row must be an unsigned 64-bit number or _"
    );
  });
});
