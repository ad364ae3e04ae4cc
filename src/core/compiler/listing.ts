// src/core/compiler/listing.ts
// Human-readable disassembly of compiled programs

import { showValue } from "../eval/values";
import type { Instr, Program } from "./types";

export function formatInstr(instr: Instr): string {
  switch (instr.op) {
    case "Push":
      return `Push ${showValue(instr.value)}`;
    case "Range":
      return `Range ${instr.count} exit=${instr.end}`;
    case "Jump":
      return `Jump ${instr.target}`;
    default:
      return instr.op;
  }
}

/**
 * One line per instruction: zero-padded index, instruction, and the
 * `line:column` it was compiled from.
 */
export function formatProgram(program: Program): string {
  const width = String(Math.max(program.code.length - 1, 0)).length;
  return program.code
    .map((instr, ip) => {
      const head = `${String(ip).padStart(width, "0")}  ${formatInstr(instr)}`;
      const loc = program.locations[ip];
      return loc ? `${head.padEnd(32)}; ${loc.line}:${loc.column}` : head;
    })
    .join("\n");
}
