// src/core/reader/tokenize.ts
// Lexer for the query language: splits raw text into classified words

import { I64_MAX, I64_MIN } from "../eval/values";

export type TokenKind =
  | "Set"
  | "Select"
  | "SelectAll"
  | "Filter"
  | "Drop"
  | "Range"
  | "It"
  | "Do"
  | "End"
  | "Add"
  | "Subtract"
  | "String"
  | "Int"
  | "Float"
  | "Identity"
  | "Word";

export type Token = {
  word: string;
  kind: TokenKind;
  /** 1-based line of the token's first character */
  line: number;
  /** 1-based column of the token's first character */
  column: number;
};

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ["set", "Set"],
  ["select", "Select"],
  ["select_all", "SelectAll"],
  ["filter", "Filter"],
  ["drop", "Drop"],
  ["range", "Range"],
  ["it", "It"],
  ["do", "Do"],
  ["end", "End"],
  ["+", "Add"],
  ["-", "Subtract"],
]);

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function isInteger(word: string): boolean {
  if (!INT_RE.test(word)) return false;
  const n = BigInt(word);
  return n >= I64_MIN && n <= I64_MAX;
}

/**
 * Classify a flushed word. Keywords match case-insensitively; an integer that
 * does not fit in 64 bits falls through to a float.
 */
export function classifyWord(word: string): TokenKind {
  const keyword = KEYWORDS.get(word.toLowerCase());
  if (keyword) return keyword;

  if (word.length >= 2 && word.startsWith("\"") && word.endsWith("\"")) {
    return "String";
  }
  if (isInteger(word)) return "Int";
  if (FLOAT_RE.test(word)) return "Float";
  if (word.startsWith("@") && word.split(":").length === 2) return "Identity";

  return "Word";
}

const isSeparator = (c: string) => c === " " || c === "\r" || c === "\n";

/**
 * Tokenize query text. Never fails: anything unrecognised comes back as a
 * `Word` token for the compiler to report.
 */
export function tokenize(src: string): Token[] {
  const toks: Token[] = [];
  let word = "";
  let inString = false;
  let inComment = false;
  let line = 1;
  let column = 1;
  let startLine = 1;
  let startColumn = 1;

  const flush = () => {
    const w = word.replace(/^[ \r\n]+|[ \r\n]+$/g, "");
    word = "";
    if (w.length === 0) return;
    toks.push({ word: w, kind: classifyWord(w), line: startLine, column: startColumn });
  };

  for (const c of src) {
    if (inComment) {
      if (c === "\n") {
        inComment = false;
        flush();
      }
    } else if (c === "#" && !inString) {
      inComment = true;
    } else if (isSeparator(c) && !inString) {
      flush();
    } else {
      if (c === "\"") inString = !inString;
      if (word.length === 0) {
        startLine = line;
        startColumn = column;
      }
      word += c;
    }

    if (c === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }

  flush();
  return toks;
}
