// src/core/engine/render.ts
// Hand-built JSON rendering of query responses
//
// Text values are written between quotes exactly as stored; the query
// language has no way to write a quote or backslash inside one. Error
// messages quote user input and are escaped.

import type { Value } from "../eval/values";
import { formatIdentity } from "../eval/values";
import type { DbRecord } from "../store/database";

export function renderValue(v: Value): string {
  switch (v.tag) {
    case "Identity":
      return `"${formatIdentity(v.id)}"`;
    case "Integer":
      return v.n.toString();
    case "Float":
      return String(v.n);
    case "Text":
      return `"${v.s}"`;
  }
}

export function renderRecord(record: DbRecord): string {
  const fields: string[] = [];
  for (const [key, value] of record.fields) {
    fields.push(`"${key}":${renderValue(value)}`);
  }
  return `{${fields.join(",")}}`;
}

export function renderOk(records: readonly DbRecord[]): string {
  return `{"message":"OK","data":[${records.map(renderRecord).join(",")}]}`;
}

function escapeJson(s: string): string {
  return s.replace(/["\\\u0000-\u001f]/g, (c) => {
    switch (c) {
      case '"':
        return '\\"';
      case "\\":
        return "\\\\";
      case "\n":
        return "\\n";
      case "\r":
        return "\\r";
      case "\t":
        return "\\t";
      default:
        return `\\u${c.charCodeAt(0).toString(16).padStart(4, "0")}`;
    }
  });
}

export function renderError(message: string): string {
  return `{"message":"${escapeJson(message)}"}`;
}
