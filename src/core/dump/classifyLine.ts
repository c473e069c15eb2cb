import type { DataLine, DatabaseContext, Statement } from "./dump.types";

export const DML_SENTINEL = "# DML";
export const DATABASE_DIRECTIVE = "# CONTEXT-DATABASE";
export const RETENTION_POLICY_DIRECTIVE = "# CONTEXT-RETENTION-POLICY";

export type ContextField = keyof DatabaseContext;

export type DdlLine =
  | { kind: "sentinel" }
  | { kind: "comment" }
  | { kind: "blank" }
  | { kind: "statement"; statement: Statement };

export type DmlLine =
  | { kind: "directive"; field: ContextField; value: string }
  | { kind: "malformed_directive"; field: ContextField; line: string }
  | { kind: "comment" }
  | { kind: "data"; line: DataLine };

const directives: Array<{ prefix: string; field: ContextField }> = [
  { prefix: DATABASE_DIRECTIVE, field: "database" },
  { prefix: RETENTION_POLICY_DIRECTIVE, field: "retentionPolicy" }
];

/**
 * DDL-phase comments are never read as directives.
 */
export const classifyDdlLine = (line: string): DdlLine => {
  if (line.startsWith(DML_SENTINEL)) return { kind: "sentinel" };
  if (line.startsWith("#")) return { kind: "comment" };
  if (line.trim() === "") return { kind: "blank" };
  return { kind: "statement", statement: line };
};

/**
 * A directive is its prefix followed by a colon, optionally after whitespace. The bare
 * prefix is malformed; any other text after the prefix makes the line a comment.
 */
export const classifyDmlLine = (line: string): DmlLine => {
  for (const { prefix, field } of directives) {
    if (!line.startsWith(prefix)) continue;

    const rest = line.slice(prefix.length).trimStart();
    if (rest === "") return { kind: "malformed_directive", field, line };
    if (!rest.startsWith(":")) break;
    return { kind: "directive", field, value: rest.slice(1).trim() };
  }

  if (line.startsWith("#")) return { kind: "comment" };
  return { kind: "data", line };
};
