import { normalizeCommandText } from "./normalize";

// Small, deterministic recovery of the object a command reads from.
// Handles:
// - bare references: Customers, dbo.Customers, [dbo].[Customers]
// - the first FROM target of a query, 1-4 dotted segments
// - one quoting style per name: [..], ".." , `..` or bare

const BARE_REFERENCE = /^[[\]`"a-zA-Z0-9_.]+$/;
const SELECT_KEYWORD = /\bselect\b/i;

const BRACKETED = String.raw`\[[^\]]+\](?:\.\[[^\]]+\]){0,3}`;
const DOUBLE_QUOTED = String.raw`"[^"]+"(?:\."[^"]+"){0,3}`;
const BACKTICKED = String.raw`\`[^\`]+\`(?:\.\`[^\`]+\`){0,3}`;
const BARE = String.raw`[a-zA-Z0-9_$]+(?:\.[a-zA-Z0-9_$]+){0,3}`;

const FROM_TARGET = new RegExp(
  String.raw`\bfrom\s+(${BRACKETED}|${DOUBLE_QUOTED}|${BACKTICKED}|${BARE})`,
  "i",
);

export interface ObjectName {
  /** text exactly as it appeared in the command, after trimming */
  raw: string;
  /** segments with their wrapper characters removed */
  segments: string[];
  /** true when the whole command was a bare reference rather than a query */
  bare: boolean;
}

function stripWrappers(segment: string): string {
  return segment.replace(/[[\]"`]/g, "").trim();
}

function splitSegments(name: string): string[] {
  return name
    .split(".")
    .map(stripWrappers)
    .filter(Boolean);
}

/**
 * Locate the object name a command refers to: the command itself when it is
 * a bare reference, else the first FROM target.
 */
export function parseObjectName(command: string | null | undefined): ObjectName | undefined {
  if (!command) return undefined;

  const trimmed = command.trim();
  if (BARE_REFERENCE.test(trimmed) && !SELECT_KEYWORD.test(trimmed)) {
    return { raw: trimmed, segments: splitSegments(trimmed), bare: true };
  }

  const match = FROM_TARGET.exec(normalizeCommandText(command));
  if (!match) return undefined;

  // Drop a trailing alias or join glued to the name.
  const captured = match[1].split(/[\s;]/)[0];
  const segments = splitSegments(captured);
  if (!segments.length) return undefined;

  return { raw: captured, segments, bare: false };
}

/**
 * Best-effort `schema.table` of the first table a command reads.
 * A bare reference is returned unchanged.
 */
export function extractTableFromSql(command: string | null | undefined): string | undefined {
  const name = parseObjectName(command);
  return name ? tableReference(name) : undefined;
}

export function tableReference(name: ObjectName): string {
  if (name.bare) return name.raw;
  return name.segments.slice(-2).join(".");
}
