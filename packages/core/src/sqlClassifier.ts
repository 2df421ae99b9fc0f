import { normalizeCommandText } from "./normalize";
import { parseObjectName, tableReference } from "./sqlParser";
import {
  DEFAULT_CLASSIFIER_POLICY,
  type ClassifierPolicy,
  type ConnectionAttributes,
  type SqlAnalysis,
} from "./model";

const STATEMENT_KEYWORD = /\b(?:select|insert|update|delete|with)\b/;
const SOURCE_KEYWORD = /\b(?:from|into)\b/;
const THREE_PART_NAME =
  /\b[a-z0-9_$]+\.[a-z0-9_$]+\.[a-z0-9_$]+\b|"[^"]+"\."[^"]+"\."[^"]+"/;
const TWO_PART_NAME = /\b[a-z0-9_$]+\.[a-z0-9_$]+\b/;
const PROVIDER_SQL_HINT = /\b(?:select|from)\b/;
const USE_DATABASE = /\buse\s+(\[[^\]]+\]|"[^"]+"|[a-zA-Z0-9_$]+)/i;

function hasStatementShape(lower: string): boolean {
  return STATEMENT_KEYWORD.test(lower) && SOURCE_KEYWORD.test(lower);
}

function isStructuredReference(
  lower: string,
  commandType: string | undefined,
  policy: ClassifierPolicy,
): boolean {
  if (commandType === undefined) return false;
  if (!policy.structuredCommandTypes.has(commandType.trim())) return false;
  return THREE_PART_NAME.test(lower);
}

function isSqlProviderCommand(
  lower: string,
  attributes: ConnectionAttributes | undefined,
  policy: ClassifierPolicy,
): boolean {
  const provider = attributes?.["provider"]?.toLowerCase();
  if (!provider) return false;
  if (!policy.sqlProviderMarkers.some((m) => provider.includes(m))) return false;
  return PROVIDER_SQL_HINT.test(lower) || TWO_PART_NAME.test(lower);
}

function databaseFromUse(text: string): string | undefined {
  const match = USE_DATABASE.exec(text);
  if (!match) return undefined;
  return match[1].replace(/[[\]"]/g, "") || undefined;
}

/**
 * Decide whether a command is genuine SQL and recover the table and database
 * it names. Lexical evidence comes first; the command-type code and the
 * provider only corroborate a structural match.
 */
export function analyzeSql(
  text: string | null | undefined,
  attributes?: ConnectionAttributes,
  commandType?: string,
  policy: ClassifierPolicy = DEFAULT_CLASSIFIER_POLICY,
): SqlAnalysis {
  if (!text) return { isSql: "no" };

  const normalized = normalizeCommandText(text);
  const lower = normalized.toLowerCase();

  const isSql =
    hasStatementShape(lower) ||
    isStructuredReference(lower, commandType, policy) ||
    isSqlProviderCommand(lower, attributes, policy);

  const name = parseObjectName(normalized);
  const table = name ? tableReference(name) : undefined;

  let database: string | undefined;
  if (name && name.segments.length >= 3) {
    // catalog.schema.table or server.catalog.schema.table
    database = name.segments[name.segments.length - 3];
  }
  if (!database) database = databaseFromUse(normalized);

  return { table, database, isSql: isSql ? "yes" : "no" };
}
