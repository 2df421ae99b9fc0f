import type { ConnectionAttributes, ConnectionDetails, SourceSystem } from "./model";

/**
 * Parse a `key=value;key=value` connection string into a map keyed by the
 * lower-cased key. Later duplicates overwrite earlier ones; segments without
 * `=` are ignored.
 */
export function parseConnectionString(
  text: string | null | undefined,
): ConnectionAttributes {
  if (!text) return {};

  // a Map keeps keys such as `__proto__` as ordinary entries
  const entries = new Map<string, string>();
  const segments = text.split(";").filter((s) => s.trim());
  for (const segment of segments) {
    const eq = segment.indexOf("=");
    if (eq < 0) continue;
    const key = segment.slice(0, eq).trim().toLowerCase();
    entries.set(key, segment.slice(eq + 1).trim());
  }
  return Object.fromEntries(entries);
}

function firstValue(
  attributes: ConnectionAttributes,
  keys: readonly string[],
): string | undefined {
  for (const key of keys) {
    const value = attributes[key];
    if (value) return value;
  }
  return undefined;
}

export function extractDatabase(attributes: ConnectionAttributes): string | undefined {
  return firstValue(attributes, ["initial catalog", "database"]);
}

const SOURCE_SYSTEM_MARKERS: ReadonlyArray<[SourceSystem, readonly string[]]> = [
  ["SQL Server", ["sqlserver", "sql server", "sqloledb", "sqlncli"]],
  ["Oracle", ["oracle"]],
  ["MySQL", ["mysql"]],
  ["PostgreSQL", ["postgresql", "postgres"]],
  ["OLE DB", ["oledb"]],
  ["ODBC", ["odbc"]],
];

export function detectSourceSystem(text: string): SourceSystem {
  const lower = text.toLowerCase();
  for (const [system, markers] of SOURCE_SYSTEM_MARKERS) {
    if (markers.some((m) => lower.includes(m))) return system;
  }
  return "Unknown";
}

// Data source of a workbook's own mashup queries, not a server.
const WORKBOOK_DATA_SOURCE = "$workbook$";

/**
 * Server, database, provider and source system of a connection string.
 */
export function describeConnection(text: string | null | undefined): ConnectionDetails {
  if (!text) return { sourceSystem: "Unknown" };
  const attributes = parseConnectionString(text);
  const server = firstValue(attributes, ["server", "data source", "host"]);
  return {
    server: server?.toLowerCase() === WORKBOOK_DATA_SOURCE ? undefined : server,
    database: extractDatabase(attributes) ?? firstValue(attributes, ["dbq"]),
    provider: firstValue(attributes, ["provider"]),
    sourceSystem: detectSourceSystem(text),
  };
}
