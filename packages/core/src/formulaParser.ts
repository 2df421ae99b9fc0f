import { attempt } from "./errors";
import type { DatabaseInfo, RawQuery } from "./model";
import { parseObjectName } from "./sqlParser";

export type FormulaSourceSystem =
  | "SQL Server"
  | "Oracle"
  | "MySQL"
  | "PostgreSQL"
  | "Web"
  | "OData"
  | "Excel"
  | "CSV"
  | "Navigation"
  | "Native query";

export interface FormulaRule {
  system: FormulaSourceSystem;
  pattern: RegExp;
  apply(match: RegExpMatchArray, info: DatabaseInfo): void;
}

function serverDatabaseRule(system: FormulaSourceSystem, fn: string): FormulaRule {
  return {
    system,
    pattern: new RegExp(String.raw`\b${fn}\s*\(\s*"([^"]+)"\s*,\s*"([^"]+)"\s*[,)]`, "g"),
    apply([, server, database], info) {
      info.servers.push(server);
      info.databases.push(database);
      info.sources.push(`${system}: ${server}/${database}`);
    },
  };
}

function locationRule(system: FormulaSourceSystem, pattern: RegExp): FormulaRule {
  return {
    system,
    pattern,
    apply([, location], info) {
      info.sources.push(`${system}: ${location}`);
    },
  };
}

/**
 * Connector patterns applied, in order, to a whole formula. Every rule runs
 * independently, so lists filled by different rules are not aligned.
 */
export const FORMULA_RULES: readonly FormulaRule[] = [
  serverDatabaseRule("SQL Server", String.raw`Sql\.Database`),
  {
    system: "SQL Server",
    pattern: /\bSql\.Databases\s*\(\s*"([^"]+)"\s*[,)]/g,
    apply([, server], info) {
      info.servers.push(server);
      info.sources.push(`SQL Server: ${server}`);
    },
  },
  {
    system: "Navigation",
    pattern: /\[Schema="([^"]+)"\s*,\s*Item="([^"]+)"\]/g,
    apply([, schema, table], info) {
      info.schemas.push(schema);
      info.tables.push(table);
    },
  },
  {
    system: "Oracle",
    pattern: /\bOracle\.Database\s*\(\s*"([^"]+)"(?:\s*,\s*"([^"]*)")?\s*[,)]/g,
    apply([, server, service], info) {
      info.servers.push(server);
      if (service) info.databases.push(service);
      info.sources.push(`Oracle: ${server}` + (service ? `/${service}` : ""));
    },
  },
  serverDatabaseRule("MySQL", String.raw`MySql\.Database`),
  serverDatabaseRule("PostgreSQL", String.raw`PostgreSQL\.Database`),
  locationRule("Web", /\bWeb\.Contents\s*\(\s*"([^"]+)"\s*\)/g),
  locationRule("OData", /\bOData\.Feed\s*\(\s*"([^"]+)"\s*\)/g),
  locationRule("Excel", /\bExcel\.Workbook\s*\(\s*[^)]*"([^"]+\.xlsx?)"/g),
  locationRule("CSV", /\bCsv\.Document\s*\(\s*[^)]*"([^"]+\.csv)"/g),
  {
    system: "Native query",
    pattern: /\bQuery\s*=\s*"((?:[^"]|"")*)"/g,
    apply([, sql], info) {
      const name = parseObjectName(sql.replace(/""/g, '"'));
      if (!name || name.bare) return;
      const table = name.segments[name.segments.length - 1];
      if (name.segments.length >= 2) info.schemas.push(name.segments[name.segments.length - 2]);
      info.tables.push(table);
    },
  },
];

export function emptyDatabaseInfo(): DatabaseInfo {
  return { servers: [], databases: [], schemas: [], tables: [], sources: [] };
}

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Extract servers, databases, schemas, tables and source descriptions from a
 * mashup formula. A rule that fails contributes nothing; the others still run.
 */
export function parseFormula(
  formula: string | null | undefined,
  rules: readonly FormulaRule[] = FORMULA_RULES,
): DatabaseInfo {
  const info = emptyDatabaseInfo();
  if (!formula) return info;
  const text = formula;

  for (const rule of rules) {
    attempt(() => {
      for (const match of text.matchAll(rule.pattern)) {
        rule.apply(match, info);
      }
    });
  }

  return {
    servers: dedupe(info.servers),
    databases: dedupe(info.databases),
    schemas: dedupe(info.schemas),
    tables: dedupe(info.tables),
    sources: dedupe(info.sources),
  };
}

export function hasDatabaseInfo(info: DatabaseInfo): boolean {
  return (
    info.servers.length > 0 ||
    info.databases.length > 0 ||
    info.schemas.length > 0 ||
    info.tables.length > 0 ||
    info.sources.length > 0
  );
}

/**
 * Whether server/database and schema/table lists can be read pairwise.
 */
export function isPositionallyAligned(info: DatabaseInfo): boolean {
  return (
    info.servers.length === info.databases.length &&
    info.schemas.length === info.tables.length
  );
}

const SHARED_MEMBER = /^[ \t]*shared\s+(#"(?:[^"]|"")*"|[A-Za-z_][\w.]*)\s*=\s*/gm;

function unquoteMemberName(name: string): string {
  if (name.startsWith('#"')) return name.slice(2, -1).replace(/""/g, '"');
  return name;
}

/**
 * Split a mashup section document into its shared members, one query each.
 */
export function parseSectionDocument(text: string | null | undefined): RawQuery[] {
  if (!text) return [];
  const starts = Array.from(text.matchAll(SHARED_MEMBER));
  return starts.map((match, i) => {
    const bodyStart = (match.index ?? 0) + match[0].length;
    const bodyEnd = i + 1 < starts.length ? starts[i + 1].index ?? text.length : text.length;
    const formula = text.slice(bodyStart, bodyEnd).trim().replace(/;$/, "").trim();
    return { name: unquoteMemberName(match[1]), formula };
  });
}
