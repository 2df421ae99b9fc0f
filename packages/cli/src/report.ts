import { writeFileSync } from "node:fs";
import * as XLSX from "xlsx";
import type {
  DocumentScan,
  ErrorEntry,
  InventorySummary,
  SqlFlag,
} from "@conninv/core";
import type { ReportFormat, ReportLocale } from "./config";

export const REPORT_HEADERS = [
  "folder_name",
  "file_name",
  "connection",
  "database",
  "table_name",
  "sql query",
  "sql",
] as const;

const FLAG_LABELS: Record<ReportLocale, Record<SqlFlag, string>> = {
  en: { yes: "yes", no: "no" },
  it: { yes: "si", no: "no" },
};

export type ReportRow = string[];

/**
 * One row per connection, then one per mashup query, of every document.
 * Query rows list what the formula references and are never flagged as SQL.
 */
export function buildReportRows(
  scans: readonly DocumentScan[],
  locale: ReportLocale = "en",
): ReportRow[] {
  const labels = FLAG_LABELS[locale];
  return scans.flatMap((scan) => [
    ...scan.connections.map((c) => [
      scan.folder,
      scan.file,
      c.name,
      c.database ?? "",
      c.table ?? "",
      c.commandText ?? "",
      labels[c.isSql],
    ]),
    ...scan.queries.map((q) => [
      scan.folder,
      scan.file,
      q.name,
      q.databaseInfo.databases.join(", "),
      q.databaseInfo.tables.join(", "),
      q.formula,
      labels.no,
    ]),
  ]);
}

function sheetOf(rows: readonly (readonly (string | number | boolean)[])[]): XLSX.WorkSheet {
  return XLSX.utils.aoa_to_sheet(rows.map((r) => [...r]));
}

export type TabularFormat = Exclude<ReportFormat, "json">;

/** Flat report; an empty `rows` still writes the header line. */
export function writeReport(rows: readonly ReportRow[], path: string, format: TabularFormat): void {
  const sheet = sheetOf([[...REPORT_HEADERS], ...rows]);
  if (format === "csv") {
    writeFileSync(path, XLSX.utils.sheet_to_csv(sheet), "utf8");
    return;
  }
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, sheet, "Connections");
  XLSX.writeFile(book, path, { bookType: "xlsx" });
}

export function writeErrorReport(errors: readonly ErrorEntry[], path: string): void {
  const sheet = sheetOf([
    ["file_path", "error_type", "message"],
    ...errors.map((e) => [e.file, e.kind, e.message ?? ""]),
  ]);
  writeFileSync(path, XLSX.utils.sheet_to_csv(sheet), "utf8");
}

function listSheet(header: string, values: readonly string[]): XLSX.WorkSheet {
  return sheetOf([[header], ...values.map((v) => [v])]);
}

export function buildSummaryWorkbook(inventory: InventorySummary): XLSX.WorkBook {
  const { summary } = inventory;
  const book = XLSX.utils.book_new();
  const sheets: [string, XLSX.WorkSheet][] = [
    [
      "Summary",
      sheetOf([
        ["metric", "count"],
        ["servers", summary.totalServers],
        ["databases", summary.totalDatabases],
        ["schemas", summary.totalSchemas],
        ["tables", summary.totalTables],
        ["sources", summary.totalSources],
      ]),
    ],
    ["Servers", listSheet("server", inventory.servers)],
    ["Databases", listSheet("database", inventory.databases)],
    ["Schemas", listSheet("schema", inventory.schemas)],
    ["Tables", listSheet("table", inventory.tables)],
    ["Sources", listSheet("source", inventory.sources)],
    [
      "Query Mappings",
      sheetOf([
        ["file", "query", "servers", "databases", "schemas", "tables", "sources", "aligned"],
        ...inventory.queryMappings.map((m) => [
          m.file,
          m.queryName,
          m.servers.join(", "),
          m.databases.join(", "),
          m.schemas.join(", "),
          m.tables.join(", "),
          m.sources.join(", "),
          m.positionallyAligned,
        ]),
      ]),
    ],
    [
      "Connection Mappings",
      sheetOf([
        ["file", "connection", "kind", "server", "database", "provider"],
        ...inventory.connectionMappings.map((m) => [
          m.file,
          m.connectionName,
          m.connectionKind,
          m.server ?? "",
          m.database ?? "",
          m.provider ?? "",
        ]),
      ]),
    ],
  ];
  for (const [name, sheet] of sheets) XLSX.utils.book_append_sheet(book, sheet, name);
  return book;
}

export function writeSummaryReport(inventory: InventorySummary, path: string): void {
  XLSX.writeFile(buildSummaryWorkbook(inventory), path, { bookType: "xlsx" });
}

export interface JsonReport {
  summary: InventorySummary;
  documents: readonly DocumentScan[];
}

/** Inventory plus every document's records, as one JSON file. */
export function writeJsonReport(report: JsonReport, path: string): void {
  writeFileSync(path, `${JSON.stringify(report, null, 2)}\n`, "utf8");
}
