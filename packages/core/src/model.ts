export type ConnectionKind = "OLEDB" | "ODBC" | "Web" | "Unknown";

export type SqlFlag = "yes" | "no";

export type SourceSystem =
  | "SQL Server"
  | "Oracle"
  | "MySQL"
  | "PostgreSQL"
  | "OLE DB"
  | "ODBC"
  | "Unknown";

export type FailureKind =
  | "CorruptArchive"
  | "MalformedMetadata"
  | "MissingConnectionBlock"
  | "UnsupportedConnectionType"
  | "MissingDependency"
  | "Timeout"
  | "Unreadable";

export type ConnectionAttributes = Readonly<Record<string, string>>;

/**
 * A connection block as an adapter sees it, before any derivation.
 * Both the packaged-document reader and the live-object reader produce this.
 */
export interface RawConnection {
  name: string;
  kind: ConnectionKind;
  connectionString?: string;
  commandText?: string;
  commandType?: string;
  /** false for OLAP, web and text-import blocks; they are recorded with empty fields */
  hasDatabaseProperties: boolean;
}

export interface RawQuery {
  name: string;
  formula: string;
}

export interface ConnectionDetails {
  server?: string;
  database?: string;
  provider?: string;
  sourceSystem: SourceSystem;
}

export interface ConnectionRecord {
  readonly name: string;
  readonly kind: ConnectionKind;
  readonly connectionString: string;
  readonly attributes: ConnectionAttributes;
  readonly commandText?: string;
  readonly commandType?: string;
  readonly database?: string;
  readonly table?: string;
  readonly isSql: SqlFlag;
  readonly details: ConnectionDetails;
}

export interface DatabaseInfo {
  servers: string[];
  databases: string[];
  schemas: string[];
  tables: string[];
  sources: string[];
}

export interface QueryRecord {
  readonly name: string;
  readonly formula: string;
  readonly databaseInfo: Readonly<DatabaseInfo>;
}

export interface ErrorEntry {
  file: string;
  kind: FailureKind;
  message?: string;
}

export interface DocumentScan {
  folder: string;
  file: string;
  connections: readonly ConnectionRecord[];
  queries: readonly QueryRecord[];
  error?: ErrorEntry;
}

export interface QueryMapping {
  file: string;
  queryName: string;
  servers: string[];
  databases: string[];
  schemas: string[];
  tables: string[];
  sources: string[];
  /** false when the parallel lists have different lengths and cannot be read row by row */
  positionallyAligned: boolean;
}

export interface ConnectionMapping {
  file: string;
  connectionName: string;
  connectionKind: ConnectionKind;
  server?: string;
  database?: string;
  provider?: string;
}

export interface InventoryCounts {
  totalServers: number;
  totalDatabases: number;
  totalSchemas: number;
  totalTables: number;
  totalSources: number;
}

export interface InventorySummary {
  summary: InventoryCounts;
  servers: string[];
  databases: string[];
  schemas: string[];
  tables: string[];
  sources: string[];
  queryMappings: QueryMapping[];
  connectionMappings: ConnectionMapping[];
}

/**
 * Command-type codes and provider markers used as corroborating evidence by
 * the classifier. Both are provider-specific, so callers may replace them.
 */
export interface ClassifierPolicy {
  structuredCommandTypes: ReadonlySet<string>;
  sqlProviderMarkers: readonly string[];
}

export const DEFAULT_CLASSIFIER_POLICY: ClassifierPolicy = {
  structuredCommandTypes: new Set(["1", "2", "3", "Table"]),
  sqlProviderMarkers: ["sqloledb", "sqlncli"],
};

export interface SqlAnalysis {
  table?: string;
  database?: string;
  isSql: SqlFlag;
}
