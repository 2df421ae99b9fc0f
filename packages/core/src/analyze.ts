import type { WorkbookSource } from "./adapters";
import {
  describeConnection,
  extractDatabase,
  parseConnectionString,
} from "./connectionString";
import { parseFormula } from "./formulaParser";
import {
  DEFAULT_CLASSIFIER_POLICY,
  type ClassifierPolicy,
  type ConnectionRecord,
  type DocumentScan,
  type QueryRecord,
  type RawConnection,
  type RawQuery,
} from "./model";
import { analyzeSql } from "./sqlClassifier";
import { extractTableFromSql } from "./sqlParser";

/**
 * Derive the structured fields of one connection block.
 * Blocks without database properties keep every derived field empty.
 */
export function buildConnectionRecord(
  raw: RawConnection,
  policy: ClassifierPolicy = DEFAULT_CLASSIFIER_POLICY,
): ConnectionRecord {
  const connectionString = raw.connectionString ?? "";
  const attributes = parseConnectionString(connectionString);
  const details = describeConnection(connectionString);

  if (!raw.hasDatabaseProperties) {
    return {
      name: raw.name,
      kind: raw.kind,
      connectionString,
      attributes,
      isSql: "no",
      details,
    };
  }

  const commandText = raw.commandText || undefined;
  const analysis = analyzeSql(commandText, attributes, raw.commandType, policy);

  return {
    name: raw.name,
    kind: raw.kind,
    connectionString,
    attributes,
    commandText,
    commandType: raw.commandType || undefined,
    database: extractDatabase(attributes) ?? analysis.database,
    table: extractTableFromSql(commandText) ?? analysis.table,
    isSql: analysis.isSql,
    details,
  };
}

export function buildQueryRecord(raw: RawQuery): QueryRecord {
  return {
    name: raw.name,
    formula: raw.formula,
    databaseInfo: parseFormula(raw.formula),
  };
}

/**
 * End-to-end analysis of one document already read by an adapter.
 *
 * Deterministic and side-effect free: the same source and policy always
 * give the same records.
 */
export function analyzeDocument(
  location: { folder: string; file: string },
  source: WorkbookSource,
  policy: ClassifierPolicy = DEFAULT_CLASSIFIER_POLICY,
): DocumentScan {
  return {
    folder: location.folder,
    file: location.file,
    connections: source.connections.map((c) => buildConnectionRecord(c, policy)),
    queries: source.queries.map(buildQueryRecord),
  };
}
