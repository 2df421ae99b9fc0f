export * from "./model";
export * from "./errors";
export { normalizeCommandText } from "./normalize";
export {
  parseConnectionString,
  extractDatabase,
  describeConnection,
  detectSourceSystem,
} from "./connectionString";
export {
  parseObjectName,
  extractTableFromSql,
  tableReference,
  type ObjectName,
} from "./sqlParser";
export { analyzeSql } from "./sqlClassifier";
export {
  FORMULA_RULES,
  parseFormula,
  parseSectionDocument,
  emptyDatabaseInfo,
  hasDatabaseInfo,
  isPositionallyAligned,
  type FormulaRule,
  type FormulaSourceSystem,
} from "./formulaParser";
export {
  readConnectionsXml,
  readLiveWorkbook,
  readProperty,
  readText,
  collectionItems,
  type WorkbookSource,
} from "./adapters";
export { buildConnectionRecord, buildQueryRecord, analyzeDocument } from "./analyze";
export {
  emptyInventory,
  mergeDocument,
  mergeInventories,
  summarizeInventory,
  consolidate,
  compareText,
  type Inventory,
} from "./inventory";
