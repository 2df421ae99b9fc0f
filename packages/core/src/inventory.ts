import { hasDatabaseInfo, isPositionallyAligned } from "./formulaParser";
import type {
  ConnectionMapping,
  ConnectionRecord,
  DocumentScan,
  InventorySummary,
  QueryMapping,
  QueryRecord,
} from "./model";

/**
 * Running cross-document inventory. Values are never mutated; every merge
 * returns a new inventory.
 */
export interface Inventory {
  readonly servers: ReadonlySet<string>;
  readonly databases: ReadonlySet<string>;
  readonly schemas: ReadonlySet<string>;
  readonly tables: ReadonlySet<string>;
  readonly sources: ReadonlySet<string>;
  readonly queryMappings: readonly QueryMapping[];
  readonly connectionMappings: readonly ConnectionMapping[];
}

export function emptyInventory(): Inventory {
  return {
    servers: new Set(),
    databases: new Set(),
    schemas: new Set(),
    tables: new Set(),
    sources: new Set(),
    queryMappings: [],
    connectionMappings: [],
  };
}

function union(a: ReadonlySet<string>, b: Iterable<string>): Set<string> {
  const out = new Set(a);
  for (const value of b) out.add(value);
  return out;
}

function queryMapping(file: string, query: QueryRecord): QueryMapping {
  const info = query.databaseInfo;
  return {
    file,
    queryName: query.name,
    servers: [...info.servers],
    databases: [...info.databases],
    schemas: [...info.schemas],
    tables: [...info.tables],
    sources: [...info.sources],
    positionallyAligned: isPositionallyAligned(info),
  };
}

function connectionMapping(
  file: string,
  connection: ConnectionRecord,
): ConnectionMapping | undefined {
  const server = connection.details.server;
  const database = connection.database ?? connection.details.database;
  if (!server && !database) return undefined;
  return {
    file,
    connectionName: connection.name,
    connectionKind: connection.kind,
    server,
    database,
    provider: connection.details.provider,
  };
}

/**
 * Fold one document's records into the inventory.
 */
export function mergeDocument(inventory: Inventory, scan: DocumentScan): Inventory {
  const queries = scan.queries
    .filter((q) => hasDatabaseInfo(q.databaseInfo))
    .map((q) => queryMapping(scan.file, q));
  const connections = scan.connections
    .map((c) => connectionMapping(scan.file, c))
    .filter((m): m is ConnectionMapping => m !== undefined);

  return {
    servers: union(
      union(inventory.servers, queries.flatMap((q) => q.servers)),
      connections.flatMap((c) => (c.server ? [c.server] : [])),
    ),
    databases: union(
      union(inventory.databases, queries.flatMap((q) => q.databases)),
      connections.flatMap((c) => (c.database ? [c.database] : [])),
    ),
    schemas: union(inventory.schemas, queries.flatMap((q) => q.schemas)),
    tables: union(inventory.tables, queries.flatMap((q) => q.tables)),
    sources: union(inventory.sources, queries.flatMap((q) => q.sources)),
    queryMappings: [...inventory.queryMappings, ...queries],
    connectionMappings: [...inventory.connectionMappings, ...connections],
  };
}

/**
 * Combine two partial inventories. Commutative and associative, so partial
 * results may be combined in any order.
 */
export function mergeInventories(a: Inventory, b: Inventory): Inventory {
  return {
    servers: union(a.servers, b.servers),
    databases: union(a.databases, b.databases),
    schemas: union(a.schemas, b.schemas),
    tables: union(a.tables, b.tables),
    sources: union(a.sources, b.sources),
    queryMappings: [...a.queryMappings, ...b.queryMappings],
    connectionMappings: [...a.connectionMappings, ...b.connectionMappings],
  };
}

// Code-unit order, independent of locale.
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sorted(values: ReadonlySet<string>): string[] {
  return Array.from(values).sort(compareText);
}

function compareMappings<T extends { file: string }>(name: (m: T) => string) {
  return (a: T, b: T): number =>
    compareText(a.file, b.file) ||
    compareText(name(a), name(b)) ||
    compareText(JSON.stringify(a), JSON.stringify(b));
}

export function summarizeInventory(inventory: Inventory): InventorySummary {
  return {
    summary: {
      totalServers: inventory.servers.size,
      totalDatabases: inventory.databases.size,
      totalSchemas: inventory.schemas.size,
      totalTables: inventory.tables.size,
      totalSources: inventory.sources.size,
    },
    servers: sorted(inventory.servers),
    databases: sorted(inventory.databases),
    schemas: sorted(inventory.schemas),
    tables: sorted(inventory.tables),
    sources: sorted(inventory.sources),
    queryMappings: [...inventory.queryMappings].sort(
      compareMappings<QueryMapping>((m) => m.queryName),
    ),
    connectionMappings: [...inventory.connectionMappings].sort(
      compareMappings<ConnectionMapping>((m) => m.connectionName),
    ),
  };
}

export function consolidate(scans: readonly DocumentScan[]): InventorySummary {
  return summarizeInventory(scans.reduce(mergeDocument, emptyInventory()));
}
