import { z } from "zod";

/** Job sent to a document child process. */
export const DocumentJobSchema = z.object({
  path: z.string(),
  root: z.string(),
  timeoutMs: z.number().int().positive(),
  structuredCommandTypes: z.array(z.string()),
  sqlProviderMarkers: z.array(z.string()),
});

export type DocumentJob = z.infer<typeof DocumentJobSchema>;

const ConnectionKindSchema = z.enum(["OLEDB", "ODBC", "Web", "Unknown"]);
const SqlFlagSchema = z.enum(["yes", "no"]);

const ConnectionRecordSchema = z.object({
  name: z.string(),
  kind: ConnectionKindSchema,
  connectionString: z.string(),
  attributes: z.record(z.string()),
  commandText: z.string().optional(),
  commandType: z.string().optional(),
  database: z.string().optional(),
  table: z.string().optional(),
  isSql: SqlFlagSchema,
  details: z.object({
    server: z.string().optional(),
    database: z.string().optional(),
    provider: z.string().optional(),
    sourceSystem: z.enum([
      "SQL Server",
      "Oracle",
      "MySQL",
      "PostgreSQL",
      "OLE DB",
      "ODBC",
      "Unknown",
    ]),
  }),
});

const QueryRecordSchema = z.object({
  name: z.string(),
  formula: z.string(),
  databaseInfo: z.object({
    servers: z.array(z.string()),
    databases: z.array(z.string()),
    schemas: z.array(z.string()),
    tables: z.array(z.string()),
    sources: z.array(z.string()),
  }),
});

const ErrorEntrySchema = z.object({
  file: z.string(),
  kind: z.enum([
    "CorruptArchive",
    "MalformedMetadata",
    "MissingConnectionBlock",
    "UnsupportedConnectionType",
    "MissingDependency",
    "Timeout",
    "Unreadable",
  ]),
  message: z.string().optional(),
});

/** A child's reply: one `DocumentScan`, as plain JSON. */
export const DocumentScanSchema = z.object({
  folder: z.string(),
  file: z.string(),
  connections: z.array(ConnectionRecordSchema),
  queries: z.array(QueryRecordSchema),
  error: ErrorEntrySchema.optional(),
});
