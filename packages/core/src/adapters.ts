import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { attempt, ExtractionError, isExtractionError } from "./errors";
import type { ConnectionKind, RawConnection, RawQuery } from "./model";

/** What one document exposes, whichever way it was opened. */
export interface WorkbookSource {
  connections: RawConnection[];
  queries: RawQuery[];
}

// ---- packaged-document form: xl/connections.xml ----

const DbPrSchema = z
  .object({
    "@_connection": z.string().optional(),
    "@_command": z.string().optional(),
    "@_commandType": z.string().optional(),
  })
  .passthrough();

const ConnectionElementSchema = z
  .object({
    "@_id": z.string().optional(),
    "@_name": z.string().optional(),
    "@_type": z.string().optional(),
    // an element without attributes parses to ""
    dbPr: z.union([DbPrSchema, z.string()]).optional(),
    olapPr: z.unknown().optional(),
    webPr: z.unknown().optional(),
    textPr: z.unknown().optional(),
  })
  .passthrough();

const ConnectionsPartSchema = z
  .object({
    connections: z.union([
      z.object({ connection: z.array(ConnectionElementSchema).optional() }).passthrough(),
      z.string(),
    ]),
  })
  .passthrough();

type ConnectionElement = z.infer<typeof ConnectionElementSchema>;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseAttributeValue: false,
  isArray: (name, _jpath, _isLeaf, isAttribute) => !isAttribute && name === "connection",
});

// ST_ConnectionType codes: 1 ODBC, 4 web query, 5 OLE DB.
const CONNECTION_TYPE_CODES: Readonly<Record<string, ConnectionKind>> = {
  "1": "ODBC",
  "4": "Web",
  "5": "OLEDB",
};

function kindOfElement(element: ConnectionElement): ConnectionKind {
  const byCode = element["@_type"] ? CONNECTION_TYPE_CODES[element["@_type"]] : undefined;
  if (byCode) return byCode;
  if (element.webPr !== undefined) return "Web";
  return "Unknown";
}

function toRawConnection(element: ConnectionElement): RawConnection {
  const name = element["@_name"] || element["@_id"] || "";
  const kind = kindOfElement(element);
  const dbPr = element.dbPr;
  if (dbPr === undefined) {
    return { name, kind, hasDatabaseProperties: false };
  }
  if (typeof dbPr === "string") {
    return { name, kind, hasDatabaseProperties: true };
  }
  return {
    name,
    kind,
    connectionString: dbPr["@_connection"],
    commandText: dbPr["@_command"],
    commandType: dbPr["@_commandType"],
    hasDatabaseProperties: true,
  };
}

/**
 * Read the connection blocks of a workbook's connections part.
 * Throws `MalformedMetadata` when the XML or its shape cannot be read.
 */
export function readConnectionsXml(xml: string): RawConnection[] {
  let document: unknown;
  try {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new ExtractionError(
        "MalformedMetadata",
        `connections part is not well-formed: ${validation.err.msg} (line ${validation.err.line})`,
      );
    }
    document = xmlParser.parse(xml);
  } catch (err) {
    if (isExtractionError(err)) throw err;
    throw new ExtractionError(
      "MalformedMetadata",
      `connections part cannot be parsed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const parsed = ConnectionsPartSchema.safeParse(document);
  if (!parsed.success) {
    throw new ExtractionError(
      "MalformedMetadata",
      `unexpected connections part shape: ${parsed.error.issues[0]?.message ?? "unknown"}`,
    );
  }

  const root = parsed.data.connections;
  if (typeof root === "string") return [];
  return (root.connection ?? []).map(toRawConnection);
}

// ---- live-object form: an automation object graph ----

/**
 * Read one property of an untyped automation object. A missing object or a
 * getter that throws both read as `undefined`.
 */
export function readProperty(target: unknown, key: string): unknown {
  if (target === null || (typeof target !== "object" && typeof target !== "function")) {
    return undefined;
  }
  return attempt(() => Reflect.get(target, key));
}

export function readText(target: unknown, key: string): string | undefined {
  let value = readProperty(target, key);
  // command text may come back as an array of chunks
  if (Array.isArray(value)) value = value[0];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

/**
 * Items of an automation collection (`Count` plus 1-based `Item(i)`), or of a
 * plain array. Items that cannot be read are skipped.
 */
export function collectionItems(collection: unknown): unknown[] {
  if (Array.isArray(collection)) return collection;

  const count = Number(readProperty(collection, "Count"));
  if (!Number.isInteger(count) || count <= 0) return [];

  const item = readProperty(collection, "Item");
  if (typeof item !== "function") return [];

  const items: unknown[] = [];
  for (let i = 1; i <= count; i++) {
    const value = attempt((): unknown => item.call(collection, i));
    if (value !== undefined && value !== null) items.push(value);
  }
  return items;
}

// XlConnectionType: 1 OLE DB, 2 ODBC, 5 web.
const LIVE_TYPE_CODES: Readonly<Record<string, ConnectionKind>> = {
  "1": "OLEDB",
  "2": "ODBC",
  "5": "Web",
};

function readLiveConnection(connection: unknown, index: number): RawConnection {
  const name = readText(connection, "Name") || `Connection_${index + 1}`;
  const oledb = readProperty(connection, "OLEDBConnection");
  const odbc = readProperty(connection, "ODBCConnection");
  const properties = oledb ?? odbc;

  let kind: ConnectionKind;
  if (oledb !== undefined && oledb !== null) kind = "OLEDB";
  else if (odbc !== undefined && odbc !== null) kind = "ODBC";
  else kind = LIVE_TYPE_CODES[readText(connection, "Type") ?? ""] ?? "Unknown";

  if (properties === undefined || properties === null) {
    return { name, kind, hasDatabaseProperties: false };
  }
  return {
    name,
    kind,
    connectionString: readText(properties, "Connection"),
    commandText: readText(properties, "CommandText"),
    commandType: readText(properties, "CommandType"),
    hasDatabaseProperties: true,
  };
}

function readLiveQuery(query: unknown, index: number): RawQuery {
  return {
    name: readText(query, "Name") || `Query_${index + 1}`,
    formula: readText(query, "Formula") ?? "",
  };
}

/**
 * Read connections and mashup queries from a live workbook object.
 */
export function readLiveWorkbook(workbook: unknown): WorkbookSource {
  return {
    connections: collectionItems(readProperty(workbook, "Connections")).map(readLiveConnection),
    queries: collectionItems(readProperty(workbook, "Queries")).map(readLiveQuery),
  };
}
