import { readFile } from "node:fs/promises";
import CFB from "cfb";
import {
  attempt,
  ExtractionError,
  parseSectionDocument,
  readConnectionsXml,
  type RawQuery,
  type WorkbookSource,
} from "@conninv/core";
import { errorMessage } from "./utils";

type Archive = ReturnType<typeof CFB.read>;

const CONNECTIONS_PART = "/xl/connections.xml";
const CUSTOM_XML_ITEM = /\/customXml\/item\d+\.xml$/i;
const DATA_MASHUP = /<DataMashup\b[^>]*>([\s\S]*?)<\/DataMashup>/;
const SECTION_DOCUMENT = "/Formulas/Section1.m";

/** Text of an XML or M part, honouring a UTF-16LE or UTF-8 byte-order mark. */
export function decodeText(content: Uint8Array | readonly number[]): string {
  const bytes = Buffer.from(content);
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return bytes.subarray(2).toString("utf16le");
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return bytes.subarray(3).toString("utf8");
  }
  return bytes.toString("utf8");
}

function openArchive(data: Buffer, what: string): Archive {
  // zip local file header
  if (data.length < 4 || data[0] !== 0x50 || data[1] !== 0x4b) {
    throw new ExtractionError("CorruptArchive", `${what} is not a zip package`);
  }
  try {
    return CFB.read(data, { type: "buffer" });
  } catch (err) {
    throw new ExtractionError("CorruptArchive", `${what} cannot be unpacked: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Decode a DataMashup payload: 4-byte version, 4-byte little-endian package
 * length, then the package zip that carries the section document.
 */
export function decodeDataMashup(payload: Buffer): string | undefined {
  if (payload.length < 8) return undefined;
  const length = payload.readUInt32LE(4);
  const packageBytes = payload.subarray(8, 8 + length);
  const section = CFB.find(openArchive(packageBytes, "mashup package"), SECTION_DOCUMENT);
  return section ? decodeText(section.content) : undefined;
}

function readMashupQueries(archive: Archive): RawQuery[] {
  for (let i = 0; i < archive.FullPaths.length; i++) {
    const entry = archive.FileIndex[i];
    if (!entry || !CUSTOM_XML_ITEM.test(archive.FullPaths[i] ?? "")) continue;

    const match = DATA_MASHUP.exec(decodeText(entry.content));
    const encoded = match?.[1]?.trim();
    if (!encoded) continue;

    const section = attempt(() => decodeDataMashup(Buffer.from(encoded, "base64")));
    if (section) return parseSectionDocument(section);
  }
  return [];
}

/**
 * Read the connection blocks and mashup queries of a packaged workbook.
 */
export function readWorkbookBuffer(data: Buffer, what = "document"): WorkbookSource {
  const archive = openArchive(data, what);
  const part = CFB.find(archive, CONNECTIONS_PART);
  return {
    connections: part ? readConnectionsXml(decodeText(part.content)) : [],
    queries: readMashupQueries(archive),
  };
}

export async function readWorkbookPackage(path: string): Promise<WorkbookSource> {
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (err) {
    throw new ExtractionError("Unreadable", `cannot read ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return readWorkbookBuffer(data, path);
}
