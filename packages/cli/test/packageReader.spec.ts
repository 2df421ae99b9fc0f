/* packages/cli/test/packageReader.spec.ts */
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExtractionError } from '@conninv/core';
import {
  decodeDataMashup,
  decodeText,
  readWorkbookBuffer,
  readWorkbookPackage,
} from '../src/packageReader';
import {
  buildWorkbook,
  buildZip,
  CONNECTIONS_XML,
  makeTempDir,
  SECTION_DOCUMENT,
} from './fixtures';

async function failureKind(run: () => Promise<unknown>): Promise<string | undefined> {
  try {
    await run();
  } catch (err) {
    return err instanceof ExtractionError ? err.kind : 'other';
  }
  return undefined;
}

describe('decodeText', () => {
  it('honours byte-order marks', () => {
    expect(decodeText(Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('<a/>', 'utf16le')]))).toBe('<a/>');
    expect(decodeText(Buffer.from([0xef, 0xbb, 0xbf, 0x78]))).toBe('x');
    expect(decodeText([0x79])).toBe('y');
  });
});

describe('decodeDataMashup', () => {
  it('reads the section document from the inner package', () => {
    const inner = buildZip({ 'Formulas/Section1.m': 'section Section1;' });
    const header = Buffer.alloc(8);
    header.writeUInt32LE(inner.length, 4);
    expect(decodeDataMashup(Buffer.concat([header, inner]))).toBe('section Section1;');
  });

  it('returns undefined for a truncated payload', () => {
    expect(decodeDataMashup(Buffer.alloc(4))).toBeUndefined();
  });

  it('returns undefined when the package has no section document', () => {
    const inner = buildZip({ 'Config/Package.xml': '<Package/>' });
    const header = Buffer.alloc(8);
    header.writeUInt32LE(inner.length, 4);
    expect(decodeDataMashup(Buffer.concat([header, inner]))).toBeUndefined();
  });
});

describe('readWorkbookBuffer', () => {
  it('reads connection blocks and mashup queries', () => {
    const source = readWorkbookBuffer(
      buildWorkbook({ connections: CONNECTIONS_XML, mashup: SECTION_DOCUMENT }),
    );

    expect(source.connections).toEqual([
      {
        name: 'Sales DB',
        kind: 'OLEDB',
        connectionString: 'Provider=SQLOLEDB.1;Initial Catalog=Sales;Data Source=sql01',
        commandText: 'SELECT * FROM dbo.Orders',
        commandType: '2',
        hasDatabaseProperties: true,
      },
      { name: 'Rates', kind: 'Web', hasDatabaseProperties: false },
    ]);
    expect(source.queries.map((q) => q.name)).toEqual(['Orders', 'Exchange Rates']);
    expect(source.queries[0]?.formula).toBe(
      [
        'let',
        '    Source = Sql.Database("sql01", "Sales"),',
        '    dbo_Orders = Source{[Schema="dbo",Item="Orders"]}[Data]',
        'in',
        '    dbo_Orders',
      ].join('\n'),
    );
  });

  it('yields no records for a workbook without connections or queries', () => {
    expect(readWorkbookBuffer(buildWorkbook())).toEqual({ connections: [], queries: [] });
  });

  it('leaves queries empty when the mashup payload is damaged', () => {
    const data = buildZip({
      'xl/connections.xml': CONNECTIONS_XML,
      'customXml/item1.xml':
        '<?xml version="1.0"?><DataMashup xmlns="http://schemas.microsoft.com/DataMashup">bm90IGEgemlw</DataMashup>',
    });
    const source = readWorkbookBuffer(data);
    expect(source.queries).toEqual([]);
    expect(source.connections).toHaveLength(2);
  });

  it('rejects a file that is not a zip package', async () => {
    expect(await failureKind(async () => readWorkbookBuffer(Buffer.from('plain text')))).toBe(
      'CorruptArchive',
    );
  });

  it('rejects a malformed connections part', async () => {
    const data = buildWorkbook({ connections: '<connections><connection name="x">' });
    expect(await failureKind(async () => readWorkbookBuffer(data))).toBe('MalformedMetadata');
  });
});

describe('readWorkbookPackage', () => {
  let dir: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('reads a workbook from disk', async () => {
    const path = join(dir.path, 'book.xlsx');
    writeFileSync(path, buildWorkbook({ connections: CONNECTIONS_XML }));
    const source = await readWorkbookPackage(path);
    expect(source.connections.map((c) => c.name)).toEqual(['Sales DB', 'Rates']);
  });

  it('reports a missing file as unreadable', async () => {
    expect(await failureKind(() => readWorkbookPackage(join(dir.path, 'missing.xlsx')))).toBe(
      'Unreadable',
    );
  });
});
