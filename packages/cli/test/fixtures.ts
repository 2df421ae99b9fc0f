/* packages/cli/test/fixtures.ts */
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import CFB from 'cfb';
import type { Logger } from '../src/logger';

export function buildZip(files: Record<string, string | Buffer>): Buffer {
  const container = CFB.utils.cfb_new();
  for (const [path, content] of Object.entries(files)) {
    CFB.utils.cfb_add(
      container,
      `/${path}`,
      typeof content === 'string' ? Buffer.from(content, 'utf8') : content,
    );
  }
  const out: unknown = CFB.write(container, { type: 'buffer', fileType: 'zip' });
  if (!Buffer.isBuffer(out)) throw new Error('zip writer returned no buffer');
  return out;
}

export const SECTION_DOCUMENT = [
  'section Section1;',
  '',
  'shared Orders = let',
  '    Source = Sql.Database("sql01", "Sales"),',
  '    dbo_Orders = Source{[Schema="dbo",Item="Orders"]}[Data]',
  'in',
  '    dbo_Orders;',
  '',
  'shared #"Exchange Rates" = let',
  '    Source = Web.Contents("https://example.com/rates")',
  'in',
  '    Source;',
  '',
].join('\n');

/** customXml item carrying a mashup payload, UTF-16LE with a byte-order mark. */
export function buildMashupItem(section: string): Buffer {
  const inner = buildZip({ 'Formulas/Section1.m': section });
  const header = Buffer.alloc(8);
  header.writeUInt32LE(0, 0);
  header.writeUInt32LE(inner.length, 4);
  // trailing permissions and metadata blocks are not read
  const payload = Buffer.concat([header, inner, Buffer.alloc(4)]);
  const xml = `<?xml version="1.0" encoding="utf-16"?><DataMashup xmlns="http://schemas.microsoft.com/DataMashup">${payload.toString('base64')}</DataMashup>`;
  return Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(xml, 'utf16le')]);
}

export const CONNECTIONS_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<connections xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">
  <connection id="1" name="Sales DB" type="5" refreshedVersion="6">
    <dbPr connection="Provider=SQLOLEDB.1;Initial Catalog=Sales;Data Source=sql01" command="SELECT * FROM dbo.Orders" commandType="2"/>
  </connection>
  <connection id="2" name="Rates" type="4">
    <webPr url="https://example.com/rates"/>
  </connection>
</connections>`;

export function buildWorkbook(options: { connections?: string; mashup?: string } = {}): Buffer {
  const files: Record<string, string | Buffer> = {
    '[Content_Types].xml': '<?xml version="1.0"?><Types/>',
    'xl/workbook.xml': '<?xml version="1.0"?><workbook/>',
  };
  if (options.connections !== undefined) files['xl/connections.xml'] = options.connections;
  if (options.mashup !== undefined) files['customXml/item1.xml'] = buildMashupItem(options.mashup);
  return buildZip(files);
}

export function makeTempDir(): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), 'conninv-'));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    debug: (m) => lines.push(`debug ${m}`),
    info: (m) => lines.push(`info ${m}`),
    warn: (m) => lines.push(`warn ${m}`),
    error: (m) => lines.push(`error ${m}`),
  };
}
