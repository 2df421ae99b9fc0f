/* packages/cli/test/scanner.spec.ts */
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_CLASSIFIER_POLICY,
  ExtractionError,
  summarizeInventory,
  type WorkbookSource,
} from '@conninv/core';
import {
  createLiveReader,
  findWorkbooks,
  mapWithConcurrency,
  scanDocument,
  scanDocumentInChild,
  scanDocuments,
  withTimeout,
  type DocumentReader,
  type ScanContext,
} from '../src/scanner';
import { buildWorkbook, CONNECTIONS_XML, makeTempDir, recordingLogger } from './fixtures';

const ROOT = '/data/books';

const SALES: WorkbookSource = {
  connections: [
    {
      name: 'Sales DB',
      kind: 'OLEDB',
      connectionString: 'Provider=SQLOLEDB.1;Initial Catalog=Sales;Data Source=sql01',
      commandText: 'SELECT * FROM dbo.Orders',
      commandType: '2',
      hasDatabaseProperties: true,
    },
  ],
  queries: [],
};

function context(read: DocumentReader, timeoutMs = 1000): ScanContext & { read: DocumentReader } {
  return { root: ROOT, policy: DEFAULT_CLASSIFIER_POLICY, timeoutMs, read };
}

describe('mapWithConcurrency', () => {
  it('keeps order and never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([5, 1, 3, 2, 4], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, n));
      inFlight--;
      return n * 10;
    });
    expect(results).toEqual([50, 10, 30, 20, 40]);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async (n: number) => n)).toEqual([]);
  });
});

describe('withTimeout', () => {
  it('passes through a result that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'fast.xlsx')).resolves.toBe('ok');
  });

  it('rejects with a Timeout error when the work takes too long', async () => {
    const never = new Promise<string>(() => undefined);
    const err: unknown = await withTimeout(never, 10, 'slow.xlsx').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExtractionError);
    expect(err instanceof ExtractionError && err.kind).toBe('Timeout');
    expect(err instanceof Error && err.message).toBe('slow.xlsx took longer than 10 ms');
  });
});

describe('scanDocument', () => {
  it('analyzes what the reader returns', async () => {
    const scan = await scanDocument(`${ROOT}/finance/q1.xlsx`, context(async () => SALES));
    expect(scan.folder).toBe('finance');
    expect(scan.file).toBe('q1.xlsx');
    expect(scan.error).toBeUndefined();
    expect(scan.connections[0]).toMatchObject({
      name: 'Sales DB',
      database: 'Sales',
      table: 'dbo.Orders',
      isSql: 'yes',
    });
  });

  it('uses "." for documents at the root', async () => {
    const scan = await scanDocument(`${ROOT}/top.xlsx`, context(async () => SALES));
    expect(scan.folder).toBe('.');
  });

  it('turns a reader failure into an error entry', async () => {
    const read: DocumentReader = async () => {
      throw new ExtractionError('CorruptArchive', 'bad zip');
    };
    const scan = await scanDocument(`${ROOT}/finance/broken.xlsx`, context(read));
    expect(scan.connections).toEqual([]);
    expect(scan.queries).toEqual([]);
    expect(scan.error).toEqual({
      file: 'finance/broken.xlsx',
      kind: 'CorruptArchive',
      message: 'bad zip',
    });
  });

  it('reports a document that hangs as timed out', async () => {
    const read: DocumentReader = () => new Promise<WorkbookSource>(() => undefined);
    const scan = await scanDocument(`${ROOT}/hang.xlsx`, context(read, 10));
    expect(scan.error?.kind).toBe('Timeout');
  });
});

describe('scanDocuments', () => {
  it('folds successful documents and collects failures', async () => {
    const read: DocumentReader = async (path) => {
      if (path.endsWith('bad.xlsx')) throw new Error('boom');
      return SALES;
    };
    const files = [`${ROOT}/a.xlsx`, `${ROOT}/bad.xlsx`, `${ROOT}/sub/b.xlsx`];
    const logger = recordingLogger();
    const result = await scanDocuments(files, { ...context(read), concurrency: 2, logger });

    expect(result.scans.map((s) => s.file)).toEqual(['a.xlsx', 'bad.xlsx', 'b.xlsx']);
    expect(result.errors).toEqual([{ file: 'bad.xlsx', kind: 'Unreadable', message: 'boom' }]);

    const summary = summarizeInventory(result.inventory);
    expect(summary.servers).toEqual(['sql01']);
    expect(summary.databases).toEqual(['Sales']);
    expect(summary.connectionMappings.map((m) => m.file)).toEqual(['a.xlsx', 'b.xlsx']);
    expect(logger.lines.filter((l) => l.startsWith('warn'))).toEqual(['warn bad.xlsx: Unreadable (boom)']);
  });
});

describe('createLiveReader', () => {
  it('fails with MissingDependency when there is no host', async () => {
    const err: unknown = await createLiveReader()('/x.xlsx').catch((e: unknown) => e);
    expect(err instanceof ExtractionError && err.kind).toBe('MissingDependency');
  });

  it('reads the live object graph and closes the workbook', async () => {
    const workbook = {
      Connections: [
        {
          Name: 'Ops',
          OLEDBConnection: {
            Connection: 'OLEDB;Provider=SQLOLEDB;Data Source=sql03;Initial Catalog=Ops',
            CommandText: ['SELECT * FROM dbo.Jobs'],
            CommandType: 2,
          },
        },
      ],
      Queries: [{ Name: 'Jobs', Formula: 'let Source = Sql.Database("sql03", "Ops") in Source' }],
    };
    const host = { open: vi.fn(async () => workbook), close: vi.fn(async () => undefined) };

    const source = await createLiveReader(host)('/ops.xlsx');

    expect(host.open).toHaveBeenCalledWith('/ops.xlsx');
    expect(host.close).toHaveBeenCalledWith(workbook);
    expect(source.connections).toEqual([
      {
        name: 'Ops',
        kind: 'OLEDB',
        connectionString: 'OLEDB;Provider=SQLOLEDB;Data Source=sql03;Initial Catalog=Ops',
        commandText: 'SELECT * FROM dbo.Jobs',
        commandType: '2',
        hasDatabaseProperties: true,
      },
    ]);
    expect(source.queries).toEqual([
      { name: 'Jobs', formula: 'let Source = Sql.Database("sql03", "Ops") in Source' },
    ]);
  });
});

describe('findWorkbooks', () => {
  let dir: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    dir = makeTempDir();
    mkdirSync(join(dir.path, 'sub'));
    for (const name of ['a.xlsx', 'sub/b.XLSM', '~$a.xlsx', 'notes.txt', 'old.xls']) {
      writeFileSync(join(dir.path, name), 'x');
    }
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('finds workbooks recursively and skips lock files', async () => {
    const files = await findWorkbooks(dir.path, ['xlsx', 'xlsm']);
    expect(files).toEqual([join(dir.path, 'a.xlsx'), join(dir.path, 'sub/b.XLSM')]);
  });
});

describe('scanDocumentInChild', () => {
  let dir: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('reads and analyzes a packaged workbook', async () => {
    const path = join(dir.path, 'q1.xlsx');
    writeFileSync(path, buildWorkbook({ connections: CONNECTIONS_XML }));
    const scan = await scanDocumentInChild(path, {
      root: dir.path,
      policy: DEFAULT_CLASSIFIER_POLICY,
      timeoutMs: 15000,
    });
    expect(scan.error).toBeUndefined();
    expect(scan.folder).toBe('.');
    expect(scan.connections.map((c) => [c.name, c.database ?? '', c.isSql])).toEqual([
      ['Sales DB', 'Sales', 'yes'],
      ['Rates', '', 'no'],
    ]);
  });

  it('reports a failure raised inside the child', async () => {
    const path = join(dir.path, 'plain.xlsx');
    writeFileSync(path, 'not a workbook');
    const scan = await scanDocumentInChild(path, {
      root: dir.path,
      policy: DEFAULT_CLASSIFIER_POLICY,
      timeoutMs: 15000,
    });
    expect(scan.connections).toEqual([]);
    expect(scan.error?.kind).toBe('CorruptArchive');
  });

  it('kills a document whose parse never finishes', async () => {
    const started = Date.now();
    const scan = await scanDocumentInChild(join(dir.path, 'stuck.xlsx'), {
      root: dir.path,
      policy: DEFAULT_CLASSIFIER_POLICY,
      timeoutMs: 1500,
      workerModule: new URL('./stallingWorker.ts', import.meta.url),
    });
    expect(scan.error).toEqual({
      file: 'stuck.xlsx',
      kind: 'Timeout',
      message: 'stuck.xlsx took longer than 1500 ms',
    });
    expect(Date.now() - started).toBeLessThan(6000);
  });
});
