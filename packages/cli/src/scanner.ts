import { fork, type ChildProcess } from "node:child_process";
import { createRequire } from "node:module";
import { basename, dirname, relative, sep } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import fg from "fast-glob";
import {
  analyzeDocument,
  emptyInventory,
  ExtractionError,
  mergeDocument,
  readLiveWorkbook,
  toErrorEntry,
  type ClassifierPolicy,
  type DocumentScan,
  type ErrorEntry,
  type FailureKind,
  type Inventory,
  type WorkbookSource,
} from "@conninv/core";
import type { Logger } from "./logger";
import { DocumentScanSchema, type DocumentJob } from "./protocol";

export type DocumentReader = (path: string) => Promise<WorkbookSource>;

/** Something that can open a workbook as a live automation object. */
export interface LiveWorkbookHost {
  open(path: string): Promise<unknown>;
  close(workbook: unknown): Promise<void>;
}

/**
 * Reader for live mode. Without a host every document fails with
 * `MissingDependency`.
 */
export function createLiveReader(host?: LiveWorkbookHost): DocumentReader {
  return async (path) => {
    if (!host) {
      throw new ExtractionError(
        "MissingDependency",
        "live mode needs a spreadsheet automation host and none is available",
      );
    }
    const workbook = await host.open(path);
    try {
      return readLiveWorkbook(workbook);
    } finally {
      await host.close(workbook);
    }
  };
}

export async function findWorkbooks(
  root: string,
  extensions: readonly string[],
): Promise<string[]> {
  const patterns = extensions.map((ext) => `**/*.${ext}`);
  const files = await fg(patterns, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
    // lock files left behind by an open workbook
    ignore: ["**/~$*"],
  });
  return files.sort();
}

export function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ExtractionError("Timeout", `${label} took longer than ${ms} ms`)),
      ms,
    );
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Run `task` over every item with at most `limit` in flight. Results keep the
 * order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index]);
    }
  };
  const width = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: width }, worker));
  return results;
}

export interface ScanContext {
  root: string;
  policy: ClassifierPolicy;
  timeoutMs: number;
  /** In-process reader; without one each document is scanned in a child process. */
  read?: DocumentReader;
  /** Entry module of the child process. */
  workerModule?: URL;
}

function toPortable(path: string): string {
  return path.split(sep).join("/");
}

function locate(root: string, path: string) {
  return {
    folder: toPortable(relative(root, dirname(path))) || ".",
    file: basename(path),
    id: toPortable(relative(root, path)),
  };
}

function failedScan(root: string, path: string, err: unknown): DocumentScan {
  const { folder, file, id } = locate(root, path);
  return { folder, file, connections: [], queries: [], error: toErrorEntry(id, err) };
}

/**
 * Read and analyze one document in this process. Never throws: a failure
 * becomes the scan's `error` with no records.
 */
export async function scanDocument(
  path: string,
  ctx: ScanContext & { read: DocumentReader },
): Promise<DocumentScan> {
  const { folder, file } = locate(ctx.root, path);
  try {
    const source = await withTimeout(ctx.read(path), ctx.timeoutMs, file);
    return analyzeDocument({ folder, file }, source, ctx.policy);
  } catch (err) {
    return failedScan(ctx.root, path, err);
  }
}

const DOCUMENT_WORKER = new URL("./documentWorker.ts", import.meta.url);

// The child runs TypeScript sources, so it loads through the tsx loader.
function tsxLoader(): string {
  return pathToFileURL(createRequire(import.meta.url).resolve("tsx")).href;
}

/**
 * Read and analyze one document in a child process, killed when it outlives
 * `timeoutMs`. Never throws.
 */
export function scanDocumentInChild(path: string, ctx: ScanContext): Promise<DocumentScan> {
  const { file } = locate(ctx.root, path);
  const job: DocumentJob = {
    path,
    root: ctx.root,
    timeoutMs: ctx.timeoutMs,
    structuredCommandTypes: [...ctx.policy.structuredCommandTypes],
    sqlProviderMarkers: [...ctx.policy.sqlProviderMarkers],
  };

  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = fork(fileURLToPath(ctx.workerModule ?? DOCUMENT_WORKER), [], {
        execArgv: ["--import", tsxLoader()],
        stdio: ["ignore", "inherit", "inherit", "ipc"],
      });
    } catch (err) {
      resolve(failedScan(ctx.root, path, err));
      return;
    }

    let settled = false;
    const finish = (scan: DocumentScan): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
      resolve(scan);
    };
    const fail = (kind: FailureKind, message: string): void =>
      finish(failedScan(ctx.root, path, new ExtractionError(kind, message)));

    const timer = setTimeout(
      () => fail("Timeout", `${file} took longer than ${ctx.timeoutMs} ms`),
      ctx.timeoutMs,
    );
    child.on("message", (message: unknown) => {
      const reply = DocumentScanSchema.safeParse(message);
      if (reply.success) finish(reply.data);
      else fail("Unreadable", "document worker sent an unexpected reply");
    });
    child.on("error", (err) => finish(failedScan(ctx.root, path, err)));
    // after "message": the IPC channel is closed by then
    child.on("close", (code, signal) =>
      fail("Unreadable", `document worker exited (${signal ?? code ?? "unknown"}) before replying`),
    );
    child.send(job);
  });
}

export interface ScanResult {
  scans: DocumentScan[];
  inventory: Inventory;
  errors: ErrorEntry[];
}

function describeScan(scan: DocumentScan): string {
  const queries = scan.queries.length;
  return `${scan.file}: ${scan.connections.length} connection(s), ${queries} quer${queries === 1 ? "y" : "ies"}`;
}

/**
 * Scan every file through a bounded pool, folding each result into the
 * inventory as it completes.
 */
export async function scanDocuments(
  files: readonly string[],
  ctx: ScanContext & { concurrency: number; logger: Logger },
): Promise<ScanResult> {
  const { read, logger } = ctx;
  const scanOne = (path: string): Promise<DocumentScan> =>
    read ? scanDocument(path, { ...ctx, read }) : scanDocumentInChild(path, ctx);

  let inventory = emptyInventory();
  let done = 0;
  const scans = await mapWithConcurrency(files, ctx.concurrency, async (path) => {
    const scan = await scanOne(path);
    inventory = mergeDocument(inventory, scan);
    done++;
    const { error } = scan;
    if (error) logger.warn(`${error.file}: ${error.kind}${error.message ? ` (${error.message})` : ""}`);
    else logger.debug(describeScan(scan));
    logger.info(`[${done}/${files.length}] ${scan.folder}/${scan.file}`);
    return scan;
  });
  const errors = scans.flatMap((s) => (s.error ? [s.error] : []));
  return { scans, inventory, errors };
}
