import { statSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import {
  analyzeSql,
  DEFAULT_CLASSIFIER_POLICY,
  describeConnection,
  normalizeCommandText,
  parseConnectionString,
  summarizeInventory,
  type ClassifierPolicy,
  type ConnectionDetails,
  type SqlAnalysis,
} from "@conninv/core";
import type { ScanConfig } from "./config";
import type { Logger } from "./logger";
import {
  buildReportRows,
  writeErrorReport,
  writeJsonReport,
  writeReport,
  writeSummaryReport,
} from "./report";
import { createLiveReader, findWorkbooks, scanDocuments, type LiveWorkbookHost } from "./scanner";
import { errorMessage, stripExtension } from "./utils";
import { generateInventoryHTML } from "./view";

export const EXIT_OK = 0;
export const EXIT_BAD_INPUT = 2;
export const EXIT_WRITE_FAILED = 3;

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function policyFor(commandTypes: readonly string[]): ClassifierPolicy {
  return {
    ...DEFAULT_CLASSIFIER_POLICY,
    structuredCommandTypes: new Set(commandTypes),
  };
}

/**
 * Scan a directory tree and write every report. Returns the process exit code.
 */
export async function runScan(
  config: ScanConfig,
  logger: Logger,
  liveHost?: LiveWorkbookHost,
): Promise<number> {
  if (!isDirectory(config.input)) {
    logger.error(`Input ${config.input} is not a directory.`);
    return EXIT_BAD_INPUT;
  }

  const files = await findWorkbooks(config.input, config.extensions);
  logger.info(`Found ${files.length} workbook(s) under ${config.input}`);
  if (config.live && !liveHost) {
    logger.warn("Live mode has no automation host on this platform; documents will be reported as failures.");
  }

  const { scans, inventory, errors } = await scanDocuments(files, {
    root: config.input,
    policy: policyFor(config.commandTypes),
    timeoutMs: config.timeoutMs,
    concurrency: config.concurrency,
    // packaged workbooks are read in a child process each; live ones in process
    read: config.live ? createLiveReader(liveHost) : undefined,
    logger,
  });

  const summary = summarizeInventory(inventory);
  const rows = buildReportRows(scans, config.locale);
  if (rows.length === 0) logger.warn("No connections or queries found; writing a header-only report.");
  try {
    if (config.format === "json") writeJsonReport({ summary, documents: scans }, config.output);
    else writeReport(rows, config.output, config.format);
  } catch (err) {
    logger.error(`Cannot write report ${config.output}: ${errorMessage(err)}`);
    return EXIT_WRITE_FAILED;
  }
  logger.info(`Report written to ${config.output} (${rows.length} row(s))`);

  const base = stripExtension(config.output);
  try {
    writeSummaryReport(summary, `${base}_summary.xlsx`);
    logger.info(`Summary written to ${base}_summary.xlsx`);
  } catch (err) {
    logger.warn(`Cannot write summary: ${errorMessage(err)}`);
  }

  if (errors.length > 0) {
    try {
      writeErrorReport(errors, `${base}_errors.csv`);
      logger.warn(`${errors.length} document(s) failed, see ${base}_errors.csv`);
    } catch (err) {
      logger.warn(`Cannot write error listing: ${errorMessage(err)}`);
    }
  }

  if (config.html) {
    const htmlPath = join(dirname(config.output), "index.html");
    try {
      writeFileSync(htmlPath, generateInventoryHTML(summary, { documents: files.length, errors }), "utf8");
      logger.info(`HTML overview written to ${htmlPath}`);
    } catch (err) {
      logger.warn(`Cannot write HTML overview: ${errorMessage(err)}`);
    }
  }

  return EXIT_OK;
}

export interface Classification extends SqlAnalysis {
  normalized: string;
  connection?: ConnectionDetails;
}

/** Ad-hoc classification of one command string. */
export function classifyCommand(
  text: string,
  options: { connection?: string; commandType?: string; commandTypes?: readonly string[] } = {},
): Classification {
  const policy = options.commandTypes ? policyFor(options.commandTypes) : DEFAULT_CLASSIFIER_POLICY;
  const analysis = analyzeSql(
    text,
    parseConnectionString(options.connection),
    options.commandType,
    policy,
  );
  return {
    normalized: normalizeCommandText(text),
    ...analysis,
    ...(options.connection ? { connection: describeConnection(options.connection) } : {}),
  };
}
