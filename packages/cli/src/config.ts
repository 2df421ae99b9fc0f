import { existsSync, readFileSync } from "node:fs";
import { join, resolve as resolvePath } from "node:path";
import { DEFAULT_CLASSIFIER_POLICY } from "@conninv/core";
import { z } from "zod";
import type { Logger } from "./logger";
import { errorMessage } from "./utils";

export const CONFIG_FILE_NAME = "conninv.config.json";

export const REPORT_FORMATS = ["xlsx", "csv", "json"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];
export type ReportLocale = "en" | "it";

export const ConfigFileSchema = z
  .object({
    input: z.string().optional(),
    output: z.string().optional(),
    format: z.enum(REPORT_FORMATS).optional(),
    html: z.boolean().optional(),
    concurrency: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
    locale: z.enum(["en", "it"]).optional(),
    commandTypes: z.array(z.string()).optional(),
    extensions: z.array(z.string().min(1)).optional(),
    live: z.boolean().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const positiveInt = z.coerce.number().int().positive();

/** Options as commander hands them over; everything arrives as text. */
export const ScanOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  format: z.enum(REPORT_FORMATS).optional(),
  html: z.boolean().optional(),
  concurrency: positiveInt.optional(),
  timeout: positiveInt.optional(),
  locale: z.enum(["en", "it"]).optional(),
  commandTypes: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  live: z.boolean().optional(),
});

export type ScanOptions = z.infer<typeof ScanOptionsSchema>;

export interface ScanConfig {
  input: string;
  output: string;
  format: ReportFormat;
  html: boolean;
  concurrency: number;
  timeoutMs: number;
  locale: ReportLocale;
  commandTypes: string[];
  extensions: string[];
  live: boolean;
  verbose: boolean;
}

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  input: ".",
  output: "connections_report.xlsx",
  format: "xlsx",
  html: false,
  concurrency: 4,
  timeoutMs: 30_000,
  locale: "en",
  commandTypes: [...DEFAULT_CLASSIFIER_POLICY.structuredCommandTypes],
  extensions: ["xlsx", "xlsm"],
  live: false,
  verbose: false,
};

/**
 * Find and read the config file: the explicit path when given, otherwise the
 * first of cwd, its parent and the repo root (two levels up) that has one.
 */
export function loadConfig(logger: Logger, explicitPath?: string, cwd = process.cwd()): ConfigFile {
  if (explicitPath) {
    const path = resolvePath(cwd, explicitPath);
    if (existsSync(path)) {
      return readConfigFile(path, logger);
    }
    logger.warn(`Config file ${path} not found, using defaults.`);
    return {};
  }

  const candidates = [
    join(cwd, CONFIG_FILE_NAME),
    // running from packages/cli
    join(cwd, "..", CONFIG_FILE_NAME),
    join(cwd, "..", "..", CONFIG_FILE_NAME),
  ];
  const found = candidates.find((path) => existsSync(path));
  return found ? readConfigFile(found, logger) : {};
}

export function readConfigFile(path: string, logger: Logger): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    logger.error(`Failed to read config from ${path}, ignoring it: ${errorMessage(err)}`);
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    logger.error(`Invalid config in ${path}${where}, ignoring it: ${issue?.message ?? "unknown"}`);
    return {};
  }
  logger.debug(`Loaded config from ${path}`);
  return parsed.data;
}

function splitCodes(codes: string): string[] {
  return codes
    .split(",")
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/**
 * Command-line options win over the config file, which wins over defaults.
 * Paths are resolved against `cwd`.
 */
export function resolveScanConfig(
  options: ScanOptions,
  file: ConfigFile,
  cwd = process.cwd(),
): ScanConfig {
  const d = DEFAULT_SCAN_CONFIG;
  return {
    input: resolvePath(cwd, options.input ?? file.input ?? d.input),
    output: resolvePath(cwd, options.output ?? file.output ?? d.output),
    format: options.format ?? file.format ?? d.format,
    html: options.html ?? file.html ?? d.html,
    concurrency: options.concurrency ?? file.concurrency ?? d.concurrency,
    timeoutMs: options.timeout ?? file.timeoutMs ?? d.timeoutMs,
    locale: options.locale ?? file.locale ?? d.locale,
    commandTypes:
      options.commandTypes !== undefined
        ? splitCodes(options.commandTypes)
        : (file.commandTypes ?? d.commandTypes),
    extensions: (file.extensions ?? d.extensions).map((e) => e.replace(/^\./, "").toLowerCase()),
    live: options.live ?? file.live ?? d.live,
    verbose: options.verbose ?? d.verbose,
  };
}
