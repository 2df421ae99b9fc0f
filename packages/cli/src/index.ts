#!/usr/bin/env node

import { Command } from "commander";
import { z } from "zod";
import { loadConfig, resolveScanConfig, ScanOptionsSchema } from "./config";
import { createLogger } from "./logger";
import { classifyCommand, runScan } from "./run";

const ClassifyOptionsSchema = z.object({
  connection: z.string().optional(),
  commandType: z.string().optional(),
});

const program = new Command();

program
  .name("conninv")
  .description("Inventory the data connections and queries embedded in spreadsheet workbooks")
  .version("0.1.0");

program
  .command("scan")
  .description("Walk a directory of workbooks and write connection reports")
  .option("--input <dir>", "Directory to scan (default: current directory)")
  .option("--output <file>", "Report path (default: ./connections_report.xlsx)")
  .option("--format <format>", "Report format: xlsx, csv or json")
  .option("--html", "Also write an index.html overview beside the report")
  .option("--concurrency <n>", "Documents processed at once (default: 4)")
  .option("--timeout <ms>", "Per-document time limit in milliseconds (default: 30000)")
  .option("--locale <locale>", "Label language of the SQL flag: en or it")
  .option("--command-types <codes>", "Comma-separated command types treated as structured")
  .option("--config <path>", "Path to JSON config file (default: ./conninv.config.json)")
  .option("--live", "Read workbooks through a spreadsheet automation host")
  .option("--verbose", "Log per-document details")
  .action(async (rawOpts: unknown) => {
    const parsed = ScanOptionsSchema.safeParse(rawOpts);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      // eslint-disable-next-line no-console
      console.error(`Invalid option ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown"}`);
      process.exitCode = 1;
      return;
    }
    const opts = parsed.data;
    const logger = createLogger({ verbose: opts.verbose });
    const config = resolveScanConfig(opts, loadConfig(logger, opts.config));
    process.exitCode = await runScan(config, logger);
  });

program
  .command("classify")
  .description("Classify one command string and print the result as JSON")
  .argument("<text>", "Command text, e.g. \"SELECT * FROM dbo.Orders\"")
  .option("--connection <string>", "Connection string the command runs against")
  .option("--command-type <code>", "Command type reported by the connection")
  .action((text: string, rawOpts: unknown) => {
    const opts = ClassifyOptionsSchema.parse(rawOpts);
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(classifyCommand(text, opts), null, 2));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
