/* eslint-disable no-console */
import { DocumentJobSchema } from "./protocol";
import { readWorkbookPackage } from "./packageReader";
import { scanDocument } from "./scanner";

// Child-process entry: reads and analyzes one packaged workbook, replies with
// its DocumentScan and disconnects. The parent kills it when time runs out.

async function handle(message: unknown): Promise<void> {
  const job = DocumentJobSchema.parse(message);
  const scan = await scanDocument(job.path, {
    root: job.root,
    timeoutMs: job.timeoutMs,
    policy: {
      structuredCommandTypes: new Set(job.structuredCommandTypes),
      sqlProviderMarkers: job.sqlProviderMarkers,
    },
    read: readWorkbookPackage,
  });
  await new Promise<void>((resolve, reject) => {
    if (!process.send) {
      reject(new Error("document worker started without an IPC channel"));
      return;
    }
    process.send(scan, undefined, {}, (err) => (err ? reject(err) : resolve()));
  });
  process.disconnect?.();
}

process.once("message", (message: unknown) => {
  handle(message).catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
    if (process.connected) process.disconnect?.();
  });
});
