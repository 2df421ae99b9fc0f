/**
 * Shared utilities for CLI (driver, reports and view).
 */

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `reports/out.xlsx` → `reports/out` */
export function stripExtension(path: string): string {
  return path.replace(/\.[^./\\]+$/, "");
}
