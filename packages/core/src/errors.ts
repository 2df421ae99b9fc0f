import type { ErrorEntry, FailureKind } from "./model";

export class ExtractionError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
    this.kind = kind;
  }
}

export function isExtractionError(err: unknown): err is ExtractionError {
  return err instanceof ExtractionError;
}

/**
 * Convert whatever was thrown while reading one document into its error row.
 * Errors without a known kind are reported as unreadable documents.
 */
export function toErrorEntry(file: string, err: unknown): ErrorEntry {
  if (isExtractionError(err)) {
    return { file, kind: err.kind, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { file, kind: "Unreadable", message };
}

/**
 * Run an accessor that may throw and treat a failure as an absent value.
 */
export function attempt<T>(read: () => T): T | undefined {
  try {
    return read();
  } catch {
    return undefined;
  }
}
