/* eslint-disable no-console */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Line-oriented console logger: `<iso time> | LEVEL | message`.
 * Warnings and errors go to stderr.
 */
export function createLogger(
  options: { verbose?: boolean; sink?: LogSink; now?: () => Date } = {},
): Logger {
  const sink: LogSink = options.sink ?? console;
  const now = options.now ?? (() => new Date());
  const threshold = options.verbose ? LEVEL_ORDER.debug : LEVEL_ORDER.info;

  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `${now().toISOString()} | ${level.toUpperCase()} | ${message}`;
    if (LEVEL_ORDER[level] >= LEVEL_ORDER.warn) sink.error(line);
    else sink.log(line);
  };

  return {
    debug: (m) => write("debug", m),
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m) => write("error", m),
  };
}
