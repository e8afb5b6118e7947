import { formatOneLineError, formatOneLineUtf8 } from "./text";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = "descriptor_loaded" | "descriptor_truncated" | "layout_decoded" | "cli_error";

const MAX_LOG_ERROR_MESSAGE_BYTES = 512;

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minLevel: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_RANK, value);
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function log(level: LogLevel, event: LogEvent, fields: Record<string, unknown> = {}): void {
  if (LOG_LEVEL_RANK[level] < LOG_LEVEL_RANK[minLevel]) return;
  const entry = {
    ts: new Date().toISOString(),
    level,
    event,
    ...fields,
  };
  // JSONL structured logging on stderr; stdout carries the layout output.
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(entry));
}

export function formatError(err: unknown): { message: string; name?: string; code?: unknown } {
  if (err instanceof Error) {
    const safeMessage = formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES);
    let rawName = "Error";
    try {
      if (typeof err.name === "string") rawName = err.name;
    } catch {
      // ignore getters throwing
    }
    const safeName = formatOneLineUtf8(rawName, 128) || "Error";
    // `code` is non-standard (NodeJS.ErrnoException) but says why a descriptor file could not be read.
    return { name: safeName, message: safeMessage, code: "code" in err ? err.code : undefined };
  }
  return { message: formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES) };
}
