export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: LogLevel, message: string, error?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const line = `${new Date().toISOString()} [${level}] ${message}`;
  const sink =
    level === "error"
      ? console.error
      : level === "warn"
        ? console.warn
        : console.log;

  if (error === undefined) {
    sink(line);
  } else {
    sink(line, error);
  }
}

export function logDebug(message: string): void {
  write("debug", message);
}

export function logInfo(message: string): void {
  write("info", message);
}

export function logWarn(message: string): void {
  write("warn", message);
}

export function logError(message: string, error?: unknown): void {
  write("error", message, error);
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
