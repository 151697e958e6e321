import type { LoggerPort, LogLevel } from "../../ports/sys/LoggerPort";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "warning") return "warn";
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  const payload = meta && Object.keys(meta).length ? `${message} ${JSON.stringify(meta)}` : message;
  switch (level) {
    case "debug":
      return console.debug(payload);
    case "info":
      return console.info(payload);
    case "warn":
      return console.warn(payload);
    case "error":
      return console.error(payload);
  }
}

export class ConsoleLogger implements LoggerPort {
  constructor(
    private readonly minLevel: LogLevel = "warn",
    private readonly prefix?: string
  ) {}

  child(prefix: string): ConsoleLogger {
    return new ConsoleLogger(this.minLevel, this.prefix ? `${this.prefix} ${prefix}` : prefix);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    log(level, this.prefix ? `${this.prefix} ${message}` : message, meta);
  }
}
