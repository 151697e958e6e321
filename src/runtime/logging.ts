import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): Promise<void>;
}

type ConsoleLevel = "log" | "debug" | "info" | "warn" | "error";

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Mirrors console output into `logFile` until `shutdown` is called. Without a
 * log file this is a no-op.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: async () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const original = {
    log: console.log.bind(console),
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.on("error", (err) => {
    original.error(`Log file ${resolvedLog} is no longer writable:`, err);
  });
  stream.write(`[${new Date().toISOString()}] --- tool session started ---\n`);

  const mirror =
    (level: ConsoleLevel) =>
    (...args: unknown[]) => {
      original[level](...args);
      const message = args.map(formatArg).join(" ");
      stream.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}\n`);
    };

  console.log = mirror("log");
  console.debug = mirror("debug");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  const shutdown = () =>
    new Promise<void>((resolve) => {
      console.log = original.log;
      console.debug = original.debug;
      console.info = original.info;
      console.warn = original.warn;
      console.error = original.error;
      stream.end(`[${new Date().toISOString()}] --- tool session ended ---\n`, () => resolve());
    });

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
