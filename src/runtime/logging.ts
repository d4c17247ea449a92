import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Restores console and resolves once the log file is flushed. */
  shutdown(): Promise<void>;
}

type ConsoleLevel = "log" | "debug" | "info" | "warn" | "error";

const LEVELS: ConsoleLevel[] = ["log", "debug", "info", "warn", "error"];

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

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.write(`[${new Date().toISOString()}] --- Interval timer session started ---\n`);

  const original = {
    log: console.log,
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  const mirror =
    (level: ConsoleLevel) =>
    (...args: unknown[]) => {
      original[level](...args);
      const timestamp = new Date().toISOString();
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${args.map(stringify).join(" ")}\n`);
    };

  for (const level of LEVELS) {
    console[level] = mirror(level);
  }

  let closing: Promise<void> | null = null;
  const shutdown = () => {
    if (closing) return closing;
    for (const level of LEVELS) {
      console[level] = original[level];
    }
    closing = new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(`[${new Date().toISOString()}] --- Interval timer session ended ---\n`, () => resolve());
    });
    return closing;
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}

export function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.stack ?? value.message;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
