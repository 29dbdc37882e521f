import { appendFileSync, mkdirSync } from "node:fs";
import { resolve } from "node:path";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingOptions {
  level: LogLevel;
  /** Directory for per-component log files; null keeps logs on the console */
  dir: string | null;
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const wanted = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? null;
}

// Until an entry point has loaded its config, only the real environment counts
let settings: LoggingOptions = {
  level: parseLogLevel(process.env.RP_LOG_LEVEL) ?? "info",
  dir: process.env.RP_LOG_DIR || null,
};

/** Apply the logging section of the loaded config to every logger */
export function configureLogging(options: LoggingOptions): void {
  settings = { ...options };
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(settings.level);
}

function formatLine(
  level: LogLevel,
  component: string,
  message: string,
  data?: Record<string, unknown>
): string {
  const head = `${new Date().toISOString()} [${level.toUpperCase().padEnd(5)}] [${component}] ${message}`;
  return data && Object.keys(data).length > 0 ? `${head} ${JSON.stringify(data)}` : head;
}

function appendToFile(component: string, line: string): void {
  const { dir } = settings;
  if (!dir) return;
  try {
    mkdirSync(dir, { recursive: true });
    appendFileSync(resolve(dir, `${component}.log`), line + "\n");
  } catch (err) {
    console.error(`Could not write log file in ${dir}: ${String(err)}`);
  }
}

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export type Logger = Record<LogLevel, (message: string, data?: Record<string, unknown>) => void>;

export function createLogger(component: string): Logger {
  const emit = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    if (!enabled(level)) return;
    const line = formatLine(level, component, message, data);
    SINKS[level](line);
    appendToFile(component, line);
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
