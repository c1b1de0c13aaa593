import type { LogLevel } from "../types";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const green = "\x1b[32m";
const yellow = "\x1b[33m";
const red = "\x1b[31m";
const gray = "\x1b[90m";
const reset = "\x1b[0m";

const PREFIX: Record<LogLevel, string> = {
  debug: `${gray}[·]${reset}`,
  info: `${green}[+]${reset}`,
  warn: `${yellow}[!]${reset}`,
  error: `${red}[✗]${reset}`,
};

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function createLogger(
  scope: string,
  options: { level?: LogLevel; sink?: LogSink } = {}
): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? consoleSink;

  const write = (messageLevel: LogLevel, message: string) => {
    if (LEVEL_ORDER[messageLevel] < LEVEL_ORDER[level]) return;
    sink(messageLevel, `${gray}${scope}${reset} ${PREFIX[messageLevel]} ${message}`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    child: (childScope) => createLogger(`${scope}/${childScope}`, { level, sink }),
  };
}
