import chalk from "chalk";
import type { LogLevel } from "../types.js";

export interface Logger {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Prefix for every line, e.g. the server name */
  name?: string;
  /** Sink for formatted lines; defaults to console.error */
  write?: (line: string) => void;
}

/**
 * Logger writing to stderr. stdout is left alone because the stdio tool
 * transport owns it.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level = "info", name = "netpol-lens" } = options;
  const write = options.write ?? ((line: string) => console.error(line));
  const threshold = LEVEL_ORDER[level];

  const emit = (lineLevel: Exclude<LogLevel, "silent">, tag: string, args: unknown[]) => {
    if (LEVEL_ORDER[lineLevel] < threshold) return;
    write(`${chalk.gray(`[${name}]`)} ${tag} ${args.map(formatArg).join(" ")}`);
  };

  return {
    debug: (...args) => emit("debug", chalk.gray("debug"), args),
    info: (...args) => emit("info", chalk.blue("info"), args),
    warn: (...args) => emit("warn", chalk.yellow("warn"), args),
    error: (...args) => emit("error", chalk.red("error"), args),
  };
}

/** Logger that drops everything; the default for library use. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}
