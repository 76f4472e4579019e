/**
 * Named, leveled logger writing through the console.
 *
 * The client logs sparingly: skipped frames and events at DEBUG/WARN,
 * stream lifecycle at DEBUG. The default level is WARN.
 */

export const LogLevel = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
  SILENT: 100,
} as const satisfies Record<string, number>;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_NAMES: Record<number, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

const LEVEL_COLORS: Record<number, string> = {
  [LogLevel.DEBUG]: "\x1b[36m", // cyan
  [LogLevel.INFO]: "\x1b[32m", // green
  [LogLevel.WARN]: "\x1b[33m", // yellow
  [LogLevel.ERROR]: "\x1b[31m", // red
};

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

let globalLevel: LogLevel = LogLevel.WARN;
let useColors = Boolean(process.stderr.isTTY);
let logTimestamps = true;

export function setGlobalLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLevel;
}

export function setLogColors(enabled: boolean): void {
  useColors = enabled;
}

export function setLogTimestamps(enabled: boolean): void {
  logTimestamps = enabled;
}

/** Parse a level name such as "debug" or "WARN". */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
    case "WARNING":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "SILENT":
    case "NONE":
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

function formatMessage(level: LogLevel, name: string, message: string): string {
  const parts: string[] = [];

  if (logTimestamps) {
    const ts = new Date().toISOString();
    parts.push(useColors ? `${DIM}${ts}${RESET}` : ts);
  }

  const levelName = (LEVEL_NAMES[level] ?? "LOG").padEnd(5);
  parts.push(useColors ? `${LEVEL_COLORS[level] ?? ""}${levelName}${RESET}` : levelName);
  parts.push(`[${name}]`);
  parts.push(message);
  return parts.join(" ");
}

export class Logger {
  readonly name: string;
  private level: LogLevel | undefined;

  constructor(name: string) {
    this.name = name;
  }

  setLevel(level: LogLevel | undefined): void {
    this.level = level;
  }

  getEffectiveLevel(): LogLevel {
    return this.level ?? globalLevel;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.getEffectiveLevel();
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, args);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) return;

    const formatted = formatMessage(level, this.name, message);

    switch (level) {
      case LogLevel.ERROR:
        console.error(formatted, ...args);
        break;
      case LogLevel.WARN:
        console.warn(formatted, ...args);
        break;
      default:
        console.debug(formatted, ...args);
    }
  }
}

const loggerCache = new Map<string, Logger>();

export function createLogger(name: string): Logger {
  let logger = loggerCache.get(name);
  if (!logger) {
    logger = new Logger(name);
    loggerCache.set(name, logger);
  }
  return logger;
}
