/**
 * Log levels in order of severity (lowest to highest)
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  category?: string;
  data?: unknown;
}

/**
 * Receives every entry that passes the level filter.
 */
export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  /**
   * Current minimum log level - messages below this level are ignored
   */
  level: LogLevel;

  readonly category?: string;

  isDebugEnabled(): boolean;
  isWarnEnabled(): boolean;

  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Log a message at the specified level
   */
  log(level: LogLevel, message: string, data?: unknown): void;

  /**
   * Create a child logger with a category. The child shares its parent's sink.
   */
  child(category: string): Logger;
}

const COLORS = {
  reset: "\x1b[0m",
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m", // green
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  category: "\x1b[35m", // magenta
  timestamp: "\x1b[90m", // gray
} as const;

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO ",
  [LogLevel.WARN]: "WARN ",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.SILENT]: "",
};

function levelColor(level: LogLevel): string {
  switch (level) {
    case LogLevel.DEBUG:
      return COLORS.debug;
    case LogLevel.INFO:
      return COLORS.info;
    case LogLevel.WARN:
      return COLORS.warn;
    case LogLevel.ERROR:
      return COLORS.error;
    default:
      return COLORS.reset;
  }
}

/**
 * Writes `[timestamp] LEVEL [category] message` to the console method matching the level.
 */
export const consoleSink: LogSink = (entry) => {
  const parts = [
    `${COLORS.timestamp}${new Date(entry.timestamp).toISOString()}${COLORS.reset}`,
    `${levelColor(entry.level)}${LEVEL_NAMES[entry.level]}${COLORS.reset}`,
  ];
  if (entry.category) {
    parts.push(`${COLORS.category}[${entry.category}]${COLORS.reset}`);
  }
  parts.push(entry.message);

  const line = parts.join(" ");
  const extra = entry.data !== undefined ? entry.data : "";
  switch (entry.level) {
    case LogLevel.DEBUG:
      console.debug(line, extra);
      break;
    case LogLevel.INFO:
      console.info(line, extra);
      break;
    case LogLevel.WARN:
      console.warn(line, extra);
      break;
    default:
      console.error(line, extra);
  }
};

class SinkHolder {
  constructor(public sink: LogSink) {}
}

class ConsoleLogger implements Logger {
  public level: LogLevel;

  constructor(
    private readonly holder: SinkHolder,
    public readonly category?: string,
    level: LogLevel = LogLevel.WARN
  ) {
    this.level = level;
  }

  isDebugEnabled(): boolean {
    return this.level <= LogLevel.DEBUG;
  }

  isWarnEnabled(): boolean {
    return this.level <= LogLevel.WARN;
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, message, data);
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (level < this.level || level === LogLevel.SILENT) {
      return;
    }
    this.holder.sink({ level, message, timestamp: Date.now(), category: this.category, data });
  }

  child(category: string): Logger {
    const childCategory = this.category ? `${this.category}:${category}` : category;
    return new ConsoleLogger(this.holder, childCategory, this.level);
  }
}

const rootSink = new SinkHolder(consoleSink);

/**
 * Package-wide logger. Children created from it follow `setLogSink`.
 */
export const logger: Logger = new ConsoleLogger(rootSink, "luahandle");

/**
 * Create a new logger instance writing to the package sink
 */
export function createLogger(category?: string, level?: LogLevel): Logger {
  return new ConsoleLogger(rootSink, category, level);
}

/**
 * Replace the sink used by every logger of this package. Returns the previous sink.
 */
export function setLogSink(sink: LogSink): LogSink {
  const previous = rootSink.sink;
  rootSink.sink = sink;
  return previous;
}
