/**
 * Structured Logging System
 *
 * Every component takes a Logger and derives a child carrying its
 * `component` name. The transport layer (outside this package) can plug
 * pino, winston or anything else in by implementing Logger.
 */

// =============================================================================
// LOG LEVELS
// =============================================================================

/**
 * Log levels in order of severity. `silent` disables output entirely.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Levels a log entry can carry. */
export type EntryLevel = Exclude<LogLevel, "silent">;

/**
 * Log level severity values (higher = more severe).
 */
export const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

// =============================================================================
// LOG ENTRY
// =============================================================================

export interface LogEntry {
  level: EntryLevel;
  message: string;
  /** Epoch ms */
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

// =============================================================================
// LOGGER INTERFACE
// =============================================================================

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  fatal(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an error with context.
   */
  logError(message: string, error: Error, context?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context.
   */
  child(context: Record<string, unknown>): Logger;

  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;
  isLevelEnabled(level: EntryLevel): boolean;
}

// =============================================================================
// BASE LOGGER
// =============================================================================

/**
 * BaseLogger - level filtering and context merging.
 * Subclasses implement `log` and `child`.
 */
export abstract class BaseLogger implements Logger {
  protected level: LogLevel;
  protected baseContext: Record<string, unknown>;

  constructor(level: LogLevel = "info", baseContext: Record<string, unknown> = {}) {
    this.level = level;
    this.baseContext = baseContext;
  }

  abstract log(entry: LogEntry): void;

  abstract child(context: Record<string, unknown>): Logger;

  trace(message: string, context?: Record<string, unknown>): void {
    this.write("trace", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write("error", message, context);
  }

  fatal(message: string, context?: Record<string, unknown>): void {
    this.write("fatal", message, context);
  }

  logError(message: string, error: Error, context?: Record<string, unknown>): void {
    this.write("error", message, context, error);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: EntryLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  protected mergeContext(context?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!context) {
      return Object.keys(this.baseContext).length > 0 ? { ...this.baseContext } : undefined;
    }
    if (Object.keys(this.baseContext).length === 0) {
      return context;
    }
    return { ...this.baseContext, ...context };
  }

  private write(
    level: EntryLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context: this.mergeContext(context),
    };
    if (error) {
      entry.error = error;
    }
    this.log(entry);
  }
}

// =============================================================================
// BUILT-IN LOGGERS
// =============================================================================

/**
 * NoOpLogger - Discards all log messages.
 */
export class NoOpLogger extends BaseLogger {
  constructor() {
    super("silent");
  }

  log(_entry: LogEntry): void {
    // Discard
  }

  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

/**
 * ConsoleLogger - Logs to console as text or JSON lines.
 * A `component` key in the context becomes the `[component]` prefix.
 */
export class ConsoleLogger extends BaseLogger {
  private json: boolean;

  constructor(
    options: {
      level?: LogLevel;
      json?: boolean;
      baseContext?: Record<string, unknown>;
    } = {}
  ) {
    super(options.level ?? "info", options.baseContext ?? {});
    this.json = options.json ?? false;
  }

  log(entry: LogEntry): void {
    if (this.json) {
      this.logJson(entry);
    } else {
      this.logText(entry);
    }
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      json: this.json,
      baseContext: { ...this.baseContext, ...context },
    });
  }

  private logText(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const { component, ...rest } = entry.context ?? {};
    const prefix = typeof component === "string" ? `[${component}] ` : "";
    const contextStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";

    let message = `${timestamp} ${level} ${prefix}${entry.message}${contextStr}`;

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        message += `\n  ${entry.error.stack}`;
      }
    }

    switch (entry.level) {
      case "trace":
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.info(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
      case "fatal":
        console.error(message);
        break;
    }
  }

  private logJson(entry: LogEntry): void {
    const output: Record<string, unknown> = {
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
    };

    if (entry.context) {
      Object.assign(output, entry.context);
    }

    if (entry.error) {
      output.error = {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      };
    }

    console.log(JSON.stringify(output));
  }
}

/**
 * MemoryLogger - Keeps entries in memory. Children share the parent's buffer.
 */
export class MemoryLogger extends BaseLogger {
  readonly entries: LogEntry[];

  constructor(
    options: {
      level?: LogLevel;
      baseContext?: Record<string, unknown>;
      entries?: LogEntry[];
    } = {}
  ) {
    super(options.level ?? "trace", options.baseContext ?? {});
    this.entries = options.entries ?? [];
  }

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  child(context: Record<string, unknown>): Logger {
    return new MemoryLogger({
      level: this.level,
      baseContext: { ...this.baseContext, ...context },
      entries: this.entries,
    });
  }

  /** Entries at the given level. */
  at(level: EntryLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
