/**
 * Structured Logging System - Public API
 *
 * @example
 * ```typescript
 * import { ConsoleLogger } from "./logger-index.js";
 *
 * const logger = new ConsoleLogger({ level: "debug" });
 * logger.child({ component: "session-store" }).info("Session created", { sessionId });
 * ```
 */

export type { LogLevel, EntryLevel, LogEntry, Logger } from "./logger-types.js";

export { LOG_LEVEL_VALUES, isLogLevel } from "./logger-types.js";

export { BaseLogger, NoOpLogger, ConsoleLogger, MemoryLogger } from "./logger-types.js";
