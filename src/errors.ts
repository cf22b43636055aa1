/**
 * Error types for the automation core.
 *
 * Request errors (unsupported command, unknown session, bad parameters) are
 * thrown to the immediate caller for translation into a protocol response.
 * Driver registration failures never propagate: they are delivered through
 * the registration result and callback only.
 */

import type { Capabilities } from "./types.js";

// ============================================================================
// BASE
// ============================================================================

export type AutomationErrorCode =
  | "UNSUPPORTED_COMMAND"
  | "SESSION_NOT_FOUND"
  | "SESSION_CREATION_FAILED"
  | "DRIVER_REGISTRATION_FAILED"
  | "HANDLER_CONSTRUCTION_FAILED"
  | "DRIVER_CAPABILITY_MISSING"
  | "CONFIG_ERROR";

/**
 * Base class for every error the core raises itself.
 */
export class AutomationServerError extends Error {
  /** Error code for programmatic handling */
  readonly code: AutomationErrorCode;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: AutomationErrorCode,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AutomationServerError";
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// REQUEST ERRORS
// ============================================================================

/**
 * No handler is registered for the command. Raised when the fallback
 * handler executes, never at dispatch time.
 */
export class UnsupportedCommandError extends AutomationServerError {
  readonly commandId: string;

  constructor(commandId: string) {
    super(`Command '${commandId}' is not supported by this server`, "UNSUPPORTED_COMMAND", {
      commandId,
    });
    this.name = "UnsupportedCommandError";
    this.commandId = commandId;
  }
}

export class SessionNotFoundError extends AutomationServerError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`, "SESSION_NOT_FOUND", { sessionId });
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

/**
 * A required locator or body parameter is missing or malformed.
 * Thrown from handler constructors, before any session is touched.
 */
export class HandlerConstructionFailedError extends AutomationServerError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`Invalid parameter '${parameter}': ${message}`, "HANDLER_CONSTRUCTION_FAILED", {
      parameter,
    });
    this.name = "HandlerConstructionFailedError";
    this.parameter = parameter;
  }
}

/**
 * The session's driver lacks an optional capability the command needs
 * (e.g. pointer control).
 */
export class DriverCapabilityError extends AutomationServerError {
  constructor(sessionId: string, capability: string) {
    super(
      `Driver for session ${sessionId} does not support ${capability}`,
      "DRIVER_CAPABILITY_MISSING",
      { sessionId, capability }
    );
    this.name = "DriverCapabilityError";
  }
}

// ============================================================================
// SESSION / DRIVER ERRORS
// ============================================================================

export class SessionCreationFailedError extends AutomationServerError {
  readonly capabilities: Capabilities;

  constructor(capabilities: Capabilities, reason: string, cause?: unknown) {
    super(`Unable to create session: ${reason}`, "SESSION_CREATION_FAILED", { capabilities }, { cause });
    this.name = "SessionCreationFailedError";
    this.capabilities = capabilities;
  }
}

export class DriverRegistrationFailedError extends AutomationServerError {
  readonly typeDescriptor: string;
  readonly reason: string;

  constructor(typeDescriptor: string, reason: string, cause?: unknown) {
    super(
      `Driver registration failed for '${typeDescriptor}': ${reason}`,
      "DRIVER_REGISTRATION_FAILED",
      { typeDescriptor },
      { cause }
    );
    this.name = "DriverRegistrationFailedError";
    this.typeDescriptor = typeDescriptor;
    this.reason = reason;
  }
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export class ConfigurationError extends AutomationServerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigurationError";
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isAutomationServerError(value: unknown): value is AutomationServerError {
  return value instanceof AutomationServerError;
}

/**
 * Normalize a thrown value to an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
