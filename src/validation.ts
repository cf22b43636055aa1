/**
 * Parameter validation for command handlers and configuration.
 *
 * Handler constructors read their inputs through these helpers so that a
 * malformed request fails before a handler exists.
 */

import { HandlerConstructionFailedError } from "./errors.js";
import type { BodyParameters, LocatorParameters } from "./types.js";

export interface ValidationError {
  field: string;
  message: string;
}

const MAX_LOCATOR_VALUE_LENGTH = 1024;

function hasControlCharacters(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code <= 31 || code === 127) return true;
  }
  return false;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// LOCATOR PARAMETERS
// =============================================================================

/**
 * Read a required locator parameter (non-empty, no control characters).
 */
export function requireLocatorParameter(locator: LocatorParameters, name: string): string {
  const value = Object.prototype.hasOwnProperty.call(locator, name) ? locator[name] : undefined;
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new HandlerConstructionFailedError(name, "Required non-empty string");
  }
  if (value.length > MAX_LOCATOR_VALUE_LENGTH) {
    throw new HandlerConstructionFailedError(name, `Too long (max ${MAX_LOCATOR_VALUE_LENGTH} chars)`);
  }
  if (hasControlCharacters(value)) {
    throw new HandlerConstructionFailedError(name, "Must not contain control characters");
  }
  return value;
}

// =============================================================================
// BODY PARAMETERS
// =============================================================================

function readBodyParameter(body: BodyParameters, name: string): unknown {
  return Object.prototype.hasOwnProperty.call(body, name) ? body[name] : undefined;
}

export function requireIntegerParameter(body: BodyParameters, name: string): number {
  const value = readBodyParameter(body, name);
  if (value === undefined || value === null) {
    throw new HandlerConstructionFailedError(name, "Required integer");
  }
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new HandlerConstructionFailedError(name, "Must be an integer");
  }
  return value;
}

export function optionalIntegerParameter(body: BodyParameters, name: string): number | undefined {
  const value = readBodyParameter(body, name);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new HandlerConstructionFailedError(name, "Must be an integer if provided");
  }
  return value;
}

export function optionalStringParameter(body: BodyParameters, name: string): string | undefined {
  const value = readBodyParameter(body, name);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || value.length === 0) {
    throw new HandlerConstructionFailedError(name, "Must be a non-empty string if provided");
  }
  return value;
}

export function requireObjectParameter(body: BodyParameters, name: string): Record<string, unknown> {
  const value = readBodyParameter(body, name);
  if (!isPlainObject(value)) {
    throw new HandlerConstructionFailedError(name, "Required object");
  }
  return value;
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Format validation errors as a human-readable string.
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `${e.field}: ${e.message}`).join("; ");
}
