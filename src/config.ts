/**
 * Server configuration from environment variables.
 *
 * AUTOMATION_SERVER_LOG_LEVEL   trace|debug|info|warn|error|fatal|silent (default: info)
 * AUTOMATION_SERVER_LOG_JSON    true|false (default: false)
 * AUTOMATION_SERVER_DRIVER_DIR  directory holding driver modules
 * AUTOMATION_SERVER_DRIVERS     JSON array of { "capabilities": {...}, "type": "TypeName, ModuleName" }
 */

import { ConfigurationError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger-types.js";
import type { Capabilities } from "./types.js";
import { formatValidationErrors, isPlainObject, type ValidationError } from "./validation.js";

export interface DriverConfigEntry {
  capabilities: Capabilities;
  /** "TypeName" or "TypeName, ModuleName" */
  type: string;
}

export interface ServerConfig {
  logLevel: LogLevel;
  logJson: boolean;
  driverLibraryDir?: string;
  drivers: DriverConfigEntry[];
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  logLevel: "info",
  logJson: false,
  drivers: [],
};

function parseDrivers(raw: string, errors: ValidationError[]): DriverConfigEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    errors.push({ field: "AUTOMATION_SERVER_DRIVERS", message: "Must be valid JSON" });
    return [];
  }

  if (!Array.isArray(parsed)) {
    errors.push({ field: "AUTOMATION_SERVER_DRIVERS", message: "Must be a JSON array" });
    return [];
  }

  const drivers: DriverConfigEntry[] = [];
  parsed.forEach((entry: unknown, index) => {
    const field = `AUTOMATION_SERVER_DRIVERS[${index}]`;
    if (!isPlainObject(entry)) {
      errors.push({ field, message: "Must be an object" });
      return;
    }
    const { capabilities, type } = entry;
    if (!isPlainObject(capabilities)) {
      errors.push({ field: `${field}.capabilities`, message: "Required object" });
      return;
    }
    if (typeof type !== "string" || type.trim().length === 0) {
      errors.push({ field: `${field}.type`, message: "Required non-empty string" });
      return;
    }
    drivers.push({ capabilities, type });
  });
  return drivers;
}

/**
 * Read the server configuration. All problems are reported together in one
 * ConfigurationError.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const errors: ValidationError[] = [];
  const config: ServerConfig = { ...DEFAULT_SERVER_CONFIG, drivers: [] };

  const logLevel = env.AUTOMATION_SERVER_LOG_LEVEL;
  if (logLevel !== undefined && logLevel !== "") {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      errors.push({ field: "AUTOMATION_SERVER_LOG_LEVEL", message: `Unknown log level '${logLevel}'` });
    }
  }

  const logJson = env.AUTOMATION_SERVER_LOG_JSON;
  if (logJson !== undefined && logJson !== "") {
    if (logJson === "true" || logJson === "false") {
      config.logJson = logJson === "true";
    } else {
      errors.push({ field: "AUTOMATION_SERVER_LOG_JSON", message: "Must be 'true' or 'false'" });
    }
  }

  const driverDir = env.AUTOMATION_SERVER_DRIVER_DIR;
  if (driverDir !== undefined && driverDir.trim() !== "") {
    config.driverLibraryDir = driverDir;
  }

  const drivers = env.AUTOMATION_SERVER_DRIVERS;
  if (drivers !== undefined && drivers.trim() !== "") {
    config.drivers = parseDrivers(drivers, errors);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${formatValidationErrors(errors)}`, {
      errors,
    });
  }

  return config;
}
