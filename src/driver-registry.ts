/**
 * Driver Registry - resolves pluggable automation backends by name.
 *
 * A type descriptor is "TypeName" or "TypeName, ModuleName". Named modules
 * are looked up among the modules the registry already knows; otherwise
 * `<driverLibraryDir>/<ModuleName>.js` is imported once and cached.
 *
 * registerDriver never rejects. Failures are reported through the returned
 * result and the optional callback, and leave the registry untouched.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath, pathToFileURL } from "url";
import { DriverRegistrationFailedError, toError } from "./errors.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import { MetricsEmitter } from "./metrics-emitter.js";
import { MetricNames } from "./metrics-types.js";
import {
  type Capabilities,
  type DriverConstructor,
  type DriverModule,
  REQUIRED_DRIVER_METHODS,
} from "./types.js";

/** Conventional directory name, beside the server module, holding driver libraries. */
export const DRIVER_LIBRARY_DIRECTORY = "DriverLibraries";

/** File extension of loadable driver modules. */
export const DRIVER_MODULE_EXTENSION = ".js";

const MODULE_NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9._-]*$/;

export interface DriverRegistration {
  capabilities: Capabilities;
  typeDescriptor: string;
  typeName: string;
  moduleName?: string;
  driverType: DriverConstructor;
  /** Monotonic registration sequence; newer wins ties in `resolve`. */
  sequence: number;
}

export type DriverRegistrationResult =
  | { ok: true; registration: DriverRegistration }
  | { ok: false; error: DriverRegistrationFailedError };

/**
 * Called synchronously at the point of failure. Return value is ignored.
 */
export type DriverRegistrationFailedCallback = (typeDescriptor: string, reason: string) => void;

export interface DriverRegistryOptions {
  /** Directory searched for driver modules (default: DriverLibraries beside this module). */
  driverLibraryDir?: string;
  /** Modules available without loading, keyed by module name. */
  modules?: Readonly<Record<string, DriverModule>>;
  logger?: Logger;
  metrics?: MetricsEmitter;
}

export interface ParsedTypeDescriptor {
  typeName: string;
  moduleName?: string;
}

/**
 * Split "TypeName, ModuleName". Parts after the second comma are ignored.
 */
export function parseTypeDescriptor(typeDescriptor: string): ParsedTypeDescriptor {
  const [typeName = "", moduleName] = typeDescriptor.split(",").map((part) => part.trim());
  if (typeName.length === 0) {
    throw new Error("Type descriptor does not name a type");
  }
  if (moduleName === undefined) {
    return { typeName };
  }
  if (moduleName.length === 0) {
    throw new Error("Type descriptor has an empty module name");
  }
  return { typeName, moduleName };
}

function canonicalize(value: unknown, seen: Set<object>): unknown {
  if (typeof value === "bigint") {
    throw new Error("Capabilities must not contain BigInt values");
  }
  if (typeof value !== "object" || value === null) return value;
  if (seen.has(value)) {
    throw new Error("Capabilities must not contain circular references");
  }
  seen.add(value);
  const canonical = Array.isArray(value)
    ? value.map((item: unknown) => canonicalize(item, seen))
    : Object.fromEntries(
        Object.keys(value)
          .sort()
          .map((key) => [key, canonicalize(Reflect.get(value, key), seen)])
      );
  seen.delete(value);
  return canonical;
}

/**
 * Canonical key for a capability set: keys sorted at every depth.
 * Throws for values that have no JSON form.
 */
export function capabilityKey(capabilities: Capabilities): string {
  return JSON.stringify(canonicalize(capabilities, new Set()));
}

function capabilityValuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;
  if (Array.isArray(a) || Array.isArray(b)) {
    return (
      Array.isArray(a) &&
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((item: unknown, index) => capabilityValuesEqual(item, b[index]))
    );
  }
  const keys = Object.keys(a);
  return (
    keys.length === Object.keys(b).length &&
    keys.every(
      (key) =>
        Object.prototype.hasOwnProperty.call(b, key) &&
        capabilityValuesEqual(Reflect.get(a, key), Reflect.get(b, key))
    )
  );
}

/**
 * True when every registered capability is present with an equal value in
 * the requested set. Nested objects compare by content, in any key order.
 */
export function capabilitiesMatch(registered: Capabilities, requested: Capabilities): boolean {
  return Object.entries(registered).every(
    ([key, value]) =>
      Object.prototype.hasOwnProperty.call(requested, key) &&
      capabilityValuesEqual(requested[key], value)
  );
}

/**
 * A class whose prototype carries every AutomationDriver method.
 */
export function isDriverConstructor(value: unknown): value is DriverConstructor {
  if (typeof value !== "function") return false;
  const prototype: unknown = value.prototype;
  if (typeof prototype !== "object" || prototype === null) return false;
  return REQUIRED_DRIVER_METHODS.every((method) => typeof Reflect.get(prototype, method) === "function");
}

function defaultDriverLibraryDir(): string {
  return path.join(path.dirname(fileURLToPath(import.meta.url)), DRIVER_LIBRARY_DIRECTORY);
}

export class DriverRegistry {
  private registrations = new Map<string, DriverRegistration>();
  private modules = new Map<string, DriverModule>();
  private pendingLoads = new Map<string, Promise<DriverModule>>();
  private sequence = 0;

  private readonly driverLibraryDir: string;
  private readonly logger: Logger;
  private readonly metrics: MetricsEmitter;

  constructor(options: DriverRegistryOptions = {}) {
    this.driverLibraryDir = options.driverLibraryDir ?? defaultDriverLibraryDir();
    this.logger = (options.logger ?? new NoOpLogger()).child({ component: "driver-registry" });
    this.metrics = options.metrics ?? new MetricsEmitter();
    for (const [name, module] of Object.entries(options.modules ?? {})) {
      this.modules.set(name, module);
    }
  }

  getDriverLibraryDir(): string {
    return this.driverLibraryDir;
  }

  /**
   * Make a module available under `name` without loading it from disk.
   */
  preloadModule(name: string, module: DriverModule): void {
    this.modules.set(name, module);
  }

  isModuleLoaded(name: string): boolean {
    return this.modules.has(name);
  }

  /**
   * Register the driver type named by `typeDescriptor` for `capabilities`.
   */
  async registerDriver(
    capabilities: Capabilities,
    typeDescriptor: string,
    onFailure?: DriverRegistrationFailedCallback
  ): Promise<DriverRegistrationResult> {
    let parsed: ParsedTypeDescriptor;
    let driverType: DriverConstructor;
    let key: string;

    try {
      key = capabilityKey(capabilities);
      parsed = parseTypeDescriptor(typeDescriptor);
      const candidate = await this.resolveType(parsed);
      if (!isDriverConstructor(candidate)) {
        return this.fail(typeDescriptor, "Type does not implement AutomationDriver", onFailure);
      }
      driverType = candidate;
    } catch (error) {
      const err = toError(error);
      return this.fail(typeDescriptor, err.message, onFailure, err);
    }

    const registration: DriverRegistration = {
      capabilities: { ...capabilities },
      typeDescriptor,
      typeName: parsed.typeName,
      moduleName: parsed.moduleName,
      driverType,
      sequence: ++this.sequence,
    };

    if (this.registrations.has(key)) {
      this.logger.info("Replacing driver registration", { capabilities, typeDescriptor });
    }
    this.registrations.set(key, registration);
    this.metrics.counter(MetricNames.DRIVERS_REGISTERED_TOTAL);
    this.logger.info("Driver registered", { capabilities, typeDescriptor });

    return { ok: true, registration };
  }

  /**
   * Driver type for the most specific registration matching `capabilities`.
   */
  resolve(capabilities: Capabilities): DriverConstructor | undefined {
    let best: DriverRegistration | undefined;
    for (const registration of this.registrations.values()) {
      if (!capabilitiesMatch(registration.capabilities, capabilities)) continue;
      if (!best) {
        best = registration;
        continue;
      }
      const specificity = Object.keys(registration.capabilities).length;
      const bestSpecificity = Object.keys(best.capabilities).length;
      if (
        specificity > bestSpecificity ||
        (specificity === bestSpecificity && registration.sequence > best.sequence)
      ) {
        best = registration;
      }
    }
    return best?.driverType;
  }

  listRegistrations(): DriverRegistration[] {
    return Array.from(this.registrations.values());
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private async resolveType(parsed: ParsedTypeDescriptor): Promise<unknown> {
    if (parsed.moduleName !== undefined) {
      const module = await this.loadModule(parsed.moduleName);
      const found = findExport(module, parsed.typeName);
      if (found === undefined) {
        throw new Error(`Type '${parsed.typeName}' not found in module '${parsed.moduleName}'`);
      }
      return found;
    }

    for (const module of this.modules.values()) {
      const found = findExport(module, parsed.typeName);
      if (found !== undefined) return found;
    }
    throw new Error(`Type '${parsed.typeName}' not found in any loaded driver module`);
  }

  private loadModule(name: string): Promise<DriverModule> {
    const known = this.modules.get(name);
    if (known) return Promise.resolve(known);

    const pending = this.pendingLoads.get(name);
    if (pending) return pending;

    const load = this.importModule(name).finally(() => {
      this.pendingLoads.delete(name);
    });
    this.pendingLoads.set(name, load);
    return load;
  }

  private async importModule(name: string): Promise<DriverModule> {
    if (!MODULE_NAME_PATTERN.test(name) || name.includes("..")) {
      throw new Error(`Invalid driver module name '${name}'`);
    }

    const file = path.join(this.driverLibraryDir, `${name}${DRIVER_MODULE_EXTENSION}`);
    try {
      await fs.promises.access(file);
    } catch {
      throw new Error(`Driver module '${name}' not found at ${file}`);
    }

    const imported: unknown = await import(pathToFileURL(file).href);
    if (typeof imported !== "object" || imported === null) {
      throw new Error(`Driver module '${name}' did not load as a module`);
    }
    const module: DriverModule = Object.fromEntries(Object.entries(imported));

    this.modules.set(name, module);
    this.metrics.counter(MetricNames.DRIVER_MODULES_LOADED_TOTAL);
    this.logger.info("Driver module loaded", { module: name, file });
    return module;
  }

  private fail(
    typeDescriptor: string,
    reason: string,
    onFailure: DriverRegistrationFailedCallback | undefined,
    cause?: unknown
  ): DriverRegistrationResult {
    const error = new DriverRegistrationFailedError(typeDescriptor, reason, cause);
    this.metrics.counter(MetricNames.DRIVER_REGISTRATION_FAILURES_TOTAL);
    this.logger.warn("Driver registration failed", { typeDescriptor, reason });

    if (onFailure) {
      try {
        onFailure(typeDescriptor, reason);
      } catch (callbackError) {
        this.logger.logError("Driver registration failure callback threw", toError(callbackError), {
          typeDescriptor,
        });
      }
    }

    return { ok: false, error };
  }
}

/**
 * Export by exact name, else the first case-insensitive match.
 */
function findExport(module: DriverModule, typeName: string): unknown {
  if (Object.prototype.hasOwnProperty.call(module, typeName)) {
    return module[typeName];
  }
  const lower = typeName.toLowerCase();
  const match = Object.keys(module).find((key) => key.toLowerCase() === lower);
  return match === undefined ? undefined : module[match];
}
