/**
 * remote-automation-core - public API.
 */

export {
  AutomationServer,
  createServerFromConfig,
  SERVER_VERSION,
  type AutomationServerOptions,
} from "./server.js";

export {
  CommandHandler,
  SessionCommandHandler,
  UnsupportedCommandHandler,
  hasInputDevices,
  type HandlerContext,
  type HandlerFactory,
} from "./command-handler.js";
export { CommandRegistry, type CommandRegistryOptions, type HandlerClass } from "./command-registry.js";
export { RemoteCommandRegistry } from "./remote-command-registry.js";
export * from "./session-command-handlers.js";
export * from "./server-command-handlers.js";

export {
  DriverRegistry,
  DRIVER_LIBRARY_DIRECTORY,
  DRIVER_MODULE_EXTENSION,
  capabilitiesMatch,
  capabilityKey,
  isDriverConstructor,
  parseTypeDescriptor,
  type DriverRegistration,
  type DriverRegistrationFailedCallback,
  type DriverRegistrationResult,
  type DriverRegistryOptions,
  type ParsedTypeDescriptor,
} from "./driver-registry.js";
export { Session, SessionStore, type SessionRunner, type SessionStoreOptions } from "./session-store.js";
export {
  SessionLockManager,
  type SessionLockHandle,
  type SessionLockManagerOptions,
  type SessionLockManagerStats,
} from "./session-lock-manager.js";

export { loadServerConfig, DEFAULT_SERVER_CONFIG, type DriverConfigEntry, type ServerConfig } from "./config.js";
export * from "./errors.js";
export * from "./types.js";
export * from "./logger-index.js";
export * from "./metrics-index.js";
