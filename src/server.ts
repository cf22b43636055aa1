/**
 * AutomationServer - the process-wide context of the automation core.
 *
 * Built once at startup. Owns the logger, metrics, driver registry, session
 * store, session locks and command registry, and exposes the dispatch calls
 * a transport needs: createHandler / canCreateHandler, or execute() to also
 * run the handler with per-session serialization.
 */

import type { CommandHandler, HandlerContext } from "./command-handler.js";
import type { CommandRegistry, CommandRegistryOptions } from "./command-registry.js";
import type { DriverConfigEntry, ServerConfig } from "./config.js";
import {
  DriverRegistry,
  type DriverRegistrationFailedCallback,
  type DriverRegistrationResult,
} from "./driver-registry.js";
import { isAutomationServerError, toError } from "./errors.js";
import { ConsoleLogger, type Logger, type LogLevel } from "./logger-index.js";
import { MetricsEmitter, MetricNames, commandTags, type MetricsSink, NoOpSink } from "./metrics-index.js";
import { RemoteCommandRegistry } from "./remote-command-registry.js";
import { SessionLockManager, type SessionLockManagerOptions } from "./session-lock-manager.js";
import { SessionStore } from "./session-store.js";
import {
  PROTOCOL_VERSION,
  type BodyParameters,
  type Capabilities,
  type DriverModule,
  type LocatorParameters,
} from "./types.js";

export const SERVER_VERSION = "0.1.0";

export interface AutomationServerOptions {
  /** Logger for structured logging (default: ConsoleLogger) */
  logger?: Logger;
  /** Log level for the default ConsoleLogger (ignored if logger is provided) */
  logLevel?: LogLevel;
  /** JSON output for the default ConsoleLogger (ignored if logger is provided) */
  logJson?: boolean;
  /** Metrics sink (default: NoOpSink) */
  metricsSink?: MetricsSink;
  /** Directory searched for driver modules */
  driverLibraryDir?: string;
  /** Driver modules available without loading, keyed by module name */
  driverModules?: Readonly<Record<string, DriverModule>>;
  /** Session id generator (default: crypto.randomUUID) */
  generateSessionId?: () => string;
  /** Per-session lock settings (logger is supplied by the server) */
  lockOptions?: Omit<SessionLockManagerOptions, "logger">;
  /** Builds the command table (default: RemoteCommandRegistry) */
  createRegistry?: (context: HandlerContext, options: CommandRegistryOptions) => CommandRegistry;
}

export class AutomationServer {
  private readonly logger: Logger;
  private readonly metrics: MetricsEmitter;
  private readonly driverRegistry: DriverRegistry;
  private readonly sessionStore: SessionStore;
  private readonly lockManager: SessionLockManager;
  private readonly commandRegistry: CommandRegistry;
  private stopped = false;

  constructor(options: AutomationServerOptions = {}) {
    this.logger =
      options.logger ??
      new ConsoleLogger({ level: options.logLevel ?? "info", json: options.logJson ?? false });
    this.metrics = new MetricsEmitter({ sink: options.metricsSink ?? new NoOpSink() });

    this.driverRegistry = new DriverRegistry({
      driverLibraryDir: options.driverLibraryDir,
      modules: options.driverModules,
      logger: this.logger,
      metrics: this.metrics,
    });
    this.sessionStore = new SessionStore(this.driverRegistry, {
      logger: this.logger,
      metrics: this.metrics,
      generateId: options.generateSessionId,
    });
    this.lockManager = new SessionLockManager({ ...options.lockOptions, logger: this.logger });

    const context: HandlerContext = { sessionStore: this.sessionStore, logger: this.logger };
    const registryOptions: CommandRegistryOptions = { logger: this.logger, metrics: this.metrics };
    this.commandRegistry = options.createRegistry
      ? options.createRegistry(context, registryOptions)
      : new RemoteCommandRegistry(context, registryOptions);

    this.logger.info("Automation server initialized", {
      version: SERVER_VERSION,
      protocolVersion: PROTOCOL_VERSION,
      driverLibraryDir: this.driverRegistry.getDriverLibraryDir(),
      commands: this.commandRegistry.getSupportedCommands().length,
    });
  }

  getLogger(): Logger {
    return this.logger;
  }

  getSessionStore(): SessionStore {
    return this.sessionStore;
  }

  getDriverRegistry(): DriverRegistry {
    return this.driverRegistry;
  }

  getLockManager(): SessionLockManager {
    return this.lockManager;
  }

  getMetrics(): Record<string, unknown> | undefined {
    return this.metrics.getMetrics();
  }

  // ==========================================================================
  // DRIVERS
  // ==========================================================================

  registerDriver(
    capabilities: Capabilities,
    typeDescriptor: string,
    onFailure?: DriverRegistrationFailedCallback
  ): Promise<DriverRegistrationResult> {
    return this.driverRegistry.registerDriver(capabilities, typeDescriptor, onFailure);
  }

  /**
   * Register configured drivers in order. Returns how many succeeded.
   */
  async registerConfiguredDrivers(
    entries: readonly DriverConfigEntry[],
    onFailure?: DriverRegistrationFailedCallback
  ): Promise<number> {
    let registered = 0;
    for (const entry of entries) {
      const result = await this.registerDriver(entry.capabilities, entry.type, onFailure);
      if (result.ok) registered++;
    }
    return registered;
  }

  // ==========================================================================
  // DISPATCH
  // ==========================================================================

  canCreateHandler(commandId: string): boolean {
    return this.commandRegistry.canHandle(commandId);
  }

  createHandler(commandId: string, locator: LocatorParameters, body: BodyParameters): CommandHandler {
    return this.commandRegistry.create(commandId, locator, body);
  }

  /**
   * Create and run the handler for a command. Commands against the same
   * session run one at a time; the first failure is rethrown as is.
   */
  async execute(commandId: string, locator: LocatorParameters, body: BodyParameters): Promise<unknown> {
    if (this.stopped) {
      throw new Error("Automation server is stopped");
    }

    const timer = this.metrics.startTimer(MetricNames.COMMANDS_DURATION_MS, { command: commandId });
    let label: string | undefined;
    try {
      const handler = this.createHandler(commandId, locator, body);
      label = handler.describe();
      const target = handler.getTargetSessionId();
      const result =
        target === undefined
          ? await handler.execute()
          : await this.lockManager.runExclusive(target, label, () => handler.execute());

      this.metrics.counter(MetricNames.COMMANDS_TOTAL, 1, commandTags(commandId, true));
      timer.end({ success: true });
      return result;
    } catch (error) {
      this.metrics.counter(MetricNames.COMMANDS_TOTAL, 1, commandTags(commandId, false));
      timer.end({ success: false });

      if (isAutomationServerError(error)) {
        this.logger.debug(`Command failed: ${error.message}`, { commandId, handler: label, code: error.code });
      } else {
        this.logger.logError("Driver action failed", toError(error), { commandId, handler: label });
      }
      throw error;
    }
  }

  // ==========================================================================
  // SHUTDOWN
  // ==========================================================================

  /**
   * Quit every session's driver, each under its session lock, then release
   * all locks. Idempotent.
   */
  async stop(): Promise<{ disposed: number; failed: number }> {
    if (this.stopped) {
      return { disposed: 0, failed: 0 };
    }
    this.stopped = true;

    this.logger.info("Automation server stopping", { sessions: this.sessionStore.sessionCount });
    // Each quit waits for the command already running on its session.
    const result = await this.sessionStore.disposeAll((sessionId, quit) =>
      this.lockManager.runExclusive(sessionId, "[quit]", quit)
    );
    this.lockManager.clear();
    await this.metrics.flush();
    this.logger.info("Automation server stopped", result);
    return result;
  }
}

/**
 * Build a server from loaded configuration and register its drivers.
 */
export async function createServerFromConfig(
  config: ServerConfig,
  options: Omit<AutomationServerOptions, "logLevel" | "logJson" | "driverLibraryDir"> = {}
): Promise<AutomationServer> {
  const server = new AutomationServer({
    ...options,
    logLevel: config.logLevel,
    logJson: config.logJson,
    driverLibraryDir: config.driverLibraryDir,
  });
  const registered = await server.registerConfiguredDrivers(config.drivers);
  server.getLogger().info("Configured drivers registered", {
    registered,
    failed: config.drivers.length - registered,
  });
  return server;
}
