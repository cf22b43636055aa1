/**
 * Command Registry - maps command ids to handler factories.
 *
 * Subclasses fill the table in registerHandlers(), which runs once from the
 * constructor; the table is read-only afterwards. Unknown ids resolve to
 * UnsupportedCommandHandler, so create() always returns a handler.
 *
 * Handler construction is synchronous: each create() call completes on the
 * event loop before any other starts, which keeps construction serialized.
 */

import {
  type CommandHandler,
  type HandlerContext,
  type HandlerFactory,
  UnsupportedCommandHandler,
} from "./command-handler.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import { MetricsEmitter } from "./metrics-emitter.js";
import { MetricNames } from "./metrics-types.js";
import type { BodyParameters, DriverCommandId, LocatorParameters } from "./types.js";

/** Handler classes constructed as `new Handler(context, locator, body)`. */
export type HandlerClass = new (
  context: HandlerContext,
  locator: LocatorParameters,
  body: BodyParameters
) => CommandHandler;

export interface CommandRegistryOptions {
  logger?: Logger;
  metrics?: MetricsEmitter;
}

export abstract class CommandRegistry {
  private handlers = new Map<string, HandlerFactory>();
  private sealed = false;

  protected readonly context: HandlerContext;
  protected readonly logger: Logger;
  private readonly metrics: MetricsEmitter;

  constructor(context: HandlerContext, options: CommandRegistryOptions = {}) {
    this.context = context;
    this.logger = (options.logger ?? new NoOpLogger()).child({ component: "command-registry" });
    this.metrics = options.metrics ?? new MetricsEmitter();
    this.registerHandlers();
    this.sealed = true;
    this.logger.debug("Command registry ready", { commands: this.handlers.size });
  }

  /**
   * Fill the handler table. Called once, from the constructor.
   */
  protected abstract registerHandlers(): void;

  /**
   * Map a command id to a factory. Only valid inside registerHandlers();
   * a later registration for the same id replaces the earlier one.
   */
  register(commandId: DriverCommandId, factory: HandlerFactory): void {
    if (this.sealed) {
      throw new Error(`Cannot register '${commandId}': command registry is already initialized`);
    }
    this.handlers.set(commandId, factory);
  }

  /**
   * Register a handler class, binding it to this registry's context.
   */
  protected registerHandler(commandId: DriverCommandId, handlerClass: HandlerClass): void {
    this.register(commandId, (locator, body) => new handlerClass(this.context, locator, body));
  }

  canHandle(commandId: string): boolean {
    return this.handlers.has(commandId);
  }

  /**
   * Build the handler for `commandId`. Throws HandlerConstructionFailedError
   * when the parameters are unusable.
   */
  create(commandId: string, locator: LocatorParameters, body: BodyParameters): CommandHandler {
    const factory = this.handlers.get(commandId);
    if (!factory) {
      this.metrics.counter(MetricNames.UNSUPPORTED_COMMANDS_TOTAL, 1, { command: commandId });
      this.logger.debug("No handler registered, using unsupported-command handler", { commandId });
      return new UnsupportedCommandHandler(commandId, locator, body);
    }

    const handler = factory(locator, body);
    this.metrics.counter(MetricNames.HANDLERS_CREATED_TOTAL, 1, { command: commandId });
    return handler;
  }

  getSupportedCommands(): string[] {
    return Array.from(this.handlers.keys());
  }
}
