/**
 * Command Handler contract.
 *
 * A handler is built from (locator, body) parameters, reads everything it
 * needs in its constructor (throwing HandlerConstructionFailedError on bad
 * input), and is executed exactly once.
 */

import { DriverCapabilityError, SessionNotFoundError, UnsupportedCommandError } from "./errors.js";
import type { Logger } from "./logger-types.js";
import type { Session, SessionStore } from "./session-store.js";
import {
  type AutomationDriver,
  type BodyParameters,
  type HasInputDevices,
  type LocatorParameters,
  type Mouse,
  SESSION_ID_PARAMETER,
} from "./types.js";
import { requireLocatorParameter } from "./validation.js";

/**
 * What handlers may touch, injected by the registry's factories.
 */
export interface HandlerContext {
  sessionStore: SessionStore;
  logger: Logger;
}

export type HandlerFactory = (locator: LocatorParameters, body: BodyParameters) => CommandHandler;

export abstract class CommandHandler {
  private executed = false;

  constructor(
    protected readonly locator: LocatorParameters,
    protected readonly body: BodyParameters
  ) {}

  /**
   * Short, stable label for diagnostics, e.g. "[click mouse]".
   */
  abstract describe(): string;

  protected abstract run(): Promise<unknown>;

  /**
   * Session this handler targets, if any. Execution against one session is
   * serialized by the server.
   */
  getTargetSessionId(): string | undefined {
    return undefined;
  }

  /**
   * Run the command. Errors raised by the driver propagate unchanged.
   */
  async execute(): Promise<unknown> {
    if (this.executed) {
      throw new Error(`Handler ${this.describe()} has already been executed`);
    }
    this.executed = true;
    return this.run();
  }

  toString(): string {
    return this.describe();
  }
}

/**
 * Fallback for command ids with no registered handler.
 */
export class UnsupportedCommandHandler extends CommandHandler {
  constructor(
    private readonly commandId: string,
    locator: LocatorParameters,
    body: BodyParameters
  ) {
    super(locator, body);
  }

  describe(): string {
    return `[unsupported command: ${this.commandId}]`;
  }

  protected async run(): Promise<never> {
    throw new UnsupportedCommandError(this.commandId);
  }
}

export function hasInputDevices(
  driver: AutomationDriver
): driver is AutomationDriver & HasInputDevices {
  const mouse: unknown = Reflect.get(driver, "mouse");
  return typeof mouse === "object" && mouse !== null;
}

/**
 * Base for handlers acting on one session, located by the `sessionId`
 * locator parameter.
 */
export abstract class SessionCommandHandler extends CommandHandler {
  protected readonly sessionId: string;

  constructor(
    protected readonly context: HandlerContext,
    locator: LocatorParameters,
    body: BodyParameters
  ) {
    super(locator, body);
    this.sessionId = requireLocatorParameter(locator, SESSION_ID_PARAMETER);
  }

  getTargetSessionId(): string {
    return this.sessionId;
  }

  protected getSession(): Session {
    const session = this.context.sessionStore.getSession(this.sessionId);
    if (!session) {
      throw new SessionNotFoundError(this.sessionId);
    }
    return session;
  }

  protected getMouse(session: Session): Mouse {
    if (!hasInputDevices(session.driver)) {
      throw new DriverCapabilityError(session.id, "input devices");
    }
    return session.driver.mouse;
  }
}
