/**
 * Server Command Handlers - session lifecycle commands.
 *
 * `new_session` and `get_session_list` act on the store itself and need no
 * session id; `get_session_capabilities` and `quit` target one session.
 */

import {
  CommandHandler,
  SessionCommandHandler,
  type HandlerContext,
} from "./command-handler.js";
import type { BodyParameters, Capabilities, LocatorParameters, SessionSummary } from "./types.js";
import { requireObjectParameter } from "./validation.js";

export interface NewSessionResult {
  sessionId: string;
  capabilities: Capabilities;
}

export class NewSessionHandler extends CommandHandler {
  private readonly desiredCapabilities: Capabilities;

  constructor(
    private readonly context: HandlerContext,
    locator: LocatorParameters,
    body: BodyParameters
  ) {
    super(locator, body);
    this.desiredCapabilities = requireObjectParameter(body, "desiredCapabilities");
  }

  describe(): string {
    return "[new session]";
  }

  protected async run(): Promise<NewSessionResult> {
    const sessionId = await this.context.sessionStore.createSession(this.desiredCapabilities);
    return { sessionId, capabilities: this.desiredCapabilities };
  }
}

export class GetSessionListHandler extends CommandHandler {
  constructor(
    private readonly context: HandlerContext,
    locator: LocatorParameters,
    body: BodyParameters
  ) {
    super(locator, body);
  }

  describe(): string {
    return "[get session list]";
  }

  protected async run(): Promise<SessionSummary[]> {
    return this.context.sessionStore.listSessions();
  }
}

export class GetSessionCapabilitiesHandler extends SessionCommandHandler {
  describe(): string {
    return "[get session capabilities]";
  }

  protected async run(): Promise<Capabilities> {
    return this.getSession().capabilities;
  }
}

/**
 * Quits the driver and removes the session. The session is removed even
 * when the driver's quit fails; that failure still reaches the caller.
 */
export class QuitHandler extends SessionCommandHandler {
  describe(): string {
    return "[quit]";
  }

  protected async run(): Promise<null> {
    const session = this.getSession();
    try {
      await session.driver.quit();
    } finally {
      this.context.sessionStore.removeSession(session.id);
    }
    return null;
  }
}
