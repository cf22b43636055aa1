/**
 * Session Store - the active automation sessions of one server.
 *
 * One store per AutomationServer, passed to every component that needs it.
 * Each map mutation is a single synchronous step, so a concurrent reader on
 * the event loop never observes a half-inserted or half-removed session.
 *
 * Session ids come from crypto.randomUUID() and are not checked for
 * collisions.
 */

import { randomUUID } from "crypto";
import { SessionCreationFailedError, toError } from "./errors.js";
import type { DriverRegistry } from "./driver-registry.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import { MetricsEmitter } from "./metrics-emitter.js";
import { MetricNames } from "./metrics-types.js";
import type { AutomationDriver, Capabilities, SessionSummary } from "./types.js";

/**
 * A client's binding to one driver instance.
 */
export class Session {
  readonly createdAt = new Date();

  constructor(
    readonly id: string,
    readonly capabilities: Capabilities,
    readonly driver: AutomationDriver
  ) {}

  toSummary(): SessionSummary {
    return {
      sessionId: this.id,
      capabilities: this.capabilities,
      createdAt: this.createdAt.toISOString(),
    };
  }
}

/** Runs `quit` on behalf of one session. */
export type SessionRunner = (sessionId: string, quit: () => Promise<void>) => Promise<void>;

export interface SessionStoreOptions {
  logger?: Logger;
  metrics?: MetricsEmitter;
  /** Session id generator (default: crypto.randomUUID). */
  generateId?: () => string;
}

export class SessionStore {
  private sessions = new Map<string, Session>();

  private readonly driverRegistry: DriverRegistry;
  private readonly logger: Logger;
  private readonly metrics: MetricsEmitter;
  private readonly generateId: () => string;

  constructor(driverRegistry: DriverRegistry, options: SessionStoreOptions = {}) {
    this.driverRegistry = driverRegistry;
    this.logger = (options.logger ?? new NoOpLogger()).child({ component: "session-store" });
    this.metrics = options.metrics ?? new MetricsEmitter();
    this.generateId = options.generateId ?? randomUUID;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  // ==========================================================================
  // SESSION LIFECYCLE
  // ==========================================================================

  /**
   * Start a driver matching `capabilities` and store a session for it.
   * On failure nothing is added.
   */
  async createSession(capabilities: Capabilities): Promise<string> {
    const driverType = this.driverRegistry.resolve(capabilities);
    if (!driverType) {
      this.metrics.counter(MetricNames.SESSION_CREATION_FAILURES_TOTAL);
      this.logger.warn("No driver registered for requested capabilities", { capabilities });
      throw new SessionCreationFailedError(capabilities, "no registered driver matches the requested capabilities");
    }

    let driver: AutomationDriver;
    try {
      driver = new driverType(capabilities);
    } catch (error) {
      const err = toError(error);
      this.metrics.counter(MetricNames.SESSION_CREATION_FAILURES_TOTAL);
      this.logger.logError("Driver instantiation failed", err, { capabilities, driver: driverType.name });
      throw new SessionCreationFailedError(capabilities, `driver instantiation failed: ${err.message}`, err);
    }

    const sessionId = this.generateId();
    this.sessions.set(sessionId, new Session(sessionId, { ...capabilities }, driver));

    this.metrics.counter(MetricNames.SESSIONS_CREATED_TOTAL);
    this.metrics.gauge(MetricNames.SESSIONS_ACTIVE, this.sessions.size);
    this.logger.info("Session created", { sessionId, driver: driverType.name });

    return sessionId;
  }

  getSession(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Remove a session. Unknown ids are ignored.
   * The driver is not quit here; see the quit command and disposeAll.
   */
  removeSession(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      return;
    }
    this.metrics.counter(MetricNames.SESSIONS_REMOVED_TOTAL);
    this.metrics.gauge(MetricNames.SESSIONS_ACTIVE, this.sessions.size);
    this.logger.info("Session removed", { sessionId });
  }

  listSessionIds(): string[] {
    return Array.from(this.sessions.keys());
  }

  listSessions(): SessionSummary[] {
    return Array.from(this.sessions.values(), (session) => session.toSummary());
  }

  /**
   * Quit every driver and empty the store. Driver failures are logged and
   * counted, never thrown. `runForSession` wraps each quit, so a caller can
   * hold the session's lock while its driver shuts down.
   */
  async disposeAll(
    runForSession: SessionRunner = (_sessionId, quit) => quit()
  ): Promise<{ disposed: number; failed: number }> {
    const snapshot = Array.from(this.sessions.values());
    this.sessions.clear();
    this.metrics.gauge(MetricNames.SESSIONS_ACTIVE, 0);

    let disposed = 0;
    let failed = 0;
    for (const session of snapshot) {
      try {
        await runForSession(session.id, async () => {
          await session.driver.quit();
        });
        disposed++;
      } catch (error) {
        failed++;
        this.logger.logError("Failed to quit driver during dispose", toError(error), {
          sessionId: session.id,
        });
      }
    }

    return { disposed, failed };
  }
}
