/**
 * Session Lock Manager - per-session mutual exclusion for command execution.
 *
 * A driver instance is not safe for concurrent use, so at most one command
 * may run against a session at a time. Waiters are served in FIFO order;
 * different session ids never block each other.
 */

import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";

/** Maximum time to hold a lock before warning (30 seconds). */
const LOCK_HOLD_WARNING_MS = 30000;

/** Maximum number of waiters per session lock. */
const DEFAULT_MAX_QUEUE_SIZE = 100;

/**
 * A lock handle that must be released after use.
 * Releasing twice is harmless.
 */
export interface SessionLockHandle {
  sessionId: string;
  acquiredAt: number;
  release: () => void;
}

interface LockState {
  acquiredAt: number;
  holder?: string;
  warningTimer: NodeJS.Timeout;
}

interface Waiter {
  holder?: string;
  resolve: (handle: SessionLockHandle) => void;
  reject: (error: Error) => void;
}

export interface SessionLockManagerOptions {
  /**
   * Timeout for lock acquisition. Unset or 0 waits indefinitely: a driver
   * action in progress cannot be interrupted, so the queue has no deadline
   * by default.
   */
  lockTimeoutMs?: number;
  /** Maximum waiters per session lock (default: 100). */
  maxQueueSize?: number;
  logger?: Logger;
}

export interface SessionLockManagerStats {
  activeLocks: number;
  timeoutCount: number;
  waitingCount: number;
  queueFullRejections: number;
}

/**
 * Usage:
 * ```typescript
 * const result = await lockManager.runExclusive(sessionId, "[click mouse]", () =>
 *   handler.execute()
 * );
 * ```
 */
export class SessionLockManager {
  private locks = new Map<string, LockState>();
  private waitingQueues = new Map<string, Waiter[]>();
  private timeoutCount = 0;
  private queueFullRejections = 0;

  private readonly lockTimeoutMs: number;
  private readonly maxQueueSize: number;
  private readonly logger: Logger;

  constructor(options: SessionLockManagerOptions = {}) {
    this.lockTimeoutMs =
      typeof options.lockTimeoutMs === "number" && options.lockTimeoutMs > 0
        ? options.lockTimeoutMs
        : 0;
    this.maxQueueSize =
      typeof options.maxQueueSize === "number" && options.maxQueueSize > 0
        ? options.maxQueueSize
        : DEFAULT_MAX_QUEUE_SIZE;
    this.logger = (options.logger ?? new NoOpLogger()).child({ component: "session-lock-manager" });
  }

  /**
   * Acquire the lock for a session id, waiting behind current holders.
   */
  async acquire(sessionId: string, holder?: string): Promise<SessionLockHandle> {
    if (!this.locks.has(sessionId)) {
      return this.grant(sessionId, holder);
    }
    return this.enqueue(sessionId, holder);
  }

  /**
   * Try to acquire without waiting. Returns null if the lock is held.
   */
  tryAcquire(sessionId: string, holder?: string): SessionLockHandle | null {
    if (this.locks.has(sessionId)) {
      return null;
    }
    return this.grant(sessionId, holder);
  }

  /**
   * Run `fn` while holding the session's lock.
   */
  async runExclusive<T>(sessionId: string, holder: string, fn: () => Promise<T>): Promise<T> {
    const lock = await this.acquire(sessionId, holder);
    try {
      return await fn();
    } finally {
      lock.release();
    }
  }

  isLocked(sessionId: string): boolean {
    return this.locks.has(sessionId);
  }

  getStats(): SessionLockManagerStats {
    let waitingCount = 0;
    for (const queue of this.waitingQueues.values()) {
      waitingCount += queue.length;
    }

    return {
      activeLocks: this.locks.size,
      timeoutCount: this.timeoutCount,
      waitingCount,
      queueFullRejections: this.queueFullRejections,
    };
  }

  /**
   * Drop all locks and reject every waiter. Used on shutdown.
   */
  clear(): void {
    for (const [sessionId, queue] of this.waitingQueues) {
      for (const { reject } of queue) {
        reject(new Error(`Lock manager cleared while waiting for ${sessionId}`));
      }
    }
    for (const state of this.locks.values()) {
      clearTimeout(state.warningTimer);
    }

    this.waitingQueues.clear();
    this.locks.clear();
    this.timeoutCount = 0;
    this.queueFullRejections = 0;
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private grant(sessionId: string, holder?: string): SessionLockHandle {
    const warningTimer = setTimeout(() => {
      this.logger.warn("Session lock held too long", {
        sessionId,
        holder: holder ?? "unknown",
        thresholdMs: LOCK_HOLD_WARNING_MS,
      });
    }, LOCK_HOLD_WARNING_MS);
    warningTimer.unref();

    const state: LockState = { acquiredAt: Date.now(), holder, warningTimer };
    this.locks.set(sessionId, state);
    this.logger.trace("Acquired session lock", { sessionId, holder });

    return {
      sessionId,
      acquiredAt: state.acquiredAt,
      release: () => this.release(sessionId, state),
    };
  }

  private enqueue(sessionId: string, holder?: string): Promise<SessionLockHandle> {
    let queue = this.waitingQueues.get(sessionId);
    if (!queue) {
      queue = [];
      this.waitingQueues.set(sessionId, queue);
    }

    if (queue.length >= this.maxQueueSize) {
      this.queueFullRejections++;
      return Promise.reject(
        new Error(`Lock queue full for session ${sessionId} (max ${this.maxQueueSize} waiters)`)
      );
    }

    this.logger.trace("Queued for session lock", { sessionId, holder });
    const waiters = queue;

    return new Promise<SessionLockHandle>((resolve, reject) => {
      let timeoutId: NodeJS.Timeout | undefined;

      const entry: Waiter = {
        holder,
        resolve: (handle) => {
          clearTimeout(timeoutId);
          resolve(handle);
        },
        reject: (error) => {
          clearTimeout(timeoutId);
          reject(error);
        },
      };

      if (this.lockTimeoutMs > 0) {
        timeoutId = setTimeout(() => {
          const idx = waiters.indexOf(entry);
          if (idx !== -1) {
            waiters.splice(idx, 1);
          }
          if (waiters.length === 0 && this.waitingQueues.get(sessionId) === waiters) {
            this.waitingQueues.delete(sessionId);
          }
          this.timeoutCount++;
          this.logger.warn("Timed out waiting for session lock", { sessionId, holder });
          reject(
            new Error(`Lock acquisition timeout for session ${sessionId} (${this.lockTimeoutMs}ms)`)
          );
        }, this.lockTimeoutMs);
      }

      waiters.push(entry);
    });
  }

  private release(sessionId: string, state: LockState): void {
    // Only the current holder may release
    if (this.locks.get(sessionId) !== state) {
      return;
    }

    clearTimeout(state.warningTimer);
    this.locks.delete(sessionId);
    this.logger.trace("Released session lock", { sessionId, holder: state.holder });

    const queue = this.waitingQueues.get(sessionId);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.waitingQueues.delete(sessionId);
    }
    if (next) {
      next.resolve(this.grant(sessionId, next.holder));
    }
  }
}
