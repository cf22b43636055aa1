/**
 * Unit tests for session-lock-manager.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { SessionLockManager } from "./session-lock-manager.js";
import { flushMicrotasks } from "./test-support.js";

describe("session-lock-manager", () => {
  describe("acquire", () => {
    it("grants a free lock immediately", async () => {
      const manager = new SessionLockManager();
      const lock = await manager.acquire("s1", "[click mouse]");
      assert.strictEqual(lock.sessionId, "s1");
      assert.strictEqual(manager.isLocked("s1"), true);
      lock.release();
      assert.strictEqual(manager.isLocked("s1"), false);
    });

    it("serves waiters in FIFO order", async () => {
      const manager = new SessionLockManager();
      const order: string[] = [];
      const first = await manager.acquire("s1");

      const second = manager.acquire("s1").then((lock) => {
        order.push("second");
        lock.release();
      });
      const third = manager.acquire("s1").then((lock) => {
        order.push("third");
        lock.release();
      });

      await flushMicrotasks();
      assert.deepStrictEqual(order, []);
      assert.strictEqual(manager.getStats().waitingCount, 2);

      first.release();
      await Promise.all([second, third]);
      assert.deepStrictEqual(order, ["second", "third"]);
      assert.strictEqual(manager.isLocked("s1"), false);
    });

    it("does not block other sessions", async () => {
      const manager = new SessionLockManager();
      const lock = await manager.acquire("s1");
      const other = manager.tryAcquire("s2");
      assert.notStrictEqual(other, null);
      other?.release();
      lock.release();
    });

    it("ignores a second release", async () => {
      const manager = new SessionLockManager();
      const first = await manager.acquire("s1");
      first.release();
      const second = await manager.acquire("s1");
      first.release();
      assert.strictEqual(manager.isLocked("s1"), true);
      second.release();
    });
  });

  describe("tryAcquire", () => {
    it("returns null while the lock is held", async () => {
      const manager = new SessionLockManager();
      const lock = await manager.acquire("s1");
      assert.strictEqual(manager.tryAcquire("s1"), null);
      lock.release();
    });
  });

  describe("limits", () => {
    it("times out waiters when a timeout is set", async () => {
      const manager = new SessionLockManager({ lockTimeoutMs: 10 });
      const lock = await manager.acquire("s1");
      await assert.rejects(manager.acquire("s1"), {
        message: "Lock acquisition timeout for session s1 (10ms)",
      });
      assert.strictEqual(manager.getStats().timeoutCount, 1);
      assert.strictEqual(manager.getStats().waitingCount, 0);
      lock.release();
    });

    it("rejects when the queue is full", async () => {
      const manager = new SessionLockManager({ maxQueueSize: 1 });
      const lock = await manager.acquire("s1");
      const waiting = manager.acquire("s1");
      await assert.rejects(manager.acquire("s1"), {
        message: "Lock queue full for session s1 (max 1 waiters)",
      });
      assert.strictEqual(manager.getStats().queueFullRejections, 1);
      lock.release();
      (await waiting).release();
    });
  });

  describe("runExclusive", () => {
    it("never overlaps calls for one session", async () => {
      const manager = new SessionLockManager();
      let active = 0;
      let maxActive = 0;
      const task = async (): Promise<void> => {
        active++;
        maxActive = Math.max(maxActive, active);
        await flushMicrotasks();
        active--;
      };

      await Promise.all([
        manager.runExclusive("s1", "a", task),
        manager.runExclusive("s1", "b", task),
        manager.runExclusive("s1", "c", task),
      ]);
      assert.strictEqual(maxActive, 1);
    });

    it("releases the lock when the function throws", async () => {
      const manager = new SessionLockManager();
      await assert.rejects(
        manager.runExclusive("s1", "a", async () => {
          throw new Error("driver failed");
        }),
        { message: "driver failed" }
      );
      assert.strictEqual(manager.isLocked("s1"), false);
    });
  });

  describe("clear", () => {
    it("rejects waiters and drops locks", async () => {
      const manager = new SessionLockManager();
      await manager.acquire("s1");
      const waiting = manager.acquire("s1");
      manager.clear();
      await assert.rejects(waiting, { message: "Lock manager cleared while waiting for s1" });
      assert.strictEqual(manager.isLocked("s1"), false);
      assert.strictEqual(manager.getStats().activeLocks, 0);
    });
  });
});
