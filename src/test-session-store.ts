/**
 * Unit tests for session-store.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { DriverRegistry } from "./driver-registry.js";
import { SessionCreationFailedError } from "./errors.js";
import { MetricsEmitter } from "./metrics-emitter.js";
import { MemorySink, MetricNames } from "./metrics-types.js";
import { SessionStore } from "./session-store.js";
import { FAKE_DRIVER_MODULE, FakeDriver } from "./test-support.js";

async function createStore(
  drivers: Array<[Record<string, unknown>, string]>,
  options: { sink?: MemorySink; generateId?: () => string } = {}
): Promise<SessionStore> {
  const metrics = new MetricsEmitter({ sink: options.sink ?? new MemorySink() });
  const registry = new DriverRegistry({ modules: { FakeDrivers: FAKE_DRIVER_MODULE }, metrics });
  for (const [capabilities, type] of drivers) {
    const result = await registry.registerDriver(capabilities, type);
    assert.strictEqual(result.ok, true);
  }
  return new SessionStore(registry, { metrics, generateId: options.generateId });
}

function sequentialIds(): () => string {
  let next = 0;
  return () => `session-${++next}`;
}

describe("session-store", () => {
  // ==========================================================================
  // CREATION
  // ==========================================================================

  describe("createSession", () => {
    it("stores a session with a driver of the resolved type", async () => {
      const store = await createStore([[{ browserName: "chrome" }, "FakeDriver, FakeDrivers"]]);

      const sessionId = await store.createSession({ browserName: "chrome" });
      const session = store.getSession(sessionId);

      assert.ok(session);
      assert.strictEqual(session.id, sessionId);
      assert.ok(session.driver instanceof FakeDriver);
      assert.deepStrictEqual(session.capabilities, { browserName: "chrome" });
    });

    it("creates a session of the type registered for { browser: test }", async () => {
      const store = await createStore([[{ browser: "test" }, "FakeDriver, FakeDrivers"]]);
      const sessionId = await store.createSession({ browser: "test" });
      assert.ok(store.getSession(sessionId)?.driver instanceof FakeDriver);
    });

    it("gives every session a distinct id", async () => {
      const store = await createStore([[{}, "FakeDriver, FakeDrivers"]]);
      const ids = await Promise.all(Array.from({ length: 20 }, () => store.createSession({})));
      assert.strictEqual(new Set(ids).size, 20);
      assert.strictEqual(store.sessionCount, 20);
    });

    it("uses the configured id generator", async () => {
      const store = await createStore([[{}, "FakeDriver, FakeDrivers"]], { generateId: sequentialIds() });
      assert.strictEqual(await store.createSession({}), "session-1");
      assert.strictEqual(await store.createSession({}), "session-2");
    });

    it("fails when no driver matches and stores nothing", async () => {
      const sink = new MemorySink();
      const store = await createStore([[{ browserName: "chrome" }, "FakeDriver, FakeDrivers"]], { sink });

      await assert.rejects(store.createSession({ browserName: "firefox" }), (error: unknown) => {
        assert.ok(error instanceof SessionCreationFailedError);
        assert.strictEqual(
          error.message,
          "Unable to create session: no registered driver matches the requested capabilities"
        );
        return true;
      });
      assert.strictEqual(store.sessionCount, 0);
      assert.strictEqual(sink.getCounter(MetricNames.SESSION_CREATION_FAILURES_TOTAL), 1);
    });

    it("wraps a driver constructor failure", async () => {
      const store = await createStore([[{}, "BrokenDriver, FakeDrivers"]]);

      await assert.rejects(store.createSession({}), (error: unknown) => {
        assert.ok(error instanceof SessionCreationFailedError);
        assert.strictEqual(
          error.message,
          "Unable to create session: driver instantiation failed: browser binary not found"
        );
        assert.ok(error.cause instanceof Error);
        assert.strictEqual(error.cause.message, "browser binary not found");
        return true;
      });
      assert.strictEqual(store.sessionCount, 0);
    });

    it("copies the requested capabilities", async () => {
      const store = await createStore([[{}, "FakeDriver, FakeDrivers"]]);
      const capabilities: Record<string, unknown> = { browserName: "chrome" };
      const sessionId = await store.createSession(capabilities);
      capabilities.browserName = "changed";
      assert.deepStrictEqual(store.getSession(sessionId)?.capabilities, { browserName: "chrome" });
    });
  });

  // ==========================================================================
  // LOOKUP AND REMOVAL
  // ==========================================================================

  describe("getSession / removeSession", () => {
    it("returns undefined for an unknown id", async () => {
      const store = await createStore([]);
      assert.strictEqual(store.getSession("missing"), undefined);
    });

    it("removes a session without quitting its driver", async () => {
      const sink = new MemorySink();
      const store = await createStore([[{}, "FakeDriver, FakeDrivers"]], { sink });
      const sessionId = await store.createSession({});
      const driver = store.getSession(sessionId)?.driver;

      store.removeSession(sessionId);

      assert.strictEqual(store.getSession(sessionId), undefined);
      assert.ok(driver instanceof FakeDriver);
      assert.strictEqual(driver.quitCount, 0);
      assert.strictEqual(sink.getCounter(MetricNames.SESSIONS_REMOVED_TOTAL), 1);
      assert.strictEqual(sink.getGauge(MetricNames.SESSIONS_ACTIVE), 0);
    });

    it("ignores unknown and repeated removals", async () => {
      const sink = new MemorySink();
      const store = await createStore([[{}, "FakeDriver, FakeDrivers"]], { sink });
      const sessionId = await store.createSession({});

      const before = store.listSessionIds();
      store.removeSession("missing");
      assert.deepStrictEqual(store.listSessionIds(), before);
      store.removeSession(sessionId);
      store.removeSession(sessionId);

      assert.strictEqual(store.sessionCount, 0);
      assert.strictEqual(sink.getCounter(MetricNames.SESSIONS_REMOVED_TOTAL), 1);
    });

    it("lists sessions in creation order", async () => {
      const store = await createStore([[{}, "FakeDriver, FakeDrivers"]], { generateId: sequentialIds() });
      await store.createSession({ browserName: "a" });
      await store.createSession({ browserName: "b" });

      assert.deepStrictEqual(store.listSessionIds(), ["session-1", "session-2"]);
      const summaries = store.listSessions();
      assert.deepStrictEqual(
        summaries.map((summary) => [summary.sessionId, summary.capabilities]),
        [
          ["session-1", { browserName: "a" }],
          ["session-2", { browserName: "b" }],
        ]
      );
      assert.strictEqual(typeof summaries[0]?.createdAt, "string");
    });
  });

  // ==========================================================================
  // DISPOSAL
  // ==========================================================================

  describe("disposeAll", () => {
    it("quits every driver and empties the store", async () => {
      const store = await createStore([
        [{ browserName: "chrome" }, "FakeDriver, FakeDrivers"],
        [{ browserName: "broken" }, "FailingDriver, FakeDrivers"],
      ]);
      const healthyId = await store.createSession({ browserName: "chrome" });
      await store.createSession({ browserName: "broken" });
      const healthy = store.getSession(healthyId)?.driver;

      const result = await store.disposeAll();

      assert.deepStrictEqual(result, { disposed: 1, failed: 1 });
      assert.strictEqual(store.sessionCount, 0);
      assert.ok(healthy instanceof FakeDriver);
      assert.strictEqual(healthy.quitCount, 1);
    });

    it("quits each driver through the given runner", async () => {
      const store = await createStore([[{}, "FakeDriver, FakeDrivers"]], { generateId: sequentialIds() });
      await store.createSession({});
      await store.createSession({});
      const wrapped: string[] = [];

      const result = await store.disposeAll(async (sessionId, quit) => {
        wrapped.push(sessionId);
        await quit();
      });

      assert.deepStrictEqual(wrapped, ["session-1", "session-2"]);
      assert.deepStrictEqual(result, { disposed: 2, failed: 0 });
    });
  });
});
