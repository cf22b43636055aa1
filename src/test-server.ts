/**
 * Integration tests for server.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { HandlerConstructionFailedError, SessionNotFoundError, UnsupportedCommandError } from "./errors.js";
import { MemoryLogger } from "./logger-types.js";
import { MemorySink, MetricNames } from "./metrics-types.js";
import { AutomationServer, SERVER_VERSION, createServerFromConfig } from "./server.js";
import { FAKE_DRIVER_MODULE, FIXTURE_DRIVER_DIR, FakeDriver, SlowDriver, flushMicrotasks } from "./test-support.js";
import { DriverCommand, PROTOCOL_VERSION } from "./types.js";

function createServer(sink = new MemorySink(), logger = new MemoryLogger()): AutomationServer {
  let next = 0;
  return new AutomationServer({
    logger,
    metricsSink: sink,
    driverLibraryDir: FIXTURE_DRIVER_DIR,
    driverModules: { FakeDrivers: FAKE_DRIVER_MODULE },
    generateSessionId: () => `session-${++next}`,
  });
}

async function newSession(server: AutomationServer, capabilities: Record<string, unknown>): Promise<string> {
  const result = await server.execute(DriverCommand.NewSession, {}, { desiredCapabilities: capabilities });
  assert.ok(typeof result === "object" && result !== null && "sessionId" in result);
  const { sessionId } = result;
  assert.ok(typeof sessionId === "string");
  return sessionId;
}

describe("server", () => {
  it("logs the server and protocol versions at startup", () => {
    const logger = new MemoryLogger();
    createServer(new MemorySink(), logger);
    const entry = logger.entries.find((e) => e.message === "Automation server initialized");
    assert.strictEqual(entry?.context?.version, SERVER_VERSION);
    assert.strictEqual(entry?.context?.protocolVersion, PROTOCOL_VERSION);
  });

  // ==========================================================================
  // DISPATCH
  // ==========================================================================

  describe("execute", () => {
    it("runs a session from creation to quit", async () => {
      const server = createServer();
      await server.registerDriver({ browserName: "fake" }, "FakeDriver, FakeDrivers");

      const sessionId = await newSession(server, { browserName: "fake", windowHandles: ["a", "b", "c"] });
      const driver = server.getSessionStore().getSession(sessionId)?.driver;
      assert.ok(driver instanceof FakeDriver);

      assert.deepStrictEqual(
        await server.execute(DriverCommand.GetWindowHandles, { sessionId }, {}),
        ["a", "b", "c"]
      );
      assert.strictEqual(await server.execute(DriverCommand.MouseClick, { sessionId }, { button: 1 }), null);
      assert.deepStrictEqual(driver.mouse.calls, [{ action: "contextClick", target: null }]);

      await server.execute(DriverCommand.Quit, { sessionId }, {});
      assert.strictEqual(driver.quitCount, 1);
      await assert.rejects(server.execute(DriverCommand.GetWindowHandles, { sessionId }, {}), SessionNotFoundError);
    });

    it("rejects unsupported commands when executed", async () => {
      const server = createServer();
      assert.strictEqual(server.canCreateHandler(DriverCommand.Screenshot), false);
      assert.strictEqual(server.createHandler(DriverCommand.Screenshot, {}, {}).describe(), "[unsupported command: take_screenshot]");
      await assert.rejects(server.execute(DriverCommand.Screenshot, {}, {}), UnsupportedCommandError);
    });

    it("rejects bad parameters before touching a session", async () => {
      const server = createServer();
      await assert.rejects(
        server.execute(DriverCommand.MouseClick, { sessionId: "session-1" }, { button: 0.5 }),
        HandlerConstructionFailedError
      );
      assert.strictEqual(server.getLockManager().isLocked("session-1"), false);
    });

    it("counts commands by outcome", async () => {
      const sink = new MemorySink();
      const server = createServer(sink);
      await server.registerDriver({}, "FakeDriver, FakeDrivers");
      const sessionId = await newSession(server, {});

      await server.execute(DriverCommand.GetCurrentWindowHandle, { sessionId }, {});
      await assert.rejects(server.execute(DriverCommand.GetCurrentWindowHandle, { sessionId: "missing" }, {}));

      assert.strictEqual(
        sink.getCounter(MetricNames.COMMANDS_TOTAL, { command: "get_current_window_handle", success: true }),
        1
      );
      assert.strictEqual(
        sink.getCounter(MetricNames.COMMANDS_TOTAL, { command: "get_current_window_handle", success: false }),
        1
      );
      assert.strictEqual(
        sink.getHistogram(MetricNames.COMMANDS_DURATION_MS, { command: "new_session", success: true })?.count,
        1
      );
    });

    it("logs driver failures at error level", async () => {
      const logger = new MemoryLogger();
      const server = createServer(new MemorySink(), logger);
      await server.registerDriver({}, "FailingDriver, FakeDrivers");
      const sessionId = await newSession(server, {});
      logger.clear();

      await assert.rejects(server.execute(DriverCommand.GetWindowHandles, { sessionId }, {}), {
        message: "window enumeration failed",
      });

      const errors = logger.at("error");
      assert.strictEqual(errors.length, 1);
      assert.strictEqual(errors[0]?.message, "Driver action failed");
      assert.strictEqual(errors[0]?.context?.handler, "[get all window handles]");
    });
  });

  // ==========================================================================
  // CONCURRENCY
  // ==========================================================================

  describe("per-session serialization", () => {
    it("runs commands for one session one at a time", async () => {
      SlowDriver.reset();
      const server = createServer();
      await server.registerDriver({}, "SlowDriver, FakeDrivers");
      const sessionId = await newSession(server, {});

      const first = server.execute(DriverCommand.GetWindowHandles, { sessionId }, {});
      const second = server.execute(DriverCommand.GetWindowHandles, { sessionId }, {});
      await flushMicrotasks();
      assert.strictEqual(SlowDriver.pendingCount, 1);

      SlowDriver.releaseAll();
      await flushMicrotasks();
      SlowDriver.releaseAll();

      assert.deepStrictEqual(await Promise.all([first, second]), [["slow-window"], ["slow-window"]]);
      assert.strictEqual(SlowDriver.maxActive, 1);
    });

    it("lets different sessions run together", async () => {
      SlowDriver.reset();
      const server = createServer();
      await server.registerDriver({}, "SlowDriver, FakeDrivers");
      const firstSession = await newSession(server, {});
      const secondSession = await newSession(server, {});

      const first = server.execute(DriverCommand.GetWindowHandles, { sessionId: firstSession }, {});
      const second = server.execute(DriverCommand.GetWindowHandles, { sessionId: secondSession }, {});
      await flushMicrotasks();
      assert.strictEqual(SlowDriver.pendingCount, 2);

      SlowDriver.releaseAll();
      await Promise.all([first, second]);
      assert.strictEqual(SlowDriver.maxActive, 2);
    });

    it("creates concurrent sessions with distinct ids", async () => {
      const server = createServer();
      await server.registerDriver({}, "FakeDriver, FakeDrivers");
      const ids = await Promise.all(Array.from({ length: 10 }, () => newSession(server, {})));
      assert.strictEqual(new Set(ids).size, 10);
    });
  });

  // ==========================================================================
  // DRIVERS AND SHUTDOWN
  // ==========================================================================

  describe("driver registration", () => {
    it("notifies once for an invalid type and cannot create sessions from it", async () => {
      const server = createServer();
      const reasons: string[] = [];

      const result = await server.registerDriver({ browserName: "x" }, "NotADriver, FakeDrivers", (_type, reason) =>
        reasons.push(reason)
      );

      assert.strictEqual(result.ok, false);
      assert.deepStrictEqual(reasons, ["Type does not implement AutomationDriver"]);
      await assert.rejects(
        server.execute(DriverCommand.NewSession, {}, { desiredCapabilities: { browserName: "x" } }),
        { message: "Unable to create session: no registered driver matches the requested capabilities" }
      );
    });

    it("registers configured drivers and counts the successes", async () => {
      const server = createServer();
      const registered = await server.registerConfiguredDrivers([
        { capabilities: { browserName: "fake" }, type: "FakeDriver, FakeDrivers" },
        { capabilities: { browserName: "fixture" }, type: "FixtureDriver, FixtureDrivers" },
        { capabilities: { browserName: "ghost" }, type: "GhostDriver, FakeDrivers" },
      ]);
      assert.strictEqual(registered, 2);
      assert.strictEqual(server.getDriverRegistry().listRegistrations().length, 2);
    });

    it("builds a server from configuration", async () => {
      const server = await createServerFromConfig(
        {
          logLevel: "silent",
          logJson: false,
          driverLibraryDir: FIXTURE_DRIVER_DIR,
          drivers: [{ capabilities: { browserName: "fixture" }, type: "FixtureDriver, FixtureDrivers" }],
        },
        { generateSessionId: () => "configured-session" }
      );

      assert.strictEqual(server.getLogger().getLevel(), "silent");
      assert.strictEqual(await newSession(server, { browserName: "fixture" }), "configured-session");
      await server.stop();
    });
  });

  describe("stop", () => {
    it("waits for a running command before quitting its driver", async () => {
      SlowDriver.reset();
      const server = createServer();
      await server.registerDriver({}, "SlowDriver, FakeDrivers");
      const sessionId = await newSession(server, {});

      const running = server.execute(DriverCommand.GetWindowHandles, { sessionId }, {});
      await flushMicrotasks();
      const stopping = server.stop();
      await flushMicrotasks();
      assert.strictEqual(SlowDriver.quitCount, 0);

      SlowDriver.releaseAll();
      assert.deepStrictEqual(await running, ["slow-window"]);
      assert.deepStrictEqual(await stopping, { disposed: 1, failed: 0 });
      assert.strictEqual(SlowDriver.quitCount, 1);
      assert.strictEqual(SlowDriver.quitDuringAction, false);
    });

    it("quits every driver and refuses further commands", async () => {
      const server = createServer();
      await server.registerDriver({}, "FakeDriver, FakeDrivers");
      const first = await newSession(server, {});
      await newSession(server, {});
      const driver = server.getSessionStore().getSession(first)?.driver;
      assert.ok(driver instanceof FakeDriver);

      assert.deepStrictEqual(await server.stop(), { disposed: 2, failed: 0 });
      assert.deepStrictEqual(await server.stop(), { disposed: 0, failed: 0 });
      assert.strictEqual(driver.quitCount, 1);
      assert.strictEqual(server.getSessionStore().sessionCount, 0);
      await assert.rejects(server.execute(DriverCommand.GetSessionList, {}, {}), {
        message: "Automation server is stopped",
      });
    });
  });
});
