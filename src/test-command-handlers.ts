/**
 * Unit tests for session-command-handlers.ts and server-command-handlers.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { UnsupportedCommandHandler, type HandlerContext } from "./command-handler.js";
import { DriverRegistry } from "./driver-registry.js";
import {
  DriverCapabilityError,
  HandlerConstructionFailedError,
  SessionCreationFailedError,
  SessionNotFoundError,
} from "./errors.js";
import { NoOpLogger } from "./logger-types.js";
import {
  GetSessionCapabilitiesHandler,
  GetSessionListHandler,
  NewSessionHandler,
  QuitHandler,
} from "./server-command-handlers.js";
import {
  GetCurrentWindowHandleHandler,
  GetWindowHandlesHandler,
  MouseClickHandler,
  MouseDoubleClickHandler,
  MouseDownHandler,
  MouseMoveToHandler,
  MouseUpHandler,
} from "./session-command-handlers.js";
import { SessionStore } from "./session-store.js";
import { FAKE_DRIVER_MODULE, FakeDriver } from "./test-support.js";

interface Fixture {
  context: HandlerContext;
  store: SessionStore;
}

async function createFixture(): Promise<Fixture> {
  const registry = new DriverRegistry({ modules: { FakeDrivers: FAKE_DRIVER_MODULE } });
  await registry.registerDriver({ browserName: "fake" }, "FakeDriver, FakeDrivers");
  await registry.registerDriver({ browserName: "pointerless" }, "PointerlessDriver, FakeDrivers");
  await registry.registerDriver({ browserName: "failing" }, "FailingDriver, FakeDrivers");
  const store = new SessionStore(registry);
  return { context: { sessionStore: store, logger: new NoOpLogger() }, store };
}

async function startFakeSession(
  fixture: Fixture,
  capabilities: Record<string, unknown> = {}
): Promise<{ sessionId: string; driver: FakeDriver }> {
  const sessionId = await fixture.store.createSession({ browserName: "fake", ...capabilities });
  const driver = fixture.store.getSession(sessionId)?.driver;
  assert.ok(driver instanceof FakeDriver);
  return { sessionId, driver };
}

function constructionError(fn: () => unknown): HandlerConstructionFailedError {
  try {
    fn();
  } catch (error) {
    assert.ok(error instanceof HandlerConstructionFailedError);
    return error;
  }
  assert.fail("expected HandlerConstructionFailedError");
}

describe("command handlers", () => {
  // ==========================================================================
  // CONTRACT
  // ==========================================================================

  describe("handler contract", () => {
    it("requires a session id for session commands", async () => {
      const { context } = await createFixture();
      const error = constructionError(() => new GetWindowHandlesHandler(context, {}, {}));
      assert.strictEqual(error.parameter, "sessionId");
    });

    it("reports an unknown session at execution", async () => {
      const { context } = await createFixture();
      const handler = new GetWindowHandlesHandler(context, { sessionId: "missing" }, {});
      await assert.rejects(handler.execute(), (error: unknown) => {
        assert.ok(error instanceof SessionNotFoundError);
        assert.strictEqual(error.message, "Session missing not found");
        return true;
      });
    });

    it("executes a handler only once", async () => {
      const fixture = await createFixture();
      const { sessionId } = await startFakeSession(fixture);
      const handler = new GetWindowHandlesHandler(fixture.context, { sessionId }, {});
      await handler.execute();
      await assert.rejects(handler.execute(), {
        message: "Handler [get all window handles] has already been executed",
      });
    });

    it("describes handlers with stable labels", async () => {
      const { context } = await createFixture();
      const locator = { sessionId: "s1" };
      assert.strictEqual(new GetWindowHandlesHandler(context, locator, {}).toString(), "[get all window handles]");
      assert.strictEqual(new GetCurrentWindowHandleHandler(context, locator, {}).describe(), "[get current window handle]");
      assert.strictEqual(new MouseClickHandler(context, locator, { button: 0 }).describe(), "[click mouse]");
      assert.strictEqual(new MouseDoubleClickHandler(context, locator, {}).describe(), "[double-click mouse]");
      assert.strictEqual(new MouseDownHandler(context, locator, {}).describe(), "[mouse button down]");
      assert.strictEqual(new MouseUpHandler(context, locator, {}).describe(), "[mouse button up]");
      assert.strictEqual(new MouseMoveToHandler(context, locator, { element: "e1" }).describe(), "[move mouse]");
      assert.strictEqual(new NewSessionHandler(context, {}, { desiredCapabilities: {} }).describe(), "[new session]");
      assert.strictEqual(new GetSessionListHandler(context, {}, {}).describe(), "[get session list]");
      assert.strictEqual(new GetSessionCapabilitiesHandler(context, locator, {}).describe(), "[get session capabilities]");
      assert.strictEqual(new QuitHandler(context, locator, {}).describe(), "[quit]");
    });

    it("targets the session named in the locator", async () => {
      const { context } = await createFixture();
      assert.strictEqual(new QuitHandler(context, { sessionId: "s7" }, {}).getTargetSessionId(), "s7");
      assert.strictEqual(new GetSessionListHandler(context, {}, {}).getTargetSessionId(), undefined);
      assert.strictEqual(new UnsupportedCommandHandler("close", {}, {}).getTargetSessionId(), undefined);
    });
  });

  // ==========================================================================
  // WINDOWS
  // ==========================================================================

  describe("window handles", () => {
    it("returns every handle in driver order", async () => {
      const fixture = await createFixture();
      const { sessionId, driver } = await startFakeSession(fixture, {
        windowHandles: ["w-1", "w-2", "w-3"],
      });

      const handles = await new GetWindowHandlesHandler(fixture.context, { sessionId }, {}).execute();

      assert.deepStrictEqual(handles, ["w-1", "w-2", "w-3"]);
      assert.notStrictEqual(handles, driver.windowHandles);
    });

    it("returns the current handle", async () => {
      const fixture = await createFixture();
      const { sessionId } = await startFakeSession(fixture, { windowHandles: ["w-9", "w-10"] });
      const handle = await new GetCurrentWindowHandleHandler(fixture.context, { sessionId }, {}).execute();
      assert.strictEqual(handle, "w-9");
    });

    it("lets driver errors through unchanged", async () => {
      const fixture = await createFixture();
      const sessionId = await fixture.store.createSession({ browserName: "failing" });
      await assert.rejects(
        new GetWindowHandlesHandler(fixture.context, { sessionId }, {}).execute(),
        { message: "window enumeration failed" }
      );
    });
  });

  // ==========================================================================
  // POINTER DEVICE
  // ==========================================================================

  describe("mouse click", () => {
    it("clicks with the primary button", async () => {
      const fixture = await createFixture();
      const { sessionId, driver } = await startFakeSession(fixture);

      const result = await new MouseClickHandler(fixture.context, { sessionId }, { button: 0 }).execute();

      assert.strictEqual(result, null);
      assert.deepStrictEqual(driver.mouse.calls, [{ action: "click", target: null }]);
    });

    it("context-clicks with any other button", async () => {
      const fixture = await createFixture();
      const { sessionId, driver } = await startFakeSession(fixture);

      await new MouseClickHandler(fixture.context, { sessionId }, { button: 1 }).execute();
      await new MouseClickHandler(fixture.context, { sessionId }, { button: 2 }).execute();

      assert.deepStrictEqual(driver.mouse.calls, [
        { action: "contextClick", target: null },
        { action: "contextClick", target: null },
      ]);
    });

    it("fails construction without a usable button", async () => {
      const { context } = await createFixture();
      assert.strictEqual(
        constructionError(() => new MouseClickHandler(context, { sessionId: "s1" }, {})).message,
        "Invalid parameter 'button': Required integer"
      );
      assert.strictEqual(
        constructionError(() => new MouseClickHandler(context, { sessionId: "s1" }, { button: "left" })).message,
        "Invalid parameter 'button': Must be an integer"
      );
    });

    it("needs a driver with input devices", async () => {
      const fixture = await createFixture();
      const sessionId = await fixture.store.createSession({ browserName: "pointerless" });
      await assert.rejects(
        new MouseClickHandler(fixture.context, { sessionId }, { button: 0 }).execute(),
        (error: unknown) => {
          assert.ok(error instanceof DriverCapabilityError);
          assert.strictEqual(error.message, `Driver for session ${sessionId} does not support input devices`);
          return true;
        }
      );
    });
  });

  describe("other mouse actions", () => {
    it("double-clicks and presses buttons at the current position", async () => {
      const fixture = await createFixture();
      const { sessionId, driver } = await startFakeSession(fixture);
      const locator = { sessionId };

      await new MouseDownHandler(fixture.context, locator, {}).execute();
      await new MouseUpHandler(fixture.context, locator, {}).execute();
      await new MouseDoubleClickHandler(fixture.context, locator, {}).execute();

      assert.deepStrictEqual(driver.mouse.calls, [
        { action: "mouseDown", target: null },
        { action: "mouseUp", target: null },
        { action: "doubleClick", target: null },
      ]);
    });

    it("moves to an element", async () => {
      const fixture = await createFixture();
      const { sessionId, driver } = await startFakeSession(fixture);

      await new MouseMoveToHandler(fixture.context, { sessionId }, { element: "element-4" }).execute();

      assert.deepStrictEqual(driver.mouse.calls, [
        { action: "mouseMove", target: "element-4", xOffset: undefined, yOffset: undefined },
      ]);
    });

    it("moves by an offset from the current position", async () => {
      const fixture = await createFixture();
      const { sessionId, driver } = await startFakeSession(fixture);

      await new MouseMoveToHandler(fixture.context, { sessionId }, { xoffset: 10, yoffset: -5 }).execute();

      assert.deepStrictEqual(driver.mouse.calls, [
        { action: "mouseMove", target: null, xOffset: 10, yOffset: -5 },
      ]);
    });

    it("requires both offsets or an element", async () => {
      const { context } = await createFixture();
      const locator = { sessionId: "s1" };

      const missingY = constructionError(() => new MouseMoveToHandler(context, locator, { xoffset: 3 }));
      assert.strictEqual(missingY.parameter, "yoffset");
      assert.strictEqual(missingY.message, "Invalid parameter 'yoffset': xoffset and yoffset must be given together");

      const missingX = constructionError(() => new MouseMoveToHandler(context, locator, { yoffset: 3 }));
      assert.strictEqual(missingX.parameter, "xoffset");

      const nothing = constructionError(() => new MouseMoveToHandler(context, locator, {}));
      assert.strictEqual(nothing.message, "Invalid parameter 'element': Required when no offsets are given");
    });
  });

  // ==========================================================================
  // SESSION LIFECYCLE
  // ==========================================================================

  describe("session lifecycle", () => {
    it("creates a session and reports its capabilities", async () => {
      const fixture = await createFixture();
      const handler = new NewSessionHandler(fixture.context, {}, { desiredCapabilities: { browserName: "fake" } });

      const result = await handler.execute();

      assert.strictEqual(fixture.store.sessionCount, 1);
      const [sessionId] = fixture.store.listSessionIds();
      assert.deepStrictEqual(result, { sessionId, capabilities: { browserName: "fake" } });
    });

    it("requires desired capabilities", async () => {
      const { context } = await createFixture();
      const error = constructionError(() => new NewSessionHandler(context, {}, {}));
      assert.strictEqual(error.message, "Invalid parameter 'desiredCapabilities': Required object");
    });

    it("propagates session creation failures", async () => {
      const fixture = await createFixture();
      const handler = new NewSessionHandler(fixture.context, {}, { desiredCapabilities: { browserName: "none" } });
      await assert.rejects(handler.execute(), SessionCreationFailedError);
    });

    it("lists sessions and their capabilities", async () => {
      const fixture = await createFixture();
      const { sessionId } = await startFakeSession(fixture);

      const list = await new GetSessionListHandler(fixture.context, {}, {}).execute();
      const capabilities = await new GetSessionCapabilitiesHandler(fixture.context, { sessionId }, {}).execute();

      assert.ok(Array.isArray(list));
      assert.strictEqual(list.length, 1);
      assert.deepStrictEqual(capabilities, { browserName: "fake" });
    });

    it("quits the driver and removes the session", async () => {
      const fixture = await createFixture();
      const { sessionId, driver } = await startFakeSession(fixture);

      const result = await new QuitHandler(fixture.context, { sessionId }, {}).execute();

      assert.strictEqual(result, null);
      assert.strictEqual(driver.quitCount, 1);
      assert.strictEqual(fixture.store.getSession(sessionId), undefined);
    });

    it("removes the session even when quit fails", async () => {
      const fixture = await createFixture();
      const sessionId = await fixture.store.createSession({ browserName: "failing" });

      await assert.rejects(new QuitHandler(fixture.context, { sessionId }, {}).execute(), {
        message: "quit failed",
      });
      assert.strictEqual(fixture.store.getSession(sessionId), undefined);
    });
  });
});
