/**
 * Unit tests for command-registry.ts and remote-command-registry.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { CommandHandler, UnsupportedCommandHandler, type HandlerContext } from "./command-handler.js";
import { CommandRegistry } from "./command-registry.js";
import { DriverRegistry } from "./driver-registry.js";
import { HandlerConstructionFailedError, UnsupportedCommandError } from "./errors.js";
import { NoOpLogger } from "./logger-types.js";
import { MetricsEmitter } from "./metrics-emitter.js";
import { MemorySink, MetricNames } from "./metrics-types.js";
import { RemoteCommandRegistry } from "./remote-command-registry.js";
import { MouseClickHandler } from "./session-command-handlers.js";
import { SessionStore } from "./session-store.js";
import { DriverCommand, type BodyParameters, type LocatorParameters } from "./types.js";

function createContext(): HandlerContext {
  return { sessionStore: new SessionStore(new DriverRegistry()), logger: new NoOpLogger() };
}

class EchoHandler extends CommandHandler {
  describe(): string {
    return "[echo]";
  }

  protected async run(): Promise<unknown> {
    return this.body;
  }
}

class EchoRegistry extends CommandRegistry {
  protected registerHandlers(): void {
    this.register(DriverCommand.GetTitle, (locator, body) => new EchoHandler(locator, body));
  }
}

class OverridingRegistry extends CommandRegistry {
  protected registerHandlers(): void {
    this.register(DriverCommand.GetTitle, (locator, body) => new UnsupportedCommandHandler("first", locator, body));
    this.register(DriverCommand.GetTitle, (locator, body) => new EchoHandler(locator, body));
  }
}

const noParameters: LocatorParameters = {};
const noBody: BodyParameters = {};

describe("command-registry", () => {
  describe("canHandle", () => {
    it("is true exactly for registered ids", () => {
      const registry = new EchoRegistry(createContext());
      assert.strictEqual(registry.canHandle(DriverCommand.GetTitle), true);
      assert.strictEqual(registry.canHandle(DriverCommand.Close), false);
      assert.strictEqual(registry.canHandle("not_a_command"), false);
    });
  });

  describe("create", () => {
    it("builds the registered handler with the given parameters", async () => {
      const registry = new EchoRegistry(createContext());
      const handler = registry.create(DriverCommand.GetTitle, noParameters, { value: 7 });
      assert.ok(handler instanceof EchoHandler);
      assert.deepStrictEqual(await handler.execute(), { value: 7 });
    });

    it("falls back to the unsupported-command handler", async () => {
      const sink = new MemorySink();
      const registry = new EchoRegistry(createContext(), { metrics: new MetricsEmitter({ sink }) });

      const handler = registry.create("take_screenshot", noParameters, noBody);

      assert.ok(handler instanceof UnsupportedCommandHandler);
      assert.strictEqual(handler.describe(), "[unsupported command: take_screenshot]");
      await assert.rejects(handler.execute(), (error: unknown) => {
        assert.ok(error instanceof UnsupportedCommandError);
        assert.strictEqual(error.commandId, "take_screenshot");
        return true;
      });
      assert.strictEqual(
        sink.getCounter(MetricNames.UNSUPPORTED_COMMANDS_TOTAL, { command: "take_screenshot" }),
        1
      );
    });

    it("counts created handlers per command", () => {
      const sink = new MemorySink();
      const registry = new EchoRegistry(createContext(), { metrics: new MetricsEmitter({ sink }) });
      registry.create(DriverCommand.GetTitle, noParameters, noBody);
      registry.create(DriverCommand.GetTitle, noParameters, noBody);
      assert.strictEqual(sink.getCounter(MetricNames.HANDLERS_CREATED_TOTAL, { command: "get_title" }), 2);
    });

    it("lets the last registration for an id win", async () => {
      const registry = new OverridingRegistry(createContext());
      const handler = registry.create(DriverCommand.GetTitle, noParameters, { value: 1 });
      assert.deepStrictEqual(await handler.execute(), { value: 1 });
      assert.deepStrictEqual(registry.getSupportedCommands(), ["get_title"]);
    });
  });

  describe("sealing", () => {
    it("rejects registration after construction", () => {
      const registry = new EchoRegistry(createContext());
      assert.throws(
        () => registry.register(DriverCommand.Close, (locator, body) => new EchoHandler(locator, body)),
        { message: "Cannot register 'close': command registry is already initialized" }
      );
      assert.strictEqual(registry.canHandle(DriverCommand.Close), false);
    });
  });

  describe("RemoteCommandRegistry", () => {
    it("registers the session, window and mouse commands", () => {
      const registry = new RemoteCommandRegistry(createContext());
      assert.deepStrictEqual(registry.getSupportedCommands().sort(), [
        "get_current_window_handle",
        "get_session_capabilities",
        "get_session_list",
        "get_window_handles",
        "mouse_click",
        "mouse_double_click",
        "mouse_down",
        "mouse_move_to",
        "mouse_up",
        "new_session",
        "quit",
      ]);
    });

    it("leaves other protocol commands unsupported", () => {
      const registry = new RemoteCommandRegistry(createContext());
      assert.strictEqual(registry.canHandle(DriverCommand.FindElement), false);
      assert.ok(registry.create(DriverCommand.FindElement, noParameters, noBody) instanceof UnsupportedCommandHandler);
    });

    it("propagates handler construction failures", () => {
      const registry = new RemoteCommandRegistry(createContext());
      assert.throws(
        () => registry.create(DriverCommand.MouseClick, { sessionId: "s1" }, {}),
        (error: unknown) => {
          assert.ok(error instanceof HandlerConstructionFailedError);
          assert.strictEqual(error.parameter, "button");
          return true;
        }
      );
    });

    it("binds handlers to the registry context", () => {
      const registry = new RemoteCommandRegistry(createContext());
      const handler = registry.create(DriverCommand.MouseClick, { sessionId: "s1" }, { button: 0 });
      assert.ok(handler instanceof MouseClickHandler);
      assert.strictEqual(handler.getTargetSessionId(), "s1");
    });
  });
});
