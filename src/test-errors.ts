/**
 * Unit tests for errors.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import {
  AutomationServerError,
  ConfigurationError,
  DriverCapabilityError,
  DriverRegistrationFailedError,
  HandlerConstructionFailedError,
  SessionCreationFailedError,
  SessionNotFoundError,
  UnsupportedCommandError,
  isAutomationServerError,
  toError,
} from "./errors.js";

describe("errors", () => {
  describe("request errors", () => {
    it("UnsupportedCommandError names the command", () => {
      const error = new UnsupportedCommandError("take_screenshot");
      assert.strictEqual(error.message, "Command 'take_screenshot' is not supported by this server");
      assert.strictEqual(error.code, "UNSUPPORTED_COMMAND");
      assert.strictEqual(error.name, "UnsupportedCommandError");
      assert.strictEqual(error.commandId, "take_screenshot");
      assert.deepStrictEqual(error.context, { commandId: "take_screenshot" });
    });

    it("SessionNotFoundError carries the session id", () => {
      const error = new SessionNotFoundError("session-9");
      assert.strictEqual(error.message, "Session session-9 not found");
      assert.strictEqual(error.code, "SESSION_NOT_FOUND");
      assert.strictEqual(error.sessionId, "session-9");
    });

    it("HandlerConstructionFailedError names the parameter", () => {
      const error = new HandlerConstructionFailedError("button", "Required integer");
      assert.strictEqual(error.message, "Invalid parameter 'button': Required integer");
      assert.strictEqual(error.code, "HANDLER_CONSTRUCTION_FAILED");
      assert.strictEqual(error.parameter, "button");
    });

    it("DriverCapabilityError names the missing capability", () => {
      const error = new DriverCapabilityError("session-1", "input devices");
      assert.strictEqual(error.message, "Driver for session session-1 does not support input devices");
      assert.strictEqual(error.code, "DRIVER_CAPABILITY_MISSING");
    });
  });

  describe("session and driver errors", () => {
    it("SessionCreationFailedError keeps capabilities and cause", () => {
      const cause = new Error("boom");
      const error = new SessionCreationFailedError({ browserName: "firefox" }, "driver instantiation failed: boom", cause);
      assert.strictEqual(error.message, "Unable to create session: driver instantiation failed: boom");
      assert.deepStrictEqual(error.capabilities, { browserName: "firefox" });
      assert.strictEqual(error.cause, cause);
    });

    it("DriverRegistrationFailedError keeps descriptor and reason", () => {
      const error = new DriverRegistrationFailedError("Missing, Drivers", "no such type");
      assert.strictEqual(error.message, "Driver registration failed for 'Missing, Drivers': no such type");
      assert.strictEqual(error.typeDescriptor, "Missing, Drivers");
      assert.strictEqual(error.reason, "no such type");
      assert.strictEqual(error.code, "DRIVER_REGISTRATION_FAILED");
    });

    it("ConfigurationError uses CONFIG_ERROR", () => {
      const error = new ConfigurationError("bad", { field: "x" });
      assert.strictEqual(error.code, "CONFIG_ERROR");
      assert.deepStrictEqual(error.context, { field: "x" });
    });
  });

  describe("helpers", () => {
    it("isAutomationServerError recognizes subclasses only", () => {
      assert.strictEqual(isAutomationServerError(new SessionNotFoundError("s")), true);
      assert.strictEqual(isAutomationServerError(new Error("plain")), false);
      assert.strictEqual(isAutomationServerError("text"), false);
    });

    it("subclasses are instances of the base class and Error", () => {
      const error = new UnsupportedCommandError("close");
      assert.ok(error instanceof AutomationServerError);
      assert.ok(error instanceof Error);
    });

    it("toError wraps non-Error values", () => {
      const original = new Error("kept");
      assert.strictEqual(toError(original), original);
      assert.strictEqual(toError("text").message, "text");
      assert.strictEqual(toError(42).message, "42");
    });

    it("context is absent when not given", () => {
      const error = new AutomationServerError("plain", "CONFIG_ERROR");
      assert.strictEqual(error.context, undefined);
    });
  });
});
