/**
 * Unit tests for validation.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { HandlerConstructionFailedError } from "./errors.js";
import {
  formatValidationErrors,
  isPlainObject,
  optionalIntegerParameter,
  optionalStringParameter,
  requireIntegerParameter,
  requireLocatorParameter,
  requireObjectParameter,
} from "./validation.js";

function constructionError(fn: () => unknown): HandlerConstructionFailedError {
  try {
    fn();
  } catch (error) {
    assert.ok(error instanceof HandlerConstructionFailedError);
    return error;
  }
  assert.fail("expected HandlerConstructionFailedError");
}

describe("validation", () => {
  describe("requireLocatorParameter", () => {
    it("returns the value when present", () => {
      assert.strictEqual(requireLocatorParameter({ sessionId: "abc" }, "sessionId"), "abc");
    });

    it("rejects a missing parameter", () => {
      const error = constructionError(() => requireLocatorParameter({}, "sessionId"));
      assert.strictEqual(error.parameter, "sessionId");
      assert.strictEqual(error.message, "Invalid parameter 'sessionId': Required non-empty string");
    });

    it("rejects a blank parameter", () => {
      const error = constructionError(() => requireLocatorParameter({ sessionId: "   " }, "sessionId"));
      assert.strictEqual(error.message, "Invalid parameter 'sessionId': Required non-empty string");
    });

    it("rejects control characters", () => {
      const error = constructionError(() => requireLocatorParameter({ sessionId: "a\nb" }, "sessionId"));
      assert.strictEqual(error.message, "Invalid parameter 'sessionId': Must not contain control characters");
    });

    it("rejects values over 1024 characters", () => {
      const error = constructionError(() =>
        requireLocatorParameter({ sessionId: "x".repeat(1025) }, "sessionId")
      );
      assert.strictEqual(error.message, "Invalid parameter 'sessionId': Too long (max 1024 chars)");
    });

    it("does not read inherited properties", () => {
      const error = constructionError(() => requireLocatorParameter({}, "toString"));
      assert.strictEqual(error.parameter, "toString");
    });
  });

  describe("requireIntegerParameter", () => {
    it("returns integers including zero", () => {
      assert.strictEqual(requireIntegerParameter({ button: 0 }, "button"), 0);
      assert.strictEqual(requireIntegerParameter({ button: 2 }, "button"), 2);
    });

    it("rejects a missing or null value", () => {
      assert.strictEqual(
        constructionError(() => requireIntegerParameter({}, "button")).message,
        "Invalid parameter 'button': Required integer"
      );
      assert.strictEqual(
        constructionError(() => requireIntegerParameter({ button: null }, "button")).message,
        "Invalid parameter 'button': Required integer"
      );
    });

    it("rejects non-integers", () => {
      for (const value of ["0", 1.5, true]) {
        const error = constructionError(() => requireIntegerParameter({ button: value }, "button"));
        assert.strictEqual(error.message, "Invalid parameter 'button': Must be an integer");
      }
    });
  });

  describe("optional parameters", () => {
    it("optionalIntegerParameter returns undefined when absent", () => {
      assert.strictEqual(optionalIntegerParameter({}, "xoffset"), undefined);
      assert.strictEqual(optionalIntegerParameter({ xoffset: -4 }, "xoffset"), -4);
    });

    it("optionalIntegerParameter rejects non-integers", () => {
      const error = constructionError(() => optionalIntegerParameter({ xoffset: "4" }, "xoffset"));
      assert.strictEqual(error.message, "Invalid parameter 'xoffset': Must be an integer if provided");
    });

    it("optionalStringParameter rejects empty strings", () => {
      assert.strictEqual(optionalStringParameter({ element: "el-1" }, "element"), "el-1");
      assert.strictEqual(optionalStringParameter({}, "element"), undefined);
      const error = constructionError(() => optionalStringParameter({ element: "" }, "element"));
      assert.strictEqual(error.message, "Invalid parameter 'element': Must be a non-empty string if provided");
    });
  });

  describe("requireObjectParameter", () => {
    it("returns plain objects", () => {
      const capabilities = { browserName: "chrome" };
      assert.strictEqual(requireObjectParameter({ desiredCapabilities: capabilities }, "desiredCapabilities"), capabilities);
    });

    it("rejects arrays and primitives", () => {
      for (const value of [[], "chrome", null]) {
        const error = constructionError(() =>
          requireObjectParameter({ desiredCapabilities: value }, "desiredCapabilities")
        );
        assert.strictEqual(error.message, "Invalid parameter 'desiredCapabilities': Required object");
      }
    });
  });

  describe("helpers", () => {
    it("isPlainObject", () => {
      assert.strictEqual(isPlainObject({}), true);
      assert.strictEqual(isPlainObject([]), false);
      assert.strictEqual(isPlainObject(null), false);
    });

    it("formatValidationErrors joins field messages", () => {
      assert.strictEqual(
        formatValidationErrors([
          { field: "a", message: "first" },
          { field: "b", message: "second" },
        ]),
        "a: first; b: second"
      );
    });
  });
});
