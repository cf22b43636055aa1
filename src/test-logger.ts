/**
 * Unit tests for logger-types.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { ConsoleLogger, MemoryLogger, NoOpLogger, isLogLevel } from "./logger-types.js";

describe("logger", () => {
  describe("levels", () => {
    it("isLogLevel accepts known levels only", () => {
      assert.strictEqual(isLogLevel("warn"), true);
      assert.strictEqual(isLogLevel("silent"), true);
      assert.strictEqual(isLogLevel("verbose"), false);
    });

    it("drops entries below the configured level", () => {
      const logger = new MemoryLogger({ level: "warn" });
      logger.info("ignored");
      logger.warn("kept");
      assert.deepStrictEqual(
        logger.entries.map((entry) => entry.message),
        ["kept"]
      );
    });

    it("silent disables every level", () => {
      const logger = new MemoryLogger({ level: "silent" });
      logger.fatal("ignored");
      assert.strictEqual(logger.entries.length, 0);
      assert.strictEqual(new NoOpLogger().isLevelEnabled("fatal"), false);
    });
  });

  describe("MemoryLogger", () => {
    it("merges child context and shares entries", () => {
      const root = new MemoryLogger({ baseContext: { server: "a" } });
      const child = root.child({ component: "session-store" });

      child.info("Session created", { sessionId: "s1" });

      assert.strictEqual(root.entries.length, 1);
      assert.deepStrictEqual(root.entries[0]?.context, {
        server: "a",
        component: "session-store",
        sessionId: "s1",
      });
    });

    it("keeps the error of logError", () => {
      const logger = new MemoryLogger();
      const error = new Error("quit failed");
      logger.logError("Failed to quit driver", error);
      assert.strictEqual(logger.at("error")[0]?.error, error);
    });
  });

  describe("ConsoleLogger", () => {
    it("writes JSON lines with context", (t) => {
      const log = t.mock.method(console, "log", (..._data: unknown[]) => undefined);
      const logger = new ConsoleLogger({ json: true }).child({ component: "driver-registry" });

      logger.warn("Driver registration failed", { reason: "missing" });

      assert.strictEqual(log.mock.calls.length, 1);
      const line = log.mock.calls[0]?.arguments[0];
      assert.ok(typeof line === "string");
      const parsed: unknown = JSON.parse(line);
      assert.ok(typeof parsed === "object" && parsed !== null);
      assert.strictEqual(Reflect.get(parsed, "level"), "warn");
      assert.strictEqual(Reflect.get(parsed, "message"), "Driver registration failed");
      assert.strictEqual(Reflect.get(parsed, "component"), "driver-registry");
      assert.strictEqual(Reflect.get(parsed, "reason"), "missing");
    });

    it("prefixes text lines with the component", (t) => {
      const info = t.mock.method(console, "info", (..._data: unknown[]) => undefined);
      const logger = new ConsoleLogger().child({ component: "session-store" });

      logger.info("Session removed", { sessionId: "s1" });

      const line = info.mock.calls[0]?.arguments[0];
      assert.ok(typeof line === "string");
      assert.ok(line.endsWith(' INFO  [session-store] Session removed {"sessionId":"s1"}'));
    });
  });
});
