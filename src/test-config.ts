/**
 * Unit tests for config.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { DEFAULT_SERVER_CONFIG, loadServerConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

function configError(env: NodeJS.ProcessEnv): ConfigurationError {
  try {
    loadServerConfig(env);
  } catch (error) {
    assert.ok(error instanceof ConfigurationError);
    return error;
  }
  assert.fail("expected ConfigurationError");
}

describe("config", () => {
  it("returns defaults for an empty environment", () => {
    assert.deepStrictEqual(loadServerConfig({}), { logLevel: "info", logJson: false, drivers: [] });
  });

  it("does not share the default drivers array", () => {
    const config = loadServerConfig({});
    config.drivers.push({ capabilities: {}, type: "FakeDriver" });
    assert.strictEqual(DEFAULT_SERVER_CONFIG.drivers.length, 0);
  });

  it("reads log settings and the driver directory", () => {
    const config = loadServerConfig({
      AUTOMATION_SERVER_LOG_LEVEL: "debug",
      AUTOMATION_SERVER_LOG_JSON: "true",
      AUTOMATION_SERVER_DRIVER_DIR: "/opt/drivers",
    });
    assert.strictEqual(config.logLevel, "debug");
    assert.strictEqual(config.logJson, true);
    assert.strictEqual(config.driverLibraryDir, "/opt/drivers");
  });

  it("accepts silent as a log level", () => {
    assert.strictEqual(loadServerConfig({ AUTOMATION_SERVER_LOG_LEVEL: "silent" }).logLevel, "silent");
  });

  it("parses driver entries", () => {
    const config = loadServerConfig({
      AUTOMATION_SERVER_DRIVERS: JSON.stringify([
        { capabilities: { browserName: "firefox" }, type: "FirefoxDriver, Drivers" },
      ]),
    });
    assert.deepStrictEqual(config.drivers, [
      { capabilities: { browserName: "firefox" }, type: "FirefoxDriver, Drivers" },
    ]);
  });

  it("reports an unknown log level", () => {
    const error = configError({ AUTOMATION_SERVER_LOG_LEVEL: "loud" });
    assert.strictEqual(
      error.message,
      "Invalid configuration: AUTOMATION_SERVER_LOG_LEVEL: Unknown log level 'loud'"
    );
  });

  it("reports every problem at once", () => {
    const error = configError({
      AUTOMATION_SERVER_LOG_JSON: "yes",
      AUTOMATION_SERVER_DRIVERS: "[{\"capabilities\": [], \"type\": \"X\"}, {\"capabilities\": {}, \"type\": \" \"}]",
    });
    assert.strictEqual(
      error.message,
      "Invalid configuration: AUTOMATION_SERVER_LOG_JSON: Must be 'true' or 'false'; " +
        "AUTOMATION_SERVER_DRIVERS[0].capabilities: Required object; " +
        "AUTOMATION_SERVER_DRIVERS[1].type: Required non-empty string"
    );
    assert.strictEqual(error.code, "CONFIG_ERROR");
  });

  it("rejects malformed driver JSON", () => {
    assert.strictEqual(
      configError({ AUTOMATION_SERVER_DRIVERS: "{not json" }).message,
      "Invalid configuration: AUTOMATION_SERVER_DRIVERS: Must be valid JSON"
    );
    assert.strictEqual(
      configError({ AUTOMATION_SERVER_DRIVERS: "{}" }).message,
      "Invalid configuration: AUTOMATION_SERVER_DRIVERS: Must be a JSON array"
    );
    assert.strictEqual(
      configError({ AUTOMATION_SERVER_DRIVERS: "[1]" }).message,
      "Invalid configuration: AUTOMATION_SERVER_DRIVERS[0]: Must be an object"
    );
  });
});
