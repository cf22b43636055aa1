/**
 * Unit tests for driver-registry.ts
 */

import assert from "node:assert";
import path from "node:path";
import { describe, it } from "node:test";
import {
  DriverRegistry,
  capabilitiesMatch,
  capabilityKey,
  isDriverConstructor,
  parseTypeDescriptor,
} from "./driver-registry.js";
import { MemoryLogger } from "./logger-types.js";
import { MetricsEmitter } from "./metrics-emitter.js";
import { MemorySink, MetricNames } from "./metrics-types.js";
import {
  FAKE_DRIVER_MODULE,
  FIXTURE_DRIVER_DIR,
  FakeDriver,
  NotADriver,
  PointerlessDriver,
} from "./test-support.js";

function createRegistry(options: { logger?: MemoryLogger; sink?: MemorySink } = {}): DriverRegistry {
  return new DriverRegistry({
    driverLibraryDir: FIXTURE_DRIVER_DIR,
    modules: { FakeDrivers: FAKE_DRIVER_MODULE },
    logger: options.logger,
    metrics: new MetricsEmitter({ sink: options.sink ?? new MemorySink() }),
  });
}

function recordFailures(): {
  failures: Array<{ typeDescriptor: string; reason: string }>;
  onFailure: (typeDescriptor: string, reason: string) => void;
} {
  const failures: Array<{ typeDescriptor: string; reason: string }> = [];
  return { failures, onFailure: (typeDescriptor, reason) => failures.push({ typeDescriptor, reason }) };
}

describe("driver-registry", () => {
  // ==========================================================================
  // HELPERS
  // ==========================================================================

  describe("parseTypeDescriptor", () => {
    it("splits type and module names", () => {
      assert.deepStrictEqual(parseTypeDescriptor("FakeDriver, FakeDrivers"), {
        typeName: "FakeDriver",
        moduleName: "FakeDrivers",
      });
    });

    it("accepts a bare type name", () => {
      assert.deepStrictEqual(parseTypeDescriptor("  FakeDriver "), { typeName: "FakeDriver" });
    });

    it("ignores parts after the module name", () => {
      assert.deepStrictEqual(parseTypeDescriptor("FakeDriver, FakeDrivers, Version=1.0"), {
        typeName: "FakeDriver",
        moduleName: "FakeDrivers",
      });
    });

    it("rejects empty names", () => {
      assert.throws(() => parseTypeDescriptor(" , FakeDrivers"), {
        message: "Type descriptor does not name a type",
      });
      assert.throws(() => parseTypeDescriptor("FakeDriver, "), {
        message: "Type descriptor has an empty module name",
      });
    });
  });

  describe("capability matching", () => {
    it("capabilityKey ignores key order", () => {
      assert.strictEqual(
        capabilityKey({ browserName: "chrome", platform: "linux" }),
        capabilityKey({ platform: "linux", browserName: "chrome" })
      );
    });

    it("matches when every registered key has the requested value", () => {
      assert.strictEqual(capabilitiesMatch({ browserName: "chrome" }, { browserName: "chrome", version: "1" }), true);
      assert.strictEqual(capabilitiesMatch({ browserName: "chrome" }, { browserName: "firefox" }), false);
      assert.strictEqual(capabilitiesMatch({ browserName: "chrome" }, {}), false);
      assert.strictEqual(capabilitiesMatch({}, { browserName: "chrome" }), true);
    });

    it("compares object values structurally", () => {
      assert.strictEqual(capabilitiesMatch({ proxy: { type: "direct" } }, { proxy: { type: "direct" } }), true);
      assert.strictEqual(capabilitiesMatch({ proxy: { type: "direct" } }, { proxy: { type: "pac" } }), false);
      assert.strictEqual(
        capabilitiesMatch({ proxy: { type: "direct" } }, { proxy: { type: "direct", port: 1 } }),
        false
      );
    });

    it("ignores key order inside nested values", () => {
      assert.strictEqual(
        capabilitiesMatch(
          { proxy: { type: "direct", port: 1, auth: { user: "u", realm: "r" } } },
          { proxy: { auth: { realm: "r", user: "u" }, port: 1, type: "direct" } }
        ),
        true
      );
      assert.strictEqual(
        capabilityKey({ proxy: { type: "direct", port: 1 } }),
        capabilityKey({ proxy: { port: 1, type: "direct" } })
      );
    });

    it("keeps array order significant", () => {
      assert.strictEqual(capabilitiesMatch({ args: ["a", "b"] }, { args: ["a", "b"] }), true);
      assert.strictEqual(capabilitiesMatch({ args: ["a", "b"] }, { args: ["b", "a"] }), false);
      assert.strictEqual(capabilitiesMatch({ args: ["a"] }, { args: { 0: "a" } }), false);
    });

    it("isDriverConstructor checks the driver methods", () => {
      assert.strictEqual(isDriverConstructor(FakeDriver), true);
      assert.strictEqual(isDriverConstructor(NotADriver), false);
      assert.strictEqual(isDriverConstructor(42), false);
      assert.strictEqual(isDriverConstructor(() => undefined), false);
    });
  });

  // ==========================================================================
  // REGISTRATION
  // ==========================================================================

  describe("registerDriver", () => {
    it("registers a type from a known module", async () => {
      const sink = new MemorySink();
      const registry = createRegistry({ sink });

      const result = await registry.registerDriver({ browserName: "chrome" }, "FakeDriver, FakeDrivers");

      assert.strictEqual(result.ok, true);
      assert.strictEqual(registry.resolve({ browserName: "chrome" }), FakeDriver);
      assert.strictEqual(sink.getCounter(MetricNames.DRIVERS_REGISTERED_TOTAL), 1);
    });

    it("finds a bare type name in any known module", async () => {
      const registry = createRegistry();
      const result = await registry.registerDriver({ browserName: "chrome" }, "PointerlessDriver");
      assert.strictEqual(result.ok, true);
      assert.strictEqual(registry.resolve({ browserName: "chrome" }), PointerlessDriver);
    });

    it("matches the type name case-insensitively", async () => {
      const registry = createRegistry();
      const result = await registry.registerDriver({}, "fakedriver, FakeDrivers");
      assert.strictEqual(result.ok, true);
      assert.strictEqual(registry.resolve({}), FakeDriver);
    });

    it("reports a type that does not implement the driver contract exactly once", async () => {
      const sink = new MemorySink();
      const registry = createRegistry({ sink });
      const { failures, onFailure } = recordFailures();

      const result = await registry.registerDriver({ browserName: "chrome" }, "NotADriver, FakeDrivers", onFailure);

      assert.deepStrictEqual(failures, [
        { typeDescriptor: "NotADriver, FakeDrivers", reason: "Type does not implement AutomationDriver" },
      ]);
      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.strictEqual(result.error.typeDescriptor, "NotADriver, FakeDrivers");
        assert.strictEqual(result.error.reason, "Type does not implement AutomationDriver");
      }
      assert.strictEqual(registry.resolve({ browserName: "chrome" }), undefined);
      assert.strictEqual(registry.listRegistrations().length, 0);
      assert.strictEqual(sink.getCounter(MetricNames.DRIVER_REGISTRATION_FAILURES_TOTAL), 1);
    });

    it("reports a non-class export", async () => {
      const registry = createRegistry();
      const { failures, onFailure } = recordFailures();
      await registry.registerDriver({}, "notAClass, FakeDrivers", onFailure);
      assert.deepStrictEqual(failures, [
        { typeDescriptor: "notAClass, FakeDrivers", reason: "Type does not implement AutomationDriver" },
      ]);
    });

    it("reports a missing type", async () => {
      const registry = createRegistry();
      const { failures, onFailure } = recordFailures();

      await registry.registerDriver({}, "GhostDriver, FakeDrivers", onFailure);
      await registry.registerDriver({}, "GhostDriver", onFailure);

      assert.deepStrictEqual(failures, [
        { typeDescriptor: "GhostDriver, FakeDrivers", reason: "Type 'GhostDriver' not found in module 'FakeDrivers'" },
        { typeDescriptor: "GhostDriver", reason: "Type 'GhostDriver' not found in any loaded driver module" },
      ]);
    });

    it("reports a malformed descriptor", async () => {
      const registry = createRegistry();
      const { failures, onFailure } = recordFailures();
      await registry.registerDriver({}, "", onFailure);
      assert.deepStrictEqual(failures, [{ typeDescriptor: "", reason: "Type descriptor does not name a type" }]);
    });

    it("leaves an earlier registration in place when a later one fails", async () => {
      const registry = createRegistry();
      await registry.registerDriver({ browserName: "chrome" }, "FakeDriver, FakeDrivers");
      await registry.registerDriver({ browserName: "chrome" }, "NotADriver, FakeDrivers");
      assert.strictEqual(registry.resolve({ browserName: "chrome" }), FakeDriver);
    });

    it("replaces a registration for the same capabilities", async () => {
      const registry = createRegistry();
      await registry.registerDriver({ browserName: "chrome" }, "FakeDriver, FakeDrivers");
      await registry.registerDriver({ browserName: "chrome" }, "PointerlessDriver, FakeDrivers");
      assert.strictEqual(registry.listRegistrations().length, 1);
      assert.strictEqual(registry.resolve({ browserName: "chrome" }), PointerlessDriver);
    });

    it("treats reordered nested capabilities as the same registration", async () => {
      const registry = createRegistry();
      await registry.registerDriver({ proxy: { type: "direct", port: 1 } }, "FakeDriver, FakeDrivers");
      await registry.registerDriver({ proxy: { port: 1, type: "direct" } }, "PointerlessDriver, FakeDrivers");

      assert.strictEqual(registry.listRegistrations().length, 1);
      assert.strictEqual(registry.resolve({ proxy: { port: 1, type: "direct" } }), PointerlessDriver);
    });

    it("reports capabilities that cannot be keyed instead of rejecting", async () => {
      const registry = createRegistry();
      const { failures, onFailure } = recordFailures();
      const looped: Record<string, unknown> = { browserName: "chrome" };
      looped.self = looped;

      const bigint = await registry.registerDriver({ n: 1n }, "FakeDriver, FakeDrivers", onFailure);
      const circular = await registry.registerDriver(looped, "FakeDriver, FakeDrivers", onFailure);

      assert.strictEqual(bigint.ok, false);
      assert.strictEqual(circular.ok, false);
      assert.deepStrictEqual(failures, [
        { typeDescriptor: "FakeDriver, FakeDrivers", reason: "Capabilities must not contain BigInt values" },
        { typeDescriptor: "FakeDriver, FakeDrivers", reason: "Capabilities must not contain circular references" },
      ]);
      assert.strictEqual(registry.listRegistrations().length, 0);
    });

    it("logs and survives a callback that throws", async () => {
      const logger = new MemoryLogger();
      const registry = createRegistry({ logger });

      const result = await registry.registerDriver({}, "GhostDriver", () => {
        throw new Error("listener broke");
      });

      assert.strictEqual(result.ok, false);
      const errors = logger.at("error");
      assert.strictEqual(errors.length, 1);
      assert.strictEqual(errors[0]?.message, "Driver registration failure callback threw");
    });
  });

  // ==========================================================================
  // MODULE LOADING
  // ==========================================================================

  describe("module loading", () => {
    it("loads a module from the driver library directory", async () => {
      const sink = new MemorySink();
      const registry = createRegistry({ sink });
      assert.strictEqual(registry.isModuleLoaded("FixtureDrivers"), false);

      const result = await registry.registerDriver({ browserName: "fixture" }, "FixtureDriver, FixtureDrivers");

      assert.strictEqual(result.ok, true);
      assert.strictEqual(registry.isModuleLoaded("FixtureDrivers"), true);
      const driverType = registry.resolve({ browserName: "fixture" });
      assert.ok(driverType);
      const driver = new driverType({ browserName: "fixture" });
      assert.deepStrictEqual(await driver.getWindowHandles(), ["fixture-window"]);
      assert.strictEqual(sink.getCounter(MetricNames.DRIVER_MODULES_LOADED_TOTAL), 1);
    });

    it("loads each module once", async () => {
      const sink = new MemorySink();
      const registry = createRegistry({ sink });

      await Promise.all([
        registry.registerDriver({ browserName: "a" }, "FixtureDriver, FixtureDrivers"),
        registry.registerDriver({ browserName: "b" }, "FixtureDriver, FixtureDrivers"),
      ]);
      await registry.registerDriver({ browserName: "c" }, "FixtureDriver, FixtureDrivers");

      assert.strictEqual(sink.getCounter(MetricNames.DRIVER_MODULES_LOADED_TOTAL), 1);
      assert.strictEqual(registry.listRegistrations().length, 3);
    });

    it("rejects a loaded type that is not a driver", async () => {
      const registry = createRegistry();
      const { failures, onFailure } = recordFailures();
      await registry.registerDriver({}, "NotADriver, FixtureDrivers", onFailure);
      assert.deepStrictEqual(failures, [
        { typeDescriptor: "NotADriver, FixtureDrivers", reason: "Type does not implement AutomationDriver" },
      ]);
    });

    it("reports a module missing from the directory", async () => {
      const registry = createRegistry();
      const { failures, onFailure } = recordFailures();
      await registry.registerDriver({}, "SomeDriver, MissingDrivers", onFailure);
      assert.deepStrictEqual(failures, [
        {
          typeDescriptor: "SomeDriver, MissingDrivers",
          reason: `Driver module 'MissingDrivers' not found at ${path.join(FIXTURE_DRIVER_DIR, "MissingDrivers.js")}`,
        },
      ]);
    });

    it("refuses module names that leave the directory", async () => {
      const registry = createRegistry();
      const { failures, onFailure } = recordFailures();
      await registry.registerDriver({}, "SomeDriver, ../escape", onFailure);
      assert.deepStrictEqual(failures, [
        { typeDescriptor: "SomeDriver, ../escape", reason: "Invalid driver module name '../escape'" },
      ]);
    });

    it("uses a preloaded module without touching the directory", () => {
      const registry = new DriverRegistry({ driverLibraryDir: "/nonexistent" });
      registry.preloadModule("FakeDrivers", FAKE_DRIVER_MODULE);
      assert.strictEqual(registry.isModuleLoaded("FakeDrivers"), true);
      assert.strictEqual(registry.getDriverLibraryDir(), "/nonexistent");
    });

    it("defaults to DriverLibraries beside the module", () => {
      const registry = new DriverRegistry();
      assert.strictEqual(path.basename(registry.getDriverLibraryDir()), "DriverLibraries");
    });
  });

  // ==========================================================================
  // RESOLUTION
  // ==========================================================================

  describe("resolve", () => {
    it("returns undefined when nothing matches", async () => {
      const registry = createRegistry();
      await registry.registerDriver({ browserName: "chrome" }, "FakeDriver, FakeDrivers");
      assert.strictEqual(registry.resolve({ browserName: "firefox" }), undefined);
    });

    it("prefers the most specific registration", async () => {
      const registry = createRegistry();
      await registry.registerDriver({ browserName: "chrome", platform: "linux" }, "PointerlessDriver, FakeDrivers");
      await registry.registerDriver({ browserName: "chrome" }, "FakeDriver, FakeDrivers");

      assert.strictEqual(registry.resolve({ browserName: "chrome", platform: "linux" }), PointerlessDriver);
      assert.strictEqual(registry.resolve({ browserName: "chrome", platform: "mac" }), FakeDriver);
    });

    it("prefers the newest of equally specific registrations", async () => {
      const registry = createRegistry();
      await registry.registerDriver({ browserName: "chrome" }, "FakeDriver, FakeDrivers");
      await registry.registerDriver({ platform: "linux" }, "PointerlessDriver, FakeDrivers");
      assert.strictEqual(registry.resolve({ browserName: "chrome", platform: "linux" }), PointerlessDriver);
    });
  });
});
