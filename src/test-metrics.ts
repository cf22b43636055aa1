/**
 * Unit tests for metrics-types.ts and metrics-emitter.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { MetricsEmitter } from "./metrics-emitter.js";
import { CompositeSink, MemorySink, MetricNames, buildMetricKey, commandTags } from "./metrics-types.js";

describe("metrics", () => {
  describe("buildMetricKey", () => {
    it("sorts tags and drops undefined ones", () => {
      assert.strictEqual(
        buildMetricKey("m", { success: true, command: "quit", extra: undefined }),
        "m{command=quit,success=true}"
      );
      assert.strictEqual(buildMetricKey("m", { extra: undefined }), "m");
      assert.strictEqual(buildMetricKey("m"), "m");
    });

    it("commandTags leaves success out until known", () => {
      assert.strictEqual(buildMetricKey("m", commandTags("quit")), "m{command=quit}");
    });
  });

  describe("MemorySink", () => {
    it("aggregates counters, gauges and histograms", () => {
      const sink = new MemorySink();
      const metrics = new MetricsEmitter({ sink });

      metrics.counter(MetricNames.SESSIONS_CREATED_TOTAL);
      metrics.counter(MetricNames.SESSIONS_CREATED_TOTAL, 2);
      metrics.gauge(MetricNames.SESSIONS_ACTIVE, 4);
      metrics.gauge(MetricNames.SESSIONS_ACTIVE, 3);
      metrics.histogram(MetricNames.COMMANDS_DURATION_MS, 10);
      metrics.histogram(MetricNames.COMMANDS_DURATION_MS, 30);

      assert.strictEqual(sink.getCounter(MetricNames.SESSIONS_CREATED_TOTAL), 3);
      assert.strictEqual(sink.getGauge(MetricNames.SESSIONS_ACTIVE), 3);
      assert.deepStrictEqual(sink.getHistogram(MetricNames.COMMANDS_DURATION_MS), {
        sum: 40,
        count: 2,
        min: 10,
        max: 30,
      });

      sink.clear();
      assert.strictEqual(sink.getCounter(MetricNames.SESSIONS_CREATED_TOTAL), 0);
    });
  });

  describe("MetricsEmitter", () => {
    it("adds default tags", () => {
      const sink = new MemorySink();
      const metrics = new MetricsEmitter({ sink, defaultTags: { server: "a" } });
      metrics.counter(MetricNames.COMMANDS_TOTAL, 1, { command: "quit" });
      assert.strictEqual(sink.getCounter(MetricNames.COMMANDS_TOTAL, { command: "quit", server: "a" }), 1);
    });

    it("records a timer once", () => {
      const sink = new MemorySink();
      const metrics = new MetricsEmitter({ sink });
      const timer = metrics.startTimer(MetricNames.COMMANDS_DURATION_MS, { command: "quit" });
      timer.end({ success: true });
      timer.end({ success: true });
      assert.strictEqual(
        sink.getHistogram(MetricNames.COMMANDS_DURATION_MS, { command: "quit", success: true })?.count,
        1
      );
    });
  });

  describe("CompositeSink", () => {
    it("fans out to every sink", async () => {
      const first = new MemorySink();
      const second = new MemorySink();
      const metrics = new MetricsEmitter({ sink: new CompositeSink([first, second]) });

      metrics.counter(MetricNames.DRIVERS_REGISTERED_TOTAL);
      await metrics.flush();

      assert.strictEqual(first.getCounter(MetricNames.DRIVERS_REGISTERED_TOTAL), 1);
      assert.strictEqual(second.getCounter(MetricNames.DRIVERS_REGISTERED_TOTAL), 1);
      assert.deepStrictEqual(metrics.getMetrics(), {
        counters: { [MetricNames.DRIVERS_REGISTERED_TOTAL]: 1 },
        gauges: {},
        histograms: {},
      });
    });
  });
});
