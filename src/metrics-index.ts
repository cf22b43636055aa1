/**
 * Metrics System - Public API
 *
 * @example
 * ```typescript
 * import { MetricsEmitter, MemorySink, MetricNames } from "./metrics-index.js";
 *
 * const metrics = new MetricsEmitter({ sink: new MemorySink() });
 * metrics.counter(MetricNames.COMMANDS_TOTAL, 1, { command: "mouse_click" });
 * ```
 */

export type {
  MetricValue,
  MetricTags,
  MetricType,
  MetricEvent,
  MetricsSink,
  HistogramSummary,
} from "./metrics-types.js";

export { NoOpSink, MemorySink, CompositeSink, MetricNames } from "./metrics-types.js";

export { commandTags, buildMetricKey } from "./metrics-types.js";

export { MetricsEmitter } from "./metrics-emitter.js";
export type { TimerHandle } from "./metrics-emitter.js";
