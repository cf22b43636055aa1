/**
 * Pluggable Metrics System
 *
 * The core emits metric events and does not know about backends.
 * Sinks decide what to do with them (keep in memory, push, expose).
 */

// =============================================================================
// CORE TYPES
// =============================================================================

export type MetricValue = number | string | boolean;

/**
 * Tags for metric dimensionality.
 */
export type MetricTags = Record<string, MetricValue | undefined>;

/**
 * - COUNTER: Monotonically increasing (commands_total)
 * - GAUGE: Point-in-time value (sessions_active)
 * - HISTOGRAM: Distribution of values (command_duration_ms)
 */
export type MetricType = "counter" | "gauge" | "histogram";

export interface MetricEvent {
  name: string;
  type: MetricType;
  value: number;
  tags?: MetricTags;
  /** Epoch ms (defaults to now) */
  timestamp?: number;
}

// =============================================================================
// SINK INTERFACE
// =============================================================================

/**
 * MetricsSink - Interface for metric backends.
 * `record` is called for every metric and should be fast.
 */
export interface MetricsSink {
  record(event: MetricEvent): void;

  /** Flush buffered metrics; called on shutdown. */
  flush?(): Promise<void>;

  /** Sink-specific snapshot, for diagnostics. */
  getMetrics?(): Record<string, unknown>;
}

// =============================================================================
// BUILT-IN SINKS
// =============================================================================

/**
 * NoOpSink - Discards all metrics (default).
 */
export class NoOpSink implements MetricsSink {
  record(_event: MetricEvent): void {
    // Discard
  }
}

export interface HistogramSummary {
  sum: number;
  count: number;
  min: number;
  max: number;
}

/**
 * MemorySink - Aggregates counters, gauges and histograms in maps.
 * Keys are `name{tag=value,...}` with tags sorted by name.
 */
export class MemorySink implements MetricsSink {
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private histograms = new Map<string, HistogramSummary>();

  record(event: MetricEvent): void {
    const key = buildMetricKey(event.name, event.tags);

    switch (event.type) {
      case "counter":
        this.counters.set(key, (this.counters.get(key) ?? 0) + event.value);
        break;

      case "gauge":
        this.gauges.set(key, event.value);
        break;

      case "histogram": {
        const hist = this.histograms.get(key) ?? { sum: 0, count: 0, min: Infinity, max: -Infinity };
        hist.sum += event.value;
        hist.count++;
        hist.min = Math.min(hist.min, event.value);
        hist.max = Math.max(hist.max, event.value);
        this.histograms.set(key, hist);
        break;
      }
    }
  }

  getCounter(name: string, tags?: MetricTags): number {
    return this.counters.get(buildMetricKey(name, tags)) ?? 0;
  }

  getGauge(name: string, tags?: MetricTags): number | undefined {
    return this.gauges.get(buildMetricKey(name, tags));
  }

  getHistogram(name: string, tags?: MetricTags): HistogramSummary | undefined {
    return this.histograms.get(buildMetricKey(name, tags));
  }

  getMetrics(): Record<string, unknown> {
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms: Object.fromEntries(
        Array.from(this.histograms.entries()).map(([k, v]) => [k, { ...v, avg: v.sum / v.count }])
      ),
    };
  }

  clear(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }
}

/**
 * CompositeSink - Fan-out to multiple sinks.
 */
export class CompositeSink implements MetricsSink {
  constructor(private sinks: MetricsSink[]) {}

  record(event: MetricEvent): void {
    for (const sink of this.sinks) {
      try {
        sink.record(event);
      } catch (error) {
        // One failing sink must not break the others
        console.error(`[CompositeSink] Sink failed to record:`, error);
      }
    }
  }

  async flush(): Promise<void> {
    await Promise.all(
      this.sinks.map(async (sink) => {
        try {
          await sink.flush?.();
        } catch (err) {
          console.error(`[CompositeSink] Sink failed to flush:`, err);
        }
      })
    );
  }

  getMetrics(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const sink of this.sinks) {
      if (sink.getMetrics) {
        Object.assign(result, sink.getMetrics());
      }
    }
    return result;
  }
}

// =============================================================================
// METRIC NAMES
// =============================================================================

/**
 * Standard metric names (Prometheus conventions).
 */
export const MetricNames = {
  // Sessions
  SESSIONS_ACTIVE: "automation_server_sessions_active",
  SESSIONS_CREATED_TOTAL: "automation_server_sessions_created_total",
  SESSIONS_REMOVED_TOTAL: "automation_server_sessions_removed_total",
  SESSION_CREATION_FAILURES_TOTAL: "automation_server_session_creation_failures_total",

  // Commands
  HANDLERS_CREATED_TOTAL: "automation_server_handlers_created_total",
  UNSUPPORTED_COMMANDS_TOTAL: "automation_server_unsupported_commands_total",
  COMMANDS_TOTAL: "automation_server_commands_total",
  COMMANDS_DURATION_MS: "automation_server_commands_duration_ms",

  // Drivers
  DRIVERS_REGISTERED_TOTAL: "automation_server_drivers_registered_total",
  DRIVER_REGISTRATION_FAILURES_TOTAL: "automation_server_driver_registration_failures_total",
  DRIVER_MODULES_LOADED_TOTAL: "automation_server_driver_modules_loaded_total",
} as const;

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Create standard tags for a command.
 */
export function commandTags(commandId: string, success?: boolean): MetricTags {
  return { command: commandId, success };
}

export function buildMetricKey(name: string, tags?: MetricTags): string {
  if (!tags) return name;

  const tagStr = Object.entries(tags)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join(",");

  return tagStr ? `${name}{${tagStr}}` : name;
}
