/**
 * Metrics Emitter - Central point for emitting metrics.
 *
 * Usage:
 * ```typescript
 * const metrics = new MetricsEmitter({ sink: new MemorySink() });
 *
 * metrics.counter(MetricNames.SESSIONS_CREATED_TOTAL);
 * metrics.gauge(MetricNames.SESSIONS_ACTIVE, store.sessionCount);
 *
 * const timer = metrics.startTimer(MetricNames.COMMANDS_DURATION_MS, { command });
 * await handler.execute();
 * timer.end({ success: true });
 * ```
 */

import type { MetricEvent, MetricTags, MetricsSink } from "./metrics-types.js";
import { NoOpSink } from "./metrics-types.js";

/**
 * Timer handle for duration tracking.
 */
export interface TimerHandle {
  /** End the timer and record the duration. */
  end(tags?: MetricTags): void;
}

export class MetricsEmitter {
  private sink: MetricsSink;
  private defaultTags: MetricTags;

  constructor(
    options: {
      sink?: MetricsSink;
      /** Tags to add to all metrics */
      defaultTags?: MetricTags;
    } = {}
  ) {
    this.sink = options.sink ?? new NoOpSink();
    this.defaultTags = options.defaultTags ?? {};
  }

  getSink(): MetricsSink {
    return this.sink;
  }

  counter(name: string, value = 1, tags?: MetricTags): void {
    this.emit({ name, type: "counter", value, tags: this.mergeTags(tags) });
  }

  gauge(name: string, value: number, tags?: MetricTags): void {
    this.emit({ name, type: "gauge", value, tags: this.mergeTags(tags) });
  }

  histogram(name: string, value: number, tags?: MetricTags): void {
    this.emit({ name, type: "histogram", value, tags: this.mergeTags(tags) });
  }

  /**
   * Start a timer that records a histogram value when ended.
   * Only the first `end()` records.
   */
  startTimer(name: string, tags?: MetricTags): TimerHandle {
    const startTime = Date.now();
    let recorded = false;

    return {
      end: (extraTags?: MetricTags) => {
        if (recorded) return;
        recorded = true;
        this.histogram(name, Date.now() - startTime, { ...tags, ...extraTags });
      },
    };
  }

  async flush(): Promise<void> {
    if (!this.sink.flush) return;
    try {
      await this.sink.flush();
    } catch (error) {
      console.error("[MetricsEmitter] Failed to flush:", error);
    }
  }

  getMetrics(): Record<string, unknown> | undefined {
    return this.sink.getMetrics?.();
  }

  private emit(event: MetricEvent): void {
    try {
      this.sink.record({ ...event, timestamp: event.timestamp ?? Date.now() });
    } catch (error) {
      // Metrics must never break command execution
      console.error(`[MetricsEmitter] Failed to record metric '${event.name}':`, error);
    }
  }

  private mergeTags(tags?: MetricTags): MetricTags | undefined {
    if (Object.keys(this.defaultTags).length === 0) return tags;
    return { ...this.defaultTags, ...tags };
  }
}
