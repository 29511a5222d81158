import type { Logger } from "./logger";
import type { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
}

function summarizeDurations(durations: readonly number[]): TimerSummary {
  if (durations.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0 };
  }
  const total = durations.reduce((sum, value) => sum + value, 0);
  return {
    count: durations.length,
    min: Math.min(...durations),
    max: Math.max(...durations),
    avg: Number((total / durations.length).toFixed(2)),
  };
}

/** In-process counters and timers for one archive run. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly durations = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.counter(name) + value);
  }

  counter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  startTimer(name: MetricTimerName, clock: () => number = Date.now): () => number {
    const startedAt = clock();
    return () => {
      const durationMs = clock() - startedAt;
      const recorded = this.durations.get(name);
      if (recorded) {
        recorded.push(durationMs);
      } else {
        this.durations.set(name, [durationMs]);
      }
      return durationMs;
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: {
        digests_candidates: this.counter("digests_candidates"),
        digests_saved: this.counter("digests_saved"),
        digests_empty: this.counter("digests_empty"),
        digests_failed: this.counter("digests_failed"),
        digests_write_failed: this.counter("digests_write_failed"),
      },
      timers: {
        digest_fetch_ms: summarizeDurations(this.durations.get("digest_fetch_ms") ?? []),
        digest_write_ms: summarizeDurations(this.durations.get("digest_write_ms") ?? []),
      },
    };
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", { ...this.snapshot() });
  }
}
