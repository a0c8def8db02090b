import type { MetricLabels, Metrics } from '../application/ports.js';

export interface HistogramSummary {
  count: number;
  sum: number;
  max: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
}

function seriesKey(name: string, labels?: MetricLabels): string {
  if (!labels) {
    return name;
  }
  const parts = Object.keys(labels)
    .sort()
    .map((key) => `${key}="${labels[key]}"`);
  return parts.length > 0 ? `${name}{${parts.join(',')}}` : name;
}

/**
 * Process-local counters and histogram summaries, keyed by name + labels.
 * Exposed as JSON on /metrics.
 */
export class InMemoryMetrics implements Metrics {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, HistogramSummary>();

  increment(name: string, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
  }

  observe(name: string, value: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    const current = this.histograms.get(key) ?? { count: 0, sum: 0, max: 0 };
    this.histograms.set(key, {
      count: current.count + 1,
      sum: current.sum + value,
      max: Math.max(current.max, value),
    });
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: Object.fromEntries(this.counters),
      histograms: Object.fromEntries(this.histograms),
    };
  }
}

export const noopMetrics: Metrics = {
  increment: () => undefined,
  observe: () => undefined,
};
