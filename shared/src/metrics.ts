/**
 * MetricsRegistry: Prometheus-compatible metrics in text exposition format.
 *
 * Supported metric types:
 *   - Counter: monotonically increasing
 *   - Gauge: point-in-time value
 *   - Histogram: observations sorted into fixed cumulative buckets
 *
 * Series are keyed by their label set. A registry is meant to be created once
 * per process and handed to whatever records into it.
 */

import type { MetricLabels } from './types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

interface CounterEntry {
  type: 'counter';
  help: string;
  values: Map<string, number>;
}

interface GaugeEntry {
  type: 'gauge';
  help: string;
  values: Map<string, number>;
}

interface HistogramSeries {
  buckets: number[];
  sum: number;
  count: number;
}

interface HistogramEntry {
  type: 'histogram';
  help: string;
  bounds: number[];
  values: Map<string, HistogramSeries>;
}

type MetricEntry = CounterEntry | GaugeEntry | HistogramEntry;

/** Max label-set entries per metric. */
const MAX_VALUES_PER_METRIC = 10_000;

export const DEFAULT_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

/**
 * `count` bucket bounds starting at `start`, each `factor` times the previous.
 */
export function exponentialBuckets(start: number, factor: number, count: number): number[] {
  if (start <= 0 || factor <= 1 || count < 1) {
    throw new RangeError('exponentialBuckets needs start > 0, factor > 1 and count >= 1');
  }
  const bounds: number[] = [];
  let bound = start;
  for (let i = 0; i < count; i++) {
    bounds.push(bound);
    bound *= factor;
  }
  return bounds;
}

// ─── MetricsRegistry ──────────────────────────────────────────────────────────

export class MetricsRegistry {
  private metrics = new Map<string, MetricEntry>();

  // ─── Registration ───────────────────────────────────────────────────────────

  registerCounter(name: string, help: string): void {
    if (!this.metrics.has(name)) {
      this.metrics.set(name, { type: 'counter', help, values: new Map() });
    }
  }

  registerGauge(name: string, help: string): void {
    if (!this.metrics.has(name)) {
      this.metrics.set(name, { type: 'gauge', help, values: new Map() });
    }
  }

  registerHistogram(name: string, help: string, bounds: number[] = DEFAULT_BUCKETS): void {
    if (!this.metrics.has(name)) {
      const sorted = [...bounds].sort((a, b) => a - b);
      this.metrics.set(name, { type: 'histogram', help, bounds: sorted, values: new Map() });
    }
  }

  // ─── Recording ──────────────────────────────────────────────────────────────

  increment(name: string, labels?: MetricLabels, amount = 1): void {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== 'counter') return;
    const key = serializeLabels(labels);
    if (!metric.values.has(key) && metric.values.size >= MAX_VALUES_PER_METRIC) return;
    metric.values.set(key, (metric.values.get(key) ?? 0) + amount);
  }

  setGauge(name: string, value: number, labels?: MetricLabels): void {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== 'gauge') return;
    const key = serializeLabels(labels);
    if (!metric.values.has(key) && metric.values.size >= MAX_VALUES_PER_METRIC) return;
    metric.values.set(key, value);
  }

  observe(name: string, value: number, labels?: MetricLabels): void {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== 'histogram') return;
    const key = serializeLabels(labels);
    let series = metric.values.get(key);
    if (!series) {
      if (metric.values.size >= MAX_VALUES_PER_METRIC) return;
      series = { buckets: metric.bounds.map(() => 0), sum: 0, count: 0 };
      metric.values.set(key, series);
    }
    for (let i = 0; i < metric.bounds.length; i++) {
      if (value <= metric.bounds[i]) {
        series.buckets[i]++;
      }
    }
    series.sum += value;
    series.count++;
  }

  // ─── Reading ────────────────────────────────────────────────────────────────

  /** Current counter or gauge value for a label set. */
  getValue(name: string, labels?: MetricLabels): number | undefined {
    const metric = this.metrics.get(name);
    if (!metric || metric.type === 'histogram') return undefined;
    return metric.values.get(serializeLabels(labels));
  }

  /** Observation count and sum of one histogram series. */
  getHistogram(name: string, labels?: MetricLabels): { count: number; sum: number } | undefined {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== 'histogram') return undefined;
    const series = metric.values.get(serializeLabels(labels));
    return series ? { count: series.count, sum: series.sum } : undefined;
  }

  // ─── Scrape / Export ────────────────────────────────────────────────────────

  /**
   * Return all metrics in Prometheus text exposition format.
   */
  serialize(): string {
    const lines: string[] = [];

    for (const [name, metric] of this.metrics) {
      if (metric.values.size === 0) continue;

      lines.push(`# HELP ${name} ${metric.help}`);
      lines.push(`# TYPE ${name} ${metric.type}`);

      if (metric.type === 'histogram') {
        for (const [labelKey, series] of metric.values) {
          metric.bounds.forEach((bound, i) => {
            lines.push(`${name}_bucket{${joinLabels(labelKey, `le="${bound}"`)}} ${series.buckets[i]}`);
          });
          lines.push(`${name}_bucket{${joinLabels(labelKey, 'le="+Inf"')}} ${series.count}`);
          lines.push(`${withLabels(`${name}_sum`, labelKey)} ${series.sum}`);
          lines.push(`${withLabels(`${name}_count`, labelKey)} ${series.count}`);
        }
        continue;
      }

      for (const [labelKey, value] of metric.values) {
        lines.push(`${withLabels(name, labelKey)} ${value}`);
      }
    }

    return lines.join('\n') + '\n';
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function serializeLabels(labels?: MetricLabels): string {
  if (!labels) return '';
  return Object.keys(labels)
    .sort()
    .map((key) => `${key}="${escapeLabelValue(labels[key])}"`)
    .join(',');
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function joinLabels(labelKey: string, extra: string): string {
  return labelKey === '' ? extra : `${labelKey},${extra}`;
}

function withLabels(name: string, labelKey: string): string {
  return labelKey === '' ? name : `${name}{${labelKey}}`;
}
