/**
 * Retention Metrics
 *
 * One instance per process, created at startup and handed to every poller and
 * to the metrics server. Series are keyed by transmission URL (and policy).
 */

import { MetricsRegistry, exponentialBuckets } from '@seedsweep/shared';

export const METRIC_TICK_DURATION = 'instance_tick_duration_ms';
export const METRIC_TICK_FAILURES = 'instance_tick_failure_count';
export const METRIC_TORRENT_SIZES = 'torrent_sizes_bytes';
export const METRIC_TORRENT_DELETIONS = 'torrent_deletion_count';
export const METRIC_POLICY_COUNT = 'policy_torrent_count';
export const METRIC_POLICY_SIZE = 'policy_torrent_size_bytes';

// 500MB, then doubling up to about a terabyte
const TORRENT_SIZE_BUCKETS = exponentialBuckets(0.5e9, 2, 11);

const TICK_DURATION_BUCKETS = [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000];

export class RetentionMetrics {
  readonly registry: MetricsRegistry;

  constructor(registry: MetricsRegistry = new MetricsRegistry()) {
    this.registry = registry;
    registry.registerHistogram(
      METRIC_TICK_DURATION,
      'Time one fetch, evaluate and act cycle took against a transmission instance',
      TICK_DURATION_BUCKETS
    );
    registry.registerCounter(METRIC_TICK_FAILURES, 'Number of times that a tick against the instance failed');
    registry.registerHistogram(
      METRIC_TORRENT_SIZES,
      'Histogram of torrent size. Use sum and count to see total size on a tracker, and count of torrents.',
      TORRENT_SIZE_BUCKETS
    );
    registry.registerCounter(METRIC_TORRENT_DELETIONS, 'Number of torrents that got deleted, per instance/policy');
    registry.registerGauge(METRIC_POLICY_COUNT, 'Number of torrents a policy governed during the latest tick');
    registry.registerGauge(METRIC_POLICY_SIZE, 'Total size of the torrents a policy governed during the latest tick');
  }

  recordTickDuration(instance: string, durationMs: number): void {
    this.registry.observe(METRIC_TICK_DURATION, durationMs, { transmission_url: instance });
  }

  recordTickFailure(instance: string): void {
    this.registry.increment(METRIC_TICK_FAILURES, { transmission_url: instance });
  }

  trackSize(instance: string, policy: string, sizeBytes: number): void {
    this.registry.observe(METRIC_TORRENT_SIZES, sizeBytes, { transmission_url: instance, policy });
  }

  trackDeletion(instance: string, policy: string): void {
    this.registry.increment(METRIC_TORRENT_DELETIONS, { transmission_url: instance, policy });
  }

  updateCount(instance: string, policy: string, count: number): void {
    this.registry.setGauge(METRIC_POLICY_COUNT, count, { transmission_url: instance, policy });
  }

  updateSize(instance: string, policy: string, sizeBytes: number): void {
    this.registry.setGauge(METRIC_POLICY_SIZE, sizeBytes, { transmission_url: instance, policy });
  }

  tickFailures(instance: string): number {
    return this.registry.getValue(METRIC_TICK_FAILURES, { transmission_url: instance }) ?? 0;
  }

  tickCount(instance: string): number {
    return this.registry.getHistogram(METRIC_TICK_DURATION, { transmission_url: instance })?.count ?? 0;
  }

  serialize(): string {
    return this.registry.serialize();
  }
}
