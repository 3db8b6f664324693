/**
 * Instance Poller
 *
 * Drives one instance forever: wait for the tick, fetch the torrent list,
 * evaluate every policy, remove what matched (unless dry running) and report.
 * Ticks never overlap. A failed tick is logged and counted, and the loop
 * carries on with the next one.
 */

import { createLogger, formatDuration, type Logger } from '@seedsweep/shared';
import { TorrentFetchError, TorrentRemovalError } from './errors.js';
import { describeOutcome, isMatch } from './policy/outcome.js';
import { describeTorrent } from './torrent.js';
import { evaluateTorrents, policyLabel } from './policy/policy-set.js';
import type { RetentionMetrics } from './metrics.js';
import type { Clock, Evaluation, Instance, TickReport, TorrentRepository, TorrentSnapshot } from './types.js';

const logger = createLogger('retention:poller');

export type PollerState = 'idle' | 'fetching' | 'evaluating' | 'acting';

/** Longest delay a single timer can hold; longer sleeps are chained. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      let remaining = ms;
      let timer: NodeJS.Timeout | undefined;
      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const schedule = () => {
        const step = Math.min(remaining, MAX_TIMER_MS);
        remaining -= step;
        timer = setTimeout(remaining > 0 ? schedule : done, step);
      };
      signal?.addEventListener('abort', done, { once: true });
      schedule();
    }),
};

export interface PollerOptions {
  instance: Instance;
  repository: TorrentRepository;
  metrics: RetentionMetrics;
  /** When false, removals are only logged */
  takeAction: boolean;
  clock?: Clock;
}

export class Poller {
  readonly instance: Instance;
  private repository: TorrentRepository;
  private metrics: RetentionMetrics;
  private takeAction: boolean;
  private clock: Clock;
  private logger: Logger;
  private currentState: PollerState = 'idle';

  constructor(options: PollerOptions) {
    this.instance = options.instance;
    this.repository = options.repository;
    this.metrics = options.metrics;
    this.takeAction = options.takeAction;
    this.clock = options.clock ?? systemClock;
    this.logger = logger.child('instance', { instance: this.url });
  }

  get url(): string {
    return this.instance.transmission.url;
  }

  get state(): PollerState {
    return this.currentState;
  }

  /**
   * Tick until `signal` aborts. The first tick fires at once; later ticks keep
   * to the poll interval, and a tick that overruns it is followed straight away
   * by the next one without replaying the slots it missed.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const interval = this.instance.transmission.pollIntervalMs;
    this.logger.info('Running', { poll_interval: formatDuration(interval), take_action: this.takeAction });

    let next = this.clock.now().getTime();
    while (!signal?.aborted) {
      // A clock may wake early; only the schedule decides when to tick
      let wait = next - this.clock.now().getTime();
      while (wait > 0 && !signal?.aborted) {
        await this.clock.sleep(wait, signal);
        wait = next - this.clock.now().getTime();
      }
      if (signal?.aborted) break;

      this.logger.debug('Polling');
      const report = await this.tick();
      if (report.ok) {
        this.logger.debug('Polling succeeded', { duration_ms: report.durationMs, fetched: report.fetched });
      }

      next += interval;
      const now = this.clock.now().getTime();
      if (next < now) {
        next = now;
      }
    }

    this.logger.info('Stopped polling');
  }

  /**
   * One fetch, evaluate and act cycle. Never rejects: failures end up in the
   * report, the failure counter and the log.
   */
  async tick(): Promise<TickReport> {
    const startedAt = Date.now();
    const report: TickReport = {
      instance: this.url,
      ok: false,
      dryRun: !this.takeAction,
      durationMs: 0,
      fetched: 0,
      matched: 0,
      removedWithData: 0,
      removedWithoutData: 0,
    };

    try {
      this.currentState = 'fetching';
      const torrents = await this.fetch();
      report.fetched = torrents.length;

      this.currentState = 'evaluating';
      const evaluation = evaluateTorrents(this.instance.policies, torrents, this.clock.now());
      report.matched = this.record(evaluation);

      this.currentState = 'acting';
      await this.act(evaluation, report);

      report.ok = true;
    } catch (error) {
      report.error = error instanceof Error ? error.message : String(error);
      this.metrics.recordTickFailure(this.url);
      this.logger.warn('Error polling', { error: report.error });
    } finally {
      this.currentState = 'idle';
      report.durationMs = Date.now() - startedAt;
      this.metrics.recordTickDuration(this.url, report.durationMs);
    }

    return report;
  }

  private async fetch(): Promise<TorrentSnapshot[]> {
    try {
      return await this.repository.list();
    } catch (error) {
      throw new TorrentFetchError(this.url, error);
    }
  }

  /**
   * Feeds the evaluation into metrics and logs the matches. Returns the number
   * of matching (torrent, policy) pairs.
   */
  private record(evaluation: Evaluation): number {
    let matched = 0;

    for (const observation of evaluation.observations) {
      const { policy, torrent, outcome } = observation;
      this.metrics.trackSize(this.url, policy, torrent.totalSize);

      if (isMatch(outcome)) {
        matched++;
        this.metrics.trackDeletion(this.url, policy);
        this.logger.info('Matched torrent', {
          ...describeTorrent(torrent),
          matched_policy: policy,
          outcome: describeOutcome(outcome),
          take_action: this.takeAction,
          delete_data: observation.deleteData,
        });
      }
    }

    this.instance.policies.forEach((policy, index) => {
      const label = policyLabel(policy, index);
      const totals = evaluation.totals.get(label) ?? { count: 0, totalSize: 0 };
      this.metrics.updateCount(this.url, label, totals.count);
      this.metrics.updateSize(this.url, label, totals.totalSize);
    });

    return matched;
  }

  /**
   * Removal with data goes first. A failing call ends the tick; a call that
   * already went through is not undone.
   */
  private async act(evaluation: Evaluation, report: TickReport): Promise<void> {
    const batches = [
      { ids: evaluation.deleteWithData, deleteData: true },
      { ids: evaluation.deleteWithoutData, deleteData: false },
    ];

    for (const { ids, deleteData } of batches) {
      if (ids.size === 0) continue;

      if (!this.takeAction) {
        this.logger.info('Dry run, would remove torrents', { count: ids.size, delete_data: deleteData, ids: [...ids] });
        continue;
      }

      this.logger.info(deleteData ? 'Deleting data...' : 'Deleting torrents without data...', {
        torrents_to_delete: ids.size,
      });
      try {
        await this.repository.remove(ids, deleteData);
      } catch (error) {
        throw new TorrentRemovalError(this.url, deleteData, ids.size, error);
      }

      if (deleteData) {
        report.removedWithData = ids.size;
      } else {
        report.removedWithoutData = ids.size;
      }
    }
  }
}
