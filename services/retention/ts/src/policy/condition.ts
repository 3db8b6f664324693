/**
 * Condition Matcher
 *
 * Decides whether a torrent that a policy governs qualifies for deletion.
 * The checks run in a fixed order and the first decisive one wins:
 *
 *   1. no completion time            -> no match
 *   2. never completed + minimum set -> no match
 *   3. seeded less than the minimum  -> no match, even at a huge ratio
 *   4. ratio at or above the maximum -> match by ratio
 *   5. seeded at least the maximum   -> match by seed time
 *
 * Ratio is tested before seed time, so a torrent satisfying both matches by ratio.
 */

import { createLogger } from '@seedsweep/shared';
import { ConfigurationError } from '../errors.js';
import { computedRatio, describeTorrent, hasValidReportedRatio, isNeverCompleted } from '../torrent.js';
import type { Condition, MatchOutcome, TorrentSnapshot } from '../types.js';

const logger = createLogger('retention:condition');

export interface ConditionOptions {
  maxRatio?: number;
  minSeedingTimeMs?: number;
  maxSeedingTimeMs?: number;
}

export function createCondition(options: ConditionOptions): Condition {
  const { maxRatio, minSeedingTimeMs, maxSeedingTimeMs } = options;

  if (maxRatio === undefined && minSeedingTimeMs === undefined && maxSeedingTimeMs === undefined) {
    throw new ConfigurationError(
      "Set at least one of min_seeding_time, max_seeding_time, max_ratio - otherwise this deletes all a tracker's torrents immediately."
    );
  }
  if (maxRatio !== undefined && (!Number.isFinite(maxRatio) || maxRatio < 0)) {
    throw new ConfigurationError(`max_ratio must be a non-negative number, got ${maxRatio}`);
  }
  for (const [label, value] of [['min_seeding_time', minSeedingTimeMs], ['max_seeding_time', maxSeedingTimeMs]] as const) {
    if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
      throw new ConfigurationError(`${label} must be a non-negative duration, got ${value}ms`);
    }
  }

  return { maxRatio, minSeedingTimeMs, maxSeedingTimeMs };
}

/**
 * Only meaningful once the precondition gate has passed; it is not re-checked here.
 */
export function matches(condition: Condition, torrent: TorrentSnapshot, now: Date): MatchOutcome {
  const { completedAt } = torrent;
  if (completedAt === undefined) {
    logger.debug('Torrent has no completion time, leaving it alone', describeTorrent(torrent));
    return { kind: 'no-match' };
  }

  if (condition.minSeedingTimeMs !== undefined && isNeverCompleted(completedAt)) {
    logger.debug("Unset 'done' time, leaving it alone", describeTorrent(torrent));
    return { kind: 'no-match' };
  }

  const seedingMs = now.getTime() - completedAt.getTime();

  if (condition.minSeedingTimeMs !== undefined && seedingMs < condition.minSeedingTimeMs) {
    logger.debug("Torrent doesn't meet the min seeding time reqs yet", { ...describeTorrent(torrent), seeding_ms: seedingMs });
    return { kind: 'no-match' };
  }

  if (condition.maxRatio !== undefined) {
    const byRatio = matchRatio(condition.maxRatio, torrent);
    if (byRatio) {
      logger.debug('Torrent has a ratio that qualifies it for deletion', { ...describeTorrent(torrent), ...byRatio });
      return byRatio;
    }
  }

  if (condition.maxSeedingTimeMs !== undefined && seedingMs >= condition.maxSeedingTimeMs) {
    logger.debug('Torrent matches seed time requirements', { ...describeTorrent(torrent), seeding_ms: seedingMs });
    return { kind: 'seed-time', seedingMs };
  }

  return { kind: 'no-match' };
}

/**
 * The reported ratio decides when it is usable. Clients report a negative
 * ratio when they have none; only then is uploaded/size consulted.
 */
function matchRatio(maxRatio: number, torrent: TorrentSnapshot): Extract<MatchOutcome, { kind: 'ratio' }> | null {
  if (hasValidReportedRatio(torrent)) {
    return torrent.uploadRatio >= maxRatio ? { kind: 'ratio', ratio: torrent.uploadRatio, source: 'reported' } : null;
  }

  const ratio = computedRatio(torrent);
  return ratio >= maxRatio ? { kind: 'ratio', ratio, source: 'computed' } : null;
}
