/**
 * Precondition Gate
 * Decides whether a policy governs a torrent at all
 */

import { createLogger } from '@seedsweep/shared';
import { ConfigurationError } from '../errors.js';
import { describeTorrent, trackerHosts } from '../torrent.js';
import type { Precondition, TorrentSnapshot } from '../types.js';

const logger = createLogger('retention:precondition');

export interface PreconditionOptions {
  trackers: Iterable<string>;
  minFileCount?: number;
  maxFileCount?: number;
}

export function createPrecondition(options: PreconditionOptions): Precondition {
  const trackers = new Set(options.trackers);
  const { minFileCount, maxFileCount } = options;

  if (trackers.size === 0) {
    throw new ConfigurationError('A precondition needs at least one tracker hostname');
  }
  for (const [label, value] of [['min_file_count', minFileCount], ['max_file_count', maxFileCount]] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw new ConfigurationError(`${label} must be a non-negative integer, got ${value}`);
    }
  }
  if (minFileCount !== undefined && maxFileCount !== undefined && minFileCount > maxFileCount) {
    throw new ConfigurationError(`min_file_count (${minFileCount}) is greater than max_file_count (${maxFileCount})`);
  }

  return { trackers, minFileCount, maxFileCount };
}

/**
 * True when the torrent is seeding, announces to one of the precondition's
 * tracker hosts and has a file count inside the inclusive bounds.
 */
export function governs(precondition: Precondition, torrent: TorrentSnapshot): boolean {
  if (torrent.status !== 'seeding') {
    logger.debug('Torrent is not seeding, bailing', describeTorrent(torrent));
    return false;
  }

  if (!trackerHosts(torrent).some((host) => precondition.trackers.has(host))) {
    logger.debug('Torrent does not have matching trackers', {
      ...describeTorrent(torrent),
      expected: [...precondition.trackers],
    });
    return false;
  }

  const { minFileCount, maxFileCount } = precondition;
  if (
    (minFileCount !== undefined && torrent.fileCount < minFileCount) ||
    (maxFileCount !== undefined && torrent.fileCount > maxFileCount)
  ) {
    logger.debug("Torrent doesn't have the right number of files", {
      ...describeTorrent(torrent),
      min_file_count: minFileCount,
      max_file_count: maxFileCount,
    });
    return false;
  }

  return true;
}
