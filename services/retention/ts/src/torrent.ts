/**
 * Torrent Snapshot helpers
 */

import type { TorrentErrorKind, TorrentSnapshot, TorrentStatus } from './types.js';

/*
 * Transmission status codes:
 * 0: stopped
 * 1: check pending
 * 2: checking
 * 3: download pending
 * 4: downloading
 * 5: seed pending
 * 6: seeding
 */
const STATUS_BY_CODE: readonly TorrentStatus[] = [
  'stopped',
  'queued-to-check',
  'checking',
  'queued-to-download',
  'downloading',
  'queued-to-seed',
  'seeding',
];

const ERROR_BY_CODE: readonly TorrentErrorKind[] = ['ok', 'tracker-warning', 'tracker-error', 'local-error'];

/** Completion time Transmission reports for torrents that never finished. */
export const NEVER_COMPLETED = new Date(0);

export function statusFromCode(code: number): TorrentStatus {
  const status = Number.isInteger(code) ? STATUS_BY_CODE[code] : undefined;
  if (status === undefined) {
    throw new RangeError(`Unknown torrent status code ${code}`);
  }
  return status;
}

export function errorKindFromCode(code: number): TorrentErrorKind {
  const kind = Number.isInteger(code) ? ERROR_BY_CODE[code] : undefined;
  if (kind === undefined) {
    throw new RangeError(`Unknown torrent error code ${code}`);
  }
  return kind;
}

export function isNeverCompleted(completedAt: Date): boolean {
  return completedAt.getTime() === NEVER_COMPLETED.getTime();
}

/**
 * Uploaded bytes over total size. Zero-sized torrents have a ratio of 0.
 */
export function computedRatio(torrent: TorrentSnapshot): number {
  return torrent.totalSize > 0 ? torrent.uploadedBytes / torrent.totalSize : 0;
}

export function hasValidReportedRatio(torrent: TorrentSnapshot): boolean {
  return Number.isFinite(torrent.uploadRatio) && torrent.uploadRatio >= 0;
}

/**
 * Hostnames of the torrent's announce URLs. Announce URLs that do not parse are skipped.
 */
export function trackerHosts(torrent: TorrentSnapshot): string[] {
  const hosts: string[] = [];
  for (const announce of torrent.trackers) {
    try {
      const host = new URL(announce).hostname;
      if (host !== '') {
        hosts.push(host);
      }
    } catch {
      continue;
    }
  }
  return hosts;
}

/**
 * Compact form for log lines.
 */
export function describeTorrent(torrent: TorrentSnapshot): Record<string, unknown> {
  return {
    id: torrent.id,
    hash: torrent.hash,
    name: torrent.name,
    status: torrent.status,
    error: torrent.error,
    error_string: torrent.errorString,
    upload_ratio: torrent.uploadRatio,
    file_count: torrent.fileCount,
    total_size: torrent.totalSize,
    completed_at: torrent.completedAt?.toISOString(),
  };
}
