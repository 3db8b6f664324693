/**
 * Torrent snapshot helper tests
 *
 * Uses node:test + node:assert.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { computedRatio, describeTorrent, errorKindFromCode, trackerHosts } from '../src/torrent.js';
import { makeTorrent } from './helpers.js';

describe('describeTorrent', () => {
  it('carries the error kind and message for log lines', () => {
    const torrent = makeTorrent({
      id: 3,
      hash: 'beef',
      name: 'broken',
      error: 'tracker-error',
      errorString: 'unregistered torrent',
      completedAt: new Date('2026-01-03T12:00:00.000Z'),
    });

    assert.deepEqual(describeTorrent(torrent), {
      id: 3,
      hash: 'beef',
      name: 'broken',
      status: 'seeding',
      error: 'tracker-error',
      error_string: 'unregistered torrent',
      upload_ratio: 2,
      file_count: 1,
      total_size: 30_000,
      completed_at: '2026-01-03T12:00:00.000Z',
    });
  });

  it('leaves the completion time out when unknown', () => {
    assert.equal(describeTorrent(makeTorrent({ completedAt: undefined })).completed_at, undefined);
  });
});

describe('torrent helpers', () => {
  it('maps error codes', () => {
    assert.equal(errorKindFromCode(3), 'local-error');
    assert.throws(() => errorKindFromCode(4), RangeError);
  });

  it('computes the ratio from uploaded bytes', () => {
    assert.equal(computedRatio(makeTorrent({ uploadedBytes: 45_000, totalSize: 30_000 })), 1.5);
    assert.equal(computedRatio(makeTorrent({ uploadedBytes: 45_000, totalSize: 0 })), 0);
  });

  it('extracts hosts from announce URLs', () => {
    const torrent = makeTorrent({ trackers: ['udp://tracker.example.org:6969/announce', '::bogus::'] });

    assert.deepEqual(trackerHosts(torrent), ['tracker.example.org']);
  });
});
