/**
 * Precondition gate tests
 *
 * Uses node:test + node:assert.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigurationError } from '../src/errors.js';
import { createPrecondition, governs } from '../src/policy/precondition.js';
import { makeTorrent } from './helpers.js';

describe('governs', () => {
  it('applies inclusive file count bounds', () => {
    const precondition = createPrecondition({ trackers: ['example.com'], minFileCount: 2, maxFileCount: 4 });
    const trackers = ['http://example.com:8080/announce'];

    const results = [1, 2, 3, 4, 5].map((fileCount) => governs(precondition, makeTorrent({ fileCount, trackers })));

    assert.deepEqual(results, [false, true, true, true, false]);
  });

  it('matches tracker hosts exactly', () => {
    const precondition = createPrecondition({ trackers: ['example.com'] });

    assert.equal(governs(precondition, makeTorrent({ trackers: ['http://example.com:8080/announce'] })), true);
    assert.equal(governs(precondition, makeTorrent({ trackers: ['http://example-nomatch.com:8080/announce'] })), false);
  });

  it('compares hostnames case-sensitively', () => {
    const precondition = createPrecondition({ trackers: ['EXAMPLE.COM'] });

    assert.equal(governs(precondition, makeTorrent({ trackers: ['http://example.com/announce'] })), false);
  });

  it('needs only one matching tracker among several', () => {
    const precondition = createPrecondition({ trackers: ['b.example'] });
    const torrent = makeTorrent({ trackers: ['udp://a.example:6969', 'https://b.example/announce'] });

    assert.equal(governs(precondition, torrent), true);
  });

  it('skips announce URLs that do not parse', () => {
    const precondition = createPrecondition({ trackers: ['example.com'] });
    const torrent = makeTorrent({ trackers: ['not a url', 'http://example.com/announce'] });

    assert.equal(governs(precondition, torrent), true);
  });

  it('ignores torrents that are not seeding', () => {
    const precondition = createPrecondition({ trackers: ['tracker-a.example'] });

    assert.equal(governs(precondition, makeTorrent({ status: 'downloading' })), false);
    assert.equal(governs(precondition, makeTorrent({ status: 'stopped' })), false);
    assert.equal(governs(precondition, makeTorrent({ status: 'seeding' })), true);
  });

  it('treats a missing bound as unbounded', () => {
    const precondition = createPrecondition({ trackers: ['tracker-a.example'], minFileCount: 2 });

    assert.equal(governs(precondition, makeTorrent({ fileCount: 100 })), true);
    assert.equal(governs(precondition, makeTorrent({ fileCount: 1 })), false);
  });
});

describe('createPrecondition', () => {
  it('requires a tracker', () => {
    assert.throws(() => createPrecondition({ trackers: [] }), ConfigurationError);
  });

  it('rejects a minimum above the maximum', () => {
    assert.throws(() => createPrecondition({ trackers: ['a.example'], minFileCount: 5, maxFileCount: 2 }), {
      name: 'ConfigurationError',
      message: 'min_file_count (5) is greater than max_file_count (2)',
    });
  });

  it('rejects fractional file counts', () => {
    assert.throws(() => createPrecondition({ trackers: ['a.example'], maxFileCount: 1.5 }), ConfigurationError);
  });
});
