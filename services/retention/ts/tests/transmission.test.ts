/**
 * Transmission repository tests (no RPC calls)
 *
 * Uses node:test + node:assert.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TransmissionRepository, splitRpcUrl, toSnapshot, type TransmissionTorrentFields } from '../src/clients/transmission.js';
import { transmission } from '../src/rules.js';
import { isNeverCompleted } from '../src/torrent.js';

function fields(overrides: Partial<TransmissionTorrentFields> = {}): TransmissionTorrentFields {
  return {
    id: 7,
    hashString: 'f00dfeed',
    name: 'Some.Linux.iso',
    status: 6,
    error: 0,
    errorString: '',
    doneDate: 1_700_000_000,
    uploadRatio: 1.5,
    uploadedEver: 150,
    totalSize: 100,
    files: [{}, {}],
    trackers: [{ announce: 'https://tracker.example.org/announce' }],
    ...overrides,
  };
}

describe('toSnapshot', () => {
  it('maps RPC fields onto a snapshot', () => {
    assert.deepEqual(toSnapshot(fields()), {
      id: 7,
      hash: 'f00dfeed',
      name: 'Some.Linux.iso',
      status: 'seeding',
      error: 'ok',
      errorString: '',
      completedAt: new Date(1_700_000_000_000),
      uploadRatio: 1.5,
      uploadedBytes: 150,
      totalSize: 100,
      fileCount: 2,
      trackers: ['https://tracker.example.org/announce'],
    });
  });

  it('keeps a zero done date as the never-completed sentinel', () => {
    const { completedAt } = toSnapshot(fields({ doneDate: 0 }));

    assert.ok(completedAt !== undefined && isNeverCompleted(completedAt));
  });

  it('leaves the completion time out when the client omits it', () => {
    assert.equal(toSnapshot(fields({ doneDate: null })).completedAt, undefined);
  });

  it('maps status and error codes', () => {
    const snapshot = toSnapshot(fields({ status: 4, error: 2 }));

    assert.equal(snapshot.status, 'downloading');
    assert.equal(snapshot.error, 'tracker-error');
  });

  it('rejects unknown status codes', () => {
    assert.throws(() => toSnapshot(fields({ status: 9 })), RangeError);
  });
});

describe('splitRpcUrl', () => {
  it('splits origin and RPC path', () => {
    assert.deepEqual(splitRpcUrl('https://seedbox.example/custom/rpc'), {
      baseUrl: 'https://seedbox.example',
      path: '/custom/rpc',
    });
  });

  it('defaults the RPC path', () => {
    assert.deepEqual(splitRpcUrl('http://localhost:9091'), {
      baseUrl: 'http://localhost:9091',
      path: '/transmission/rpc',
    });
  });
});

describe('TransmissionRepository', () => {
  it('is keyed by the endpoint URL', () => {
    const repository = new TransmissionRepository(
      transmission('http://localhost:9091/transmission/rpc', { user: 'admin', password: 'test-secret' })
    );

    assert.equal(repository.type, 'transmission');
    assert.equal(repository.url, 'http://localhost:9091/transmission/rpc');
  });
});
