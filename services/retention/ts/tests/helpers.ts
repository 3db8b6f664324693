/**
 * Test helpers: torrent fixtures, an in-memory repository and a manual clock
 */

import type { Clock, TorrentRepository, TorrentSnapshot } from '../src/types.js';

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

export const NOW = new Date('2026-01-15T12:00:00.000Z');

export function ago(ms: number): Date {
  return new Date(NOW.getTime() - ms);
}

export function makeTorrent(overrides: Partial<TorrentSnapshot> = {}): TorrentSnapshot {
  return {
    id: 1,
    hash: 'abcd',
    name: 'testcase',
    status: 'seeding',
    error: 'ok',
    errorString: '',
    completedAt: ago(12 * DAY),
    uploadRatio: 2.0,
    uploadedBytes: 60_000,
    totalSize: 30_000,
    fileCount: 1,
    trackers: ['https://tracker-a.example/announce'],
    ...overrides,
  };
}

export interface Removal {
  ids: string[];
  deleteData: boolean;
}

export class FakeRepository implements TorrentRepository {
  listCalls = 0;
  removals: Removal[] = [];
  listError?: Error;
  /** Fail the removal call whose deleteData flag equals this value */
  failRemovalWithData?: boolean;
  onList?: () => void;

  constructor(public torrents: TorrentSnapshot[] = []) {}

  async list(): Promise<TorrentSnapshot[]> {
    this.listCalls++;
    this.onList?.();
    if (this.listError) {
      throw this.listError;
    }
    return this.torrents;
  }

  async remove(ids: ReadonlySet<string>, deleteData: boolean): Promise<void> {
    if (this.failRemovalWithData === deleteData) {
      throw new Error('disk on fire');
    }
    this.removals.push({ ids: [...ids].sort(), deleteData });
  }
}

/**
 * Time only moves when told to; sleeping advances it instantly, by at most
 * `maxStep` per call when one is given.
 */
export class FakeClock implements Clock {
  sleeps: number[] = [];

  constructor(
    private time: number = NOW.getTime(),
    private maxStep?: number
  ) {}

  now(): Date {
    return new Date(this.time);
  }

  advance(ms: number): void {
    this.time += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += this.maxStep === undefined ? ms : Math.min(ms, this.maxStep);
  }
}
