/**
 * Transmission Torrent Repository
 */

import { Transmission } from '@ctrl/transmission';
import { createLogger } from '@seedsweep/shared';
import { BaseTorrentRepository } from './base.js';
import { errorKindFromCode, statusFromCode } from '../torrent.js';
import type { TorrentSnapshot, TransmissionEndpoint } from '../types.js';

const logger = createLogger('retention:transmission');

const DEFAULT_RPC_PATH = '/transmission/rpc';
const REQUEST_TIMEOUT_MS = 30000;

// Requested on top of the client's default field list
const SNAPSHOT_FIELDS = ['doneDate', 'errorString', 'files', 'trackers', 'uploadedEver', 'uploadRatio'];

/**
 * The torrent fields a snapshot is built from, as Transmission's RPC returns them.
 */
export interface TransmissionTorrentFields {
  id: number;
  hashString: string;
  name: string;
  status: number;
  error: number;
  errorString: string;
  /** Seconds since the epoch; 0 when the torrent never completed */
  doneDate?: number | null;
  uploadRatio: number;
  uploadedEver: number;
  totalSize: number;
  files: readonly unknown[];
  trackers: ReadonlyArray<{ announce: string }>;
}

export function toSnapshot(torrent: TransmissionTorrentFields): TorrentSnapshot {
  return {
    id: torrent.id,
    hash: torrent.hashString,
    name: torrent.name,
    status: statusFromCode(torrent.status),
    error: errorKindFromCode(torrent.error),
    errorString: torrent.errorString,
    completedAt: torrent.doneDate === undefined || torrent.doneDate === null ? undefined : new Date(torrent.doneDate * 1000),
    uploadRatio: torrent.uploadRatio,
    uploadedBytes: torrent.uploadedEver,
    totalSize: torrent.totalSize,
    fileCount: torrent.files.length,
    trackers: torrent.trackers.map((tracker) => tracker.announce),
  };
}

/**
 * Splits a full RPC URL into the client's base URL and RPC path.
 */
export function splitRpcUrl(url: string): { baseUrl: string; path: string } {
  const parsed = new URL(url);
  const rpcPath = parsed.pathname === '' || parsed.pathname === '/' ? DEFAULT_RPC_PATH : parsed.pathname;
  return { baseUrl: parsed.origin, path: rpcPath };
}

export class TransmissionRepository extends BaseTorrentRepository {
  readonly type = 'transmission' as const;
  private client: Transmission;

  constructor(endpoint: TransmissionEndpoint) {
    super(endpoint);
    const { baseUrl, path } = splitRpcUrl(endpoint.url);
    this.client = new Transmission({
      baseUrl,
      path,
      username: endpoint.user,
      password: endpoint.password,
      timeout: REQUEST_TIMEOUT_MS,
    });
  }

  async list(): Promise<TorrentSnapshot[]> {
    const result = await this.client.listTorrents(undefined, SNAPSHOT_FIELDS);
    const torrents = result.arguments.torrents ?? [];
    logger.debug('Listed torrents', { instance: this.url, count: torrents.length });
    return torrents.map((torrent) => toSnapshot(torrent));
  }

  async remove(ids: ReadonlySet<string>, deleteData: boolean): Promise<void> {
    logger.info('Removing torrents', { instance: this.url, count: ids.size, deleteData });
    await this.client.removeTorrent([...ids], deleteData);
  }
}
