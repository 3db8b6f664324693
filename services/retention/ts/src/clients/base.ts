/**
 * Base Torrent Repository
 */

import type { TorrentRepository, TorrentSnapshot, TransmissionEndpoint } from '../types.js';

export abstract class BaseTorrentRepository implements TorrentRepository {
  abstract readonly type: string;

  protected endpoint: TransmissionEndpoint;

  constructor(endpoint: TransmissionEndpoint) {
    this.endpoint = endpoint;
  }

  get url(): string {
    return this.endpoint.url;
  }

  abstract list(): Promise<TorrentSnapshot[]>;
  abstract remove(ids: ReadonlySet<string>, deleteData: boolean): Promise<void>;
}
