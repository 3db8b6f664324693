/**
 * Retention Errors
 */

/**
 * The rules or process configuration cannot be used. Raised only while loading.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class TorrentFetchError extends Error {
  constructor(readonly instance: string, cause: unknown) {
    super(`Could not retrieve list of torrents from ${instance}: ${describeCause(cause)}`, { cause });
    this.name = 'TorrentFetchError';
  }
}

export class TorrentRemovalError extends Error {
  constructor(
    readonly instance: string,
    readonly deleteData: boolean,
    readonly count: number,
    cause: unknown
  ) {
    const what = deleteData ? 'torrents with local data' : 'torrent metadata alone';
    super(`Deleting ${what} (${count}) on ${instance} failed: ${describeCause(cause)}`, { cause });
    this.name = 'TorrentRemovalError';
  }
}

/**
 * A supervised task stopped. Tasks are expected to run forever, so a clean
 * return is reported the same way as a failure.
 */
export class TaskExitedError extends Error {
  constructor(readonly task: string, cause?: unknown) {
    super(
      cause === undefined
        ? `Task ${task} exited unexpectedly, but with a success`
        : `Task ${task} exited prematurely: ${describeCause(cause)}`,
      cause === undefined ? undefined : { cause }
    );
    this.name = 'TaskExitedError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
