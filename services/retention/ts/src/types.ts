/**
 * Retention Types
 * Torrent snapshots, deletion policies, instances and tick reports
 */

// ============================================================================
// Process Configuration
// ============================================================================

export interface RetentionConfig {
  /** Path to the YAML rules file */
  rules_path: string;
  /** When false every tick is a dry run */
  take_action: boolean;
  /** `host:port` for the metrics endpoint; metrics are not served when unset */
  metrics_addr?: string;
}

// ============================================================================
// Torrent Snapshots
// ============================================================================

export type TorrentStatus =
  | 'stopped'
  | 'queued-to-check'
  | 'checking'
  | 'queued-to-download'
  | 'downloading'
  | 'queued-to-seed'
  | 'seeding';

export type TorrentErrorKind = 'ok' | 'tracker-warning' | 'tracker-error' | 'local-error';

/**
 * One torrent as seen during a single tick.
 */
export interface TorrentSnapshot {
  readonly id: number;
  readonly hash: string;
  readonly name: string;
  readonly status: TorrentStatus;
  readonly error: TorrentErrorKind;
  readonly errorString: string;
  /** Undefined when the client did not report it; the epoch means "never completed" */
  readonly completedAt?: Date;
  /** As reported by the client; negative values mean the client has no usable ratio */
  readonly uploadRatio: number;
  readonly uploadedBytes: number;
  readonly totalSize: number;
  readonly fileCount: number;
  /** Announce URLs */
  readonly trackers: readonly string[];
}

// ============================================================================
// Policies
// ============================================================================

/**
 * Decides whether a policy considers a torrent at all.
 */
export interface Precondition {
  /** Tracker hostnames, compared exactly against each announce URL's host */
  readonly trackers: ReadonlySet<string>;
  readonly minFileCount?: number;
  readonly maxFileCount?: number;
}

/**
 * Decides whether a governed torrent may be deleted. At least one threshold is set.
 */
export interface Condition {
  readonly maxRatio?: number;
  readonly minSeedingTimeMs?: number;
  readonly maxSeedingTimeMs?: number;
}

export interface DeletePolicy {
  readonly name: string | null;
  readonly precondition: Precondition;
  readonly condition: Condition;
  /** Remove downloaded data along with the torrent */
  readonly deleteData: boolean;
}

export type RatioSource = 'reported' | 'computed';

export type MatchOutcome =
  | { readonly kind: 'not-applicable' }
  | { readonly kind: 'no-match' }
  | { readonly kind: 'ratio'; readonly ratio: number; readonly source: RatioSource }
  | { readonly kind: 'seed-time'; readonly seedingMs: number };

export type MatchKind = MatchOutcome['kind'];

// ============================================================================
// Instances
// ============================================================================

export interface TransmissionEndpoint {
  /** Full RPC URL, e.g. http://localhost:9091/transmission/rpc */
  readonly url: string;
  readonly user?: string;
  readonly password?: string;
  readonly pollIntervalMs: number;
}

export interface Instance {
  readonly transmission: TransmissionEndpoint;
  readonly policies: readonly DeletePolicy[];
}

// ============================================================================
// Torrent Repository
// ============================================================================

export interface TorrentRepository {
  list(): Promise<TorrentSnapshot[]>;
  /** Removes torrents by hash; removing an id twice is harmless */
  remove(ids: ReadonlySet<string>, deleteData: boolean): Promise<void>;
}

// ============================================================================
// Evaluation & Ticks
// ============================================================================

export interface PolicyObservation {
  readonly policy: string;
  readonly torrent: TorrentSnapshot;
  readonly outcome: Exclude<MatchOutcome, { kind: 'not-applicable' }>;
  readonly deleteData: boolean;
}

export interface PolicyTotals {
  count: number;
  totalSize: number;
}

export interface Evaluation {
  /** One entry per (torrent, policy) pair that passed the precondition */
  readonly observations: PolicyObservation[];
  readonly totals: Map<string, PolicyTotals>;
  readonly deleteWithData: Set<string>;
  readonly deleteWithoutData: Set<string>;
}

export interface TickReport {
  instance: string;
  ok: boolean;
  dryRun: boolean;
  durationMs: number;
  fetched: number;
  matched: number;
  removedWithData: number;
  removedWithoutData: number;
  error?: string;
}

export interface Clock {
  now(): Date;
  /** Resolves after `ms`, or early when `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
