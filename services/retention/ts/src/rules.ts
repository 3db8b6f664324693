/**
 * Rules Builder
 *
 * The only way to assemble instances and policies:
 *
 *   rules(
 *     transmission('http://localhost:9091/transmission/rpc', { pollInterval: '5 minutes' }),
 *     [
 *       deletePolicy('public', onTrackers(['tracker.example.org']), matching().maxRatio(1.0)),
 *       noopDeletePolicy(null, onTrackers(['other.example.org']).maxFileCount(1), matching().maxSeedingTime('2 weeks')),
 *     ]
 *   )
 */

import { formatDuration, parseDuration, InvalidDurationError } from '@seedsweep/shared';
import { ConfigurationError } from './errors.js';
import { createCondition, type ConditionOptions } from './policy/condition.js';
import { createPrecondition, type PreconditionOptions } from './policy/precondition.js';
import type { Condition, DeletePolicy, Instance, Precondition, TransmissionEndpoint } from './types.js';

export const DEFAULT_POLL_INTERVAL_MS = 5 * 60 * 1000;

/** Duration text ("6 hrs") or milliseconds. */
export type DurationInput = string | number;

export function toMilliseconds(value: DurationInput, field: string): number {
  if (typeof value === 'number') {
    return value;
  }
  try {
    return parseDuration(value);
  } catch (error) {
    if (error instanceof InvalidDurationError) {
      throw new ConfigurationError(`${field}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

// ============================================================================
// Endpoints
// ============================================================================

export interface TransmissionOptions {
  user?: string;
  password?: string;
  pollInterval?: DurationInput;
}

export function transmission(url: string, options: TransmissionOptions = {}): TransmissionEndpoint {
  try {
    new URL(url);
  } catch (error) {
    throw new ConfigurationError(`transmission url ${JSON.stringify(url)} is not a valid URL`, { cause: error });
  }

  const pollIntervalMs =
    options.pollInterval === undefined ? DEFAULT_POLL_INTERVAL_MS : toMilliseconds(options.pollInterval, 'poll_interval');
  if (!(pollIntervalMs > 0)) {
    throw new ConfigurationError(`poll_interval must be positive, got ${pollIntervalMs}ms`);
  }

  return { url, user: options.user, password: options.password, pollIntervalMs };
}

export function describeEndpoint(endpoint: TransmissionEndpoint): string {
  if (endpoint.user !== undefined && endpoint.password !== undefined) {
    return `${endpoint.url} # u:${endpoint.user}:***`;
  }
  if (endpoint.user !== undefined) {
    return `${endpoint.url} # u:${endpoint.user}`;
  }
  return endpoint.url;
}

// ============================================================================
// Preconditions
// ============================================================================

export class PreconditionBuilder {
  private options: PreconditionOptions;

  constructor(trackers: Iterable<string>) {
    this.options = { trackers: [...trackers] };
  }

  minFileCount(count: number): this {
    this.options = { ...this.options, minFileCount: count };
    return this;
  }

  maxFileCount(count: number): this {
    this.options = { ...this.options, maxFileCount: count };
    return this;
  }

  build(): Precondition {
    return createPrecondition(this.options);
  }
}

export function onTrackers(hosts: Iterable<string>): PreconditionBuilder {
  return new PreconditionBuilder(hosts);
}

// ============================================================================
// Conditions
// ============================================================================

export class ConditionBuilder {
  private options: ConditionOptions = {};

  maxRatio(ratio: number): this {
    this.options = { ...this.options, maxRatio: ratio };
    return this;
  }

  minSeedingTime(duration: DurationInput): this {
    this.options = { ...this.options, minSeedingTimeMs: toMilliseconds(duration, 'min_seeding_time') };
    return this;
  }

  maxSeedingTime(duration: DurationInput): this {
    this.options = { ...this.options, maxSeedingTimeMs: toMilliseconds(duration, 'max_seeding_time') };
    return this;
  }

  build(): Condition {
    return createCondition(this.options);
  }
}

export function matching(): ConditionBuilder {
  return new ConditionBuilder();
}

// ============================================================================
// Policies & Instances
// ============================================================================

function buildPolicy(
  name: string | null,
  precondition: PreconditionBuilder | Precondition,
  condition: ConditionBuilder | Condition,
  deleteData: boolean
): DeletePolicy {
  const label = name === null ? 'unnamed policy' : `policy ${JSON.stringify(name)}`;
  try {
    return {
      name,
      precondition: precondition instanceof PreconditionBuilder ? precondition.build() : precondition,
      condition: condition instanceof ConditionBuilder ? condition.build() : condition,
      deleteData,
    };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`${label}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Matching torrents are removed together with their downloaded data.
 */
export function deletePolicy(
  name: string | null,
  precondition: PreconditionBuilder | Precondition,
  condition: ConditionBuilder | Condition
): DeletePolicy {
  return buildPolicy(name, precondition, condition, true);
}

/**
 * Matching torrents are removed from the client; their data stays on disk.
 */
export function noopDeletePolicy(
  name: string | null,
  precondition: PreconditionBuilder | Precondition,
  condition: ConditionBuilder | Condition
): DeletePolicy {
  return buildPolicy(name, precondition, condition, false);
}

export function rules(endpoint: TransmissionEndpoint, policies: readonly DeletePolicy[]): Instance {
  return { transmission: endpoint, policies: [...policies] };
}

// ============================================================================
// Descriptions
// ============================================================================

export function describeCondition(precondition: Precondition, condition: Condition): string {
  const parts = [`[${[...precondition.trackers].join(', ')}]`];

  const { minFileCount, maxFileCount } = precondition;
  if (minFileCount !== undefined || maxFileCount !== undefined) {
    parts.push(`files:${minFileCount ?? ''}..${maxFileCount ?? ''}`);
  }
  if (condition.minSeedingTimeMs !== undefined) {
    parts.push(`min_seeding:${formatDuration(condition.minSeedingTimeMs)}`);
  }
  if (condition.maxSeedingTimeMs !== undefined) {
    parts.push(`max_seeding:${formatDuration(condition.maxSeedingTimeMs)}`);
  }
  if (condition.maxRatio !== undefined) {
    parts.push(`max_ratio:${condition.maxRatio}`);
  }

  return `When:${parts.join(' ')}`;
}

export function describePolicy(policy: DeletePolicy, index: number): string {
  const name = policy.name ?? `#${index}`;
  return `${name}: ${describeCondition(policy.precondition, policy.condition)} delete_data:${policy.deleteData}`;
}
