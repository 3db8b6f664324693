/**
 * Deletion Policy Set
 * Resolves every torrent against every policy of an instance and routes the matches
 */

import { governs } from './precondition.js';
import { matches } from './condition.js';
import { isMatch } from './outcome.js';
import type { DeletePolicy, Evaluation, MatchOutcome, TorrentSnapshot } from '../types.js';

/**
 * Name used for reporting: the policy's name, or its position in the instance's list.
 */
export function policyLabel(policy: DeletePolicy, index: number): string {
  return policy.name ?? String(index);
}

export function evaluatePolicy(policy: DeletePolicy, torrent: TorrentSnapshot, now: Date): MatchOutcome {
  if (!governs(policy.precondition, torrent)) {
    return { kind: 'not-applicable' };
  }
  return matches(policy.condition, torrent, now);
}

/**
 * Pure aggregation over one tick's torrents. Torrents a policy does not govern
 * leave no trace for that policy. A torrent matched by several policies may
 * land in both delete sets.
 */
export function evaluateTorrents(
  policies: readonly DeletePolicy[],
  torrents: readonly TorrentSnapshot[],
  now: Date
): Evaluation {
  const evaluation: Evaluation = {
    observations: [],
    totals: new Map(),
    deleteWithData: new Set(),
    deleteWithoutData: new Set(),
  };

  for (const torrent of torrents) {
    policies.forEach((policy, index) => {
      const outcome = evaluatePolicy(policy, torrent, now);
      if (outcome.kind === 'not-applicable') {
        return;
      }

      const label = policyLabel(policy, index);
      const totals = evaluation.totals.get(label) ?? { count: 0, totalSize: 0 };
      totals.count += 1;
      totals.totalSize += torrent.totalSize;
      evaluation.totals.set(label, totals);

      evaluation.observations.push({ policy: label, torrent, outcome, deleteData: policy.deleteData });

      if (isMatch(outcome)) {
        (policy.deleteData ? evaluation.deleteWithData : evaluation.deleteWithoutData).add(torrent.hash);
      }
    });
  }

  return evaluation;
}
