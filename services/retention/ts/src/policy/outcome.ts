/**
 * Match outcome helpers
 */

import { formatDuration } from '@seedsweep/shared';
import type { MatchOutcome } from '../types.js';

export function isMatch(outcome: MatchOutcome): outcome is Extract<MatchOutcome, { kind: 'ratio' | 'seed-time' }> {
  return outcome.kind === 'ratio' || outcome.kind === 'seed-time';
}

export function describeOutcome(outcome: MatchOutcome): string {
  switch (outcome.kind) {
    case 'not-applicable':
      return 'PreconditionsMismatch';
    case 'no-match':
      return 'None';
    case 'ratio':
      return outcome.source === 'reported' ? `Ratio(${outcome.ratio})` : `ComputedRatio(${outcome.ratio})`;
    case 'seed-time':
      return `SeedTime(${formatDuration(outcome.seedingMs)})`;
  }
}
