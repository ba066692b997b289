import { DataError } from './errors.js';

/** JLPT grades, easiest first, plus words graded only as common. */
export const TIERS = ['N5', 'N4', 'N3', 'N2', 'N1', 'COMMON'] as const;

export type DifficultyTier = typeof TIERS[number];

// Lower is easier
const TIER_RANK = new Map<string, number>(TIERS.map((tier, i) => [tier, i + 1]));

export function tierRank(tier: string): number {
  const rank = TIER_RANK.get(tier);
  if (rank === undefined) {
    throw new DataError(`Unknown difficulty tier "${tier}"`);
  }
  return rank;
}
