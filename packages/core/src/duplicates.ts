// Near-duplicate resolution across the whole normalized word set

import { dp } from './debug.js';
import { USUALLY_KANA_TAG } from './tags.js';
import { tierRank } from './tiers.js';
import type { NormalizedRecord } from './types.js';

// Tier is checked at run time, so any label is accepted here
type DuplicateCandidate = Pick<NormalizedRecord, 'reading' | 'surfaceKanji' | 'tags'> & { tier: string };

function isUsuallyKanaWithKanji(record: DuplicateCandidate): boolean {
  return record.surfaceKanji !== '' && record.tags.includes(USUALLY_KANA_TAG);
}

function isKanaOnly(record: DuplicateCandidate): boolean {
  return record.surfaceKanji === '';
}

/**
 * Indices of records that would show up as a second card for the same word.
 *
 * Within each group sharing a reading, every pairing of a kanji headword
 * marked usually-kana with a kana-only headword marks the harder tier for
 * removal (the later index on a tie). Two kanji headwords, or two kana-only
 * headwords, are never paired.
 *
 * @throws {DataError} when any record's tier is outside N5..N1/COMMON
 */
export function findEquivalentRecords(records: readonly DuplicateCandidate[]): Set<number> {
  const groups = new Map<string, number[]>();
  records.forEach((record, index) => {
    tierRank(record.tier);
    const group = groups.get(record.reading);
    if (group) {
      group.push(index);
    } else {
      groups.set(record.reading, [index]);
    }
  });

  const marked = new Set<number>();
  for (const [reading, indices] of groups) {
    if (indices.length < 2) continue;

    const withKanji = indices.filter(i => isUsuallyKanaWithKanji(records[i]));
    const kanaOnly = indices.filter(i => isKanaOnly(records[i]));

    for (const a of withKanji) {
      for (const b of kanaOnly) {
        const rankA = tierRank(records[a].tier);
        const rankB = tierRank(records[b].tier);
        const drop = rankA > rankB ? a : rankB > rankA ? b : Math.max(a, b);
        dp(`Equivalent readings for "${reading}": dropping #${drop}`);
        marked.add(drop);
      }
    }
  }
  return marked;
}

/**
 * Remove near-duplicate records, keeping the rest in their original order.
 */
export function dropEquivalentRecords<T extends DuplicateCandidate>(records: readonly T[]): T[] {
  const marked = findEquivalentRecords(records);
  return records.filter((_, index) => !marked.has(index));
}
