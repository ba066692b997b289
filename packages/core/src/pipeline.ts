// Transform stage: graded rows + dictionary → deck-ready records

import type { DefinitionFilterOptions } from './definitions.js';
import { dp } from './debug.js';
import { dropEquivalentRecords } from './duplicates.js';
import { DataError } from './errors.js';
import { lookupWord } from './lookup.js';
import { normalizeEntry } from './normalize.js';
import { TIERS, type DifficultyTier } from './tiers.js';
import type { CleanJlptRow, DeckRecord, Dictionary, JlptRow, NormalizedRecord, TagMapping } from './types.js';

export const DEFAULT_SHUFFLE_SEED = 42;

export interface TransformOptions extends DefinitionFilterOptions {
  /** Seed for the per-tier shuffle; null keeps list order */
  seed?: number | null;
}

export interface TransformResult {
  records: DeckRecord[];
  /** Sequence numbers absent from the dictionary */
  missing: number[];
  /** Sequence numbers whose dictionary word has no kana form or no senses */
  incomplete: number[];
  /** Sequence numbers whose furigana could not be aligned */
  emptyReadings: number[];
  /** Sequence numbers dropped as near-duplicates */
  duplicates: number[];
}

/**
 * Drop rows without a sequence number and repeated sequence numbers. Lists
 * load easiest first, so the first occurrence is the easiest tier.
 */
export function cleanJlptRows(rows: readonly JlptRow[]): CleanJlptRow[] {
  const seen = new Set<number>();
  const clean: CleanJlptRow[] = [];
  for (const row of rows) {
    const { seq } = row;
    if (seq === null || !Number.isInteger(seq)) {
      dp(`Dropping row without sequence number: ${row.kanji || row.kana}`);
      continue;
    }
    if (seen.has(seq)) {
      dp(`Dropping repeated sequence ${seq} (${row.tier})`);
      continue;
    }
    seen.add(seq);
    clean.push({ ...row, seq });
  }
  return clean;
}

/**
 * mulberry32: small seeded PRNG so the card order is reproducible.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Order records by tier, easiest first, shuffling each tier with its own
 * generator seeded from `seed`.
 */
export function finalise<T extends NormalizedRecord>(records: readonly T[], seed: number | null = DEFAULT_SHUFFLE_SEED): T[] {
  for (const record of records) {
    if (!record.expression) {
      throw new DataError(`Record ${record.seq} has no expression`);
    }
  }

  const byTier = new Map<DifficultyTier, T[]>(TIERS.map(tier => [tier, []]));
  for (const record of records) {
    byTier.get(record.tier)?.push(record);
  }

  const out: T[] = [];
  for (const tier of TIERS) {
    const tierRecords = byTier.get(tier) ?? [];
    out.push(...(seed === null ? tierRecords : shuffle(tierRecords, seededRandom(seed))));
  }
  return out;
}

export function transform(
  rows: readonly JlptRow[],
  dictionary: Dictionary,
  tagMapping: TagMapping,
  audio: ReadonlyMap<number, string> = new Map(),
  options: TransformOptions = {}
): TransformResult {
  const missing: number[] = [];
  const incomplete: number[] = [];
  const emptyReadings: number[] = [];
  const normalized: NormalizedRecord[] = [];

  for (const row of cleanJlptRows(rows)) {
    const entry = lookupWord(row, dictionary.words);
    if (!entry) {
      if (dictionary.words.has(row.seq)) {
        console.error(`Dictionary word has no reading or senses: ${row.seq} (${row.kanji || row.kana})`);
        incomplete.push(row.seq);
      } else {
        console.error(`Not found in dictionary: ${row.seq} (${row.kanji || row.kana})`);
        missing.push(row.seq);
      }
      continue;
    }

    const record = normalizeEntry(entry, tagMapping, options);
    if (record.reading === '') {
      console.warn(`Could not align furigana for ${entry.surfaceKanji} (${entry.surfaceKana}), seq ${entry.seq}`);
      emptyReadings.push(entry.seq);
    }
    normalized.push(record);
  }

  const resolved = dropEquivalentRecords(normalized);
  const kept = new Set(resolved.map(r => r.seq));
  const duplicates = normalized.filter(r => !kept.has(r.seq)).map(r => r.seq);
  if (duplicates.length > 0) {
    dp(`Dropped near-duplicates: ${duplicates.join(', ')}`);
  }

  const withAudio: DeckRecord[] = resolved.map(record => {
    const audioPath = audio.get(record.seq);
    return audioPath === undefined ? record : { ...record, audioPath };
  });

  const seed = options.seed === undefined ? DEFAULT_SHUFFLE_SEED : options.seed;
  return {
    records: finalise(withAudio, seed),
    missing,
    incomplete,
    emptyReadings,
    duplicates
  };
}
