// Shared record types for the extract / transform / load pipeline

import type { DifficultyTier } from './tiers.js';

// ============================================================================
// Dictionary input (jmdict-simplified shape)
// ============================================================================

export interface DictionaryKanji {
  text: string;
  common: boolean;
  tags: string[];
}

export interface DictionaryKana {
  text: string;
  common: boolean;
  tags: string[];
  appliesToKanji: string[];
}

export interface DictionaryGloss {
  lang: string;
  text: string;
}

export interface DictionarySense {
  partOfSpeech: string[];
  misc: string[];
  gloss: DictionaryGloss[];
}

export interface DictionaryWord {
  id: string;
  kanji: DictionaryKanji[];
  kana: DictionaryKana[];
  sense: DictionarySense[];
}

/**
 * A loaded dictionary: words keyed by JMdict sequence number, plus the
 * descriptions of the abbreviations used in part-of-speech and misc fields.
 */
export interface Dictionary {
  words: ReadonlyMap<number, DictionaryWord>;
  tags: Readonly<Record<string, string>>;
}

// ============================================================================
// Graded word lists
// ============================================================================

/** One row of a JLPT word list (n5.csv ... n1.csv). */
export interface JlptRow {
  seq: number | null;
  kana: string;
  kanji: string;
  definition: string;
  tier: DifficultyTier;
}

/** A JLPT row whose sequence number has been validated. */
export type CleanJlptRow = JlptRow & { seq: number };

// ============================================================================
// Word records
// ============================================================================

export interface SecondarySense {
  definitions: readonly string[];
  partOfSpeech: readonly string[];
  misc: readonly string[];
}

export interface WordEntry {
  seq: number;
  tier: DifficultyTier;
  /** Kanji or mixed headword; empty for kana-only words */
  surfaceKanji: string;
  /** Full phonetic reading; never empty */
  surfaceKana: string;
  primaryDefinitions: readonly string[];
  primaryPartOfSpeech: readonly string[];
  secondarySenses: readonly SecondarySense[];
  /** Misc markers of the first sense: uk, rare, hon, pol, hum, ... */
  misc: readonly string[];
  usuallyKana: boolean;
}

export interface NormalizedRecord {
  readonly seq: number;
  readonly tier: DifficultyTier;
  readonly surfaceKanji: string;
  readonly surfaceKana: string;
  /** Display headword */
  readonly expression: string;
  /** Furigana-annotated reading, plain kana, or '' when alignment failed */
  readonly reading: string;
  readonly englishDefinition: string;
  readonly grammar: string;
  readonly additional: string;
  readonly tags: readonly string[];
  readonly usuallyKana: boolean;
}

export interface DeckRecord extends NormalizedRecord {
  readonly audioPath?: string;
}

export type TagMapping = ReadonlyMap<string, string>;
