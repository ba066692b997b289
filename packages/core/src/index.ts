// @kotoba-deck/core - furigana alignment, definition filtering, normalization and duplicate resolution

// Debug tracing
export { DEBUG, setDebug, dp } from './debug.js';

// Errors
export { KotobaError, InvalidInputError, DataError } from './errors.js';

// Tiers
export { TIERS, type DifficultyTier, tierRank } from './tiers.js';

// Character utilities
export {
  KANJI_RUN_REGEX,
  KANA_RUN_REGEX,
  type CharRun,
  kanjiRuns,
  nextKanaRun
} from './characters.js';

// Word transforms
export { makeFurigana } from './furigana.js';
export {
  EXCLUDED_SENSE_MISC,
  DEFAULT_DEFINITION_BUDGET,
  type DefinitionFilterOptions,
  collectAdditionalSenses,
  reduceDefinitions,
  filterAdditionalDefinitions
} from './definitions.js';
export {
  TAG_OVERRIDES,
  FORMALITY_MISC,
  USUALLY_KANA_TAG,
  RARE_TAG,
  createTagMapping,
  describeTag,
  buildTags
} from './tags.js';
export { readingFor, normalizeEntry } from './normalize.js';
export { findEquivalentRecords, dropEquivalentRecords } from './duplicates.js';
export { lookupWord } from './lookup.js';

// Pipeline
export {
  DEFAULT_SHUFFLE_SEED,
  type TransformOptions,
  type TransformResult,
  cleanJlptRows,
  seededRandom,
  shuffle,
  finalise,
  transform
} from './pipeline.js';

// Shared types
export type * from './types.js';
