// Per-entry transform into a study-ready record

import { filterAdditionalDefinitions, type DefinitionFilterOptions } from './definitions.js';
import { makeFurigana } from './furigana.js';
import { buildTags, describeTag } from './tags.js';
import type { NormalizedRecord, TagMapping, WordEntry } from './types.js';

const LIST_SEPARATOR = ', ';

/**
 * Reading shown on the card: the plain kana for usually-kana words, the
 * furigana-aligned headword otherwise. '' means the alignment failed.
 */
export function readingFor(entry: Pick<WordEntry, 'surfaceKanji' | 'surfaceKana' | 'usuallyKana'>): string {
  if (entry.usuallyKana) {
    return entry.surfaceKana;
  }
  return makeFurigana(entry.surfaceKanji, entry.surfaceKana);
}

export function normalizeEntry(
  entry: WordEntry,
  tagMapping: TagMapping,
  options: DefinitionFilterOptions = {}
): NormalizedRecord {
  const additional = filterAdditionalDefinitions(
    entry.secondarySenses,
    entry.primaryDefinitions,
    entry.primaryPartOfSpeech,
    options
  );

  const record: NormalizedRecord = {
    seq: entry.seq,
    tier: entry.tier,
    surfaceKanji: entry.surfaceKanji,
    surfaceKana: entry.surfaceKana,
    expression: entry.surfaceKanji !== '' ? entry.surfaceKanji : entry.surfaceKana,
    reading: readingFor(entry),
    englishDefinition: entry.primaryDefinitions.join(LIST_SEPARATOR),
    grammar: entry.primaryPartOfSpeech.map(pos => describeTag(tagMapping, pos)).join(LIST_SEPARATOR),
    additional: additional.join(LIST_SEPARATOR),
    tags: Object.freeze(buildTags(entry.misc, tagMapping)),
    usuallyKana: entry.usuallyKana
  };
  return Object.freeze(record);
}
