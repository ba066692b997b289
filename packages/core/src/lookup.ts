// Dictionary lookup: graded rows to word entries

import { dp } from './debug.js';
import { USUALLY_KANA_MISC } from './tags.js';
import type { CleanJlptRow, DictionarySense, DictionaryWord, SecondarySense, WordEntry } from './types.js';

function glossTexts(sense: DictionarySense): string[] {
  return sense.gloss.map(g => g.text);
}

/**
 * Build the pre-normalization entry for a graded row from its dictionary word.
 * The first kanji and kana forms become the headword and reading, the first
 * sense is the primary one and every later sense is secondary.
 *
 * Returns null when the sequence number is unknown or the word carries no kana
 * or senses.
 */
export function lookupWord(
  row: Pick<CleanJlptRow, 'seq' | 'tier'>,
  words: ReadonlyMap<number, DictionaryWord>
): WordEntry | null {
  const word = words.get(row.seq);
  if (!word) {
    dp(`Sequence ${row.seq} not in dictionary`);
    return null;
  }

  const [primary, ...rest] = word.sense;
  const kana = word.kana[0]?.text ?? '';
  if (!primary || !kana) {
    dp(`Sequence ${row.seq} has no ${primary ? 'kana' : 'senses'}`);
    return null;
  }

  const secondarySenses: SecondarySense[] = rest.map(sense => ({
    definitions: glossTexts(sense),
    partOfSpeech: sense.partOfSpeech,
    misc: sense.misc
  }));

  return {
    seq: row.seq,
    tier: row.tier,
    surfaceKanji: word.kanji[0]?.text ?? '',
    surfaceKana: kana,
    primaryDefinitions: glossTexts(primary),
    primaryPartOfSpeech: primary.partOfSpeech,
    secondarySenses,
    misc: primary.misc,
    usuallyKana: primary.misc.includes(USUALLY_KANA_MISC)
  };
}
