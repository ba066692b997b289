// Builders for word entries and records used across the core tests
import type { DictionaryWord, NormalizedRecord, WordEntry } from '@kotoba-deck/core';

export function wordEntry(overrides: Partial<WordEntry> = {}): WordEntry {
  return {
    seq: 1358280,
    tier: 'N5',
    surfaceKanji: '食べる',
    surfaceKana: 'たべる',
    primaryDefinitions: ['to eat'],
    primaryPartOfSpeech: ['v1', 'vt'],
    secondarySenses: [
      { definitions: ['to live on (e.g. a salary)', 'to live off', 'to subsist on'], partOfSpeech: ['v1', 'vt'], misc: [] }
    ],
    misc: [],
    usuallyKana: false,
    ...overrides
  };
}

export function record(overrides: Partial<NormalizedRecord> = {}): NormalizedRecord {
  return {
    seq: 1,
    tier: 'N5',
    surfaceKanji: '',
    surfaceKana: 'ああ',
    expression: 'ああ',
    reading: 'ああ',
    englishDefinition: 'ah!',
    grammar: 'interjection (kandoushi)',
    additional: '',
    tags: [],
    usuallyKana: false,
    ...overrides
  };
}

export function dictionaryWord(
  id: number,
  kanji: string[],
  kana: string[],
  senses: Array<{ gloss: string[]; partOfSpeech?: string[]; misc?: string[] }>
): DictionaryWord {
  return {
    id: String(id),
    kanji: kanji.map(text => ({ text, common: true, tags: [] })),
    kana: kana.map(text => ({ text, common: true, tags: [], appliesToKanji: ['*'] })),
    sense: senses.map(s => ({
      partOfSpeech: s.partOfSpeech ?? ['n'],
      misc: s.misc ?? [],
      gloss: s.gloss.map(text => ({ lang: 'eng', text }))
    }))
  };
}
