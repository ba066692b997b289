// Dictionary lookup tests
import { describe, test, expect } from 'vitest';
import { lookupWord, type DictionaryWord } from '@kotoba-deck/core';
import { dictionaryWord } from './fixtures.js';

const kawa = dictionaryWord(1395660, ['川', '河'], ['かわ'], [
  { gloss: ['river', 'stream'] },
  { gloss: ['the ... river'], partOfSpeech: ['suf'] }
]);
const aa = dictionaryWord(1000320, ['嗚呼'], ['ああ'], [
  { gloss: ['ah!', 'oh!'], partOfSpeech: ['int'], misc: ['uk'] }
]);
const kore = dictionaryWord(1628500, [], ['これ'], [{ gloss: ['this'], partOfSpeech: ['pn'] }]);

const words = new Map<number, DictionaryWord>([
  [1395660, kawa],
  [1000320, aa],
  [1628500, kore],
  [1, dictionaryWord(1, ['空'], [], [{ gloss: ['empty'] }])],
  [2, dictionaryWord(2, [], ['から'], [])]
]);

describe('lookupWord', () => {
  test('uses first forms and splits primary from secondary senses', () => {
    expect(lookupWord({ seq: 1395660, tier: 'N5' }, words)).toEqual({
      seq: 1395660,
      tier: 'N5',
      surfaceKanji: '川',
      surfaceKana: 'かわ',
      primaryDefinitions: ['river', 'stream'],
      primaryPartOfSpeech: ['n'],
      secondarySenses: [{ definitions: ['the ... river'], partOfSpeech: ['suf'], misc: [] }],
      misc: [],
      usuallyKana: false
    });
  });

  test('marks usually-kana words', () => {
    const entry = lookupWord({ seq: 1000320, tier: 'N1' }, words);
    expect(entry?.usuallyKana).toBe(true);
    expect(entry?.misc).toEqual(['uk']);
  });

  test('kana-only words have an empty kanji form', () => {
    expect(lookupWord({ seq: 1628500, tier: 'N5' }, words)?.surfaceKanji).toBe('');
  });

  test('returns null for unknown sequences and incomplete words', () => {
    expect(lookupWord({ seq: 42, tier: 'N5' }, words)).toBeNull();
    expect(lookupWord({ seq: 1, tier: 'N5' }, words)).toBeNull();
    expect(lookupWord({ seq: 2, tier: 'N5' }, words)).toBeNull();
  });
});
