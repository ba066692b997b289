// Near-duplicate resolution tests
import { describe, test, expect } from 'vitest';
import { DataError, dropEquivalentRecords, findEquivalentRecords } from '@kotoba-deck/core';
import { record } from './fixtures.js';

const aa = record({ seq: 1, surfaceKanji: '', tier: 'N5' });
const aaKanji = record({ seq: 2, surfaceKanji: '嗚呼', expression: '嗚呼', tags: ['usually_kana'], usuallyKana: true, tier: 'N1' });

describe('dropEquivalentRecords', () => {
  test('keeps the easier kana-only word over a usually-kana kanji word', () => {
    const result = dropEquivalentRecords([aaKanji, aa]);
    expect(result).toEqual([aa]);
  });

  test('keeps the easier usually-kana kanji word over a kana-only word', () => {
    const easyKanji = record({ ...aaKanji, tier: 'N4' });
    const hardKana = record({ ...aa, tier: 'COMMON' });
    expect(dropEquivalentRecords([hardKana, easyKanji])).toEqual([easyKanji]);
  });

  test('drops the later record on equal tiers', () => {
    const first = record({ ...aa, tier: 'N3' });
    const second = record({ ...aaKanji, tier: 'N3' });
    expect(dropEquivalentRecords([first, second])).toEqual([first]);
    expect(dropEquivalentRecords([second, first])).toEqual([second]);
  });

  test('two kanji words sharing a reading are both kept', () => {
    const kami = record({ seq: 3, surfaceKanji: '紙', reading: '紙[かみ]', tags: ['usually_kana'] });
    const kami2 = record({ seq: 4, surfaceKanji: '神', reading: '紙[かみ]', tier: 'N3' });
    expect(dropEquivalentRecords([kami, kami2])).toEqual([kami, kami2]);
  });

  test('kanji word without the usually-kana tag is never paired', () => {
    const plain = record({ seq: 5, surfaceKanji: '嗚呼', tags: [], tier: 'N1' });
    expect(dropEquivalentRecords([plain, aa])).toEqual([plain, aa]);
  });

  test('two kana-only words sharing a reading are both kept', () => {
    const other = record({ seq: 6, tier: 'N2' });
    expect(dropEquivalentRecords([aa, other])).toEqual([aa, other]);
  });

  test('a record marked by several pairs is dropped once and order is kept', () => {
    const kana = record({ seq: 10, reading: 'こと', surfaceKanji: '', tier: 'N3' });
    const easy = record({ seq: 11, reading: 'こと', surfaceKanji: '事', tags: ['usually_kana'], tier: 'N5' });
    const hard = record({ seq: 12, reading: 'こと', surfaceKanji: '言', tags: ['usually_kana'], tier: 'N1' });
    const unrelated = record({ seq: 13, reading: 'もの' });

    expect([...findEquivalentRecords([kana, unrelated, easy, hard])].sort()).toEqual([0, 3]);
    expect(dropEquivalentRecords([kana, unrelated, easy, hard])).toEqual([unrelated, easy]);
  });

  test('singletons are untouched', () => {
    const records = [aa, record({ seq: 7, reading: 'いい' })];
    expect(dropEquivalentRecords(records)).toEqual(records);
  });

  test('fails on an unknown tier', () => {
    const bad = { ...aa, tier: 'N6' };
    expect(() => dropEquivalentRecords([bad])).toThrow(DataError);
    expect(() => dropEquivalentRecords([aaKanji, { ...aa, tier: 'common' }])).toThrow('Unknown difficulty tier "common"');
  });
});
