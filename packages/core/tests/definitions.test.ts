// Additional definition filter tests
import { describe, test, expect } from 'vitest';
import {
  collectAdditionalSenses,
  filterAdditionalDefinitions,
  reduceDefinitions,
  type SecondarySense
} from '@kotoba-deck/core';

function sense(definitions: string[], partOfSpeech: string[] = ['n'], misc: string[] = []): SecondarySense {
  return { definitions, partOfSpeech, misc };
}

describe('collectAdditionalSenses', () => {
  test('keeps senses sharing the primary part of speech', () => {
    const senses = [sense(['the ... river']), sense(['stream', 'brook'])];
    expect(collectAdditionalSenses(senses, ['n'])).toEqual([['the ... river'], ['stream', 'brook']]);
  });

  test('skips archaic and place-name senses', () => {
    const senses = [
      sense(['old meaning'], ['n'], ['arch']),
      sense(['Kawa (place)'], ['n'], ['place']),
      sense(['kept'], ['n'], ['col'])
    ];
    expect(collectAdditionalSenses(senses, ['n'])).toEqual([['kept']]);
  });

  test('skips senses with a different part of speech', () => {
    const senses = [
      sense(['to be eaten'], ['v1', 'vi']),
      sense(['to live on'], ['v1', 'vt']),
      sense(['food'], ['v1'])
    ];
    expect(collectAdditionalSenses(senses, ['v1', 'vt'])).toEqual([['to live on']]);
  });

  test('empty input gives empty output', () => {
    expect(collectAdditionalSenses([], ['n'])).toEqual([]);
  });
});

describe('reduceDefinitions', () => {
  test('drops definitions repeating the primary sense, ignoring case', () => {
    expect(reduceDefinitions([['River', 'stream']], ['river'])).toEqual(['stream']);
  });

  test('first occurrence wins across groups', () => {
    expect(reduceDefinitions([['brook', 'creek'], ['Creek', 'rill']], [])).toEqual(['brook', 'creek', 'rill']);
  });

  test('truncates at the definition that overflows the budget', () => {
    const a = 'a'.repeat(100);
    const b = 'b'.repeat(90);
    const c = 'c'.repeat(20);
    expect(reduceDefinitions([[a], [b, c], ['d']], ['primary'])).toEqual([a, b]);
  });

  test('a total exactly at the budget is kept', () => {
    const a = 'a'.repeat(100);
    const b = 'b'.repeat(100);
    expect(reduceDefinitions([[a, b]], [])).toEqual([a, b]);
  });

  test('an oversized first definition leaves nothing', () => {
    expect(reduceDefinitions([['x'.repeat(250), 'short']], [])).toEqual([]);
  });

  test('budget can be changed', () => {
    expect(reduceDefinitions([['abc', 'def', 'ghi']], [], { budget: 6 })).toEqual(['abc', 'def']);
  });
});

describe('filterAdditionalDefinitions', () => {
  test('combines sense selection and reduction', () => {
    const senses = [
      sense(['to eat', 'to live on'], ['v1', 'vt']),
      sense(['to be eaten'], ['v1', 'vi']),
      sense(['to consume'], ['v1', 'vt'], ['arch']),
      sense(['To live on', 'to subsist on'], ['v1', 'vt'])
    ];
    expect(filterAdditionalDefinitions(senses, ['to eat'], ['v1', 'vt'])).toEqual(['to live on', 'to subsist on']);
  });

  test('no senses gives no definitions', () => {
    expect(filterAdditionalDefinitions([], [], [])).toEqual([]);
  });
});
