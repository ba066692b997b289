// Build configuration tests
import path from 'path';
import { describe, test, expect } from 'vitest';
import { DataError, InvalidInputError } from '@kotoba-deck/core';
import { exitCodeFor, resolveConfig } from '../src/index.js';

describe('resolveConfig', () => {
  test('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      dataDir: 'original_data',
      dictionary: path.join('original_data', 'jmdict-eng.json'),
      audioDir: path.join('original_data', 'audio'),
      outDir: 'output',
      seed: 42,
      packages: ['core', 'extended'],
      debug: false
    });
  });

  test('reads the environment', () => {
    const config = resolveConfig({}, {
      KOTOBA_DATA_DIR: '/srv/lists',
      KOTOBA_DICTIONARY: '/srv/JMdict_e.gz',
      KOTOBA_OUTPUT_DIR: '/srv/decks',
      KOTOBA_DEBUG: 'true'
    });
    expect(config.dataDir).toBe('/srv/lists');
    expect(config.dictionary).toBe('/srv/JMdict_e.gz');
    expect(config.audioDir).toBe(path.join('/srv/lists', 'audio'));
    expect(config.outDir).toBe('/srv/decks');
    expect(config.debug).toBe(true);
  });

  test('options win over the environment', () => {
    const config = resolveConfig(
      { dataDir: 'lists', out: 'decks', audioDir: 'sounds', seed: '7', packages: ['extended', 'extended'], debug: true },
      { KOTOBA_DATA_DIR: '/srv/lists', KOTOBA_OUTPUT_DIR: '/srv/decks', KOTOBA_DEBUG: '0' }
    );
    expect(config).toEqual({
      dataDir: 'lists',
      dictionary: path.join('lists', 'jmdict-eng.json'),
      audioDir: 'sounds',
      outDir: 'decks',
      seed: 7,
      packages: ['extended'],
      debug: true
    });
  });

  test('rejects a seed that is not an integer', () => {
    expect(() => resolveConfig({ seed: 'abc' })).toThrow(InvalidInputError);
    expect(() => resolveConfig({ seed: '1.5' })).toThrow('Invalid seed: expected an integer, got "1.5"');
  });

  test('rejects unknown package kinds', () => {
    expect(() => resolveConfig({ packages: ['apkg'] })).toThrow(
      'Invalid packages: unknown package "apkg" (expected core or extended)'
    );
  });
});

describe('exitCodeFor', () => {
  test('1 for input and data errors, 2 otherwise', () => {
    expect(exitCodeFor(new DataError('bad row'))).toBe(1);
    expect(exitCodeFor(new InvalidInputError('kana', 'empty'))).toBe(1);
    expect(exitCodeFor(new TypeError('boom'))).toBe(2);
    expect(exitCodeFor('boom')).toBe(2);
  });
});
