// Difficulty tier tests
import { describe, test, expect } from 'vitest';
import { DataError, TIERS, tierRank } from '@kotoba-deck/core';

describe('tiers', () => {
  test('ranks run from N5 (easiest) to COMMON', () => {
    expect(TIERS.map(tierRank)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  test('unknown tiers fail', () => {
    expect(() => tierRank('N6')).toThrow(DataError);
    expect(() => tierRank('n5')).toThrow('Unknown difficulty tier "n5"');
    expect(() => tierRank('')).toThrow('Unknown difficulty tier ""');
  });
});
