import { describe, it, expect } from 'vitest';
import {
  InvalidEntry,
  TermStatsError,
  createEntry,
  entryMean,
  isTermStatsError,
  keyAsNumber,
} from '../src';


describe('Entries', () => {
  it('creates entries with a positive integer count', () => {
    expect(createEntry('EU', 4, 10)).toEqual({ key: 'EU', count: 4, total: 10 });
  });


  it.each([0, -1, 2.5, Number.NaN])('rejects count %s', (count) => {
    expect(() => createEntry('EU', count, 10)).toThrow(InvalidEntry);
  });


  it('reports invalid entries through the shared error base', () => {
    let caught: unknown;
    try {
      createEntry('EU', 0, 1);
    }
    catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TermStatsError);
    expect(isTermStatsError(caught, 'invalid_entry')).toBe(true);
    expect(isTermStatsError(caught, 'invalid_merge_input')).toBe(false);
    expect(caught instanceof Error && caught.message).toBe(
      'Entry "EU" has count 0; count must be an integer >= 1',
    );
  });


  it('derives the mean', () => {
    expect(entryMean({ key: 'a', count: 4, total: 10 })).toBe(2.5);
    expect(entryMean({ key: 'a', count: 3, total: -0 })).toBe(-0);
  });


  it.each([
    ['42', 42],
    ['-1.5', -1.5],
    ['+7', 7],
    ['.5', 0.5],
    ['3.', 3],
    ['1e3', 1000],
    ['2E-2', 0.02],
  ])('parses numeric key %s', (key, expected) => {
    expect(keyAsNumber(key)).toBe(expected);
  });


  it.each(['', ' 1', '0x10', 'Infinity', 'NaN', '1e', '1_000', 'abc', '--1'])(
    'treats %j as non-numeric',
    (key) => {
      expect(keyAsNumber(key)).toBeUndefined();
    },
  );
});
