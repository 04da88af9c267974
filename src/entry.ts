import { InvalidEntry } from './errors';
import type { TermStatsEntry } from './types';

/**
 * Largest count an entry may carry, merged or not: the wire encodes counts as varints.
 */
export const MAX_ENTRY_COUNT = 0x7fffffff;

const NUMERIC_KEY = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Create an entry, rejecting counts that are not integers >= 1.
 */
export function createEntry(key: string, count: number, total: number): TermStatsEntry {
  if (!isValidCount(count)) {
    throw new InvalidEntry(`Entry "${key}" has count ${count}; count must be an integer >= 1`);
  }
  return { key, count, total };
}

/**
 * Derived mean of an entry. Never stored, never transmitted.
 */
export function entryMean(entry: TermStatsEntry): number {
  return entry.total / entry.count;
}

/**
 * Interpret an entry key as a number.
 *
 * Only plain decimal literals (optional sign, fraction and exponent) count as
 * numeric; anything else, including the empty string and hex, yields `undefined`.
 */
export function keyAsNumber(key: string): number | undefined {
  return NUMERIC_KEY.test(key) ? Number(key) : undefined;
}

/**
 * @internal
 */
export function isValidCount(count: number): boolean {
  return Number.isInteger(count) && count >= 1;
}

/**
 * @internal
 */
export function copyEntry(entry: TermStatsEntry): TermStatsEntry {
  return { key: entry.key, count: entry.count, total: entry.total };
}
