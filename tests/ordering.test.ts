import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  InvalidPolicyId,
  ORDERING_POLICIES,
  isOrderingPolicy,
  orderingComparator,
  orderingFromId,
  orderingFromName,
  orderingId,
  sortEntries,
  type OrderingPolicy,
  type TermStatsEntry,
} from '../src';
import { anyEntryArb, policyArb } from './property-generators';


describe('OrderingPolicy', () => {
  const sample = (): TermStatsEntry[] => [
    { key: 'c', count: 5, total: 3 },
    { key: 'a', count: 2, total: 10 },
    { key: 'd', count: 1, total: -4 },
    { key: 'b', count: 5, total: 10 },
  ];

  const keysSortedBy = (policy: OrderingPolicy, entries: TermStatsEntry[] = sample()): string[] =>
    sortEntries(entries, policy).map((entry) => entry.key);


  // Wire Ids
  // ==============================

  it('assigns stable wire ids in declaration order', () => {
    expect(ORDERING_POLICIES).toHaveLength(10);
    expect(orderingId('count_desc')).toBe(0);
    expect(orderingId('count_asc')).toBe(1);
    expect(orderingId('term_asc')).toBe(2);
    expect(orderingId('total_desc')).toBe(4);
    expect(orderingId('mean_asc')).toBe(7);
    expect(orderingId('term_numeric_desc')).toBe(9);
  });


  it('round-trips every policy through its id', () => {
    for (const policy of ORDERING_POLICIES) {
      expect(orderingFromId(orderingId(policy))).toBe(policy);
    }
  });


  it.each([10, 42, 255, -1, 1.5])('rejects unknown id %s', (id) => {
    expect(() => orderingFromId(id)).toThrow(InvalidPolicyId);
  });


  // Names
  // ==============================

  it('parses canonical names case-insensitively with dashes', () => {
    expect(orderingFromName('total_desc')).toBe('total_desc');
    expect(orderingFromName('TOTAL-DESC')).toBe('total_desc');
    expect(orderingFromName('  mean_asc ')).toBe('mean_asc');
  });


  it('accepts legacy names', () => {
    expect(orderingFromName('count')).toBe('count_desc');
    expect(orderingFromName('reverse_count')).toBe('count_asc');
    expect(orderingFromName('term')).toBe('term_asc');
    expect(orderingFromName('reverse_total')).toBe('total_asc');
    expect(orderingFromName('reverse_term_as_number')).toBe('term_numeric_desc');
  });


  it('rejects unknown names, including inherited object keys', () => {
    expect(() => orderingFromName('bogus')).toThrow(InvalidPolicyId);
    expect(() => orderingFromName('constructor')).toThrow(InvalidPolicyId);
    expect(() => orderingFromName('')).toThrow(InvalidPolicyId);
  });


  it('narrows unknown values with isOrderingPolicy', () => {
    expect(isOrderingPolicy('count_desc')).toBe(true);
    expect(isOrderingPolicy('count')).toBe(false);
    expect(isOrderingPolicy(0)).toBe(false);
    expect(isOrderingPolicy(undefined)).toBe(false);
  });


  // Comparators
  // ==============================

  it('orders by count with key tie-break', () => {
    expect(keysSortedBy('count_desc')).toEqual(['b', 'c', 'a', 'd']);
    expect(keysSortedBy('count_asc')).toEqual(['d', 'a', 'b', 'c']);
  });


  it('orders by total with key tie-break', () => {
    expect(keysSortedBy('total_desc')).toEqual(['a', 'b', 'c', 'd']);
    expect(keysSortedBy('total_asc')).toEqual(['d', 'c', 'a', 'b']);
  });


  it('orders by mean', () => {
    // means: a=5, b=2, c=0.6, d=-4
    expect(keysSortedBy('mean_desc')).toEqual(['a', 'b', 'c', 'd']);
    expect(keysSortedBy('mean_asc')).toEqual(['d', 'c', 'b', 'a']);
  });


  it('orders by key lexicographically by code unit', () => {
    const entries: TermStatsEntry[] = [
      { key: 'b', count: 1, total: 0 },
      { key: 'B', count: 1, total: 0 },
      { key: 'a', count: 1, total: 0 },
      { key: 'ä', count: 1, total: 0 },
    ];
    expect(keysSortedBy('term_asc', entries)).toEqual(['B', 'a', 'b', 'ä']);
    expect(keysSortedBy('term_desc', entries)).toEqual(['ä', 'b', 'a', 'B']);
  });


  it('orders numeric keys by value and puts non-numeric keys last', () => {
    const entries = ['10', 'abc', '9', '-1.5', '', '2e1', '0x10'].map(
      (key): TermStatsEntry => ({ key, count: 1, total: 0 }),
    );
    expect(keysSortedBy('term_numeric_asc', entries)).toEqual(['-1.5', '9', '10', '2e1', '', '0x10', 'abc']);
    expect(keysSortedBy('term_numeric_desc', entries)).toEqual(['2e1', '10', '9', '-1.5', '', '0x10', 'abc']);
  });


  it('breaks numeric ties by key', () => {
    const entries = ['1.0', '1', '01'].map((key): TermStatsEntry => ({ key, count: 1, total: 0 }));
    expect(keysSortedBy('term_numeric_asc', entries)).toEqual(['01', '1', '1.0']);
    expect(keysSortedBy('term_numeric_desc', entries)).toEqual(['01', '1', '1.0']);
  });


  it('ranks NaN totals above every number', () => {
    const entries: TermStatsEntry[] = [
      { key: 'nan', count: 1, total: Number.NaN },
      { key: 'one', count: 1, total: 1 },
      { key: 'inf', count: 1, total: Number.POSITIVE_INFINITY },
    ];
    expect(keysSortedBy('total_asc', entries)).toEqual(['one', 'inf', 'nan']);
    expect(keysSortedBy('total_desc', entries)).toEqual(['nan', 'inf', 'one']);
  });


  // Properties
  // ==============================

  it('every comparator is antisymmetric and only ties on equal keys', () => {
    fc.assert(
      fc.property(policyArb, anyEntryArb, anyEntryArb, (policy, a, b) => {
        const compare = orderingComparator(policy);
        const ab = compare(a, b);
        const ba = compare(b, a);

        expect(Math.sign(ab)).toBe(-Math.sign(ba) || 0);
        if (a.key !== b.key) {
          expect(ab).not.toBe(0);
        }
      }),
    );
  });


  it('every comparator is transitive', () => {
    fc.assert(
      fc.property(policyArb, anyEntryArb, anyEntryArb, anyEntryArb, (policy, a, b, c) => {
        const compare = orderingComparator(policy);
        if (compare(a, b) < 0 && compare(b, c) < 0) {
          expect(compare(a, c)).toBeLessThan(0);
        }
      }),
    );
  });
});
