import { entryMean, keyAsNumber } from './entry';
import { InvalidPolicyId } from './errors';
import type { EntryComparator, OrderingPolicy, TermStatsEntry } from './types';

// Policy Table
// ==============================

/**
 * Every ordering policy, in wire-id order (index === id).
 */
export const ORDERING_POLICIES: readonly OrderingPolicy[] = [
  'count_desc',
  'count_asc',
  'term_asc',
  'term_desc',
  'total_desc',
  'total_asc',
  'mean_desc',
  'mean_asc',
  'term_numeric_asc',
  'term_numeric_desc',
];

const POLICY_BY_ID = new Map<number, OrderingPolicy>(
  ORDERING_POLICIES.map((policy, id) => [id, policy]),
);

const ID_BY_POLICY = new Map<OrderingPolicy, number>(
  ORDERING_POLICIES.map((policy, id) => [policy, id]),
);

const POLICY_NAMES = new Set<string>(ORDERING_POLICIES);

/**
 * Older names still accepted by `orderingFromName`.
 * A bare field name meant "best first": highest count/total/mean, lowest term.
 */
const LEGACY_NAMES: Record<string, OrderingPolicy> = {
  count: 'count_desc',
  reverse_count: 'count_asc',
  term: 'term_asc',
  reverse_term: 'term_desc',
  total: 'total_desc',
  reverse_total: 'total_asc',
  mean: 'mean_desc',
  reverse_mean: 'mean_asc',
  term_as_number: 'term_numeric_asc',
  reverse_term_as_number: 'term_numeric_desc',
};

// Comparators
// ==============================

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// NaN sorts above every number so the order stays total.
function compareNumbers(x: number, y: number): number {
  if (x < y) return -1;
  if (x > y) return 1;
  if (x === y) return 0;
  const xNaN = Number.isNaN(x);
  const yNaN = Number.isNaN(y);
  if (xNaN && yNaN) return 0;
  return xNaN ? 1 : -1;
}

function byField(
  field: (entry: TermStatsEntry) => number,
  direction: 'asc' | 'desc',
): EntryComparator {
  return direction === 'asc'
    ? (a, b) => compareNumbers(field(a), field(b)) || compareKeys(a.key, b.key)
    : (a, b) => compareNumbers(field(b), field(a)) || compareKeys(a.key, b.key);
}

// Non-numeric keys always come after numeric ones, whatever the direction.
// Each comparator remembers parsed keys, so one sort parses every key once.
function byNumericKey(direction: 'asc' | 'desc'): EntryComparator {
  const parsed = new Map<string, number | undefined>();
  const parse = (key: string): number | undefined => {
    if (parsed.has(key)) return parsed.get(key);
    const value = keyAsNumber(key);
    parsed.set(key, value);
    return value;
  };

  return (a, b) => {
    const x = parse(a.key);
    const y = parse(b.key);
    if (x === undefined || y === undefined) {
      if (x !== undefined) return -1;
      if (y !== undefined) return 1;
      return compareKeys(a.key, b.key);
    }
    const primary = direction === 'asc' ? compareNumbers(x, y) : compareNumbers(y, x);
    return primary || compareKeys(a.key, b.key);
  };
}

type NumericOrdering = 'term_numeric_asc' | 'term_numeric_desc';

const COMPARATORS: Record<Exclude<OrderingPolicy, NumericOrdering>, EntryComparator> = {
  count_desc: byField((entry) => entry.count, 'desc'),
  count_asc: byField((entry) => entry.count, 'asc'),
  term_asc: (a, b) => compareKeys(a.key, b.key),
  term_desc: (a, b) => compareKeys(b.key, a.key),
  total_desc: byField((entry) => entry.total, 'desc'),
  total_asc: byField((entry) => entry.total, 'asc'),
  mean_desc: byField(entryMean, 'desc'),
  mean_asc: byField(entryMean, 'asc'),
};

// Implementation
// ==============================

/**
 * Stable 1-byte wire id of a policy.
 */
export function orderingId(policy: OrderingPolicy): number {
  const id = ID_BY_POLICY.get(policy);
  if (id === undefined) {
    throw new InvalidPolicyId(policy);
  }
  return id;
}

/**
 * Inverse of `orderingId`.
 *
 * @throws InvalidPolicyId for any byte that names no policy
 */
export function orderingFromId(id: number): OrderingPolicy {
  const policy = POLICY_BY_ID.get(id);
  if (policy === undefined) {
    throw new InvalidPolicyId(id);
  }
  return policy;
}

/**
 * Parse a policy name such as `total_desc`, `TOTAL-DESC` or the legacy `reverse_total`.
 */
export function orderingFromName(name: string): OrderingPolicy {
  const normalized = name.trim().toLowerCase().replace(/-/g, '_');
  if (isOrderingPolicy(normalized)) return normalized;

  const legacy = Object.prototype.hasOwnProperty.call(LEGACY_NAMES, normalized)
    ? LEGACY_NAMES[normalized]
    : undefined;
  if (legacy === undefined) {
    throw new InvalidPolicyId(name);
  }
  return legacy;
}

export function isOrderingPolicy(value: unknown): value is OrderingPolicy {
  return typeof value === 'string' && POLICY_NAMES.has(value);
}

/**
 * Total-order comparator for a policy, best entry first.
 *
 * Numeric policies get a fresh comparator per call that caches parsed keys;
 * reuse it for one sort or one bounded set, not across requests.
 */
export function orderingComparator(policy: OrderingPolicy): EntryComparator {
  if (policy === 'term_numeric_asc') return byNumericKey('asc');
  if (policy === 'term_numeric_desc') return byNumericKey('desc');
  return COMPARATORS[policy];
}

/**
 * Sort entries in place by a policy and return the same array.
 */
export function sortEntries(entries: TermStatsEntry[], policy: OrderingPolicy): TermStatsEntry[] {
  return entries.sort(orderingComparator(policy));
}

/**
 * Whether a policy interprets keys as numbers.
 */
export function isNumericOrdering(policy: OrderingPolicy): boolean {
  return policy === 'term_numeric_asc' || policy === 'term_numeric_desc';
}
