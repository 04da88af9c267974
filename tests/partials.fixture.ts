import type { OrderingPolicy, TermStatsEntry, TermStatsFacet } from '../src';

export interface Sale {
  id: string;
  region: string | null;
  amount: number;
}

// Data pools for realistic generation
// ==============================

const REGIONS = ['NA', 'EU', 'APAC', 'LATAM', 'MEA', 'ANZ'] as const;

/**
 * Small deterministic PRNG (mulberry32) so fixtures are reproducible.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Generate sales with integer amounts, so sums are exact in any order.
 * Roughly 5% of sales have no region.
 */
export function generateSales(count: number, seed: number = 42): Sale[] {
  const random = createRandom(seed);
  const sales: Sale[] = [];
  for (let i = 0; i < count; i++) {
    const region = random() < 0.05 ? null : REGIONS[Math.floor(random() * REGIONS.length)];
    sales.push({
      id: `S-${i}`,
      region,
      amount: Math.floor(random() * 1000) - 100,
    });
  }
  return sales;
}

/**
 * Split items round-robin across `shardCount` shards.
 */
export function splitIntoShards<T>(items: T[], shardCount: number): T[][] {
  const shards: T[][] = Array.from({ length: shardCount }, () => []);
  items.forEach((item, index) => {
    shards[index % shardCount].push(item);
  });
  return shards;
}

/**
 * What a shard would send: per-region count/total, unsorted and unbounded.
 */
export function aggregateShard(
  sales: Sale[],
  name: string,
  orderingPolicy: OrderingPolicy,
  requiredSize: number,
): TermStatsFacet {
  const byRegion = new Map<string, TermStatsEntry>();
  let missingCount = 0;

  for (const sale of sales) {
    if (sale.region === null) {
      missingCount++;
      continue;
    }
    const entry = byRegion.get(sale.region);
    if (entry) {
      entry.count++;
      entry.total += sale.amount;
    }
    else {
      byRegion.set(sale.region, { key: sale.region, count: 1, total: sale.amount });
    }
  }

  return {
    name,
    orderingPolicy,
    requiredSize,
    missingCount,
    entries: Array.from(byRegion.values()),
  };
}

/**
 * Shorthand for hand-written partials in tests.
 */
export function partial(
  entries: Array<[key: string, count: number, total: number]>,
  options: {
    name?: string;
    orderingPolicy?: OrderingPolicy;
    requiredSize?: number;
    missingCount?: number;
  } = {},
): TermStatsFacet {
  return {
    name: options.name ?? 'x',
    orderingPolicy: options.orderingPolicy ?? 'total_desc',
    requiredSize: options.requiredSize ?? 0,
    missingCount: options.missingCount ?? 0,
    entries: entries.map(([key, count, total]) => ({ key, count, total })),
  };
}
