/**
 * Ranking strategies a terms-stats facet can be ordered by.
 *
 * Every policy is a total order: ties on the primary field are broken by
 * ascending lexicographic comparison of the entry key.
 */
export type OrderingPolicy =
  | 'count_desc'
  | 'count_asc'
  | 'term_asc'
  | 'term_desc'
  | 'total_desc'
  | 'total_asc'
  | 'mean_desc'
  | 'mean_asc'
  | 'term_numeric_asc'
  | 'term_numeric_desc';

/**
 * Accumulated statistics for one term.
 *
 * `count` is always an integer >= 1, so `total / count` is always defined.
 * The mean is never stored; see `entryMean`.
 */
export interface TermStatsEntry {
  key: string;
  count: number;
  total: number;
}

/**
 * A partial (per-shard) or final (merged) terms-stats facet.
 *
 * Size semantics:
 * - `requiredSize = 0` means unbounded: a final facet holds every distinct key
 * - `requiredSize = K` means a final facet holds at most the K best entries
 * - a partial facet carries no ordering or bound guarantee
 *
 * @example
 * ```ts
 * const partial: TermStatsFacet = {
 *   name: 'price_by_region',
 *   orderingPolicy: 'total_desc',
 *   requiredSize: 10,
 *   missingCount: 0,
 *   entries: [{ key: 'EU', count: 3, total: 42.5 }],
 * };
 * ```
 */
export interface TermStatsFacet {
  name: string;
  orderingPolicy: OrderingPolicy;
  requiredSize: number;
  /** Number of input items that had no value for the grouping key. */
  missingCount: number;
  entries: TermStatsEntry[];
}

/**
 * Comparator with Array.sort semantics: < 0 means `a` ranks before `b`.
 */
export type EntryComparator = (a: TermStatsEntry, b: TermStatsEntry) => number;

/**
 * Order in which a bounded set hands back its entries.
 */
export type DrainDirection = 'best-first' | 'worst-first';

/**
 * Minimal logging sink used for soft, non-fatal conditions.
 */
export interface MergerLogger {
  warn(message: string): void;
}

/**
 * Options accepted by `createMerger` / `new FacetMerger`.
 */
export interface MergerConfig {
  /**
   * Maximum number of scratch maps kept idle between merges.
   * Defaults to 4. Use 0 to disable reuse entirely.
   */
  maxIdleMaps?: number;
  /**
   * Where warnings go. Defaults to `console`.
   */
  logger?: MergerLogger;
}

/**
 * Merger configuration with every default applied.
 * @internal
 */
export interface ResolvedMergerConfig {
  maxIdleMaps: number;
  logger: MergerLogger;
}

/**
 * Render-ready projection of a facet entry, including the derived mean.
 */
export interface TermStatsEntryView {
  term: string;
  count: number;
  total: number;
  mean: number;
}

/**
 * Render-ready projection of a finalized facet.
 */
export interface TermStatsFacetView {
  name: string;
  _type: 'terms_stats';
  missing: number;
  terms: TermStatsEntryView[];
}
