import { resolveMergerConfig } from './config';
import { MAX_ENTRY_COUNT, copyEntry, isValidCount, keyAsNumber } from './entry';
import { InvalidMergeInput } from './errors';
import { isNumericOrdering, isOrderingPolicy, sortEntries } from './ordering';
import type {
  MergerConfig,
  OrderingPolicy,
  ResolvedMergerConfig,
  TermStatsEntry,
  TermStatsFacet,
} from './types';
import { BoundedTopSet } from './utils/bounded-top-set';
import { ScratchPool } from './utils/scratch-pool';
import { decodeFacet } from './wire';

type ScratchMap = Map<string, TermStatsEntry>;

/**
 * Create a merger.
 *
 * Each merger owns its scratch pool; share one merger per thread (or per
 * worker) rather than creating one per request.
 */
export function createMerger(config?: MergerConfig): FacetMerger {
  return new FacetMerger(config);
}

/**
 * Fan-in reduction of per-shard terms-stats facets into one ranked facet.
 *
 * `reduce` is synchronous and CPU-bound. Its output depends only on the
 * multiset of input entries, the ordering policy and the required size, never
 * on the order in which partials (or entries within them) arrive.
 */
export class FacetMerger {
  readonly config: ResolvedMergerConfig;
  readonly pool: ScratchPool<ScratchMap>;

  constructor(config?: MergerConfig) {
    this.config = resolveMergerConfig(config);
    this.pool = new ScratchPool<ScratchMap>(() => new Map(), this.config.maxIdleMaps);
  }

  /**
   * Merge partial facets into one finalized facet.
   *
   * Entries with the same key are summed (`count` and `total`); `missingCount`
   * is summed across partials. With `requiredSize = 0` every key is returned,
   * otherwise only the `requiredSize` best. Entries come back sorted by `policy`.
   *
   * Partials are never mutated: the result owns copies of all entries.
   *
   * @throws InvalidMergeInput when `partials` is empty, when a partial's name,
   * policy or required size differs from the call's, when an entry count is
   * not an integer in 1..2^31-1, or when a merged count or the merged
   * `missingCount` would leave the range the wire codec carries. Nothing is
   * returned in that case.
   *
   * @example
   * ```ts
   * const merger = createMerger();
   * const merged = merger.reduce('prices', 'total_desc', 10, [shardA, shardB]);
   * ```
   */
  reduce(
    name: string,
    policy: OrderingPolicy,
    requiredSize: number,
    partials: readonly TermStatsFacet[],
  ): TermStatsFacet {
    validateRequest(name, policy, requiredSize, partials);

    // Single source, unbounded: nothing to merge, only sort. Keys of one
    // partial are taken as distinct here; duplicates are not folded.
    if (partials.length === 1 && requiredSize === 0) {
      const source = partials[0];
      const entries = new Array<TermStatsEntry>(source.entries.length);
      for (let i = 0; i < entries.length; i++) {
        const entry = source.entries[i];
        assertEntry(name, 0, entry);
        entries[i] = copyEntry(entry);
      }
      this.warnOnNonNumericKeys(name, policy, entries);
      return {
        name,
        orderingPolicy: policy,
        requiredSize,
        missingCount: source.missingCount,
        entries: sortEntries(entries, policy),
      };
    }

    return this.pool.use((scratch) => {
      let missingCount = 0;

      for (let p = 0; p < partials.length; p++) {
        const partial = partials[p];
        missingCount += partial.missingCount;

        for (const entry of partial.entries) {
          assertEntry(name, p, entry);
          const current = scratch.get(entry.key);
          if (current) {
            current.count += entry.count;
            current.total += entry.total;
            if (current.count > MAX_ENTRY_COUNT) {
              throw new InvalidMergeInput(
                `Cannot reduce facet "${name}": merged count of "${entry.key}" exceeds ${MAX_ENTRY_COUNT}`,
              );
            }
          }
          else {
            scratch.set(entry.key, copyEntry(entry));
          }
        }
      }

      if (!Number.isSafeInteger(missingCount)) {
        throw new InvalidMergeInput(
          `Cannot reduce facet "${name}": merged missingCount exceeds ${Number.MAX_SAFE_INTEGER}`,
        );
      }

      this.warnOnNonNumericKeys(name, policy, scratch.values());

      let entries: TermStatsEntry[];
      if (requiredSize === 0) {
        entries = sortEntries(Array.from(scratch.values()), policy);
      }
      else {
        const top = new BoundedTopSet(policy, requiredSize);
        for (const entry of scratch.values()) {
          top.insert(entry);
        }
        entries = top.drain('best-first');
      }

      return { name, orderingPolicy: policy, requiredSize, missingCount, entries };
    });
  }

  /**
   * Merge partials using the name, policy and required size of the first one.
   *
   * @throws InvalidMergeInput under the same conditions as `reduce`
   */
  reducePartials(partials: readonly TermStatsFacet[]): TermStatsFacet {
    if (partials.length === 0) {
      throw new InvalidMergeInput('Cannot reduce: no partial facets supplied');
    }
    const first = partials[0];
    return this.reduce(first.name, first.orderingPolicy, first.requiredSize, partials);
  }

  /**
   * Decode wire payloads and merge them. A single malformed payload fails the
   * whole call with `MalformedWireData`.
   */
  reduceEncoded(
    name: string,
    policy: OrderingPolicy,
    requiredSize: number,
    payloads: readonly Uint8Array[],
  ): TermStatsFacet {
    return this.reduce(name, policy, requiredSize, payloads.map(decodeFacet));
  }

  private warnOnNonNumericKeys(
    name: string,
    policy: OrderingPolicy,
    entries: Iterable<TermStatsEntry>,
  ): void {
    if (!isNumericOrdering(policy)) return;

    let nonNumeric = 0;
    for (const entry of entries) {
      if (keyAsNumber(entry.key) === undefined) nonNumeric++;
    }
    if (nonNumeric > 0) {
      this.config.logger.warn(
        `Facet "${name}": ${nonNumeric} key(s) are not numeric under ${policy}; they are ranked after numeric keys`,
      );
    }
  }
}

// Utilities
// ==============================

/**
 * @internal
 */
function validateRequest(
  name: string,
  policy: OrderingPolicy,
  requiredSize: number,
  partials: readonly TermStatsFacet[],
): void {
  if (partials.length === 0) {
    throw new InvalidMergeInput(`Cannot reduce facet "${name}": no partial facets supplied`);
  }
  if (!isOrderingPolicy(policy)) {
    throw new InvalidMergeInput(`Cannot reduce facet "${name}": unknown ordering policy ${JSON.stringify(policy)}`);
  }
  if (!Number.isInteger(requiredSize) || requiredSize < 0) {
    throw new InvalidMergeInput(
      `Cannot reduce facet "${name}": requiredSize must be a non-negative integer, got ${requiredSize}`,
    );
  }

  for (let i = 0; i < partials.length; i++) {
    const partial = partials[i];
    if (partial.name !== name) {
      throw new InvalidMergeInput(
        `Cannot reduce facet "${name}": partial ${i} is named "${partial.name}"`,
      );
    }
    if (partial.orderingPolicy !== policy) {
      throw new InvalidMergeInput(
        `Cannot reduce facet "${name}": partial ${i} uses ${partial.orderingPolicy}, expected ${policy}`,
      );
    }
    if (partial.requiredSize !== requiredSize) {
      throw new InvalidMergeInput(
        `Cannot reduce facet "${name}": partial ${i} has requiredSize ${partial.requiredSize}, expected ${requiredSize}`,
      );
    }
    if (!Number.isSafeInteger(partial.missingCount) || partial.missingCount < 0) {
      throw new InvalidMergeInput(
        `Cannot reduce facet "${name}": partial ${i} has invalid missingCount ${partial.missingCount}`,
      );
    }
  }
}

/**
 * @internal
 */
function assertEntry(name: string, partialIndex: number, entry: TermStatsEntry): void {
  if (!isValidCount(entry.count) || entry.count > MAX_ENTRY_COUNT) {
    throw new InvalidMergeInput(
      `Cannot reduce facet "${name}": partial ${partialIndex} has entry "${entry.key}" with count ${entry.count}`,
    );
  }
}
