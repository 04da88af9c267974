import { entryMean } from './entry';
import type { TermStatsFacet, TermStatsFacetView } from './types';

export const FACET_TYPE = 'terms_stats';

/**
 * Project a finalized facet into the shape a renderer prints.
 *
 * Entries keep their order; `mean` is derived here and nowhere else.
 */
export function toFacetView(facet: TermStatsFacet): TermStatsFacetView {
  return {
    name: facet.name,
    _type: FACET_TYPE,
    missing: facet.missingCount,
    terms: facet.entries.map((entry) => ({
      term: entry.key,
      count: entry.count,
      total: entry.total,
      mean: entryMean(entry),
    })),
  };
}
