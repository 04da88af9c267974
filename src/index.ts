export { createMerger, FacetMerger } from './merger';

// Types
// ==============================
export type {
  DrainDirection,
  EntryComparator,
  MergerConfig,
  MergerLogger,
  OrderingPolicy,
  TermStatsEntry,
  TermStatsEntryView,
  TermStatsFacet,
  TermStatsFacetView,
} from './types';

// Entries & Ordering
// ==============================
export { createEntry, entryMean, keyAsNumber } from './entry';
export {
  ORDERING_POLICIES,
  isOrderingPolicy,
  orderingComparator,
  orderingFromId,
  orderingFromName,
  orderingId,
  sortEntries,
} from './ordering';

// Wire Codec
// ==============================
export { decodeFacet, encodeFacet, readFacet, writeFacet } from './wire';
export { ByteReader, ByteWriter } from './utils/stream-io';

// Building Blocks
// ==============================
export { BoundedTopSet } from './utils/bounded-top-set';
export { ScratchPool, type Clearable } from './utils/scratch-pool';
export { FACET_TYPE, toFacetView } from './view';

// Errors
// ==============================
export {
  InvalidEntry,
  InvalidMergeInput,
  InvalidPolicyId,
  MalformedWireData,
  TermStatsError,
  isTermStatsError,
  type TermStatsErrorCode,
} from './errors';
