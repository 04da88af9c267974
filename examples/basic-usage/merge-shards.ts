import {
  createMerger,
  decodeFacet,
  encodeFacet,
  toFacetView,
  type TermStatsFacet,
} from '../../src';

// Per-shard partials for a "price by region" terms-stats facet
const shards: TermStatsFacet[] = [
  {
    name: 'price_by_region',
    orderingPolicy: 'total_desc',
    requiredSize: 2,
    missingCount: 1,
    entries: [
      { key: 'emea', count: 4, total: 420 },
      { key: 'apac', count: 2, total: 150 },
      { key: 'amer', count: 3, total: 300 },
    ],
  },
  {
    name: 'price_by_region',
    orderingPolicy: 'total_desc',
    requiredSize: 2,
    missingCount: 0,
    entries: [
      { key: 'amer', count: 5, total: 610 },
      { key: 'apac', count: 1, total: 90 },
    ],
  },
];

function main() {
  const merger = createMerger();

  // Example 1: Merge in-memory partials
  console.log('=== Example 1: Merge ===');
  const merged = merger.reduce('price_by_region', 'total_desc', 2, shards);
  console.log(`Top ${merged.entries.length} of ${merged.requiredSize}, ${merged.missingCount} missing`);
  console.log(JSON.stringify(toFacetView(merged), null, 2));
  console.log();

  // Example 2: Ship partials over the wire and merge the payloads
  console.log('=== Example 2: Wire payloads ===');
  const payloads = shards.map(encodeFacet);
  console.log('Payload sizes:', payloads.map((p) => p.byteLength));
  const fromWire = merger.reduceEncoded('price_by_region', 'total_desc', 2, payloads);
  console.log('Same result:', JSON.stringify(fromWire) === JSON.stringify(merged));
  console.log();

  // Example 3: Round-trip a finalized facet
  console.log('=== Example 3: Round-trip ===');
  const decoded = decodeFacet(encodeFacet(merged));
  console.log('Keys:', decoded.entries.map((e) => e.key));
}

main();
