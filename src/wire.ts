import { isValidCount } from './entry';
import { InvalidPolicyId, MalformedWireData } from './errors';
import { orderingFromId, orderingId } from './ordering';
import type { OrderingPolicy, TermStatsEntry, TermStatsFacet } from './types';
import { ByteReader, ByteWriter } from './utils/stream-io';

// Smallest possible entry: empty key (1) + count (1) + total (8).
const MIN_ENTRY_BYTES = 10;

/**
 * Encode a facet to its binary wire form.
 *
 * Layout:
 * ```
 * name         string  (varint byte length + UTF-8)
 * policyId     1 byte
 * requiredSize varint
 * missingCount varlong
 * entryCount   varint
 * entryCount × { key string, count varint, total float64 big-endian }
 * ```
 *
 *! NOTE: this layout is shared by every node of a cluster; changes break interop.
 *
 * @throws MalformedWireData if a field cannot be represented
 */
export function encodeFacet(facet: TermStatsFacet): Uint8Array {
  const writer = new ByteWriter(estimateSize(facet));
  writeFacet(writer, facet);
  return writer.toBytes();
}

/**
 * Decode bytes produced by `encodeFacet`. The whole input must be one facet.
 *
 * @throws MalformedWireData on truncation, unknown policy id, out-of-range
 * sizes, invalid entries or trailing bytes
 */
export function decodeFacet(bytes: Uint8Array): TermStatsFacet {
  const reader = new ByteReader(bytes);
  const facet = readFacet(reader);
  if (reader.remaining > 0) {
    throw new MalformedWireData(`${reader.remaining} trailing byte(s) after facet`, reader.offset);
  }
  return facet;
}

/**
 * Append one facet to a writer (for streams carrying several facets).
 */
export function writeFacet(writer: ByteWriter, facet: TermStatsFacet): void {
  writer.writeString(facet.name);
  writer.writeByte(orderingId(facet.orderingPolicy));
  writer.writeVInt(facet.requiredSize);
  writer.writeVLong(facet.missingCount);
  writer.writeVInt(facet.entries.length);

  for (const entry of facet.entries) {
    if (!isValidCount(entry.count)) {
      throw new MalformedWireData(`cannot encode entry "${entry.key}" with count ${entry.count}`);
    }
    writer.writeString(entry.key);
    writer.writeVInt(entry.count);
    writer.writeDouble(entry.total);
  }
}

/**
 * Read one facet from a reader, leaving it positioned after the facet.
 */
export function readFacet(reader: ByteReader): TermStatsFacet {
  const name = reader.readString();

  const orderingPolicy = readOrderingPolicy(reader);
  const requiredSize = reader.readVInt();
  const missingCount = reader.readVLong();

  const countOffset = reader.offset;
  const entryCount = reader.readVInt();
  if (entryCount * MIN_ENTRY_BYTES > reader.remaining) {
    throw new MalformedWireData(
      `declared ${entryCount} entries but only ${reader.remaining} byte(s) remain`,
      countOffset,
    );
  }

  const entries: TermStatsEntry[] = new Array(entryCount);
  for (let i = 0; i < entryCount; i++) {
    const key = reader.readString();
    const entryOffset = reader.offset;
    const count = reader.readVInt();
    if (count < 1) {
      throw new MalformedWireData(`entry "${key}" has count 0`, entryOffset);
    }
    const total = reader.readDouble();
    entries[i] = { key, count, total };
  }

  return { name, orderingPolicy, requiredSize, missingCount, entries };
}

function readOrderingPolicy(reader: ByteReader): OrderingPolicy {
  const offset = reader.offset;
  const id = reader.readByte();
  try {
    return orderingFromId(id);
  }
  catch (error) {
    if (error instanceof InvalidPolicyId) {
      throw new MalformedWireData(`unknown ordering policy id ${id}`, offset, { cause: error });
    }
    throw error;
  }
}

// Rough upper bound to avoid regrowing the writer for typical ASCII keys.
function estimateSize(facet: TermStatsFacet): number {
  let size = facet.name.length + 24;
  for (const entry of facet.entries) {
    size += entry.key.length + 15;
  }
  return size;
}
