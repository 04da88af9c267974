import { MalformedWireData } from '../errors';

const MAX_VINT = 0x7fffffff;
const MAX_VINT_BYTES = 5;
const MAX_VLONG_BYTES = 9;
const FLOAT64_BYTES = 8;
const INITIAL_CAPACITY = 64;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Append-only binary writer with LEB128 varints, length-prefixed UTF-8 strings
 * and big-endian IEEE-754 doubles.
 */
export class ByteWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private length = 0;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
    this.view = new DataView(this.buffer.buffer);
  }

  get size(): number {
    return this.length;
  }

  writeByte(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new MalformedWireData(`cannot encode ${value} as a byte`);
    }
    this.ensure(1);
    this.buffer[this.length++] = value;
  }

  /**
   * Variable-length int in 0..2^31-1.
   */
  writeVInt(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_VINT) {
      throw new MalformedWireData(`cannot encode ${value} as a varint`);
    }
    this.writeUnsignedLeb128(value);
  }

  /**
   * Variable-length long in 0..Number.MAX_SAFE_INTEGER.
   */
  writeVLong(value: number): void {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new MalformedWireData(`cannot encode ${value} as a varlong`);
    }
    this.writeUnsignedLeb128(value);
  }

  writeString(value: string): void {
    const bytes = utf8Encoder.encode(value);
    this.writeVInt(bytes.length);
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  writeDouble(value: number): void {
    this.ensure(FLOAT64_BYTES);
    this.view.setFloat64(this.length, value, false);
    this.length += FLOAT64_BYTES;
  }

  /**
   * Copy of the bytes written so far.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  // Division instead of shifts: values may exceed 32 bits.
  private writeUnsignedLeb128(value: number): void {
    let remaining = value;
    while (remaining >= 0x80) {
      this.writeByte((remaining % 0x80) | 0x80);
      remaining = Math.floor(remaining / 0x80);
    }
    this.writeByte(remaining);
  }

  private ensure(extra: number): void {
    const required = this.length + extra;
    if (required <= this.buffer.length) return;

    let capacity = this.buffer.length * 2;
    while (capacity < required) capacity *= 2;

    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }
}

/**
 * Cursor over a byte array, the read-side counterpart of `ByteWriter`.
 * Every read checks bounds and throws `MalformedWireData` instead of reading past the end.
 */
export class ByteReader {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private position = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.bytes.length - this.position;
  }

  readByte(): number {
    this.require(1, 'byte');
    return this.bytes[this.position++];
  }

  readVInt(): number {
    const start = this.position;
    const value = this.readUnsignedLeb128(MAX_VINT_BYTES, 'varint');
    if (value > MAX_VINT) {
      throw new MalformedWireData('varint is negative or out of range', start);
    }
    return value;
  }

  readVLong(): number {
    return this.readUnsignedLeb128(MAX_VLONG_BYTES, 'varlong');
  }

  readString(): string {
    const start = this.position;
    const byteLength = this.readVInt();
    this.require(byteLength, 'string');

    const slice = this.bytes.subarray(this.position, this.position + byteLength);
    let value: string;
    try {
      value = utf8Decoder.decode(slice);
    }
    catch (error) {
      throw new MalformedWireData('string is not valid UTF-8', start, { cause: error });
    }
    this.position += byteLength;
    return value;
  }

  readDouble(): number {
    this.require(FLOAT64_BYTES, 'float64');
    const value = this.view.getFloat64(this.position, false);
    this.position += FLOAT64_BYTES;
    return value;
  }

  private readUnsignedLeb128(maxBytes: number, what: string): number {
    const start = this.position;
    let value = 0;
    let multiplier = 1;

    for (let i = 0; i < maxBytes; i++) {
      const byte = this.readByte();
      value += (byte & 0x7f) * multiplier;
      if (value > Number.MAX_SAFE_INTEGER) {
        throw new MalformedWireData(`${what} overflows`, start);
      }
      if ((byte & 0x80) === 0) return value;
      multiplier *= 0x80;
    }

    throw new MalformedWireData(`${what} is longer than ${maxBytes} bytes`, start);
  }

  private require(count: number, what: string): void {
    if (count > this.remaining) {
      throw new MalformedWireData(
        `truncated input: ${what} needs ${count} byte(s), ${this.remaining} left`,
        this.position,
      );
    }
  }
}
