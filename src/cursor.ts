/**
 * typed-writable — ByteCursor
 *
 * A read cursor over a window [offset, offset + length) of a byte buffer.
 * Both the decoder and the byte comparator walk encoded values with it.
 *
 * pos is public and advances in place. Allocate one cursor per buffer per
 * call; a cursor is never shared between concurrent comparisons. Reads do
 * not allocate, except readUtf8(), which builds the decoded string.
 *
 * Every read is bounds-checked against the window end, not the underlying
 * buffer end, so a comparator handed (buffer, offset, length) can never
 * read into the neighbouring record.
 */

import { FLOAT_BYTES, INT64_MAX, MAX_TAG, MAX_VINT } from './constants';
import { DecodeError } from './errors';
import type { Tag } from './types';
import { decodeVIntSize, isNegativeVInt, toSignedByte } from './varint';

// TextDecoder is stateless when not used in streaming mode; one instance is
// safe to reuse across every cursor.
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

const TWO_POW_32 = 0x1_0000_0000;

function isTag(byte: number): byte is Tag {
  return Number.isInteger(byte) && byte >= 0 && byte <= MAX_TAG;
}

export class ByteCursor {
  /** Absolute position of the next byte to read. */
  pos: number;

  /** Absolute position of the first byte in the window. */
  readonly start: number;

  /** Absolute position one past the last readable byte. */
  readonly end: number;

  private readonly _data: DataView;

  constructor(
    readonly bytes: Uint8Array,
    offset:         number = 0,
    length:         number = bytes.length - offset,
  ) {
    if (
      !Number.isInteger(offset) || !Number.isInteger(length) ||
      offset < 0 || length < 0 || offset + length > bytes.length
    ) {
      throw new RangeError(
        `Cursor window [${offset}, ${offset + length}) lies outside ` +
        `the ${bytes.length}-byte buffer.`,
      );
    }
    this.pos   = offset;
    this.start = offset;
    this.end   = offset + length;
    this._data = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.end - this.pos;
  }

  // ── Bounds ────────────────────────────────────────────────────────────────

  private require(n: number, what: string): void {
    if (this.pos + n > this.end) {
      throw new DecodeError(
        `Truncated input: ${what} needs ${n} byte(s), ${this.end - this.pos} remain`,
        this.pos,
      );
    }
  }

  /** Advance past n bytes without reading them. */
  skip(n: number): void {
    this.require(n, 'skip');
    this.pos += n;
  }

  /** Unsigned byte at an absolute position inside the window, without moving. */
  byteAt(index: number): number {
    if (index < this.start || index >= this.end) {
      throw new DecodeError(`Read outside the cursor window`, index);
    }
    return this._data.getUint8(index);
  }

  // ── Fixed-width reads ─────────────────────────────────────────────────────

  readByte(): number {
    this.require(1, 'byte');
    return this._data.getUint8(this.pos++);
  }

  /** Read one tag byte; anything outside 0..6 is malformed input. */
  readTag(): Tag {
    const at   = this.pos;
    const byte = this.readByte();
    if (!isTag(byte)) {
      throw new DecodeError(`Unknown type tag 0x${byte.toString(16).padStart(2, '0')}`, at);
    }
    return byte;
  }

  /** IEEE-754 double, big-endian. */
  readFloat64(): number {
    this.require(FLOAT_BYTES, 'float');
    const v = this._data.getFloat64(this.pos, /* littleEndian */ false);
    this.pos += FLOAT_BYTES;
    return v;
  }

  // ── Variable-length reads ─────────────────────────────────────────────────

  /** Exact signed 64-bit vlong. A magnitude of 2^63 or more is malformed. */
  readVLong(): bigint {
    const at    = this.pos;
    const first = toSignedByte(this.readByte());
    const size  = decodeVIntSize(first);
    if (size === 1) return BigInt(first);

    this.require(size - 1, 'vlong');
    let v = 0n;
    for (let i = 0; i < size - 1; i++) {
      v = (v << 8n) | BigInt(this._data.getUint8(this.pos++));
    }
    if (v > INT64_MAX) {
      throw new DecodeError(`vlong magnitude 0x${v.toString(16)} exceeds the signed 64-bit range`, at);
    }
    return isNegativeVInt(first) ? ~v : v;
  }

  /**
   * vlong widened to a double, without BigInt allocation.
   *
   * The magnitude is assembled as two exact 32-bit halves and combined with
   * a single rounding step, so the result equals Number(readVLong()) for
   * every 64-bit input, including those beyond 2^53.
   */
  readVLongAsNumber(): number {
    const first = toSignedByte(this.readByte());
    const size  = decodeVIntSize(first);
    if (size === 1) return first;

    const n = size - 1;
    this.require(n, 'vlong');
    if (n === 8 && this._data.getUint8(this.pos) > 0x7f) {
      throw new DecodeError('vlong magnitude exceeds the signed 64-bit range', this.pos - 1);
    }

    const split = n > 4 ? n - 4 : 0;
    let hi = 0;
    let lo = 0;
    for (let i = 0; i < split; i++) hi = hi * 256 + this._data.getUint8(this.pos++);
    for (let i = split; i < n; i++) lo = lo * 256 + this._data.getUint8(this.pos++);

    if (!isNegativeVInt(first)) return hi * TWO_POW_32 + lo;

    // value = -(magnitude + 1); carry the +1 before rounding.
    lo += 1;
    if (lo === TWO_POW_32) {
      lo  = 0;
      hi += 1;
    }
    return -(hi * TWO_POW_32 + lo);
  }

  /**
   * A vint length or element count.
   *
   * Every element of a sequence or mapping occupies at least one byte and
   * every text byte is one byte, so a count larger than the bytes left in
   * the window can only come from corrupt input.
   */
  readLength(): number {
    const at    = this.pos;
    const first = toSignedByte(this.readByte());
    const size  = decodeVIntSize(first);

    let value: number;
    if (size === 1) {
      value = first;
    } else {
      if (size > 5) throw new DecodeError(`Length prefix of ${size} bytes exceeds 32 bits`, at);
      this.require(size - 1, 'length prefix');
      let magnitude = 0;
      for (let i = 0; i < size - 1; i++) magnitude = magnitude * 256 + this._data.getUint8(this.pos++);
      value = isNegativeVInt(first) ? -magnitude - 1 : magnitude;
    }

    if (value < 0 || value > MAX_VINT) {
      throw new DecodeError(`Invalid length prefix ${value}`, at);
    }
    if (value > this.end - this.pos) {
      throw new DecodeError(
        `Declared length ${value} exceeds the ${this.end - this.pos} byte(s) remaining`,
        at,
      );
    }
    return value;
  }

  /** [byte_len: vint][UTF-8 bytes] → string. Invalid UTF-8 is a DecodeError. */
  readUtf8(): string {
    const len   = this.readLength();
    const start = this.pos;
    this.pos += len;
    try {
      return utf8Decoder.decode(this.bytes.subarray(start, start + len));
    } catch (err) {
      throw new DecodeError('Invalid UTF-8 in text payload', start, { cause: err });
    }
  }
}
