/**
 * typed-writable — ByteWriter
 *
 * Growable output buffer for the encoder. Capacity doubles on demand up to
 * maxBytes; a primitive write that would cross the limit throws EncodeError
 * before any of its bytes land. A record is many writes, so encodeInto()
 * rolls a failed record back with truncate().
 *
 * Several values may be appended back to back. The resulting buffer is a
 * plain concatenation of encoded records, which is the shape the byte
 * comparator walks (key bytes, then payload bytes, and so on).
 */

import {
  DEFAULT_MAX_ENCODED_BYTES,
  FLOAT_BYTES,
  INITIAL_WRITER_CAPACITY,
} from './constants';
import { EncodeError } from './errors';
import type { ByteSink } from './types';
import { writeVInt, writeVLong } from './varint';

// One encoder for every ByteWriter; encode() keeps no state.
const utf8Encoder = new TextEncoder();

export class ByteWriter implements ByteSink {
  private _buf:    Uint8Array;
  private _view:   DataView;
  private _length: number = 0;

  constructor(
    private readonly _maxBytes: number = DEFAULT_MAX_ENCODED_BYTES,
    initialCapacity:            number = INITIAL_WRITER_CAPACITY,
  ) {
    if (!Number.isSafeInteger(_maxBytes) || _maxBytes < 0) {
      throw new RangeError(`maxBytes must be a non-negative integer; got ${_maxBytes}.`);
    }
    this._buf  = new Uint8Array(Math.max(1, Math.min(initialCapacity, _maxBytes)));
    this._view = new DataView(this._buf.buffer);
  }

  /** Bytes written so far. */
  get length(): number {
    return this._length;
  }

  get maxBytes(): number {
    return this._maxBytes;
  }

  // ── Primitive writes ──────────────────────────────────────────────────────

  writeByte(byte: number): void {
    this.ensure(1);
    this._buf[this._length++] = byte & 0xff;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this._buf.set(bytes, this._length);
    this._length += bytes.length;
  }

  /** IEEE-754 double, big-endian. */
  writeFloat64(value: number): void {
    this.ensure(FLOAT_BYTES);
    this._view.setFloat64(this._length, value, /* littleEndian */ false);
    this._length += FLOAT_BYTES;
  }

  writeVLong(value: bigint): void {
    writeVLong(this, value);
  }

  writeVInt(value: number): void {
    writeVInt(this, value);
  }

  /** [byte_len: vint][UTF-8 bytes] */
  writeUtf8(text: string): void {
    const bytes = utf8Encoder.encode(text);
    this.writeVInt(bytes.length);
    this.writeBytes(bytes);
  }

  // ── Output ────────────────────────────────────────────────────────────────

  /** Copy of the written bytes. The writer stays usable afterwards. */
  toBytes(): Uint8Array {
    return this._buf.slice(0, this._length);
  }

  /** Drop everything written after the first `length` bytes. */
  truncate(length: number): void {
    if (!Number.isInteger(length) || length < 0 || length > this._length) {
      throw new RangeError(`Cannot truncate ${this._length} written bytes to ${length}.`);
    }
    this._length = length;
  }

  /** Discard written bytes, keeping the allocated capacity. */
  reset(): void {
    this._length = 0;
  }

  // ── Capacity ──────────────────────────────────────────────────────────────

  private ensure(n: number): void {
    const needed = this._length + n;
    if (needed > this._maxBytes) {
      throw new EncodeError(
        `Encoded output would reach ${needed} bytes; ` +
        `the writer is limited to ${this._maxBytes}.`,
      );
    }
    if (needed <= this._buf.length) return;

    const next = new Uint8Array(Math.min(this._maxBytes, Math.max(this._buf.length * 2, needed)));
    next.set(this._buf.subarray(0, this._length));
    this._buf  = next;
    this._view = new DataView(next.buffer);
  }
}
