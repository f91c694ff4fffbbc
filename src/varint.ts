/**
 * typed-writable — zero-compressed variable-length integers
 *
 * Byte-compatible with the host pipeline's vint/vlong layout (see the table
 * in constants.ts). Reading lives on ByteCursor; this module holds the
 * writer and the two marker-byte predicates the readers share.
 */

import { INT64_MAX, INT64_MIN } from './constants';
import { EncodeError } from './errors';
import type { ByteSink } from './types';

// ─── Marker byte ──────────────────────────────────────────────────────────────

/** Reinterpret an unsigned byte (0..255) as a signed i8. */
export function toSignedByte(byte: number): number {
  return byte > 0x7f ? byte - 0x100 : byte;
}

/**
 * Total encoded size, marker included, implied by the first byte.
 * @param first  The first byte as a signed i8.
 */
export function decodeVIntSize(first: number): number {
  if (first >= -112) return 1;
  if (first < -120)  return -119 - first;
  return -111 - first;
}

/** True when the marker byte announces a negative (one's-complement) value. */
export function isNegativeVInt(first: number): boolean {
  return first < -120 || (first >= -112 && first < 0);
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/**
 * Write a signed 64-bit integer in vlong form.
 *
 * @throws EncodeError if value lies outside the signed 64-bit range.
 */
export function writeVLong(sink: ByteSink, value: bigint): void {
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new EncodeError(
      `Integer ${value} is outside the signed 64-bit range ` +
      `[${INT64_MIN}, ${INT64_MAX}] and has no vlong encoding.`,
    );
  }

  if (value >= -112n && value <= 127n) {
    sink.writeByte(Number(value) & 0xff);
    return;
  }

  let marker    = -112;
  let magnitude = value;
  if (magnitude < 0n) {
    magnitude = ~magnitude; // one's complement: -(v + 1)
    marker    = -120;
  }

  for (let tmp = magnitude; tmp !== 0n; tmp >>= 8n) marker--;

  sink.writeByte(marker & 0xff);

  const byteCount = marker < -120 ? -(marker + 120) : -(marker + 112);
  for (let idx = byteCount; idx !== 0; idx--) {
    const shift = BigInt((idx - 1) * 8);
    sink.writeByte(Number((magnitude >> shift) & 0xffn));
  }
}

/** Write a non-negative length or count in vint form. */
export function writeVInt(sink: ByteSink, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new EncodeError(`Length prefix must be a non-negative integer; got ${value}.`);
  }
  writeVLong(sink, BigInt(value));
}

/** Number of bytes writeVLong() emits for value. */
export function vlongSize(value: bigint): number {
  if (value >= -112n && value <= 127n) return 1;
  let magnitude = value < 0n ? ~value : value;
  let size = 1;
  for (; magnitude !== 0n; magnitude >>= 8n) size++;
  return size;
}
