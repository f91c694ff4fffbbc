/**
 * typed-writable — encoder / decoder
 *
 * Wire layout is documented in constants.ts. encode() and decode() are exact
 * mirrors: decode(encode(v)) reproduces v for every variant, with Mappings
 * keeping their key/value pairing and, in this implementation, their
 * iteration order too (entries are written and re-inserted in order).
 *
 * Records may be concatenated; use encodeInto() to append to a shared
 * ByteWriter and decodeFrom() / decodeAll() to read them back.
 */

import {
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_ENCODED_BYTES,
  KIND_NAMES,
  TAG_FIXED_SEQUENCE,
  TAG_FLOAT,
  TAG_INTEGER,
  TAG_MAPPING,
  TAG_NONE,
  TAG_TEXT,
  TAG_VARIABLE_SEQUENCE,
} from './constants';
import { ByteCursor } from './cursor';
import { DecodeError, EncodeError } from './errors';
import type { DecodeOptions, EncodeOptions } from './types';
import {
  FixedSequence,
  FloatValue,
  IntegerValue,
  Mapping,
  NONE,
  TextValue,
  VariableSequence,
  isHashableKey,
  tagOf,
  type Value,
} from './value';
import { ByteWriter } from './writer';

// ─── Encoding ─────────────────────────────────────────────────────────────────

interface EncodeLimits {
  readonly maxDepth: number;
  readonly maxBytes: number;
  /** Writer length at which the current record starts. */
  readonly start:    number;
}

function checkBudget(out: ByteWriter, limits: EncodeLimits): void {
  if (out.length - limits.start > limits.maxBytes) {
    throw new EncodeError(`Encoded record exceeds its budget of ${limits.maxBytes} bytes.`);
  }
}

function encodeValue(out: ByteWriter, v: Value, depth: number, limits: EncodeLimits): void {
  if (depth > limits.maxDepth) {
    throw new EncodeError(`Maximum nesting depth ${limits.maxDepth} exceeded at ${out.length} bytes.`);
  }

  out.writeByte(tagOf(v));
  switch (v.kind) {
    case 'none':
      break;
    case 'integer':
      out.writeVLong(v.value);
      break;
    case 'float':
      out.writeFloat64(v.value);
      break;
    case 'text':
      out.writeUtf8(v.value);
      break;
    case 'fixedSequence':
    case 'variableSequence':
      out.writeVInt(v.length);
      checkBudget(out, limits);
      for (const item of v) encodeValue(out, item, depth + 1, limits);
      return;
    case 'mapping':
      out.writeVInt(v.size);
      checkBudget(out, limits);
      for (const [key, val] of v.entries()) {
        encodeValue(out, key, depth + 1, limits);
        encodeValue(out, val, depth + 1, limits);
      }
      return;
  }
  checkBudget(out, limits);
}

/**
 * Append the encoding of v to an existing writer. On any failure the writer
 * is truncated back to where this record began, so earlier records in a
 * shared buffer stay decodable.
 */
export function encodeInto(out: ByteWriter, v: Value, options: EncodeOptions = {}): void {
  const limits: EncodeLimits = {
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    maxBytes: options.maxBytes ?? DEFAULT_MAX_ENCODED_BYTES,
    start:    out.length,
  };
  try {
    encodeValue(out, v, 0, limits);
  } catch (err) {
    out.truncate(limits.start);
    throw err;
  }
}

/** Encode one value into a fresh byte array. */
export function encode(v: Value, options: EncodeOptions = {}): Uint8Array {
  const out = new ByteWriter(options.maxBytes);
  encodeInto(out, v, options);
  return out.toBytes();
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

function decodeValue(cursor: ByteCursor, depth: number, maxDepth: number): Value {
  if (depth > maxDepth) {
    throw new DecodeError(`Maximum nesting depth ${maxDepth} exceeded`, cursor.pos);
  }

  const tag = cursor.readTag();
  switch (tag) {
    case TAG_NONE:
      return NONE;
    case TAG_INTEGER:
      return new IntegerValue(cursor.readVLong());
    case TAG_FLOAT:
      return new FloatValue(cursor.readFloat64());
    case TAG_TEXT:
      return new TextValue(cursor.readUtf8());
    case TAG_FIXED_SEQUENCE:
    case TAG_VARIABLE_SEQUENCE: {
      const count = cursor.readLength();
      const items: Value[] = [];
      for (let i = 0; i < count; i++) items.push(decodeValue(cursor, depth + 1, maxDepth));
      return tag === TAG_FIXED_SEQUENCE ? new FixedSequence(items) : new VariableSequence(items);
    }
    case TAG_MAPPING: {
      const count = cursor.readLength();
      const m = new Mapping();
      for (let i = 0; i < count; i++) {
        const keyAt = cursor.pos;
        const key   = decodeValue(cursor, depth + 1, maxDepth);
        if (!isHashableKey(key)) {
          throw new DecodeError(
            `Mapping key of type ${KIND_NAMES[key.kind]} is not hashable`,
            keyAt,
          );
        }
        m.set(key, decodeValue(cursor, depth + 1, maxDepth));
      }
      return m;
    }
  }
}

/** Decode one value at the cursor, leaving the cursor just past it. */
export function decodeFrom(cursor: ByteCursor, options: DecodeOptions = {}): Value {
  return decodeValue(cursor, 0, options.maxDepth ?? DEFAULT_MAX_DEPTH);
}

/**
 * Decode exactly one value occupying the whole buffer.
 * @throws DecodeError on malformed input or trailing bytes.
 */
export function decode(bytes: Uint8Array, options: DecodeOptions = {}): Value {
  const cursor = new ByteCursor(bytes);
  const value  = decodeFrom(cursor, options);
  if (cursor.remaining !== 0) {
    throw new DecodeError(`${cursor.remaining} trailing byte(s) after the value`, cursor.pos);
  }
  return value;
}

/** Decode a back-to-back concatenation of values. */
export function decodeAll(bytes: Uint8Array, options: DecodeOptions = {}): Value[] {
  const cursor = new ByteCursor(bytes);
  const values: Value[] = [];
  while (cursor.remaining > 0) values.push(decodeFrom(cursor, options));
  return values;
}
