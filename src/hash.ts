/**
 * typed-writable — structural hash
 *
 * 32-bit FNV-1a over a walk of the value, used by the host's partitioner and
 * by Mapping's key buckets. Values that are the same Mapping key hash
 * equally:
 *
 *   - Numerics within ±2^53 hash the bytes of their double, so Integer(3)
 *     and Float(3.0) land together; -0 folds to 0.
 *   - Numerics beyond ±2^53 that are integral hash their exact bigint
 *     digits, so Integer(2^53) and Integer(2^53 + 1) stay apart while
 *     Float(2^60) still meets Integer(2^60).
 *   - Mappings hash their render() text.
 *
 * compareValues() ties integers beyond 2^53 that this hash separates, and
 * treats NaN as equal to every number while NaN hashes to one fixed value.
 * The hash is not stable across library versions and is unrelated to the
 * encoded bytes.
 */

import { classify } from './classify';
import { render } from './render';
import type { Value } from './value';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME  = 0x01000193;

function mixByte(hash: number, byte: number): number {
  return Math.imul(hash ^ (byte & 0xff), FNV_PRIME);
}

function mixU32(hash: number, word: number): number {
  hash = mixByte(hash, word >>> 24);
  hash = mixByte(hash, word >>> 16);
  hash = mixByte(hash, word >>> 8);
  return mixByte(hash, word);
}

/** UTF-16 code units, two bytes each. Equal strings ⇔ equal unit sequences. */
function mixString(hash: number, s: string): number {
  hash = mixU32(hash, s.length);
  for (let i = 0; i < s.length; i++) {
    const cu = s.charCodeAt(i);
    hash = mixByte(hash, cu >>> 8);
    hash = mixByte(hash, cu);
  }
  return hash;
}

function mixDouble(hash: number, x: number, scratch: DataView): number {
  if (Number.isNaN(x)) {
    // NaN payloads vary; hash the quiet-NaN pattern instead.
    scratch.setUint32(0, 0x7ff80000, false);
    scratch.setUint32(4, 0, false);
  } else {
    scratch.setFloat64(0, x + 0, false); // -0 + 0 === +0
  }
  for (let i = 0; i < 8; i++) hash = mixByte(hash, scratch.getUint8(i));
  return hash;
}

const MAX_EXACT = 2 ** 53;
const MAX_EXACT_BIGINT = 2n ** 53n;

/** Sign byte, then magnitude bytes from the low end. */
function mixBigInt(hash: number, n: bigint): number {
  hash = mixByte(hash, n < 0n ? 1 : 0);
  for (let m = n < 0n ? -n : n; m !== 0n; m >>= 8n) hash = mixByte(hash, Number(m & 0xffn));
  return hash;
}

function mixInteger(hash: number, n: bigint, scratch: DataView): number {
  const exact = n >= -MAX_EXACT_BIGINT && n <= MAX_EXACT_BIGINT;
  return exact ? mixDouble(hash, Number(n), scratch) : mixBigInt(hash, n);
}

function mixFloat(hash: number, x: number, scratch: DataView): number {
  const wide = Number.isInteger(x) && Math.abs(x) > MAX_EXACT;
  return wide ? mixBigInt(hash, BigInt(x)) : mixDouble(hash, x, scratch);
}

function mixValue(hash: number, v: Value, scratch: DataView): number {
  hash = mixByte(hash, classify(v));
  switch (v.kind) {
    case 'none':
      return hash;
    case 'integer':
      return mixInteger(hash, v.value, scratch);
    case 'float':
      return mixFloat(hash, v.value, scratch);
    case 'text':
      return mixString(hash, v.value);
    case 'fixedSequence':
    case 'variableSequence': {
      hash = mixU32(hash, v.length);
      for (const item of v) hash = mixValue(hash, item, scratch);
      return hash;
    }
    case 'mapping':
      return mixString(hash, render(v));
  }
}

/** Unsigned 32-bit structural hash. */
export function hashValue(v: Value): number {
  const scratch = new DataView(new ArrayBuffer(8));
  return mixValue(FNV_OFFSET, v, scratch) >>> 0;
}
