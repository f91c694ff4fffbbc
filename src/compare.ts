/**
 * typed-writable — value comparator
 *
 * Total three-way order over decoded Values:
 *
 *   None < numeric < Text < FixedSequence < Mapping < VariableSequence
 *
 * Within a class:
 *   numeric     both sides widened to float64, then compared. Integers
 *               beyond ±2^53 may collapse onto the same double and compare
 *               equal; this is the accepted cost of a single numeric class.
 *   Text        Unicode code point order (identical to UTF-8 byte order).
 *   sequences   element-wise; the first difference decides; a strict
 *               prefix sorts first.
 *   Mapping     order of render() output. Format-dependent, not structural.
 */

import { classify } from './classify';
import {
  CLASS_FIXED_SEQUENCE,
  CLASS_MAPPING,
  CLASS_NONE,
  CLASS_NUMERIC,
  CLASS_TEXT,
  CLASS_VARIABLE_SEQUENCE,
} from './constants';
import { render } from './render';
import type { Ordering } from './types';
import type { SequenceLike, Value } from './value';

// ─── Primitive orders ─────────────────────────────────────────────────────────

/** NaN compares equal to every number, matching the byte comparator. */
export function compareDoubles(a: number, b: number): Ordering {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Code point order. Surrogate pairs are compared as the code point they encode. */
export function compareCodePoints(a: string, b: string): Ordering {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(j) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }
  if (i < a.length) return 1;
  if (j < b.length) return -1;
  return 0;
}

// ─── Variant accessors ────────────────────────────────────────────────────────
// Only reached after the classes of both sides were found equal, so the
// default branches indicate a broken class table, not bad input.

function numericOf(v: Value): number {
  switch (v.kind) {
    case 'integer': return Number(v.value);
    case 'float':   return v.value;
    default:        throw new TypeError(`${v.kind} is not numeric`);
  }
}

function textOf(v: Value): string {
  if (v.kind !== 'text') throw new TypeError(`${v.kind} is not text`);
  return v.value;
}

function sequenceOf(v: Value): SequenceLike {
  if (v.kind !== 'fixedSequence' && v.kind !== 'variableSequence') {
    throw new TypeError(`${v.kind} is not a sequence`);
  }
  return v;
}

function compareSequences(a: SequenceLike, b: SequenceLike): Ordering {
  let i = 0;
  for (; i < a.length; i++) {
    if (i === b.length) return 1;
    const c = compareValues(a.get(i), b.get(i));
    if (c !== 0) return c;
  }
  return i < b.length ? -1 : 0;
}

// ─── compareValues ────────────────────────────────────────────────────────────

export function compareValues(a: Value, b: Value): Ordering {
  const ca = classify(a);
  const cb = classify(b);
  if (ca !== cb) return ca < cb ? -1 : 1;

  switch (ca) {
    case CLASS_NONE:
      return 0;
    case CLASS_NUMERIC:
      return compareDoubles(numericOf(a), numericOf(b));
    case CLASS_TEXT:
      return compareCodePoints(textOf(a), textOf(b));
    case CLASS_FIXED_SEQUENCE:
    case CLASS_VARIABLE_SEQUENCE:
      return compareSequences(sequenceOf(a), sequenceOf(b));
    case CLASS_MAPPING: {
      const ra = render(a);
      const rb = render(b);
      return ra < rb ? -1 : ra > rb ? 1 : 0;
    }
  }
}

export function valuesEqual(a: Value, b: Value): boolean {
  return compareValues(a, b) === 0;
}
