/**
 * typed-writable — wire constants
 *
 * These constants define the binary contract of an encoded value. Any change
 * to a tag code is a BREAKING CHANGE: the numeric tag order is also the
 * primary sort precedence of encoded keys.
 *
 * Every encoded node starts with one tag byte:
 *
 *   [0]  none                 no payload
 *   [1]  integer              [vlong]
 *   [2]  float                [f64, big-endian]
 *   [3]  text                 [byte_len: vint][UTF-8 bytes]
 *   [4]  fixed sequence       [count: vint][count × node]
 *   [5]  mapping              [count: vint][count × (key node, value node)]
 *   [6]  variable sequence    [count: vint][count × node]
 *
 * vint / vlong use the zero-compressed layout of the host pipeline:
 *
 *   -112 ≤ v ≤ 127   one byte, the value itself
 *   otherwise        [marker: i8][magnitude: 1..8 bytes, big-endian]
 *                    marker -113..-120  → positive, 1..8 magnitude bytes
 *                    marker -121..-128  → negative, stored as one's complement
 */

import type { ComparisonClass, Tag, ValueKind } from './types';

// ─── Tags ─────────────────────────────────────────────────────────────────────

export const TAG_NONE              = 0;
export const TAG_INTEGER           = 1;
export const TAG_FLOAT             = 2;
export const TAG_TEXT              = 3;
export const TAG_FIXED_SEQUENCE    = 4;
export const TAG_MAPPING           = 5;
export const TAG_VARIABLE_SEQUENCE = 6;

/** Highest tag code a well-formed buffer may contain. */
export const MAX_TAG = TAG_VARIABLE_SEQUENCE;

export const KIND_TO_TAG: Readonly<Record<ValueKind, Tag>> = {
  none:             TAG_NONE,
  integer:          TAG_INTEGER,
  float:            TAG_FLOAT,
  text:             TAG_TEXT,
  fixedSequence:    TAG_FIXED_SEQUENCE,
  mapping:          TAG_MAPPING,
  variableSequence: TAG_VARIABLE_SEQUENCE,
};

/** Human-readable variant names, used in error messages. */
export const KIND_NAMES: Readonly<Record<ValueKind, string>> = {
  none:             'None',
  integer:          'Integer',
  float:            'Float',
  text:             'Text',
  fixedSequence:    'FixedSequence',
  mapping:          'Mapping',
  variableSequence: 'VariableSequence',
};

// ─── Comparison Classes ───────────────────────────────────────────────────────

/**
 * Integer and Float share CLASS_NUMERIC; every other variant keeps its tag
 * code as its class. There is deliberately no class 2.
 */
export const CLASS_NONE              = 0;
export const CLASS_NUMERIC           = 1;
export const CLASS_TEXT              = 3;
export const CLASS_FIXED_SEQUENCE    = 4;
export const CLASS_MAPPING           = 5;
export const CLASS_VARIABLE_SEQUENCE = 6;

export const TAG_TO_CLASS: Readonly<Record<Tag, ComparisonClass>> = {
  0: CLASS_NONE,
  1: CLASS_NUMERIC,
  2: CLASS_NUMERIC,
  3: CLASS_TEXT,
  4: CLASS_FIXED_SEQUENCE,
  5: CLASS_MAPPING,
  6: CLASS_VARIABLE_SEQUENCE,
};

// ─── Integer Range ────────────────────────────────────────────────────────────

export const INT64_MIN = -0x8000_0000_0000_0000n;
export const INT64_MAX =  0x7fff_ffff_ffff_ffffn;

/** Largest length or element count a vint prefix may carry. */
export const MAX_VINT = 0x7fff_ffff;

// ─── Limits & Defaults ────────────────────────────────────────────────────────

export const DEFAULT_MAX_DEPTH         = 256;
export const DEFAULT_MAX_ENCODED_BYTES = 0x7fff_ffff;

/** Initial ByteWriter capacity; grows by doubling. */
export const INITIAL_WRITER_CAPACITY = 256;

/** Byte width of an encoded float payload. */
export const FLOAT_BYTES = 8;
