// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  Tag,
  ComparisonClass,
  ValueKind,
  Ordering,
  ByteSink,
  EncodeOptions,
  DecodeOptions,
  ByteComparatorOptions,
  EncodedComparison,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  TAG_NONE,
  TAG_INTEGER,
  TAG_FLOAT,
  TAG_TEXT,
  TAG_FIXED_SEQUENCE,
  TAG_MAPPING,
  TAG_VARIABLE_SEQUENCE,
  CLASS_NONE,
  CLASS_NUMERIC,
  CLASS_TEXT,
  CLASS_FIXED_SEQUENCE,
  CLASS_MAPPING,
  CLASS_VARIABLE_SEQUENCE,
  INT64_MIN,
  INT64_MAX,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_ENCODED_BYTES,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  ValidationError,
  DecodeError,
  EncodeError,
  ComparisonIncompletenessError,
} from './errors';

// ─── Value Model ──────────────────────────────────────────────────────────────
export {
  NoneValue,
  IntegerValue,
  FloatValue,
  TextValue,
  FixedSequence,
  VariableSequence,
  Mapping,
  NONE,
  none,
  integer,
  float,
  text,
  fixedSequence,
  variableSequence,
  mapping,
  validate,
  isValue,
  isHashableKey,
  tagOf,
  toNative,
  describeType,
} from './value';
export type { Value, SequenceLike, NativeValue } from './value';

// ─── Codec ────────────────────────────────────────────────────────────────────
export { encode, encodeInto, decode, decodeFrom, decodeAll } from './codec';
export { ByteWriter } from './writer';
export { ByteCursor } from './cursor';
export {
  writeVLong,
  writeVInt,
  vlongSize,
  decodeVIntSize,
  isNegativeVInt,
  toSignedByte,
} from './varint';

// ─── Comparators ──────────────────────────────────────────────────────────────
export { classify, comparisonClass } from './classify';
export { compareValues, valuesEqual, compareDoubles, compareCodePoints } from './compare';
export { ByteComparator, compareBytes, compareEncoded } from './byte-compare';

// ─── Rendering & Hash ─────────────────────────────────────────────────────────
export { render, renderFloat, renderText } from './render';
export { hashValue } from './hash';

// ─── Record ───────────────────────────────────────────────────────────────────
export { TypedRecord } from './record';
