/**
 * typed-writable — shared type definitions
 *
 * The encoded bytes are the contract; these types describe how the rest of
 * the library talks about them.
 */

// ─── Tags & Classes ───────────────────────────────────────────────────────────

/** Wire tag codes. Their numeric order is the primary sort order. */
export type Tag = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/**
 * Normalized ordering bucket. Integer (1) and Float (2) both map to 1,
 * so 2 never appears.
 */
export type ComparisonClass = 0 | 1 | 3 | 4 | 5 | 6;

/** Discriminant of the Value union. */
export type ValueKind =
  | 'none'
  | 'integer'
  | 'float'
  | 'text'
  | 'fixedSequence'
  | 'mapping'
  | 'variableSequence';

/** Three-way comparison result. */
export type Ordering = -1 | 0 | 1;

// ─── Byte I/O ─────────────────────────────────────────────────────────────────

/** Anything that accepts bytes one at a time. ByteWriter is the stock implementation. */
export interface ByteSink {
  writeByte(byte: number): void;
}

// ─── Options ──────────────────────────────────────────────────────────────────

export interface DecodeOptions {
  /** Max nesting depth (default 256). Exceeding it raises DecodeError. */
  readonly maxDepth?: number;
}

export interface EncodeOptions {
  /** Max nesting depth (default 256). Exceeding it raises EncodeError. */
  readonly maxDepth?: number;
  /**
   * Byte budget of one encoded record (default 2^31 - 1). encodeInto()
   * counts it from the writer's length at the start of the record.
   */
  readonly maxBytes?: number;
}

export interface ByteComparatorOptions {
  /** Max nesting depth walked before the input is treated as malformed (default 256). */
  readonly maxDepth?: number;
  /**
   * Mapping-vs-mapping has no byte-level order. By default such a pair
   * compares equal and the mapping bytes are left unread. When true, the
   * comparator throws ComparisonIncompletenessError instead.
   */
  readonly strictMappings?: boolean;
}

/** Result of comparing two encoded values together with how far each side was read. */
export interface EncodedComparison {
  readonly order:       Ordering;
  /** Bytes consumed from the left buffer. Exact only when order is 0. */
  readonly leftLength:  number;
  /** Bytes consumed from the right buffer. Exact only when order is 0. */
  readonly rightLength: number;
}
