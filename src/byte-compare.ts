/**
 * typed-writable — ByteComparator
 *
 * Orders two encoded values without decoding them. This is the comparator
 * the host's external sort calls for every pair of spilled keys, so it walks
 * the bytes in place and builds neither Values nor BigInts.
 *
 * Result contract (for any two well-formed encoded values a, b):
 *
 *   sign(compare(a, b)) === sign(compareValues(decode(a), decode(b)))
 *
 * except when both sides are Mappings at the same position (see below).
 *
 * Cursor contract:
 *   - order === 0 and no Mapping met: both cursors sit exactly one byte past
 *     their value, so the next field of a concatenated record can be
 *     compared by calling again.
 *   - order !== 0: cursor positions are unspecified.
 *
 * ── Mappings ─────────────────────────────────────────────────────────────────
 *
 * Two Mappings have no byte-level order. The value comparator orders them by
 * their textual rendering, which cannot be produced without decoding. The
 * default comparator reports them equal WITHOUT consuming their bytes, so
 * after such a pair the cursors do not point past the mapping. This is a
 * known incompleteness, kept as-is. Pass strictMappings: true to have the
 * comparator throw ComparisonIncompletenessError instead.
 */

import { comparisonClass } from './classify';
import {
  CLASS_FIXED_SEQUENCE,
  CLASS_MAPPING,
  CLASS_NONE,
  CLASS_NUMERIC,
  CLASS_TEXT,
  CLASS_VARIABLE_SEQUENCE,
  DEFAULT_MAX_DEPTH,
  TAG_INTEGER,
} from './constants';
import { compareDoubles } from './compare';
import { ByteCursor } from './cursor';
import { ComparisonIncompletenessError, DecodeError } from './errors';
import type { ByteComparatorOptions, EncodedComparison, Ordering, Tag } from './types';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function readNumeric(cursor: ByteCursor, tag: Tag): number {
  return tag === TAG_INTEGER ? cursor.readVLongAsNumber() : cursor.readFloat64();
}

/** Length-prefixed UTF-8 payloads, compared as unsigned bytes. */
function compareText(left: ByteCursor, right: ByteCursor): Ordering {
  const n1 = left.readLength();
  const n2 = right.readLength();
  const s1 = left.pos;
  const s2 = right.pos;
  left.skip(n1);
  right.skip(n2);

  const n = Math.min(n1, n2);
  for (let i = 0; i < n; i++) {
    const d = left.byteAt(s1 + i) - right.byteAt(s2 + i);
    if (d !== 0) return d < 0 ? -1 : 1;
  }
  return n1 === n2 ? 0 : n1 < n2 ? -1 : 1;
}

// ─── ByteComparator ───────────────────────────────────────────────────────────

/**
 * Holds only immutable configuration; a single instance can serve any
 * number of concurrent comparisons.
 */
export class ByteComparator {
  readonly maxDepth:       number;
  readonly strictMappings: boolean;

  constructor(options: ByteComparatorOptions = {}) {
    this.maxDepth       = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.strictMappings = options.strictMappings ?? false;
  }

  /** Compare the values under two cursors, advancing both. */
  compare(left: ByteCursor, right: ByteCursor): Ordering {
    return this.compareAt(left, right, 0);
  }

  /**
   * Sort-integration entry point: two (buffer, offset, length) windows,
   * each holding one encoded value at its start.
   */
  compareBytes(
    b1: Uint8Array, s1: number, l1: number,
    b2: Uint8Array, s2: number, l2: number,
  ): Ordering {
    return this.compare(new ByteCursor(b1, s1, l1), new ByteCursor(b2, s2, l2));
  }

  /**
   * Compare two buffers from their first byte and report how many bytes
   * each side consumed. On order 0 the lengths are the exact encoded sizes
   * (Mappings aside).
   */
  compareEncoded(a: Uint8Array, b: Uint8Array): EncodedComparison {
    const left  = new ByteCursor(a);
    const right = new ByteCursor(b);
    const order = this.compare(left, right);
    return { order, leftLength: left.pos, rightLength: right.pos };
  }

  private compareAt(left: ByteCursor, right: ByteCursor, depth: number): Ordering {
    if (depth > this.maxDepth) {
      throw new DecodeError(`Maximum nesting depth ${this.maxDepth} exceeded`, left.pos);
    }

    const leftTag    = left.readTag();
    const rightTag   = right.readTag();
    const leftClass  = comparisonClass(leftTag);
    const rightClass = comparisonClass(rightTag);
    if (leftClass !== rightClass) return leftClass < rightClass ? -1 : 1;

    switch (leftClass) {
      case CLASS_NONE:
        return 0;

      case CLASS_NUMERIC:
        // Each side is read according to its own tag, so an Integer-tagged
        // vlong and a Float-tagged double meet as two doubles.
        return compareDoubles(readNumeric(left, leftTag), readNumeric(right, rightTag));

      case CLASS_TEXT:
        return compareText(left, right);

      case CLASS_FIXED_SEQUENCE:
      case CLASS_VARIABLE_SEQUENCE: {
        const n1 = left.readLength();
        const n2 = right.readLength();
        let i = 0;
        for (; i < n1; i++) {
          if (i === n2) return 1;
          const c = this.compareAt(left, right, depth + 1);
          if (c !== 0) return c;
        }
        return i < n2 ? -1 : 0;
      }

      case CLASS_MAPPING:
        if (this.strictMappings) {
          throw new ComparisonIncompletenessError(
            'Mappings have no byte-level order; decode both sides and use compareValues().',
            left.pos - 1,
          );
        }
        return 0;
    }
  }
}

// ─── Default instance ─────────────────────────────────────────────────────────

const defaultComparator = new ByteComparator();

/** compareBytes() on a default-configured ByteComparator. */
export function compareBytes(
  b1: Uint8Array, s1: number, l1: number,
  b2: Uint8Array, s2: number, l2: number,
): Ordering {
  return defaultComparator.compareBytes(b1, s1, l1, b2, s2, l2);
}

/** compareEncoded() on a default-configured ByteComparator. */
export function compareEncoded(a: Uint8Array, b: Uint8Array): EncodedComparison {
  return defaultComparator.compareEncoded(a, b);
}
