/**
 * typed-writable — comparison classes
 *
 * The only place Integer and Float are merged into one ordering bucket.
 * compareValues() and ByteComparator both route through comparisonClass(),
 * so the two comparators cannot disagree on primary order.
 */

import { KIND_TO_TAG, TAG_TO_CLASS } from './constants';
import type { ComparisonClass, Tag } from './types';
import type { Value } from './value';

export function comparisonClass(tag: Tag): ComparisonClass {
  return TAG_TO_CLASS[tag];
}

export function classify(v: Value): ComparisonClass {
  return comparisonClass(KIND_TO_TAG[v.kind]);
}
