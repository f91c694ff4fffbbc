/**
 * typed-writable — TypedRecord
 *
 * The sortable key/value holder the host pipeline instantiates for each
 * record. It owns one Value (or none, before the first read) and exposes the
 * write / read / compare / hash surface the shuffle stage expects.
 *
 * Lifecycle inside the host:
 *
 *   producer  TypedRecord.from(x)  →  record.write(writer)   (once per spill)
 *   sort      TypedRecord.comparator.compareBytes(...)       (raw bytes)
 *   consumer  new TypedRecord()    →  record.readFields(cursor)
 *
 * The held value is private and only replaced through set() or readFields(),
 * both of which produce a validated Value.
 */

import { ByteComparator } from './byte-compare';
import { decodeFrom, encodeInto } from './codec';
import { compareValues } from './compare';
import type { ByteCursor } from './cursor';
import { EncodeError } from './errors';
import { hashValue } from './hash';
import { render } from './render';
import type { DecodeOptions, EncodeOptions, Ordering } from './types';
import { validate, type Value } from './value';
import type { ByteWriter } from './writer';

export class TypedRecord {
  /** Raw-byte comparator to register with the sort stage. */
  static readonly comparator: ByteComparator = new ByteComparator();

  private _value: Value | undefined;

  constructor(value?: Value) {
    this._value = value;
  }

  /** Validate plain data and wrap it. */
  static from(input: unknown): TypedRecord {
    return new TypedRecord(validate(input));
  }

  /** The held value; undefined for an empty record. */
  get value(): Value | undefined {
    return this._value;
  }

  /** Replace the held value. @throws ValidationError */
  set(input: unknown): void {
    this._value = validate(input);
  }

  // ── Serialization ─────────────────────────────────────────────────────────

  /** @throws EncodeError if the record is empty or does not fit; nothing is left in `out` then. */
  write(out: ByteWriter, options?: EncodeOptions): void {
    if (this._value === undefined) {
      throw new EncodeError('Cannot write an empty TypedRecord.');
    }
    encodeInto(out, this._value, options);
  }

  /** Replace the held value with the one encoded at the cursor. @throws DecodeError */
  readFields(cursor: ByteCursor, options?: DecodeOptions): void {
    this._value = decodeFrom(cursor, options);
  }

  // ── Ordering & identity ───────────────────────────────────────────────────

  private require(): Value {
    if (this._value === undefined) {
      throw new TypeError('TypedRecord is empty; set() or readFields() first.');
    }
    return this._value;
  }

  compareTo(other: TypedRecord): Ordering {
    return compareValues(this.require(), other.require());
  }

  equals(other: TypedRecord): boolean {
    return this.compareTo(other) === 0;
  }

  hashCode(): number {
    return hashValue(this.require());
  }

  toString(): string {
    return this._value === undefined ? 'null' : render(this._value);
  }
}
