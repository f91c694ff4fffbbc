/**
 * typed-writable — value model
 *
 * A Value is one of seven variants, discriminated by `kind`:
 *
 *   none · integer · float · text · fixedSequence · mapping · variableSequence
 *
 * Every variant is a class whose constructor validates its input, and the
 * two mutable collections (VariableSequence, Mapping) validate again on every
 * mutating call. There is no way to place a non-Value inside a Value tree
 * after construction, so a tree that exists is well-formed. Nor can a
 * collection end up inside itself: a mutation that would close a cycle, or
 * plain input that refers back to itself, fails with ValidationError.
 *
 * validate() is the boundary for plain JavaScript data:
 *
 *   null / undefined      → None
 *   bigint                → Integer   (signed 64-bit range)
 *   number, safe integer  → Integer
 *   number, otherwise     → Float
 *   string                → Text
 *   frozen array          → FixedSequence
 *   array                 → VariableSequence
 *   Map, plain object     → Mapping
 *   an existing Value     → itself
 */

import { INT64_MAX, INT64_MIN, KIND_NAMES, KIND_TO_TAG } from './constants';
import { ValidationError } from './errors';
import { hashValue } from './hash';
import type { Tag } from './types';

// ─── Union ────────────────────────────────────────────────────────────────────

export type Value =
  | NoneValue
  | IntegerValue
  | FloatValue
  | TextValue
  | FixedSequence
  | Mapping
  | VariableSequence;

/** Read-only indexed view shared by both sequence variants. */
export interface SequenceLike {
  readonly length: number;
  get(index: number): Value;
}

// ─── Runtime type names ───────────────────────────────────────────────────────

/** Runtime type of an arbitrary value, as reported by ValidationError. */
export function describeType(input: unknown): string {
  if (input === null) return 'null';
  if (typeof input !== 'object') return typeof input;
  const proto: unknown = Object.getPrototypeOf(input);
  if (proto === null) return 'object';
  const name = input.constructor?.name;
  return typeof name === 'string' && name !== '' ? name : 'object';
}

function outOfRange(index: number, length: number): RangeError {
  return new RangeError(`Index ${index} is out of bounds for a sequence of length ${length}.`);
}

function hasLoneSurrogate(s: string): boolean {
  for (let i = 0; i < s.length; i++) {
    const cu = s.charCodeAt(i);
    if (cu >= 0xd800 && cu <= 0xdbff) {
      const next = i + 1 < s.length ? s.charCodeAt(i + 1) : 0;
      if (next < 0xdc00 || next > 0xdfff) return true;
      i++; // well-formed pair
      continue;
    }
    if (cu >= 0xdc00 && cu <= 0xdfff) return true;
  }
  return false;
}

// ─── Scalars ──────────────────────────────────────────────────────────────────

export class NoneValue {
  readonly kind = 'none' as const;
}

/** The one None instance. */
export const NONE: NoneValue = Object.freeze(new NoneValue());

export class IntegerValue {
  readonly kind = 'integer' as const;
  readonly value: bigint;

  constructor(value: bigint) {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new ValidationError(
        `Integer ${value} is outside the signed 64-bit range [${INT64_MIN}, ${INT64_MAX}].`,
        'bigint',
      );
    }
    this.value = value;
    Object.freeze(this);
  }
}

export class FloatValue {
  readonly kind = 'float' as const;

  constructor(readonly value: number) {
    Object.freeze(this);
  }
}

export class TextValue {
  readonly kind = 'text' as const;

  constructor(readonly value: string) {
    if (hasLoneSurrogate(value)) {
      throw new ValidationError(
        'Text contains an unpaired UTF-16 surrogate and has no UTF-8 encoding.',
        'string',
      );
    }
    Object.freeze(this);
  }
}

// ─── FixedSequence ────────────────────────────────────────────────────────────

/** Ordered, immutable, fixed arity. */
export class FixedSequence implements SequenceLike, Iterable<Value> {
  readonly kind = 'fixedSequence' as const;
  readonly items: readonly Value[];

  constructor(items: Iterable<unknown> = []) {
    this.items = Object.freeze(Array.from(items, validate));
    Object.freeze(this);
  }

  get length(): number {
    return this.items.length;
  }

  get(index: number): Value {
    const item = this.items[index];
    if (item === undefined) throw outOfRange(index, this.items.length);
    return item;
  }

  [Symbol.iterator](): Iterator<Value> {
    return this.items[Symbol.iterator]();
  }
}

// ─── VariableSequence ─────────────────────────────────────────────────────────

/** Ordered, mutable, variable arity. Every inserted item is validated. */
export class VariableSequence implements SequenceLike, Iterable<Value> {
  readonly kind = 'variableSequence' as const;
  private readonly _items: Value[];

  constructor(items: Iterable<unknown> = []) {
    this._items = Array.from(items, validate);
  }

  get length(): number {
    return this._items.length;
  }

  get(index: number): Value {
    const item = this._items[index];
    if (item === undefined) throw outOfRange(index, this._items.length);
    return item;
  }

  /** Append items; returns the new length. */
  push(...items: unknown[]): number {
    // Validate everything first so a bad item leaves the sequence unchanged.
    const valid = items.map(item => validateMember(this, item));
    return this._items.push(...valid);
  }

  set(index: number, item: unknown): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._items.length) {
      throw outOfRange(index, this._items.length);
    }
    this._items[index] = validateMember(this, item);
  }

  /** Insert before `index`; index === length appends. */
  insert(index: number, item: unknown): void {
    if (!Number.isInteger(index) || index < 0 || index > this._items.length) {
      throw outOfRange(index, this._items.length);
    }
    this._items.splice(index, 0, validateMember(this, item));
  }

  pop(): Value | undefined {
    return this._items.pop();
  }

  /** Snapshot copy of the items. */
  toArray(): Value[] {
    return this._items.slice();
  }

  [Symbol.iterator](): Iterator<Value> {
    return this._items[Symbol.iterator]();
  }
}

// ─── Mapping ──────────────────────────────────────────────────────────────────

interface MappingEntry {
  readonly key: Value;
  value:        Value;
}

/**
 * True for values that may key a Mapping: None, numerics, Text, and
 * FixedSequences of hashable values. Mutable collections are excluded;
 * mutating one after insertion would leave it in the wrong hash bucket.
 */
export function isHashableKey(v: Value): boolean {
  switch (v.kind) {
    case 'none':
    case 'integer':
    case 'float':
    case 'text':
      return true;
    case 'fixedSequence':
      return v.items.every(isHashableKey);
    case 'mapping':
    case 'variableSequence':
      return false;
  }
}

function sameInteger(i: bigint, f: number): boolean {
  return Number.isInteger(f) && BigInt(f) === i;
}

/**
 * Key identity. Unlike compareValues(), numerics are compared exactly:
 * two Integers by their bigint, an Integer and a Float only when the Float
 * is integral with the same value. NaN keys match each other.
 */
function sameKey(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'none':
      return b.kind === 'none';
    case 'integer':
      if (b.kind === 'integer') return a.value === b.value;
      return b.kind === 'float' && sameInteger(a.value, b.value);
    case 'float':
      if (b.kind === 'integer') return sameInteger(b.value, a.value);
      if (b.kind !== 'float') return false;
      return a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value));
    case 'text':
      return b.kind === 'text' && a.value === b.value;
    case 'fixedSequence': {
      if (b.kind !== 'fixedSequence' || a.length !== b.length) return false;
      const other = b.items;
      return a.items.every((item, i) => {
        const peer = other[i];
        return peer !== undefined && sameKey(item, peer);
      });
    }
    case 'mapping':
    case 'variableSequence':
      return false;
  }
}

function requireHashableKey(key: Value): void {
  if (!isHashableKey(key)) {
    throw new ValidationError(
      `Mapping keys must be hashable; ${KIND_NAMES[key.kind]} (or a FixedSequence containing one) is not.`,
      KIND_NAMES[key.kind],
    );
  }
}

/**
 * Key/value collection with unique keys. Keys are matched exactly (see
 * sameKey), so Integer(1) and Float(1.0) collide while Integer(2^53) and
 * Integer(2^53 + 1) stay distinct even though compareValues() ties them.
 * Iteration follows insertion order; re-setting a key keeps its position.
 */
export class Mapping implements Iterable<readonly [Value, Value]> {
  readonly kind = 'mapping' as const;
  private readonly _buckets = new Map<number, MappingEntry[]>();
  private readonly _entries = new Set<MappingEntry>();

  constructor(entries: Iterable<readonly [unknown, unknown]> = []) {
    for (const [k, v] of entries) this.set(k, v);
  }

  get size(): number {
    return this._entries.size;
  }

  private find(key: Value): MappingEntry | undefined {
    const bucket = this._buckets.get(hashValue(key));
    return bucket?.find(e => sameKey(e.key, key));
  }

  set(key: unknown, value: unknown): this {
    const k = validate(key);
    requireHashableKey(k);
    const v = validateMember(this, value);

    const existing = this.find(k);
    if (existing !== undefined) {
      existing.value = v;
      return this;
    }

    const entry: MappingEntry = { key: k, value: v };
    const h = hashValue(k);
    const bucket = this._buckets.get(h);
    if (bucket === undefined) this._buckets.set(h, [entry]);
    else bucket.push(entry);
    this._entries.add(entry);
    return this;
  }

  get(key: unknown): Value | undefined {
    return this.find(validate(key))?.value;
  }

  has(key: unknown): boolean {
    return this.find(validate(key)) !== undefined;
  }

  delete(key: unknown): boolean {
    const k     = validate(key);
    const entry = this.find(k);
    if (entry === undefined) return false;

    const h      = hashValue(k);
    const bucket = this._buckets.get(h) ?? [];
    const rest   = bucket.filter(e => e !== entry);
    if (rest.length === 0) this._buckets.delete(h);
    else this._buckets.set(h, rest);
    this._entries.delete(entry);
    return true;
  }

  *entries(): IterableIterator<readonly [Value, Value]> {
    for (const e of this._entries) yield [e.key, e.value];
  }

  *keys(): IterableIterator<Value> {
    for (const e of this._entries) yield e.key;
  }

  *values(): IterableIterator<Value> {
    for (const e of this._entries) yield e.value;
  }

  [Symbol.iterator](): Iterator<readonly [Value, Value]> {
    return this.entries();
  }
}

// ─── Cycles ───────────────────────────────────────────────────────────────────

function reaches(from: Value, target: Value, seen: Set<Value>): boolean {
  if (from === target) return true;
  if (seen.has(from)) return false;
  seen.add(from);
  switch (from.kind) {
    case 'fixedSequence':
    case 'variableSequence':
      for (const item of from) if (reaches(item, target, seen)) return true;
      return false;
    case 'mapping':
      for (const item of from.values()) if (reaches(item, target, seen)) return true;
      return false;
    default:
      return false;
  }
}

/** validate() plus a refusal to place a collection inside itself. */
function validateMember(owner: VariableSequence | Mapping, item: unknown): Value {
  const v = validate(item);
  if (reaches(v, owner, new Set())) {
    throw new ValidationError(
      `A ${KIND_NAMES[owner.kind]} cannot contain itself.`,
      KIND_NAMES[owner.kind],
    );
  }
  return v;
}

// Arrays and objects whose conversion is under way; meeting one again is a cycle.
const converting = new Set<object>();

function convertOnce(input: object, build: () => Value): Value {
  if (converting.has(input)) {
    const type = describeType(input);
    throw new ValidationError(`Cannot represent a cyclic ${type}.`, type);
  }
  converting.add(input);
  try {
    return build();
  } finally {
    converting.delete(input);
  }
}

// ─── Smart constructors ───────────────────────────────────────────────────────

export function none(): NoneValue {
  return NONE;
}

/** @throws ValidationError for non-integral numbers, unsafe integers, or values outside int64. */
export function integer(v: number | bigint): IntegerValue {
  if (typeof v === 'number' && !Number.isSafeInteger(v)) {
    throw new ValidationError(`Integer ${v} is not a safe integer; pass a bigint.`, 'number');
  }
  return new IntegerValue(BigInt(v));
}

export function float(v: number): FloatValue {
  return new FloatValue(v);
}

export function text(v: string): TextValue {
  return new TextValue(v);
}

export function fixedSequence(items: Iterable<unknown> = []): FixedSequence {
  return new FixedSequence(items);
}

export function variableSequence(items: Iterable<unknown> = []): VariableSequence {
  return new VariableSequence(items);
}

export function mapping(entries: Iterable<readonly [unknown, unknown]> = []): Mapping {
  return new Mapping(entries);
}

// ─── Construction boundary ────────────────────────────────────────────────────

export function isValue(input: unknown): input is Value {
  return (
    input instanceof NoneValue ||
    input instanceof IntegerValue ||
    input instanceof FloatValue ||
    input instanceof TextValue ||
    input instanceof FixedSequence ||
    input instanceof Mapping ||
    input instanceof VariableSequence
  );
}

function isPlainObject(input: object): boolean {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert plain JavaScript data into a Value, recursively.
 *
 * Fails on the first unsupported value met in a depth-first walk; the
 * ValidationError names the runtime type of that innermost value.
 */
export function validate(input: unknown): Value {
  if (isValue(input)) return input;
  if (input === null || input === undefined) return NONE;

  switch (typeof input) {
    case 'bigint':
      return new IntegerValue(input);
    case 'number':
      return Number.isSafeInteger(input)
        ? new IntegerValue(BigInt(input))
        : new FloatValue(input);
    case 'string':
      return new TextValue(input);
    case 'object':
      if (Array.isArray(input)) {
        const items: readonly unknown[] = input;
        return convertOnce(input, () => Object.isFrozen(items)
          ? new FixedSequence(items)
          : new VariableSequence(items));
      }
      if (input instanceof Map) {
        const entries: Map<unknown, unknown> = input;
        return convertOnce(input, () => new Mapping(entries));
      }
      if (isPlainObject(input)) {
        const entries = Object.entries(input);
        return convertOnce(input, () => new Mapping(entries));
      }
      break;
  }

  const type = describeType(input);
  throw new ValidationError(
    `Cannot represent a value of type '${type}'. ` +
    `Supported: None, Integer, Float, Text, FixedSequence, Mapping, VariableSequence.`,
    type,
  );
}

/** Wire tag of a value. */
export function tagOf(v: Value): Tag {
  return KIND_TO_TAG[v.kind];
}

// ─── Projection back to plain data ────────────────────────────────────────────

export type NativeValue =
  | null
  | bigint
  | number
  | string
  | readonly NativeValue[]
  | NativeValue[]
  | Map<NativeValue, NativeValue>;

/**
 * Inverse of validate(): Integer → bigint, Float → number, FixedSequence →
 * frozen array, VariableSequence → array, Mapping → Map.
 */
export function toNative(v: Value): NativeValue {
  switch (v.kind) {
    case 'none':             return null;
    case 'integer':          return v.value;
    case 'float':            return v.value;
    case 'text':             return v.value;
    case 'fixedSequence':    return Object.freeze(v.items.map(toNative));
    case 'variableSequence': return v.toArray().map(toNative);
    case 'mapping': {
      const out = new Map<NativeValue, NativeValue>();
      for (const [k, val] of v.entries()) out.set(toNative(k), toNative(val));
      return out;
    }
  }
}
