/**
 * typed-writable — value comparator & rendering
 *
 * compareValues() over decoded values, and the textual rendering that
 * orders Mappings.
 */

import { describe, it, expect } from 'vitest';
import {
  CLASS_FIXED_SEQUENCE,
  CLASS_MAPPING,
  CLASS_NONE,
  CLASS_NUMERIC,
  CLASS_TEXT,
  CLASS_VARIABLE_SEQUENCE,
  classify,
  compareCodePoints,
  compareDoubles,
  compareValues,
  fixedSequence,
  float,
  integer,
  mapping,
  none,
  render,
  renderFloat,
  renderText,
  text,
  valuesEqual,
  variableSequence,
  type Value,
} from '../src/index';

// ─── class precedence ────────────────────────────────────────────────────────

describe('compareValues — class precedence', () => {
  const ladder: Value[] = [
    none(),
    integer(-1_000),
    float(1e300),
    text(''),
    fixedSequence(),
    mapping(),
    variableSequence(),
  ];

  it('classifies Integer and Float together', () => {
    expect(ladder.map(classify)).toEqual([
      CLASS_NONE,
      CLASS_NUMERIC,
      CLASS_NUMERIC,
      CLASS_TEXT,
      CLASS_FIXED_SEQUENCE,
      CLASS_MAPPING,
      CLASS_VARIABLE_SEQUENCE,
    ]);
  });

  it('orders None < numeric < Text < FixedSequence < Mapping < VariableSequence', () => {
    for (let i = 0; i + 1 < ladder.length; i++) {
      const a = ladder[i];
      const b = ladder[i + 1];
      if (a === undefined || b === undefined) continue;
      expect(compareValues(a, b)).toBe(-1);
      expect(compareValues(b, a)).toBe(1);
    }
  });

  it('is reflexive', () => {
    for (const v of ladder) expect(compareValues(v, v)).toBe(0);
  });
});

// ─── numeric ─────────────────────────────────────────────────────────────────

describe('compareValues — numeric', () => {
  it('compares Integer and Float by value', () => {
    expect(compareValues(integer(2), float(2))).toBe(0);
    expect(compareValues(integer(1), float(1.5))).toBe(-1);
    expect(compareValues(float(-0.5), integer(-1))).toBe(1);
    expect(valuesEqual(float(0), float(-0))).toBe(true);
  });

  it('lets integers beyond 2^53 collapse onto the same double', () => {
    expect(compareValues(integer(2n ** 53n), integer(2n ** 53n + 1n))).toBe(0);
    expect(compareValues(integer(2n ** 53n), integer(2n ** 53n + 2n))).toBe(-1);
  });

  it('treats NaN as equal to every number', () => {
    expect(compareDoubles(NaN, 1)).toBe(0);
    expect(compareValues(float(NaN), integer(5))).toBe(0);
    expect(compareValues(float(NaN), float(-Infinity))).toBe(0);
  });
});

// ─── text ────────────────────────────────────────────────────────────────────

describe('compareValues — text', () => {
  it('orders by code point, not by UTF-16 unit', () => {
    // U+FFFF is one unit (0xFFFF); U+10000 is the pair D800 DC00.
    expect(compareCodePoints('\uffff', '\u{10000}')).toBe(-1);
    expect('\uffff' < '\u{10000}').toBe(false);
    expect(compareValues(text('\uffff'), text('\u{10000}'))).toBe(-1);
  });

  it('sorts a strict prefix first', () => {
    expect(compareValues(text('ab'), text('abc'))).toBe(-1);
    expect(compareValues(text('b'), text('abc'))).toBe(1);
    expect(compareValues(text(''), text(''))).toBe(0);
  });
});

// ─── sequences ───────────────────────────────────────────────────────────────

describe('compareValues — sequences', () => {
  it('decides on the first differing element', () => {
    expect(compareValues(fixedSequence([1, 3]), fixedSequence([1, 2, 9]))).toBe(1);
    expect(compareValues(variableSequence(['a', 0]), variableSequence(['a', 0.5]))).toBe(-1);
  });

  it('sorts a strict prefix first', () => {
    expect(compareValues(fixedSequence([1, 2]), fixedSequence([1, 2, 3]))).toBe(-1);
    expect(compareValues(variableSequence([1]), variableSequence([]))).toBe(1);
  });

  it('never equates a FixedSequence with a VariableSequence', () => {
    expect(compareValues(fixedSequence([1]), variableSequence([1]))).toBe(-1);
    expect(compareValues(variableSequence([]), fixedSequence([9]))).toBe(1);
  });

  it('compares nested elements by their own class first', () => {
    expect(compareValues(fixedSequence([none()]), fixedSequence([0]))).toBe(-1);
    expect(compareValues(fixedSequence([[1]]), fixedSequence([Object.freeze([1])]))).toBe(1);
  });
});

// ─── mappings ────────────────────────────────────────────────────────────────

describe('compareValues — mappings', () => {
  it('orders mappings by their rendering', () => {
    expect(compareValues(mapping([['a', 1]]), mapping([['b', 0]]))).toBe(-1);
    // '{}' > "{'a': 1}" because '}' (0x7D) > "'" (0x27)
    expect(compareValues(mapping(), mapping([['a', 1]]))).toBe(1);
  });

  it('equates mappings with the same entries in the same order', () => {
    expect(compareValues(mapping([['a', 1], ['b', 2]]), mapping([['a', 1], ['b', 2]]))).toBe(0);
    expect(compareValues(mapping([['a', 1], ['b', 2]]), mapping([['b', 2], ['a', 1]]))).toBe(-1);
  });
});

// ─── rendering ───────────────────────────────────────────────────────────────

describe('renderFloat', () => {
  it('keeps a trailing .0 on integral values', () => {
    expect(renderFloat(3)).toBe('3.0');
    expect(renderFloat(100)).toBe('100.0');
    expect(renderFloat(0)).toBe('0.0');
    expect(renderFloat(-0)).toBe('-0.0');
  });

  it('uses the shortest round-trip digits in fixed notation', () => {
    expect(renderFloat(123.456)).toBe('123.456');
    expect(renderFloat(0.5)).toBe('0.5');
    expect(renderFloat(0.1)).toBe('0.1');
    expect(renderFloat(0.0001)).toBe('0.0001');
    expect(renderFloat(-2.25)).toBe('-2.25');
  });

  it('switches to exponent notation outside [1e-4, 1e16)', () => {
    expect(renderFloat(1e16)).toBe('1e+16');
    expect(renderFloat(1e-5)).toBe('1e-05');
    expect(renderFloat(1.5e300)).toBe('1.5e+300');
    expect(renderFloat(-2.5e-7)).toBe('-2.5e-07');
  });

  it('spells out the non-finite values', () => {
    expect(renderFloat(NaN)).toBe('nan');
    expect(renderFloat(Infinity)).toBe('inf');
    expect(renderFloat(-Infinity)).toBe('-inf');
  });
});

describe('renderText', () => {
  it('quotes with single quotes by default', () => {
    expect(renderText('abc')).toBe("'abc'");
  });

  it('switches to double quotes when only single quotes occur', () => {
    expect(renderText("it's")).toBe(`"it's"`);
    expect(renderText(`a"b'c`)).toBe(`'a"b\\'c'`);
  });

  it('escapes backslashes and control characters', () => {
    expect(renderText('a\nb')).toBe("'a\\nb'");
    expect(renderText('\t\\')).toBe("'\\t\\\\'");
    expect(renderText('\x01')).toBe("'\\x01'");
    expect(renderText('é')).toBe("'é'");
  });
});

describe('render', () => {
  it('renders every variant', () => {
    expect(render(none())).toBe('None');
    expect(render(integer(-5))).toBe('-5');
    expect(render(float(2.5))).toBe('2.5');
    expect(render(fixedSequence())).toBe('()');
    expect(render(fixedSequence([1]))).toBe('(1,)');
    expect(render(fixedSequence([1, 'a']))).toBe("(1, 'a')");
    expect(render(variableSequence([1, 2.5, 'x', null]))).toBe("[1, 2.5, 'x', None]");
    expect(render(mapping([['k', [1]], [2, 3.0]]))).toBe("{'k': [1], 2: 3}");
    expect(render(mapping([['k', float(3)]]))).toBe("{'k': 3.0}");
  });

  it('prints integers as bare digits at every magnitude', () => {
    expect(render(integer(2n ** 63n - 1n))).toBe('9223372036854775807');
    expect(render(integer(-(2n ** 63n)))).toBe('-9223372036854775808');
    expect(render(mapping([[2n ** 40n, 'a']]))).toBe("{1099511627776: 'a'}");
    expect(render(fixedSequence([2n ** 53n + 1n]))).toBe('(9007199254740993,)');
  });
});
