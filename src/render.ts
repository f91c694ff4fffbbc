/**
 * typed-writable — textual rendering
 *
 * Human-readable form of a Value, in the notation of the scripting runtime
 * that produces these records:
 *
 *   None · 42 · 3.0 · 1e+16 · 'text' · (1, 2) · (1,) · [1, 2] · {'k': 1}
 *
 * The rendering doubles as the ordering of two Mappings (see compare.ts), so
 * its output is part of the sort contract: change it and mapping keys
 * re-sort.
 *
 * Integers print as plain decimal digits at every magnitude. The producing
 * runtime marks its 64-bit long integers with a trailing `L`; render() does
 * not, so {1: 'a'} prints the same whether 1 was a small or a long integer,
 * and two Mappings that differ only in that respect compare equal.
 */

import type { Value } from './value';

// ─── Floats ───────────────────────────────────────────────────────────────────

/**
 * Shortest round-trip form, fixed notation for 1e-4 ≤ |x| < 1e16 and
 * exponent notation (two-digit minimum exponent) outside it. Integral
 * values keep a trailing `.0` so they never read as integers.
 */
export function renderFloat(x: number): string {
  if (Number.isNaN(x)) return 'nan';
  if (x === Infinity)  return 'inf';
  if (x === -Infinity) return '-inf';

  const sign = x < 0 || Object.is(x, -0) ? '-' : '';
  if (x === 0) return `${sign}0.0`;

  // toExponential() with no argument yields as many digits as needed to
  // identify the value uniquely: "d.ddde±x".
  const [mantissa = '0', expPart = '0'] = Math.abs(x).toExponential().split('e');
  const digits = mantissa.replace('.', '');
  const exp    = Number(expPart);

  if (exp >= -4 && exp < 16) {
    if (exp >= digits.length - 1) {
      return `${sign}${digits}${'0'.repeat(exp - digits.length + 1)}.0`;
    }
    if (exp >= 0) {
      return `${sign}${digits.slice(0, exp + 1)}.${digits.slice(exp + 1)}`;
    }
    return `${sign}0.${'0'.repeat(-exp - 1)}${digits}`;
  }

  const expSign = exp < 0 ? '-' : '+';
  const expAbs  = String(Math.abs(exp)).padStart(2, '0');
  return `${sign}${mantissa}e${expSign}${expAbs}`;
}

// ─── Text ─────────────────────────────────────────────────────────────────────

/** Quote with ' unless the text contains ' and no ", then with ". */
export function renderText(s: string): string {
  const quote = s.includes("'") && !s.includes('"') ? '"' : "'";
  let out = quote;
  for (const ch of s) {
    switch (ch) {
      case '\\': out += '\\\\'; break;
      case '\n': out += '\\n';  break;
      case '\r': out += '\\r';  break;
      case '\t': out += '\\t';  break;
      default: {
        const cp = ch.codePointAt(0) ?? 0;
        if (ch === quote) out += `\\${quote}`;
        else if (cp < 0x20 || cp === 0x7f) out += `\\x${cp.toString(16).padStart(2, '0')}`;
        else out += ch;
      }
    }
  }
  return out + quote;
}

// ─── Values ───────────────────────────────────────────────────────────────────

export function render(v: Value): string {
  switch (v.kind) {
    case 'none':
      return 'None';
    case 'integer':
      return v.value.toString();
    case 'float':
      return renderFloat(v.value);
    case 'text':
      return renderText(v.value);
    case 'fixedSequence':
      if (v.items.length === 1) return `(${v.items.map(render).join('')},)`;
      return `(${v.items.map(render).join(', ')})`;
    case 'variableSequence':
      return `[${v.toArray().map(render).join(', ')}]`;
    case 'mapping': {
      const parts: string[] = [];
      for (const [k, val] of v.entries()) parts.push(`${render(k)}: ${render(val)}`);
      return `{${parts.join(', ')}}`;
    }
  }
}
