/**
 * typed-writable — vint / vlong layout
 *
 * Byte-exact checks of the zero-compressed integer layout. Interoperating
 * implementations must agree on these bytes, so every expectation below is
 * a literal byte sequence, not a round trip.
 */

import { describe, it, expect } from 'vitest';
import {
  ByteCursor,
  ByteWriter,
  DecodeError,
  EncodeError,
  INT64_MAX,
  INT64_MIN,
  decodeVIntSize,
  isNegativeVInt,
  toSignedByte,
  vlongSize,
  writeVInt,
  writeVLong,
} from '../src/index';

// ─── helpers ─────────────────────────────────────────────────────────────────

function vlongBytes(v: bigint): number[] {
  const w = new ByteWriter();
  writeVLong(w, v);
  return Array.from(w.toBytes());
}

function cursorOver(bytes: number[]): ByteCursor {
  return new ByteCursor(new Uint8Array(bytes));
}

const FF7 = [0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff];

// ─── writeVLong ──────────────────────────────────────────────────────────────

describe('writeVLong', () => {
  it('writes values in [-112, 127] as a single byte', () => {
    expect(vlongBytes(0n)).toEqual([0x00]);
    expect(vlongBytes(127n)).toEqual([0x7f]);
    expect(vlongBytes(-1n)).toEqual([0xff]);
    expect(vlongBytes(-112n)).toEqual([0x90]);
  });

  it('prefixes larger positive values with a length marker', () => {
    expect(vlongBytes(128n)).toEqual([0x8f, 0x80]);
    expect(vlongBytes(130n)).toEqual([0x8f, 0x82]);
    expect(vlongBytes(256n)).toEqual([0x8e, 0x01, 0x00]);
  });

  it("stores negative values beyond -112 as one's complement", () => {
    expect(vlongBytes(-113n)).toEqual([0x87, 0x70]);
    expect(vlongBytes(-257n)).toEqual([0x86, 0x01, 0x00]);
  });

  it('covers the signed 64-bit extremes in nine bytes', () => {
    expect(vlongBytes(INT64_MAX)).toEqual([0x88, 0x7f, ...FF7]);
    expect(vlongBytes(INT64_MIN)).toEqual([0x80, 0x7f, ...FF7]);
  });

  it('rejects values outside the signed 64-bit range', () => {
    expect(() => vlongBytes(INT64_MAX + 1n)).toThrow(EncodeError);
    expect(() => vlongBytes(INT64_MIN - 1n)).toThrow(EncodeError);
  });

  it('vlongSize() agrees with the written length', () => {
    for (const v of [0n, 127n, -112n, 128n, -113n, 256n, 65_536n, INT64_MAX, INT64_MIN]) {
      expect(vlongSize(v)).toBe(vlongBytes(v).length);
    }
  });
});

describe('writeVInt', () => {
  it('rejects negative and non-integral lengths', () => {
    const w = new ByteWriter();
    expect(() => writeVInt(w, -1)).toThrow(EncodeError);
    expect(() => writeVInt(w, 1.5)).toThrow(EncodeError);
    expect(w.length).toBe(0);
  });
});

// ─── marker byte ─────────────────────────────────────────────────────────────

describe('marker byte helpers', () => {
  it('toSignedByte() reinterprets unsigned bytes as i8', () => {
    expect(toSignedByte(0x7f)).toBe(127);
    expect(toSignedByte(0x80)).toBe(-128);
    expect(toSignedByte(0xff)).toBe(-1);
  });

  it('decodeVIntSize() reads the total size from the marker', () => {
    expect(decodeVIntSize(5)).toBe(1);
    expect(decodeVIntSize(-112)).toBe(1);
    expect(decodeVIntSize(-113)).toBe(2);
    expect(decodeVIntSize(-120)).toBe(9);
    expect(decodeVIntSize(-121)).toBe(2);
    expect(decodeVIntSize(-128)).toBe(9);
  });

  it('isNegativeVInt() distinguishes the two marker ranges', () => {
    expect(isNegativeVInt(-1)).toBe(true);
    expect(isNegativeVInt(5)).toBe(false);
    expect(isNegativeVInt(-113)).toBe(false);
    expect(isNegativeVInt(-121)).toBe(true);
  });
});

// ─── ByteCursor reads ────────────────────────────────────────────────────────

describe('ByteCursor vlong reads', () => {
  const samples = [
    0n, 1n, -1n, 127n, -112n, 128n, -113n, 255n, 256n, -257n,
    0x1234_5678n, -0x1234_5678n, 0x1_0000_0000n, 0xffff_ffffn,
    2n ** 53n, 2n ** 53n + 1n, -(2n ** 53n) - 1n,
    0x7654_3210_fedc_ba98n, INT64_MAX, INT64_MIN,
  ];

  it('readVLong() returns exactly what writeVLong() wrote', () => {
    for (const v of samples) {
      const cursor = cursorOver(vlongBytes(v));
      expect(cursor.readVLong()).toBe(v);
      expect(cursor.remaining).toBe(0);
    }
  });

  it('readVLongAsNumber() equals Number() of the exact value', () => {
    for (const v of samples) {
      const cursor = cursorOver(vlongBytes(v));
      expect(cursor.readVLongAsNumber()).toBe(Number(v));
      expect(cursor.remaining).toBe(0);
    }
  });

  it('fails on a truncated vlong', () => {
    expect(() => cursorOver([0x8e, 0x01]).readVLong()).toThrow(DecodeError);
    expect(() => cursorOver([0x8e, 0x01]).readVLongAsNumber()).toThrow(DecodeError);
  });

  it('rejects a nine-byte vlong whose magnitude reaches 2^63', () => {
    for (const bytes of [
      [0x88, 0x80, 0, 0, 0, 0, 0, 0, 0],
      [0x88, 0xff, ...FF7],
      [0x80, 0x80, 0, 0, 0, 0, 0, 0, 0],
    ]) {
      for (const read of [(c: ByteCursor) => c.readVLong(), (c: ByteCursor) => c.readVLongAsNumber()]) {
        let caught: unknown;
        try {
          read(cursorOver(bytes));
        } catch (err) {
          caught = err;
        }
        expect(caught).toBeInstanceOf(DecodeError);
        expect(caught instanceof DecodeError && caught.offset).toBe(0);
      }
    }
  });

  it('accepts a nine-byte vlong of exactly 2^63 - 1', () => {
    const bytes = [0x88, 0x7f, ...FF7];
    expect(cursorOver(bytes).readVLong()).toBe(INT64_MAX);
    expect(cursorOver(bytes).readVLongAsNumber()).toBe(Number(INT64_MAX));
    expect(cursorOver([0x80, 0x7f, ...FF7]).readVLong()).toBe(INT64_MIN);
  });
});

describe('ByteCursor.readLength', () => {
  it('reads a multi-byte length when enough input follows', () => {
    const bytes = [0x8e, 0x01, 0x2c, ...new Array<number>(300).fill(0x61)];
    const cursor = cursorOver(bytes);
    expect(cursor.readLength()).toBe(300);
    expect(cursor.pos).toBe(3);
  });

  it('rejects a negative length', () => {
    expect(() => cursorOver([0xff]).readLength()).toThrow(DecodeError);
  });

  it('rejects a length longer than the remaining input', () => {
    expect(() => cursorOver([0x05, 0x61]).readLength()).toThrow(/exceeds/);
  });

  it('rejects a length prefix wider than 32 bits', () => {
    expect(() => cursorOver([0x88, 0, 0, 0, 0, 0, 0, 0, 1]).readLength()).toThrow(DecodeError);
  });
});

describe('ByteCursor window', () => {
  it('refuses a window outside the buffer', () => {
    expect(() => new ByteCursor(new Uint8Array(4), 2, 3)).toThrow(RangeError);
  });

  it('never reads past the window end', () => {
    const cursor = new ByteCursor(new Uint8Array([1, 2, 3, 4]), 1, 2);
    expect(cursor.readByte()).toBe(2);
    expect(cursor.readByte()).toBe(3);
    expect(() => cursor.readByte()).toThrow(DecodeError);
  });
});
