import { describe, it, expect } from 'vitest';
import { decodeVLQ, decodeVLQRun, encodeVLQ, encodeVLQRun } from '../src/utils/vlq.js';
import { MalformedVlqError } from '../src/utils/errors.js';

describe('encodeVLQ', () => {
  it('encodes zero as a single digit', () => {
    expect(encodeVLQ(0)).toBe('A');
    expect(encodeVLQ(-0)).toBe('A');
  });

  it('stores the sign in the lowest bit', () => {
    expect(encodeVLQ(1)).toBe('C');
    expect(encodeVLQ(-1)).toBe('D');
    expect(encodeVLQ(15)).toBe('e');
  });

  it('sets the continuation bit once the value needs a second digit', () => {
    expect(encodeVLQ(16)).toBe('gB');
    expect(encodeVLQ(-16)).toBe('hB');
    expect(encodeVLQ(31)).toBe('+B');
    expect(encodeVLQ(32)).toBe('gC');
    expect(encodeVLQ(33)).toBe('iC');
    expect(encodeVLQ(100)).toBe('oG');
  });

  it('grows to a third digit past 511', () => {
    expect(encodeVLQ(511)).toBe('+f');
    expect(encodeVLQ(512)).toBe('ggB');
  });

  it('rejects non-integers', () => {
    expect(() => encodeVLQ(1.5)).toThrow(RangeError);
    expect(() => encodeVLQ(Number.NaN)).toThrow(RangeError);
  });
});

describe('decodeVLQ', () => {
  it('returns the value and the number of characters consumed', () => {
    expect(decodeVLQ('gB')).toEqual({ value: 16, length: 2 });
    expect(decodeVLQ('D')).toEqual({ value: -1, length: 1 });
  });

  it('starts at the given offset', () => {
    expect(decodeVLQ('AgBC', 1)).toEqual({ value: 16, length: 2 });
  });

  it('decodes a lone sign bit to positive zero', () => {
    expect(Object.is(decodeVLQ('B').value, 0)).toBe(true);
  });

  it('rejects an empty value', () => {
    expect(() => decodeVLQ('')).toThrow(MalformedVlqError);
  });

  it('rejects a truncated continuation chain', () => {
    expect(() => decodeVLQ('g')).toThrow('incomplete VLQ continuation');
  });

  it('rejects characters outside the base64 alphabet', () => {
    expect(() => decodeVLQ('*')).toThrow(MalformedVlqError);
    expect(() => decodeVLQ('A=')).not.toThrow();
    expect(() => decodeVLQ('=')).toThrow('invalid base64 VLQ character "="');
  });

  it('reports the MALFORMED_VLQ code', () => {
    try {
      decodeVLQ('!');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedVlqError);
      expect(e).toMatchObject({ code: 'MALFORMED_VLQ', name: 'MalformedVlqError' });
    }
  });
});

describe('VLQ round trip', () => {
  it('decodes every encoded integer back to itself', () => {
    const values: number[] = [];
    for (let n = -1100; n <= 1100; n++) values.push(n);
    values.push(16383, 16384, -16384, 2 ** 30, -(2 ** 30), 2 ** 40 + 7, -(2 ** 45));

    for (const n of values) {
      const encoded = encodeVLQ(n);
      expect(decodeVLQ(encoded)).toEqual({ value: n, length: encoded.length });
    }
  });
});

describe('VLQ runs', () => {
  it('splits a run into its integers', () => {
    expect(decodeVLQRun('AAgBC')).toEqual([0, 0, 16, 1]);
    expect(decodeVLQRun('ECDF')).toEqual([2, 1, -1, -2]);
  });

  it('encodes a list of integers without separators', () => {
    expect(encodeVLQRun([0, 0, 16, 1])).toBe('AAgBC');
  });

  it('rejects an empty run', () => {
    expect(() => decodeVLQRun('')).toThrow(MalformedVlqError);
  });

  it('rejects a run that ends mid-value', () => {
    expect(() => decodeVLQRun('AAg')).toThrow('incomplete VLQ continuation');
  });
});
