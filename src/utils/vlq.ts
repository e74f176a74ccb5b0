/**
 * Base64 VLQ (Variable Length Quantity) codec used by source map v3 `mappings`.
 *
 * Each base64 digit carries five data bits plus a continuation bit (0x20).
 * The sign is stored in the lowest bit of the first digit, and the magnitude
 * is shifted left by one before it is split into digits.
 */
import { MalformedVlqError } from './errors.js';

const BASE64_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';

const BASE64_VALUES = new Map<string, number>([...BASE64_CHARS].map((char, index) => [char, index]));

const VLQ_BASE = 32;
const VLQ_DATA_MASK = 0x1f;
const VLQ_CONTINUATION_BIT = 0x20;

// The shifted magnitude plus the sign bit must stay a safe integer.
export const MAX_VLQ_MAGNITUDE = Math.floor(Number.MAX_SAFE_INTEGER / 2);

export type DecodedVLQ = {
  value: number;
  /** Number of characters consumed. */
  length: number;
};

/**
 * Encode a single integer as a base64 VLQ run.
 */
export function encodeVLQ(value: number): string {
  if (!Number.isInteger(value) || Math.abs(value) > MAX_VLQ_MAGNITUDE) {
    throw new RangeError(`Cannot VLQ-encode ${value}: expected an integer within ±${MAX_VLQ_MAGNITUDE}`);
  }

  let result = '';
  let vlq = value < 0 ? -value * 2 + 1 : value * 2;

  do {
    let digit = vlq % VLQ_BASE;
    vlq = Math.floor(vlq / VLQ_BASE);
    if (vlq > 0) {
      digit |= VLQ_CONTINUATION_BIT;
    }
    result += BASE64_CHARS[digit];
  } while (vlq > 0);

  return result;
}

/**
 * Decode one VLQ integer starting at `start`.
 */
export function decodeVLQ(input: string, start = 0): DecodedVLQ {
  let shifted = 0;
  let multiplier = 1;
  let position = start;
  let continuation = true;

  while (continuation) {
    if (position >= input.length) {
      throw new MalformedVlqError(position === start ? 'empty VLQ value' : 'incomplete VLQ continuation');
    }

    const char = input[position];
    const digit = BASE64_VALUES.get(char);
    if (digit === undefined) {
      throw new MalformedVlqError(`invalid base64 VLQ character "${char}"`);
    }
    position++;

    continuation = (digit & VLQ_CONTINUATION_BIT) !== 0;
    shifted += (digit & VLQ_DATA_MASK) * multiplier;
    multiplier *= VLQ_BASE;

    if (shifted > Number.MAX_SAFE_INTEGER) {
      throw new MalformedVlqError('VLQ value exceeds the safe integer range');
    }
  }

  const negative = shifted % 2 === 1;
  const magnitude = Math.floor(shifted / 2);

  return {
    // A lone sign bit decodes to 0, never -0.
    value: negative && magnitude !== 0 ? -magnitude : magnitude,
    length: position - start,
  };
}

/**
 * Split a comma-free run of VLQ digits into its integers.
 */
export function decodeVLQRun(run: string): number[] {
  if (run.length === 0) {
    throw new MalformedVlqError('empty VLQ value');
  }

  const values: number[] = [];
  let position = 0;

  while (position < run.length) {
    const { value, length } = decodeVLQ(run, position);
    values.push(value);
    position += length;
  }

  return values;
}

/**
 * Encode a list of integers as one comma-free VLQ run.
 */
export function encodeVLQRun(values: readonly number[]): string {
  return values.map(encodeVLQ).join('');
}
