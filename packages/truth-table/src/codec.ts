/**
 * @chainverify/truth-table — String encodings.
 *
 * Binary strings are written most significant bit first: the first
 * character is bit `2^n - 1`, the last character is bit 0.
 *
 * Hex strings are big-endian in the same way. A table with fewer than
 * four bits still takes one hex digit; only its low `2^n` bits are kept.
 */

import type { BitFunction } from "./bit-function.js";
import { TruthTableFormatError } from "./errors.js";

const HEX_DIGITS = "0123456789abcdef";

/**
 * Number of hex digits that encode a table of `numBits` bits.
 */
export function hexLength(numBits: number): number {
  return numBits <= 4 ? 1 : numBits / 4;
}

/**
 * Fill `fn` from a hex string. Bits not covered stay untouched.
 *
 * @throws {TruthTableFormatError} on wrong length or a non-hex character
 */
export function createFromHexString(fn: BitFunction, hex: string): void {
  const expected = hexLength(fn.numBits);
  if (hex.length !== expected) {
    throw new TruthTableFormatError(
      "INVALID_LENGTH",
      `Hex string "${hex}" has ${String(hex.length)} digits, expected ${String(expected)} for ${String(fn.numVars)} variables`,
    );
  }

  const lower = hex.toLowerCase();
  for (let k = 0; k < expected; k++) {
    const ch = lower.charAt(expected - 1 - k);
    const digit = HEX_DIGITS.indexOf(ch);
    if (digit < 0) {
      throw new TruthTableFormatError(
        "INVALID_CHARACTER",
        `Invalid hex digit "${ch}" in "${hex}"`,
      );
    }

    for (let b = 0; b < 4; b++) {
      const bit = 4 * k + b;
      if (bit < fn.numBits && ((digit >> b) & 1) === 1) {
        fn.setBit(bit);
      }
    }
  }
}

/**
 * Fill `fn` from a string of exactly `2^n` characters `0` and `1`.
 *
 * @throws {TruthTableFormatError} on wrong length or a non-binary character
 */
export function createFromBinaryString(fn: BitFunction, bits: string): void {
  if (bits.length !== fn.numBits) {
    throw new TruthTableFormatError(
      "INVALID_LENGTH",
      `Binary string "${bits}" has ${String(bits.length)} characters, expected ${String(fn.numBits)}`,
    );
  }

  for (let p = 0; p < bits.length; p++) {
    const ch = bits.charAt(p);
    if (ch === "1") {
      fn.setBit(fn.numBits - 1 - p);
    } else if (ch !== "0") {
      throw new TruthTableFormatError(
        "INVALID_CHARACTER",
        `Invalid binary digit "${ch}" in "${bits}"`,
      );
    }
  }
}

export function toHexString(fn: BitFunction): string {
  const length = hexLength(fn.numBits);
  let out = "";
  for (let k = length - 1; k >= 0; k--) {
    let digit = 0;
    for (let b = 0; b < 4; b++) {
      const bit = 4 * k + b;
      if (bit < fn.numBits && fn.getBit(bit) === 1) {
        digit |= 1 << b;
      }
    }
    out += HEX_DIGITS.charAt(digit);
  }
  return out;
}

export function toBinaryString(fn: BitFunction): string {
  let out = "";
  for (let i = fn.numBits - 1; i >= 0; i--) {
    out += fn.getBit(i) === 1 ? "1" : "0";
  }
  return out;
}
