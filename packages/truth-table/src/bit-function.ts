/**
 * @chainverify/truth-table — Dense Boolean functions.
 *
 * A BitFunction over `n` variables stores all `2^n` output bits.
 * Bit `i` holds the value for the assignment where variable `k`
 * takes bit `k` of `i`.
 *
 * Rules:
 * - Arity is fixed at construction
 * - Binary operations require equal arity
 * - Bits above `2^n` in the last storage word are always zero
 */

import {
  createFromBinaryString,
  createFromHexString,
  toBinaryString,
  toHexString,
} from "./codec.js";

/** Largest supported arity (2^24 bits = 2 MiB of storage). */
export const MAX_ARITY = 24;

function assertArity(numVars: number): void {
  if (!Number.isInteger(numVars) || numVars < 0 || numVars > MAX_ARITY) {
    throw new RangeError(
      `Arity must be an integer in 0..${String(MAX_ARITY)}, got ${String(numVars)}`,
    );
  }
}

export class BitFunction {
  readonly numVars: number;
  readonly numBits: number;
  private readonly words: Uint32Array;

  /**
   * Create the constant-0 function over `numVars` variables.
   */
  constructor(numVars: number) {
    assertArity(numVars);
    this.numVars = numVars;
    this.numBits = 2 ** numVars;
    this.words = new Uint32Array(Math.max(1, Math.ceil(this.numBits / 32)));
  }

  /**
   * Decode a big-endian hex string.
   *
   * @throws {TruthTableFormatError} on wrong length or alphabet
   */
  static fromHex(numVars: number, hex: string): BitFunction {
    const fn = new BitFunction(numVars);
    createFromHexString(fn, hex);
    return fn;
  }

  /**
   * Decode a string of `2^numVars` binary digits, most significant first.
   *
   * @throws {TruthTableFormatError} on wrong length or alphabet
   */
  static fromBinary(numVars: number, bits: string): BitFunction {
    const fn = new BitFunction(numVars);
    createFromBinaryString(fn, bits);
    return fn;
  }

  /**
   * The function equal to input variable `index`.
   */
  static projection(numVars: number, index: number): BitFunction {
    const fn = new BitFunction(numVars);
    if (!Number.isInteger(index) || index < 0 || index >= numVars) {
      throw new RangeError(
        `Variable index ${String(index)} out of range for ${String(numVars)} variables`,
      );
    }
    for (let i = 0; i < fn.numBits; i++) {
      if (((i >> index) & 1) === 1) {
        fn.setBit(i);
      }
    }
    return fn;
  }

  /**
   * A fresh constant-0 function with the same arity.
   */
  construct(): BitFunction {
    return new BitFunction(this.numVars);
  }

  getBit(i: number): 0 | 1 {
    this.assertBit(i);
    return ((this.words[i >>> 5] ?? 0) >>> (i & 31)) & 1 ? 1 : 0;
  }

  setBit(i: number): void {
    this.assertBit(i);
    const w = i >>> 5;
    this.words[w] = (this.words[w] ?? 0) | (1 << (i & 31));
  }

  clearBit(i: number): void {
    this.assertBit(i);
    const w = i >>> 5;
    this.words[w] = (this.words[w] ?? 0) & ~(1 << (i & 31));
  }

  /**
   * Bitwise comparison.
   *
   * @throws {RangeError} if the arities differ
   */
  equals(other: BitFunction): boolean {
    this.assertSameArity(other);
    for (let w = 0; w < this.words.length; w++) {
      if (this.words[w] !== other.words[w]) {
        return false;
      }
    }
    return true;
  }

  /**
   * The function with variables `i` and `j` exchanged.
   */
  swap(i: number, j: number): BitFunction {
    this.assertVar(i);
    this.assertVar(j);
    const out = this.construct();
    for (let x = 0; x < this.numBits; x++) {
      const bi = (x >> i) & 1;
      const bj = (x >> j) & 1;
      const y = bi === bj ? x : x ^ ((1 << i) | (1 << j));
      if (this.getBit(y) === 1) {
        out.setBit(x);
      }
    }
    return out;
  }

  /**
   * True when exchanging variables `i` and `j` leaves the function
   * unchanged, i.e. the cofactor `x_i = 0, x_j = 1` equals the
   * cofactor `x_i = 1, x_j = 0`.
   */
  isSymmetricIn(i: number, j: number): boolean {
    this.assertVar(i);
    this.assertVar(j);
    if (i === j) return true;

    const mi = 1 << i;
    const mj = 1 << j;
    for (let x = 0; x < this.numBits; x++) {
      if ((x & mi) === 0 && (x & mj) !== 0) {
        if (this.getBit(x) !== this.getBit(x ^ mi ^ mj)) {
          return false;
        }
      }
    }
    return true;
  }

  toHex(): string {
    return toHexString(this);
  }

  toBinary(): string {
    return toBinaryString(this);
  }

  private assertBit(i: number): void {
    if (!Number.isInteger(i) || i < 0 || i >= this.numBits) {
      throw new RangeError(
        `Bit index ${String(i)} out of range 0..${String(this.numBits - 1)}`,
      );
    }
  }

  private assertVar(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.numVars) {
      throw new RangeError(
        `Variable index ${String(index)} out of range for ${String(this.numVars)} variables`,
      );
    }
  }

  private assertSameArity(other: BitFunction): void {
    if (other.numVars !== this.numVars) {
      throw new RangeError(
        `Arity mismatch: ${String(this.numVars)} vs ${String(other.numVars)}`,
      );
    }
  }
}
