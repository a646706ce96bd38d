/**
 * @chainverify/truth-table — Dense truth tables for chain verification.
 *
 * Core exports:
 * - BitFunction — fixed-arity Boolean function as a bit vector
 * - hex/binary codecs (big-endian, most significant bit first)
 * - TruthTableFormatError — malformed string encodings
 *
 * @packageDocumentation
 */

export { BitFunction, MAX_ARITY } from "./bit-function.js";

export {
  hexLength,
  createFromHexString,
  createFromBinaryString,
  toHexString,
  toBinaryString,
} from "./codec.js";

export { TruthTableFormatError } from "./errors.js";
export type { TruthTableFormatErrorCode } from "./errors.js";
