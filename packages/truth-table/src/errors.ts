/**
 * @chainverify/truth-table — Error types.
 */

/**
 * Why a truth-table string could not be decoded.
 */
export type TruthTableFormatErrorCode =
  | "INVALID_LENGTH"
  | "INVALID_CHARACTER";

/**
 * Structured error for malformed hex or binary encodings.
 * Always thrown — never returns a partially filled table.
 */
export class TruthTableFormatError extends Error {
  public readonly code: TruthTableFormatErrorCode;

  constructor(code: TruthTableFormatErrorCode, message: string) {
    super(message);
    this.name = "TruthTableFormatError";
    this.code = code;
  }
}
