/**
 * Identifier types.
 *
 * Every signal in a chain is addressed by a small integer index:
 * - `0 .. numVars - 1` are the primary inputs
 * - `numVars + i` is the output of step `i`
 *
 * Display letters are derived from the index (lowercase for inputs,
 * uppercase for step outputs); see `@chainverify/verify` for the mapping.
 */

/** Which kind of signal an identifier names. */
export type IdentifierRole = "input" | "step";

/**
 * A bound signal in a chain.
 */
export interface Identifier {
  /** Position in the combined input/step index space */
  readonly index: number;

  /** Primary input or step output */
  readonly role: IdentifierRole;
}

/**
 * Parameters fixed for every chain checked against one target.
 */
export interface ChainContext {
  /** Number of primary inputs of the target function */
  readonly numVars: number;

  /** Number of inputs of every gate */
  readonly fanin: number;

  /** Exact number of steps each chain must have */
  readonly steps: number;
}
