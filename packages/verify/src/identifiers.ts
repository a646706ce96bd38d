/**
 * Identifier mapping.
 *
 * Primary input `k` is written as the lowercase letter `a + k`.
 * The output of step `i` has index `numVars + i` and is written as the
 * uppercase letter at that index (`A + numVars + i`).
 * Fanin order within a step compares indices, which is the same as
 * comparing the letters case-insensitively.
 */

import type { Identifier } from "@chainverify/types";

/** Letters available to inputs and step outputs together. */
export const ALPHABET_SIZE = 26;

const LOWER_A = "a".charCodeAt(0);
const UPPER_A = "A".charCodeAt(0);

export function inputId(index: number): Identifier {
  return { index, role: "input" };
}

export function stepId(numVars: number, position: number): Identifier {
  return { index: numVars + position, role: "step" };
}

/**
 * Display letter of an identifier.
 *
 * @throws {RangeError} if the index does not fit the alphabet
 */
export function identifierName(id: Identifier): string {
  if (!Number.isInteger(id.index) || id.index < 0 || id.index >= ALPHABET_SIZE) {
    throw new RangeError(`Identifier index ${String(id.index)} has no letter`);
  }
  return String.fromCharCode((id.role === "input" ? LOWER_A : UPPER_A) + id.index);
}

/**
 * Resolve one fanin character.
 *
 * Returns undefined for anything that cannot name a signal of this
 * chain: non-letters, lowercase letters past the inputs, and uppercase
 * letters naming an input position.
 */
export function parseIdentifier(ch: string, numVars: number): Identifier | undefined {
  if (ch.length !== 1) return undefined;

  const code = ch.charCodeAt(0);
  if (code >= LOWER_A && code < LOWER_A + ALPHABET_SIZE) {
    const index = code - LOWER_A;
    return index < numVars ? inputId(index) : undefined;
  }
  if (code >= UPPER_A && code < UPPER_A + ALPHABET_SIZE) {
    const index = code - UPPER_A;
    return index >= numVars ? { index, role: "step" } : undefined;
  }
  return undefined;
}
