/**
 * @chainverify/verify — Types for chain verification.
 *
 * These types define the verification protocol:
 * - Step: one parsed gate definition
 * - ChainVerdict: PASS with the computed function, or FAIL with the
 *   first violation found
 * - ScoreReport: totals over a file of chains
 */

import type { BitFunction } from "@chainverify/truth-table";
import type {
  ChainViolation,
  Identifier,
  ScoreSummary,
  SymmetryAdvisory,
} from "@chainverify/types";

// =============================================================================
// Steps
// =============================================================================

/**
 * One gate definition, e.g. `D = 0110 a C`.
 */
export interface Step {
  /** Zero-based position in the chain */
  readonly position: number;

  /** Identifier bound by this step */
  readonly output: Identifier;

  /** Gate truth table exactly as written (most significant bit first) */
  readonly gateBits: string;

  /** Decoded gate over `fanins.length` variables */
  readonly gate: BitFunction;

  /** Gate inputs, left to right; fanin `j` drives gate variable `j` */
  readonly fanins: readonly Identifier[];

  /** Source line */
  readonly line: string;
}

/**
 * Outcome of parsing or checking one step.
 */
export type StepResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly violation: ChainViolation };

// =============================================================================
// Verdicts
// =============================================================================

export type VerificationVerdict = "PASS" | "FAIL";

export interface ChainPass {
  readonly verdict: "PASS";

  /** Function computed by the last step */
  readonly output: BitFunction;

  /** Parsed steps, in chain order */
  readonly steps: readonly Step[];

  /** Fanins of every step, concatenated in chain order */
  readonly support: readonly Identifier[];

  /** Symmetry notes; never affect the verdict */
  readonly advisories: readonly SymmetryAdvisory[];
}

export interface ChainFail {
  readonly verdict: "FAIL";

  /** The first violation found; no later check ran */
  readonly violation: ChainViolation;
}

export type ChainVerdict = ChainPass | ChainFail;

// =============================================================================
// Scoring
// =============================================================================

/**
 * Totals over a file, with the verdict of every block in order.
 */
export interface ScoreReport extends ScoreSummary {
  readonly outcomes: readonly ChainVerdict[];
}
