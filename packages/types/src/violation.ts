/**
 * Violation taxonomy for chain verification.
 *
 * A chain fails on its first violation. Each violation carries a
 * `kind` (the broad class) and a `rule` (the specific check that fired).
 */

/** Broad class of a violation. */
export type ViolationKind =
  | "format"
  | "structural"
  | "ordering"
  | "normalization"
  | "equivalence";

/** The specific check that rejected a chain. */
export type ViolationRule =
  | "STEP_COUNT_MISMATCH"
  | "INVALID_STEP_NAME"
  | "MALFORMED_SEPARATOR"
  | "MALFORMED_GATE"
  | "GATE_NOT_NORMALIZED"
  | "MALFORMED_FANIN"
  | "UNBOUND_FANIN"
  | "FANIN_ORDER"
  | "TRAILING_CHARACTERS"
  | "SAME_SUPPORT_ORDER"
  | "COLEX_ORDER"
  | "SPEC_MISMATCH";

/**
 * Kind of every rule. A within-step fanin order breach counts as an
 * ordering violation, like the cross-step canonicity rules.
 */
export const VIOLATION_KIND_BY_RULE: Readonly<Record<ViolationRule, ViolationKind>> = {
  STEP_COUNT_MISMATCH: "structural",
  INVALID_STEP_NAME: "structural",
  MALFORMED_SEPARATOR: "structural",
  MALFORMED_GATE: "format",
  GATE_NOT_NORMALIZED: "normalization",
  MALFORMED_FANIN: "structural",
  UNBOUND_FANIN: "structural",
  FANIN_ORDER: "ordering",
  TRAILING_CHARACTERS: "structural",
  SAME_SUPPORT_ORDER: "ordering",
  COLEX_ORDER: "ordering",
  SPEC_MISMATCH: "equivalence",
} as const;

/**
 * Why a chain was rejected.
 */
export interface ChainViolation {
  readonly kind: ViolationKind;
  readonly rule: ViolationRule;

  /** Human-readable description */
  readonly message: string;

  /** Zero-based step position, when the violation belongs to one step */
  readonly stepIndex?: number | undefined;

  /** The offending step line, when there is one */
  readonly line?: string | undefined;
}

/**
 * Non-fatal note: the target is symmetric in two inputs but the chain
 * reaches for the higher one first.
 */
export interface SymmetryAdvisory {
  readonly first: number;
  readonly second: number;
  readonly message: string;
}
