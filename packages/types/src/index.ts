/**
 * @chainverify/types — Shared domain types for chain verification.
 *
 * These types are used across all chainverify packages:
 * - Identifiers for primary inputs and step outputs
 * - Violation taxonomy and symmetry advisories
 * - Aggregate score summaries
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Identifier types
export type {
  IdentifierRole,
  Identifier,
  ChainContext,
} from "./identifier.js";

// Violation types
export type {
  ViolationKind,
  ViolationRule,
  ChainViolation,
  SymmetryAdvisory,
} from "./violation.js";
export { VIOLATION_KIND_BY_RULE } from "./violation.js";

// Score types
export type { ScoreSummary } from "./score.js";

// Runtime type guards
export {
  isIdentifier,
  isViolationKind,
  isViolationRule,
  isChainViolation,
  isScoreSummary,
} from "./guards.js";
