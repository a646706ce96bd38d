/**
 * @chainverify/verify — Canonical chain verification.
 *
 * Re-simulates logic chains from their primary inputs, enforces the
 * canonical ordering rules of exact synthesis, and scores files of
 * chain attempts.
 *
 * Core exports:
 * - verifyChain / ChainVerifier — check one chain against a target
 * - scoreChains / ChainScorer — totals over many chains
 * - splitChainBlocks / chainFileName — chain file layout
 */

// Identifiers
export {
  ALPHABET_SIZE,
  inputId,
  stepId,
  identifierName,
  parseIdentifier,
} from "./identifiers.js";

// Environment
export { VariableEnvironment } from "./environment.js";

// Parsing
export { parseStep } from "./step-parser.js";

// Canonicity
export {
  CanonicityChecker,
  compareColex,
  supportSignature,
} from "./canonicity.js";

// Evaluation
export { evaluateStep, evaluateChain } from "./evaluator.js";

// Symmetry audit
export { auditSymmetry } from "./symmetry-auditor.js";

// Chain verification
export {
  verifyChain,
  assertChainContext,
  ChainVerifier,
} from "./chain-verifier.js";

// Chain files
export {
  DEFAULT_CHAIN_EXTENSION,
  chainFileName,
  splitChainBlocks,
} from "./chain-file.js";

// Scoring
export {
  computeScore,
  formatScore,
  ChainScorer,
  scoreChains,
} from "./score.js";

// Types
export type {
  Step,
  StepResult,
  VerificationVerdict,
  ChainPass,
  ChainFail,
  ChainVerdict,
  ScoreReport,
} from "./types.js";
