/**
 * Runtime Type Guards
 *
 * Narrowing functions for chain verification types.
 * Used where verdicts and summaries cross a process boundary
 * (JSON reports, configuration input).
 */

import type { Identifier } from "./identifier.js";
import type { ChainViolation, ViolationKind, ViolationRule } from "./violation.js";
import { VIOLATION_KIND_BY_RULE } from "./violation.js";
import type { ScoreSummary } from "./score.js";

const ROLES = new Set<string>(["input", "step"]);
const KINDS = new Set<string>(Object.values(VIOLATION_KIND_BY_RULE));
const RULES = new Set<string>(Object.keys(VIOLATION_KIND_BY_RULE));

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function isIdentifier(value: unknown): value is Identifier {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isCount(v.index) && typeof v.role === "string" && ROLES.has(v.role);
}

export function isViolationKind(value: unknown): value is ViolationKind {
  return typeof value === "string" && KINDS.has(value);
}

export function isViolationRule(value: unknown): value is ViolationRule {
  return typeof value === "string" && RULES.has(value);
}

export function isChainViolation(value: unknown): value is ChainViolation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isViolationRule(v.rule) &&
    v.kind === VIOLATION_KIND_BY_RULE[v.rule] &&
    typeof v.message === "string" &&
    (v.stepIndex === undefined || isCount(v.stepIndex)) &&
    (v.line === undefined || typeof v.line === "string")
  );
}

export function isScoreSummary(value: unknown): value is ScoreSummary {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isCount(v.points) &&
    isCount(v.violations) &&
    v.violations <= v.points &&
    typeof v.score === "number" &&
    Number.isFinite(v.score) &&
    v.score >= 0
  );
}
