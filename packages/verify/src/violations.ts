/**
 * Violation construction.
 */

import type { ChainViolation, ViolationRule } from "@chainverify/types";
import { VIOLATION_KIND_BY_RULE } from "@chainverify/types";

export function violation(
  rule: ViolationRule,
  message: string,
  stepIndex?: number,
  line?: string,
): ChainViolation {
  return {
    kind: VIOLATION_KIND_BY_RULE[rule],
    rule,
    message,
    ...(stepIndex !== undefined ? { stepIndex } : {}),
    ...(line !== undefined ? { line } : {}),
  };
}
