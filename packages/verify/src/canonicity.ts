/**
 * Canonicity checker.
 *
 * Enforces the ordering rules that make exact-synthesis enumeration
 * canonical, comparing each step with the one before it:
 *
 * - Same support: the gate bit string must not decrease.
 * - Different support: unless the step reads the previous step's
 *   output, the support must not decrease in colexicographic order.
 *
 * Supports are compared as fanin index sequences.
 */

import type { Step, StepResult } from "./types.js";
import { violation } from "./violations.js";

/**
 * Fanin indices of a step, left to right.
 */
export function supportSignature(step: Step): readonly number[] {
  return step.fanins.map((id) => id.index);
}

function sameSupport(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((x, i) => x === b[i]);
}

/**
 * Compare two supports from the last element backward.
 * Returns a negative number, zero, or a positive number.
 */
export function compareColex(a: readonly number[], b: readonly number[]): number {
  let i = a.length - 1;
  let j = b.length - 1;
  while (i >= 0 && j >= 0) {
    const x = a[i] ?? 0;
    const y = b[j] ?? 0;
    if (x !== y) return x - y;
    i--;
    j--;
  }
  return a.length - b.length;
}

interface PreviousStep {
  readonly support: readonly number[];
  readonly gateBits: string;
  readonly outputIndex: number;
}

/**
 * Incremental checker for one chain. Feed steps in order.
 */
export class CanonicityChecker {
  private previous: PreviousStep | undefined;

  check(step: Step): StepResult<Step> {
    const support = supportSignature(step);
    const prev = this.previous;

    if (prev !== undefined) {
      if (sameSupport(support, prev.support)) {
        if (step.gateBits < prev.gateBits) {
          return {
            ok: false,
            violation: violation(
              "SAME_SUPPORT_ORDER",
              `gates with same support are not ordered in ${step.line}`,
              step.position,
              step.line,
            ),
          };
        }
      } else if (
        !support.includes(prev.outputIndex) &&
        compareColex(support, prev.support) < 0
      ) {
        return {
          ok: false,
          violation: violation(
            "COLEX_ORDER",
            `co-lexicographic order violated in ${step.line}`,
            step.position,
            step.line,
          ),
        };
      }
    }

    this.previous = {
      support,
      gateBits: step.gateBits,
      outputIndex: step.output.index,
    };
    return { ok: true, value: step };
  }
}
