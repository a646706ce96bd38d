/**
 * Chain Verifier.
 *
 * Checks one chain against a target function by:
 * 1. Checking the step count
 * 2. Parsing each step (naming, gate format, normalization, fanins)
 * 3. Checking canonical ordering against the previous step
 * 4. Simulating the step and binding its output
 * 5. Comparing the last step's function with the target
 * 6. Auditing input symmetries (advisory only)
 *
 * Design:
 * - Pure function `verifyChain()` for stateless operation
 * - ChainVerifier class holding the decoded target for many chains
 * - First violation wins; nothing after it runs
 */

import { BitFunction, MAX_ARITY } from "@chainverify/truth-table";
import type { ChainContext, Identifier } from "@chainverify/types";
import { CanonicityChecker } from "./canonicity.js";
import { VariableEnvironment } from "./environment.js";
import { evaluateStep } from "./evaluator.js";
import { ALPHABET_SIZE, stepId } from "./identifiers.js";
import { parseStep } from "./step-parser.js";
import { auditSymmetry } from "./symmetry-auditor.js";
import type { ChainVerdict, Step } from "./types.js";
import { violation } from "./violations.js";

/**
 * Validate a chain context against a target function.
 *
 * @throws {RangeError} on parameters no chain could satisfy
 */
export function assertChainContext(context: ChainContext, target: BitFunction): void {
  const { numVars, fanin, steps } = context;
  if (target.numVars !== numVars) {
    throw new RangeError(
      `Target has ${String(target.numVars)} variables, context expects ${String(numVars)}`,
    );
  }
  if (!Number.isInteger(fanin) || fanin < 0 || fanin > MAX_ARITY) {
    throw new RangeError(`Invalid fanin ${String(fanin)}`);
  }
  if (!Number.isInteger(steps) || steps < 1) {
    throw new RangeError(`Invalid step count ${String(steps)}`);
  }
  if (numVars + steps > ALPHABET_SIZE) {
    throw new RangeError(
      `${String(numVars)} inputs and ${String(steps)} steps exceed ${String(ALPHABET_SIZE)} identifiers`,
    );
  }
}

/**
 * Verify one chain (its trimmed, non-empty lines) against `target`.
 *
 * The target is only read; every call builds its own environment.
 */
export function verifyChain(
  lines: readonly string[],
  target: BitFunction,
  context: ChainContext,
): ChainVerdict {
  assertChainContext(context, target);
  const { numVars, fanin, steps } = context;

  if (lines.length !== steps) {
    return {
      verdict: "FAIL",
      violation: violation(
        "STEP_COUNT_MISMATCH",
        `chain has not given number of steps (expected ${String(steps)}, got ${String(lines.length)})`,
      ),
    };
  }

  const env = VariableEnvironment.seeded(numVars);
  const canonicity = new CanonicityChecker();
  const parsed: Step[] = [];
  const support: Identifier[] = [];

  for (let position = 0; position < steps; position++) {
    const line = lines[position] ?? "";

    const result = parseStep(line, position, fanin, env);
    if (!result.ok) {
      return { verdict: "FAIL", violation: result.violation };
    }

    const ordered = canonicity.check(result.value);
    if (!ordered.ok) {
      return { verdict: "FAIL", violation: ordered.violation };
    }

    const step = result.value;
    env.bind(step.output, evaluateStep(step, env));
    parsed.push(step);
    support.push(...step.fanins);
  }

  const output = env.lookup(stepId(numVars, steps - 1));
  if (!output.equals(target)) {
    return {
      verdict: "FAIL",
      violation: violation("SPEC_MISMATCH", "chain does not compute spec"),
    };
  }

  return {
    verdict: "PASS",
    output,
    steps: parsed,
    support,
    advisories: auditSymmetry(target, support),
  };
}

/**
 * Verifier bound to one target and context.
 */
export class ChainVerifier {
  readonly target: BitFunction;
  readonly context: ChainContext;

  constructor(target: BitFunction, context: ChainContext) {
    assertChainContext(context, target);
    this.target = target;
    this.context = context;
  }

  /**
   * Decode the target from hex and bind it to a context.
   *
   * @throws {TruthTableFormatError} if the hex string does not fit `numVars`
   */
  static fromHex(targetHex: string, context: ChainContext): ChainVerifier {
    return new ChainVerifier(BitFunction.fromHex(context.numVars, targetHex), context);
  }

  verify(lines: readonly string[]): ChainVerdict {
    return verifyChain(lines, this.target, this.context);
  }
}
