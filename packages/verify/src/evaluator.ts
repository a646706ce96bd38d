/**
 * Chain evaluator.
 *
 * Simulates each step over all `2^numVars` input assignments: for
 * assignment `i`, fanin `j` contributes bit `j` of the gate pattern.
 */

import { BitFunction } from "@chainverify/truth-table";
import type { VariableEnvironment } from "./environment.js";
import type { Step } from "./types.js";

/**
 * Compute the function of one step from its bound fanins.
 */
export function evaluateStep(step: Step, env: VariableEnvironment): BitFunction {
  const inputs = step.fanins.map((id) => env.lookup(id));
  const out = new BitFunction(env.numVars);

  for (let i = 0; i < out.numBits; i++) {
    let pattern = 0;
    for (let j = 0; j < inputs.length; j++) {
      const input = inputs[j];
      if (input !== undefined && input.getBit(i) === 1) {
        pattern |= 1 << j;
      }
    }
    if (step.gate.getBit(pattern) === 1) {
      out.setBit(i);
    }
  }

  return out;
}

/**
 * Evaluate steps in order, binding each output in `env`.
 * Returns the function of the last step.
 *
 * @throws {Error} if `steps` is empty
 */
export function evaluateChain(
  steps: readonly Step[],
  env: VariableEnvironment,
): BitFunction {
  let last: BitFunction | undefined;
  for (const step of steps) {
    last = evaluateStep(step, env);
    env.bind(step.output, last);
  }
  if (last === undefined) {
    throw new Error("Cannot evaluate an empty chain");
  }
  return last;
}
