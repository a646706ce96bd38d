/**
 * Evaluator tests.
 */

import { describe, it, expect } from "vitest";
import { VariableEnvironment } from "../src/environment.js";
import { evaluateChain, evaluateStep } from "../src/evaluator.js";
import { stepId } from "../src/identifiers.js";
import { parseStep } from "../src/step-parser.js";
import type { Step } from "../src/types.js";

function parseOne(line: string, position: number, fanin: number, env: VariableEnvironment): Step {
  const result = parseStep(line, position, fanin, env);
  if (!result.ok) throw new Error(result.violation.message);
  return result.value;
}

describe("evaluateStep", () => {
  it("drives gate variable j from fanin j", () => {
    const env = VariableEnvironment.seeded(2);
    // gate bit 1 = pattern (fanin0 = 1, fanin1 = 0) = a AND NOT b
    expect(evaluateStep(parseOne("C = 0010 a b", 0, 2, env), env).toBinary()).toBe("0010");
    // gate bit 2 = pattern (fanin0 = 0, fanin1 = 1) = b AND NOT a
    expect(evaluateStep(parseOne("C = 0100 a b", 0, 2, env), env).toBinary()).toBe("0100");
  });

  it("evaluates over all inputs of the target, not just the gate's", () => {
    const env = VariableEnvironment.seeded(3);
    const out = evaluateStep(parseOne("D = 0110 a c", 0, 2, env), env);
    // a XOR c over three variables
    expect(out.numVars).toBe(3);
    expect(out.toHex()).toBe("5a");
  });

  it("reads bound step outputs", () => {
    const env = VariableEnvironment.seeded(3);
    const and = parseOne("D = 1000 a b", 0, 2, env);
    env.bind(and.output, evaluateStep(and, env));
    const or = parseOne("E = 1110 c D", 1, 2, env);
    // (a AND b) OR c
    expect(evaluateStep(or, env).toHex()).toBe("f8");
  });
});

describe("evaluateChain", () => {
  it("binds every output and returns the last", () => {
    const parseEnv = VariableEnvironment.seeded(3);
    const first = parseOne("D = 1000 a b", 0, 2, parseEnv);
    parseEnv.bind(first.output, evaluateStep(first, parseEnv));
    const second = parseOne("E = 1000 c D", 1, 2, parseEnv);

    const env = VariableEnvironment.seeded(3);
    const out = evaluateChain([first, second], env);
    expect(out.toHex()).toBe("80");
    expect(env.lookup(stepId(3, 0)).toHex()).toBe("88");
  });

  it("rejects an empty chain", () => {
    expect(() => evaluateChain([], VariableEnvironment.seeded(2))).toThrow("empty chain");
  });
});
