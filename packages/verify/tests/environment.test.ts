/**
 * Variable environment tests.
 */

import { describe, it, expect } from "vitest";
import { BitFunction } from "@chainverify/truth-table";
import { VariableEnvironment } from "../src/environment.js";
import { inputId, stepId } from "../src/identifiers.js";

describe("VariableEnvironment", () => {
  it("is seeded with one projection per input", () => {
    const env = VariableEnvironment.seeded(2);
    expect(env.size).toBe(2);
    expect(env.lookup(inputId(0)).toBinary()).toBe("1010");
    expect(env.lookup(inputId(1)).toBinary()).toBe("1100");
  });

  it("binds step outputs once", () => {
    const env = VariableEnvironment.seeded(2);
    const and = BitFunction.fromHex(2, "8");
    env.bind(stepId(2, 0), and);
    expect(env.has(stepId(2, 0))).toBe(true);
    expect(env.lookup(stepId(2, 0))).toBe(and);
    expect(() => env.bind(stepId(2, 0), and)).toThrow("already bound");
  });

  it("rejects a function of the wrong arity", () => {
    const env = VariableEnvironment.seeded(2);
    expect(() => env.bind(stepId(2, 0), new BitFunction(3))).toThrow(RangeError);
  });

  it("fails lookup of an unbound identifier", () => {
    const env = VariableEnvironment.seeded(2);
    expect(env.has(stepId(2, 0))).toBe(false);
    expect(() => env.lookup(stepId(2, 0))).toThrow("C is not bound");
  });
});
