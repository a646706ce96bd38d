/**
 * Step parser tests.
 *
 * One case per rule, in the order the parser applies them.
 */

import { describe, it, expect } from "vitest";
import { VariableEnvironment } from "../src/environment.js";
import { parseStep } from "../src/step-parser.js";
import { stepId } from "../src/identifiers.js";
import { BitFunction } from "@chainverify/truth-table";

// =============================================================================
// Helpers
// =============================================================================

/** Parse the first step of a two-input chain with fanin 2. */
function parseFirst(line: string) {
  return parseStep(line, 0, 2, VariableEnvironment.seeded(2));
}

function ruleOf(line: string): string | undefined {
  const result = parseFirst(line);
  return result.ok ? undefined : result.violation.rule;
}

// =============================================================================
// Well-formed steps
// =============================================================================

describe("parseStep — well-formed", () => {
  it("parses output, gate and fanins", () => {
    const result = parseFirst("C = 1000 a b");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.position).toBe(0);
    expect(result.value.output).toEqual({ index: 2, role: "step" });
    expect(result.value.gateBits).toBe("1000");
    expect(result.value.gate.toHex()).toBe("8");
    expect(result.value.fanins).toEqual([
      { index: 0, role: "input" },
      { index: 1, role: "input" },
    ]);
  });

  it("accepts a repeated fanin", () => {
    expect(parseFirst("C = 0110 a a").ok).toBe(true);
  });

  it("accepts an earlier step output as fanin", () => {
    const env = VariableEnvironment.seeded(2);
    env.bind(stepId(2, 0), BitFunction.fromHex(2, "8"));
    const result = parseStep("D = 0110 b C", 1, 2, env);
    expect(result.ok).toBe(true);
  });
});

// =============================================================================
// Rules
// =============================================================================

describe("parseStep — naming and separator", () => {
  it("rejects a name that does not match the position", () => {
    expect(ruleOf("D = 1000 a b")).toBe("INVALID_STEP_NAME");
    expect(ruleOf("c = 1000 a b")).toBe("INVALID_STEP_NAME");
    expect(ruleOf("")).toBe("INVALID_STEP_NAME");
  });

  it("rejects a malformed separator", () => {
    expect(ruleOf("C= 1000 a b")).toBe("MALFORMED_SEPARATOR");
    expect(ruleOf("C =1000 a b")).toBe("MALFORMED_SEPARATOR");
    expect(ruleOf("C")).toBe("MALFORMED_SEPARATOR");
  });

  it("reports the step and line", () => {
    const result = parseFirst("D = 1000 a b");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.violation).toEqual({
      kind: "structural",
      rule: "INVALID_STEP_NAME",
      message: "invalid step D = 1000 a b",
      stepIndex: 0,
      line: "D = 1000 a b",
    });
  });
});

describe("parseStep — gate", () => {
  it("rejects a truncated gate as a format violation", () => {
    const result = parseFirst("C = 100");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.violation.kind).toBe("format");
    expect(result.violation.rule).toBe("MALFORMED_GATE");
  });

  it("rejects non-binary gate digits", () => {
    expect(ruleOf("C = 10x0 a b")).toBe("MALFORMED_GATE");
  });

  it("rejects a gate that is 1 on the all-zero pattern", () => {
    const result = parseFirst("C = 0001 a b");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.violation.kind).toBe("normalization");
    expect(result.violation.message).toBe("gate is not normalized in C = 0001 a b");
  });

  it("checks normalization before the fanins", () => {
    expect(ruleOf("C = 1111 b a")).toBe("GATE_NOT_NORMALIZED");
  });
});

describe("parseStep — fanins", () => {
  it("rejects a missing fanin", () => {
    expect(ruleOf("C = 1000 a")).toBe("MALFORMED_FANIN");
    expect(ruleOf("C = 1000 a ")).toBe("MALFORMED_FANIN");
  });

  it("rejects fanins without a separating space", () => {
    expect(ruleOf("C = 1000 ab")).toBe("MALFORMED_FANIN");
  });

  it("rejects identifiers that are not bound yet", () => {
    expect(ruleOf("C = 1000 a c")).toBe("UNBOUND_FANIN");
    expect(ruleOf("C = 1000 a C")).toBe("UNBOUND_FANIN");
    expect(ruleOf("C = 1000 A b")).toBe("UNBOUND_FANIN");
  });

  it("rejects decreasing fanins as an ordering violation", () => {
    const result = parseFirst("C = 1000 b a");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.violation.kind).toBe("ordering");
    expect(result.violation.rule).toBe("FANIN_ORDER");
    expect(result.violation.message).toBe("fanins are in wrong order in C = 1000 b a");
  });

  it("rejects trailing characters", () => {
    expect(ruleOf("C = 1000 a bx")).toBe("TRAILING_CHARACTERS");
    expect(ruleOf("C = 1000 a b c")).toBe("TRAILING_CHARACTERS");
  });
});
