/**
 * Identifier mapping tests.
 */

import { describe, it, expect } from "vitest";
import {
  identifierName,
  inputId,
  parseIdentifier,
  stepId,
} from "../src/identifiers.js";

describe("identifierName", () => {
  it("writes inputs in lowercase from a", () => {
    expect(identifierName(inputId(0))).toBe("a");
    expect(identifierName(inputId(3))).toBe("d");
  });

  it("writes step outputs in uppercase after the inputs", () => {
    expect(identifierName(stepId(2, 0))).toBe("C");
    expect(identifierName(stepId(3, 1))).toBe("E");
  });

  it("rejects indices past the alphabet", () => {
    expect(() => identifierName(stepId(20, 6))).toThrow(RangeError);
  });
});

describe("parseIdentifier", () => {
  it("resolves inputs and step outputs", () => {
    expect(parseIdentifier("b", 3)).toEqual({ index: 1, role: "input" });
    expect(parseIdentifier("D", 3)).toEqual({ index: 3, role: "step" });
  });

  it("rejects a lowercase letter past the inputs", () => {
    expect(parseIdentifier("c", 2)).toBeUndefined();
  });

  it("rejects an uppercase letter in input position", () => {
    expect(parseIdentifier("A", 2)).toBeUndefined();
  });

  it("rejects non-letters", () => {
    expect(parseIdentifier("1", 2)).toBeUndefined();
    expect(parseIdentifier(" ", 2)).toBeUndefined();
    expect(parseIdentifier("", 2)).toBeUndefined();
  });
});
