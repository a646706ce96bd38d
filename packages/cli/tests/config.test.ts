/**
 * Tests for config.ts — loadInvocation + loadEnv.
 */

import { describe, it, expect } from "vitest";
import { loadEnv, loadInvocation } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

// =============================================================================
// loadInvocation
// =============================================================================

describe("loadInvocation", () => {
  it("parses the four positional arguments", () => {
    expect(loadInvocation({ numVars: "2", targetHex: "8", fanin: "2", steps: "1" })).toEqual({
      numVars: 2,
      targetHex: "8",
      fanin: 2,
      steps: 1,
    });
  });

  it("trims surrounding whitespace", () => {
    expect(
      loadInvocation({ numVars: " 3 ", targetHex: " e8 ", fanin: "2", steps: "4" }),
    ).toMatchObject({ numVars: 3, targetHex: "e8" });
  });

  it("rejects non-numeric counts", () => {
    expect(
      issuesOf(() => loadInvocation({ numVars: "two", targetHex: "8", fanin: "2", steps: "1" })),
    ).toEqual(["numVars: must be a non-negative integer"]);
  });

  it("rejects an empty count instead of reading it as zero", () => {
    expect(
      issuesOf(() => loadInvocation({ numVars: "2", targetHex: "8", fanin: "", steps: "1" })),
    ).toEqual(["fanin: must be a non-negative integer"]);
  });

  it("rejects a zero step count", () => {
    const issues = issuesOf(() =>
      loadInvocation({ numVars: "2", targetHex: "8", fanin: "2", steps: "0" }),
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^steps: /);
  });

  it("rejects a non-hex target", () => {
    expect(
      issuesOf(() => loadInvocation({ numVars: "2", targetHex: "z", fanin: "2", steps: "1" })),
    ).toEqual(["targetHex: must be a hexadecimal string"]);
  });

  it("rejects a target whose length does not fit the inputs", () => {
    expect(
      issuesOf(() => loadInvocation({ numVars: "3", targetHex: "8", fanin: "2", steps: "1" })),
    ).toEqual(["targetHex: must have 2 hex digits for 3 variables"]);
  });

  it("rejects more identifiers than letters", () => {
    expect(
      issuesOf(() => loadInvocation({ numVars: "4", targetHex: "8000", fanin: "2", steps: "23" })),
    ).toEqual(["steps: 4 inputs and 23 steps exceed 26 identifiers"]);
  });

  it("throws a ConfigError with its code", () => {
    expect(() =>
      loadInvocation({ numVars: "x", targetHex: "8", fanin: "2", steps: "1" }),
    ).toThrow(ConfigError);
    try {
      loadInvocation({ numVars: "x", targetHex: "8", fanin: "2", steps: "1" });
    } catch (err: unknown) {
      expect(err instanceof ConfigError && err.code).toBe("INVALID_INVOCATION");
    }
  });
});

// =============================================================================
// loadEnv
// =============================================================================

describe("loadEnv", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadEnv({})).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "production",
      CHAIN_DIR: ".",
      CHAIN_EXT: "bln",
    });
  });

  it("reads overrides", () => {
    const env = loadEnv({ LOG_LEVEL: "debug", CHAIN_DIR: "runs", CHAIN_EXT: "txt" });
    expect(env.LOG_LEVEL).toBe("debug");
    expect(env.CHAIN_DIR).toBe("runs");
    expect(env.CHAIN_EXT).toBe("txt");
  });

  it("rejects an unknown log level", () => {
    const issues = issuesOf(() => loadEnv({ LOG_LEVEL: "loud" }));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^LOG_LEVEL: /);
  });

  it("rejects an extension with a dot", () => {
    expect(issuesOf(() => loadEnv({ CHAIN_EXT: ".bln" }))).toEqual([
      "CHAIN_EXT: must be alphanumeric",
    ]);
  });
});
