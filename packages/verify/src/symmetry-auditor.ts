/**
 * Symmetry auditor.
 *
 * If the target is symmetric in inputs `i < j`, a canonical chain
 * should not reach for `j` before `i`. Breaches are reported as
 * advisories; they never fail a chain.
 */

import type { BitFunction } from "@chainverify/truth-table";
import type { Identifier, SymmetryAdvisory } from "@chainverify/types";
import { identifierName, inputId } from "./identifiers.js";

/**
 * Position of the first use of input `k` in the concatenated support,
 * or the support length if the input is never used.
 */
function firstUse(support: readonly Identifier[], k: number): number {
  const at = support.findIndex((id) => id.role === "input" && id.index === k);
  return at < 0 ? support.length : at;
}

export function auditSymmetry(
  target: BitFunction,
  support: readonly Identifier[],
): SymmetryAdvisory[] {
  const advisories: SymmetryAdvisory[] = [];

  for (let j = 1; j < target.numVars; j++) {
    for (let i = 0; i < j; i++) {
      if (target.isSymmetricIn(i, j) && firstUse(support, j) < firstUse(support, i)) {
        advisories.push({
          first: i,
          second: j,
          message: `symmetry property violated in ${identifierName(inputId(i))} and ${identifierName(inputId(j))}`,
        });
      }
    }
  }

  return advisories;
}
