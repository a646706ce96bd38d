/**
 * Score aggregation.
 *
 * Every chain checked earns a point; every failed chain halves the
 * final score: `score = points / 2^violations`.
 */

import type { ScoreSummary } from "@chainverify/types";
import type { ChainVerifier } from "./chain-verifier.js";
import type { ChainVerdict, ScoreReport } from "./types.js";

export function computeScore(points: number, violations: number): number {
  if (points === 0) return 0;
  return points / 2 ** violations;
}

/**
 * Render a score with up to six significant digits and no trailing zeros.
 */
export function formatScore(score: number): string {
  return String(Number(score.toPrecision(6)));
}

/**
 * Running totals over a sequence of verdicts.
 */
export class ChainScorer {
  private points = 0;
  private violations = 0;

  record(verdict: ChainVerdict): void {
    this.points++;
    if (verdict.verdict === "FAIL") {
      this.violations++;
    }
  }

  summary(): ScoreSummary {
    return {
      points: this.points,
      violations: this.violations,
      score: computeScore(this.points, this.violations),
    };
  }
}

/**
 * Verify every block and total the results.
 *
 * `onVerdict` sees each verdict as it is produced, in block order.
 */
export function scoreChains(
  blocks: readonly (readonly string[])[],
  verifier: ChainVerifier,
  onVerdict?: (verdict: ChainVerdict, blockIndex: number) => void,
): ScoreReport {
  const scorer = new ChainScorer();
  const outcomes: ChainVerdict[] = [];

  blocks.forEach((lines, blockIndex) => {
    const verdict = verifier.verify(lines);
    scorer.record(verdict);
    outcomes.push(verdict);
    onVerdict?.(verdict, blockIndex);
  });

  return { ...scorer.summary(), outcomes };
}
