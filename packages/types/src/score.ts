/**
 * Aggregate scoring over a file of chain attempts.
 */

/**
 * Totals over all chains in one run.
 *
 * `score = points / 2^violations`: every failed chain halves the score.
 */
export interface ScoreSummary {
  /** Number of chains checked */
  readonly points: number;

  /** Number of chains that failed */
  readonly violations: number;

  readonly score: number;
}
