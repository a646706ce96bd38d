/**
 * Report rendering.
 */

import type { ChalkInstance } from "chalk";
import type { ScoreSummary, SymmetryAdvisory } from "@chainverify/types";
import { formatScore } from "@chainverify/verify";

/**
 * The three summary lines: violations, solutions, points.
 */
export function formatSummary(summary: ScoreSummary): string[] {
  return [
    `[i] violations = ${String(summary.violations)}`,
    `[i] solutions = ${String(summary.points)}`,
    `[i] points = ${formatScore(summary.score)}`,
  ];
}

export function formatAdvisory(advisory: SymmetryAdvisory, paint: ChalkInstance): string {
  return paint.yellow(advisory.message);
}

export interface JsonReport extends ScoreSummary {
  readonly file: string;
  readonly advisories: readonly SymmetryAdvisory[];
}

export function formatJsonReport(report: JsonReport): string {
  return JSON.stringify({
    file: report.file,
    violations: report.violations,
    points: report.points,
    score: report.score,
    advisories: report.advisories,
  });
}
