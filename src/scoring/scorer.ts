// ─── Scorer ──────────────────────────────────────────────────────────────────
//
// Turns a list of matches into points, counts and a letter grade.
//
//   perfect 100   good 75   early 50   late 50   missed −50   extra −25
//
// Good, early and late lose |error|·100 points. Unmatched expectations and
// extras are charged again in the total, which never drops below zero.
// ─────────────────────────────────────────────────────────────────────────────

import type { Score } from "../score/model.js";
import type { RawInputEvent } from "../midi/types.js";
import {
  buildExpectations,
  NoteMatcher,
  type Expectation,
  type ExpectationOptions,
  type MatchClass,
  type NoteMatch,
} from "./matcher.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type Grade = "S" | "A" | "B" | "C" | "D" | "F";

export interface PerformanceMetrics {
  totalExpected: number;
  perfect: number;
  good: number;
  early: number;
  late: number;
  missed: number;
  extra: number;
  score: number;
  /** (perfect + good) / totalExpected. */
  accuracy: number;
  /** (perfect + good) / every paired note-on. */
  precision: number;
  /** Mean |timing error| over paired note-ons, in milliseconds. */
  meanTimingErrorMs: number;
  grade: Grade;
}

export interface PerformanceGrade {
  metrics: PerformanceMetrics;
  matches: NoteMatch[];
  missed: Expectation[];
}

export interface GradeOptions extends ExpectationOptions {
  /** Seconds of recording before the first beat. Default 0. */
  offsetSeconds?: number;
}

// ─── Points ──────────────────────────────────────────────────────────────────

export const MATCH_POINTS: Readonly<Record<MatchClass, number>> = {
  perfect: 100,
  good: 75,
  early: 50,
  late: 50,
  missed: -50,
  extra: -25,
};

const GRADE_THRESHOLDS: ReadonlyArray<readonly [number, Grade]> = [
  [0.95, "S"],
  [0.9, "A"],
  [0.8, "B"],
  [0.7, "C"],
  [0.6, "D"],
];

/** Points for one match. Timing deductions are truncated and floored at 0. */
export function scoreNote(result: MatchClass, timingError: number): number {
  const base = MATCH_POINTS[result];
  if (result === "good" || result === "early" || result === "late") {
    return Math.max(0, Math.trunc(base - Math.abs(timingError) * 100));
  }
  return base;
}

export function gradeForAccuracy(accuracy: number): Grade {
  for (const [threshold, grade] of GRADE_THRESHOLDS) {
    if (accuracy >= threshold) return grade;
  }
  return "F";
}

// ─── Metrics ─────────────────────────────────────────────────────────────────

export function calculateMetrics(
  matches: readonly Pick<NoteMatch, "result" | "timingError">[],
  totalExpected: number
): PerformanceMetrics {
  const counts: Record<MatchClass, number> = { perfect: 0, good: 0, early: 0, late: 0, missed: 0, extra: 0 };
  let points = 0;
  let errorSum = 0;

  for (const match of matches) {
    counts[match.result]++;
    points += scoreNote(match.result, match.timingError);
    if (match.result !== "extra" && match.result !== "missed") {
      errorSum += Math.abs(match.timingError);
    }
  }

  const paired = counts.perfect + counts.good + counts.early + counts.late;
  const clean = counts.perfect + counts.good;
  const missed = Math.max(0, totalExpected - paired);
  const accuracy = totalExpected > 0 ? clean / totalExpected : 0;

  return {
    totalExpected,
    perfect: counts.perfect,
    good: counts.good,
    early: counts.early,
    late: counts.late,
    missed,
    extra: counts.extra,
    score: Math.max(0, points + missed * MATCH_POINTS.missed + counts.extra * MATCH_POINTS.extra),
    accuracy,
    precision: paired > 0 ? clean / paired : 0,
    meanTimingErrorMs: paired > 0 ? (errorSum / paired) * 1000 : 0,
    grade: gradeForAccuracy(accuracy),
  };
}

/**
 * Match a whole event log against a score and score the result.
 */
export function gradePerformance(
  score: Score,
  events: readonly RawInputEvent[],
  options: GradeOptions = {}
): PerformanceGrade {
  const expectations = buildExpectations(score, options);
  const matcher = new NoteMatcher(expectations);
  const offset = options.offsetSeconds ?? 0;

  const shifted = offset === 0 ? events : events.map((e) => ({ ...e, timestamp: e.timestamp - offset }));
  const matches = matcher.matchAll(shifted);

  return {
    metrics: calculateMetrics(matches, expectations.length),
    matches,
    missed: matcher.detectMissed(Number.POSITIVE_INFINITY),
  };
}

// ─── Report ──────────────────────────────────────────────────────────────────

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/** Plain-text report, one fact per line. */
export function formatReport(metrics: PerformanceMetrics): string {
  return [
    "═══ Performance Report ═══",
    `Grade:     ${metrics.grade}`,
    `Score:     ${metrics.score}`,
    `Accuracy:  ${percent(metrics.accuracy)}`,
    `Precision: ${percent(metrics.precision)}`,
    "",
    "Notes:",
    `  Perfect: ${metrics.perfect}`,
    `  Good:    ${metrics.good}`,
    `  Early:   ${metrics.early}`,
    `  Late:    ${metrics.late}`,
    `  Missed:  ${metrics.missed}`,
    `  Extra:   ${metrics.extra}`,
    "",
    `Mean timing error: ${metrics.meanTimingErrorMs.toFixed(1)} ms`,
  ].join("\n");
}
