// ─── Note Matcher ────────────────────────────────────────────────────────────
//
// Offline analysis of a whole take. Every written note becomes a timed
// expectation; each note-on is paired with the closest unmatched
// expectation of the same pitch and classified by its timing error:
//
//   e = eventTime − expectedTime
//   e < −early → early     e > late → late
//   |e| < ½·min(early, late) → perfect     otherwise → good
//
// A note-on with no candidate within ±0.5 s is an extra. Expectations the
// clock has passed without a match are missed.
// ─────────────────────────────────────────────────────────────────────────────

import { allNotes, durationBeats, pitchToMidi, type Note, type Score } from "../score/model.js";
import type { NoteOnEvent, RawInputEvent } from "../midi/types.js";
import { TimingToleranceSchema, type TimingTolerance } from "../config/schema.js";
import { filterNotesByHands, type HandSelection } from "../practice/grouper.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type MatchClass = "perfect" | "good" | "early" | "late" | "missed" | "extra";

/** The four classes a paired note-on can get. */
export type TimingClass = Extract<MatchClass, "perfect" | "good" | "early" | "late">;

export interface Expectation {
  /** 0-based, in time order. */
  readonly index: number;
  readonly pitch: number;
  readonly note: Note;
  /** Seconds from the first beat. */
  readonly expectedTime: number;
  readonly durationSeconds: number;
  readonly allowedEarly: number;
  readonly allowedLate: number;
  readonly measureNumber: number;
}

export interface NoteMatch {
  result: MatchClass;
  event: NoteOnEvent;
  /** Absent for extras. */
  expectation?: Expectation;
  /** Signed seconds; negative is early. 0 for extras. */
  timingError: number;
}

export interface ExpectationOptions {
  timing?: Partial<TimingTolerance>;
  hands?: HandSelection;
}

/** How far either side of a note-on to look for its expectation. */
export const MATCH_SEARCH_WINDOW = 0.5;

// ─── Expectations ────────────────────────────────────────────────────────────

/**
 * One expectation per pitched note, optionally filtered by hand, ordered by
 * onset.
 */
export function buildExpectations(score: Score, options: ExpectationOptions = {}): Expectation[] {
  const timing = TimingToleranceSchema.parse(options.timing ?? {});
  const pitched = allNotes(score);
  const notes = options.hands ? filterNotesByHands(pitched, options.hands) : pitched;

  const expectations: Expectation[] = [];
  for (const note of notes) {
    if (!note.pitch) continue;
    expectations.push({
      index: expectations.length,
      pitch: pitchToMidi(note.pitch),
      note,
      expectedTime: note.startTimeSeconds,
      durationSeconds: (durationBeats(note.duration) * 60) / score.tempo,
      allowedEarly: timing.earlySeconds,
      allowedLate: timing.lateSeconds,
      measureNumber: note.measureNumber,
    });
  }
  return expectations;
}

/** Classify a signed timing error against one expectation's tolerances. */
export function classifyTiming(error: number, allowedEarly: number, allowedLate: number): TimingClass {
  if (error < -allowedEarly) return "early";
  if (error > allowedLate) return "late";
  return Math.abs(error) < Math.min(allowedEarly, allowedLate) * 0.5 ? "perfect" : "good";
}

// ─── Matcher ─────────────────────────────────────────────────────────────────

export class NoteMatcher {
  private readonly played: NoteMatch[] = [];
  private readonly matched = new Set<number>();

  constructor(readonly expectations: readonly Expectation[]) {}

  /** Every match made since construction or the last reset(). */
  get matches(): readonly NoteMatch[] {
    return this.played;
  }

  /**
   * Pair a note-on with the closest unmatched expectation of its pitch.
   * An expectation is used at most once.
   */
  match(event: NoteOnEvent): NoteMatch {
    const t = event.timestamp;
    let best: Expectation | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (const exp of this.expectations) {
      if (exp.pitch !== event.note || this.matched.has(exp.index)) continue;
      const distance = Math.abs(t - exp.expectedTime);
      if (distance <= MATCH_SEARCH_WINDOW && distance < bestDistance) {
        best = exp;
        bestDistance = distance;
      }
    }

    let result: NoteMatch;
    if (best) {
      const timingError = t - best.expectedTime;
      this.matched.add(best.index);
      result = {
        result: classifyTiming(timingError, best.allowedEarly, best.allowedLate),
        event,
        expectation: best,
        timingError,
      };
    } else {
      result = { result: "extra", event, timingError: 0 };
    }

    this.played.push(result);
    return result;
  }

  /** Expectations whose late tolerance ended before `now` without a match. */
  detectMissed(now: number): Expectation[] {
    return this.expectations.filter(
      (exp) => now > exp.expectedTime + exp.allowedLate && !this.matched.has(exp.index)
    );
  }

  /**
   * Match every note-on of an event log in time order. Other events are
   * skipped. Returns the matches for this log only.
   */
  matchAll(events: readonly RawInputEvent[]): NoteMatch[] {
    const noteOns = events
      .filter((e): e is NoteOnEvent => e.type === "noteOn")
      .sort((a, b) => a.timestamp - b.timestamp);
    return noteOns.map((event) => this.match(event));
  }

  reset(): void {
    this.played.length = 0;
    this.matched.clear();
  }
}
