// ─── Session Feedback ────────────────────────────────────────────────────────
//
// SessionFeedback implementations. The session calls these synchronously at
// key moments: countdown finished, group satisfied or missed, mistakes,
// hold breaks and completion.
//
// Implementations:
//   - Console: prints to stdout (CLI)
//   - Silent: no-op (tests, benchmarks)
//   - Recording: keeps every call for assertions
//   - Callback: routes to optional callbacks (MCP, renderers)
// ─────────────────────────────────────────────────────────────────────────────

import { midiNotesToNames } from "../score/model.js";
import type { NoteRecord, SimultaneityGroup } from "./grouper.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type MistakeReason =
  | "wrong-pitch"     // pitch outside the current group
  | "window-expired"; // window ran out with pitches still missing

export interface SessionStats {
  /** Pitches credited, from satisfied groups and partial hits on missed ones. */
  correctNotes: number;
  mistakes: number;
  /** Required pitches never hit in groups the clock passed (tempo mode). */
  missedNotes: number;
  holdBreaks: number;
  groupsSatisfied: number;
  groupsMissed: number;
}

export interface SessionFeedback {
  onCountdownEnd(): void;
  onGroupSatisfied(group: SimultaneityGroup, beat: number): void;
  onMistake(reason: MistakeReason, group: SimultaneityGroup, pitch?: number): void;
  onGroupMissed(group: SimultaneityGroup, missedPitches: number): void;
  onHoldBreak(record: NoteRecord, beat: number): void;
  onComplete(stats: SessionStats): void;
}

// ─── Console Feedback (CLI) ──────────────────────────────────────────────────

function groupLabel(group: SimultaneityGroup): string {
  return midiNotesToNames([...group.requiredPitches]);
}

/**
 * Prints each moment on its own line.
 */
export function createConsoleFeedback(): SessionFeedback {
  return {
    onCountdownEnd() {
      console.log("  ▶ Go!");
    },
    onGroupSatisfied(group, beat) {
      console.log(`  ✓ beat ${beat.toFixed(2)}: ${groupLabel(group)}`);
    },
    onMistake(reason, group, pitch) {
      const played = pitch !== undefined ? ` played ${midiNotesToNames([pitch])}` : "";
      console.log(`  ✗ ${reason}${played}, expected ${groupLabel(group)}`);
    },
    onGroupMissed(group, missedPitches) {
      console.log(`  ⋯ missed ${missedPitches} note(s) at beat ${group.startBeatGlobal.toFixed(2)}: ${groupLabel(group)}`);
    },
    onHoldBreak(record, beat) {
      const early = (record.endBeat - beat).toFixed(2);
      console.log(`  ↥ released ${midiNotesToNames([record.pitch])} ${early} beat(s) early`);
    },
    onComplete(stats) {
      console.log(
        `\n  ■ Complete: ${stats.groupsSatisfied} group(s) played, ${stats.mistakes} mistake(s), ` +
          `${stats.missedNotes} missed, ${stats.holdBreaks} hold break(s).`
      );
    },
  };
}

// ─── Silent Feedback (testing) ───────────────────────────────────────────────

export function createSilentFeedback(): SessionFeedback {
  return {
    onCountdownEnd() {},
    onGroupSatisfied() {},
    onMistake() {},
    onGroupMissed() {},
    onHoldBreak() {},
    onComplete() {},
  };
}

// ─── Recording Feedback (testing) ────────────────────────────────────────────

/** A recorded feedback call for assertions. */
export interface FeedbackEvent {
  type: "countdown-end" | "group-satisfied" | "mistake" | "group-missed" | "hold-break" | "complete";
  groupIndex?: number;
  beat?: number;
  reason?: MistakeReason;
  pitch?: number;
  missedPitches?: number;
  stats?: SessionStats;
}

/**
 * Records every call. Use: `const fb = createRecordingFeedback(); ... fb.events`
 */
export function createRecordingFeedback(): SessionFeedback & { events: FeedbackEvent[] } {
  const events: FeedbackEvent[] = [];

  return {
    events,
    onCountdownEnd() {
      events.push({ type: "countdown-end" });
    },
    onGroupSatisfied(group, beat) {
      events.push({ type: "group-satisfied", groupIndex: group.index, beat });
    },
    onMistake(reason, group, pitch) {
      events.push({ type: "mistake", groupIndex: group.index, reason, pitch });
    },
    onGroupMissed(group, missedPitches) {
      events.push({ type: "group-missed", groupIndex: group.index, missedPitches });
    },
    onHoldBreak(record, beat) {
      events.push({ type: "hold-break", pitch: record.pitch, beat });
    },
    onComplete(stats) {
      events.push({ type: "complete", stats: { ...stats } });
    },
  };
}

// ─── Callback Feedback (flexible routing) ────────────────────────────────────

/** All optional; unset = no-op. */
export type FeedbackCallbacks = Partial<SessionFeedback>;

export function createCallbackFeedback(callbacks: FeedbackCallbacks): SessionFeedback {
  return {
    onCountdownEnd() {
      callbacks.onCountdownEnd?.();
    },
    onGroupSatisfied(group, beat) {
      callbacks.onGroupSatisfied?.(group, beat);
    },
    onMistake(reason, group, pitch) {
      callbacks.onMistake?.(reason, group, pitch);
    },
    onGroupMissed(group, missedPitches) {
      callbacks.onGroupMissed?.(group, missedPitches);
    },
    onHoldBreak(record, beat) {
      callbacks.onHoldBreak?.(record, beat);
    },
    onComplete(stats) {
      callbacks.onComplete?.(stats);
    },
  };
}

/** Fan out every call to each feedback in order. */
export function composeFeedback(...sinks: SessionFeedback[]): SessionFeedback {
  return {
    onCountdownEnd() {
      for (const s of sinks) s.onCountdownEnd();
    },
    onGroupSatisfied(group, beat) {
      for (const s of sinks) s.onGroupSatisfied(group, beat);
    },
    onMistake(reason, group, pitch) {
      for (const s of sinks) s.onMistake(reason, group, pitch);
    },
    onGroupMissed(group, missedPitches) {
      for (const s of sinks) s.onGroupMissed(group, missedPitches);
    },
    onHoldBreak(record, beat) {
      for (const s of sinks) s.onHoldBreak(record, beat);
    },
    onComplete(stats) {
      for (const s of sinks) s.onComplete(stats);
    },
  };
}
