// ─── keyline: Performance Session ────────────────────────────────────────────
//
// The state machine a performer plays against:
//
//   idle ──load()──▶ countdown ──▶ awaiting-group ⟲ ──▶ complete
//
// tick() is the only time source. In practice mode the beat clock creeps
// toward the current group's onset and waits there until the group is
// played. In tempo mode it runs at the score tempo and groups the clock
// leaves behind are recorded as misses.
//
// Each note-on is checked against the current group: a foreign pitch is a
// mistake and clears progress; the first right pitch opens a completion
// window the rest of the chord must land in.
// ─────────────────────────────────────────────────────────────────────────────

import { allNotes, durationBeats, type Note, type Score } from "../score/model.js";
import type { RawInputEvent } from "../midi/types.js";
import { EngineConfigSchema, type EngineConfig, type EngineConfigInput, type PracticeMode } from "../config/schema.js";
import { buildGroups, filterNotesByHands, type NoteRecord, type SimultaneityGroup } from "./grouper.js";
import {
  createSilentFeedback,
  type MistakeReason,
  type SessionFeedback,
  type SessionStats,
} from "./feedback.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type SessionState =
  | "idle"            // nothing loaded
  | "countdown"       // loaded, counting in
  | "awaiting-group"  // waiting for the current group
  | "complete";       // past the last group

export interface SessionOptions {
  /** Partial config; missing fields take their defaults. */
  config?: EngineConfigInput;
  feedback?: SessionFeedback;
}

/** What a renderer needs each frame. */
export interface SessionSnapshot {
  state: SessionState;
  mode: PracticeMode;
  /** Performance clock, in beats. */
  currentBeat: number;
  countdownRemaining: number;
  /** Seconds since the countdown ended. */
  elapsedSeconds: number;
  groupIndex: number;
  groupCount: number;
  currentGroup: GroupProgress | null;
  activeHolds: number;
  stats: SessionStats;
}

export interface GroupProgress {
  index: number;
  startBeatGlobal: number;
  requiredPitches: number[];
  hitPitches: number[];
  /** Null until the first correct pitch opens the window. */
  windowRemainingSeconds: number | null;
}

/** Everything derived from one loaded score. Replaced whole on load/reset. */
interface SessionPlan {
  score: Score;
  tempo: number;
  notes: Note[];
  groups: SimultaneityGroup[];
}

function emptyStats(): SessionStats {
  return {
    correctNotes: 0,
    mistakes: 0,
    missedNotes: 0,
    holdBreaks: 0,
    groupsSatisfied: 0,
    groupsMissed: 0,
  };
}

/**
 * Create a session with validated config.
 */
export function createPerformanceSession(options: SessionOptions = {}): PerformanceSession {
  return new PerformanceSession(
    EngineConfigSchema.parse(options.config ?? {}),
    options.feedback ?? createSilentFeedback()
  );
}

export class PerformanceSession {
  private plan: SessionPlan | null = null;
  private _state: SessionState = "idle";
  private groupIndex = 0;
  private beat = 0;
  private countdownRemaining = 0;
  private elapsed = 0;
  private readonly hits = new Set<number>();
  private windowOpenedAt: number | null = null;
  private readonly holds = new Map<number, NoteRecord>();
  private _stats: SessionStats = emptyStats();

  constructor(
    readonly config: EngineConfig,
    private readonly feedback: SessionFeedback
  ) {}

  // ─── Accessors ───────────────────────────────────────────────────────────

  get state(): SessionState {
    return this._state;
  }

  get mode(): PracticeMode {
    return this.config.mode;
  }

  get currentBeat(): number {
    return this.beat;
  }

  get currentGroupIndex(): number {
    return this.groupIndex;
  }

  get currentGroup(): SimultaneityGroup | undefined {
    return this._state === "awaiting-group" ? this.plan?.groups[this.groupIndex] : undefined;
  }

  get groups(): readonly SimultaneityGroup[] {
    return this.plan?.groups ?? [];
  }

  /** Every note of the loaded score, rests included, for layout. */
  get notes(): readonly Note[] {
    return this.plan?.notes ?? [];
  }

  get score(): Score | null {
    return this.plan?.score ?? null;
  }

  /** Beats per minute the clock runs at. */
  get tempo(): number {
    return this.plan?.tempo ?? this.config.fallbackTempo;
  }

  get stats(): SessionStats {
    return { ...this._stats };
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────────

  /**
   * Load a score and start the countdown. Grouping and progress are
   * replaced in one step; nothing from a previous score survives.
   */
  load(score: Score): void {
    const notes = allNotes(score, { includeRests: true });
    const playable = filterNotesByHands(
      notes.filter((n) => !n.isRest),
      this.config.hands
    );
    const plan: SessionPlan = {
      score,
      tempo: score.tempo > 0 ? score.tempo : this.config.fallbackTempo,
      notes,
      groups: buildGroups(playable),
    };

    this.plan = plan;
    this.groupIndex = 0;
    this.beat = 0;
    this.elapsed = 0;
    this.countdownRemaining = this.config.countdownSeconds;
    this.hits.clear();
    this.windowOpenedAt = null;
    this.holds.clear();
    this._stats = emptyStats();
    this._state = "countdown";
  }

  /** Restart the loaded score from the countdown. No-op when idle. */
  reset(): void {
    if (this.plan) this.load(this.plan.score);
  }

  /** Drop the score and return to idle. */
  unload(): void {
    this.plan = null;
    this.groupIndex = 0;
    this.beat = 0;
    this.elapsed = 0;
    this.countdownRemaining = 0;
    this.hits.clear();
    this.windowOpenedAt = null;
    this.holds.clear();
    this._state = "idle";
  }

  // ─── Time ────────────────────────────────────────────────────────────────

  /** Advance wall time by `deltaSeconds`. Non-positive deltas are ignored. */
  tick(deltaSeconds: number): void {
    if (!(deltaSeconds > 0) || !Number.isFinite(deltaSeconds)) return;

    switch (this._state) {
      case "countdown":
        this.countdownRemaining -= deltaSeconds;
        if (this.countdownRemaining <= 0) this.beginPerformance();
        return;

      case "awaiting-group":
        this.elapsed += deltaSeconds;
        if (this.config.mode === "practice") {
          this.advancePractice(deltaSeconds);
        } else {
          this.advanceTempo(deltaSeconds);
        }
        return;

      case "idle":
      case "complete":
        return;
    }
  }

  private beginPerformance(): void {
    this.countdownRemaining = 0;
    this.beat = 0;
    this.elapsed = 0;
    this._state = "awaiting-group";
    this.feedback.onCountdownEnd();
    if (this.groups.length === 0) this.finish();
  }

  private get beatsPerSecond(): number {
    return this.tempo / 60;
  }

  /** Creep toward the current onset, never past it. */
  private advancePractice(deltaSeconds: number): void {
    this.expireWindow();
    const group = this.currentGroup;
    if (!group) return;
    const target = Math.max(this.beat, group.startBeatGlobal);
    this.beat = Math.min(this.beat + deltaSeconds * this.beatsPerSecond, target);
  }

  /** Run at tempo; miss every group whose onset the clock has passed. */
  private advanceTempo(deltaSeconds: number): void {
    this.beat += deltaSeconds * this.beatsPerSecond;
    this.expireWindow();

    let group = this.currentGroup;
    while (group && this.beat > group.startBeatGlobal) {
      this.missGroup(group);
      group = this.currentGroup;
    }
  }

  private expireWindow(): void {
    const group = this.currentGroup;
    if (!group || this.windowOpenedAt === null) return;
    if (this.elapsed - this.windowOpenedAt > this.config.simultaneityWindowSeconds) {
      this.mistake("window-expired", group);
    }
  }

  // ─── Input ───────────────────────────────────────────────────────────────

  /**
   * Evaluate one input event. Ignored unless a group is awaited; only
   * note-on and note-off matter.
   */
  handle(event: RawInputEvent): void {
    if (this._state !== "awaiting-group") return;

    if (event.type === "noteOn") {
      this.evaluatePitch(event.note);
    } else if (event.type === "noteOff") {
      this.release(event.note);
    }
  }

  private evaluatePitch(pitch: number): void {
    const group = this.currentGroup;
    if (!group) return;

    if (!group.requiredPitches.has(pitch)) {
      this.mistake("wrong-pitch", group, pitch);
      return;
    }

    if (this.windowOpenedAt === null) {
      this.windowOpenedAt = this.elapsed;
    }

    this.hits.add(pitch);
    if (this.hits.size === group.requiredPitches.size) {
      this.satisfy(group);
    }
  }

  private satisfy(group: SimultaneityGroup): void {
    for (const record of group.records) {
      record.hit = true;
      if (durationBeats(record.note.duration) >= this.config.holdMinBeats) {
        this.holds.set(record.pitch, record);
      }
    }

    this._stats.groupsSatisfied++;
    this._stats.correctNotes += group.requiredPitches.size;
    if (this.config.mode === "practice") {
      this.beat = Math.max(this.beat, group.startBeatGlobal);
    }
    this.feedback.onGroupSatisfied(group, this.beat);
    this.nextGroup();
  }

  /** Earlier hits on a missed group stay credited. */
  private missGroup(group: SimultaneityGroup): void {
    for (const record of group.records) {
      if (this.hits.has(record.pitch)) record.hit = true;
    }
    const missed = group.requiredPitches.size - this.hits.size;

    this._stats.correctNotes += this.hits.size;
    this._stats.missedNotes += missed;
    this._stats.mistakes++;
    this._stats.groupsMissed++;
    this.feedback.onGroupMissed(group, missed);
    this.nextGroup();
  }

  private mistake(reason: MistakeReason, group: SimultaneityGroup, pitch?: number): void {
    this._stats.mistakes++;
    this.clearProgress();
    this.feedback.onMistake(reason, group, pitch);
  }

  private release(pitch: number): void {
    const record = this.holds.get(pitch);
    if (!record) return;
    this.holds.delete(pitch);

    if (this.beat < record.endBeat - this.config.holdReleaseToleranceBeats) {
      record.broken = true;
      this._stats.holdBreaks++;
      this.feedback.onHoldBreak(record, this.beat);
    }
  }

  private clearProgress(): void {
    this.hits.clear();
    this.windowOpenedAt = null;
  }

  private nextGroup(): void {
    this.clearProgress();
    this.groupIndex++;
    if (this.groupIndex >= this.groups.length) this.finish();
  }

  private finish(): void {
    this._state = "complete";
    this.feedback.onComplete(this.stats);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────────

  snapshot(): SessionSnapshot {
    const group = this.currentGroup;
    const window = this.config.simultaneityWindowSeconds;

    return {
      state: this._state,
      mode: this.config.mode,
      currentBeat: this.beat,
      countdownRemaining: this.countdownRemaining,
      elapsedSeconds: this.elapsed,
      groupIndex: this.groupIndex,
      groupCount: this.groups.length,
      currentGroup: group
        ? {
            index: group.index,
            startBeatGlobal: group.startBeatGlobal,
            requiredPitches: [...group.requiredPitches].sort((a, b) => a - b),
            hitPitches: [...this.hits].sort((a, b) => a - b),
            windowRemainingSeconds:
              this.windowOpenedAt === null
                ? null
                : Math.max(0, window - (this.elapsed - this.windowOpenedAt)),
          }
        : null,
      activeHolds: this.holds.size,
      stats: this.stats,
    };
  }
}
