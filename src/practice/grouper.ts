// ─── Expectation Grouper ─────────────────────────────────────────────────────
//
// Filters notes by hand, then groups simultaneous notes into chords keyed by
// their global beat. Each group lists the distinct pitches that must be
// played and one evaluation record per written note.
// ─────────────────────────────────────────────────────────────────────────────

import { durationBeats, pitchToMidi, type Note } from "../score/model.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** Onsets closer than this (in beats) share a group. */
export const SIMULTANEITY_EPSILON = 1e-4;

/** Staff index of each hand on a grand staff. */
export const RIGHT_HAND_STAFF = 1;
export const LEFT_HAND_STAFF = 2;

// ─── Types ───────────────────────────────────────────────────────────────────

export interface HandSelection {
  left: boolean;
  right: boolean;
}

/** Hand names accepted on the command line and by tools. */
export const HAND_CHOICES = ["left", "right", "both"] as const;
export type HandChoice = (typeof HAND_CHOICES)[number];

/** Evaluation state for one written note inside a group. */
export interface NoteRecord {
  readonly note: Note;
  readonly pitch: number;
  readonly startBeat: number;
  readonly endBeat: number;
  /** Set when the group containing this note is satisfied. */
  hit: boolean;
  /** Set when a held note was released early. */
  broken: boolean;
}

export interface SimultaneityGroup {
  /** 0-based position in the group list. */
  readonly index: number;
  readonly startBeatGlobal: number;
  readonly notes: readonly Note[];
  /** Distinct MIDI codes. */
  readonly requiredPitches: ReadonlySet<number>;
  readonly records: readonly NoteRecord[];
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Keep the notes of the enabled hands. Staff 1 is the right hand, staff 2
 * the left; any other staff plays if either hand is enabled.
 */
export function filterNotesByHands(notes: readonly Note[], hands: HandSelection): Note[] {
  if (!hands.left && !hands.right) return [];

  return notes.filter((note) => {
    if (note.staffIndex === RIGHT_HAND_STAFF) return hands.right;
    if (note.staffIndex === LEFT_HAND_STAFF) return hands.left;
    return true;
  });
}

export function handSelection(choice: HandChoice): HandSelection {
  return { left: choice !== "right", right: choice !== "left" };
}

export function isHandChoice(value: string): value is HandChoice {
  return HAND_CHOICES.some((c) => c === value);
}

/**
 * Group pitched notes by onset. Rests are dropped. The input need not be
 * sorted; ties keep their input order.
 */
export function buildGroups(notes: readonly Note[]): SimultaneityGroup[] {
  const sorted = notes
    .filter((n) => !n.isRest && n.pitch !== undefined)
    .sort((a, b) => a.startBeatGlobal - b.startBeatGlobal);

  const groups: SimultaneityGroup[] = [];
  let current: Note[] = [];

  for (const note of sorted) {
    if (current.length > 0 && note.startBeatGlobal - current[0].startBeatGlobal > SIMULTANEITY_EPSILON) {
      groups.push(makeGroup(groups.length, current));
      current = [];
    }
    current.push(note);
  }
  if (current.length > 0) {
    groups.push(makeGroup(groups.length, current));
  }

  return groups;
}

/** Sum of required pitches across groups. */
export function countRequiredPitches(groups: readonly SimultaneityGroup[]): number {
  return groups.reduce((sum, g) => sum + g.requiredPitches.size, 0);
}

// ─── Internal ────────────────────────────────────────────────────────────────

function makeGroup(index: number, notes: Note[]): SimultaneityGroup {
  const records: NoteRecord[] = [];
  const required = new Set<number>();

  for (const note of notes) {
    if (!note.pitch) continue;
    const pitch = pitchToMidi(note.pitch);
    required.add(pitch);
    records.push({
      note,
      pitch,
      startBeat: note.startBeatGlobal,
      endBeat: note.startBeatGlobal + durationBeats(note.duration),
      hit: false,
      broken: false,
    });
  }

  return {
    index,
    startBeatGlobal: notes[0].startBeatGlobal,
    notes,
    requiredPitches: required,
    records,
  };
}
