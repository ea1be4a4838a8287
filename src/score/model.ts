// ─── keyline: Score Model ────────────────────────────────────────────────────
//
// Value types built once by the MusicXML parser and read-only afterwards:
// Pitch, Duration, Note, Measure, Staff, Score. Plus the pure helpers that
// derive MIDI codes and beat lengths from them.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Pitch ───────────────────────────────────────────────────────────────────

export const STEPS = ["C", "D", "E", "F", "G", "A", "B"] as const;

/** Diatonic letter name. */
export type Step = (typeof STEPS)[number];

/** A written pitch. `alter` is semitones in [-2, 2]. */
export interface Pitch {
  readonly step: Step;
  readonly octave: number;
  readonly alter: number;
}

const STEP_SEMITONES: Record<Step, number> = {
  C: 0,
  D: 2,
  E: 4,
  F: 5,
  G: 7,
  A: 9,
  B: 11,
};

/** Sharp spelling for each pitch class. */
const SHARP_SPELLING: ReadonlyArray<{ step: Step; alter: number }> = [
  { step: "C", alter: 0 },
  { step: "C", alter: 1 },
  { step: "D", alter: 0 },
  { step: "D", alter: 1 },
  { step: "E", alter: 0 },
  { step: "F", alter: 0 },
  { step: "F", alter: 1 },
  { step: "G", alter: 0 },
  { step: "G", alter: 1 },
  { step: "A", alter: 0 },
  { step: "A", alter: 1 },
  { step: "B", alter: 0 },
];

export function isStep(value: string): value is Step {
  return (STEPS as readonly string[]).includes(value);
}

/** MIDI note number for a pitch, clamped to 0-127. Middle C (C4) = 60. */
export function pitchToMidi(pitch: Pitch): number {
  const code = (pitch.octave + 1) * 12 + STEP_SEMITONES[pitch.step] + pitch.alter;
  return Math.min(127, Math.max(0, code));
}

/**
 * Spell a MIDI note number as a pitch. Always sharps, never flats:
 * 61 → C#4, not Db4.
 */
export function pitchFromMidi(code: number): Pitch {
  const clamped = Math.min(127, Math.max(0, Math.round(code)));
  const spelling = SHARP_SPELLING[clamped % 12];
  return {
    step: spelling.step,
    octave: Math.floor(clamped / 12) - 1,
    alter: spelling.alter,
  };
}

export function pitchEquals(a: Pitch, b: Pitch): boolean {
  return a.step === b.step && a.octave === b.octave && a.alter === b.alter;
}

/** Scientific pitch name: "C4", "F#3", "Bb2", "C##5". */
export function pitchName(pitch: Pitch): string {
  const accidental =
    pitch.alter > 0 ? "#".repeat(pitch.alter) :
    pitch.alter < 0 ? "b".repeat(-pitch.alter) : "";
  return `${pitch.step}${accidental}${pitch.octave}`;
}

/** MIDI note numbers as names, lowest first: "C4 E4 G4". */
export function midiNotesToNames(midiNotes: readonly number[]): string {
  return [...midiNotes]
    .sort((a, b) => a - b)
    .map((midi) => pitchName(pitchFromMidi(midi)))
    .join(" ");
}

// ─── Duration ────────────────────────────────────────────────────────────────

export const DURATION_TYPES = [
  "whole",
  "half",
  "quarter",
  "eighth",
  "sixteenth",
  "thirty-second",
] as const;

/** Written note value. */
export type DurationType = (typeof DURATION_TYPES)[number];

export interface Duration {
  readonly type: DurationType;
  /** Augmentation dots, 0 or more. */
  readonly dots: number;
  /** Tuplet divisor, 1 for plain notes, 3 for triplets. */
  readonly tuplet: number;
}

/** Length of each note value in quarter-note beats. */
export const BASE_BEATS: Record<DurationType, number> = {
  whole: 4,
  half: 2,
  quarter: 1,
  eighth: 0.5,
  sixteenth: 0.25,
  "thirty-second": 0.125,
};

/** Each dot adds half of the previous value: 1.5, 1.75, 1.875 … */
export function dotMultiplier(dots: number): number {
  let multiplier = 1;
  for (let i = 1; i <= dots; i++) {
    multiplier += Math.pow(0.5, i);
  }
  return multiplier;
}

/** Length of a duration in quarter-note beats. Always > 0. */
export function durationBeats(duration: Duration): number {
  const tuplet = duration.tuplet >= 1 ? duration.tuplet : 1;
  const dots = duration.dots > 0 ? Math.floor(duration.dots) : 0;
  return (BASE_BEATS[duration.type] * dotMultiplier(dots)) / tuplet;
}

// ─── Notes, Measures, Staves ─────────────────────────────────────────────────

export interface Note {
  /** Absent for rests. */
  readonly pitch?: Pitch;
  readonly duration: Duration;
  readonly isRest: boolean;
  /** Onset within the measure, in beats. */
  readonly startBeatInMeasure: number;
  /** Onset from the start of the score, in beats. */
  readonly startBeatGlobal: number;
  readonly startTimeSeconds: number;
  /** 1-based. */
  readonly measureNumber: number;
  /** 1 = upper staff (right hand), 2 = lower staff (left hand). */
  readonly staffIndex?: number;
  /** Voice label as written, "1" when absent. */
  readonly voice: string;
  /** Raw `<duration>` value in the part's division units. */
  readonly durationDivisions: number;
}

export interface Measure {
  readonly number: number;
  readonly startTimeSeconds: number;
  readonly startBeatGlobal: number;
  readonly durationBeats: number;
  readonly numerator: number;
  readonly denominator: number;
  /** Document order, rests included. */
  readonly notes: readonly Note[];
}

export interface Staff {
  /** 1-based, one per part in document order. */
  readonly index: number;
  readonly partId: string;
  readonly measures: readonly Measure[];
}

export interface Score {
  readonly title?: string;
  readonly composer?: string;
  /** Beats per minute. */
  readonly tempo: number;
  /** Raw duration units per quarter note. */
  readonly divisions: number;
  readonly staves: readonly Staff[];
}

// ─── Queries ─────────────────────────────────────────────────────────────────

export interface NoteQueryOptions {
  /** Include rests. Default false. */
  includeRests?: boolean;
}

/**
 * Every note of every staff, ordered by global onset.
 * Ties keep staff-then-document order.
 */
export function allNotes(score: Score, options: NoteQueryOptions = {}): Note[] {
  const includeRests = options.includeRests ?? false;
  const notes: Note[] = [];
  for (const staff of score.staves) {
    for (const measure of staff.measures) {
      for (const note of measure.notes) {
        if (note.isRest && !includeRests) continue;
        notes.push(note);
      }
    }
  }
  // Array.prototype.sort is stable
  return notes.sort((a, b) => a.startBeatGlobal - b.startBeatGlobal);
}

/** MIDI code of a pitched note, undefined for rests. */
export function noteMidi(note: Note): number | undefined {
  return note.pitch ? pitchToMidi(note.pitch) : undefined;
}

/** End of the longest staff, in seconds. */
export function scoreDurationSeconds(score: Score): number {
  let end = 0;
  for (const staff of score.staves) {
    const last = staff.measures.at(-1);
    if (!last) continue;
    end = Math.max(end, last.startTimeSeconds + (last.durationBeats * 60) / score.tempo);
  }
  return end;
}

/** Number of measures in the longest staff. */
export function measureCount(score: Score): number {
  return score.staves.reduce((max, s) => Math.max(max, s.measures.length), 0);
}
