import { describe, it, expect } from "vitest";
import { pitchFromMidi, type Note, type Score } from "../score/model.js";
import type { NoteOnEvent, RawInputEvent } from "../midi/types.js";
import { buildExpectations, classifyTiming, NoteMatcher } from "./matcher.js";

// 120 bpm: one beat = 0.5 s
function note(beat: number, midi: number | null, staffIndex?: number): Note {
  return {
    pitch: midi === null ? undefined : pitchFromMidi(midi),
    duration: { type: "quarter", dots: 0, tuplet: 1 },
    isRest: midi === null,
    startBeatInMeasure: beat,
    startBeatGlobal: beat,
    startTimeSeconds: beat * 0.5,
    measureNumber: 1,
    staffIndex,
    voice: "1",
    durationDivisions: 1,
  };
}

function scoreOf(notes: Note[]): Score {
  return {
    tempo: 120,
    divisions: 1,
    staves: [
      {
        index: 1,
        partId: "P1",
        measures: [
          { number: 1, startTimeSeconds: 0, startBeatGlobal: 0, durationBeats: 4, numerator: 4, denominator: 4, notes },
        ],
      },
    ],
  };
}

const noteOn = (n: number, timestamp: number): NoteOnEvent => ({ type: "noteOn", channel: 0, note: n, velocity: 80, timestamp });

// C4 at 0 s, rest, E4 at 0.5 s, C4 at 1.0 s
const melody = () => scoreOf([note(0, 60), note(1, 64), note(1, null), note(2, 60)]);

describe("buildExpectations", () => {
  it("creates one timed expectation per pitched note", () => {
    const exps = buildExpectations(melody());
    expect(exps.map((e) => [e.index, e.pitch, e.expectedTime])).toEqual([
      [0, 60, 0],
      [1, 64, 0.5],
      [2, 60, 1],
    ]);
    expect(exps[0]).toMatchObject({ durationSeconds: 0.5, allowedEarly: 0.1, allowedLate: 0.1, measureNumber: 1 });
  });

  it("applies custom tolerances", () => {
    const [first] = buildExpectations(melody(), { timing: { earlySeconds: 0.2 } });
    expect(first).toMatchObject({ allowedEarly: 0.2, allowedLate: 0.1 });
  });

  it("filters by hand", () => {
    const score = scoreOf([note(0, 72, 1), note(0, 48, 2)]);
    expect(buildExpectations(score, { hands: { left: true, right: false } }).map((e) => e.pitch)).toEqual([48]);
  });
});

describe("classifyTiming", () => {
  it("grades by signed error", () => {
    expect(classifyTiming(0, 0.1, 0.1)).toBe("perfect");
    expect(classifyTiming(0.04, 0.1, 0.1)).toBe("perfect");
    expect(classifyTiming(-0.05, 0.1, 0.1)).toBe("good");
    expect(classifyTiming(0.1, 0.1, 0.1)).toBe("good");
    expect(classifyTiming(0.101, 0.1, 0.1)).toBe("late");
    expect(classifyTiming(-0.2, 0.1, 0.1)).toBe("early");
  });

  it("uses the tighter side for perfect", () => {
    expect(classifyTiming(0.03, 0.05, 0.2)).toBe("good");
    expect(classifyTiming(0.02, 0.05, 0.2)).toBe("perfect");
  });
});

describe("NoteMatcher", () => {
  it("rates a note played on time as perfect", () => {
    const matcher = new NoteMatcher(buildExpectations(scoreOf([note(0, 60)])));
    const match = matcher.match(noteOn(60, 0.02));
    expect(match.result).toBe("perfect");
    expect(match.expectation?.index).toBe(0);
    expect(match.timingError).toBe(0.02);
  });

  it("rates a note just past the late tolerance as late", () => {
    const matcher = new NoteMatcher(buildExpectations(melody()));
    expect(matcher.match(noteOn(60, 1.101)).result).toBe("late");
  });

  it("rates a note well ahead as early", () => {
    const matcher = new NoteMatcher(buildExpectations(melody()));
    const match = matcher.match(noteOn(64, 0.3));
    expect(match.result).toBe("early");
    expect(match.expectation?.index).toBe(1);
  });

  it("calls a pitch with nothing in range an extra", () => {
    const matcher = new NoteMatcher(buildExpectations(melody()));
    expect(matcher.match(noteOn(61, 0))).toEqual({ result: "extra", event: noteOn(61, 0), timingError: 0 });
    expect(matcher.match(noteOn(60, 2)).result).toBe("extra");
  });

  it("picks the closest expectation of the pitch", () => {
    // C4 at 0 s and 0.5 s
    const matcher = new NoteMatcher(buildExpectations(scoreOf([note(0, 60), note(1, 60)])));
    const match = matcher.match(noteOn(60, 0.3));
    expect(match.expectation?.index).toBe(1);
    expect(match.result).toBe("early");
  });

  it("uses each expectation once", () => {
    const matcher = new NoteMatcher(buildExpectations(melody()));
    expect(matcher.match(noteOn(60, 0.01)).result).toBe("perfect");
    expect(matcher.match(noteOn(60, 0.02)).result).toBe("extra");
  });

  it("lists expectations that passed unmatched", () => {
    const matcher = new NoteMatcher(buildExpectations(melody()));
    matcher.match(noteOn(60, 0));
    expect(matcher.detectMissed(0.65).map((e) => e.index)).toEqual([1]);
    expect(matcher.detectMissed(0.55)).toEqual([]);
  });

  it("matches note-ons of a log in time order and skips the rest", () => {
    const matcher = new NoteMatcher(buildExpectations(melody()));
    const log: RawInputEvent[] = [
      noteOn(64, 0.5),
      { type: "noteOff", channel: 0, note: 60, velocity: 0, timestamp: 0.2 },
      noteOn(60, 0),
      { type: "controlChange", channel: 0, controller: 64, value: 127, timestamp: 0.1 },
    ];
    const matches = matcher.matchAll(log);
    expect(matches.map((m) => [m.event.note, m.result])).toEqual([
      [60, "perfect"],
      [64, "perfect"],
    ]);
    expect(matcher.matches).toHaveLength(2);
  });

  it("forgets everything on reset", () => {
    const matcher = new NoteMatcher(buildExpectations(melody()));
    matcher.match(noteOn(60, 0));
    matcher.reset();
    expect(matcher.matches).toHaveLength(0);
    expect(matcher.match(noteOn(60, 0)).result).toBe("perfect");
  });
});
