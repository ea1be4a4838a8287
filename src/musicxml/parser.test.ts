import { describe, it, expect } from "vitest";
import { parseScore, parseScoreFile } from "./parser.js";
import { allNotes, pitchToMidi, type Note } from "../score/model.js";
import {
  InvalidInputError,
  MalformedDocumentError,
  NotImplementedError,
} from "../errors.js";
import { XmlParseError } from "./xml-ast.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

function doc(parts: string, header = ""): string {
  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<score-partwise version="4.0">`,
    header,
    `<part-list><score-part id="P1"><part-name>Piano</part-name></score-part></part-list>`,
    parts,
    `</score-partwise>`,
  ].join("\n");
}

function part(measures: string, id = "P1"): string {
  return `<part id="${id}">${measures}</part>`;
}

function pitched(step: string, octave: number, duration: number, extra = ""): string {
  return `<note>${extra}<pitch><step>${step}</step><octave>${octave}</octave></pitch><duration>${duration}</duration></note>`;
}

function rest(duration: number): string {
  return `<note><rest/><duration>${duration}</duration></note>`;
}

const DIV4 = `<attributes><divisions>4</divisions></attributes>`;

function midiOf(notes: Note[]): number[] {
  return notes.map((n) => (n.pitch ? pitchToMidi(n.pitch) : -1));
}

// ─── Basics ─────────────────────────────────────────────────────────────────

describe("parseScore", () => {
  it("parses a single quarter-note C4 at beat 0", () => {
    const score = parseScore(
      doc(part(`<measure number="1">${DIV4}${pitched("C", 4, 4, "")}</measure>`))
    );

    expect(score.tempo).toBe(120);
    expect(score.divisions).toBe(4);
    expect(score.staves).toHaveLength(1);

    const notes = allNotes(score);
    expect(notes).toHaveLength(1);
    expect(notes[0].pitch).toEqual({ step: "C", octave: 4, alter: 0 });
    expect(notes[0].startBeatGlobal).toBe(0);
    expect(notes[0].startTimeSeconds).toBe(0);
    expect(notes[0].measureNumber).toBe(1);
    expect(notes[0].duration).toEqual({ type: "quarter", dots: 0, tuplet: 1 });
  });

  it("reads title, composer and tempo from the first occurrence", () => {
    const header = [
      `<work><work-title>Etude</work-title></work>`,
      `<identification><creator type="composer">A. Person</creator></identification>`,
    ].join("");
    const measure = `<measure number="1">${DIV4}<direction><sound tempo="90"/></direction>${pitched("C", 4, 4)}${pitched("D", 4, 4)}<sound tempo="60"/></measure>`;

    const score = parseScore(doc(part(measure), header));

    expect(score.title).toBe("Etude");
    expect(score.composer).toBe("A. Person");
    expect(score.tempo).toBe(90);
    expect(allNotes(score)[1].startTimeSeconds).toBeCloseTo(60 / 90, 10);
  });

  it("falls back to movement-title and the configured tempo", () => {
    const score = parseScore(
      doc(part(`<measure number="1">${DIV4}${pitched("C", 4, 4)}</measure>`), `<movement-title>Prelude</movement-title>`),
      { fallbackTempo: 100 }
    );
    expect(score.title).toBe("Prelude");
    expect(score.composer).toBeUndefined();
    expect(score.tempo).toBe(100);
  });

  it("keeps rests in the measure", () => {
    const score = parseScore(
      doc(part(`<measure number="1">${DIV4}${rest(4)}${pitched("E", 4, 4)}</measure>`))
    );
    const measure = score.staves[0].measures[0];
    expect(measure.notes).toHaveLength(2);
    expect(measure.notes[0].isRest).toBe(true);
    expect(measure.notes[0].pitch).toBeUndefined();
    expect(measure.notes[1].startBeatInMeasure).toBe(1);
  });

  it("is a pure function of the input text", () => {
    const xml = doc(part(`<measure number="1">${DIV4}${pitched("C", 4, 4)}${pitched("E", 4, 4, "<chord/>")}</measure>`));
    expect(allNotes(parseScore(xml))).toEqual(allNotes(parseScore(xml)));
  });
});

// ─── Voices & Cursor ────────────────────────────────────────────────────────

describe("parseScore voice cursor", () => {
  it("rewinds with <backup> and sizes the measure by the furthest voice", () => {
    const measure1 = [
      `<measure number="1">${DIV4}`,
      pitched("C", 5, 4, "<voice>1</voice><type>quarter</type>"),
      pitched("D", 5, 4, "<voice>1</voice><type>quarter</type>"),
      `<backup><duration>8</duration></backup>`,
      pitched("C", 3, 12, "<voice>2</voice><type>half</type><dot/>"),
      `</measure>`,
    ].join("");
    const measure2 = `<measure number="2">${pitched("E", 5, 16, "<type>whole</type>")}</measure>`;

    const score = parseScore(doc(part(measure1 + measure2)));
    const [m1, m2] = score.staves[0].measures;

    expect(m1.notes.map((n) => n.startBeatInMeasure)).toEqual([0, 1, 0]);
    expect(m1.notes.map((n) => n.voice)).toEqual(["1", "1", "2"]);
    expect(m1.notes[2].duration).toEqual({ type: "half", dots: 1, tuplet: 1 });
    expect(m1.durationBeats).toBe(3);
    expect(m2.startBeatGlobal).toBe(3);
    expect(m2.startTimeSeconds).toBe(1.5);
    expect(m2.notes[0].startBeatGlobal).toBe(3);
  });

  it("clamps <backup> at the start of the measure", () => {
    const measure = `<measure number="1">${DIV4}${pitched("C", 4, 4)}<backup><duration>20</duration></backup>${pitched("G", 3, 4)}</measure>`;
    const notes = parseScore(doc(part(measure))).staves[0].measures[0].notes;
    expect(notes.map((n) => n.startBeatInMeasure)).toEqual([0, 0]);
  });

  it("skips silent time with <forward>", () => {
    const measure = `<measure number="1">${DIV4}<forward><duration>4</duration></forward>${pitched("C", 4, 2)}<forward><duration>8</duration></forward></measure>`;
    const m = parseScore(doc(part(measure))).staves[0].measures[0];
    expect(m.notes[0].startBeatInMeasure).toBe(1);
    expect(m.durationBeats).toBe(3.5);
  });

  it("places chord tones on the previous onset without advancing", () => {
    const measure = [
      `<measure number="1">${DIV4}`,
      pitched("C", 4, 4),
      pitched("E", 4, 4, "<chord/>"),
      pitched("G", 4, 4, "<chord/>"),
      pitched("F", 4, 4),
      `</measure>`,
    ].join("");
    const m = parseScore(doc(part(measure))).staves[0].measures[0];

    expect(midiOf([...m.notes])).toEqual([60, 64, 67, 65]);
    expect(m.notes.map((n) => n.startBeatInMeasure)).toEqual([0, 0, 0, 1]);
    expect(m.durationBeats).toBe(2);
  });

  it("ignores grace and cue notes", () => {
    const measure = `<measure number="1">${DIV4}${pitched("B", 3, 0, "<grace/>")}${pitched("C", 4, 4)}${pitched("D", 4, 4, "<cue/>")}${pitched("E", 4, 4)}</measure>`;
    const m = parseScore(doc(part(measure))).staves[0].measures[0];
    expect(midiOf([...m.notes])).toEqual([60, 64]);
    expect(m.notes[1].startBeatInMeasure).toBe(1);
  });

  it("rescales the cursor when divisions change", () => {
    const measures = [
      `<measure number="1">${DIV4}${pitched("C", 4, 4, "<type>quarter</type>")}</measure>`,
      `<measure number="2"><attributes><divisions>8</divisions></attributes>${pitched("D", 4, 8, "<type>quarter</type>")}${pitched("E", 4, 4)}</measure>`,
    ].join("");
    const score = parseScore(doc(part(measures)));
    const m2 = score.staves[0].measures[1];

    expect(score.divisions).toBe(4);
    expect(m2.startBeatGlobal).toBe(1);
    expect(m2.notes.map((n) => n.startBeatInMeasure)).toEqual([0, 1]);
    expect(m2.notes[1].duration).toEqual({ type: "eighth", dots: 0, tuplet: 1 });
    expect(m2.durationBeats).toBe(1.5);
  });
});

// ─── Measures & Staves ──────────────────────────────────────────────────────

describe("parseScore measures", () => {
  it("falls back to the time signature for empty measures and inherits it", () => {
    const measures = [
      `<measure number="1"><attributes><divisions>4</divisions><time><beats>3</beats><beat-type>4</beat-type></time></attributes></measure>`,
      `<measure number="2"></measure>`,
      `<measure number="3">${pitched("C", 4, 4)}</measure>`,
    ].join("");
    const m = parseScore(doc(part(measures))).staves[0].measures;

    expect(m.map((x) => x.durationBeats)).toEqual([3, 3, 1]);
    expect(m.map((x) => `${x.numerator}/${x.denominator}`)).toEqual(["3/4", "3/4", "3/4"]);
    expect(m[2].notes[0].startBeatGlobal).toBe(6);
  });

  it("uses 4/4 when no time signature is given", () => {
    const m = parseScore(doc(part(`<measure number="1">${DIV4}</measure>`))).staves[0].measures[0];
    expect(m.durationBeats).toBe(4);
  });

  it("numbers measures sequentially when the attribute is missing or not an integer", () => {
    const measures = `<measure number="7">${DIV4}</measure><measure></measure><measure number="3a"></measure>`;
    const numbers = parseScore(doc(part(measures))).staves[0].measures.map((m) => m.number);
    expect(numbers).toEqual([7, 2, 3]);
  });

  it("creates one staff per part and reads per-note staff tags", () => {
    const p1 = part(`<measure number="1">${DIV4}${pitched("C", 5, 4, "<staff>1</staff>")}${pitched("C", 3, 4, "<staff>2</staff>")}</measure>`, "P1");
    const p2 = part(`<measure number="1">${DIV4}${pitched("G", 4, 4)}</measure>`, "P2");
    const score = parseScore(doc(p1 + p2));

    expect(score.staves.map((s) => [s.index, s.partId])).toEqual([[1, "P1"], [2, "P2"]]);
    expect(score.staves[0].measures[0].notes.map((n) => n.staffIndex)).toEqual([1, 2]);
    expect(score.staves[1].measures[0].notes[0].staffIndex).toBeUndefined();
    expect(score.staves[1].measures[0].notes[0].startBeatGlobal).toBe(0);
  });
});

// ─── Lenient Fields ─────────────────────────────────────────────────────────

describe("parseScore field defaults", () => {
  it("defaults bad pitch fields instead of failing", () => {
    const bad = `<note><pitch><step>X</step><octave>high</octave><alter>5</alter></pitch><duration>4</duration></note>`;
    const noPitch = `<note><duration>4</duration></note>`;
    const flat = `<note><pitch><step>b</step><alter>-1</alter><octave>3</octave></pitch><duration>4</duration></note>`;
    const notes = parseScore(doc(part(`<measure number="1">${DIV4}${bad}${noPitch}${flat}</measure>`))).staves[0].measures[0].notes;

    expect(notes[0].pitch).toEqual({ step: "C", octave: 4, alter: 2 });
    expect(notes[1].pitch).toEqual({ step: "C", octave: 4, alter: 0 });
    expect(notes[2].pitch).toEqual({ step: "B", octave: 3, alter: -1 });
  });

  it("prefers <type>, accepts short forms and defaults unknown types to quarter", () => {
    const measure = [
      `<measure number="1">${DIV4}`,
      pitched("C", 4, 4, "<type>16th</type>"),
      pitched("C", 4, 4, "<type>32ND</type>"),
      pitched("C", 4, 4, "<type>breve</type><dot/><dot/>"),
      `</measure>`,
    ].join("");
    const durations = parseScore(doc(part(measure))).staves[0].measures[0].notes.map((n) => n.duration);

    expect(durations).toEqual([
      { type: "sixteenth", dots: 0, tuplet: 1 },
      { type: "thirty-second", dots: 0, tuplet: 1 },
      { type: "quarter", dots: 2, tuplet: 1 },
    ]);
  });

  it("treats a missing <type> as a quarter and counts only written dots", () => {
    const measure = [
      `<measure number="1">${DIV4}`,
      pitched("C", 4, 6),
      pitched("C", 4, 2),
      pitched("C", 4, 6, "<dot/>"),
      pitched("C", 4, 1, "<type>constructor</type>"),
      `</measure>`,
    ].join("");
    const notes = parseScore(doc(part(measure))).staves[0].measures[0].notes;

    expect(notes.map((n) => n.duration)).toEqual([
      { type: "quarter", dots: 0, tuplet: 1 },
      { type: "quarter", dots: 0, tuplet: 1 },
      { type: "quarter", dots: 1, tuplet: 1 },
      { type: "quarter", dots: 0, tuplet: 1 },
    ]);
    expect(notes.map((n) => n.startBeatInMeasure)).toEqual([0, 1.5, 2, 3.5]);
  });

  it("ignores a non-positive <divisions> and keeps the default", () => {
    const score = parseScore(doc(part(`<measure number="1"><attributes><divisions>0</divisions></attributes>${pitched("C", 4, 2)}</measure>`)));
    expect(score.divisions).toBe(4);
    expect(score.staves[0].measures[0].durationBeats).toBe(0.5);
  });
});

// ─── Failures ───────────────────────────────────────────────────────────────

describe("parseScore failures", () => {
  it("rejects empty input", () => {
    expect(() => parseScore("")).toThrow(InvalidInputError);
    expect(() => parseScore("   \n")).toThrow(InvalidInputError);
  });

  it("wraps markup errors with the XML error as cause", () => {
    let caught: unknown;
    try {
      parseScore(`<score-partwise><part id="P1"></score-partwise>`);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedDocumentError);
    if (caught instanceof MalformedDocumentError) {
      expect(caught.code).toBe("MALFORMED_DOCUMENT");
      expect(caught.cause).toBeInstanceOf(XmlParseError);
      expect(caught.line).toBe(1);
    }
  });

  it("rejects score-timewise as not implemented", () => {
    expect(() => parseScore(`<score-timewise version="4.0"><measure number="1"/></score-timewise>`)).toThrow(
      NotImplementedError
    );
  });

  it("rejects an unknown root element", () => {
    expect(() => parseScore(`<opus><title>x</title></opus>`)).toThrow(/Unrecognized root element <opus>/);
  });
});

describe("parseScoreFile", () => {
  it("rejects an empty path", async () => {
    await expect(parseScoreFile("")).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("wraps read failures", async () => {
    await expect(parseScoreFile("/nonexistent/keyline/missing.musicxml")).rejects.toThrow(
      "Cannot read score file: /nonexistent/keyline/missing.musicxml"
    );
  });
});
