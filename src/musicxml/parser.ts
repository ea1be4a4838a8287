// ─── keyline: MusicXML Parser ────────────────────────────────────────────────
//
// Turns a score-partwise document into the Score model with absolute beat
// and time positions. Voices interleaved with <backup>/<forward> and chord
// tones marked <chord/> are placed on a per-measure cursor, so polyphony
// inside one part keeps its real onsets.
//
// Only three things fail a parse: empty input, markup that does not parse,
// and a score-timewise root. Everything else falls back to defaults.
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import {
  InvalidInputError,
  MalformedDocumentError,
  NotImplementedError,
} from "../errors.js";
import {
  isStep,
  type Duration,
  type DurationType,
  type Measure,
  type Note,
  type Pitch,
  type Score,
  type Staff,
} from "../score/model.js";
import { parseXmlToAst, XmlParseError, type XmlNode } from "./xml-ast.js";
import {
  attribute,
  childrenOf,
  findDescendant,
  firstChild,
  hasChild,
  parseOptionalFloat,
  parseOptionalInt,
  textOf,
} from "./xml-utils.js";

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_DIVISIONS = 4;
const DEFAULT_TEMPO = 120;
const DEFAULT_OCTAVE = 4;

/** `<type>` values, long and short forms. */
const TYPE_NAMES = new Map<string, DurationType>([
  ["whole", "whole"],
  ["half", "half"],
  ["quarter", "quarter"],
  ["eighth", "eighth"],
  ["16th", "sixteenth"],
  ["sixteenth", "sixteenth"],
  ["32nd", "thirty-second"],
  ["thirty-second", "thirty-second"],
]);

// ─── Public API ──────────────────────────────────────────────────────────────

export interface ParseOptions {
  /** Tempo used when the document has no `<sound tempo>`. Default 120. */
  fallbackTempo?: number;
  /** File name for diagnostics. */
  sourceName?: string;
}

/**
 * Parse MusicXML text into a Score.
 *
 * @throws InvalidInputError on empty input
 * @throws MalformedDocumentError when the markup does not parse or the root is unknown
 * @throws NotImplementedError for score-timewise documents
 */
export function parseScore(xml: string, options: ParseOptions = {}): Score {
  if (xml.trim().length === 0) {
    throw new InvalidInputError(
      options.sourceName ? `MusicXML document is empty: ${options.sourceName}` : "MusicXML document is empty"
    );
  }

  const root = parseDocument(xml, options.sourceName);

  if (root.name === "score-timewise") {
    throw new NotImplementedError("score-timewise documents are not supported; convert to score-partwise");
  }
  if (root.name !== "score-partwise") {
    throw new MalformedDocumentError(
      `Unrecognized root element <${root.name}>: expected <score-partwise>`,
      root.location
    );
  }

  const divisions = readDivisions(root);
  const tempo = readTempo(root) ?? validTempo(options.fallbackTempo) ?? DEFAULT_TEMPO;

  const staves = childrenOf(root, "part").map((part, i) =>
    parsePart(part, i + 1, divisions, tempo)
  );

  return {
    title: readTitle(root),
    composer: readComposer(root),
    tempo,
    divisions,
    staves,
  };
}

/**
 * Read and parse a MusicXML file (UTF-8).
 *
 * @throws InvalidInputError when the path is empty or the file cannot be read
 */
export async function parseScoreFile(path: string, options: ParseOptions = {}): Promise<Score> {
  if (path.trim().length === 0) {
    throw new InvalidInputError("Score path is empty");
  }

  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new InvalidInputError(`Cannot read score file: ${path}`, { cause: err });
  }

  return parseScore(text, { ...options, sourceName: options.sourceName ?? path });
}

// ─── Internal: Document ──────────────────────────────────────────────────────

function parseDocument(xml: string, sourceName?: string): XmlNode {
  try {
    return parseXmlToAst(xml, sourceName);
  } catch (err) {
    if (err instanceof XmlParseError) {
      const where = err.location ? ` (line ${err.location.line}, column ${err.location.column})` : "";
      throw new MalformedDocumentError(`Malformed MusicXML${where}`, err.location, { cause: err });
    }
    throw err;
  }
}

// ─── Internal: Metadata ──────────────────────────────────────────────────────

function readTitle(root: XmlNode): string | undefined {
  return (
    textOf(findDescendant(root, (n) => n.name === "work-title")) ??
    textOf(findDescendant(root, (n) => n.name === "movement-title"))
  );
}

function readComposer(root: XmlNode): string | undefined {
  const node = findDescendant(
    root,
    (n) => n.name === "composer" || (n.name === "creator" && attribute(n, "type") === "composer")
  );
  return textOf(node);
}

function readDivisions(root: XmlNode): number {
  const node = findDescendant(
    root,
    (n) => n.name === "divisions" && positiveInt(textOf(n)) !== undefined
  );
  return positiveInt(textOf(node)) ?? DEFAULT_DIVISIONS;
}

function readTempo(root: XmlNode): number | undefined {
  const node = findDescendant(
    root,
    (n) => n.name === "sound" && validTempo(parseOptionalFloat(attribute(n, "tempo"))) !== undefined
  );
  return validTempo(parseOptionalFloat(attribute(node, "tempo")));
}

function validTempo(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}

function positiveInt(text: string | undefined): number | undefined {
  const value = parseOptionalInt(text);
  return value !== undefined && value > 0 ? value : undefined;
}

// ─── Internal: Parts & Measures ──────────────────────────────────────────────

interface PartState {
  divisions: number;
  numerator: number;
  denominator: number;
  measureCounter: number;
  globalBeat: number;
  globalTime: number;
}

function parsePart(part: XmlNode, index: number, divisions: number, tempo: number): Staff {
  const state: PartState = {
    divisions,
    numerator: 4,
    denominator: 4,
    measureCounter: 0,
    globalBeat: 0,
    globalTime: 0,
  };

  const measures = childrenOf(part, "measure").map((m) => parseMeasure(m, state, tempo));

  return {
    index,
    partId: attribute(part, "id") ?? `P${index}`,
    measures,
  };
}

/** Cursor and watermark are in the part's current division units. */
function parseMeasure(measure: XmlNode, state: PartState, tempo: number): Measure {
  state.measureCounter++;
  const number = parseOptionalInt(attribute(measure, "number")) ?? state.measureCounter;

  const startBeatGlobal = state.globalBeat;
  const startTimeSeconds = state.globalTime;
  const secondsPerBeat = 60 / tempo;

  let cursor = 0;
  let watermark = 0;
  let lastOnset: number | undefined;
  const notes: Note[] = [];

  for (const child of measure.children) {
    switch (child.name) {
      case "attributes": {
        const nextDivisions = positiveInt(textOf(firstChild(child, "divisions")));
        if (nextDivisions !== undefined && nextDivisions !== state.divisions) {
          const scale = nextDivisions / state.divisions;
          cursor *= scale;
          watermark *= scale;
          if (lastOnset !== undefined) lastOnset *= scale;
          state.divisions = nextDivisions;
        }
        const time = firstChild(child, "time");
        const beats = positiveInt(textOf(firstChild(time, "beats")));
        const beatType = positiveInt(textOf(firstChild(time, "beat-type")));
        if (beats !== undefined && beatType !== undefined) {
          state.numerator = beats;
          state.denominator = beatType;
        }
        break;
      }

      case "backup":
        cursor = Math.max(0, cursor - rawDuration(child));
        lastOnset = undefined;
        break;

      case "forward":
        cursor += rawDuration(child);
        watermark = Math.max(watermark, cursor);
        lastOnset = undefined;
        break;

      case "note": {
        if (hasChild(child, "grace") || hasChild(child, "cue")) break;

        const isChord = hasChild(child, "chord");
        const duration = rawDuration(child);
        let start: number;
        if (isChord && lastOnset !== undefined) {
          start = lastOnset;
        } else {
          start = cursor;
          lastOnset = cursor;
          cursor += duration;
          watermark = Math.max(watermark, cursor);
        }

        const startBeatInMeasure = start / state.divisions;
        notes.push(
          buildNote(child, {
            duration,
            measureNumber: number,
            startBeatInMeasure,
            startBeatGlobal: startBeatGlobal + startBeatInMeasure,
            startTimeSeconds: startTimeSeconds + startBeatInMeasure * secondsPerBeat,
          })
        );
        break;
      }

      default:
        break;
    }
  }

  const durationBeats =
    watermark > 0 ? watermark / state.divisions : (state.numerator * 4) / state.denominator;

  state.globalBeat += durationBeats;
  state.globalTime += durationBeats * secondsPerBeat;

  return {
    number,
    startTimeSeconds,
    startBeatGlobal,
    durationBeats,
    numerator: state.numerator,
    denominator: state.denominator,
    notes,
  };
}

/** `<duration>` of a note/backup/forward; missing or negative → 0. */
function rawDuration(node: XmlNode): number {
  const value = parseOptionalInt(textOf(firstChild(node, "duration")));
  return value !== undefined && value > 0 ? value : 0;
}

// ─── Internal: Notes ─────────────────────────────────────────────────────────

interface NotePlacement {
  duration: number;
  measureNumber: number;
  startBeatInMeasure: number;
  startBeatGlobal: number;
  startTimeSeconds: number;
}

function buildNote(node: XmlNode, placement: NotePlacement): Note {
  const isRest = hasChild(node, "rest");
  const staff = positiveInt(textOf(firstChild(node, "staff")));

  return {
    pitch: isRest ? undefined : parsePitch(firstChild(node, "pitch")),
    duration: parseDuration(node),
    isRest,
    startBeatInMeasure: placement.startBeatInMeasure,
    startBeatGlobal: placement.startBeatGlobal,
    startTimeSeconds: placement.startTimeSeconds,
    measureNumber: placement.measureNumber,
    staffIndex: staff,
    voice: textOf(firstChild(node, "voice")) ?? "1",
    durationDivisions: placement.duration,
  };
}

/** Missing pieces default to C, octave 4, no alteration. */
function parsePitch(node: XmlNode | undefined): Pitch {
  const stepText = textOf(firstChild(node, "step"))?.toUpperCase();
  const alter = parseOptionalFloat(textOf(firstChild(node, "alter")));

  return {
    step: stepText !== undefined && isStep(stepText) ? stepText : "C",
    octave: parseOptionalInt(textOf(firstChild(node, "octave"))) ?? DEFAULT_OCTAVE,
    alter: alter === undefined ? 0 : Math.min(2, Math.max(-2, Math.round(alter))),
  };
}

/** A missing or unknown `<type>` is a quarter; dots are counted as written. */
function parseDuration(node: XmlNode): Duration {
  const typeText = textOf(firstChild(node, "type"))?.toLowerCase();
  return {
    type: (typeText !== undefined ? TYPE_NAMES.get(typeText) : undefined) ?? "quarter",
    dots: childrenOf(node, "dot").length,
    tuplet: 1,
  };
}
