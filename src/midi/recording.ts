// ─── Recorded Performances ──────────────────────────────────────────────────
//
// Standard MIDI files as performance logs. Reading merges every track,
// honours the tempo map and yields input events stamped in seconds, the
// same shape the live decoder produces. Writing does the reverse at a
// fixed tempo, so a captured session can be saved and graded later.
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import { parseMidi, writeMidi, type MidiData, type MidiEvent } from "midi-file";
import { InvalidInputError, MalformedDocumentError } from "../errors.js";
import type { RawInputEvent, UnstampedEvent } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_TICKS_PER_BEAT = 480;
const DEFAULT_MICROSECONDS_PER_BEAT = 500_000; // 120 BPM
const PITCH_BEND_CENTER = 8192;

// ─── Types ───────────────────────────────────────────────────────────────────

export interface Performance {
  /** Input events ordered by time. */
  events: RawInputEvent[];
  /** Time of the last event, in seconds. */
  durationSeconds: number;
  /** Initial tempo (from the first tempo event, or 120). */
  bpm: number;
  ticksPerBeat: number;
  trackCount: number;
}

interface TempoPoint {
  tick: number;
  microsecondsPerBeat: number;
}

interface TimedEvent {
  tick: number;
  event: UnstampedEvent;
}

// ─── Reading ─────────────────────────────────────────────────────────────────

/**
 * Decode a standard MIDI file into a performance log.
 *
 * @throws MalformedDocumentError when the bytes are not a MIDI file
 */
export function readPerformance(buffer: Uint8Array): Performance {
  let midi: MidiData;
  try {
    midi = parseMidi(buffer);
  } catch (err) {
    throw new MalformedDocumentError("Malformed MIDI file", undefined, { cause: err });
  }

  const ticksPerBeat = midi.header.ticksPerBeat ?? DEFAULT_TICKS_PER_BEAT;
  const tempos = extractTempoPoints(midi);
  const toSeconds = secondsConverter(midi, tempos, ticksPerBeat);

  const events = collectEvents(midi).map(({ tick, event }) =>
    stamp(event, toSeconds(tick))
  );

  return {
    events,
    durationSeconds: events.at(-1)?.timestamp ?? 0,
    bpm: tempos.length > 0 ? Math.round(60_000_000 / tempos[0].microsecondsPerBeat) : 120,
    ticksPerBeat,
    trackCount: midi.tracks.length,
  };
}

/**
 * Read a .mid file from disk.
 *
 * @throws InvalidInputError when the path is empty or unreadable
 */
export async function readPerformanceFile(path: string): Promise<Performance> {
  if (path.trim().length === 0) {
    throw new InvalidInputError("Performance path is empty");
  }
  let buffer: Buffer;
  try {
    buffer = await readFile(path);
  } catch (err) {
    throw new InvalidInputError(`Cannot read performance file: ${path}`, { cause: err });
  }
  return readPerformance(new Uint8Array(buffer));
}

// ─── Writing ─────────────────────────────────────────────────────────────────

export interface WriteOptions {
  /** Default 120. */
  bpm?: number;
  /** Default 480. */
  ticksPerBeat?: number;
}

/** Encode input events as a single-track (format 0) MIDI file. */
export function writePerformance(events: readonly RawInputEvent[], options: WriteOptions = {}): Uint8Array {
  const bpm = options.bpm ?? 120;
  const ticksPerBeat = options.ticksPerBeat ?? DEFAULT_TICKS_PER_BEAT;
  const ticksPerSecond = (bpm / 60) * ticksPerBeat;

  const sorted = [...events].sort((a, b) => a.timestamp - b.timestamp);
  const track: MidiEvent[] = [
    { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: Math.round(60_000_000 / bpm) },
  ];

  let previousTick = 0;
  for (const event of sorted) {
    const tick = Math.max(previousTick, Math.round(event.timestamp * ticksPerSecond));
    track.push(toMidiEvent(event, tick - previousTick));
    previousTick = tick;
  }
  track.push({ deltaTime: 0, meta: true, type: "endOfTrack" });

  const data: MidiData = {
    header: { format: 0, numTracks: 1, ticksPerBeat },
    tracks: [track],
  };
  return new Uint8Array(writeMidi(data));
}

// ─── Internal: Events ────────────────────────────────────────────────────────

function collectEvents(midi: MidiData): TimedEvent[] {
  const timed: TimedEvent[] = [];

  for (const track of midi.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      const decoded = fromMidiEvent(event);
      if (decoded) timed.push({ tick, event: decoded });
    }
  }

  // stable: same-tick events keep track order
  return timed.sort((a, b) => a.tick - b.tick);
}

function fromMidiEvent(event: MidiEvent): UnstampedEvent | null {
  switch (event.type) {
    case "noteOn":
      return event.velocity > 0
        ? { type: "noteOn", channel: event.channel, note: event.noteNumber, velocity: event.velocity }
        : { type: "noteOff", channel: event.channel, note: event.noteNumber, velocity: 0 };
    case "noteOff":
      return { type: "noteOff", channel: event.channel, note: event.noteNumber, velocity: event.velocity };
    case "controller":
      return { type: "controlChange", channel: event.channel, controller: event.controllerType, value: event.value };
    case "programChange":
      return { type: "programChange", channel: event.channel, program: event.programNumber };
    case "pitchBend":
      return { type: "pitchBend", channel: event.channel, value: event.value + PITCH_BEND_CENTER };
    default:
      return null;
  }
}

function toMidiEvent(event: RawInputEvent, deltaTime: number): MidiEvent {
  switch (event.type) {
    case "noteOn":
      return { deltaTime, type: "noteOn", channel: event.channel, noteNumber: event.note, velocity: event.velocity };
    case "noteOff":
      return { deltaTime, type: "noteOff", channel: event.channel, noteNumber: event.note, velocity: event.velocity };
    case "controlChange":
      return { deltaTime, type: "controller", channel: event.channel, controllerType: event.controller, value: event.value };
    case "programChange":
      return { deltaTime, type: "programChange", channel: event.channel, programNumber: event.program };
    case "pitchBend":
      return { deltaTime, type: "pitchBend", channel: event.channel, value: event.value - PITCH_BEND_CENTER };
  }
}

function stamp(event: UnstampedEvent, timestamp: number): RawInputEvent {
  return { ...event, timestamp };
}

// ─── Internal: Tick-to-Time Conversion ───────────────────────────────────────

function extractTempoPoints(midi: MidiData): TempoPoint[] {
  const points: TempoPoint[] = [];
  for (const track of midi.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      if (event.type === "setTempo") {
        points.push({ tick, microsecondsPerBeat: event.microsecondsPerBeat });
      }
    }
  }
  return points.sort((a, b) => a.tick - b.tick);
}

/** SMPTE-timed files ignore the tempo map. */
function secondsConverter(
  midi: MidiData,
  tempos: TempoPoint[],
  ticksPerBeat: number
): (tick: number) => number {
  const { framesPerSecond, ticksPerFrame } = midi.header;
  if (midi.header.ticksPerBeat === undefined && framesPerSecond && ticksPerFrame) {
    return (tick) => tick / (framesPerSecond * ticksPerFrame);
  }
  return (tick) => ticksToSeconds(tick, tempos, ticksPerBeat);
}

/** Convert a tick position to seconds, respecting tempo changes. */
function ticksToSeconds(targetTick: number, tempos: TempoPoint[], ticksPerBeat: number): number {
  let seconds = 0;
  let currentTick = 0;
  let microsecondsPerBeat = DEFAULT_MICROSECONDS_PER_BEAT;

  for (const point of tempos) {
    if (point.tick >= targetTick) break;
    if (point.tick > currentTick) {
      seconds += ((point.tick - currentTick) / ticksPerBeat) * (microsecondsPerBeat / 1_000_000);
      currentTick = point.tick;
    }
    microsecondsPerBeat = point.microsecondsPerBeat;
  }

  if (currentTick < targetTick) {
    seconds += ((targetTick - currentTick) / ticksPerBeat) * (microsecondsPerBeat / 1_000_000);
  }
  return seconds;
}
