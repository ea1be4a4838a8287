import { describe, it, expect } from "vitest";
import { writeMidi, type MidiData } from "midi-file";
import { readPerformance, readPerformanceFile, writePerformance } from "./recording.js";
import { InvalidInputError, MalformedDocumentError } from "../errors.js";

describe("readPerformance", () => {
  it("merges tracks and follows tempo changes", () => {
    const data: MidiData = {
      header: { format: 1, numTracks: 2, ticksPerBeat: 480 },
      tracks: [
        [
          { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: 500_000 },
          { deltaTime: 960, meta: true, type: "setTempo", microsecondsPerBeat: 1_000_000 },
          { deltaTime: 0, meta: true, type: "endOfTrack" },
        ],
        [
          { deltaTime: 0, type: "noteOn", channel: 0, noteNumber: 60, velocity: 100 },
          { deltaTime: 480, type: "noteOff", channel: 0, noteNumber: 60, velocity: 64 },
          { deltaTime: 960, type: "noteOn", channel: 0, noteNumber: 67, velocity: 90 },
          { deltaTime: 0, type: "controller", channel: 0, controllerType: 64, value: 127 },
          { deltaTime: 0, meta: true, type: "endOfTrack" },
        ],
      ],
    };

    const perf = readPerformance(new Uint8Array(writeMidi(data)));

    expect(perf.bpm).toBe(120);
    expect(perf.trackCount).toBe(2);
    expect(perf.ticksPerBeat).toBe(480);
    expect(perf.durationSeconds).toBe(2);
    expect(perf.events).toEqual([
      { type: "noteOn", channel: 0, note: 60, velocity: 100, timestamp: 0 },
      { type: "noteOff", channel: 0, note: 60, velocity: 64, timestamp: 0.5 },
      { type: "noteOn", channel: 0, note: 67, velocity: 90, timestamp: 2 },
      { type: "controlChange", channel: 0, controller: 64, value: 127, timestamp: 2 },
    ]);
  });

  it("reads a velocity-0 note on as a note off", () => {
    const data: MidiData = {
      header: { format: 0, numTracks: 1, ticksPerBeat: 96 },
      tracks: [
        [
          { deltaTime: 0, type: "noteOn", channel: 2, noteNumber: 48, velocity: 80 },
          { deltaTime: 96, type: "noteOn", channel: 2, noteNumber: 48, velocity: 0 },
          { deltaTime: 0, meta: true, type: "endOfTrack" },
        ],
      ],
    };

    const perf = readPerformance(new Uint8Array(writeMidi(data)));
    expect(perf.events[1]).toEqual({ type: "noteOff", channel: 2, note: 48, velocity: 0, timestamp: 0.5 });
  });

  it("rejects bytes that are not a MIDI file", () => {
    expect(() => readPerformance(new Uint8Array([1, 2, 3, 4]))).toThrow(MalformedDocumentError);
  });
});

describe("writePerformance", () => {
  it("writes events that read back at the same times", () => {
    const bytes = writePerformance([
      { type: "noteOff", channel: 0, note: 60, velocity: 0, timestamp: 0.75 },
      { type: "noteOn", channel: 0, note: 60, velocity: 100, timestamp: 0.25 },
      { type: "pitchBend", channel: 0, value: 8292, timestamp: 1 },
    ]);

    expect(readPerformance(bytes).events).toEqual([
      { type: "noteOn", channel: 0, note: 60, velocity: 100, timestamp: 0.25 },
      { type: "noteOff", channel: 0, note: 60, velocity: 0, timestamp: 0.75 },
      { type: "pitchBend", channel: 0, value: 8292, timestamp: 1 },
    ]);
  });
});

describe("readPerformanceFile", () => {
  it("wraps read failures", async () => {
    await expect(readPerformanceFile("/nonexistent/keyline/take.mid")).rejects.toBeInstanceOf(InvalidInputError);
  });
});
