// ─── MIDI Byte Stream Parser ────────────────────────────────────────────────
//
// Incremental decoder for the MIDI 1.0 wire format. Bytes may arrive split
// across chunks; a message is emitted once its last data byte is seen.
//
// Status byte top nibble selects the message kind:
//   8n note off    9n note on (velocity 0 = note off)    An poly pressure
//   Bn control     Cn program    Dn channel pressure     En pitch bend
//
// Running status is honoured. System exclusive is skipped through F7,
// real-time bytes (F8–FF) are ignored wherever they appear, and pressure
// messages are consumed without being emitted.
// ─────────────────────────────────────────────────────────────────────────────

import type { RawInputEvent } from "./types.js";

const NOTE_OFF = 0x80;
const NOTE_ON = 0x90;
const POLY_PRESSURE = 0xa0;
const CONTROL_CHANGE = 0xb0;
const PROGRAM_CHANGE = 0xc0;
const CHANNEL_PRESSURE = 0xd0;
const PITCH_BEND = 0xe0;

const SYSEX_START = 0xf0;
const SYSEX_END = 0xf7;
const REALTIME_FIRST = 0xf8;

/** Data bytes that follow a channel status byte. */
function dataLength(status: number): number {
  const kind = status & 0xf0;
  return kind === PROGRAM_CHANGE || kind === CHANNEL_PRESSURE ? 1 : 2;
}

/**
 * Stateful byte parser. One instance per input port.
 */
export class MidiStreamParser {
  private status = 0;
  private data: number[] = [];
  private inSysex = false;

  /** True when a message has started but not finished. */
  get hasPartial(): boolean {
    return this.data.length > 0 || this.inSysex;
  }

  /**
   * Consume a chunk of bytes. Returns every message completed by it,
   * stamped with `timestamp`.
   */
  push(bytes: ArrayLike<number>, timestamp: number): RawInputEvent[] {
    const events: RawInputEvent[] = [];

    for (let i = 0; i < bytes.length; i++) {
      const byte = bytes[i] & 0xff;

      if (byte >= REALTIME_FIRST) continue;

      if (byte & 0x80) {
        if (this.inSysex) {
          this.inSysex = false;
          if (byte === SYSEX_END) continue;
        }
        this.data = [];
        if (byte === SYSEX_START) {
          this.inSysex = true;
          this.status = 0;
        } else if (byte > SYSEX_START) {
          // system common: clears running status, its data bytes are dropped
          this.status = 0;
        } else {
          this.status = byte;
        }
        continue;
      }

      if (this.inSysex || this.status === 0) continue;

      this.data.push(byte);
      if (this.data.length === dataLength(this.status)) {
        const event = decodeMessage(this.status, this.data, timestamp);
        if (event) events.push(event);
        this.data = [];
      }
    }

    return events;
  }

  /** Drop any half-received message and the running status. */
  reset(): void {
    this.status = 0;
    this.data = [];
    this.inSysex = false;
  }
}

/** Decode one complete channel message. Pressure messages yield null. */
export function decodeMessage(
  status: number,
  data: readonly number[],
  timestamp: number
): RawInputEvent | null {
  const kind = status & 0xf0;
  const channel = status & 0x0f;
  const d1 = data[0] ?? 0;
  const d2 = data[1] ?? 0;

  switch (kind) {
    case NOTE_ON:
      return d2 > 0
        ? { type: "noteOn", channel, note: d1, velocity: d2, timestamp }
        : { type: "noteOff", channel, note: d1, velocity: 0, timestamp };
    case NOTE_OFF:
      return { type: "noteOff", channel, note: d1, velocity: d2, timestamp };
    case CONTROL_CHANGE:
      return { type: "controlChange", channel, controller: d1, value: d2, timestamp };
    case PROGRAM_CHANGE:
      return { type: "programChange", channel, program: d1, timestamp };
    case PITCH_BEND:
      return { type: "pitchBend", channel, value: d1 | (d2 << 7), timestamp };
    case POLY_PRESSURE:
    case CHANNEL_PRESSURE:
    default:
      return null;
  }
}

/** Wire bytes for an event. Values are masked to their field widths. */
export function encodeEvent(event: RawInputEvent): number[] {
  const channel = event.channel & 0x0f;
  switch (event.type) {
    case "noteOn":
      return [NOTE_ON | channel, event.note & 0x7f, event.velocity & 0x7f];
    case "noteOff":
      return [NOTE_OFF | channel, event.note & 0x7f, event.velocity & 0x7f];
    case "controlChange":
      return [CONTROL_CHANGE | channel, event.controller & 0x7f, event.value & 0x7f];
    case "programChange":
      return [PROGRAM_CHANGE | channel, event.program & 0x7f];
    case "pitchBend":
      return [PITCH_BEND | channel, event.value & 0x7f, (event.value >> 7) & 0x7f];
  }
}
