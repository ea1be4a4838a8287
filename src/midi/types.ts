// ─── MIDI Input Types ───────────────────────────────────────────────────────
//
// Structured events decoded from a live or recorded MIDI byte stream, and
// the device boundary the decoder reads from.
// ─────────────────────────────────────────────────────────────────────────────

/** Key pressed. Velocity is always > 0. */
export interface NoteOnEvent {
  type: "noteOn";
  /** MIDI channel (0–15). */
  channel: number;
  /** MIDI note number (0–127). 60 = middle C. */
  note: number;
  velocity: number;
  /** Seconds since the stream was opened. */
  timestamp: number;
}

/** Key released. A note-on with velocity 0 arrives as this. */
export interface NoteOffEvent {
  type: "noteOff";
  channel: number;
  note: number;
  velocity: number;
  timestamp: number;
}

export interface ControlChangeEvent {
  type: "controlChange";
  channel: number;
  /** Controller number (64 = sustain pedal). */
  controller: number;
  value: number;
  timestamp: number;
}

export interface ProgramChangeEvent {
  type: "programChange";
  channel: number;
  program: number;
  timestamp: number;
}

export interface PitchBendEvent {
  type: "pitchBend";
  channel: number;
  /** 14-bit value, 0–16383. 8192 = centre. */
  value: number;
  timestamp: number;
}

/** Every event the decoder can emit. */
export type RawInputEvent =
  | NoteOnEvent
  | NoteOffEvent
  | ControlChangeEvent
  | ProgramChangeEvent
  | PitchBendEvent;

/** Listener for raw bytes delivered by a device. */
export type MidiMessageListener = (bytes: Uint8Array) => void;

/**
 * The platform MIDI layer's view of one open input port.
 * Device discovery lives outside this package.
 */
export interface MidiInputSource {
  /** Port name, for diagnostics. */
  readonly name: string;
  isOpen(): boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  /** Subscribe to incoming bytes. Returns an unsubscribe function. */
  onMessage(listener: MidiMessageListener): () => void;
}

/** An input event before it is stamped with a time. */
export type UnstampedEvent = {
  [K in RawInputEvent["type"]]: Omit<Extract<RawInputEvent, { type: K }>, "timestamp">;
}[RawInputEvent["type"]];
