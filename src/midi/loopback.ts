// ─── Loopback Input ─────────────────────────────────────────────────────────
//
// In-process MidiInputSource: whatever is passed to send() is delivered to
// the listeners as if it came from a device. Drives replays and tests.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiInputSource, MidiMessageListener } from "./types.js";

export interface LoopbackSource extends MidiInputSource {
  /** Deliver bytes to every listener. Ignored while closed. */
  send(bytes: ArrayLike<number>): void;
  /** Number of open() calls, for assertions. */
  readonly openCount: number;
}

export interface LoopbackOptions {
  /** Make open() reject with this error. */
  failOpen?: Error;
}

export function createLoopbackSource(name = "loopback", options: LoopbackOptions = {}): LoopbackSource {
  const listeners = new Set<MidiMessageListener>();
  let open = false;
  let openCount = 0;

  return {
    name,
    get openCount() {
      return openCount;
    },
    isOpen() {
      return open;
    },
    async open() {
      openCount++;
      if (options.failOpen) throw options.failOpen;
      open = true;
    },
    async close() {
      open = false;
    },
    onMessage(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    send(bytes) {
      if (!open) return;
      const chunk = Uint8Array.from(bytes);
      for (const listener of listeners) listener(chunk);
    },
  };
}
