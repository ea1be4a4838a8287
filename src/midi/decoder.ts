// ─── Input Decoder ──────────────────────────────────────────────────────────
//
// Owns one MIDI input source. Bytes delivered by the source are decoded as
// they arrive, stamped with seconds since open(), and queued. The consumer
// calls dispatch() on its own schedule to drain the queue in arrival order.
// ─────────────────────────────────────────────────────────────────────────────

import { DeviceUnavailableError } from "../errors.js";
import { EventQueue } from "./queue.js";
import { MidiStreamParser } from "./stream.js";
import type { MidiInputSource, RawInputEvent } from "./types.js";

export interface InputDecoderOptions {
  /** Monotonic clock in milliseconds. Default: performance.now(). */
  clock?: () => number;
}

export type EventCallback = (event: RawInputEvent) => void;

export class InputDecoder {
  private readonly parser = new MidiStreamParser();
  private readonly queue = new EventQueue<RawInputEvent>();
  private readonly clock: () => number;
  private unsubscribe: (() => void) | null = null;
  private openedAt = 0;

  constructor(
    readonly source: MidiInputSource,
    options: InputDecoderOptions = {}
  ) {
    this.clock = options.clock ?? (() => performance.now());
  }

  /** True between open() and close(). */
  get isListening(): boolean {
    return this.unsubscribe !== null;
  }

  /** Events decoded but not yet dispatched. */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Open the source (if needed), start listening and zero the clock.
   *
   * @throws DeviceUnavailableError when the source fails to open
   */
  async open(): Promise<void> {
    if (this.unsubscribe) return;

    if (!this.source.isOpen()) {
      try {
        await this.source.open();
      } catch (err) {
        throw new DeviceUnavailableError(`Cannot open MIDI input "${this.source.name}"`, { cause: err });
      }
    }

    this.parser.reset();
    this.openedAt = this.clock();
    this.unsubscribe = this.source.onMessage((bytes) => this.receive(bytes));
  }

  /**
   * Stop listening and close the source. Queued events stay available to
   * dispatch(); a half-received message is discarded.
   */
  async close(): Promise<void> {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    this.parser.reset();
    if (this.source.isOpen()) {
      await this.source.close();
    }
  }

  /** Drain the queue, one callback per event, oldest first. Returns the count. */
  dispatch(callback: EventCallback): number {
    let count = 0;
    let event = this.queue.dequeue();
    while (event !== undefined) {
      callback(event);
      count++;
      event = this.queue.dequeue();
    }
    return count;
  }

  /** Drain the queue into an array. */
  drain(): RawInputEvent[] {
    return this.queue.drain();
  }

  private receive(bytes: Uint8Array): void {
    const timestamp = (this.clock() - this.openedAt) / 1000;
    for (const event of this.parser.push(bytes, timestamp)) {
      this.queue.enqueue(event);
    }
  }
}
