// ─── Practice Runner ─────────────────────────────────────────────────────────
//
// The single consumer loop between an input decoder and a session:
//
//   step(dt) = decoder.dispatch(session.handle) then session.tick(dt)
//
// step() can be driven by hand (replays, tests) or by start(), which runs it
// on a timer with the measured time since the previous step.
// ─────────────────────────────────────────────────────────────────────────────

import type { InputDecoder } from "../midi/decoder.js";
import type { PerformanceSession } from "./session.js";

export interface PracticeRunnerOptions {
  /** Wall clock in milliseconds for timed runs. Default: performance.now(). */
  clock?: () => number;
}

export class PracticeRunner {
  private readonly clock: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastStepAt = 0;

  constructor(
    readonly decoder: InputDecoder,
    readonly session: PerformanceSession,
    options: PracticeRunnerOptions = {}
  ) {
    this.clock = options.clock ?? (() => performance.now());
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Hand every queued event to the session, oldest first, then advance the
   * session clock. Returns the number of events handled.
   */
  step(deltaSeconds: number): number {
    const handled = this.decoder.dispatch((event) => this.session.handle(event));
    this.session.tick(deltaSeconds);
    return handled;
  }

  /**
   * Open the decoder and step every `intervalMs`. A second call while
   * running is a no-op.
   *
   * @throws DeviceUnavailableError when the input cannot be opened
   */
  async start(intervalMs = 10): Promise<void> {
    if (this.timer) return;
    await this.decoder.open();

    this.lastStepAt = this.clock();
    this.timer = setInterval(() => {
      const now = this.clock();
      this.step((now - this.lastStepAt) / 1000);
      this.lastStepAt = now;
    }, intervalMs);
  }

  /** Stop the timer and close the decoder. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.decoder.close();
  }
}
