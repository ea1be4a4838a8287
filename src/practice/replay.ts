// ─── Replay ──────────────────────────────────────────────────────────────────
//
// Plays a recorded event log into a fresh session through the same path a
// live device takes: wire bytes → loopback source → decoder → runner.
// Virtual time advances in fixed steps, countdown first. Event timestamps
// are seconds from the end of the countdown.
// ─────────────────────────────────────────────────────────────────────────────

import type { Score } from "../score/model.js";
import type { RawInputEvent } from "../midi/types.js";
import type { EngineConfigInput } from "../config/schema.js";
import { InputDecoder } from "../midi/decoder.js";
import { createLoopbackSource } from "../midi/loopback.js";
import { encodeEvent } from "../midi/stream.js";
import { createPerformanceSession, type SessionSnapshot } from "./session.js";
import type { SessionFeedback } from "./feedback.js";
import { PracticeRunner } from "./runner.js";

export interface ReplayOptions {
  config?: EngineConfigInput;
  /** Virtual seconds per step. Default 0.01. */
  stepSeconds?: number;
  feedback?: SessionFeedback;
}

export const DEFAULT_REPLAY_STEP = 0.01;

/**
 * Replay `events` against `score` and return the final snapshot.
 *
 * Stops when the session completes, or once the clock has run a step past
 * both the last event and the last onset.
 */
export async function replayPerformance(
  score: Score,
  events: readonly RawInputEvent[],
  options: ReplayOptions = {}
): Promise<SessionSnapshot> {
  const step = options.stepSeconds !== undefined && options.stepSeconds > 0 ? options.stepSeconds : DEFAULT_REPLAY_STEP;

  const session = createPerformanceSession({ config: options.config, feedback: options.feedback });
  session.load(score);

  let nowMs = 0;
  const source = createLoopbackSource("replay");
  const decoder = new InputDecoder(source, { clock: () => nowMs });
  const runner = new PracticeRunner(decoder, session, { clock: () => nowMs });
  await decoder.open();

  // ─── Countdown ───
  let countdownSteps = 0;
  while (session.state === "countdown") {
    runner.step(step);
    countdownSteps++;
  }
  const countdownSeconds = countdownSteps * step;

  // ─── Performance ───
  const ordered = [...events].sort((a, b) => a.timestamp - b.timestamp);
  const lastEvent = ordered.at(-1)?.timestamp ?? 0;
  const lastGroup = session.groups.at(-1);
  const lastOnset = lastGroup ? (lastGroup.startBeatGlobal * 60) / session.tempo : 0;
  const end = Math.max(lastEvent, lastOnset) + 2 * step;

  let next = 0;
  for (let i = 0; session.state === "awaiting-group"; i++) {
    const t = i * step;
    if (t > end) break;

    nowMs = (countdownSeconds + t) * 1000;
    while (next < ordered.length && ordered[next].timestamp <= t) {
      source.send(encodeEvent(ordered[next]));
      next++;
    }
    runner.step(step);
  }

  await runner.stop();
  return session.snapshot();
}
