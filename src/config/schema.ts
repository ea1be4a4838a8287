// ─── Engine Config Schema ────────────────────────────────────────────────────
//
// Session parameters with their defaults. Every field is optional in input;
// parsing fills in the rest.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import type { ConfigIssue } from "../errors.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const PRACTICE_MODES = ["practice", "tempo"] as const;

export const TimingToleranceSchema = z.object({
  /** How early a note may land and still count, in seconds. */
  earlySeconds: z.number().min(0).max(2).default(0.1),
  /** How late a note may land and still count, in seconds. */
  lateSeconds: z.number().min(0).max(2).default(0.1),
});

export const HandsSchema = z.object({
  left: z.boolean().default(true),
  right: z.boolean().default(true),
});

export const EngineConfigSchema = z.object({
  /** Time allowed to complete a chord once its first note is hit. */
  simultaneityWindowSeconds: z.number().positive().max(5).default(0.25),
  /** Notes at least this long (in beats) are tracked as holds. */
  holdMinBeats: z.number().positive().default(1),
  /** Releasing this close to the written end is not a break. */
  holdReleaseToleranceBeats: z.number().min(0).default(0.1),
  countdownSeconds: z.number().min(0).max(60).default(3),
  /** Tempo used when the score has none. */
  fallbackTempo: z.number().min(10).max(400).default(120),
  timing: TimingToleranceSchema.default({}),
  hands: HandsSchema.default({}),
  mode: z.enum(PRACTICE_MODES).default("practice"),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type PracticeMode = EngineConfig["mode"];
export type TimingTolerance = EngineConfig["timing"];

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate a raw config object. Returns an empty array if valid.
 */
export function validateEngineConfig(config: unknown): ConfigIssue[] {
  const result = EngineConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/** The defaults, fully resolved. */
export function defaultEngineConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}
