#!/usr/bin/env node
// ─── keyline: CLI Entry Point ────────────────────────────────────────────────
//
// Usage:
//   keyline                                   # Show help
//   keyline info <score.musicxml>             # Score summary
//   keyline groups <score> --hands left       # Expectation groups
//   keyline grade <score> <take.mid>          # Offline performance report
//   keyline replay <score> <take.mid>         # Run a take through a session
// ─────────────────────────────────────────────────────────────────────────────

import { allNotes, measureCount, midiNotesToNames, scoreDurationSeconds, type Score } from "./score/model.js";
import { parseScoreFile } from "./musicxml/parser.js";
import { readPerformanceFile } from "./midi/recording.js";
import {
  buildGroups,
  filterNotesByHands,
  handSelection,
  isHandChoice,
  HAND_CHOICES,
  type HandSelection,
} from "./practice/grouper.js";
import { createConsoleFeedback, createSilentFeedback } from "./practice/feedback.js";
import { replayPerformance } from "./practice/replay.js";
import { formatReport, gradePerformance } from "./scoring/scorer.js";
import { loadEngineConfig, resolveEngineConfig } from "./config/loader.js";
import { PRACTICE_MODES, type EngineConfigInput, type PracticeMode } from "./config/schema.js";
import { describeError } from "./errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function padRight(s: string, len: number): string {
  return s.length >= len ? s.substring(0, len) : s + " ".repeat(len - s.length);
}

function truncate(s: string, max: number): string {
  return s.length <= max ? s : s.substring(0, max - 1) + "…";
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Positional arguments, skipping flags and their values. */
function positionals(args: string[], valueFlags: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (valueFlags.includes(args[i])) {
      i++;
    } else if (!args[i].startsWith("--")) {
      out.push(args[i]);
    }
  }
  return out;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function handsFlag(args: string[]): HandSelection | undefined {
  const value = getFlag(args, "--hands");
  if (value === null) return undefined;
  if (!isHandChoice(value)) {
    fail(`Invalid hands: "${value}". Available: ${HAND_CHOICES.join(", ")}`);
  }
  return handSelection(value);
}

function secondsFlag(args: string[], flag: string): number | undefined {
  const value = getFlag(args, flag);
  if (value === null) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    fail(`Invalid ${flag}: "${value}". Expected seconds, e.g. 0.1`);
  }
  return seconds;
}

function modeFlag(args: string[]): PracticeMode | undefined {
  const value = getFlag(args, "--mode");
  if (value === null) return undefined;
  const mode = PRACTICE_MODES.find((m) => m === value);
  if (!mode) {
    fail(`Invalid mode: "${value}". Available: ${PRACTICE_MODES.join(", ")}`);
  }
  return mode;
}

function printScoreInfo(score: Score, path: string): void {
  const notes = allNotes(score);
  console.log(`\n${"═".repeat(60)}`);
  console.log(`  ${score.title ?? path}`);
  console.log(`  ${score.composer ?? "Unknown composer"}`);
  console.log(`  Tempo: ${score.tempo} BPM | Divisions: ${score.divisions}`);
  console.log(`  Staves: ${score.staves.length} | Measures: ${measureCount(score)} | Notes: ${notes.length}`);
  console.log(`  Duration: ~${scoreDurationSeconds(score).toFixed(1)}s`);
  console.log(`${"═".repeat(60)}\n`);
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function cmdInfo(args: string[]): Promise<void> {
  const [path] = positionals(args, []);
  if (!path) fail("Usage: keyline info <score.musicxml>");

  printScoreInfo(await parseScoreFile(path), path);
}

async function cmdGroups(args: string[]): Promise<void> {
  const [path] = positionals(args, ["--hands"]);
  if (!path) fail("Usage: keyline groups <score.musicxml> [--hands left|right|both]");

  const hands = handsFlag(args) ?? handSelection("both");
  const score = await parseScoreFile(path);
  const groups = buildGroups(filterNotesByHands(allNotes(score), hands));

  console.log("\n" + padRight("#", 6) + padRight("Beat", 10) + "Notes");
  console.log("─".repeat(60));
  for (const g of groups) {
    console.log(
      padRight(String(g.index + 1), 6) +
        padRight(g.startBeatGlobal.toFixed(2), 10) +
        truncate(midiNotesToNames([...g.requiredPitches]), 44)
    );
  }
  console.log(`\n${groups.length} group(s).\n`);
}

async function cmdGrade(args: string[]): Promise<void> {
  const [scorePath, takePath] = positionals(args, ["--early", "--late", "--hands", "--offset"]);
  if (!scorePath || !takePath) {
    fail("Usage: keyline grade <score.musicxml> <take.mid> [--early S] [--late S] [--hands H] [--offset S]");
  }

  const timing = { earlySeconds: secondsFlag(args, "--early"), lateSeconds: secondsFlag(args, "--late") };
  const hands = handsFlag(args);
  const offsetSeconds = secondsFlag(args, "--offset");

  const score = await parseScoreFile(scorePath);
  const take = await readPerformanceFile(takePath);
  const { metrics } = gradePerformance(score, take.events, { timing, hands, offsetSeconds });

  console.log(`\n${formatReport(metrics)}\n`);
}

async function cmdReplay(args: string[]): Promise<void> {
  const [scorePath, takePath] = positionals(args, ["--mode", "--config", "--hands"]);
  if (!scorePath || !takePath) {
    fail("Usage: keyline replay <score.musicxml> <take.mid> [--mode practice|tempo] [--config file] [--verbose]");
  }

  const overrides: EngineConfigInput = { mode: modeFlag(args), hands: handsFlag(args) };
  const configPath = getFlag(args, "--config");
  const config = configPath ? loadEngineConfig(configPath, overrides) : resolveEngineConfig(overrides, "flags");

  const score = await parseScoreFile(scorePath);
  const take = await readPerformanceFile(takePath);
  const feedback = hasFlag(args, "--verbose") ? createConsoleFeedback() : createSilentFeedback();
  const snapshot = await replayPerformance(score, take.events, { config, feedback });

  const s = snapshot.stats;
  console.log(`\n  Mode: ${snapshot.mode} | State: ${snapshot.state}`);
  console.log(`  Groups: ${s.groupsSatisfied}/${snapshot.groupCount} played, ${s.groupsMissed} missed`);
  console.log(`  Correct notes: ${s.correctNotes} | Missed notes: ${s.missedNotes}`);
  console.log(`  Mistakes: ${s.mistakes} | Hold breaks: ${s.holdBreaks}\n`);
}

function cmdHelp(): void {
  console.log(`
keyline: match keyboard performances against MusicXML scores

Commands:
  info <score>               Show score details
  groups <score> [options]   List expectation groups (chords by onset)
  grade <score> <take.mid>   Grade a recorded take offline
  replay <score> <take.mid>  Replay a recorded take through a practice session
  help                       Show this help

Groups options:
  --hands <hand>             Which hand: left, right, both (default)

Grade options:
  --early <sec>              How early a note may land (default 0.1)
  --late <sec>               How late a note may land (default 0.1)
  --hands <hand>             Which hand: left, right, both
  --offset <sec>             Seconds of recording before the first beat

Replay options:
  --mode <mode>              Clock mode: practice (default), tempo
  --config <file.json>       Engine config file
  --hands <hand>             Which hand: left, right, both
  --verbose                  Print every session event
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "info":
      await cmdInfo(args.slice(1));
      break;
    case "groups":
      await cmdGroups(args.slice(1));
      break;
    case "grade":
      await cmdGrade(args.slice(1));
      break;
    case "replay":
      await cmdReplay(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      fail(`Unknown command: "${command}". Run 'keyline help' for usage.`);
  }
}

main().catch((err) => {
  console.error(`Error: ${describeError(err)}`);
  process.exit(1);
});
