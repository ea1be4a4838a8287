// ─── keyline ─────────────────────────────────────────────────────────────────
//
// Performance matching for keyboard practice: MusicXML in, MIDI input in,
// chord-by-chord feedback and a graded report out.
//
// Usage:
//   import { parseScoreFile, createPerformanceSession } from "keyline";
//
//   const session = createPerformanceSession({ config: { mode: "tempo" } });
//   session.load(await parseScoreFile("etude.musicxml"));
// ─────────────────────────────────────────────────────────────────────────────

// Score model
export {
  STEPS,
  DURATION_TYPES,
  BASE_BEATS,
  isStep,
  pitchToMidi,
  pitchFromMidi,
  pitchEquals,
  pitchName,
  midiNotesToNames,
  dotMultiplier,
  durationBeats,
  allNotes,
  noteMidi,
  scoreDurationSeconds,
  measureCount,
} from "./score/model.js";

export type {
  Step,
  Pitch,
  DurationType,
  Duration,
  Note,
  Measure,
  Staff,
  Score,
  NoteQueryOptions,
} from "./score/model.js";

// MusicXML
export { parseScore, parseScoreFile } from "./musicxml/parser.js";
export type { ParseOptions } from "./musicxml/parser.js";

// MIDI input
export { MidiStreamParser, decodeMessage, encodeEvent } from "./midi/stream.js";
export { EventQueue } from "./midi/queue.js";
export { InputDecoder } from "./midi/decoder.js";
export { createLoopbackSource } from "./midi/loopback.js";
export { readPerformance, readPerformanceFile, writePerformance } from "./midi/recording.js";

export type { InputDecoderOptions, EventCallback } from "./midi/decoder.js";
export type { LoopbackSource, LoopbackOptions } from "./midi/loopback.js";
export type { Performance, WriteOptions } from "./midi/recording.js";
export type {
  NoteOnEvent,
  NoteOffEvent,
  ControlChangeEvent,
  ProgramChangeEvent,
  PitchBendEvent,
  RawInputEvent,
  UnstampedEvent,
  MidiMessageListener,
  MidiInputSource,
} from "./midi/types.js";

// Grouping and sessions
export {
  SIMULTANEITY_EPSILON,
  RIGHT_HAND_STAFF,
  LEFT_HAND_STAFF,
  HAND_CHOICES,
  filterNotesByHands,
  handSelection,
  isHandChoice,
  buildGroups,
  countRequiredPitches,
} from "./practice/grouper.js";
export { createPerformanceSession, PerformanceSession } from "./practice/session.js";
export { PracticeRunner } from "./practice/runner.js";
export { replayPerformance, DEFAULT_REPLAY_STEP } from "./practice/replay.js";
export {
  createConsoleFeedback,
  createSilentFeedback,
  createRecordingFeedback,
  createCallbackFeedback,
  composeFeedback,
} from "./practice/feedback.js";

export type { HandSelection, HandChoice, NoteRecord, SimultaneityGroup } from "./practice/grouper.js";
export type { SessionState, SessionOptions, SessionSnapshot, GroupProgress } from "./practice/session.js";
export type { PracticeRunnerOptions } from "./practice/runner.js";
export type { ReplayOptions } from "./practice/replay.js";
export type {
  MistakeReason,
  SessionStats,
  SessionFeedback,
  FeedbackEvent,
  FeedbackCallbacks,
} from "./practice/feedback.js";

// Scoring
export { MATCH_SEARCH_WINDOW, buildExpectations, classifyTiming, NoteMatcher } from "./scoring/matcher.js";
export {
  MATCH_POINTS,
  scoreNote,
  gradeForAccuracy,
  calculateMetrics,
  gradePerformance,
  formatReport,
} from "./scoring/scorer.js";

export type { MatchClass, TimingClass, Expectation, NoteMatch, ExpectationOptions } from "./scoring/matcher.js";
export type { Grade, PerformanceMetrics, PerformanceGrade, GradeOptions } from "./scoring/scorer.js";

// Config
export {
  PRACTICE_MODES,
  EngineConfigSchema,
  TimingToleranceSchema,
  HandsSchema,
  validateEngineConfig,
  defaultEngineConfig,
} from "./config/schema.js";
export { resolveEngineConfig, loadEngineConfig, mergeConfig } from "./config/loader.js";
export type { EngineConfig, EngineConfigInput, PracticeMode, TimingTolerance } from "./config/schema.js";

// Errors
export {
  KeylineError,
  InvalidInputError,
  MalformedDocumentError,
  NotImplementedError,
  DeviceUnavailableError,
  ConfigError,
  describeError,
} from "./errors.js";
export type { ErrorCode, ConfigIssue } from "./errors.js";
