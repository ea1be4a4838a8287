#!/usr/bin/env node
// ─── keyline: MCP Server ─────────────────────────────────────────────────────
//
// Exposes score inspection and performance grading as MCP tools. An LLM can
// read a score, list what must be played, grade a recorded take and replay
// it through a practice session.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   score_info          title, tempo, staves, measures and note count
//   list_groups         expectation groups (chords by onset) for a hand
//   grade_performance   offline report for a recorded take
//   replay_performance  session stats after replaying a take
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { allNotes, measureCount, midiNotesToNames, scoreDurationSeconds } from "./score/model.js";
import { parseScoreFile } from "./musicxml/parser.js";
import { readPerformanceFile } from "./midi/recording.js";
import { buildGroups, filterNotesByHands, handSelection, HAND_CHOICES } from "./practice/grouper.js";
import { replayPerformance } from "./practice/replay.js";
import { formatReport, gradePerformance } from "./scoring/scorer.js";
import { PRACTICE_MODES } from "./config/schema.js";
import { describeError } from "./errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function text(body: string): ToolResult {
  return { content: [{ type: "text", text: body }] };
}

function failure(err: unknown): ToolResult {
  return { content: [{ type: "text", text: `Error: ${describeError(err)}` }], isError: true };
}

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "keyline",
  version: "0.1.0",
});

// ─── Tool: score_info ───────────────────────────────────────────────────────

server.tool(
  "score_info",
  "Summarize a MusicXML score: title, composer, tempo, staves, measures, notes and duration.",
  {
    path: z.string().describe("Path to a partwise MusicXML file"),
  },
  async ({ path }) => {
    try {
      const score = await parseScoreFile(path);
      return text(
        [
          `# ${score.title ?? path}`,
          `**Composer:** ${score.composer ?? "Unknown"}`,
          `**Tempo:** ${score.tempo} BPM | **Divisions:** ${score.divisions}`,
          `**Staves:** ${score.staves.length} | **Measures:** ${measureCount(score)} | **Notes:** ${allNotes(score).length}`,
          `**Duration:** ~${scoreDurationSeconds(score).toFixed(1)}s`,
        ].join("\n")
      );
    } catch (err) {
      return failure(err);
    }
  }
);

// ─── Tool: list_groups ──────────────────────────────────────────────────────

server.tool(
  "list_groups",
  "List the expectation groups of a score: each onset with the pitches that must sound together.",
  {
    path: z.string().describe("Path to a partwise MusicXML file"),
    hands: z.enum(HAND_CHOICES).optional().describe("Which hand to include (default both)"),
  },
  async ({ path, hands }) => {
    try {
      const score = await parseScoreFile(path);
      const groups = buildGroups(filterNotesByHands(allNotes(score), handSelection(hands ?? "both")));
      const lines = groups.map(
        (g) => `${g.index + 1}. beat ${g.startBeatGlobal.toFixed(2)}: ${midiNotesToNames([...g.requiredPitches])}`
      );
      return text(`${groups.length} group(s):\n\n${lines.join("\n")}`);
    } catch (err) {
      return failure(err);
    }
  }
);

// ─── Tool: grade_performance ────────────────────────────────────────────────

server.tool(
  "grade_performance",
  "Grade a recorded MIDI take against a score: per-note timing classes, score and letter grade.",
  {
    scorePath: z.string().describe("Path to a partwise MusicXML file"),
    performancePath: z.string().describe("Path to a Standard MIDI File of the take"),
    earlySeconds: z.number().min(0).max(2).optional().describe("How early a note may land (default 0.1)"),
    lateSeconds: z.number().min(0).max(2).optional().describe("How late a note may land (default 0.1)"),
  },
  async ({ scorePath, performancePath, earlySeconds, lateSeconds }) => {
    try {
      const score = await parseScoreFile(scorePath);
      const take = await readPerformanceFile(performancePath);
      const { metrics, missed } = gradePerformance(score, take.events, { timing: { earlySeconds, lateSeconds } });

      const missedLines = missed
        .slice(0, 20)
        .map((e) => `- measure ${e.measureNumber}, ${e.expectedTime.toFixed(2)}s: ${midiNotesToNames([e.pitch])}`);
      const more = missed.length > 20 ? [`- … and ${missed.length - 20} more`] : [];

      return text(
        [formatReport(metrics), ...(missed.length > 0 ? ["", "Missed:", ...missedLines, ...more] : [])].join("\n")
      );
    } catch (err) {
      return failure(err);
    }
  }
);

// ─── Tool: replay_performance ───────────────────────────────────────────────

server.tool(
  "replay_performance",
  "Replay a recorded MIDI take through a practice session and report what the session saw.",
  {
    scorePath: z.string().describe("Path to a partwise MusicXML file"),
    performancePath: z.string().describe("Path to a Standard MIDI File of the take"),
    mode: z.enum(PRACTICE_MODES).optional().describe("practice waits at each group; tempo runs at score tempo"),
  },
  async ({ scorePath, performancePath, mode }) => {
    try {
      const score = await parseScoreFile(scorePath);
      const take = await readPerformanceFile(performancePath);
      const snapshot = await replayPerformance(score, take.events, { config: { mode } });
      const s = snapshot.stats;

      return text(
        [
          `**Mode:** ${snapshot.mode} | **State:** ${snapshot.state}`,
          `**Groups:** ${s.groupsSatisfied}/${snapshot.groupCount} played, ${s.groupsMissed} missed`,
          `**Notes:** ${s.correctNotes} correct, ${s.missedNotes} missed`,
          `**Mistakes:** ${s.mistakes} | **Hold breaks:** ${s.holdBreaks}`,
        ].join("\n")
      );
    } catch (err) {
      return failure(err);
    }
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("keyline MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
