import { promises as fs } from "fs";
import path from "path";
import type { IngestSummary, RunSnapshot } from "@/lib/domain/types";
import { FREE_AGENT_POOL_SIZE } from "@/lib/opt/config";
import { parseFreeAgents, parseRoster, parseScores } from "./adapter";
import { normalizeTeam } from "./aliases";
import { ScheduleFileSchema, UntouchablesFileSchema } from "./schemas";

export class SnapshotError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`${path.basename(file)}: ${message}`);
    this.name = "SnapshotError";
    this.file = file;
  }
}

export const SNAPSHOT_FILES = {
  scores: "scores.csv",
  roster: "roster.csv",
  freeAgents: "free_agents.csv",
  untouchables: "untouchables.json",
  schedule: "schedule.json",
} as const;

export type IngestError = { file: keyof typeof SNAPSHOT_FILES; row: number; message: string };

async function readOptional(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

function readJson(file: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new SnapshotError(file, `invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
}

/**
 * Load a materialized snapshot directory. Only the roster is required; every
 * other input degrades to empty with a warning.
 */
export async function loadSnapshot(
  dir: string,
  opts: { poolSize?: number } = {}
): Promise<{ snapshot: RunSnapshot; summary: IngestSummary; errors: IngestError[] }> {
  const file = (k: keyof typeof SNAPSHOT_FILES) => path.join(dir, SNAPSHOT_FILES[k]);
  const errors: IngestError[] = [];

  let gamesRemainingByTeam: Record<string, number> = {};
  let teamsPlayingToday: string[] = [];
  const scheduleRaw = await readOptional(file("schedule"));
  if (scheduleRaw === null) {
    console.warn("[ingest] schedule.json not found, games remaining default to 0.");
  } else {
    const parsed = ScheduleFileSchema.safeParse(readJson(file("schedule"), scheduleRaw));
    if (!parsed.success) {
      throw new SnapshotError(file("schedule"), parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
    }
    gamesRemainingByTeam = Object.fromEntries(
      Object.entries(parsed.data.games_remaining).map(([team, n]) => [normalizeTeam(team), n])
    );
    teamsPlayingToday = parsed.data.teams_today.map(normalizeTeam);
  }

  const rosterRaw = await readOptional(file("roster"));
  if (rosterRaw === null) throw new SnapshotError(file("roster"), "roster file is required");
  const roster = parseRoster(rosterRaw, teamsPlayingToday);

  const scoresRaw = await readOptional(file("scores"));
  if (scoresRaw === null) console.warn("[ingest] scores.csv not found, every player falls back to ranks.");
  const scores = parseScores(scoresRaw ?? "name\n");

  const faRaw = await readOptional(file("freeAgents"));
  if (faRaw === null) console.warn("[ingest] free_agents.csv not found, no waiver scan.");
  const freeAgents = parseFreeAgents(faRaw ?? "name\n", gamesRemainingByTeam, opts.poolSize ?? FREE_AGENT_POOL_SIZE);

  let untouchableNames: string[] = [];
  const untouchRaw = await readOptional(file("untouchables"));
  if (untouchRaw !== null) {
    const parsed = UntouchablesFileSchema.safeParse(readJson(file("untouchables"), untouchRaw));
    if (parsed.success) {
      untouchableNames = parsed.data.untouchables.map((u) => u.name);
    } else {
      // weekly designation is optional; a broken file means none this run
      console.warn(`[ingest] untouchables.json unreadable, running without untouchables: ${parsed.error.message}`);
    }
  }

  for (const e of scores.report.errors) errors.push({ file: "scores", ...e });
  for (const e of roster.report.errors) errors.push({ file: "roster", ...e });
  for (const e of freeAgents.report.errors) errors.push({ file: "freeAgents", ...e });
  if (errors.length > 0) console.warn(`[ingest] ${errors.length} row(s) dropped.`);

  const summary: IngestSummary = {
    rows_scores: scores.report.rowCount,
    rows_roster: roster.report.rowCount,
    rows_free_agents: freeAgents.report.rowCount,
    dropped_scores: scores.report.droppedRows,
    dropped_roster: roster.report.droppedRows,
    dropped_free_agents: freeAgents.report.droppedRows,
    unknown_cols_scores: scores.report.unknownColumns,
    unknown_cols_roster: roster.report.unknownColumns,
    unknown_cols_free_agents: freeAgents.report.unknownColumns,
  };

  return {
    snapshot: {
      rosterPlayers: roster.items,
      freeAgentPlayers: freeAgents.items,
      scoreRecords: scores.items,
      untouchableNames,
      gamesRemainingByTeam,
      teamsPlayingToday,
    },
    summary,
    errors,
  };
}
