import type { FreeAgentPlayer, RosterPlayer, ScoreRecord } from "@/lib/domain/types";
import { InvalidNameError, makeIdentity } from "@/lib/match/normalize-name";
import { FREE_AGENT_POOL_SIZE } from "@/lib/opt/config";
import { normalizeTeam, splitPositions, statusFromSlot } from "./aliases";
import { parseCsv, type ParseReport } from "./parse";
import {
  FREE_AGENT_ALIASES,
  FreeAgentCsvSchema,
  ROSTER_ALIASES,
  RosterCsvSchema,
  SCORE_ALIASES,
  ScoreCsvSchema,
  type FreeAgentCsv,
  type RosterCsv,
  type ScoreCsv,
} from "./schemas";

export type Adapted<T> = {
  items: T[];
  report: ParseReport<unknown>;
};

type RowError = { row: number; message: string };

// An InvalidNameError drops one record, never the file
function identityOr(name: string, row: number, errors: RowError[]) {
  try {
    return makeIdentity(name);
  } catch (e) {
    if (e instanceof InvalidNameError) {
      errors.push({ row, message: e.message });
      return null;
    }
    throw e;
  }
}

function withDropped<T>(rep: ParseReport<T>, extra: RowError[]): ParseReport<T> {
  return {
    ...rep,
    errors: [...rep.errors, ...extra],
    droppedRows: rep.droppedRows + extra.length,
  };
}

// ================= ADAPTERS (CSV → domain) =================

export function scoreRecordsFromRows(rows: ScoreCsv[]): { records: ScoreRecord[]; errors: RowError[] } {
  const errors: RowError[] = [];
  const records: ScoreRecord[] = [];
  rows.forEach((r, i) => {
    const identity = identityOr(r.name, i + 1, errors);
    if (!identity) return;
    records.push({
      identity,
      categoryScore: r.value ?? null,
      rank30d: r.rank_30d ?? null,
      rank14d: r.rank_14d ?? null,
    });
  });
  return { records, errors };
}

export function rosterPlayersFromRows(
  rows: RosterCsv[],
  teamsPlayingToday: readonly string[] = []
): { players: RosterPlayer[]; errors: RowError[] } {
  const errors: RowError[] = [];
  const players: RosterPlayer[] = [];
  const today = new Set(teamsPlayingToday.map(normalizeTeam));
  rows.forEach((r, i) => {
    const identity = identityOr(r.name, i + 1, errors);
    if (!identity) return;
    const eligiblePositions = splitPositions(r.positions);
    if (eligiblePositions.length === 0) {
      errors.push({ row: i + 1, message: `positions: no playable position in "${r.positions}"` });
      return;
    }
    const team = normalizeTeam(r.team);
    players.push({
      identity,
      team,
      eligiblePositions,
      currentStatus: statusFromSlot(r.slot),
      isUntouchable: false,
      platformRank: r.platform_rank ?? null,
      injuryStatus: r.status ?? null,
      hasGameToday: r.game_today ?? today.has(team),
    });
  });
  return { players, errors };
}

/** Free agents capped to the best `poolSize` by platform rank. */
export function freeAgentsFromRows(
  rows: FreeAgentCsv[],
  gamesRemainingByTeam: Record<string, number> = {},
  poolSize = FREE_AGENT_POOL_SIZE
): { players: FreeAgentPlayer[]; errors: RowError[] } {
  const errors: RowError[] = [];
  const players: FreeAgentPlayer[] = [];
  rows.forEach((r, i) => {
    const identity = identityOr(r.name, i + 1, errors);
    if (!identity) return;
    const eligiblePositions = splitPositions(r.positions);
    if (eligiblePositions.length === 0) {
      errors.push({ row: i + 1, message: `positions: no playable position in "${r.positions}"` });
      return;
    }
    const team = normalizeTeam(r.team);
    players.push({
      identity,
      team,
      eligiblePositions,
      platformRank: r.platform_rank,
      gamesRemainingThisWeek: gamesRemainingByTeam[team] ?? r.games_remaining ?? 0,
      injuryStatus: r.status ?? null,
    });
  });
  const capped = players
    .map((p, i) => ({ p, i }))
    .sort((a, b) => a.p.platformRank - b.p.platformRank || a.i - b.i)
    .slice(0, poolSize)
    .map(({ p }) => p);
  return { players: capped, errors };
}

export function parseScores(csv: string): Adapted<ScoreRecord> {
  const rep = parseCsv(csv, ScoreCsvSchema, SCORE_ALIASES);
  const { records, errors } = scoreRecordsFromRows(rep.rows);
  return { items: records, report: withDropped(rep, errors) };
}

export function parseRoster(csv: string, teamsPlayingToday: readonly string[] = []): Adapted<RosterPlayer> {
  const rep = parseCsv(csv, RosterCsvSchema, ROSTER_ALIASES);
  const { players, errors } = rosterPlayersFromRows(rep.rows, teamsPlayingToday);
  return { items: players, report: withDropped(rep, errors) };
}

export function parseFreeAgents(
  csv: string,
  gamesRemainingByTeam: Record<string, number> = {},
  poolSize = FREE_AGENT_POOL_SIZE
): Adapted<FreeAgentPlayer> {
  const rep = parseCsv(csv, FreeAgentCsvSchema, FREE_AGENT_ALIASES);
  const { players, errors } = freeAgentsFromRows(rep.rows, gamesRemainingByTeam, poolSize);
  return { items: players, report: withDropped(rep, errors) };
}
