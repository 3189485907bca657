import type { FreeAgentPlayer, Position, RosterPlayer, ScoreRecord } from "@/lib/domain/types";
import { makeIdentity } from "@/lib/match/normalize-name";

// In-memory player builders for specs

export type ScoreInit = { score?: number | null; rank30?: number | null; rank14?: number | null };

export function scoreRecord(name: string, s: ScoreInit = {}): ScoreRecord {
  return {
    identity: makeIdentity(name),
    categoryScore: s.score ?? null,
    rank30d: s.rank30 ?? null,
    rank14d: s.rank14 ?? null,
  };
}

export function rosterPlayer(
  name: string,
  positions: Position[],
  init: Partial<Omit<RosterPlayer, "identity" | "eligiblePositions">> & { scores?: ScoreInit } = {}
): RosterPlayer {
  const { scores, ...rest } = init;
  return {
    identity: makeIdentity(name),
    team: "BOS",
    eligiblePositions: positions,
    currentStatus: "active",
    isUntouchable: false,
    ...rest,
    ...(scores ? { scoreRecord: scoreRecord(name, scores) } : {}),
  };
}

export function freeAgent(
  name: string,
  positions: Position[],
  init: Partial<Omit<FreeAgentPlayer, "identity" | "eligiblePositions">> & { scores?: ScoreInit } = {}
): FreeAgentPlayer {
  const { scores, ...rest } = init;
  return {
    identity: makeIdentity(name),
    team: "LAL",
    eligiblePositions: positions,
    platformRank: 100,
    gamesRemainingThisWeek: 3,
    ...rest,
    ...(scores ? { scoreRecord: scoreRecord(name, scores) } : {}),
  };
}
