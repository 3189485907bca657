// Domain models shared by ingest, matching, optimizer and waiver layers

export type Position = "PG" | "SG" | "G" | "SF" | "PF" | "F" | "C";

export const POSITIONS: readonly Position[] = ["PG", "SG", "G", "SF", "PF", "F", "C"];

export type PlayerIdentity = {
  rawName: string; // as seen at the source
  normalizedKey: string;
  displayName: string;
};

export type ScoreRecord = {
  identity: PlayerIdentity;
  categoryScore: number | null; // 9-cat value, higher = better
  rank30d: number | null; // lower = better
  rank14d: number | null;
};

export type RosterStatus = "active" | "bench" | "IL";

export type RosterPlayer = {
  identity: PlayerIdentity;
  team: string; // 3-letter
  eligiblePositions: Position[];
  currentStatus: RosterStatus;
  isUntouchable: boolean;
  scoreRecord?: ScoreRecord;
  platformRank?: number | null;
  injuryStatus?: string | null; // platform designation: INJ, O, Q, DTD, ...
  hasGameToday?: boolean;
};

export type FreeAgentPlayer = {
  identity: PlayerIdentity;
  team: string;
  eligiblePositions: Position[];
  scoreRecord?: ScoreRecord;
  platformRank: number; // global average rank
  gamesRemainingThisWeek: number;
  injuryStatus?: string | null;
};

export type AnyPlayer = RosterPlayer | FreeAgentPlayer;

/** Per-run materialized inputs; everything the core reads. */
export type RunSnapshot = {
  rosterPlayers: RosterPlayer[];
  freeAgentPlayers: FreeAgentPlayer[];
  scoreRecords: ScoreRecord[];
  untouchableNames: string[];
  gamesRemainingByTeam: Record<string, number>;
  teamsPlayingToday?: string[];
};

export type IngestSummary = {
  rows_scores: number;
  rows_roster: number;
  rows_free_agents: number;
  dropped_scores: number;
  dropped_roster: number;
  dropped_free_agents: number;
  unknown_cols_scores: string[];
  unknown_cols_roster: string[];
  unknown_cols_free_agents: string[];
};
