import { z } from "zod";

// Common alias maps for CSV headers (lowercased)
export const SCORE_ALIASES: Record<string, keyof z.infer<typeof ScoreCsvSchema>> = {
  name: "name",
  player: "name",
  player_name: "name",
  team: "team",
  value: "value",
  score: "value",
  cat_value: "value",
  "9cat": "value",
  rank_30d: "rank_30d",
  rank30: "rank_30d",
  "30d rank": "rank_30d",
  rank_14d: "rank_14d",
  rank14: "rank_14d",
  "14d rank": "rank_14d",
};

export const ROSTER_ALIASES: Record<string, keyof z.infer<typeof RosterCsvSchema>> = {
  name: "name",
  player: "name",
  player_name: "name",
  team: "team",
  team_abbr: "team",
  positions: "positions",
  eligible_positions: "positions",
  pos: "positions",
  slot: "slot",
  current_slot: "slot",
  status: "status",
  injury_status: "status",
  platform_rank: "platform_rank",
  rank: "platform_rank",
  game_today: "game_today",
  has_game_today: "game_today",
};

export const FREE_AGENT_ALIASES: Record<string, keyof z.infer<typeof FreeAgentCsvSchema>> = {
  name: "name",
  player: "name",
  player_name: "name",
  team: "team",
  team_abbr: "team",
  positions: "positions",
  eligible_positions: "positions",
  pos: "positions",
  platform_rank: "platform_rank",
  rank: "platform_rank",
  status: "status",
  injury_status: "status",
  games_remaining: "games_remaining",
};

// Helpers
const toStr = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1));

const toNum = z
  .union([z.number(), z.string()])
  .transform((v) => (typeof v === "number" ? v : Number(String(v).trim())))
  .pipe(z.number().finite());

const toOptNum = z
  .union([z.number(), z.string()])
  .transform((v) => {
    const s = String(v).trim();
    if (s === "" || s.toLowerCase() === "na" || s === "-") return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  })
  .nullable()
  .optional();

const toOptStr = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim();
    return s === "" ? null : s;
  })
  .nullable()
  .optional();

const toOptBool = z
  .union([z.boolean(), z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (typeof v === "boolean") return v;
    const s = String(v ?? "").trim().toLowerCase();
    if (s === "") return null;
    return s === "true" || s === "y" || s === "yes" || s === "1";
  })
  .nullable()
  .optional();

// Row schemas for CSV after aliasing
export const ScoreCsvSchema = z.object({
  name: toStr,
  team: toOptStr,
  value: toOptNum,
  rank_30d: toOptNum,
  rank_14d: toOptNum,
});

export type ScoreCsv = z.infer<typeof ScoreCsvSchema>;

export const RosterCsvSchema = z.object({
  name: toStr,
  team: toStr.transform((s) => s.toUpperCase()),
  positions: toStr,
  slot: toOptStr,
  status: toOptStr,
  platform_rank: toOptNum,
  game_today: toOptBool,
});

export type RosterCsv = z.infer<typeof RosterCsvSchema>;

export const FreeAgentCsvSchema = z.object({
  name: toStr,
  team: toStr.transform((s) => s.toUpperCase()),
  positions: toStr,
  platform_rank: toNum,
  status: toOptStr,
  games_remaining: toOptNum,
});

export type FreeAgentCsv = z.infer<typeof FreeAgentCsvSchema>;

// JSON side files written by the weekly and schedule collaborators
export const UntouchablesFileSchema = z.object({
  untouchables: z.array(
    z.object({
      name: z.string().min(1),
      mvp_percent: z.number().optional(),
    })
  ),
});

export const ScheduleFileSchema = z.object({
  games_remaining: z.record(z.string(), z.number().int().nonnegative()).default({}),
  teams_today: z.array(z.string()).default([]),
});
