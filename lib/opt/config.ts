import type { RosterShape } from "@/lib/opt/types";

// 10 active slots in display order; phase decides which signal fills them
export const DEFAULT_ROSTER_SHAPE: RosterShape = {
  active: [
    { slot: "C", accepts: ["C"], phase: "stable" },
    { slot: "C", accepts: ["C"], phase: "flex" },
    { slot: "PG", accepts: ["PG"], phase: "stable" },
    { slot: "SG", accepts: ["SG"], phase: "stable" },
    { slot: "G", accepts: ["PG", "SG", "G"], phase: "flex" },
    { slot: "SF", accepts: ["SF"], phase: "stable" },
    { slot: "PF", accepts: ["PF"], phase: "stable" },
    { slot: "F", accepts: ["SF", "PF", "F"], phase: "flex" },
    { slot: "UTIL", accepts: "any", phase: "flex" },
    { slot: "UTIL", accepts: "any", phase: "flex" },
  ],
  bench: 3,
  injured: 3,
};

export const DEFAULT_FUZZY_THRESHOLD = 90; // 0-100 ratio
export const DEFAULT_LOW_CONFIDENCE_RANK = 60; // ~replacement level, 12 teams
export const DEFAULT_UNTOUCHABLE_BONUS = 10_000; // must dominate any natural score spread
export const NO_RANK = 999;

export const FREE_AGENT_POOL_SIZE = 150;
export const DEFAULT_MAX_IL_SLOTS = 3;

// Free agents carrying these designations are never proposed
export const DISQUALIFY_STATUSES: ReadonlySet<string> = new Set(["INJ", "O", "NA", "SUSP", "IL"]);
// Roster players with these designations belong on IL
export const SHOULD_BE_ON_IL: ReadonlySet<string> = new Set(["INJ", "O"]);
export const HEALTHY_STATUSES: ReadonlySet<string> = new Set(["", "HEALTHY"]);

export const TARGET_BENCH_SHAPE = { G: 1, F: 1, C: 1 } as const;

export const DEFAULT_RUNS_DIR = "runs";
export const DEFAULT_SNAPSHOT_DIR = "fixtures/sample";
export const RUN_MODULE = "lineup";
