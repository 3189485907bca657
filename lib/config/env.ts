import { z } from "zod";
import {
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_LOW_CONFIDENCE_RANK,
  DEFAULT_MAX_IL_SLOTS,
  DEFAULT_RUNS_DIR,
  DEFAULT_SNAPSHOT_DIR,
  DEFAULT_UNTOUCHABLE_BONUS,
  FREE_AGENT_POOL_SIZE,
} from "@/lib/opt/config";

// Empty strings count as unset so `HOOPS_X=` in a shell falls back to the default
const blankToUndef = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  HOOPS_SNAPSHOT_DIR: z.preprocess(blankToUndef, z.string().default(DEFAULT_SNAPSHOT_DIR)),
  HOOPS_RUNS_DIR: z.preprocess(blankToUndef, z.string().default(DEFAULT_RUNS_DIR)),
  HOOPS_FUZZY_THRESHOLD: z.preprocess(
    blankToUndef,
    z.coerce.number().int().min(0).max(100).default(DEFAULT_FUZZY_THRESHOLD)
  ),
  HOOPS_LOW_CONFIDENCE_RANK: z.preprocess(
    blankToUndef,
    z.coerce.number().int().positive().default(DEFAULT_LOW_CONFIDENCE_RANK)
  ),
  HOOPS_UNTOUCHABLE_BONUS: z.preprocess(
    blankToUndef,
    z.coerce.number().nonnegative().default(DEFAULT_UNTOUCHABLE_BONUS)
  ),
  HOOPS_FREE_AGENT_POOL: z.preprocess(
    blankToUndef,
    z.coerce.number().int().positive().default(FREE_AGENT_POOL_SIZE)
  ),
  HOOPS_MAX_IL_SLOTS: z.preprocess(
    blankToUndef,
    z.coerce.number().int().min(0).max(3).default(DEFAULT_MAX_IL_SLOTS)
  ),
});

export type AppConfig = {
  snapshotDir: string;
  runsDir: string;
  fuzzyThreshold: number;
  lowConfidenceRank: number;
  untouchableBonus: number;
  freeAgentPool: number;
  maxIlSlots: number;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${msg}`);
  }
  const c = parsed.data;
  return {
    snapshotDir: c.HOOPS_SNAPSHOT_DIR,
    runsDir: c.HOOPS_RUNS_DIR,
    fuzzyThreshold: c.HOOPS_FUZZY_THRESHOLD,
    lowConfidenceRank: c.HOOPS_LOW_CONFIDENCE_RANK,
    untouchableBonus: c.HOOPS_UNTOUCHABLE_BONUS,
    freeAgentPool: c.HOOPS_FREE_AGENT_POOL,
    maxIlSlots: c.HOOPS_MAX_IL_SLOTS,
  };
}
