import type { AnyPlayer } from "@/lib/domain/types";
import { DEFAULT_UNTOUCHABLE_BONUS, NO_RANK } from "./config";
import type { ComparableValue, Phase, RankSource } from "./types";

export type ValueOptions = {
  untouchableBonus?: number;
};

function isUntouchable(p: AnyPlayer): boolean {
  return "isUntouchable" in p && p.isUntouchable;
}

function phaseRank(p: AnyPlayer, phase: Phase): { rank: number; source: RankSource } {
  const rec = p.scoreRecord;
  const windowed = phase === "stable" ? rec?.rank30d : rec?.rank14d;
  if (windowed != null) return { rank: windowed, source: phase === "stable" ? "rank_30d" : "rank_14d" };
  if (p.platformRank != null) return { rank: p.platformRank, source: "platform" };
  return { rank: NO_RANK, source: "none" };
}

/**
 * Category score first, then the phase's time-windowed rank, then the
 * platform's global rank. Ranks are negated so higher is always better.
 */
export function computeValue(p: AnyPlayer, phase: Phase, opts: ValueOptions = {}): ComparableValue {
  const { rank, source } = phaseRank(p, phase);
  const score = p.scoreRecord?.categoryScore;
  return {
    primary: score ?? null,
    fallbackRank: rank,
    rankSource: source,
    bonus: isUntouchable(p) ? opts.untouchableBonus ?? DEFAULT_UNTOUCHABLE_BONUS : 0,
  };
}

export function valueMagnitude(v: ComparableValue): number {
  return (v.primary ?? -v.fallbackRank) + v.bonus;
}

/** Positive when a outranks b. */
export function compareValues(a: ComparableValue, b: ComparableValue): number {
  return valueMagnitude(a) - valueMagnitude(b);
}

/** Category score scaled by remaining games; null when unscored. */
export function weeklyValue(p: AnyPlayer, gamesRemaining: number): number | null {
  const score = p.scoreRecord?.categoryScore;
  if (score == null) return null;
  return score * Math.max(0, gamesRemaining);
}

/** Code-point order on display names, the tie-break everywhere values are equal. */
export function compareDisplayNames(a: { identity: { displayName: string } }, b: { identity: { displayName: string } }): number {
  const an = a.identity.displayName;
  const bn = b.identity.displayName;
  return an < bn ? -1 : an > bn ? 1 : 0;
}
