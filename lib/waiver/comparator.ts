import type { FreeAgentPlayer, RosterPlayer } from "@/lib/domain/types";
import { benchCategory } from "@/lib/opt/bench-shape";
import { DEFAULT_UNTOUCHABLE_BONUS, DISQUALIFY_STATUSES } from "@/lib/opt/config";
import { eligibleForSlot } from "@/lib/opt/constraints";
import type { Assignment, Slot, SlotEntry, SlotRule } from "@/lib/opt/types";
import { compareDisplayNames, computeValue, weeklyValue } from "@/lib/opt/value";

export type Swap = {
  freeAgent: FreeAgentPlayer;
  replaces: RosterPlayer;
  replaceSlot: Slot;
  basis: "weekly" | "rank";
  freeAgentWeeklyValue: number | null;
  valueDelta: number; // positive = free agent is better
};

export type UpgradeOptions = {
  gamesRemainingByTeam?: Record<string, number>;
  untouchableBonus?: number;
  dedupe?: boolean; // keep only the best swap per free agent
};

type Target = { entry: SlotEntry; player: RosterPlayer; rule: SlotRule | null };

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function fits(fa: FreeAgentPlayer, t: Target): boolean {
  if (t.rule) return eligibleForSlot(fa, t.rule);
  // bench: share a position or at least a bench category
  if (fa.eligiblePositions.some((p) => t.player.eligiblePositions.includes(p))) return true;
  const cat = benchCategory(fa.eligiblePositions);
  return cat !== null && cat === benchCategory(t.player.eligiblePositions);
}

function qualifies(fa: FreeAgentPlayer): boolean {
  const status = (fa.injuryStatus ?? "").toUpperCase();
  if (DISQUALIFY_STATUSES.has(status)) return false;
  // a net-negative free agent is never recommended, even over an unscored player
  const score = fa.scoreRecord?.categoryScore;
  return score == null || score >= 0;
}

/**
 * Upgrade swaps over bench players and low-confidence actives.
 *
 * Weekly value (score x games left) when both sides are scored, the 14-day
 * rank gap otherwise. Recommends only; the roster is not touched.
 */
export function findUpgrades(
  assignment: Assignment,
  bench: readonly SlotEntry[],
  freeAgents: readonly FreeAgentPlayer[],
  options: UpgradeOptions = {}
): Swap[] {
  const games = options.gamesRemainingByTeam ?? {};
  const bonus = options.untouchableBonus ?? DEFAULT_UNTOUCHABLE_BONUS;
  const dedupe = options.dedupe ?? true;

  const targets: Target[] = [];
  for (const entry of assignment.active) {
    if (entry.player && entry.lowConfidence) {
      targets.push({ entry, player: entry.player, rule: entry.rule });
    }
  }
  for (const entry of bench) {
    if (entry.player) targets.push({ entry, player: entry.player, rule: null });
  }

  const swaps: Swap[] = [];
  for (const fa of freeAgents) {
    if (!qualifies(fa)) continue;
    const faWeekly = weeklyValue(fa, fa.gamesRemainingThisWeek);
    const faRank = computeValue(fa, "flex").fallbackRank;

    for (const t of targets) {
      if (!fits(fa, t)) continue;
      const protectedBy = t.player.isUntouchable ? bonus : 0;
      const targetWeekly = weeklyValue(t.player, games[t.player.team] ?? 0);

      let delta: number;
      let basis: Swap["basis"];
      if (faWeekly !== null && targetWeekly !== null) {
        delta = faWeekly - targetWeekly - protectedBy;
        basis = "weekly";
      } else {
        delta = computeValue(t.player, "flex").fallbackRank - faRank - protectedBy;
        basis = "rank";
      }
      if (delta <= 0) continue;

      swaps.push({
        freeAgent: fa,
        replaces: t.player,
        replaceSlot: t.entry.slot,
        basis,
        freeAgentWeeklyValue: faWeekly === null ? null : round2(faWeekly),
        valueDelta: round2(delta),
      });
    }
  }

  swaps.sort(
    (a, b) =>
      b.valueDelta - a.valueDelta ||
      compareDisplayNames(a.freeAgent, b.freeAgent) ||
      compareDisplayNames(a.replaces, b.replaces)
  );
  if (!dedupe) return swaps;

  const seen = new Set<FreeAgentPlayer>();
  return swaps.filter((s) => {
    if (seen.has(s.freeAgent)) return false;
    seen.add(s.freeAgent);
    return true;
  });
}
