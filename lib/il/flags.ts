/**
 * Injury-list flags. Surfaces suggestions only; no roster move is made.
 */

import type { RosterPlayer } from "@/lib/domain/types";
import { DEFAULT_MAX_IL_SLOTS, HEALTHY_STATUSES, SHOULD_BE_ON_IL } from "@/lib/opt/config";
import type { SlotEntry } from "@/lib/opt/types";

export type MoveToIl = {
  name: string;
  status: string;
  currentStatus: RosterPlayer["currentStatus"];
  action: string;
};

export type DropCandidate = {
  name: string;
  categoryScore: number | null;
  rank14d: number | null;
  positionOverlap: boolean;
  reason: string;
};

export type ActivateFromIl = {
  name: string;
  action: string;
  dropCandidate: DropCandidate | null;
};

export type IlFlags = {
  shouldMoveToIl: MoveToIl[];
  shouldActivateFromIl: ActivateFromIl[];
  skipped: string[]; // would move to IL but no slot is free
};

const statusOf = (p: RosterPlayer) => (p.injuryStatus ?? "").toUpperCase();

/** Bench player to drop when someone returns from IL, or null. Untouchables are never dropped. */
export function recommendDropForActivation(
  returning: RosterPlayer,
  bench: readonly SlotEntry[]
): DropCandidate | null {
  const returningPositions = new Set(returning.eligiblePositions);
  const candidates = bench
    .flatMap((e) => (e.player && !e.player.isUntouchable ? [e.player] : []))
    .map((p) => {
      const score = p.scoreRecord?.categoryScore ?? null;
      const rank14d = p.scoreRecord?.rank14d ?? null;
      const overlap = p.eligiblePositions.some((pos) => returningPositions.has(pos));
      // lower = more droppable
      const key = (score ?? -999) - (overlap ? 0.5 : 0);
      return { p, score, rank14d, overlap, key };
    })
    .sort((a, b) => a.key - b.key || (b.rank14d ?? 0) - (a.rank14d ?? 0));

  const worst = candidates[0];
  if (!worst) return null;

  const reason: string[] = [worst.score === null ? "no score" : `score: ${worst.score.toFixed(1)}`];
  if (worst.rank14d) reason.push(`rank14: ${worst.rank14d}`);
  if (worst.overlap) reason.push("position overlap");

  return {
    name: worst.p.identity.displayName,
    categoryScore: worst.score,
    rank14d: worst.rank14d,
    positionOverlap: worst.overlap,
    reason: reason.join(", "),
  };
}

export type IlMovePlan = {
  moving: RosterPlayer[]; // fit in the free IL slots, in roster order
  skipped: RosterPlayer[];
  occupied: number;
};

/** Players whose status says IL but who are not on it, split by free IL capacity. */
export function planIlMoves(roster: readonly RosterPlayer[], maxIlSlots = DEFAULT_MAX_IL_SLOTS): IlMovePlan {
  const occupied = roster.filter((p) => p.currentStatus === "IL").length;
  const available = Math.max(0, maxIlSlots - occupied);
  const candidates = roster.filter((p) => p.currentStatus !== "IL" && SHOULD_BE_ON_IL.has(statusOf(p)));
  return { moving: candidates.slice(0, available), skipped: candidates.slice(available), occupied };
}

export function checkIlFlags(
  roster: readonly RosterPlayer[],
  opts: { bench?: readonly SlotEntry[]; maxIlSlots?: number } = {}
): IlFlags {
  const maxIl = opts.maxIlSlots ?? DEFAULT_MAX_IL_SLOTS;
  const plan = planIlMoves(roster, maxIl);

  const move: MoveToIl[] = plan.moving.map((p) => {
    const name = p.identity.displayName;
    const status = statusOf(p);
    return {
      name,
      status,
      currentStatus: p.currentStatus,
      action: `Move ${name} (${p.currentStatus}) -> IL  [status: ${status}]`,
    };
  });

  const activate: ActivateFromIl[] = [];
  for (const p of roster) {
    if (p.currentStatus !== "IL" || !HEALTHY_STATUSES.has(statusOf(p))) continue;
    const name = p.identity.displayName;
    const drop = opts.bench ? recommendDropForActivation(p, opts.bench) : null;
    let action = `Activate ${name} from IL [status: healthy]`;
    if (drop) action += ` - consider dropping ${drop.name} (${drop.reason})`;
    activate.push({ name, action, dropCandidate: drop });
  }

  const skipped = plan.skipped.map((p) => p.identity.displayName);
  if (skipped.length > 0) {
    console.warn(`[il] IL is full (${plan.occupied}/${maxIl}), skipping: ${skipped.join(", ")}`);
  }

  return { shouldMoveToIl: move, shouldActivateFromIl: activate, skipped };
}

export function summariseIlFlags(flags: IlFlags): string[] {
  return [...flags.shouldMoveToIl.map((m) => m.action), ...flags.shouldActivateFromIl.map((a) => a.action)];
}
