import type { RosterPlayer } from "@/lib/domain/types";
import { DEFAULT_LOW_CONFIDENCE_RANK, DEFAULT_ROSTER_SHAPE } from "@/lib/opt/config";
import { eligibleForSlot, fillOrder } from "@/lib/opt/constraints";
import type {
  ActiveSlot,
  Assignment,
  AssignOptions,
  ComparableValue,
  IlPolicy,
  Phase,
  SlotEntry,
} from "@/lib/opt/types";
import { compareDisplayNames, compareValues, computeValue } from "@/lib/opt/value";

type Scored = { player: RosterPlayer; stable: ComparableValue; flex: ComparableValue };

const onIlSlot: IlPolicy = (p) => p.currentStatus === "IL";

function byValueDesc(phase: Phase) {
  return (a: Scored, b: Scored): number =>
    compareValues(b[phase], a[phase]) || compareDisplayNames(a.player, b.player);
}

/**
 * Greedy two-phase slot assignment.
 *
 * Stable slots are filled on 30-day signals, flex slots on 14-day signals.
 * Within a phase the most restrictive slot goes first so that a player with
 * narrow eligibility is not stranded by a permissive slot taking them early.
 * Never throws: a slot with no eligible player is left empty and reported.
 */
export function assignSlots(roster: readonly RosterPlayer[], options: AssignOptions = {}): Assignment {
  const shape = options.shape ?? DEFAULT_ROSTER_SHAPE;
  const lowRank = options.lowConfidenceRank ?? DEFAULT_LOW_CONFIDENCE_RANK;
  const ilPolicy = options.ilPolicy ?? onIlSlot;
  const valueOpts = { untouchableBonus: options.untouchableBonus };

  const scored: Scored[] = roster.map((player) => ({
    player,
    stable: computeValue(player, "stable", valueOpts),
    flex: computeValue(player, "flex", valueOpts),
  }));
  const injured = scored.filter((s) => ilPolicy(s.player));
  const pool = scored.filter((s) => !ilPolicy(s.player));

  const active: SlotEntry[] = shape.active.map((rule) => ({
    slot: rule.slot,
    phase: rule.phase,
    rule,
    player: null,
    value: null,
    lowConfidence: false,
  }));
  const used = new Set<Scored>();

  for (const phase of ["stable", "flex"] as const) {
    for (const idx of fillOrder(shape, phase)) {
      const rule = shape.active[idx];
      const entry = active[idx];
      if (!rule || !entry) continue;
      const [choice] = pool
        .filter((s) => !used.has(s) && eligibleForSlot(s.player, rule))
        .sort(byValueDesc(phase));
      if (!choice) continue;
      used.add(choice);
      entry.player = choice.player;
      entry.value = choice[phase];
      entry.lowConfidence = phase === "stable" && choice.stable.fallbackRank > lowRank;
    }
  }

  const overflow: RosterPlayer[] = [];
  const place = (rest: Scored[], slot: "BN" | "IL", capacity: number): SlotEntry[] => {
    const sorted = rest.slice().sort(byValueDesc("stable"));
    for (const s of sorted.slice(capacity)) overflow.push(s.player);
    return sorted.slice(0, capacity).map((s) => ({
      slot,
      phase: slot === "BN" ? "bench" : "il",
      rule: null,
      player: s.player,
      value: s.stable,
      lowConfidence: false,
    }));
  };

  const bench = place(pool.filter((s) => !used.has(s)), "BN", shape.bench);
  const injuredEntries = place(injured, "IL", shape.injured);

  const emptySlots: ActiveSlot[] = [];
  const lowConfidence: string[] = [];
  shape.active.forEach((rule, i) => {
    const player = active[i]?.player;
    if (!player) emptySlots.push(rule.slot);
    else if (active[i]?.lowConfidence) lowConfidence.push(player.identity.displayName);
  });

  return { active, bench, injured: injuredEntries, emptySlots, overflow, lowConfidence };
}
