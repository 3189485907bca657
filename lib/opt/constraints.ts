import type { Position } from "@/lib/domain/types";
import type { Phase, RosterShape, SlotRule } from "./types";

export function eligibleForSlot(p: { eligiblePositions: readonly Position[] }, rule: SlotRule): boolean {
  if (rule.accepts === "any") return true;
  const accepts = rule.accepts;
  return p.eligiblePositions.some((pos) => accepts.includes(pos));
}

function acceptedCount(rule: SlotRule): number {
  return rule.accepts === "any" ? Number.POSITIVE_INFINITY : new Set(rule.accepts).size;
}

/**
 * Most-restrictive-first fill order for one phase, derived from the shape.
 * Returns indexes into shape.active; ties keep display order.
 */
export function fillOrder(shape: RosterShape, phase: Phase): number[] {
  return shape.active
    .map((rule, index) => ({ rule, index }))
    .filter(({ rule }) => rule.phase === phase)
    .sort((a, b) => acceptedCount(a.rule) - acceptedCount(b.rule) || a.index - b.index)
    .map(({ index }) => index);
}
