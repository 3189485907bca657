import type { Position, RosterPlayer } from "@/lib/domain/types";

export type Phase = "stable" | "flex";

export type ActiveSlot = "PG" | "SG" | "SF" | "PF" | "C" | "G" | "F" | "UTIL";

export type Slot = ActiveSlot | "BN" | "IL";

export type SlotRule = {
  slot: ActiveSlot;
  accepts: readonly Position[] | "any";
  phase: Phase;
};

export type RosterShape = {
  active: readonly SlotRule[]; // display order
  bench: number;
  injured: number; // IL slots, 0-3
};

export type RankSource = "rank_30d" | "rank_14d" | "platform" | "none";

export type ComparableValue = {
  primary: number | null; // category score when known
  fallbackRank: number; // best-available rank for the phase
  rankSource: RankSource;
  bonus: number; // untouchable bonus, 0 otherwise
};

export type SlotEntry = {
  slot: Slot;
  phase: Phase | "bench" | "il";
  rule: SlotRule | null; // null for BN / IL
  player: RosterPlayer | null;
  value: ComparableValue | null;
  lowConfidence: boolean;
};

export type Assignment = {
  active: SlotEntry[]; // display order of the roster shape
  bench: SlotEntry[];
  injured: SlotEntry[];
  emptySlots: ActiveSlot[];
  overflow: RosterPlayer[]; // no bench/IL slot left
  lowConfidence: string[]; // display names
};

/** Decides which roster players belong in IL slots rather than the lineup. */
export type IlPolicy = (player: RosterPlayer) => boolean;

export type AssignOptions = {
  shape?: RosterShape;
  lowConfidenceRank?: number;
  untouchableBonus?: number;
  ilPolicy?: IlPolicy;
};
