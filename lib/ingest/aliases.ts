// Small alias maps for platform/source quirks and normalization helpers

import { POSITIONS, type Position } from "@/lib/domain/types";

export const TEAM_ALIASES: Record<string, string> = {
  NO: "NOP",
  NOP: "NOP",
  PHO: "PHX",
  PHX: "PHX",
  SA: "SAS",
  SAS: "SAS",
  GS: "GSW",
  NY: "NYK",
  BRK: "BKN",
  UTAH: "UTA",
  WSH: "WAS",
  CHO: "CHA",
};

export function normalizeTeam(team: string): string {
  const t = team.trim().toUpperCase();
  return TEAM_ALIASES[t] ?? t;
}

function isPosition(s: string): s is Position {
  return POSITIONS.some((p) => p === s);
}

/**
 * "PG,SG,G,Util" or "PG/SG" -> ["PG", "SG", "G"].
 * Slot-only labels (UTIL, BN, IL, IL+) are not positions and are dropped.
 */
export function splitPositions(pos: string | null | undefined): Position[] {
  if (!pos) return [];
  const out: Position[] = [];
  for (const part of String(pos).toUpperCase().split(/[\/ ,;]/)) {
    const s = part.trim();
    if (isPosition(s) && !out.includes(s)) out.push(s);
  }
  return out;
}

export type PlatformSlot = "active" | "bench" | "IL";

/** Platform roster slot label -> roster status. */
export function statusFromSlot(slot: string | null | undefined): PlatformSlot {
  const s = (slot ?? "").trim().toUpperCase();
  if (s === "IL" || s === "IL+") return "IL";
  if (s === "BN" || s === "") return "bench";
  return "active";
}
