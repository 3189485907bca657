/**
 * Cross-source player identification.
 *
 * Resolves a name from the scoring source against the platform pool in three
 * tiers (exact key, fuzzy ratio, last name + first initial). A tier only
 * matches on a single candidate. Duplicate exact keys fall through to the
 * fuzzy tier; a fuzzy tie is final and never reaches the initial tier.
 */

import { DEFAULT_FUZZY_THRESHOLD } from "@/lib/opt/config";
import { InvalidNameError, lastNameFirstInitial, normalizeName } from "./normalize-name";
import { similarityRatio } from "./ratio";

export type Named = { identity: { displayName: string } };

export type MatchTier = "exact" | "fuzzy" | "initial";

export type NoMatch = {
  kind: "none";
  reason: "invalid-name" | "no-candidate" | "ambiguous";
};
export type ExactMatch<T> = { kind: "exact"; player: T };
export type FuzzyMatch<T> = { kind: "fuzzy"; player: T; ratio: number };
export type InitialMatch<T> = { kind: "initial"; player: T };

export type MatchResult<T> = NoMatch | ExactMatch<T> | FuzzyMatch<T> | InitialMatch<T>;

export type MatchOptions = {
  fuzzyThreshold?: number; // 0-100
};

export const TIER_STRENGTH: Record<MatchTier, number> = { exact: 3, fuzzy: 2, initial: 1 };

type Keyed<T> = { player: T; key: string };

function keyOf(name: string): string | null {
  try {
    return normalizeName(name);
  } catch (e) {
    if (e instanceof InvalidNameError) return null;
    throw e;
  }
}

function keyedPool<T extends Named>(pool: readonly T[]): Keyed<T>[] {
  const out: Keyed<T>[] = [];
  for (const player of pool) {
    const key = keyOf(player.identity.displayName);
    if (key !== null) out.push({ player, key });
  }
  return out;
}

export function matchPlayer<T extends Named>(
  sourceName: string,
  pool: readonly T[],
  options: MatchOptions = {}
): MatchResult<T> {
  const threshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD;
  const sourceKey = keyOf(sourceName);
  if (sourceKey === null) return { kind: "none", reason: "invalid-name" };

  const candidates = keyedPool(pool);
  if (candidates.length === 0) return { kind: "none", reason: "no-candidate" };
  let ambiguous = false;

  // Tier 1: exact normalized key
  const exact = candidates.filter((c) => c.key === sourceKey);
  if (exact.length === 1 && exact[0]) return { kind: "exact", player: exact[0].player };
  if (exact.length > 1) ambiguous = true;

  // Tier 2: fuzzy ratio, unique candidate at or above threshold
  const fuzzy = candidates
    .map((c) => ({ c, ratio: similarityRatio(sourceKey, c.key) }))
    .filter((x) => x.ratio >= threshold);
  if (fuzzy.length === 1 && fuzzy[0]) {
    return { kind: "fuzzy", player: fuzzy[0].c.player, ratio: fuzzy[0].ratio };
  }
  if (fuzzy.length > 1) return { kind: "none", reason: "ambiguous" };

  // Tier 3: last name + first initial
  const lnfi = lastNameFirstInitial(sourceName);
  if (lnfi) {
    const initial = candidates.filter((c) => {
      const other = lastNameFirstInitial(c.player.identity.displayName);
      return other !== null && other.last === lnfi.last && other.initial === lnfi.initial;
    });
    if (initial.length === 1 && initial[0]) return { kind: "initial", player: initial[0].player };
    if (initial.length > 1) ambiguous = true;
  }

  return { kind: "none", reason: ambiguous ? "ambiguous" : "no-candidate" };
}

export function isMatch<T>(r: MatchResult<T>): r is ExactMatch<T> | FuzzyMatch<T> | InitialMatch<T> {
  return r.kind !== "none";
}
