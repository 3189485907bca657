import type { AnyPlayer, FreeAgentPlayer, RosterPlayer, ScoreRecord } from "@/lib/domain/types";
import { isMatch, matchPlayer, TIER_STRENGTH, type MatchOptions, type MatchTier } from "@/lib/match/matcher";

export type MatchReport = {
  matched: number;
  total: number;
  byTier: Record<MatchTier, number>;
  unmatched: string[]; // source names, in source order
  unscoredRoster: string[]; // roster display names left without a record
};

type Claim = { record: ScoreRecord; tier: MatchTier };

/**
 * Attach score records to roster and free-agent players.
 *
 * Each source name is matched against the union pool. When two source names
 * land on the same player the stronger tier keeps it; the loser is unmatched.
 */
export function attachScores(
  records: readonly ScoreRecord[],
  roster: readonly RosterPlayer[],
  freeAgents: readonly FreeAgentPlayer[],
  opts: MatchOptions = {}
): { roster: RosterPlayer[]; freeAgents: FreeAgentPlayer[]; report: MatchReport } {
  const pool: AnyPlayer[] = [...roster, ...freeAgents];
  const claims = new Map<AnyPlayer, Claim>();
  const losers = new Set<ScoreRecord>();
  const noMatch = new Set<ScoreRecord>();

  for (const record of records) {
    const res = matchPlayer(record.identity.rawName, pool, opts);
    if (!isMatch(res)) {
      noMatch.add(record);
      continue;
    }
    const prev = claims.get(res.player);
    if (!prev) {
      claims.set(res.player, { record, tier: res.kind });
    } else if (TIER_STRENGTH[res.kind] > TIER_STRENGTH[prev.tier]) {
      losers.add(prev.record);
      claims.set(res.player, { record, tier: res.kind });
    } else {
      losers.add(record);
    }
  }

  const byTier: Record<MatchTier, number> = { exact: 0, fuzzy: 0, initial: 0 };
  for (const c of claims.values()) byTier[c.tier] += 1;

  const outRoster = roster.map((p) => {
    const c = claims.get(p);
    return c ? { ...p, scoreRecord: c.record } : p;
  });
  const outFreeAgents = freeAgents.map((p) => {
    const c = claims.get(p);
    return c ? { ...p, scoreRecord: c.record } : p;
  });

  const report: MatchReport = {
    matched: claims.size,
    total: records.length,
    byTier,
    unmatched: records.filter((r) => noMatch.has(r) || losers.has(r)).map((r) => r.identity.displayName),
    unscoredRoster: outRoster.filter((p) => !p.scoreRecord).map((p) => p.identity.displayName),
  };

  console.info(`[matcher] Matched ${report.matched} / ${report.total} score records.`);
  if (report.unmatched.length > 0) {
    console.debug(`[matcher] ${report.unmatched.length} unmatched, first: ${report.unmatched.slice(0, 15).join(", ")}`);
  }

  return { roster: outRoster, freeAgents: outFreeAgents, report };
}

/** Flag untouchables on the roster by name; names that resolve to nobody are returned. */
export function resolveUntouchables(
  names: readonly string[],
  roster: readonly RosterPlayer[],
  opts: MatchOptions = {}
): { roster: RosterPlayer[]; unresolved: string[] } {
  const flagged = new Set<RosterPlayer>();
  const unresolved: string[] = [];
  for (const name of names) {
    const res = matchPlayer(name, roster, opts);
    if (isMatch(res)) flagged.add(res.player);
    else unresolved.push(name);
  }
  if (unresolved.length > 0) {
    console.warn(`[matcher] Untouchables not on roster: ${unresolved.join(", ")}`);
  }
  return {
    roster: roster.map((p) => (flagged.has(p) ? { ...p, isUntouchable: true } : p)),
    unresolved,
  };
}
