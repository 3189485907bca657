import type { RunSnapshot } from "@/lib/domain/types";
import { checkIlFlags, planIlMoves, type IlFlags } from "@/lib/il/flags";
import { attachScores, resolveUntouchables, type MatchReport } from "@/lib/ingest/normalize";
import { assignSlots } from "@/lib/opt/algorithms/slot-assigner";
import { checkBenchShape, type BenchShape } from "@/lib/opt/bench-shape";
import {
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_LOW_CONFIDENCE_RANK,
  DEFAULT_ROSTER_SHAPE,
  DEFAULT_UNTOUCHABLE_BONUS,
} from "@/lib/opt/config";
import type { Assignment, RosterShape } from "@/lib/opt/types";
import { buildAlerts } from "@/lib/report/alerts";
import { findUpgrades, type Swap } from "@/lib/waiver/comparator";

export type PipelineOptions = {
  fuzzyThreshold?: number;
  lowConfidenceRank?: number;
  untouchableBonus?: number;
  maxIlSlots?: number;
  shape?: RosterShape;
  dedupeSwaps?: boolean;
};

export type PipelineResult = {
  assignment: Assignment;
  swaps: Swap[];
  match: MatchReport;
  unresolvedUntouchables: string[];
  ilFlags: IlFlags;
  benchShape: BenchShape;
  alerts: string[];
};

/**
 * One synchronous pass: match -> value -> assign -> compare.
 * Every missing signal degrades to a fallback; nothing here aborts the run.
 */
export function runPipeline(snapshot: RunSnapshot, opts: PipelineOptions = {}): PipelineResult {
  const matchOpts = { fuzzyThreshold: opts.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD };
  const lowConfidenceRank = opts.lowConfidenceRank ?? DEFAULT_LOW_CONFIDENCE_RANK;
  const untouchableBonus = opts.untouchableBonus ?? DEFAULT_UNTOUCHABLE_BONUS;
  const baseShape = opts.shape ?? DEFAULT_ROSTER_SHAPE;
  const maxIlSlots = opts.maxIlSlots ?? baseShape.injured;
  const shape: RosterShape = { ...baseShape, injured: maxIlSlots };

  const scored = attachScores(
    snapshot.scoreRecords,
    snapshot.rosterPlayers,
    snapshot.freeAgentPlayers,
    matchOpts
  );
  const { roster, unresolved } = resolveUntouchables(snapshot.untouchableNames, scored.roster, matchOpts);

  // hard-out players with a free IL slot are placed there, not in the lineup
  const goingToIl = new Set(planIlMoves(roster, maxIlSlots).moving);
  const assignment = assignSlots(roster, {
    shape,
    lowConfidenceRank,
    untouchableBonus,
    ilPolicy: (p) => p.currentStatus === "IL" || goingToIl.has(p),
  });
  console.info(
    `[pipeline] Lineup built: ${assignment.active.filter((e) => e.player).length} active, ` +
      `${assignment.bench.length} bench, ${assignment.injured.length} IL.`
  );

  const swaps = findUpgrades(assignment, assignment.bench, scored.freeAgents, {
    gamesRemainingByTeam: snapshot.gamesRemainingByTeam,
    untouchableBonus,
    dedupe: opts.dedupeSwaps ?? true,
  });
  console.info(`[pipeline] ${swaps.length} waiver upgrade(s).`);

  const ilFlags = checkIlFlags(roster, { bench: assignment.bench, maxIlSlots });
  const benchShape = checkBenchShape(assignment.bench);
  const alerts = buildAlerts({
    assignment,
    ilFlags,
    benchShape,
    unresolvedUntouchables: unresolved,
    lowConfidenceRank,
  });

  return {
    assignment,
    swaps,
    match: scored.report,
    unresolvedUntouchables: unresolved,
    ilFlags,
    benchShape,
    alerts,
  };
}
