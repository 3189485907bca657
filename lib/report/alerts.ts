import { summariseIlFlags, type IlFlags } from "@/lib/il/flags";
import type { BenchShape } from "@/lib/opt/bench-shape";
import type { Assignment, ComparableValue, RankSource } from "@/lib/opt/types";

const INJURED_ACTIVE = new Set(["INJ", "O", "Q", "DTD"]);
const HARD_OUT = new Set(["INJ", "O"]);

const RANK_LABEL: Record<Exclude<RankSource, "none">, string> = {
  rank_30d: "30-day rank",
  rank_14d: "14-day rank",
  platform: "platform rank",
};

function describeRank(v: ComparableValue): string {
  return v.rankSource === "none" ? "no rank" : `a ${RANK_LABEL[v.rankSource]} of ${v.fallbackRank}`;
}

export type AlertInputs = {
  assignment: Assignment;
  ilFlags: IlFlags;
  benchShape: BenchShape;
  unresolvedUntouchables: readonly string[];
  lowConfidenceRank: number;
};

/** Alert lines for the report, most actionable first. */
export function buildAlerts(inp: AlertInputs): string[] {
  const alerts: string[] = [...summariseIlFlags(inp.ilFlags)];
  const { assignment } = inp;

  for (const e of assignment.active) {
    const status = (e.player?.injuryStatus ?? "").toUpperCase();
    if (e.player && INJURED_ACTIVE.has(status)) {
      alerts.push(
        `${e.player.identity.displayName} is in active slot '${e.slot}' but has status '${status}' - consider sitting or moving to IL.`
      );
    }
  }

  for (const e of assignment.active) {
    if (e.player && e.lowConfidence && e.value) {
      alerts.push(
        `${e.player.identity.displayName} (slot ${e.slot}) has ${describeRank(e.value)} - outside top ${inp.lowConfidenceRank}.`
      );
    }
  }

  if (assignment.emptySlots.length > 0) {
    alerts.push(`No eligible player for slot(s): ${assignment.emptySlots.join(", ")}`);
  }
  if (assignment.overflow.length > 0) {
    alerts.push(`No roster slot left for: ${assignment.overflow.map((p) => p.identity.displayName).join(", ")}`);
  }

  if (!inp.benchShape.met) alerts.push(`Bench shape target not met: ${inp.benchShape.description}`);

  const idle = assignment.active.flatMap((e) =>
    e.player && e.player.hasGameToday === false && !HARD_OUT.has((e.player.injuryStatus ?? "").toUpperCase())
      ? [e.player.identity.displayName]
      : []
  );
  if (idle.length > 0) alerts.push(`Active players with NO game today: ${idle.join(", ")}`);

  for (const name of inp.unresolvedUntouchables) {
    alerts.push(`Untouchable ${name} could not be matched to a roster player.`);
  }

  return alerts;
}
