import type { PipelineResult } from "@/lib/pipeline/run";
import type { SlotEntry } from "@/lib/opt/types";

function fmtScore(n: number | null | undefined): string {
  return n == null ? "-" : n.toFixed(2);
}

function entryLine(e: SlotEntry): string {
  const slot = e.slot.padEnd(4);
  if (!e.player) return `  ${slot} (empty)`;
  const p = e.player;
  const tags: string[] = [];
  if (p.isUntouchable) tags.push("untouchable");
  if (e.lowConfidence) tags.push("low confidence");
  if (p.injuryStatus) tags.push(p.injuryStatus.toUpperCase());
  const rank = e.value ? `${e.value.rankSource} ${e.value.fallbackRank}` : "-";
  const suffix = tags.length > 0 ? `  [${tags.join(", ")}]` : "";
  return `  ${slot} ${p.identity.displayName} (${p.team} ${p.eligiblePositions.join("/")})  score ${fmtScore(e.value?.primary)}  ${rank}${suffix}`;
}

/** Plain-text daily report: alerts, lineup, bench/IL, waiver upgrades, match stats. */
export function renderTextReport(result: PipelineResult, opts: { title?: string } = {}): string {
  const out: string[] = [];
  out.push(opts.title ?? "Daily lineup report");
  out.push("");

  out.push("ALERTS");
  if (result.alerts.length === 0) out.push("  none");
  for (const a of result.alerts) out.push(`  ! ${a}`);
  out.push("");

  out.push("LINEUP");
  for (const e of result.assignment.active) out.push(entryLine(e));
  out.push("");

  out.push("BENCH");
  if (result.assignment.bench.length === 0) out.push("  none");
  for (const e of result.assignment.bench) out.push(entryLine(e));
  out.push(`  shape: ${result.benchShape.description}`);
  out.push("");

  out.push("IL");
  if (result.assignment.injured.length === 0) out.push("  none");
  for (const e of result.assignment.injured) out.push(entryLine(e));
  out.push("");

  out.push("WAIVER UPGRADES");
  if (result.swaps.length === 0) out.push("  none");
  result.swaps.forEach((s, i) => {
    out.push(
      `  ${i + 1}. add ${s.freeAgent.identity.displayName} (${s.freeAgent.team}), drop ${s.replaces.identity.displayName} ` +
        `[${s.replaceSlot}]  +${s.valueDelta} (${s.basis})`
    );
  });
  out.push("");

  const m = result.match;
  out.push(
    `MATCHING  ${m.matched}/${m.total} score records (exact ${m.byTier.exact}, fuzzy ${m.byTier.fuzzy}, initial ${m.byTier.initial})`
  );
  if (m.unscoredRoster.length > 0) out.push(`  unscored roster: ${m.unscoredRoster.join(", ")}`);

  return out.join("\n") + "\n";
}
