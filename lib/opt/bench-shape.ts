import type { Position } from "@/lib/domain/types";
import { TARGET_BENCH_SHAPE } from "./config";
import type { SlotEntry } from "./types";

export type BenchCategory = keyof typeof TARGET_BENCH_SHAPE;

const CATEGORIES: readonly BenchCategory[] = ["G", "F", "C"];

/** Bench category by eligible positions; a center counts as C before anything else. */
export function benchCategory(positions: readonly Position[]): BenchCategory | null {
  if (positions.includes("C")) return "C";
  if (positions.some((p) => p === "SF" || p === "PF" || p === "F")) return "F";
  if (positions.some((p) => p === "PG" || p === "SG" || p === "G")) return "G";
  return null;
}

export type BenchShape = {
  actual: Record<BenchCategory, number>;
  met: boolean;
  description: string; // "G: 1/1 (OK) | F: 0/1 (NEED) | C: 2/1 (OK)"
};

export function checkBenchShape(bench: readonly SlotEntry[]): BenchShape {
  const actual: Record<BenchCategory, number> = { G: 0, F: 0, C: 0 };
  for (const e of bench) {
    if (!e.player) continue;
    const cat = benchCategory(e.player.eligiblePositions);
    if (cat) actual[cat] += 1;
  }

  const met = CATEGORIES.every((c) => actual[c] >= TARGET_BENCH_SHAPE[c]);
  const description = CATEGORIES.map((c) => {
    const want = TARGET_BENCH_SHAPE[c];
    return `${c}: ${actual[c]}/${want} (${actual[c] >= want ? "OK" : "NEED"})`;
  }).join(" | ");

  return { actual, met, description };
}
