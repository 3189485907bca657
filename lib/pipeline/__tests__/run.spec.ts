import { fileURLToPath } from "url";
import { describe, it, expect, beforeAll, vi } from "vitest";
import type { RunSnapshot } from "@/lib/domain/types";
import { loadSnapshot } from "@/lib/ingest/snapshot";
import { runPipeline } from "@/lib/pipeline/run";
import { rosterPlayer } from "@/lib/opt/fixtures";

const sampleDir = fileURLToPath(new URL("../../../fixtures/sample", import.meta.url));

let snapshot: RunSnapshot;

beforeAll(async () => {
  vi.spyOn(console, "info").mockImplementation(() => {});
  snapshot = (await loadSnapshot(sampleDir)).snapshot;
});

describe("runPipeline (sample snapshot)", () => {
  it("builds the lineup", () => {
    const { assignment } = runPipeline(snapshot);
    expect(assignment.active.map((e) => `${e.slot}:${e.player?.identity.displayName ?? "-"}`)).toEqual([
      "C:Kofi Mensah",
      "C:Luka Stanic",
      "PG:Marcus Vale",
      "SG:Theo Brandt",
      "G:Jalen Price-Moore",
      "SF:Andre Kowalski",
      "PF:Rafael Ito",
      "F:Samir Haddad",
      "UTIL:D.J. Ellery",
      "UTIL:Bo Lindqvist",
    ]);
    expect(assignment.bench.map((e) => e.player?.identity.displayName)).toEqual([
      "Trey Whitfield Jr.",
      "Owen Marsh",
    ]);
    expect(assignment.injured.map((e) => e.player?.identity.displayName)).toEqual(["Caleb Rhee", "Nate Ferris"]);
  });

  it("matches every score record", () => {
    const { match, unresolvedUntouchables } = runPipeline(snapshot);
    expect(match.matched).toBe(15);
    expect(match.byTier).toEqual({ exact: 15, fuzzy: 0, initial: 0 });
    expect(match.unscoredRoster).toEqual(["Owen Marsh", "Nate Ferris"]);
    expect(unresolvedUntouchables).toEqual([]);
  });

  it("proposes one swap per free agent", () => {
    const { swaps } = runPipeline(snapshot);
    expect(swaps.map((s) => [s.freeAgent.identity.displayName, s.replaces.identity.displayName, s.basis, s.valueDelta])).toEqual([
      ["Gus Abernathy", "Owen Marsh", "rank", 35],
      ["Ivo Petrenko", "Owen Marsh", "rank", 10],
    ]);
  });

  it("collects alerts", () => {
    const { alerts, benchShape } = runPipeline(snapshot);
    expect(benchShape.met).toBe(false);
    expect(alerts).toEqual([
      "Move Nate Ferris (bench) -> IL  [status: O]",
      "Activate Caleb Rhee from IL [status: healthy] - consider dropping Owen Marsh (no score)",
      "Bench shape target not met: G: 1/1 (OK) | F: 1/1 (OK) | C: 0/1 (NEED)",
      "Active players with NO game today: Rafael Ito, Samir Haddad",
    ]);
  });

  it("is deterministic", () => {
    const a = runPipeline(snapshot);
    const b = runPipeline(snapshot);
    expect(JSON.stringify(b.assignment)).toBe(JSON.stringify(a.assignment));
    expect(JSON.stringify(b.swaps)).toBe(JSON.stringify(a.swaps));
  });
});

describe("runPipeline (degraded input)", () => {
  it("runs with no scores, free agents or schedule", () => {
    const res = runPipeline({
      rosterPlayers: [rosterPlayer("Lone Guard", ["PG"], { platformRank: 10 })],
      freeAgentPlayers: [],
      scoreRecords: [],
      untouchableNames: ["Ghost Player"],
      gamesRemainingByTeam: {},
    });
    expect(res.assignment.active[2]?.player?.identity.displayName).toBe("Lone Guard");
    expect(res.swaps).toEqual([]);
    expect(res.alerts).toContain("Untouchable Ghost Player could not be matched to a roster player.");
    expect(res.alerts).toContain("No eligible player for slot(s): C, C, SG, G, SF, PF, F, UTIL, UTIL");
  });
});

describe("runPipeline (IL placement)", () => {
  it("keeps a hard-out player out of the lineup when an IL slot is free", () => {
    const res = runPipeline({
      rosterPlayers: [
        rosterPlayer("Out Star", ["PG"], { injuryStatus: "O", scores: { score: 9 } }),
        rosterPlayer("Healthy Guard", ["PG"], { scores: { score: 1 } }),
      ],
      freeAgentPlayers: [],
      scoreRecords: [],
      untouchableNames: [],
      gamesRemainingByTeam: {},
    });
    expect(res.assignment.active[2]?.player?.identity.displayName).toBe("Healthy Guard");
    expect(res.assignment.active[4]?.player).toBeNull();
    expect(res.assignment.injured.map((e) => e.player?.identity.displayName)).toEqual(["Out Star"]);
    expect(res.ilFlags.shouldMoveToIl.map((m) => m.name)).toEqual(["Out Star"]);
  });

  it("lets a hard-out player compete when the IL is full", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const res = runPipeline(
      {
        rosterPlayers: [
          rosterPlayer("Out Star", ["PG"], { injuryStatus: "O", scores: { score: 9 } }),
          rosterPlayer("Healthy Guard", ["PG"], { scores: { score: 1 } }),
          rosterPlayer("Injured Center", ["C"], { currentStatus: "IL", injuryStatus: "INJ" }),
        ],
        freeAgentPlayers: [],
        scoreRecords: [],
        untouchableNames: [],
        gamesRemainingByTeam: {},
      },
      { maxIlSlots: 1 }
    );
    expect(res.assignment.active[2]?.player?.identity.displayName).toBe("Out Star");
    expect(res.ilFlags.skipped).toEqual(["Out Star"]);
    expect(warn).toHaveBeenCalledWith("[il] IL is full (1/1), skipping: Out Star");
    warn.mockRestore();
  });

  it("caps IL placement at the configured IL slots", () => {
    const res = runPipeline(
      {
        rosterPlayers: [
          rosterPlayer("Lone Guard", ["PG"], { platformRank: 10 }),
          rosterPlayer("Hurt One", ["SF"], { currentStatus: "IL", injuryStatus: "INJ", platformRank: 20 }),
          rosterPlayer("Hurt Two", ["C"], { currentStatus: "IL", injuryStatus: "INJ", platformRank: 40 }),
        ],
        freeAgentPlayers: [],
        scoreRecords: [],
        untouchableNames: [],
        gamesRemainingByTeam: {},
      },
      { maxIlSlots: 1 }
    );
    expect(res.assignment.injured.map((e) => e.player?.identity.displayName)).toEqual(["Hurt One"]);
    expect(res.assignment.overflow.map((p) => p.identity.displayName)).toEqual(["Hurt Two"]);
    expect(res.alerts).toContain("No roster slot left for: Hurt Two");
  });
});
