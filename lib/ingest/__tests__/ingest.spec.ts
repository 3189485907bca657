import { describe, it, expect } from "vitest";
import { parseFreeAgents, parseRoster, parseScores } from "@/lib/ingest/adapter";
import { normalizeTeam, splitPositions, statusFromSlot } from "@/lib/ingest/aliases";
import { attachScores, resolveUntouchables } from "@/lib/ingest/normalize";
import { rosterPlayer, freeAgent, scoreRecord } from "@/lib/opt/fixtures";

const scoresCsv = `Player,Team,9cat,30D Rank,14d rank,notes
Nikola Jokić,DEN,7.5,1,2,x
C.J. McCollum,NOP,na,40,,
,BOS,1,2,3,`;

const rosterCsv = `name,team,pos,slot,status,rank,game_today
Test Guard,gs,PG/SG,BN,,30,
Test Big,ny,C,IL,O,,no
Test Wing,bos,UTIL,SF,,,
`;

const freeAgentsCsv = `name,team,positions,platform_rank,games_remaining
FA One,LAL,PG,5,1
FA Two,MIA,SG,10,2
FA Three,CHI,SF,20,
`;

describe("aliases", () => {
  it("normalizes team codes and positions", () => {
    expect(normalizeTeam(" gs ")).toBe("GSW");
    expect(normalizeTeam("PHO")).toBe("PHX");
    expect(normalizeTeam("BOS")).toBe("BOS");
    expect(splitPositions("PG,SG,G,Util")).toEqual(["PG", "SG", "G"]);
    expect(splitPositions("sf/pf/sf")).toEqual(["SF", "PF"]);
    expect(splitPositions(null)).toEqual([]);
  });

  it("maps platform slots to roster status", () => {
    expect(statusFromSlot("IL+")).toBe("IL");
    expect(statusFromSlot("BN")).toBe("bench");
    expect(statusFromSlot(undefined)).toBe("bench");
    expect(statusFromSlot("UTIL")).toBe("active");
  });
});

describe("ingest pipeline", () => {
  it("parses score rows through header aliases", () => {
    const { items, report } = parseScores(scoresCsv);
    expect(report.rowCount).toBe(3);
    expect(report.droppedRows).toBe(1);
    expect(report.unknownColumns).toEqual(["notes"]);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]?.row).toBe(3);
    expect(report.errors[0]?.message).toMatch(/^name: /);
    expect(items.map((r) => [r.identity.normalizedKey, r.categoryScore, r.rank30d, r.rank14d])).toEqual([
      ["nikola jokic", 7.5, 1, 2],
      ["cj mccollum", null, 40, null],
    ]);
  });

  it("adapts roster rows and drops rows without a playable position", () => {
    const { items, report } = parseRoster(rosterCsv, ["GSW"]);
    expect(report.rowCount).toBe(3);
    expect(report.droppedRows).toBe(1);
    expect(report.errors).toEqual([{ row: 3, message: 'positions: no playable position in "UTIL"' }]);
    expect(items.map((p) => [p.team, p.eligiblePositions, p.currentStatus, p.platformRank, p.injuryStatus, p.hasGameToday])).toEqual([
      ["GSW", ["PG", "SG"], "bench", 30, null, true],
      ["NYK", ["C"], "IL", null, "O", false],
    ]);
  });

  it("caps free agents by platform rank and prefers schedule games", () => {
    const { items } = parseFreeAgents(freeAgentsCsv, { LAL: 4 }, 2);
    expect(items.map((p) => [p.identity.displayName, p.platformRank, p.gamesRemainingThisWeek])).toEqual([
      ["FA One", 5, 4],
      ["FA Two", 10, 2],
    ]);
  });
});

describe("attachScores", () => {
  it("gives a contested player to the stronger tier", () => {
    const claxton = rosterPlayer("Nicolas Claxton", ["C"]);
    const forward = freeAgent("Test Forward", ["PF"]);
    const weak = scoreRecord("Nic Claxton", { score: 1 });
    const strong = scoreRecord("Nicolas Claxton", { score: 2 });
    const fa = scoreRecord("Test Forward", { score: 3 });
    const nobody = scoreRecord("Nobody Here", { score: 4 });

    const { roster, freeAgents, report } = attachScores([weak, strong, fa, nobody], [claxton], [forward]);
    expect(roster[0]?.scoreRecord).toBe(strong);
    expect(freeAgents[0]?.scoreRecord).toBe(fa);
    expect(report).toEqual({
      matched: 2,
      total: 4,
      byTier: { exact: 2, fuzzy: 0, initial: 0 },
      unmatched: ["Nic Claxton", "Nobody Here"],
      unscoredRoster: [],
    });
    expect(claxton.scoreRecord).toBeUndefined();
  });

  it("flags untouchables and returns names that resolve to nobody", () => {
    const roster = [rosterPlayer("Nicolas Claxton", ["C"]), rosterPlayer("Test Guard", ["PG"])];
    const res = resolveUntouchables(["nicolas claxton", "Ghost Player"], roster);
    expect(res.roster.map((p) => p.isUntouchable)).toEqual([true, false]);
    expect(res.unresolved).toEqual(["Ghost Player"]);
    expect(roster[0]?.isUntouchable).toBe(false);
  });
});
