import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { loadSnapshot, SnapshotError } from "@/lib/ingest/snapshot";

const sampleDir = fileURLToPath(new URL("../../../fixtures/sample", import.meta.url));

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "hoops-snapshot-"));
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

const write = (name: string, body: string) => fs.writeFile(path.join(dir, name), body, "utf8");

describe("loadSnapshot", () => {
  it("loads the sample snapshot", async () => {
    const { snapshot, summary, errors } = await loadSnapshot(sampleDir);
    expect(errors).toEqual([]);
    expect([summary.rows_roster, summary.rows_scores, summary.rows_free_agents]).toEqual([14, 15, 5]);
    expect(snapshot.untouchableNames).toEqual(["Marcus Vale"]);
    expect(snapshot.gamesRemainingByTeam.NOP).toBe(3);
    expect(snapshot.teamsPlayingToday).toContain("NOP");
    expect(snapshot.freeAgentPlayers.map((p) => p.identity.displayName)).toEqual([
      "Gus Abernathy",
      "Ivo Petrenko",
      "Wes Dolan",
      "Milo Carver",
      "Reed Santos",
    ]);
  });

  it("runs on a roster alone", async () => {
    await write("roster.csv", "name,team,positions,slot\nTest Guard,BOS,PG,PG\n");
    const { snapshot } = await loadSnapshot(dir);
    expect(snapshot.rosterPlayers).toHaveLength(1);
    expect(snapshot.scoreRecords).toEqual([]);
    expect(snapshot.freeAgentPlayers).toEqual([]);
    expect(snapshot.gamesRemainingByTeam).toEqual({});
    expect(snapshot.untouchableNames).toEqual([]);
  });

  it("requires the roster", async () => {
    await expect(loadSnapshot(dir)).rejects.toBeInstanceOf(SnapshotError);
  });

  it("rejects an invalid schedule", async () => {
    await write("roster.csv", "name,team,positions\nTest Guard,BOS,PG\n");
    await write("schedule.json", JSON.stringify({ games_remaining: { BOS: -1 } }));
    await expect(loadSnapshot(dir)).rejects.toThrow(/^schedule\.json: games_remaining\.BOS: /);
  });

  it("rejects schedule JSON that does not parse", async () => {
    await write("roster.csv", "name,team,positions\nTest Guard,BOS,PG\n");
    await write("schedule.json", "{ nope");
    await expect(loadSnapshot(dir)).rejects.toThrow(/^schedule\.json: invalid JSON/);
  });

  it("ignores a malformed untouchables file", async () => {
    await write("roster.csv", "name,team,positions\nTest Guard,BOS,PG\n");
    await write("untouchables.json", JSON.stringify({ untouchables: "Test Guard" }));
    const { snapshot } = await loadSnapshot(dir);
    expect(snapshot.untouchableNames).toEqual([]);
  });

  it("reports dropped rows per file", async () => {
    await write("roster.csv", "name,team,positions\nTest Guard,BOS,PG\nNo Position,BOS,\n");
    const { errors, summary } = await loadSnapshot(dir);
    expect(summary.dropped_roster).toBe(1);
    expect(errors.map((e) => [e.file, e.row])).toEqual([["roster", 2]]);
  });
});
