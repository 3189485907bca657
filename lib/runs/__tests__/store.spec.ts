import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { rosterPlayer } from "@/lib/opt/fixtures";
import { runPipeline, type PipelineResult } from "@/lib/pipeline/run";
import { getRun, listRuns, saveRun, slateKeyFor } from "@/lib/runs/store";

let baseDir: string;
let result: PipelineResult;

beforeEach(async () => {
  baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "hoops-runs-"));
  vi.spyOn(console, "info").mockImplementation(() => {});
  result = runPipeline({
    rosterPlayers: [rosterPlayer("Test Guard", ["PG"], { platformRank: 10 })],
    freeAgentPlayers: [],
    scoreRecords: [],
    untouchableNames: [],
    gamesRemainingByTeam: {},
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(baseDir, { recursive: true, force: true });
});

describe("slateKeyFor", () => {
  it("formats New York wall-clock time", () => {
    expect(slateKeyFor(new Date("2020-01-15T17:04:05Z"))).toBe("20-01-15_120405");
    expect(slateKeyFor(new Date("2020-07-01T04:00:00Z"))).toBe("20-07-01_000000");
  });
});

describe("run store", () => {
  it("writes a run directory with all artifacts", async () => {
    const saved = await saveRun(result, { baseDir, module: "lineup", now: new Date("2020-01-15T17:04:05.123Z") });
    expect(saved.run_id).toBe("20200115T170405Z");
    expect(saved.slate_key).toBe("20-01-15_120405");
    expect(saved.path).toBe(path.join(baseDir, "20-01-15_120405", "lineup", "20200115T170405Z"));
    expect((await fs.readdir(saved.path)).sort()).toEqual(["assignment.csv", "result.json", "run_meta.json", "swaps.csv"]);

    const meta = JSON.parse(await fs.readFile(path.join(saved.path, "run_meta.json"), "utf8"));
    expect(meta.created_at).toBe("2020-01-15T17:04:05.123Z");
    expect(meta.summary).toEqual({ active: 1, bench: 0, injured: 0, swaps: 0, alerts: 2, matched: 0, score_records: 0 });

    const swaps = await fs.readFile(path.join(saved.path, "swaps.csv"), "utf8");
    expect(swaps).toBe("add,add_team,add_positions,drop,drop_slot,basis,add_weekly_value,delta\n");
  });

  it("lists runs newest first across slates", async () => {
    await saveRun(result, { baseDir, module: "lineup", now: new Date("2020-01-15T17:04:05Z") });
    await saveRun(result, { baseDir, module: "lineup", now: new Date("2020-07-01T12:00:00Z") });
    await fs.mkdir(path.join(baseDir, "20-07-01_080000", "lineup", "__tmp__partial"), { recursive: true });

    const runs = await listRuns(baseDir, "lineup");
    expect(runs.map((r) => [r.slate_key, r.run_id])).toEqual([
      ["20-07-01_080000", "20200701T120000Z"],
      ["20-01-15_120405", "20200115T170405Z"],
    ]);
    expect((await listRuns(baseDir, "lineup", "all", 1)).map((r) => r.run_id)).toEqual(["20200701T120000Z"]);
    expect((await listRuns(baseDir, "lineup", "20-01-15_120405")).map((r) => r.run_id)).toEqual(["20200115T170405Z"]);
    expect(await listRuns(baseDir, "other")).toEqual([]);
  });

  it("lists a run with unreadable metadata without its meta", async () => {
    const runDir = path.join(baseDir, "slate", "lineup", "broken");
    await fs.mkdir(runDir, { recursive: true });
    await fs.writeFile(path.join(runDir, "run_meta.json"), "{ nope", "utf8");
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const runs = await listRuns(baseDir, "lineup", "slate");
    expect(runs).toHaveLength(1);
    expect(runs[0]?.run_id).toBe("broken");
    expect(runs[0]?.meta).toBeUndefined();
  });

  it("skips entries that cannot be stat'ed", async () => {
    const saved = await saveRun(result, { baseDir, module: "lineup", slate: "slate" });
    await fs.symlink(path.join(baseDir, "gone"), path.join(baseDir, "slate", "lineup", "dangling"));
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const runs = await listRuns(baseDir, "lineup", "slate");
    expect(runs.map((r) => r.run_id)).toEqual([saved.run_id]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("reads a saved run back", async () => {
    const saved = await saveRun(result, { baseDir, module: "lineup", slate: "manual" });
    const run = await getRun(baseDir, "manual", "lineup", saved.run_id);
    expect(run?.meta.run_id).toBe(saved.run_id);
    expect(run?.result).toEqual(JSON.parse(JSON.stringify(result)));
    expect(await getRun(baseDir, "manual", "lineup", "missing")).toBeNull();
  });

  it("returns nothing for a missing base directory", async () => {
    expect(await listRuns(path.join(baseDir, "nope"), "lineup")).toEqual([]);
  });
});
