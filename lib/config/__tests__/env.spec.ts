import { describe, it, expect } from "vitest";
import { loadConfig } from "@/lib/config/env";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      snapshotDir: "fixtures/sample",
      runsDir: "runs",
      fuzzyThreshold: 90,
      lowConfidenceRank: 60,
      untouchableBonus: 10_000,
      freeAgentPool: 150,
      maxIlSlots: 3,
    });
  });

  it("reads overrides and treats blanks as unset", () => {
    const cfg = loadConfig({
      HOOPS_SNAPSHOT_DIR: "/tmp/snap",
      HOOPS_FUZZY_THRESHOLD: "85",
      HOOPS_MAX_IL_SLOTS: "2",
      HOOPS_RUNS_DIR: "  ",
    });
    expect(cfg.snapshotDir).toBe("/tmp/snap");
    expect(cfg.fuzzyThreshold).toBe(85);
    expect(cfg.maxIlSlots).toBe(2);
    expect(cfg.runsDir).toBe("runs");
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ HOOPS_FUZZY_THRESHOLD: "120" })).toThrow(/^Invalid configuration: HOOPS_FUZZY_THRESHOLD: /);
    expect(() => loadConfig({ HOOPS_MAX_IL_SLOTS: "many" })).toThrow(/Invalid configuration/);
  });
});
