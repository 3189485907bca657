import path from "path";
import { loadConfig } from "@/lib/config/env";
import { loadSnapshot } from "@/lib/ingest/snapshot";
import { RUN_MODULE } from "@/lib/opt/config";
import { runPipeline } from "@/lib/pipeline/run";
import { renderTextReport } from "@/lib/report/text";
import { saveRun, slateKeyFor } from "@/lib/runs/store";

// usage: tsx scripts/run-daily.ts [snapshotDir] [--no-save]
async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const args = process.argv.slice(2);
  const save = !args.includes("--no-save");
  const dirArg = args.find((a) => !a.startsWith("--"));
  const snapshotDir = path.resolve(process.cwd(), dirArg ?? config.snapshotDir);

  console.info(`[run-daily] Loading snapshot from ${snapshotDir}`);
  const { snapshot, summary, errors } = await loadSnapshot(snapshotDir, { poolSize: config.freeAgentPool });
  console.info(
    `[run-daily] Rows: scores=${summary.rows_scores} roster=${summary.rows_roster} free_agents=${summary.rows_free_agents}`
  );
  for (const e of errors.slice(0, 10)) console.warn(`[run-daily] ${e.file} row ${e.row}: ${e.message}`);

  const result = runPipeline(snapshot, {
    fuzzyThreshold: config.fuzzyThreshold,
    lowConfidenceRank: config.lowConfidenceRank,
    untouchableBonus: config.untouchableBonus,
    maxIlSlots: config.maxIlSlots,
  });

  const now = new Date();
  process.stdout.write(renderTextReport(result, { title: `Daily lineup report (${slateKeyFor(now)})` }));

  if (save) {
    await saveRun(result, { baseDir: path.resolve(process.cwd(), config.runsDir), module: RUN_MODULE, now });
  }
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((e) => {
    console.error(`[run-daily] FATAL`, e);
    process.exit(1);
  });
