import { promises as fs, type Stats } from "fs";
import path from "path";
import { z } from "zod";
import type { PipelineResult } from "@/lib/pipeline/run";
import { assignmentToCsv, swapsToCsv } from "@/lib/report/csv";

export const RunMetaSchema = z.object({
  run_id: z.string(),
  slate_key: z.string(),
  module: z.string(),
  created_at: z.string(),
  summary: z
    .object({
      active: z.number(),
      bench: z.number(),
      injured: z.number(),
      swaps: z.number(),
      alerts: z.number(),
      matched: z.number(),
      score_records: z.number(),
    })
    .optional(),
});

export type RunMeta = z.infer<typeof RunMetaSchema>;

export type RunListItem = {
  run_id: string;
  slate_key: string;
  module: string;
  created_at?: string;
  path: string;
  meta?: RunMeta;
};

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Slate key `yy-mm-dd_hhmmss` in New York time. */
export function slateKeyFor(date: Date = new Date()): string {
  try {
    const fmt = new Intl.DateTimeFormat("en-US", {
      timeZone: "America/New_York",
      year: "2-digit",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    const parts = Object.fromEntries(fmt.formatToParts(date).map((p) => [p.type, p.value]));
    const yy = String(parts.year).slice(-2);
    const mm = String(parts.month).padStart(2, "0");
    const dd = String(parts.day).padStart(2, "0");
    const hh = String(parts.hour).padStart(2, "0");
    const mi = String(parts.minute).padStart(2, "0");
    const ss = String(parts.second).padStart(2, "0");
    return `${yy}-${mm}-${dd}_${hh}${mi}${ss}`;
  } catch (e) {
    // runtimes built without full ICU have no America/New_York
    console.warn(`[runs] tz lookup failed, using local time: ${e instanceof Error ? e.message : String(e)}`);
    const yy = String(date.getFullYear()).slice(-2);
    return `${yy}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  }
}

function runIdFor(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
}

export type SaveRunOptions = {
  baseDir: string;
  module: string;
  slate?: string;
  now?: Date;
};

/**
 * Persist a run under `<baseDir>/<slate>/<module>/<run_id>/`. Files are
 * written into a `__tmp__` directory first and renamed into place, so a
 * listing never sees a half-written run.
 */
export async function saveRun(result: PipelineResult, opts: SaveRunOptions): Promise<RunListItem> {
  const now = opts.now ?? new Date();
  const slate = opts.slate ?? slateKeyFor(now);
  const runId = runIdFor(now);
  const moduleDir = path.join(opts.baseDir, slate, opts.module);
  const finalDir = path.join(moduleDir, runId);
  const tmpDir = path.join(moduleDir, `__tmp__${runId}`);

  const meta: RunMeta = {
    run_id: runId,
    slate_key: slate,
    module: opts.module,
    created_at: now.toISOString(),
    summary: {
      active: result.assignment.active.filter((e) => e.player).length,
      bench: result.assignment.bench.length,
      injured: result.assignment.injured.length,
      swaps: result.swaps.length,
      alerts: result.alerts.length,
      matched: result.match.matched,
      score_records: result.match.total,
    },
  };

  await fs.mkdir(tmpDir, { recursive: true });
  await fs.writeFile(path.join(tmpDir, "run_meta.json"), JSON.stringify(meta, null, 2) + "\n", "utf8");
  await fs.writeFile(path.join(tmpDir, "result.json"), JSON.stringify(result, null, 2) + "\n", "utf8");
  await fs.writeFile(path.join(tmpDir, "assignment.csv"), assignmentToCsv(result.assignment), "utf8");
  await fs.writeFile(path.join(tmpDir, "swaps.csv"), swapsToCsv(result.swaps), "utf8");
  await fs.rename(tmpDir, finalDir);

  console.info(`[runs] Saved ${opts.module} run ${runId} to ${finalDir}`);
  return { run_id: runId, slate_key: slate, module: opts.module, created_at: meta.created_at, path: finalDir, meta };
}

async function readMeta(runDir: string): Promise<RunMeta | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(path.join(runDir, "run_meta.json"), "utf8");
  } catch {
    return undefined;
  }
  try {
    const parsed = RunMetaSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch {
    console.warn(`[runs] unreadable run_meta.json in ${runDir}`);
    return undefined;
  }
}

// entries can vanish between readdir and stat
async function statOrNull(p: string): Promise<Stats | null> {
  try {
    return await fs.stat(p);
  } catch (e) {
    console.warn(`[runs] skipping ${p}: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

async function readDirOrEmpty(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch {
    return [];
  }
}

/** Runs for a module, newest first. `slate` of undefined or "all" scans every slate. */
export async function listRuns(
  baseDir: string,
  module: string,
  slate?: string,
  limit = 10
): Promise<RunListItem[]> {
  const slates =
    slate && slate.trim() !== "" && slate.toLowerCase() !== "all"
      ? [slate]
      : (await readDirOrEmpty(baseDir)).filter((d) => !d.startsWith("."));

  const rows: (RunListItem & { _ts: number })[] = [];
  for (const s of slates) {
    const base = path.join(baseDir, s, module);
    for (const name of await readDirOrEmpty(base)) {
      if (!name || name.startsWith("__tmp__")) continue;
      const runDir = path.join(base, name);
      const stat = await statOrNull(runDir);
      if (!stat?.isDirectory()) continue;
      const meta = await readMeta(runDir);
      let ts = stat.mtimeMs;
      if (meta) {
        const d = new Date(meta.created_at);
        if (!isNaN(d.getTime())) ts = d.getTime();
      }
      rows.push({ run_id: name, slate_key: s, module, created_at: meta?.created_at, path: runDir, meta, _ts: ts });
    }
  }
  rows.sort((a, b) => b._ts - a._ts || b.run_id.localeCompare(a.run_id));
  return (limit > 0 ? rows.slice(0, limit) : rows).map(({ _ts, ...r }) => r);
}

/** Load a saved run's metadata and raw result JSON. */
export async function getRun(
  baseDir: string,
  slate: string,
  module: string,
  runId: string
): Promise<{ meta: RunMeta; result: unknown } | null> {
  const dir = path.join(baseDir, slate, module, runId);
  const meta = await readMeta(dir);
  if (!meta) return null;
  const raw = await fs.readFile(path.join(dir, "result.json"), "utf8");
  return { meta, result: JSON.parse(raw) };
}
