import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ResultStore } from "../hunt/resultStore";
import type { EggRecord, ReferenceDescription } from "../hunt/types";

export const RESULTS_FILE = "egg_hunt_results.json";

const recordSchema = z.object({
  memberId: z.string(),
  name: z.string(),
  factionId: z.string(),
  factionName: z.string(),
  reference: z.number(),
  current: z.number(),
  found: z.number(),
  status: z.enum(["ok", "failed", "exhausted", "no_baseline"]),
  attempts: z.number().int(),
}) satisfies z.ZodType<EggRecord>;

const referenceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("timestamp"), timestamp: z.number() }),
  z.object({ kind: z.literal("baseline"), file: z.string() }),
]);

const resultsSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  reference: referenceSchema,
  records: z.record(recordSchema),
});

export type ResultsSnapshot = z.infer<typeof resultsSchema>;

export function saveResultsSnapshot(
  filePath: string,
  store: ResultStore,
  reference: ReferenceDescription
): ResultsSnapshot {
  const snapshot: ResultsSnapshot = {
    version: 1,
    generatedAt: new Date().toISOString(),
    reference,
    records: store.toJSON(),
  };
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2), "utf8");
  return snapshot;
}

export function loadResultsSnapshot(filePath: string): ResultsSnapshot {
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed = resultsSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Not a results snapshot: ${filePath}\n${parsed.error.message}`);
  }
  return parsed.data;
}

export function snapshotStore(snapshot: ResultsSnapshot): ResultStore {
  return ResultStore.fromRecords(Object.values(snapshot.records));
}

/**
 * Egg counts of an earlier run, used as the reference point. Only records
 * whose current count was actually fetched count.
 */
export function baselineCounts(snapshot: ResultsSnapshot): Map<string, number> {
  const counts = new Map<string, number>();
  for (const r of Object.values(snapshot.records)) {
    if (r.status === "ok" || r.status === "no_baseline") counts.set(r.memberId, r.current);
  }
  return counts;
}

/** Most recent runs/<date>/egg_hunt_results.json under `runsDir`. */
export function latestResultsFile(runsDir: string): string {
  const dates = fs.existsSync(runsDir)
    ? fs
        .readdirSync(runsDir)
        .filter((d) => fs.existsSync(path.join(runsDir, d, RESULTS_FILE)))
        .sort()
    : [];

  if (dates.length === 0) {
    throw new Error(`No ${RESULTS_FILE} found under ${runsDir}`);
  }
  return path.join(runsDir, dates[dates.length - 1], RESULTS_FILE);
}
