import * as path from "node:path";
import { loadMemberSnapshot, memberSnapshotPath, saveMemberSnapshot } from "../cache/memberSnapshot";
import { RESULTS_FILE, saveResultsSnapshot } from "../cache/resultsSnapshot";
import type { FactionConfig } from "../config/factionKeys";
import { KeyRotator } from "../keys/keyRotator";
import { createLogger, type Logger } from "../log/logger";
import { writeReports, type ReportFiles } from "../report/writeReports";
import { TornRateLimitError } from "../scrape/http";
import { sleep as defaultSleep } from "../scrape/limiter";
import type { FactionMember, HuntApi } from "../scrape/tornApi";
import { runFetchWorker } from "./fetchWorker";
import { ResultStore } from "./resultStore";
import { describeReference, type MemberWorkItem, type RecordStatus, type ReferencePoint } from "./types";
import { runPool, WorkQueue } from "./workQueue";

export type HuntOptions = {
  factions: FactionConfig[];
  api: HuntApi;
  reference: ReferencePoint;
  membersDir: string;
  workers: number;
  pacingMs: number;
  backoffMs: number;
  maxAttempts: number;
  log?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type FactionSummary = {
  factionId: string;
  factionName: string;
  members: number;
  ok: number;
  failed: number;
  exhausted: number;
  noBaseline: number;
};

const SUMMARY_FIELD = {
  ok: "ok",
  failed: "failed",
  exhausted: "exhausted",
  no_baseline: "noBaseline",
} as const satisfies Record<RecordStatus, keyof FactionSummary>;

export type HuntResult = {
  store: ResultStore;
  factions: FactionSummary[];
};

export function buildKeyRotator(factions: FactionConfig[]): KeyRotator {
  const keys = new KeyRotator();
  for (const f of factions) {
    if (keys.has(f.factionId)) throw new Error(`Faction ${f.factionId} is configured more than once`);
    keys.register(f.factionId, f.keys);
  }
  return keys;
}

export type MemberRetry = {
  backoffMs: number;
  maxAttempts: number;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Members from the snapshot when one exists, otherwise from the API (and the
 * snapshot is written). A rate-limited call is retried on the next key after
 * a backoff, up to `maxAttempts` calls; any other failure yields no members.
 */
export async function resolveMembers(
  faction: FactionConfig,
  api: Pick<HuntApi, "factionMembers">,
  keys: KeyRotator,
  membersDir: string,
  log: Logger,
  retry: MemberRetry
): Promise<FactionMember[]> {
  const snapshot = loadMemberSnapshot(membersDir, faction.factionId);
  if (snapshot) {
    log.info(
      { factionId: faction.factionId, file: memberSnapshotPath(membersDir, faction.factionId) },
      `Loaded ${snapshot.members.length} members from snapshot`
    );
    return snapshot.members;
  }

  const sleep = retry.sleep ?? defaultSleep;
  log.info({ factionId: faction.factionId }, `Fetching members of ${faction.factionName}...`);

  for (let attempt = 1; ; attempt++) {
    let members: FactionMember[];
    try {
      members = await api.factionMembers(faction.factionId, keys.next(faction.factionId));
    } catch (err) {
      if (err instanceof TornRateLimitError && attempt < retry.maxAttempts) {
        log.warn(
          { factionId: faction.factionId, attempt, backoffMs: retry.backoffMs },
          "Rate limited fetching members, backing off before retry"
        );
        await sleep(retry.backoffMs);
        continue;
      }
      log.error({ factionId: faction.factionId, attempt, err }, `Failed to fetch members of ${faction.factionName}`);
      return [];
    }

    if (members.length === 0) {
      log.warn({ factionId: faction.factionId }, "Members response had no members");
      return members;
    }
    const file = saveMemberSnapshot(membersDir, faction.factionId, members);
    log.info({ factionId: faction.factionId, file }, `Fetched ${members.length} members`);
    return members;
  }
}

function summarize(faction: FactionConfig, members: FactionMember[], store: ResultStore): FactionSummary {
  const summary: FactionSummary = {
    factionId: faction.factionId,
    factionName: faction.factionName,
    members: members.length,
    ok: 0,
    failed: 0,
    exhausted: 0,
    noBaseline: 0,
  };
  for (const m of members) {
    const status = store.get(m.id)?.status;
    if (status) summary[SUMMARY_FIELD[status]]++;
  }
  return summary;
}

/** Factions one after another; members of a faction through a pool of workers. */
export async function runHunt(opts: HuntOptions): Promise<HuntResult> {
  const log = opts.log ?? createLogger("hunt");
  const keys = buildKeyRotator(opts.factions);
  const store = new ResultStore();
  const summaries: FactionSummary[] = [];

  for (const faction of opts.factions) {
    log.info(
      { factionId: faction.factionId, keys: keys.count(faction.factionId) },
      `Processing faction ${faction.factionName}`
    );

    const members = await resolveMembers(faction, opts.api, keys, opts.membersDir, log, {
      backoffMs: opts.backoffMs,
      maxAttempts: opts.maxAttempts,
      sleep: opts.sleep,
    });

    const queue = new WorkQueue<MemberWorkItem>();
    for (const m of members) {
      queue.enqueue({
        memberId: m.id,
        name: m.name,
        factionId: faction.factionId,
        factionName: faction.factionName,
        attempt: 1,
      });
    }

    await runPool(Math.min(opts.workers, Math.max(1, members.length)), (workerId) =>
      runFetchWorker(workerId, {
        queue,
        store,
        keys,
        api: opts.api,
        reference: opts.reference,
        log: log.child({ workerId }),
        pacingMs: opts.pacingMs,
        backoffMs: opts.backoffMs,
        maxAttempts: opts.maxAttempts,
        sleep: opts.sleep,
      })
    );
    await queue.join();

    const summary = summarize(faction, members, store);
    summaries.push(summary);
    log.info(summary, `Finished faction ${faction.factionName}`);
  }

  return { store, factions: summaries };
}

export type HuntReport = HuntResult & {
  resultsFile: string;
  reports: ReportFiles;
};

/** Full run: hunt, persist the results snapshot, write the reports. */
export async function huntAndReport(opts: HuntOptions & { outDir: string }): Promise<HuntReport> {
  const log = opts.log ?? createLogger("hunt");
  const result = await runHunt({ ...opts, log });

  const resultsFile = path.join(opts.outDir, RESULTS_FILE);
  saveResultsSnapshot(resultsFile, result.store, describeReference(opts.reference));
  log.info({ file: resultsFile, records: result.store.size }, "Saved results snapshot");

  const reports = writeReports(opts.outDir, result.store.values());
  log.info({ csv: reports.csv, factionCsvs: reports.factionCsvs.length }, "Wrote reports");

  return { ...result, resultsFile, reports };
}
