import type { Logger } from "../log/logger";
import type { KeyRotator } from "../keys/keyRotator";
import { TornRateLimitError } from "../scrape/http";
import { sleep as defaultSleep } from "../scrape/limiter";
import type { HuntApi } from "../scrape/tornApi";
import type { ResultStore } from "./resultStore";
import { toEggRecord, type MemberWorkItem, type ReferencePoint } from "./types";
import type { WorkQueue } from "./workQueue";

export type FetchWorkerDeps = {
  queue: WorkQueue<MemberWorkItem>;
  store: ResultStore;
  keys: KeyRotator;
  api: Pick<HuntApi, "eggCount">;
  reference: ReferencePoint;
  log: Logger;
  pacingMs: number; // after every item
  backoffMs: number; // after a rate limit, before re-enqueueing
  maxAttempts: number;
  sleep?: (ms: number) => Promise<void>;
};

export type AttemptOutcome =
  | { state: "success"; reference: number; current: number }
  | { state: "no_baseline"; current: number }
  | { state: "rate_limited"; error: TornRateLimitError }
  | { state: "failed"; reference: number; current: number; error: unknown };

/**
 * One attempt at a member: reference count, then current count, both with
 * the same key. Never throws. In baseline mode a member the earlier run has
 * no count for only gets its current count fetched.
 */
export async function fetchMemberEggs(
  item: MemberWorkItem,
  deps: Pick<FetchWorkerDeps, "keys" | "api" | "reference">
): Promise<AttemptOutcome> {
  let reference = 0;
  let current = 0;

  try {
    const key = deps.keys.next(item.factionId);

    if (deps.reference.kind === "timestamp") {
      reference = await deps.api.eggCount(item.memberId, key, deps.reference.timestamp);
    } else {
      const baseline = deps.reference.counts.get(item.memberId);
      if (baseline === undefined) {
        current = await deps.api.eggCount(item.memberId, key);
        return { state: "no_baseline", current };
      }
      reference = baseline;
    }

    current = await deps.api.eggCount(item.memberId, key);

    return { state: "success", reference, current };
  } catch (error) {
    if (error instanceof TornRateLimitError) return { state: "rate_limited", error };
    return { state: "failed", reference, current, error };
  }
}

async function settle(item: MemberWorkItem, outcome: AttemptOutcome, deps: FetchWorkerDeps, sleep: (ms: number) => Promise<void>) {
  const { log, store, queue } = deps;
  const ctx = { memberId: item.memberId, factionId: item.factionId, attempt: item.attempt };

  switch (outcome.state) {
    case "success": {
      const record = toEggRecord(item, "ok", outcome.reference, outcome.current);
      store.set(record);
      log.info({ ...ctx, found: record.found }, `Fetched eggs for ${item.name}`);
      return;
    }

    case "no_baseline": {
      store.set(toEggRecord(item, "no_baseline", 0, outcome.current));
      log.warn({ ...ctx, current: outcome.current }, `No baseline count for ${item.name}, eggs found not counted`);
      return;
    }

    case "rate_limited": {
      if (item.attempt >= deps.maxAttempts) {
        store.set(toEggRecord(item, "exhausted", 0, 0));
        log.warn(ctx, `Still rate limited after ${item.attempt} attempts, giving up on ${item.name}`);
        return;
      }
      log.warn({ ...ctx, backoffMs: deps.backoffMs }, "Rate limited, backing off before retry");
      await sleep(deps.backoffMs);
      queue.enqueue({ ...item, attempt: item.attempt + 1 });
      return;
    }

    case "failed": {
      store.set(toEggRecord(item, "failed", outcome.reference, outcome.current));
      log.error({ ...ctx, err: outcome.error }, `Failed to fetch eggs for ${item.name}`);
      return;
    }
  }
}

/** Pull items until the queue is empty. */
export async function runFetchWorker(workerId: number, deps: FetchWorkerDeps): Promise<void> {
  const sleep = deps.sleep ?? defaultSleep;

  for (;;) {
    const item = deps.queue.dequeue();
    if (!item) break;

    try {
      const outcome = await fetchMemberEggs(item, deps);
      await settle(item, outcome, deps, sleep);
    } finally {
      deps.queue.ack();
    }

    await sleep(deps.pacingMs);
  }

  deps.log.debug({ workerId }, "Worker finished");
}
