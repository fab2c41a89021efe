import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { KeyRotator } from "../../keys/keyRotator";
import { TornHttpError, TornRateLimitError } from "../../scrape/http";
import { fetchMemberEggs, runFetchWorker, type FetchWorkerDeps } from "../fetchWorker";
import { ResultStore } from "../resultStore";
import type { MemberWorkItem } from "../types";
import { runPool, WorkQueue } from "../workQueue";

const log = pino({ level: "silent" });
const REF_TS = 1711584000;

type EggCount = (memberId: string, key: string, timestamp?: number) => Promise<number>;

function item(memberId: string, attempt = 1): MemberWorkItem {
  return { memberId, name: `member-${memberId}`, factionId: "A", factionName: "Alpha", attempt };
}

function setup(eggCount: EggCount, overrides: Partial<FetchWorkerDeps> = {}) {
  const queue = new WorkQueue<MemberWorkItem>();
  const store = new ResultStore();
  const keys = new KeyRotator();
  keys.register("A", ["key-1", "key-2"]);

  const api = { eggCount: vi.fn(eggCount) };
  const sleeps: Array<{ ms: number; unfinished: number }> = [];
  const sleep = vi.fn(async (ms: number) => {
    sleeps.push({ ms, unfinished: queue.unfinished });
  });

  const deps: FetchWorkerDeps = {
    queue,
    store,
    keys,
    api,
    reference: { kind: "timestamp", timestamp: REF_TS },
    log,
    pacingMs: 600,
    backoffMs: 60_000,
    maxAttempts: 3,
    sleep,
    ...overrides,
  };
  return { deps, queue, store, api, sleeps };
}

const rateLimited = () => new TornRateLimitError("/user/x/personalstats", 5, "Too many requests");

describe("fetchMemberEggs", () => {
  it("fetches reference then current with one key", async () => {
    const { deps, api } = setup(async (_id, _key, ts) => (ts === undefined ? 5 : 2));

    await expect(fetchMemberEggs(item("1"), deps)).resolves.toEqual({ state: "success", reference: 2, current: 5 });
    expect(api.eggCount).toHaveBeenNthCalledWith(1, "1", "key-1", REF_TS);
    expect(api.eggCount).toHaveBeenNthCalledWith(2, "1", "key-1");
  });

  it("stops after a failed reference call", async () => {
    const { deps, api } = setup(async () => {
      throw new TornHttpError("/user/1/personalstats", 502, "");
    });

    const outcome = await fetchMemberEggs(item("1"), deps);
    expect(outcome).toMatchObject({ state: "failed", reference: 0, current: 0 });
    expect(api.eggCount).toHaveBeenCalledTimes(1);
  });

  it("treats unexpected errors as failures", async () => {
    const { deps } = setup(async () => {
      throw new Error("socket hang up");
    });

    await expect(fetchMemberEggs(item("1"), deps)).resolves.toMatchObject({ state: "failed" });
  });

  it("uses baseline counts instead of a reference request", async () => {
    const { deps, api } = setup(async () => 9, {
      reference: { kind: "baseline", file: "baseline.json", counts: new Map([["1", 4]]) },
    });

    await expect(fetchMemberEggs(item("1"), deps)).resolves.toEqual({ state: "success", reference: 4, current: 9 });
    expect(api.eggCount).toHaveBeenCalledTimes(1);
    expect(api.eggCount).toHaveBeenNthCalledWith(1, "1", "key-1");
  });

  it("reports members missing from the baseline", async () => {
    const { deps, api } = setup(async () => 9, {
      reference: { kind: "baseline", file: "baseline.json", counts: new Map([["1", 4]]) },
    });

    await expect(fetchMemberEggs(item("2"), deps)).resolves.toEqual({ state: "no_baseline", current: 9 });
    expect(api.eggCount).toHaveBeenCalledWith("2", "key-1");
  });
});

describe("runFetchWorker", () => {
  it("records eggs found since the reference", async () => {
    const { deps, queue, store, sleeps } = setup(async (_id, _key, ts) => (ts === undefined ? 5 : 2));
    queue.enqueue(item("1"));

    await runFetchWorker(0, deps);

    expect(store.get("1")).toEqual({
      memberId: "1",
      name: "member-1",
      factionId: "A",
      factionName: "Alpha",
      reference: 2,
      current: 5,
      found: 3,
      status: "ok",
      attempts: 1,
    });
    expect(sleeps.map((s) => s.ms)).toEqual([600]);
    expect(queue.unfinished).toBe(0);
  });

  it("does not count lifetime eggs of members without a baseline", async () => {
    const { deps, queue, store } = setup(async () => 250, {
      reference: { kind: "baseline", file: "baseline.json", counts: new Map([["old", 248]]) },
    });
    queue.enqueue(item("old"));
    queue.enqueue(item("new"));

    await runFetchWorker(0, deps);

    expect(store.values().map((r) => [r.memberId, r.found, r.status])).toEqual([
      ["old", 2, "ok"],
      ["new", 0, "no_baseline"],
    ]);
    expect(store.get("new")).toMatchObject({ reference: 0, current: 250 });
    expect(queue.unfinished).toBe(0);
  });

  it("floors a negative difference at 0", async () => {
    const { deps, queue, store } = setup(async (_id, _key, ts) => (ts === undefined ? 5 : 7));
    queue.enqueue(item("1"));

    await runFetchWorker(0, deps);

    expect(store.get("1")).toMatchObject({ reference: 7, current: 5, found: 0, status: "ok" });
  });

  it("writes a defaulted record when a request fails, without retrying", async () => {
    const { deps, queue, store, api } = setup(async (_id, _key, ts) => {
      if (ts === undefined) throw new TornHttpError("/user/1/personalstats", 500, "");
      return 3;
    });
    queue.enqueue(item("1"));

    await runFetchWorker(0, deps);

    expect(store.get("1")).toMatchObject({ reference: 3, current: 0, found: 0, status: "failed", attempts: 1 });
    expect(api.eggCount).toHaveBeenCalledTimes(2);
    expect(queue.unfinished).toBe(0);
  });

  it("backs off, re-enqueues and succeeds on a later attempt", async () => {
    let calls = 0;
    const { deps, queue, store, sleeps, api } = setup(async (_id, _key, ts) => {
      calls++;
      if (calls === 1) throw rateLimited();
      return ts === undefined ? 1 : 0;
    });
    queue.enqueue(item("3"));

    await runFetchWorker(0, deps);

    expect(store.get("3")).toMatchObject({ reference: 0, current: 1, found: 1, status: "ok", attempts: 2 });
    // retry is queued before the first attempt is acked
    expect(sleeps).toEqual([
      { ms: 60_000, unfinished: 1 },
      { ms: 600, unfinished: 1 },
      { ms: 600, unfinished: 0 },
    ]);
    // second attempt starts from scratch on the next key
    expect(api.eggCount).toHaveBeenNthCalledWith(2, "3", "key-2", REF_TS);
    expect(api.eggCount).toHaveBeenNthCalledWith(3, "3", "key-2");
  });

  it("gives up after maxAttempts and records the member as exhausted", async () => {
    const { deps, queue, store, sleeps, api } = setup(async () => {
      throw rateLimited();
    });
    queue.enqueue(item("4"));

    await runFetchWorker(0, deps);

    expect(store.get("4")).toMatchObject({ found: 0, status: "exhausted", attempts: 3 });
    expect(api.eggCount).toHaveBeenCalledTimes(3);
    expect(sleeps.filter((s) => s.ms === 60_000)).toHaveLength(2);
    expect(sleeps.filter((s) => s.ms === 600)).toHaveLength(3);
    expect(queue.unfinished).toBe(0);
  });

  it("shares one queue and store across a pool", async () => {
    const { deps, queue, store } = setup(async (id, _key, ts) => (ts === undefined ? Number(id) : 0));
    for (let i = 1; i <= 5; i++) queue.enqueue(item(String(i)));

    await runPool(3, (workerId) => runFetchWorker(workerId, deps));
    await queue.join();

    expect(store.size).toBe(5);
    expect(store.values().map((r) => r.found).sort()).toEqual([1, 2, 3, 4, 5]);
  });
});
