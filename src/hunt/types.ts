export type MemberWorkItem = {
  memberId: string;
  name: string;
  factionId: string;
  factionName: string;
  attempt: number; // 1-based
};

// no_baseline: baseline mode, member absent from the earlier run
export type RecordStatus = "ok" | "failed" | "exhausted" | "no_baseline";

export type EggRecord = {
  memberId: string;
  name: string;
  factionId: string;
  factionName: string;
  reference: number;
  current: number;
  found: number; // max(0, current - reference) when ok, 0 otherwise
  status: RecordStatus;
  attempts: number;
};

/** What "found" is measured against. */
export type ReferencePoint =
  | { kind: "timestamp"; timestamp: number } // unix seconds
  | { kind: "baseline"; file: string; counts: ReadonlyMap<string, number> };

export type ReferenceDescription =
  | { kind: "timestamp"; timestamp: number }
  | { kind: "baseline"; file: string };

export function describeReference(ref: ReferencePoint): ReferenceDescription {
  return ref.kind === "timestamp" ? { kind: "timestamp", timestamp: ref.timestamp } : { kind: "baseline", file: ref.file };
}

export function toEggRecord(
  item: MemberWorkItem,
  status: RecordStatus,
  reference: number,
  current: number
): EggRecord {
  return {
    memberId: item.memberId,
    name: item.name,
    factionId: item.factionId,
    factionName: item.factionName,
    reference,
    current,
    found: status === "ok" ? Math.max(0, current - reference) : 0,
    status,
    attempts: item.attempt,
  };
}
