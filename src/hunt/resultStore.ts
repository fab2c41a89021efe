import type { EggRecord } from "./types";

/**
 * Member id -> record, shared by every worker of a run. Writes are
 * synchronous so they never interleave; a later write for the same member
 * replaces the earlier one.
 */
export class ResultStore {
  private records = new Map<string, EggRecord>();

  set(record: EggRecord): void {
    this.records.set(record.memberId, record);
  }

  get(memberId: string): EggRecord | undefined {
    return this.records.get(memberId);
  }

  get size() {
    return this.records.size;
  }

  values(): EggRecord[] {
    return [...this.records.values()];
  }

  toJSON(): Record<string, EggRecord> {
    return Object.fromEntries(this.records);
  }

  static fromRecords(records: Iterable<EggRecord>): ResultStore {
    const store = new ResultStore();
    for (const r of records) store.set(r);
    return store;
  }
}
