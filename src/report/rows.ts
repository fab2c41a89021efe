import type { EggRecord } from "../hunt/types";

/** Eggs found descending, then name, then member id. */
export function sortReportRows(records: Iterable<EggRecord>): EggRecord[] {
  return [...records].sort((a, b) => {
    if (b.found !== a.found) return b.found - a.found;
    const byName = a.name.localeCompare(b.name);
    if (byName !== 0) return byName;
    return a.memberId.localeCompare(b.memberId, undefined, { numeric: true });
  });
}

/** Groups sorted rows by faction, keeping both the row order and first-seen faction order. */
export function groupByFaction(rows: EggRecord[]): Map<string, EggRecord[]> {
  const out = new Map<string, EggRecord[]>();
  for (const r of rows) {
    const group = out.get(r.factionId);
    if (group) group.push(r);
    else out.set(r.factionId, [r]);
  }
  return out;
}
