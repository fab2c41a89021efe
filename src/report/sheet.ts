import * as XLSX from "xlsx";
import type { EggRecord } from "../hunt/types";
import { groupByFaction } from "./rows";

export const REPORT_HEADERS = [
  "Member ID",
  "Name",
  "Faction",
  "Eggs Found",
  "Reference",
  "Current",
  "Status",
] as const;

type Cell = string | number;

function toAoa(rows: EggRecord[]): Cell[][] {
  return [
    [...REPORT_HEADERS],
    ...rows.map((r) => [r.memberId, r.name, r.factionName, r.found, r.reference, r.current, r.status]),
  ];
}

export function buildSheet(rows: EggRecord[]): XLSX.WorkSheet {
  const ws = XLSX.utils.aoa_to_sheet(toAoa(rows));
  ws["!cols"] = [
    { wch: 10 }, // Member ID
    { wch: 24 }, // Name
    { wch: 24 }, // Faction
    { wch: 11 }, // Eggs Found
    { wch: 10 }, // Reference
    { wch: 10 }, // Current
    { wch: 10 }, // Status
  ];
  ws["!autofilter"] = { ref: "A1:G1" };
  return ws;
}

/** CSV text, one line per row, header first. No trailing newline. */
export function toCsv(rows: EggRecord[]): string {
  return XLSX.utils.sheet_to_csv(buildSheet(rows));
}

// Sheet names: max 31 chars, no []:*?/\
function sheetName(name: string, taken: Set<string>): string {
  const base = name.replace(/[[\]:*?/\\]/g, "_").slice(0, 28) || "Faction";
  let candidate = base;
  for (let i = 2; taken.has(candidate); i++) candidate = `${base}-${i}`;
  taken.add(candidate);
  return candidate;
}

/** "All" sheet plus one sheet per faction. */
export function buildWorkbook(rows: EggRecord[]): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  const taken = new Set<string>(["All"]);
  XLSX.utils.book_append_sheet(wb, buildSheet(rows), "All");

  for (const group of groupByFaction(rows).values()) {
    XLSX.utils.book_append_sheet(wb, buildSheet(group), sheetName(group[0].factionName, taken));
  }
  return wb;
}
