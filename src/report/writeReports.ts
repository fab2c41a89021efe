import * as fs from "node:fs";
import * as path from "node:path";
import * as XLSX from "xlsx";
import type { EggRecord } from "../hunt/types";
import { formatDiscordTable } from "./discord";
import { groupByFaction, sortReportRows } from "./rows";
import { buildWorkbook, toCsv } from "./sheet";

export type ReportFiles = {
  csv: string;
  factionCsvs: string[];
  workbook: string;
  discord: string;
  discordMessages: string[];
};

function writeText(filePath: string, text: string) {
  fs.writeFileSync(filePath, text.endsWith("\n") ? text : text + "\n", "utf8");
}

export function writeReports(outDir: string, records: Iterable<EggRecord>): ReportFiles {
  fs.mkdirSync(outDir, { recursive: true });
  const rows = sortReportRows(records);

  const csv = path.join(outDir, "egg_hunt_results.csv");
  writeText(csv, toCsv(rows));

  const factionCsvs: string[] = [];
  for (const [factionId, group] of groupByFaction(rows)) {
    const p = path.join(outDir, `egg_hunt_${factionId}.csv`);
    writeText(p, toCsv(group));
    factionCsvs.push(p);
  }

  const workbook = path.join(outDir, "egg_hunt_results.xlsx");
  // XLSX.writeFile needs set_fs() under ESM; write the buffer ourselves
  const book: Buffer = XLSX.write(buildWorkbook(rows), { type: "buffer", bookType: "xlsx" });
  fs.writeFileSync(workbook, book);

  const discordMessages = formatDiscordTable(rows);
  const discord = path.join(outDir, "egg_hunt_discord.txt");
  writeText(discord, discordMessages.join("\n\n"));

  return { csv, factionCsvs, workbook, discord, discordMessages };
}
