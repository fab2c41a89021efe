// src/jobs/eggHuntReport.ts
//
// Rebuild CSV / workbook / Discord output from a saved results snapshot.
//
//   npx tsx src/jobs/eggHuntReport.ts                 # latest runs/<date>/egg_hunt_results.json
//   npx tsx src/jobs/eggHuntReport.ts --file some/egg_hunt_results.json --outDir out
//
import "dotenv/config";
import * as path from "node:path";
import { latestResultsFile, loadResultsSnapshot, snapshotStore } from "../cache/resultsSnapshot";
import { getArg } from "../config/args";
import { createLogger } from "../log/logger";
import { writeReports } from "../report/writeReports";

const log = createLogger("eggHuntReport");

async function main() {
  const inputPath = path.resolve(getArg("--file") ?? latestResultsFile(path.resolve(process.cwd(), "runs")));
  const outDir = path.resolve(getArg("--outDir") ?? path.dirname(inputPath));

  const store = snapshotStore(loadResultsSnapshot(inputPath));
  const reports = writeReports(outDir, store.values());

  for (const msg of reports.discordMessages) console.log(msg);
  log.info(
    { input: inputPath, records: store.size, csv: reports.csv },
    "Reports written"
  );
}

main().catch((err) => {
  log.fatal({ err }, "Report failed");
  process.exitCode = 1;
});
