// src/jobs/eggHunt.ts
//
// Full run: members -> per-member egg counts -> results snapshot + reports.
//
//   npx tsx src/jobs/eggHunt.ts --timestamp 2026-03-28
//   npx tsx src/jobs/eggHunt.ts --baseline runs/2026-03-27/egg_hunt_results.json --outDir runs/final
//
import "dotenv/config";
import * as path from "node:path";
import { loadHuntConfig } from "../config/env";
import { loadFactionKeys } from "../config/factionKeys";
import { huntAndReport } from "../hunt/orchestrator";
import { resolveReferencePoint } from "../hunt/reference";
import { createLogger } from "../log/logger";
import { RateLimiter } from "../scrape/limiter";
import { TornClient } from "../scrape/tornApi";

const log = createLogger("eggHunt");

async function main() {
  const config = loadHuntConfig();
  const factions = loadFactionKeys(config.keysFile);
  const reference = resolveReferencePoint(config.reference);

  log.info(
    {
      factions: factions.length,
      workers: config.workers,
      reference: reference.kind === "timestamp" ? reference.timestamp : reference.file,
    },
    "Starting egg hunt"
  );

  const api = new TornClient({
    baseUrl: config.baseUrl,
    comment: config.comment,
    timeoutMs: config.timeoutMs,
    limiter: RateLimiter.perMinute(config.requestsPerMinute),
  });

  const { reports, factions: summaries } = await huntAndReport({
    factions,
    api,
    reference,
    membersDir: config.membersDir,
    workers: config.workers,
    pacingMs: config.pacingMs,
    backoffMs: config.backoffMs,
    maxAttempts: config.maxAttempts,
    outDir: config.outDir,
    log,
  });

  for (const msg of reports.discordMessages) console.log(msg);

  const failed = summaries.reduce((n, s) => n + s.failed + s.exhausted, 0);
  const noBaseline = summaries.reduce((n, s) => n + s.noBaseline, 0);
  log.info(
    { outDir: path.relative(process.cwd(), config.outDir) || ".", failed, noBaseline },
    "Egg hunt complete"
  );
}

main().catch((err) => {
  log.fatal({ err }, "Egg hunt failed");
  process.exitCode = 1;
});
