import * as path from "node:path";
import { z } from "zod";
import { getArg } from "./args";
import { ConfigError } from "./errors";

export type ReferenceSource =
  | { kind: "timestamp"; timestamp: number } // unix seconds
  | { kind: "baseline"; file: string }; // results snapshot of an earlier run

export type HuntConfig = {
  baseUrl: string;
  comment: string;
  keysFile: string;
  workers: number;
  pacingMs: number;
  backoffMs: number;
  maxAttempts: number;
  requestsPerMinute: number; // 0 = no pool-wide limiter
  timeoutMs: number;
  reference: ReferenceSource;
  outDir: string;
  membersDir: string;
};

// `.env` lines like `HUNT_BASELINE_FILE=` arrive as ""
const blank = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const int = (min: number, fallback: number) => z.preprocess(blank, z.coerce.number().int().min(min).default(fallback));
const text = (fallback: string) => z.preprocess(blank, z.string().default(fallback));
const optionalText = z.preprocess(blank, z.string().optional());

const envSchema = z.object({
  TORN_BASE_URL: z.preprocess(blank, z.string().url().default("https://api.torn.com/v2")),
  TORN_COMMENT: text("egg-hunt"),
  FACTION_KEYS_FILE: text("faction_keys.json"),
  HUNT_WORKERS: int(1, 14),
  HUNT_PACING_MS: int(0, 600),
  HUNT_BACKOFF_MS: int(0, 60_000),
  HUNT_MAX_ATTEMPTS: int(1, 5),
  HUNT_REQUESTS_PER_MINUTE: int(0, 100),
  HUNT_REQUEST_TIMEOUT_MS: int(1, 30_000),
  HUNT_REFERENCE_TIMESTAMP: optionalText,
  HUNT_BASELINE_FILE: optionalText,
  HUNT_OUT_DIR: optionalText,
  HUNT_MEMBERS_DIR: text(path.join("data", "members")),
});

function todayISO() {
  return new Date().toISOString().slice(0, 10);
}

// unix seconds stay below this until the year 5138; anything larger is milliseconds
const MAX_UNIX_SECONDS = 1e11;

/**
 * Unix seconds (or milliseconds), or anything Date.parse understands
 * ("2026-03-28", "2026-03-28T12:00:00Z").
 */
export function parseTimestamp(value: string): number {
  const v = value.trim();
  if (/^\d+$/.test(v)) {
    const n = Number(v);
    return n >= MAX_UNIX_SECONDS ? Math.floor(n / 1000) : n;
  }

  const ms = Date.parse(v);
  if (!Number.isFinite(ms)) {
    throw new ConfigError(`Reference timestamp "${value}" is neither unix seconds nor a date`);
  }
  return Math.floor(ms / 1000);
}

/**
 * Environment first, then CLI flags on top:
 * --keys, --outDir, --membersDir, --timestamp, --baseline.
 */
export function loadHuntConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv,
  cwd = process.cwd()
): HuntConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment:\n${issues.join("\n")}`);
  }
  const e = parsed.data;

  const timestampArg = getArg("--timestamp", argv) ?? e.HUNT_REFERENCE_TIMESTAMP;
  const baselineArg = getArg("--baseline", argv) ?? e.HUNT_BASELINE_FILE;

  if (timestampArg && baselineArg) {
    throw new ConfigError("Set either a reference timestamp or a baseline file, not both");
  }

  let reference: ReferenceSource;
  if (timestampArg) {
    reference = { kind: "timestamp", timestamp: parseTimestamp(timestampArg) };
  } else if (baselineArg) {
    reference = { kind: "baseline", file: path.resolve(cwd, baselineArg) };
  } else {
    throw new ConfigError(
      "No reference point: set HUNT_REFERENCE_TIMESTAMP (or --timestamp) or HUNT_BASELINE_FILE (or --baseline)"
    );
  }

  return {
    baseUrl: e.TORN_BASE_URL,
    comment: e.TORN_COMMENT,
    keysFile: path.resolve(cwd, getArg("--keys", argv) ?? e.FACTION_KEYS_FILE),
    workers: e.HUNT_WORKERS,
    pacingMs: e.HUNT_PACING_MS,
    backoffMs: e.HUNT_BACKOFF_MS,
    maxAttempts: e.HUNT_MAX_ATTEMPTS,
    requestsPerMinute: e.HUNT_REQUESTS_PER_MINUTE,
    timeoutMs: e.HUNT_REQUEST_TIMEOUT_MS,
    reference,
    outDir: path.resolve(cwd, getArg("--outDir", argv) ?? e.HUNT_OUT_DIR ?? path.join("runs", todayISO())),
    membersDir: path.resolve(cwd, getArg("--membersDir", argv) ?? e.HUNT_MEMBERS_DIR),
  };
}
