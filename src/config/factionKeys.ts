import * as fs from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors";

export type FactionConfig = {
  factionId: string;
  factionName: string;
  keys: string[];
};

const keysFileSchema = z.record(
  z.string().regex(/^\d+$/, "faction ids are numeric"),
  z.object({
    faction_name: z.string().min(1),
    keys: z.array(z.string().min(1)).min(1, "at least one API key is required"),
  })
);

export function parseFactionKeys(payload: unknown, source = "faction keys"): FactionConfig[] {
  const parsed = keysFileSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid ${source}:\n${issues.join("\n")}`);
  }

  const factions = Object.entries(parsed.data).map(([factionId, f]) => ({
    factionId,
    factionName: f.faction_name,
    keys: f.keys,
  }));
  if (factions.length === 0) throw new ConfigError(`No factions configured in ${source}`);
  return factions;
}

/** `{ "<factionId>": { "faction_name": "...", "keys": ["..."] } }` */
export function loadFactionKeys(filePath: string): FactionConfig[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new ConfigError(`Cannot read faction keys file ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Faction keys file ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseFactionKeys(payload, filePath);
}
