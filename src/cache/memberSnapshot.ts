import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import type { FactionMember } from "../scrape/tornApi";

const snapshotSchema = z.object({
  version: z.literal(1),
  factionId: z.string(),
  fetchedAt: z.string(), // ISO
  members: z.array(z.object({ id: z.string(), name: z.string() })),
});

export type MemberSnapshot = z.infer<typeof snapshotSchema>;

function ensureDir(p: string) {
  fs.mkdirSync(p, { recursive: true });
}

export function memberSnapshotPath(dir: string, factionId: string) {
  return path.join(dir, `${factionId}.json`);
}

/** Returns null when there is no usable snapshot for the faction. */
export function loadMemberSnapshot(dir: string, factionId: string): MemberSnapshot | null {
  const filePath = memberSnapshotPath(dir, factionId);
  if (!fs.existsSync(filePath)) return null;

  try {
    const parsed = snapshotSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf8")));
    return parsed.success && parsed.data.factionId === factionId ? parsed.data : null;
  } catch {
    return null;
  }
}

export function saveMemberSnapshot(dir: string, factionId: string, members: FactionMember[]): string {
  ensureDir(dir);
  const snapshot: MemberSnapshot = {
    version: 1,
    factionId,
    fetchedAt: new Date().toISOString(),
    members,
  };
  const filePath = memberSnapshotPath(dir, factionId);
  fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2), "utf8");
  return filePath;
}
