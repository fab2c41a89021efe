// src/scrape/tornApi.ts
// Torn API v2: https://www.torn.com/swagger.php
import { z } from "zod";
import { fetchTornJson } from "./http";
import { RateLimiter } from "./limiter";

export const EGG_STAT = "eastereggs";

export type FactionMember = {
  id: string;
  name: string;
};

/** What the hunt needs from the upstream API. */
export interface HuntApi {
  factionMembers(factionId: string, key: string): Promise<FactionMember[]>;
  /** Egg count now, or as of `timestamp` (unix seconds) when given. */
  eggCount(memberId: string, key: string, timestamp?: number): Promise<number>;
}

export type TornClientOptions = {
  baseUrl: string;
  comment?: string;
  timeoutMs?: number;
  // shared by every caller of this client
  limiter?: RateLimiter;
};

const memberSchema = z.object({
  id: z.union([z.number(), z.string()]),
  name: z.string().optional(),
});

// v2 returns an array; v1 keyed members by id
const membersResponseSchema = z.object({
  members: z
    .union([
      z.array(memberSchema),
      z.record(z.object({ name: z.string().optional() })),
    ])
    .optional(),
});

const personalStatsSchema = z.object({
  personalstats: z
    .array(
      z.object({
        name: z.string(),
        value: z.number().nullish(),
      })
    )
    .optional(),
});

export function parseFactionMembers(payload: unknown): FactionMember[] {
  const parsed = membersResponseSchema.safeParse(payload);
  if (!parsed.success || !parsed.data.members) return [];

  const { members } = parsed.data;
  if (Array.isArray(members)) {
    return members.map((m) => ({ id: String(m.id), name: m.name ?? "Unknown" }));
  }
  return Object.entries(members).map(([id, m]) => ({ id, name: m.name ?? "Unknown" }));
}

/** Missing or malformed stat entries count as 0. */
export function parseStatValue(payload: unknown, stat: string): number {
  const parsed = personalStatsSchema.safeParse(payload);
  if (!parsed.success) return 0;
  const entry = parsed.data.personalstats?.find((s) => s.name === stat);
  const v = entry?.value;
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

export class TornClient implements HuntApi {
  private limiter: RateLimiter;

  constructor(private opts: TornClientOptions) {
    this.limiter = opts.limiter ?? new RateLimiter(0);
  }

  private async get(path: string, key: string, params?: Record<string, string | number | undefined>) {
    await this.limiter.wait();
    return fetchTornJson(path, {
      baseUrl: this.opts.baseUrl,
      comment: this.opts.comment,
      timeoutMs: this.opts.timeoutMs,
      key,
      params,
    });
  }

  async factionMembers(factionId: string, key: string): Promise<FactionMember[]> {
    const json = await this.get(`/faction/${encodeURIComponent(factionId)}/members`, key);
    return parseFactionMembers(json);
  }

  async eggCount(memberId: string, key: string, timestamp?: number): Promise<number> {
    const json = await this.get(`/user/${encodeURIComponent(memberId)}/personalstats`, key, {
      stat: EGG_STAT,
      timestamp,
    });
    return parseStatValue(json, EGG_STAT);
  }
}
