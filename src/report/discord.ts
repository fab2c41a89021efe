import type { EggRecord } from "../hunt/types";

export const DISCORD_MESSAGE_LIMIT = 2000;

const NAME_WIDTH = 20;
const FACTION_WIDTH = 20;

function fit(s: string, width: number) {
  return s.length > width ? s.slice(0, width - 1) + "…" : s.padEnd(width);
}

/**
 * Code-block tables for Discord, split so that no message exceeds `limit`
 * characters. Each message repeats the header.
 */
export function formatDiscordTable(rows: EggRecord[], limit = DISCORD_MESSAGE_LIMIT): string[] {
  const rankWidth = Math.max(1, String(rows.length).length);
  const eggWidth = Math.max(4, ...rows.map((r) => String(r.found).length));

  const line = (rank: string, name: string, faction: string, eggs: string) =>
    `${rank.padStart(rankWidth)} | ${fit(name, NAME_WIDTH)} | ${fit(faction, FACTION_WIDTH)} | ${eggs.padStart(eggWidth)}`;

  const header = line("#", "Member", "Faction", "Eggs");
  const rule = "-".repeat(header.length);
  const open = ["```", "Egg Hunt Results", header, rule];
  const close = "```";

  const messages: string[] = [];
  let body: string[] = [];
  const render = (lines: string[]) => [...open, ...lines, close].join("\n");

  rows.forEach((r, i) => {
    const next = line(String(i + 1), r.name, r.factionName, String(r.found));
    if (body.length > 0 && render([...body, next]).length > limit) {
      messages.push(render(body));
      body = [];
    }
    body.push(next);
  });

  messages.push(render(body));
  return messages;
}
