export class KeyGroupNotFoundError extends Error {
  constructor(readonly factionId: string) {
    super(`Faction ID ${factionId} not found in the keys file.`);
    this.name = "KeyGroupNotFoundError";
  }
}

type KeyCycle = {
  keys: readonly string[];
  index: number;
};

/**
 * Round-robin API keys per faction.
 *
 * `next` reads and advances the cursor in one synchronous step, so workers
 * sharing a rotator never skip or double-read a position.
 */
export class KeyRotator {
  private cycles = new Map<string, KeyCycle>();

  register(factionId: string, keys: readonly string[]): void {
    const filtered = keys.filter(Boolean);
    if (filtered.length === 0) {
      throw new Error(`Faction ${factionId} has no API keys`);
    }
    this.cycles.set(factionId, { keys: Object.freeze([...filtered]), index: 0 });
  }

  next(factionId: string): string {
    const cycle = this.cycles.get(factionId);
    if (!cycle) throw new KeyGroupNotFoundError(factionId);

    const key = cycle.keys[cycle.index];
    cycle.index = (cycle.index + 1) % cycle.keys.length;
    return key;
  }

  has(factionId: string): boolean {
    return this.cycles.has(factionId);
  }

  count(factionId: string): number {
    return this.cycles.get(factionId)?.keys.length ?? 0;
  }
}
