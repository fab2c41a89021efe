export function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

/**
 * Spaces calls out so that, across every worker sharing the instance,
 * at most one call starts per `minIntervalMs`.
 */
export class RateLimiter {
  private nextAllowedAt = 0;

  constructor(private minIntervalMs: number) {}

  static perMinute(requestsPerMinute: number): RateLimiter {
    return new RateLimiter(requestsPerMinute > 0 ? Math.ceil(60_000 / requestsPerMinute) : 0);
  }

  get intervalMs() {
    return this.minIntervalMs;
  }

  async wait() {
    if (this.minIntervalMs <= 0) return;
    const now = Date.now();
    const waitMs = Math.max(0, this.nextAllowedAt - now);
    this.nextAllowedAt = Math.max(this.nextAllowedAt, now) + this.minIntervalMs;
    if (waitMs > 0) await sleep(waitMs);
  }
}
