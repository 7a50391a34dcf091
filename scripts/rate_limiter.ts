export type Clock = {
  now(): number;
  sleep(ms: number): Promise<void>;
};

export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep,
};

/**
 * Keeps outbound calls under `maxPerSecond` by spacing them at least
 * 1000 / maxPerSecond ms apart. Zero or undefined disables the gate.
 * Callers are sequential, so the last-call timestamp is the only state.
 */
export class RateLimiter {
  readonly minIntervalMs: number;
  private lastCall = Number.NEGATIVE_INFINITY;

  constructor(maxPerSecond: number | undefined, private readonly clock: Clock = systemClock) {
    this.minIntervalMs = maxPerSecond && maxPerSecond > 0 ? 1000 / maxPerSecond : 0;
  }

  async wait(): Promise<void> {
    if (!this.minIntervalMs) return;
    let now = this.clock.now();
    const sleepFor = this.minIntervalMs - (now - this.lastCall);
    if (sleepFor > 0) {
      await this.clock.sleep(sleepFor);
      now = this.clock.now();
    }
    this.lastCall = now;
  }
}
