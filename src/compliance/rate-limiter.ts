/**
 * Request pacing for the archive's usage policy. Callers get a `Pacer`
 * instead of sleeping themselves, so tests can swap in a fake clock.
 */
export interface Pacer {
  acquire(): Promise<void>;
}

export interface PacerClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: PacerClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/** Fixed-interval gate: consecutive acquires are at least `minDelayMs` apart. */
export class IntervalPacer implements Pacer {
  private lastAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minDelayMs: number,
    private readonly clock: PacerClock = systemClock,
  ) {}

  acquire(): Promise<void> {
    // Chain callers so concurrent acquires are spaced out one after another.
    // A rejected wait fails its own caller only; the chain carries on.
    const next = this.queue.catch(() => undefined).then(() => this.wait());
    this.queue = next;
    return next;
  }

  private async wait(): Promise<void> {
    if (this.lastAt !== null) {
      const elapsed = this.clock.now() - this.lastAt;
      if (elapsed < this.minDelayMs) {
        await this.clock.sleep(this.minDelayMs - elapsed);
      }
    }
    this.lastAt = this.clock.now();
  }
}

/** No pacing at all. */
export const unpaced: Pacer = {
  acquire: () => Promise.resolve(),
};
