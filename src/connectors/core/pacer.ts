import type { Pacer, PacerConfig } from "./types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Simple fixed-interval throttle: every call waits until at least
 * `intervalMs` has passed since the previous one was let through.
 */
export class FixedIntervalPacer implements Pacer {
  readonly intervalMs: number;
  private lastCallAt = 0;

  constructor(config: PacerConfig = {}) {
    this.intervalMs = Math.max(0, config.intervalMs ?? 0);
  }

  async waitBeforeNextCall(): Promise<void> {
    if (this.intervalMs > 0 && this.lastCallAt > 0) {
      const elapsed = Date.now() - this.lastCallAt;
      if (elapsed < this.intervalMs) {
        await sleep(this.intervalMs - elapsed);
      }
    }
    this.lastCallAt = Date.now();
  }
}

export function createPacer(config: PacerConfig = {}): Pacer {
  return new FixedIntervalPacer(config);
}
