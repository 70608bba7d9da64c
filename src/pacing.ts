import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
};

export interface RateLimitState {
  lastRequestTimestamp: number;
  currentBackoffMs: number;
}

export function createRateLimitState(): RateLimitState {
  return { lastRequestTimestamp: Number.NEGATIVE_INFINITY, currentBackoffMs: 0 };
}

/**
 * Minimum spacing between outbound call issuances. A slot is reserved before
 * waiting, so concurrent callers queue in arrival order; only issuance is
 * spaced, a slow call does not hold back the next one.
 */
export class PacingGate {
  constructor(
    private readonly state: RateLimitState,
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  async acquire(signal?: AbortSignal): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.state.lastRequestTimestamp + this.minIntervalMs);
    this.state.lastRequestTimestamp = slot;

    const wait = slot - now;
    if (wait > 0) {
      await this.clock.sleep(wait, signal);
    }
  }
}
