import type { GatewayConfig } from '../../src/config.js';
import { createGateway } from '../../src/gateway.js';
import type { Clock } from '../../src/pacing.js';
import { API_BASE, FakeTickTick, TOKEN_URL } from './fake-ticktick.js';

/** 2026-10-19T12:00:00Z */
export const NOON = Date.UTC(2026, 9, 19, 12, 0, 0);

export interface FakeClock extends Clock {
  sleeps: number[];
  advance(ms: number): void;
}

/** Sleeping advances the clock instantly and records the requested delay. */
export function fakeClock(start = NOON): FakeClock {
  let current = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    sleep: async (ms, signal) => {
      if (signal?.aborted) throw new DOMException('The operation was aborted', 'AbortError');
      sleeps.push(ms);
      current += ms;
    },
  };
}

export function testConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    credentials: {
      clientId: 'client-id',
      clientSecret: 'test-secret',
      accessToken: 'access-0',
      refreshToken: 'refresh-0',
    },
    baseUrl: API_BASE,
    tokenUrl: TOKEN_URL,
    requestDelayMs: 0,
    maxRetries: 3,
    requestTimeoutMs: 5_000,
    timeZone: 'UTC',
    logLevel: 'error',
    ...overrides,
  };
}

export function setupGateway(overrides: Partial<GatewayConfig> = {}) {
  const api = new FakeTickTick();
  const clock = fakeClock();
  const gateway = createGateway(testConfig(overrides), { fetchFn: api.fetch, clock });
  return { api, clock, gateway };
}
