import {
  AuthenticationError,
  type GatewayError,
  InvalidRequestError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  UpstreamError,
} from './errors.js';

export interface RetryPolicy {
  /** Retries allowed for 429 and 5xx responses, on top of the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  networkRetryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 200,
  maxDelayMs: 10_000,
  networkRetryDelayMs: 500,
};

export type AttemptOutcome =
  | { type: 'success'; status: number; body: string }
  | { type: 'unauthorized'; status: number; body: string }
  | { type: 'rateLimited'; body: string; retryAfterSeconds?: number }
  | { type: 'serverError'; status: number; body: string }
  | { type: 'notFound'; body: string }
  | { type: 'rejected'; status: number; body: string }
  | { type: 'networkFailure'; message: string };

export interface Attempting {
  phase: 'attempting';
  attempt: number;
  retries: number;
  refreshed: boolean;
  networkRetried: boolean;
}

export type CallState =
  | Attempting
  | { phase: 'refreshingToken'; next: Attempting }
  | { phase: 'backingOff'; delayMs: number; reason: string; next: Attempting }
  | { phase: 'succeeded'; status: number; body: string }
  | { phase: 'failed'; error: GatewayError };

export function initialCallState(): Attempting {
  return { phase: 'attempting', attempt: 1, retries: 0, refreshed: false, networkRetried: false };
}

export function classifyResponse(
  status: number,
  body: string,
  retryAfterHeader: string | null,
): AttemptOutcome {
  if (status >= 200 && status < 300) return { type: 'success', status, body };
  if (status === 401 || status === 403) return { type: 'unauthorized', status, body };
  if (status === 429) {
    const retryAfter = retryAfterHeader === null ? Number.NaN : Number(retryAfterHeader);
    return Number.isFinite(retryAfter) && retryAfter >= 0
      ? { type: 'rateLimited', body, retryAfterSeconds: retryAfter }
      : { type: 'rateLimited', body };
  }
  if (status >= 500) return { type: 'serverError', status, body };
  if (status === 404) return { type: 'notFound', body };
  return { type: 'rejected', status, body };
}

/** Smallest backoff base, so a zero pacing delay still waits between retries. */
export const MIN_BACKOFF_BASE_MS = 100;

export function backoffBaseFor(requestDelayMs: number): number {
  return Math.max(requestDelayMs, MIN_BACKOFF_BASE_MS);
}

export function backoffDelay(retry: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** retry, policy.maxDelayMs);
}

function retryLater(state: Attempting, policy: RetryPolicy, reason: string): CallState {
  return {
    phase: 'backingOff',
    delayMs: backoffDelay(state.retries, policy),
    reason,
    next: { ...state, attempt: state.attempt + 1, retries: state.retries + 1 },
  };
}

export function transition(
  state: Attempting,
  outcome: AttemptOutcome,
  policy: RetryPolicy,
  resource: string,
): CallState {
  switch (outcome.type) {
    case 'success':
      return { phase: 'succeeded', status: outcome.status, body: outcome.body };

    case 'unauthorized':
      if (!state.refreshed) {
        return {
          phase: 'refreshingToken',
          next: { ...state, attempt: state.attempt + 1, refreshed: true },
        };
      }
      return {
        phase: 'failed',
        error: new AuthenticationError(
          `Authentication failed after token refresh (${outcome.status}). Obtain a new token pair and restart the gateway.`,
          outcome.body,
        ),
      };

    case 'rateLimited':
      if (state.retries < policy.maxRetries) {
        return retryLater(state, policy, 'rate limited');
      }
      return {
        phase: 'failed',
        error: new RateLimitError(
          outcome.retryAfterSeconds !== undefined
            ? outcome.retryAfterSeconds * 1000
            : backoffDelay(state.retries, policy),
          outcome.body,
        ),
      };

    case 'serverError':
      if (state.retries < policy.maxRetries) {
        return retryLater(state, policy, `server error ${outcome.status}`);
      }
      return {
        phase: 'failed',
        error: new UpstreamError(`Server error after ${state.retries} retries`, outcome.status, outcome.body),
      };

    case 'notFound':
      return { phase: 'failed', error: new NotFoundError(resource, outcome.body) };

    case 'rejected':
      return { phase: 'failed', error: new InvalidRequestError(outcome.status, outcome.body) };

    case 'networkFailure':
      if (!state.networkRetried) {
        return {
          phase: 'backingOff',
          delayMs: policy.networkRetryDelayMs,
          reason: `network failure: ${outcome.message}`,
          next: { ...state, attempt: state.attempt + 1, networkRetried: true },
        };
      }
      return {
        phase: 'failed',
        error: new NetworkError(`Could not reach TickTick: ${outcome.message}`),
      };
  }
}
