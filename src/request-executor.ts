import { defaultFetch, type FetchFn } from './auth.js';
import { CancelledError, UpstreamError, isAbortError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { PacingGate, systemClock, type Clock, type RateLimitState } from './pacing.js';
import {
  classifyResponse,
  initialCallState,
  transition,
  type AttemptOutcome,
  type CallState,
  type RetryPolicy,
} from './retry-policy.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface RequestOptions {
  signal?: AbortSignal;
}

/** What resource operations need from the executor. */
export interface ApiExecutor {
  execute(method: HttpMethod, path: string, body?: unknown, options?: RequestOptions): Promise<unknown>;
}

/** The slice of the token manager the executor relies on. */
export interface TokenSource {
  ensureValidToken(): Promise<string>;
  refresh(rejectedToken?: string): Promise<string>;
}

export interface RequestExecutorOptions {
  baseUrl: string;
  requestDelayMs: number;
  retryPolicy: RetryPolicy;
  rateLimitState: RateLimitState;
  timeoutMs?: number;
  fetchFn?: FetchFn;
  clock?: Clock;
  logger?: Logger;
}

const SNIPPET_LENGTH = 200;

export class RequestExecutor implements ApiExecutor {
  private readonly gate: PacingGate;
  private readonly fetchFn: FetchFn;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly tokens: TokenSource,
    private readonly options: RequestExecutorOptions,
  ) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.gate = new PacingGate(options.rateLimitState, options.requestDelayMs, this.clock);
  }

  async execute(
    method: HttpMethod,
    path: string,
    body?: unknown,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const { signal } = options;
    const rateLimit = this.options.rateLimitState;
    let state: CallState = initialCallState();
    let token = await this.tokens.ensureValidToken();

    for (;;) {
      throwIfCancelled(signal);

      switch (state.phase) {
        case 'attempting': {
          const outcome = await this.attempt(method, path, body, token, signal);
          state = transition(state, outcome, this.options.retryPolicy, `${method} ${path}`);
          break;
        }

        case 'refreshingToken':
          this.logger.info('Access token rejected, refreshing', { method, path });
          token = await this.tokens.refresh(token);
          state = state.next;
          break;

        case 'backingOff': {
          const { delayMs, reason, next }: Extract<CallState, { phase: 'backingOff' }> = state;
          rateLimit.currentBackoffMs = delayMs;
          this.logger.warn('Retrying request', { method, path, reason, delayMs, attempt: next.attempt });
          await cancellable(signal, () => this.clock.sleep(delayMs, signal));
          state = next;
          break;
        }

        case 'succeeded':
          rateLimit.currentBackoffMs = 0;
          return parseJsonBody(state.status, state.body);

        case 'failed':
          this.logger.warn('Request failed', { method, path, kind: state.error.kind });
          throw state.error;
      }
    }
  }

  private async attempt(
    method: HttpMethod,
    path: string,
    body: unknown,
    token: string,
    signal: AbortSignal | undefined,
  ): Promise<AttemptOutcome> {
    await cancellable(signal, () => this.gate.acquire(signal));

    const timeout = AbortSignal.timeout(this.options.timeoutMs ?? 30_000);
    const init: RequestInit = {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
      },
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    };
    if (body !== undefined && method === 'POST') {
      init.body = JSON.stringify(body);
    }

    try {
      const response = await this.fetchFn(`${this.options.baseUrl}${path}`, init);
      const text = await response.text();
      return classifyResponse(response.status, text, response.headers.get('Retry-After'));
    } catch (e: unknown) {
      throwIfCancelled(signal);
      if (isAbortError(e)) {
        return { type: 'networkFailure', message: 'request timed out' };
      }
      return { type: 'networkFailure', message: e instanceof Error ? e.message : String(e) };
    }
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError();
}

async function cancellable(signal: AbortSignal | undefined, wait: () => Promise<void>): Promise<void> {
  try {
    await wait();
  } catch (e: unknown) {
    throwIfCancelled(signal);
    throw e;
  }
}

function parseJsonBody(status: number, text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    const snippet = text.length > SNIPPET_LENGTH ? text.slice(0, SNIPPET_LENGTH) + '...' : text;
    throw new UpstreamError(`Response is not valid JSON: ${snippet}`, status);
  }
}
