import { TokenManager, createTokenState, type FetchFn, type TokenState } from './auth.js';
import { requireCredentials, type GatewayConfig } from './config.js';
import { ToolDispatcher } from './dispatcher.js';
import { silentLogger, type Logger } from './logger.js';
import { createRateLimitState, systemClock, type Clock, type RateLimitState } from './pacing.js';
import { RequestExecutor } from './request-executor.js';
import { DEFAULT_RETRY_POLICY, backoffBaseFor } from './retry-policy.js';
import { TaskQueries } from './task-queries.js';
import { TickTickClient } from './ticktick-client.js';
import { createToolCatalog } from './tools/index.js';

export interface GatewayDeps {
  fetchFn?: FetchFn;
  clock?: Clock;
  logger?: Logger;
}

export interface Gateway {
  tokenState: TokenState;
  rateLimitState: RateLimitState;
  tokens: TokenManager;
  executor: RequestExecutor;
  client: TickTickClient;
  queries: TaskQueries;
  dispatcher: ToolDispatcher;
}

export function createGateway(config: GatewayConfig, deps: GatewayDeps = {}): Gateway {
  const logger = deps.logger ?? silentLogger;
  const clock = deps.clock ?? systemClock;

  const tokenState = createTokenState(requireCredentials(config));
  const rateLimitState = createRateLimitState();

  const tokens = new TokenManager(tokenState, {
    tokenUrl: config.tokenUrl,
    fetchFn: deps.fetchFn,
    logger: logger.child('auth'),
    now: () => clock.now(),
    timeoutMs: config.requestTimeoutMs,
  });

  const executor = new RequestExecutor(tokens, {
    baseUrl: config.baseUrl,
    requestDelayMs: config.requestDelayMs,
    retryPolicy: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: config.maxRetries,
      baseDelayMs: backoffBaseFor(config.requestDelayMs),
    },
    rateLimitState,
    timeoutMs: config.requestTimeoutMs,
    fetchFn: deps.fetchFn,
    clock,
    logger: logger.child('http'),
  });

  const client = new TickTickClient(executor, logger.child('client'));
  const queries = new TaskQueries(
    client,
    config.timeZone,
    () => new Date(clock.now()),
    logger.child('queries'),
  );
  const dispatcher = new ToolDispatcher(createToolCatalog(client, queries), logger.child('tools'));

  return { tokenState, rateLimitState, tokens, executor, client, queries, dispatcher };
}
