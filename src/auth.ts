import { AuthenticationError, isAbortError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { TokenRefreshResponse } from './types.js';

export interface TokenState {
  accessToken: string;
  refreshToken: string;
  readonly clientId: string;
  readonly clientSecret: string;
  needsRefresh: boolean;
  /** Epoch ms; only known once a refresh response has reported `expires_in`. */
  expiresAt?: number;
  /** Set when the token endpoint rejected the refresh token. Terminal. */
  refreshRejected: boolean;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (url, init) => globalThis.fetch(url, init);

export function createTokenState(credentials: {
  clientId: string;
  clientSecret: string;
  accessToken: string;
  refreshToken: string;
}): TokenState {
  return { ...credentials, needsRefresh: false, refreshRejected: false };
}

export interface TokenManagerOptions {
  tokenUrl: string;
  fetchFn?: FetchFn;
  logger?: Logger;
  now?: () => number;
  timeoutMs?: number;
}

const REAUTH_HINT = 'Obtain a new token pair and restart the gateway.';

export class TokenManager {
  private static readonly REFRESH_MARGIN_MS = 60_000;

  private inFlight: Promise<string> | null = null;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly state: TokenState,
    private readonly options: TokenManagerOptions,
  ) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  async ensureValidToken(): Promise<string> {
    if (this.inFlight) return this.inFlight;

    const nearExpiry =
      this.state.expiresAt !== undefined &&
      this.now() >= this.state.expiresAt - TokenManager.REFRESH_MARGIN_MS;

    if (this.state.needsRefresh || nearExpiry) {
      return this.refresh();
    }
    return this.state.accessToken;
  }

  /**
   * Exchanges the refresh token for a new pair. Concurrent callers share one
   * exchange. Passing the token a request was rejected with lets a caller that
   * lost the race pick up the already-refreshed token instead of refreshing twice.
   */
  refresh(rejectedToken?: string): Promise<string> {
    if (this.inFlight) return this.inFlight;

    if (rejectedToken !== undefined && rejectedToken !== this.state.accessToken) {
      return Promise.resolve(this.state.accessToken);
    }

    if (this.state.refreshRejected) {
      return Promise.reject(
        new AuthenticationError(`The refresh token was rejected earlier. ${REAUTH_HINT}`),
      );
    }

    this.state.needsRefresh = true;
    this.inFlight = this.exchange().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async exchange(): Promise<string> {
    const { clientId, clientSecret, refreshToken } = this.state;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    this.logger.info('Refreshing access token');

    let response: Response;
    try {
      response = await this.fetchFn(this.options.tokenUrl, {
        method: 'POST',
        headers: {
          Authorization: `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({
          grant_type: 'refresh_token',
          refresh_token: refreshToken,
        }).toString(),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000),
      });
    } catch (e: unknown) {
      const reason = isAbortError(e) ? 'timed out' : e instanceof Error ? e.message : String(e);
      throw new AuthenticationError(`Token refresh request failed: ${reason}`);
    }

    if (!response.ok) {
      const detail = await response.text();
      if (response.status === 400 || response.status === 401) {
        this.state.refreshRejected = true;
      }
      this.logger.error('Token refresh failed', { status: response.status });
      throw new AuthenticationError(`Token refresh failed (${response.status}). ${REAUTH_HINT}`, detail);
    }

    let rawData: unknown;
    try {
      rawData = await response.json();
    } catch {
      throw new AuthenticationError(`Token refresh returned malformed response. ${REAUTH_HINT}`);
    }

    const parsed = TokenRefreshResponse.safeParse(rawData);
    if (!parsed.success) {
      throw new AuthenticationError(`Token refresh returned invalid data. ${REAUTH_HINT}`);
    }

    const data = parsed.data;
    this.state.accessToken = data.access_token;
    if (data.refresh_token) {
      this.state.refreshToken = data.refresh_token;
    }
    this.state.expiresAt =
      data.expires_in === undefined ? undefined : this.now() + data.expires_in * 1000;
    this.state.needsRefresh = false;

    this.logger.info('Access token refreshed', {
      expiresAt: this.state.expiresAt === undefined ? null : new Date(this.state.expiresAt).toISOString(),
    });
    return data.access_token;
  }
}
