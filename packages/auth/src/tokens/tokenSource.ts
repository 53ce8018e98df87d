import { TransferError, toTransferError } from '@app/contracts';
import { silentLogger, type Logger } from '@app/utils';

import { refreshAccessToken, type TokenRequestOptions } from '../oauth/exchange';
import type { OAuthToken, TokenEndpointConfig } from '../types';

export interface TokenSource {
  token(): Promise<OAuthToken>;
}

export type TokenCallback = (token: OAuthToken) => void | Promise<void>;

/** Refresh this long before `expiresAt`. */
export const EXPIRY_SKEW_MS = 60_000;

export function isTokenExpired(token: OAuthToken, now: number = Date.now(), skewMs = EXPIRY_SKEW_MS): boolean {
  if (!token.expiresAt) return false;
  return token.expiresAt.getTime() - skewMs <= now;
}

export class StaticTokenSource implements TokenSource {
  constructor(private readonly value: OAuthToken) {}

  async token(): Promise<OAuthToken> {
    return this.value;
  }
}

/**
 * Wraps another source and reports every new access token to a callback,
 * e.g. to persist refreshed credentials. Errors from the wrapped source pass
 * through untouched; errors from the callback are logged and dropped.
 */
export class NotifyingTokenSource implements TokenSource {
  private lastAccessToken: string | null = null;

  constructor(
    private readonly source: TokenSource,
    private callback: TokenCallback | null = null,
    private readonly logger: Logger = silentLogger(),
  ) {}

  setCallback(callback: TokenCallback | null): void {
    this.callback = callback;
  }

  async token(): Promise<OAuthToken> {
    const token = await this.source.token();

    if (token.accessToken === this.lastAccessToken) return token;

    const { callback } = this;
    if (callback) {
      try {
        await callback(token);
      } catch (error) {
        this.logger.warn({ err: error }, 'token change callback failed');
      }
    }
    this.lastAccessToken = token.accessToken;

    return token;
  }
}

export interface RefreshingTokenSourceOptions extends Omit<TokenRequestOptions, 'now'> {
  now?: () => number;
  refresh?: (refreshToken: string) => Promise<OAuthToken>;
}

/**
 * Hands out the current token and performs a refresh_token grant once it is
 * within EXPIRY_SKEW_MS of expiring. Concurrent callers share one refresh.
 */
export class RefreshingTokenSource implements TokenSource {
  private current: OAuthToken;
  private inflight: Promise<OAuthToken> | null = null;
  private readonly now: () => number;
  private readonly refresh: (refreshToken: string) => Promise<OAuthToken>;

  constructor(
    config: Pick<TokenEndpointConfig, 'clientId' | 'clientSecret' | 'tokenUrl'>,
    initial: OAuthToken,
    options: RefreshingTokenSourceOptions = {},
  ) {
    this.current = initial;
    this.now = options.now ?? Date.now;
    this.refresh =
      options.refresh ??
      ((refreshToken) => refreshAccessToken(config, refreshToken, { signal: options.signal, now: this.now }));
  }

  async token(): Promise<OAuthToken> {
    if (!isTokenExpired(this.current, this.now())) {
      return this.current;
    }
    if (!this.inflight) {
      this.inflight = this.renew().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async renew(): Promise<OAuthToken> {
    const { refreshToken } = this.current;
    if (!refreshToken) {
      throw new TransferError('token_expired', 'access token expired and no refresh token is available');
    }

    let next: OAuthToken;
    try {
      next = await this.refresh(refreshToken);
    } catch (error) {
      throw toTransferError(error, 'refresh_failed', 'token refresh failed');
    }
    this.current = next.refreshToken === null ? { ...next, refreshToken } : next;
    return this.current;
  }
}
