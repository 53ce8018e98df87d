import { z } from 'zod';

import { TransferError, isAbortError, toTransferError, type TransferErrorCode } from '@app/contracts';

import type { OAuthToken, TokenEndpointConfig } from '../types';

const TokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string().default('Bearer'),
  scope: z.string().optional(),
  expires_in: z.coerce.number().nonnegative().optional(),
  refresh_token: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export interface TokenRequestOptions {
  signal?: AbortSignal;
  now?: () => number;
}

export function toOAuthToken(response: TokenResponse, now: number = Date.now()): OAuthToken {
  return {
    accessToken: response.access_token,
    refreshToken: response.refresh_token ?? null,
    tokenType: response.token_type,
    expiresAt: response.expires_in === undefined ? null : new Date(now + response.expires_in * 1000),
    scope: response.scope ?? null,
  };
}

async function postTokenRequest(
  tokenUrl: string,
  body: URLSearchParams,
  code: TransferErrorCode,
  label: string,
  signal?: AbortSignal,
): Promise<TokenResponse> {
  let response: Response;
  try {
    response = await fetch(tokenUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: body.toString(),
      signal,
    });
  } catch (error) {
    throw toTransferError(error, code, `${label} request failed`);
  }

  if (!response.ok) {
    const text = await response.text();
    throw new TransferError(code, `${label} failed: ${response.status} ${text}`.trimEnd(), {
      details: { status: response.status },
    });
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    if (isAbortError(error)) throw toTransferError(error, code, label);
    throw new TransferError(code, `${label} returned invalid JSON`, { cause: error });
  }

  const parsed = TokenResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new TransferError(code, `${label} returned an unexpected payload`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Exchange an authorization code for tokens
 */
export async function exchangeAuthorizationCode(
  config: TokenEndpointConfig,
  code: string,
  codeVerifier: string | null,
  options: TokenRequestOptions = {},
): Promise<OAuthToken> {
  const body = new URLSearchParams({
    grant_type: 'authorization_code',
    code,
    redirect_uri: config.redirectUri,
    client_id: config.clientId,
  });
  if (config.clientSecret) body.set('client_secret', config.clientSecret);
  if (codeVerifier) body.set('code_verifier', codeVerifier);

  const data = await postTokenRequest(config.tokenUrl, body, 'token_exchange_failed', 'token exchange', options.signal);
  return toOAuthToken(data, (options.now ?? Date.now)());
}

/**
 * Refresh an access token. A response without a refresh token keeps the
 * one that was sent.
 */
export async function refreshAccessToken(
  config: Pick<TokenEndpointConfig, 'clientId' | 'clientSecret' | 'tokenUrl'>,
  refreshToken: string,
  options: TokenRequestOptions = {},
): Promise<OAuthToken> {
  const body = new URLSearchParams({
    grant_type: 'refresh_token',
    refresh_token: refreshToken,
    client_id: config.clientId,
  });
  if (config.clientSecret) body.set('client_secret', config.clientSecret);

  const data = await postTokenRequest(config.tokenUrl, body, 'refresh_failed', 'token refresh', options.signal);
  const token = toOAuthToken(data, (options.now ?? Date.now)());
  return token.refreshToken === null ? { ...token, refreshToken } : token;
}
