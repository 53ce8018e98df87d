import { createHash } from 'node:crypto';
import { nanoid } from 'nanoid';

import type { OAuthClientConfig } from '../types';

// 43 url-safe characters carry 258 bits.
const STATE_LENGTH = 43;
const VERIFIER_LENGTH = 64;

export function generateState(): string {
  return nanoid(STATE_LENGTH);
}

/** PKCE code verifier; nanoid's alphabet is a subset of the unreserved set. */
export function createCodeVerifier(): string {
  return nanoid(VERIFIER_LENGTH);
}

export function codeChallengeS256(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

/**
 * Build the provider authorization URL
 */
export function buildAuthorizeUrl(
  config: Pick<OAuthClientConfig, 'authorizeUrl' | 'clientId' | 'scopes'>,
  params: { state: string; redirectUri: string; codeChallenge?: string | null },
): string {
  const authUrl = new URL(config.authorizeUrl);

  authUrl.searchParams.set('client_id', config.clientId);
  authUrl.searchParams.set('response_type', 'code');
  authUrl.searchParams.set('redirect_uri', params.redirectUri);
  if (config.scopes.length > 0) {
    authUrl.searchParams.set('scope', config.scopes.join(' '));
  }
  authUrl.searchParams.set('state', params.state);
  if (params.codeChallenge) {
    authUrl.searchParams.set('code_challenge_method', 'S256');
    authUrl.searchParams.set('code_challenge', params.codeChallenge);
  }

  return authUrl.toString();
}
