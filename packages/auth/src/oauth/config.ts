import { TransferError } from '@app/contracts';
import { redirectPort, type AppEnv } from '@app/utils';

import type { OAuthClientConfig } from '../types';

export function oauthConfigFromEnv(env: AppEnv): OAuthClientConfig {
  if (!env.OAUTH_CLIENT_ID) {
    throw new TransferError('missing_argument', 'OAUTH_CLIENT_ID is not set');
  }

  return {
    clientId: env.OAUTH_CLIENT_ID,
    clientSecret: env.OAUTH_CLIENT_SECRET ?? null,
    authorizeUrl: env.OAUTH_AUTHORIZE_URL,
    tokenUrl: env.OAUTH_TOKEN_URL,
    redirectUri: env.OAUTH_REDIRECT_URI,
    scopes: env.OAUTH_SCOPES.split(/\s+/).filter((scope) => scope !== ''),
    listenHost: env.OAUTH_LISTEN_HOST,
    listenPort: env.OAUTH_LISTEN_PORT ?? redirectPort(env.OAUTH_REDIRECT_URI),
    timeoutMs: env.OAUTH_TIMEOUT_MS,
    usePkce: env.OAUTH_USE_PKCE,
  };
}
