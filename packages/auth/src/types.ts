import type { TransferError } from '@app/contracts';

export interface OAuthToken {
  readonly accessToken: string;
  readonly refreshToken: string | null;
  readonly tokenType: string;
  readonly expiresAt: Date | null;
  readonly scope: string | null;
}

/** Outcome of one authorization attempt: a token or an error, never both. */
export type OAuthResult =
  | { readonly ok: true; readonly token: OAuthToken }
  | { readonly ok: false; readonly error: TransferError };

export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string | null;
  authorizeUrl: string;
  tokenUrl: string;
  redirectUri: string;
  scopes: readonly string[];
  listenHost: string;
  /** 0 binds an ephemeral port. */
  listenPort: number;
  timeoutMs: number;
  usePkce: boolean;
}

export type TokenEndpointConfig = Pick<
  OAuthClientConfig,
  'clientId' | 'clientSecret' | 'tokenUrl' | 'redirectUri'
>;
