import { z } from 'zod';

import { TransferError, describeError, isTransferError } from '@app/contracts';
import type { Logger, OneShot } from '@app/utils';

import type { OAuthResult, OAuthToken } from '../types';

export interface CallbackResponse {
  statusCode: number;
  contentType: 'text/html' | 'text/plain';
  body: string;
}

export interface OAuthCallbackHandlerOptions {
  expectedState: string;
  /** Receives the outcome; shared with the timeout and cancellation paths. */
  result: OneShot<OAuthResult>;
  exchange: (code: string) => Promise<OAuthToken>;
  logger: Logger;
}

const queryParam = z.preprocess(
  (value) => (Array.isArray(value) ? value[0] : value),
  z.string().optional().catch(undefined),
);

const CallbackQuerySchema = z
  .object({
    state: queryParam,
    code: queryParam,
    error: queryParam,
    error_description: queryParam,
  })
  .catch({});

const SUCCESS_PAGE = `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Authorization Successful</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif;
           display: flex; align-items: center; justify-content: center; height: 100vh;
           margin: 0; background: #f5f5f5; }
    .container { text-align: center; background: white; padding: 2rem;
                 border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
    h1 { color: #1db954; margin: 0 0 1rem 0; }
    p { color: #666; margin: 0; }
  </style>
</head>
<body>
  <div class="container">
    <h1>&#10003; Authorization Successful</h1>
    <p>You can close this window and return to the terminal.</p>
  </div>
</body>
</html>
`;

const text = (statusCode: number, body: string): CallbackResponse => ({
  statusCode,
  contentType: 'text/plain',
  body,
});

/**
 * Handles the provider redirect. Only the first request is processed; the
 * gate is taken before any await so concurrent requests cannot both pass.
 */
export class OAuthCallbackHandler {
  private hit = false;

  constructor(private readonly options: OAuthCallbackHandlerOptions) {}

  get processed(): boolean {
    return this.hit;
  }

  async handle(rawQuery: unknown): Promise<CallbackResponse> {
    const { result, logger } = this.options;

    if (this.hit || result.settled) {
      return text(400, 'Callback already processed');
    }
    this.hit = true;

    const query = CallbackQuerySchema.parse(rawQuery ?? {});

    if (query.state !== this.options.expectedState) {
      logger.warn('oauth callback state mismatch');
      this.deliverError(new TransferError('csrf_state_mismatch', 'invalid state parameter'));
      return text(400, 'Invalid state parameter');
    }

    if (!query.code) {
      const error = query.error ?? '';
      const description = query.error_description ?? '';
      this.deliverError(
        new TransferError('authorization_denied', `authorization failed: ${error} - ${description}`, {
          details: { error, error_description: description },
        }),
      );
      return text(400, 'Authorization failed');
    }

    let token: OAuthToken;
    try {
      token = await this.options.exchange(query.code);
    } catch (error) {
      logger.error({ err: error }, 'oauth token exchange failed');
      const failure = isTransferError(error, 'token_exchange_failed')
        ? error
        : new TransferError('token_exchange_failed', `token exchange failed: ${describeError(error)}`, {
            cause: error,
          });
      this.deliverError(failure);
      return text(500, 'Token exchange failed');
    }

    if (token.accessToken === '') {
      this.deliverError(new TransferError('no_token_received', 'token endpoint returned no access token'));
      return text(500, 'No token received');
    }

    if (!result.resolve({ ok: true, token })) {
      logger.warn('oauth callback completed after the flow had already finished');
    }
    return { statusCode: 200, contentType: 'text/html', body: SUCCESS_PAGE };
  }

  private deliverError(error: TransferError): void {
    this.options.result.resolve({ ok: false, error });
  }
}
