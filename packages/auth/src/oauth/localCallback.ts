import fastify, { type FastifyInstance } from 'fastify';

import { TransferError, describeError, type TransferErrorCode } from '@app/contracts';
import { OneShot, createLogger, type Logger } from '@app/utils';

import { openBrowser as defaultOpenBrowser } from '../browser';
import type { OAuthClientConfig, OAuthResult, OAuthToken } from '../types';
import { OAuthCallbackHandler } from './callbackHandler';
import { exchangeAuthorizationCode } from './exchange';
import { buildAuthorizeUrl, codeChallengeS256, createCodeVerifier, generateState } from './state';

export const CLOSE_GRACE_MS = 5_000;

export type CodeExchange = (
  code: string,
  context: { redirectUri: string; codeVerifier: string | null; signal: AbortSignal },
) => Promise<OAuthToken>;

export interface AuthorizeOptions {
  logger?: Logger;
  signal?: AbortSignal;
  /** Overrides `config.timeoutMs`. */
  timeoutMs?: number;
  openBrowser?: (url: string) => Promise<void>;
  onAuthorizeUrl?: (url: string) => void;
  exchange?: CodeExchange;
}

const failure = (code: TransferErrorCode, message: string, cause?: unknown): OAuthResult => ({
  ok: false,
  error: new TransferError(code, message, { cause }),
});

function boundPort(app: FastifyInstance): number | null {
  const address = app.server.address();
  return address !== null && typeof address === 'object' ? address.port : null;
}

function withPort(uri: string, port: number): string {
  const url = new URL(uri);
  url.port = String(port);
  return url.toString();
}

async function closeWithGrace(app: FastifyInstance, logger: Logger): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const grace = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), CLOSE_GRACE_MS);
  });

  try {
    const outcome = await Promise.race([app.close().then(() => 'closed' as const), grace]);
    if (outcome === 'timeout') {
      logger.warn({ graceMs: CLOSE_GRACE_MS }, 'callback listener did not close in time, dropping connections');
      app.server.closeAllConnections();
    }
  } catch (error) {
    logger.warn({ err: error }, 'failed to close callback listener');
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run the authorization-code flow against a short-lived local listener.
 *
 * Resolves with exactly one OAuthResult: whichever of callback, listener
 * error, timeout or cancellation happens first. The listener is closed on
 * every path before this resolves.
 */
export async function authorizeWithLocalCallback(
  config: OAuthClientConfig,
  options: AuthorizeOptions = {},
): Promise<OAuthResult> {
  const logger = options.logger ?? createLogger('oauth');
  const timeoutMs = options.timeoutMs ?? config.timeoutMs;
  const { signal } = options;

  if (signal?.aborted) {
    return failure('cancelled', 'authorization cancelled');
  }

  const result = new OneShot<OAuthResult>();
  const state = generateState();
  const codeVerifier = config.usePkce ? createCodeVerifier() : null;
  const callbackPath = new URL(config.redirectUri).pathname;
  let redirectUri = config.redirectUri;
  // Aborted once the attempt settles, so a pending token request cannot hold the listener open.
  const inflight = new AbortController();

  const exchange: CodeExchange =
    options.exchange ??
    ((code, context) =>
      exchangeAuthorizationCode({ ...config, redirectUri: context.redirectUri }, code, context.codeVerifier, {
        signal: context.signal,
      }));

  const handler = new OAuthCallbackHandler({
    expectedState: state,
    result,
    exchange: (code) => exchange(code, { redirectUri, codeVerifier, signal: inflight.signal }),
    logger,
  });

  const app = fastify({ logger: false });
  app.get(callbackPath, async (request, reply) => {
    const response = await handler.handle(request.query);
    return reply.status(response.statusCode).type(response.contentType).send(response.body);
  });

  let timer: NodeJS.Timeout | undefined;
  const onAbort = () => {
    if (result.resolve(failure('cancelled', 'authorization cancelled'))) {
      logger.info('oauth flow cancelled');
    }
  };

  try {
    try {
      await app.listen({ host: config.listenHost, port: config.listenPort });
    } catch (error) {
      logger.error({ err: error }, 'failed to start callback listener');
      return failure(
        'listener_startup_failed',
        `failed to start callback listener on ${config.listenHost}:${config.listenPort}: ${describeError(error)}`,
        error,
      );
    }

    app.server.on('error', (error: Error) => {
      logger.error({ err: error }, 'callback listener error');
      result.resolve(failure('listener_startup_failed', `callback listener failed: ${error.message}`, error));
    });

    const port = boundPort(app);
    if (config.listenPort === 0 && port !== null) {
      redirectUri = withPort(config.redirectUri, port);
    }
    logger.debug({ host: config.listenHost, port, path: callbackPath }, 'callback listener started');

    timer = setTimeout(() => {
      if (result.resolve(failure('timeout', `no authorization callback within ${timeoutMs}ms`))) {
        logger.warn({ timeoutMs }, 'oauth flow timed out');
      }
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    const authorizeUrl = buildAuthorizeUrl(config, {
      state,
      redirectUri,
      codeChallenge: codeVerifier === null ? null : codeChallengeS256(codeVerifier),
    });
    logger.info({ authorizeUrl }, 'open this URL in a browser to authorize');
    options.onAuthorizeUrl?.(authorizeUrl);

    const launch = options.openBrowser ?? defaultOpenBrowser;
    void launch(authorizeUrl).catch((error: unknown) => {
      logger.warn({ err: error }, 'could not open a browser; open the URL manually');
    });

    return await result.promise;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
    inflight.abort();
    await closeWithGrace(app, logger);
  }
}
