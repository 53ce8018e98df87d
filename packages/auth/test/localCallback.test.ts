import fastify from 'fastify';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { silentLogger } from '@app/utils';

import { authorizeWithLocalCallback, type CodeExchange } from '../src/oauth/localCallback';
import type { OAuthClientConfig, OAuthResult, OAuthToken } from '../src/types';

const token: OAuthToken = {
  accessToken: 'access-1',
  refreshToken: 'refresh-1',
  tokenType: 'Bearer',
  expiresAt: null,
  scope: 'playlist-read-private',
};

const config: OAuthClientConfig = {
  clientId: 'test-client',
  clientSecret: null,
  authorizeUrl: 'https://auth.example.test/authorize',
  tokenUrl: 'https://auth.example.test/token',
  redirectUri: 'http://127.0.0.1:8080/callback',
  scopes: ['playlist-read-private'],
  listenHost: '127.0.0.1',
  listenPort: 0,
  timeoutMs: 5_000,
  usePkce: true,
};

/** Starts the flow and resolves once the authorization URL is published. */
const startFlow = async (
  overrides: Partial<OAuthClientConfig> = {},
  options: {
    exchange?: CodeExchange;
    timeoutMs?: number;
    signal?: AbortSignal;
    openBrowser?: (url: string) => Promise<void>;
  } = {},
) => {
  let published: (url: URL) => void = () => undefined;
  const authorizeUrl = new Promise<URL>((resolve) => {
    published = resolve;
  });
  const openBrowser = vi.fn(options.openBrowser ?? (async () => undefined));

  const flow = authorizeWithLocalCallback(
    { ...config, ...overrides },
    {
      logger: silentLogger(),
      openBrowser,
      onAuthorizeUrl: (url) => published(new URL(url)),
      exchange: options.exchange ?? (async () => token),
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    },
  );

  return { flow, authorizeUrl: await authorizeUrl, openBrowser };
};

const callbackUrl = (authorizeUrl: URL, params: Record<string, string>): string => {
  const url = new URL(authorizeUrl.searchParams.get('redirect_uri') ?? '');
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
};

const errorCode = (result: OAuthResult) => (result.ok ? null : result.error.code);

describe('authorizeWithLocalCallback', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('completes when the provider redirects back with a code', async () => {
    const exchange = vi.fn<CodeExchange>(async () => token);
    const { flow, authorizeUrl, openBrowser } = await startFlow({}, { exchange });
    const state = authorizeUrl.searchParams.get('state') ?? '';
    const redirectUri = authorizeUrl.searchParams.get('redirect_uri') ?? '';

    expect(openBrowser).toHaveBeenCalledWith(authorizeUrl.toString());
    expect(authorizeUrl.searchParams.get('code_challenge_method')).toBe('S256');
    expect(new URL(redirectUri).port).not.toBe('8080');

    const response = await fetch(callbackUrl(authorizeUrl, { state, code: 'code-1' }));
    expect(response.status).toBe(200);
    expect(await response.text()).toContain('Authorization Successful');

    await expect(flow).resolves.toEqual({ ok: true, token });
    expect(exchange).toHaveBeenCalledWith('code-1', {
      redirectUri,
      codeVerifier: expect.stringMatching(/^[A-Za-z0-9_-]{64}$/),
      signal: expect.any(AbortSignal),
    });
  });

  it('fails with csrf_state_mismatch on a forged state', async () => {
    const { flow, authorizeUrl } = await startFlow();

    const response = await fetch(callbackUrl(authorizeUrl, { state: 'forged', code: 'code-1' }));

    expect(response.status).toBe(400);
    expect(errorCode(await flow)).toBe('csrf_state_mismatch');
  });

  it('skips PKCE when disabled', async () => {
    const exchange = vi.fn<CodeExchange>(async () => token);
    const { flow, authorizeUrl } = await startFlow({ usePkce: false }, { exchange });
    const state = authorizeUrl.searchParams.get('state') ?? '';

    expect(authorizeUrl.searchParams.has('code_challenge')).toBe(false);
    await fetch(callbackUrl(authorizeUrl, { state, code: 'code-1' }));

    await expect(flow).resolves.toMatchObject({ ok: true });
    expect(exchange.mock.calls[0]?.[1].codeVerifier).toBeNull();
  });

  it('times out and closes the listener', async () => {
    const { flow, authorizeUrl } = await startFlow({}, { timeoutMs: 50 });

    const result = await flow;

    expect(errorCode(result)).toBe('timeout');
    await expect(fetch(callbackUrl(authorizeUrl, { state: 'x', code: 'y' }))).rejects.toThrow();
  });

  it('closes the listener after a successful callback', async () => {
    const { flow, authorizeUrl } = await startFlow();
    const state = authorizeUrl.searchParams.get('state') ?? '';

    await fetch(callbackUrl(authorizeUrl, { state, code: 'code-1' }));
    await flow;

    await expect(fetch(callbackUrl(authorizeUrl, { state, code: 'code-2' }))).rejects.toThrow();
  });

  it('resolves with cancelled when the signal aborts', async () => {
    const controller = new AbortController();
    const { flow } = await startFlow({}, { signal: controller.signal });

    controller.abort();

    expect(errorCode(await flow)).toBe('cancelled');
  });

  it('aborts a pending token exchange when the flow is cancelled', async () => {
    const controller = new AbortController();
    const seen: { signal: AbortSignal | null } = { signal: null };
    let exchangeStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      exchangeStarted = resolve;
    });
    const exchange: CodeExchange = (_code, context) =>
      new Promise<OAuthToken>((_resolve, reject) => {
        seen.signal = context.signal;
        context.signal.addEventListener('abort', () => reject(new Error('token request aborted')), { once: true });
        exchangeStarted();
      });
    const { flow, authorizeUrl } = await startFlow({}, { signal: controller.signal, exchange });
    const state = authorizeUrl.searchParams.get('state') ?? '';

    const callback = fetch(callbackUrl(authorizeUrl, { state, code: 'code-1' }));
    await started;
    const abortedAt = Date.now();
    controller.abort();

    expect(errorCode(await flow)).toBe('cancelled');
    expect(Date.now() - abortedAt).toBeLessThan(2_000);
    expect(seen.signal?.aborted).toBe(true);
    expect((await callback).status).toBe(500);
  });

  it('returns cancelled immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const onAuthorizeUrl = vi.fn();

    const result = await authorizeWithLocalCallback(config, {
      logger: silentLogger(),
      signal: controller.signal,
      onAuthorizeUrl,
      openBrowser: async () => undefined,
    });

    expect(errorCode(result)).toBe('cancelled');
    expect(onAuthorizeUrl).not.toHaveBeenCalled();
  });

  it('reports listener_startup_failed when the port is taken', async () => {
    const blocker = fastify({ logger: false });
    await blocker.listen({ host: '127.0.0.1', port: 0 });
    const address = blocker.server.address();
    const port = address !== null && typeof address === 'object' ? address.port : 0;

    try {
      const result = await authorizeWithLocalCallback(
        { ...config, listenPort: port, redirectUri: `http://127.0.0.1:${port}/callback` },
        { logger: silentLogger(), openBrowser: async () => undefined },
      );

      expect(errorCode(result)).toBe('listener_startup_failed');
    } finally {
      await blocker.close();
    }
  });

  it('keeps working when the browser cannot be opened', async () => {
    const { flow, authorizeUrl, openBrowser } = await startFlow(
      {},
      {
        openBrowser: async () => {
          throw new Error('no display');
        },
      },
    );
    expect(openBrowser).toHaveBeenCalledTimes(1);
    const state = authorizeUrl.searchParams.get('state') ?? '';

    await fetch(callbackUrl(authorizeUrl, { state, code: 'code-1' }));

    await expect(flow).resolves.toMatchObject({ ok: true });
  });
});
