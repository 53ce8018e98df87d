import { ZodError } from 'zod';
import { describe, expect, it } from 'vitest';

import { loadEnv, redirectPort } from '../src/env';

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv({});

    expect(env.LOG_LEVEL).toBe('info');
    expect(env.OAUTH_CLIENT_ID).toBeUndefined();
    expect(env.OAUTH_REDIRECT_URI).toBe('http://127.0.0.1:8080/callback');
    expect(env.OAUTH_LISTEN_HOST).toBe('127.0.0.1');
    expect(env.OAUTH_LISTEN_PORT).toBeUndefined();
    expect(env.OAUTH_TIMEOUT_MS).toBe(120_000);
    expect(env.OAUTH_USE_PKCE).toBe(true);
    expect(env.PROGRESS_BUFFER_SIZE).toBe(16);
  });

  it('coerces numbers and booleans', () => {
    const env = loadEnv({
      OAUTH_LISTEN_PORT: '9000',
      OAUTH_TIMEOUT_MS: '500',
      OAUTH_USE_PKCE: 'no',
      PROGRESS_BUFFER_SIZE: '4',
    });

    expect(env.OAUTH_LISTEN_PORT).toBe(9000);
    expect(env.OAUTH_TIMEOUT_MS).toBe(500);
    expect(env.OAUTH_USE_PKCE).toBe(false);
    expect(env.PROGRESS_BUFFER_SIZE).toBe(4);
  });

  it('rejects invalid values', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(ZodError);
    expect(() => loadEnv({ OAUTH_LISTEN_PORT: '70000' })).toThrow(ZodError);
    expect(() => loadEnv({ OAUTH_REDIRECT_URI: 'not a url' })).toThrow(ZodError);
    expect(() => loadEnv({ PROGRESS_BUFFER_SIZE: '0' })).toThrow(ZodError);
  });
});

describe('redirectPort', () => {
  it('reads an explicit port', () => {
    expect(redirectPort('http://127.0.0.1:8080/callback')).toBe(8080);
  });

  it('falls back to the scheme default', () => {
    expect(redirectPort('http://localhost/callback')).toBe(80);
    expect(redirectPort('https://localhost/callback')).toBe(443);
  });
});
