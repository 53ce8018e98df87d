import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const DEFAULT_REDIRECT_URI = 'http://127.0.0.1:8080/callback';

const envBool = z
  .string()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase()));

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  OAUTH_CLIENT_ID: z.string().min(1).optional(),
  OAUTH_CLIENT_SECRET: z.string().min(1).optional(),
  OAUTH_AUTHORIZE_URL: z.string().url().default('https://accounts.spotify.com/authorize'),
  OAUTH_TOKEN_URL: z.string().url().default('https://accounts.spotify.com/api/token'),
  OAUTH_REDIRECT_URI: z.string().url().default(DEFAULT_REDIRECT_URI),
  OAUTH_SCOPES: z
    .string()
    .default('user-read-private playlist-read-private playlist-read-collaborative playlist-modify-private'),
  OAUTH_LISTEN_HOST: z.string().min(1).default('127.0.0.1'),
  OAUTH_LISTEN_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  OAUTH_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  OAUTH_USE_PKCE: envBool.default('true'),
  PROGRESS_BUFFER_SIZE: z.coerce.number().int().positive().default(16),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export type EnvSource = Record<string, string | undefined>;

/** Parse and validate the environment. Throws a ZodError on invalid values. */
export function loadEnv(source: EnvSource = process.env): AppEnv {
  return EnvSchema.parse(source);
}

/** Port of the redirect URI, falling back to the scheme default. */
export function redirectPort(redirectUri: string): number {
  const url = new URL(redirectUri);
  if (url.port) return Number(url.port);
  return url.protocol === 'https:' ? 443 : 80;
}
