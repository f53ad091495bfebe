import path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';

export const LASTFM_API_URL = 'https://ws.audioscrobbler.com/2.0/';
export const DOCUMENT_FILE = 'README.md';
export const POLL_INTERVAL_MS = 60_000;

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const configSchema = z.object({
  lastfm: z.object({
    apiKey: z.string({ required_error: 'LASTFM_API_KEY is required' }),
    username: z.string({ required_error: 'LASTFM_USERNAME is required' }),
    apiUrl: z.string().url().default(LASTFM_API_URL),
    timeoutMs: z.number().int().positive().default(10_000),
    retryLimit: z.number().int().nonnegative().default(5),
    retryBackoffMs: z.number().int().nonnegative().default(100),
  }),
  repository: z.object({
    path: z.string().default('.'),
    documentFile: z.string().default(DOCUMENT_FILE),
    gitTimeoutMs: z.number().int().positive().default(60_000),
  }),
  poll: z.object({
    intervalMs: z.number().int().positive().default(POLL_INTERVAL_MS),
  }),
  display: z.object({
    timeZone: z
      .string()
      .default('UTC')
      .refine(isTimeZone, (value) => ({ message: `NOW_PLAYING_TIMEZONE "${value}" is not a known time zone` })),
  }),
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error'], {
      errorMap: () => ({ message: 'LOG_LEVEL must be one of debug, info, warn, error' }),
    }).default('info'),
  }),
});

export type Config = z.infer<typeof configSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Builds the configuration from environment variables. Callers load `.env`
 * themselves (see main.ts) so tests can pass a plain object.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const repoPath = nonEmpty(env.REPO_PATH);

  const rawConfig = {
    lastfm: {
      apiKey: nonEmpty(env.LASTFM_API_KEY),
      username: nonEmpty(env.LASTFM_USERNAME),
    },
    repository: {
      path: repoPath ? path.resolve(repoPath) : path.resolve('.'),
    },
    poll: {},
    display: {
      timeZone: nonEmpty(env.NOW_PLAYING_TIMEZONE),
    },
    log: {
      level: nonEmpty(env.LOG_LEVEL)?.toLowerCase(),
    },
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message));
  }
  return result.data;
}

/**
 * One line for the operator when the process cannot start.
 */
export function startupErrorMessage(error: unknown): string {
  if (error instanceof ConfigError) {
    return `${error.message} (check the environment or .env)`;
  }
  return `Failed to start: ${errorMessage(error)}`;
}

export function documentPath(config: Config): string {
  return path.join(config.repository.path, config.repository.documentFile);
}
