/**
 * Environment Configuration
 *
 * The environment is parsed once, at startup, into an immutable config object.
 * Nothing else in the app reads process.env.
 */

import { z } from 'zod';

// =============================================================================
// ERRORS
// =============================================================================

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public issues: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// =============================================================================
// SCHEMA
// =============================================================================

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      if (value === 'true' || value === '1' || value === 'yes') return true;
      if (value === 'false' || value === '0' || value === 'no') return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected true or false' });
      return z.NEVER;
    });

const optionalInteger = (min: number, max: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().min(min).max(max).optional()
  );

const environmentSchema = z.object({
  GITHUB_TOKEN: optionalString,
  GH_TOKEN: optionalString,
  GITHUB_API_URL: optionalString.pipe(z.string().url().optional()),
  GITHUB_USER_AGENT: optionalString,
  GITHUB_WAIT_FOR_RATE_LIMIT: booleanFlag(true),
  GITHUB_MAX_RATE_LIMIT_WAIT_MS: optionalInteger(0, 24 * 60 * 60 * 1000),
  GITHUB_MAX_RETRIES: optionalInteger(1, 10),
  GITHUB_REQUEST_TIMEOUT_MS: optionalInteger(1000, 10 * 60 * 1000),
  STARGAZER_CONCURRENCY: optionalInteger(1, 8),
  DEBUG: booleanFlag(false),
});

// =============================================================================
// CONFIG
// =============================================================================

export interface EnvironmentConfig {
  githubToken?: string;
  githubApiUrl?: string;
  userAgent?: string;
  waitForRateLimit: boolean;
  maxRateLimitWaitMs?: number;
  maxRetries?: number;
  requestTimeoutMs?: number;
  concurrency: number;
  debug: boolean;
}

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment configuration (${issues.join('; ')})`, issues);
  }

  const values = parsed.data;
  return Object.freeze({
    githubToken: values.GITHUB_TOKEN ?? values.GH_TOKEN,
    githubApiUrl: values.GITHUB_API_URL,
    userAgent: values.GITHUB_USER_AGENT,
    waitForRateLimit: values.GITHUB_WAIT_FOR_RATE_LIMIT,
    maxRateLimitWaitMs: values.GITHUB_MAX_RATE_LIMIT_WAIT_MS,
    maxRetries: values.GITHUB_MAX_RETRIES,
    requestTimeoutMs: values.GITHUB_REQUEST_TIMEOUT_MS,
    concurrency: values.STARGAZER_CONCURRENCY ?? 1,
    debug: values.DEBUG,
  });
}

/**
 * An explicit token (CLI flag, constructor argument) wins over the environment.
 * Blank strings count as absent.
 */
export function resolveToken(
  explicit: string | undefined,
  config: Pick<EnvironmentConfig, 'githubToken'>
): string | undefined {
  const trimmed = explicit?.trim();
  return trimmed ? trimmed : config.githubToken;
}
