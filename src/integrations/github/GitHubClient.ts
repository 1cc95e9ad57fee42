/**
 * GitHub API Client
 *
 * Rate-limited REST transport shared by the paginator, the email extractor and
 * the extraction service:
 * - Tracks the core quota from x-ratelimit-* headers (search has its own bucket)
 * - Sleeps until reset (bounded) or fails fast when the quota is exhausted
 * - Retries 5xx/network failures with exponential backoff
 * - Honours retry-after once for secondary rate limits
 *
 * Rate Limits:
 * - Unauthenticated: 60 requests/hour
 * - Authenticated: 5,000 requests/hour
 *
 * API Docs: https://docs.github.com/en/rest
 */

import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { z } from 'zod';
import type { EnvironmentConfig } from '../../infrastructure/config/environment.js';
import { resolveToken } from '../../infrastructure/config/environment.js';
import { Mutex } from '../../infrastructure/queue/WorkerPool.js';
import {
  ApiError,
  AuthError,
  NotFoundError,
  RateLimitError,
  TransientApiError,
} from './errors.js';
import {
  normalizeCommit,
  normalizeEvent,
  normalizeProfile,
  normalizeRepo,
  parsePayload,
} from './normalize.js';
import {
  apiCommitSchema,
  apiCommitSearchSchema,
  apiEventSchema,
  apiRateLimitSchema,
  apiRepoSchema,
  apiProfileSchema,
} from './types.js';
import type {
  ApiRequester,
  GitHubClientConfig,
  GitHubCommit,
  GitHubEvent,
  GitHubProfile,
  GitHubRepo,
  HttpMethod,
  Logger,
  QueryParams,
  RateLimitState,
  RateLimitStatus,
  RepositorySort,
} from './types.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEFAULT_BASE_URL = 'https://api.github.com';
export const UNAUTHENTICATED_QUOTA = 60;
export const AUTHENTICATED_QUOTA = 5000;

const DEFAULT_USER_AGENT = 'stargazer-extractor/0.1.0';
const API_VERSION = '2022-11-28';
const RESET_MARGIN_MS = 1000;
const CORE_RESOURCE = 'core';
// GitHub asks for at least a minute when a secondary limit comes without retry-after
const SECONDARY_RATE_LIMIT_DELAY_MS = 60_000;

type ClientSettings = Required<
  Pick<
    GitHubClientConfig,
    | 'baseUrl'
    | 'userAgent'
    | 'waitForRateLimit'
    | 'maxRateLimitWaitMs'
    | 'maxRetries'
    | 'retryBaseDelayMs'
    | 'requestTimeoutMs'
    | 'rateLimitStalenessMs'
  >
>;

const DEFAULT_SETTINGS: ClientSettings = {
  baseUrl: DEFAULT_BASE_URL,
  userAgent: DEFAULT_USER_AGENT,
  waitForRateLimit: true,
  maxRateLimitWaitMs: 15 * 60 * 1000,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  requestTimeoutMs: 30_000,
  rateLimitStalenessMs: 60_000,
};

type HeaderBag = Record<string, string | number | undefined>;

type Failure =
  | { kind: 'fatal'; error: unknown }
  | { kind: 'primary'; error: RateLimitError }
  | { kind: 'secondary'; error: RateLimitError }
  | { kind: 'transient'; status: number; message: string };

// =============================================================================
// GITHUB CLIENT
// =============================================================================

export class GitHubClient implements ApiRequester {
  private octokit: Octokit;
  private settings: ClientSettings;
  private readonly token: string | null;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  // Core quota tracking: last core response wins, guarded by the gate
  private rateLimit: RateLimitState | null = null;
  private gate = new Mutex();

  constructor(config: GitHubClientConfig = {}) {
    const token = config.token?.trim();
    this.token = token ? token : null;
    this.settings = {
      baseUrl: config.baseUrl ?? DEFAULT_SETTINGS.baseUrl,
      userAgent: config.userAgent ?? DEFAULT_SETTINGS.userAgent,
      waitForRateLimit: config.waitForRateLimit ?? DEFAULT_SETTINGS.waitForRateLimit,
      maxRateLimitWaitMs: config.maxRateLimitWaitMs ?? DEFAULT_SETTINGS.maxRateLimitWaitMs,
      maxRetries: Math.max(1, config.maxRetries ?? DEFAULT_SETTINGS.maxRetries),
      retryBaseDelayMs: config.retryBaseDelayMs ?? DEFAULT_SETTINGS.retryBaseDelayMs,
      requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_SETTINGS.requestTimeoutMs,
      rateLimitStalenessMs: config.rateLimitStalenessMs ?? DEFAULT_SETTINGS.rateLimitStalenessMs,
    };
    this.logger = config.logger ?? console;
    this.sleep = config.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = config.now ?? Date.now;

    this.octokit = new Octokit({
      baseUrl: this.settings.baseUrl,
      userAgent: this.settings.userAgent,
      request: config.fetch ? { fetch: config.fetch } : undefined,
      log: {
        debug: () => undefined,
        info: () => undefined,
        warn: (message: string) => this.logger.warn(`[Octokit] ${message}`),
        error: (message: string) => this.logger.error(`[Octokit] ${message}`),
      },
    });
  }

  get isAuthenticated(): boolean {
    return this.token !== null;
  }

  /** Hourly ceiling implied by the credential */
  get quotaCeiling(): number {
    return this.token ? AUTHENTICATED_QUOTA : UNAUTHENTICATED_QUOTA;
  }

  // ===========================================================================
  // TRANSPORT
  // ===========================================================================

  /**
   * Issue a request and return the decoded JSON body.
   *
   * @throws AuthError on 401, NotFoundError on 404, RateLimitError when the
   * quota cannot be waited out, TransientApiError once retries are spent
   */
  async request(method: HttpMethod, path: string, query: QueryParams = {}): Promise<unknown> {
    return this.execute(method, path, query, false);
  }

  private async execute(
    method: HttpMethod,
    path: string,
    query: QueryParams,
    bypassQuota: boolean
  ): Promise<unknown> {
    const { maxRetries } = this.settings;
    // Transient attempts, plus one secondary-limit retry and one primary-limit wait
    const attemptLimit = maxRetries + 2;
    let transientFailures = 0;
    let secondaryRetried = false;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attemptLimit; attempt++) {
      if (!bypassQuota) await this.acquireQuota();

      try {
        const route: string = `${method} ${path}`;
        const response = await this.octokit.request(route, this.buildParameters(query));
        this.recordRateLimit(response.headers);
        const data: unknown = response.data;
        return data;
      } catch (error) {
        const failure = this.classifyFailure(error, path);

        switch (failure.kind) {
          case 'fatal':
            throw failure.error;

          case 'primary':
            if (!this.settings.waitForRateLimit) throw failure.error;
            this.logger.warn(`[GitHubClient] ${method} ${path} exhausted the quota, waiting for reset`);
            // The gate only tracks core; other buckets are waited out here
            if (failure.error.resource !== CORE_RESOURCE) await this.waitForBucketReset(failure.error);
            lastError = failure.error;
            break;

          case 'secondary': {
            const delay = failure.error.retryAfterMs ?? SECONDARY_RATE_LIMIT_DELAY_MS;
            if (secondaryRetried || delay > this.settings.maxRateLimitWaitMs) throw failure.error;
            secondaryRetried = true;
            this.logger.warn(
              `[GitHubClient] ${method} ${path} hit a secondary rate limit, retrying in ${delay}ms`
            );
            await this.sleep(delay);
            lastError = failure.error;
            break;
          }

          case 'transient': {
            transientFailures++;
            const transient = new TransientApiError(
              `${method} ${path} failed: ${failure.message}`,
              failure.status,
              transientFailures
            );
            if (transientFailures >= maxRetries) throw transient;
            const delay = this.settings.retryBaseDelayMs * 2 ** (transientFailures - 1);
            this.logger.warn(
              `[GitHubClient] ${method} ${path} -> ${failure.status || 'network error'}, ` +
                `retry ${transientFailures}/${maxRetries - 1} in ${delay}ms`
            );
            await this.sleep(delay);
            lastError = transient;
            break;
          }
        }
      }
    }

    throw lastError ?? new TransientApiError(`${method} ${path} exhausted retries`, 0, attemptLimit);
  }

  private buildParameters(query: QueryParams): Record<string, unknown> {
    const parameters: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) parameters[key] = value;
    }

    const headers: Record<string, string> = {
      accept: 'application/vnd.github+json',
      'x-github-api-version': API_VERSION,
    };
    if (this.token) headers.authorization = `Bearer ${this.token}`;

    return {
      ...parameters,
      headers,
      request: { signal: AbortSignal.timeout(this.settings.requestTimeoutMs) },
    };
  }

  private classifyFailure(error: unknown, path: string): Failure {
    if (!(error instanceof RequestError)) {
      if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
        return { kind: 'transient', status: 0, message: error.message };
      }
      return { kind: 'fatal', error };
    }

    const headers: HeaderBag = error.response?.headers ?? {};
    this.recordRateLimit(headers);
    const status = error.status;

    if (status === 401) return { kind: 'fatal', error: new AuthError(error.message) };
    if (status === 404) return { kind: 'fatal', error: new NotFoundError(path) };

    if (status === 403 || status === 429) {
      const remaining = toInteger(headers['x-ratelimit-remaining']);
      const resource = resourceOf(headers);
      const retryAfterMs = parseRetryAfter(headers['retry-after']);

      if (remaining === 0) {
        const reset = toInteger(headers['x-ratelimit-reset']);
        const fallbackReset = resource === CORE_RESOURCE ? (this.rateLimit?.resetAt ?? null) : null;
        const resetAt = reset !== null ? new Date(reset * 1000) : fallbackReset;
        return {
          kind: 'primary',
          error: new RateLimitError(
            `${resource === CORE_RESOURCE ? 'Rate limit' : `Rate limit for ${resource}`} exhausted` +
              `${resetAt ? `; resets at ${resetAt.toISOString()}` : ''}`,
            {
              statusCode: status,
              resetAt,
              limit: toInteger(headers['x-ratelimit-limit']) ?? this.quotaCeiling,
              resource,
            }
          ),
        };
      }

      if (retryAfterMs !== null || status === 429 || /secondary rate limit|abuse/i.test(error.message)) {
        return {
          kind: 'secondary',
          error: new RateLimitError(`Secondary rate limit: ${error.message}`, {
            statusCode: status,
            retryAfterMs,
            secondary: true,
            resource,
          }),
        };
      }

      return { kind: 'fatal', error: new ApiError(error.message, status, 'FORBIDDEN', { path }) };
    }

    // Network failures surface as status 500 without a response
    if (status >= 500) return { kind: 'transient', status, message: error.message };

    return { kind: 'fatal', error: new ApiError(error.message, status, 'GITHUB_API_ERROR', { path }) };
  }

  // ===========================================================================
  // RATE LIMITING
  // ===========================================================================

  /**
   * Wait for (or refuse) quota, then reserve one unit of it. Runs under the
   * gate so concurrent callers see each other's reservations; a caller that is
   * sleeping for a reset holds everyone else behind it.
   */
  private async acquireQuota(): Promise<void> {
    await this.gate.runExclusive(async () => {
      const state = this.rateLimit;
      if (!state) return;

      if (state.remaining > 0) {
        this.rateLimit = { ...state, remaining: state.remaining - 1 };
        return;
      }

      const waitMs = state.resetAt.getTime() - this.now();
      if (waitMs <= 0) return;

      if (!this.settings.waitForRateLimit) {
        throw new RateLimitError(
          `Rate limit of ${state.limit} requests exhausted; resets at ${state.resetAt.toISOString()}`,
          { resetAt: state.resetAt, limit: state.limit }
        );
      }
      if (waitMs > this.settings.maxRateLimitWaitMs) {
        throw new RateLimitError(
          `Rate limit resets at ${state.resetAt.toISOString()}, beyond the ` +
            `${this.settings.maxRateLimitWaitMs}ms wait bound`,
          { resetAt: state.resetAt, limit: state.limit }
        );
      }

      this.logger.warn(
        `[GitHubClient] Rate limit exhausted, waiting ${Math.ceil(waitMs / 1000)}s until ${state.resetAt.toISOString()}`
      );
      await this.sleep(waitMs + RESET_MARGIN_MS);
    });
  }

  /**
   * Sleep out a non-core bucket (search allows 30 requests/minute) without
   * touching the core gate. Refuses when the reset is unknown or too far away.
   */
  private async waitForBucketReset(error: RateLimitError): Promise<void> {
    if (!error.resetAt) throw error;
    const waitMs = Math.max(0, error.resetAt.getTime() - this.now());
    if (waitMs > this.settings.maxRateLimitWaitMs) throw error;
    await this.sleep(waitMs + RESET_MARGIN_MS);
  }

  /** Only the core bucket feeds the gate and the reported status. */
  private recordRateLimit(headers: HeaderBag): void {
    const remaining = toInteger(headers['x-ratelimit-remaining']);
    const reset = toInteger(headers['x-ratelimit-reset']);
    if (remaining === null || reset === null) return;
    if (resourceOf(headers) !== CORE_RESOURCE) return;

    this.rateLimit = {
      limit: toInteger(headers['x-ratelimit-limit']) ?? this.quotaCeiling,
      remaining,
      used: toInteger(headers['x-ratelimit-used']),
      resetAt: new Date(reset * 1000),
      resource: CORE_RESOURCE,
      observedAt: new Date(this.now()),
    };
  }

  /** Snapshot of the last observed quota, or null before the first response */
  getRateLimitState(): RateLimitState | null {
    return this.rateLimit ? { ...this.rateLimit } : null;
  }

  /**
   * Current quota. Served from the last response when it is recent enough,
   * otherwise from GET /rate_limit (which does not count against the quota).
   */
  async getRateLimitStatus(): Promise<RateLimitStatus> {
    const state = this.rateLimit;
    if (state && this.now() - state.observedAt.getTime() <= this.settings.rateLimitStalenessMs) {
      return toStatus(state);
    }

    const data = await this.execute('GET', '/rate_limit', {}, true);
    const { core } = parsePayload(apiRateLimitSchema, data, 'rate limit').resources;
    this.rateLimit = {
      limit: core.limit,
      remaining: core.remaining,
      used: core.used ?? null,
      resetAt: new Date(core.reset * 1000),
      resource: CORE_RESOURCE,
      observedAt: new Date(this.now()),
    };
    return toStatus(this.rateLimit);
  }

  // ===========================================================================
  // REPOSITORIES
  // ===========================================================================

  async getRepository(owner: string, repo: string): Promise<GitHubRepo> {
    const data = await this.request('GET', `/repos/${segment(owner)}/${segment(repo)}`);
    return normalizeRepo(parsePayload(apiRepoSchema, data, `repository ${owner}/${repo}`));
  }

  /**
   * Get a user's own public repositories (forks included; callers filter)
   */
  async listUserRepositories(
    username: string,
    options: { sort?: RepositorySort; perPage?: number } = {}
  ): Promise<GitHubRepo[]> {
    const data = await this.request('GET', `/users/${segment(username)}/repos`, {
      type: 'owner',
      sort: options.sort ?? 'pushed',
      per_page: options.perPage ?? 30,
    });
    return parsePayload(z.array(apiRepoSchema), data, `repositories of ${username}`).map(normalizeRepo);
  }

  // ===========================================================================
  // PROFILE
  // ===========================================================================

  async getUser(username: string): Promise<GitHubProfile> {
    const data = await this.request('GET', `/users/${segment(username)}`);
    return normalizeProfile(parsePayload(apiProfileSchema, data, `user ${username}`));
  }

  // ===========================================================================
  // COMMITS & EVENTS (for email extraction)
  // ===========================================================================

  async listRepositoryCommits(
    owner: string,
    repo: string,
    options: { author?: string; perPage?: number } = {}
  ): Promise<GitHubCommit[]> {
    const data = await this.request('GET', `/repos/${segment(owner)}/${segment(repo)}/commits`, {
      author: options.author,
      per_page: options.perPage ?? 30,
    });
    return parsePayload(z.array(apiCommitSchema), data, `commits of ${owner}/${repo}`).map(
      normalizeCommit
    );
  }

  async listUserPublicEvents(
    username: string,
    options: { page?: number; perPage?: number } = {}
  ): Promise<GitHubEvent[]> {
    const data = await this.request('GET', `/users/${segment(username)}/events/public`, {
      page: options.page ?? 1,
      per_page: options.perPage ?? 100,
    });
    return parsePayload(z.array(apiEventSchema), data, `events of ${username}`).map(normalizeEvent);
  }

  /**
   * Search commits across GitHub, newest first
   *
   * @example
   * await client.searchCommits('author:octocat', { perPage: 20 });
   */
  async searchCommits(query: string, options: { perPage?: number } = {}): Promise<GitHubCommit[]> {
    const data = await this.request('GET', '/search/commits', {
      q: query,
      sort: 'author-date',
      order: 'desc',
      per_page: options.perPage ?? 30,
    });
    return parsePayload(apiCommitSearchSchema, data, `commit search "${query}"`).items.map(
      normalizeCommit
    );
  }
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Build a client from parsed environment configuration. The credential is
 * resolved here, once; an explicit token wins over GITHUB_TOKEN/GH_TOKEN.
 */
export function createGitHubClientFromEnv(
  env: EnvironmentConfig,
  overrides: GitHubClientConfig = {}
): GitHubClient {
  return new GitHubClient({
    baseUrl: env.githubApiUrl,
    userAgent: env.userAgent,
    waitForRateLimit: env.waitForRateLimit,
    maxRateLimitWaitMs: env.maxRateLimitWaitMs,
    maxRetries: env.maxRetries,
    requestTimeoutMs: env.requestTimeoutMs,
    ...overrides,
    token: resolveToken(overrides.token, env),
  });
}

// =============================================================================
// UTILITIES
// =============================================================================

function segment(value: string): string {
  return encodeURIComponent(value);
}

function toInteger(value: string | number | undefined): number | null {
  if (value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

function resourceOf(headers: HeaderBag): string {
  const resource = headers['x-ratelimit-resource'];
  return typeof resource === 'string' && resource !== '' ? resource : CORE_RESOURCE;
}

function parseRetryAfter(value: string | number | undefined): number | null {
  const seconds = toInteger(value);
  return seconds === null ? null : Math.max(0, seconds) * 1000;
}

function toStatus(state: RateLimitState): RateLimitStatus {
  return {
    limit: state.limit,
    remaining: state.remaining,
    used: state.used,
    resetAt: new Date(state.resetAt.getTime()),
    resource: state.resource,
  };
}
