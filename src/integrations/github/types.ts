/**
 * GitHub Integration Types
 *
 * Normalized (camelCase) shapes handed to the rest of the app, plus the zod
 * schemas that validate raw REST payloads before normalization.
 */

import { z } from 'zod';

// =============================================================================
// LOGGING
// =============================================================================

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface GitHubClientConfig {
  /** Personal access token. Absent means unauthenticated (60 requests/hour). */
  token?: string;
  /** Optional: Custom base URL for GitHub Enterprise */
  baseUrl?: string;
  userAgent?: string;
  /** Sleep until the quota resets instead of failing with RateLimitError */
  waitForRateLimit?: boolean;
  maxRateLimitWaitMs?: number;
  /** Attempts for 5xx and network failures, including the first one */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  requestTimeoutMs?: number;
  /** How long a header-derived quota snapshot answers status queries */
  rateLimitStalenessMs?: number;
  logger?: Logger;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type HttpMethod = 'GET';

export type QueryParams = Record<string, string | number | boolean | undefined>;

/** Anything that can issue a JSON request; the paginator only needs this much. */
export interface ApiRequester {
  request(method: HttpMethod, path: string, query?: QueryParams): Promise<unknown>;
}

// =============================================================================
// RATE LIMIT TYPES
// =============================================================================

export interface RateLimitState {
  limit: number;
  remaining: number;
  used: number | null;
  resetAt: Date;
  resource: string;
  observedAt: Date;
}

export interface RateLimitStatus {
  limit: number;
  remaining: number;
  used: number | null;
  resetAt: Date;
  resource: string;
}

// =============================================================================
// USER/PROFILE TYPES
// =============================================================================

export interface GitHubUser {
  id: number;
  login: string;
  avatarUrl: string | null;
  url: string | null;
  htmlUrl: string | null;
  type: string | null;
}

export interface GitHubProfile extends GitHubUser {
  name: string | null;
  company: string | null;
  blog: string | null;
  location: string | null;
  email: string | null;
  bio: string | null;
  twitterUsername: string | null;
  publicRepos: number;
  followers: number;
  following: number;
  createdAt: string | null;
  updatedAt: string | null;
}

// =============================================================================
// REPOSITORY TYPES
// =============================================================================

export interface GitHubRepo {
  id: number;
  name: string;
  fullName: string;
  owner: GitHubUser;
  htmlUrl: string;
  description: string | null;
  fork: boolean;
  createdAt: string | null;
  updatedAt: string | null;
  pushedAt: string | null;
  homepage: string | null;
  stargazersCount: number;
  watchersCount: number;
  language: string | null;
  forksCount: number;
  openIssuesCount: number;
  defaultBranch: string | null;
  topics: string[];
}

export type RepositorySort = 'created' | 'updated' | 'pushed' | 'full_name';

// =============================================================================
// COMMIT / EVENT TYPES
// =============================================================================

export interface CommitIdentity {
  name: string | null;
  email: string | null;
  date: string | null;
}

export interface GitHubCommit {
  sha: string;
  author: CommitIdentity | null;
  committer: CommitIdentity | null;
  authorLogin: string | null;
}

export interface GitHubEvent {
  id: string;
  type: string;
  createdAt: string | null;
  /** Only populated for PushEvent payloads */
  commits: Array<{ sha: string | null; author: CommitIdentity | null }>;
}

// =============================================================================
// EMAIL EXTRACTION TYPES
// =============================================================================

/** Which strategy produced an email, strongest first */
export const EMAIL_SOURCES = [
  'profile',
  'repository-commits',
  'public-events',
  'commit-search',
] as const;

export type EmailSource = (typeof EMAIL_SOURCES)[number];

export interface StrategyAttempt {
  source: EmailSource;
  outcome: 'found' | 'not-found' | 'failed' | 'budget-exhausted';
  error?: string;
}

export interface EmailExtractionResult {
  email: string | null;
  source: EmailSource | null;
  /** Underlying API requests spent on this user */
  requestsUsed: number;
  attempts: StrategyAttempt[];
}

// =============================================================================
// API RESPONSE SCHEMAS (raw GitHub API responses)
// =============================================================================

export const apiUserSchema = z.object({
  id: z.number(),
  login: z.string(),
  avatar_url: z.string().nullish(),
  url: z.string().nullish(),
  html_url: z.string().nullish(),
  type: z.string().nullish(),
});

export const apiProfileSchema = apiUserSchema.extend({
  name: z.string().nullish(),
  company: z.string().nullish(),
  blog: z.string().nullish(),
  location: z.string().nullish(),
  email: z.string().nullish(),
  bio: z.string().nullish(),
  twitter_username: z.string().nullish(),
  public_repos: z.number().nullish(),
  followers: z.number().nullish(),
  following: z.number().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});

export const apiRepoSchema = z.object({
  id: z.number(),
  name: z.string(),
  full_name: z.string(),
  owner: apiUserSchema,
  html_url: z.string(),
  description: z.string().nullish(),
  fork: z.boolean().default(false),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  pushed_at: z.string().nullish(),
  homepage: z.string().nullish(),
  stargazers_count: z.number().default(0),
  watchers_count: z.number().default(0),
  language: z.string().nullish(),
  forks_count: z.number().default(0),
  open_issues_count: z.number().default(0),
  default_branch: z.string().nullish(),
  topics: z.array(z.string()).nullish(),
});

/** Fork listings are repositories; only the owner matters to us. */
export const apiForkSchema = z.object({
  owner: apiUserSchema,
});

const apiCommitIdentitySchema = z.object({
  name: z.string().nullish(),
  email: z.string().nullish(),
  date: z.string().nullish(),
});

export const apiCommitSchema = z.object({
  sha: z.string(),
  commit: z.object({
    author: apiCommitIdentitySchema.nullish(),
    committer: apiCommitIdentitySchema.nullish(),
  }),
  author: z.object({ login: z.string() }).nullish(),
});

export const apiCommitSearchSchema = z.object({
  total_count: z.number().default(0),
  items: z.array(apiCommitSchema),
});

export const apiEventSchema = z.object({
  id: z.string(),
  type: z.string().nullish(),
  created_at: z.string().nullish(),
  payload: z
    .object({
      commits: z
        .array(
          z.object({
            sha: z.string().nullish(),
            author: apiCommitIdentitySchema.nullish(),
          })
        )
        .nullish(),
    })
    .nullish(),
});

const apiRateResourceSchema = z.object({
  limit: z.number(),
  remaining: z.number(),
  reset: z.number(),
  used: z.number().nullish(),
});

export const apiRateLimitSchema = z.object({
  resources: z.object({
    core: apiRateResourceSchema,
  }),
});

export type GitHubApiUser = z.infer<typeof apiUserSchema>;
export type GitHubApiProfile = z.infer<typeof apiProfileSchema>;
export type GitHubApiRepo = z.infer<typeof apiRepoSchema>;
export type GitHubApiCommit = z.infer<typeof apiCommitSchema>;
export type GitHubApiEvent = z.infer<typeof apiEventSchema>;
