/**
 * Payload validation and snake_case → camelCase normalization.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ApiError } from './errors.js';
import type {
  CommitIdentity,
  GitHubApiCommit,
  GitHubApiEvent,
  GitHubApiProfile,
  GitHubApiRepo,
  GitHubApiUser,
  GitHubCommit,
  GitHubEvent,
  GitHubProfile,
  GitHubRepo,
  GitHubUser,
} from './types.js';

/**
 * Validate a raw payload, raising ApiError('INVALID_RESPONSE') when GitHub
 * sends something we do not understand.
 */
export function parsePayload<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ApiError(`Unexpected response shape for ${context}`, 200, 'INVALID_RESPONSE', {
      context,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}

export const normalizeUser = (data: GitHubApiUser): GitHubUser => ({
  id: data.id,
  login: data.login,
  avatarUrl: data.avatar_url ?? null,
  url: data.url ?? null,
  htmlUrl: data.html_url ?? null,
  type: data.type ?? null,
});

export const normalizeProfile = (data: GitHubApiProfile): GitHubProfile => ({
  ...normalizeUser(data),
  name: data.name ?? null,
  company: data.company ?? null,
  blog: data.blog || null,
  location: data.location ?? null,
  email: data.email || null,
  bio: data.bio ?? null,
  twitterUsername: data.twitter_username ?? null,
  publicRepos: data.public_repos ?? 0,
  followers: data.followers ?? 0,
  following: data.following ?? 0,
  createdAt: data.created_at ?? null,
  updatedAt: data.updated_at ?? null,
});

export const normalizeRepo = (data: GitHubApiRepo): GitHubRepo => ({
  id: data.id,
  name: data.name,
  fullName: data.full_name,
  owner: normalizeUser(data.owner),
  htmlUrl: data.html_url,
  description: data.description ?? null,
  fork: data.fork,
  createdAt: data.created_at ?? null,
  updatedAt: data.updated_at ?? null,
  pushedAt: data.pushed_at ?? null,
  homepage: data.homepage || null,
  stargazersCount: data.stargazers_count,
  watchersCount: data.watchers_count,
  language: data.language ?? null,
  forksCount: data.forks_count,
  openIssuesCount: data.open_issues_count,
  defaultBranch: data.default_branch ?? null,
  topics: data.topics ?? [],
});

const normalizeIdentity = (
  data: { name?: string | null; email?: string | null; date?: string | null } | null | undefined
): CommitIdentity | null =>
  data
    ? {
        name: data.name ?? null,
        email: data.email ?? null,
        date: data.date ?? null,
      }
    : null;

export const normalizeCommit = (data: GitHubApiCommit): GitHubCommit => ({
  sha: data.sha,
  author: normalizeIdentity(data.commit.author),
  committer: normalizeIdentity(data.commit.committer),
  authorLogin: data.author?.login ?? null,
});

export const normalizeEvent = (data: GitHubApiEvent): GitHubEvent => ({
  id: data.id,
  type: data.type ?? 'UnknownEvent',
  createdAt: data.created_at ?? null,
  commits: (data.payload?.commits ?? []).map((commit) => ({
    sha: commit.sha ?? null,
    author: normalizeIdentity(commit.author),
  })),
});
