/**
 * RepositoryRecord - the repository being extracted
 *
 * Created once per extraction from the metadata call and never modified.
 */

import type { GitHubRepo } from '../../integrations/github/index.js';
import { toDate } from './User.js';

export interface RepositoryRecord {
  id: number;
  name: string;
  fullName: string;
  owner: string;
  description: string | null;
  htmlUrl: string;
  homepage: string | null;
  language: string | null;
  topics: readonly string[];
  defaultBranch: string | null;
  stargazersCount: number;
  forksCount: number;
  watchersCount: number;
  openIssuesCount: number;
  createdAt: Date | null;
  updatedAt: Date | null;
  pushedAt: Date | null;
}

export function createRepositoryRecord(repo: GitHubRepo): RepositoryRecord {
  return {
    id: repo.id,
    name: repo.name,
    fullName: repo.fullName,
    owner: repo.owner.login,
    description: repo.description,
    htmlUrl: repo.htmlUrl,
    homepage: repo.homepage,
    language: repo.language,
    topics: [...repo.topics],
    defaultBranch: repo.defaultBranch,
    stargazersCount: repo.stargazersCount,
    forksCount: repo.forksCount,
    watchersCount: repo.watchersCount,
    openIssuesCount: repo.openIssuesCount,
    createdAt: toDate(repo.createdAt),
    updatedAt: toDate(repo.updatedAt),
    pushedAt: toDate(repo.pushedAt),
  };
}

// =============================================================================
// IDENTIFIERS
// =============================================================================

export class InvalidRepositoryError extends Error {
  constructor(
    message: string,
    public input: string
  ) {
    super(message);
    this.name = 'InvalidRepositoryError';
  }
}

export interface RepositoryIdentifier {
  owner: string;
  name: string;
}

const SEGMENT = /^[A-Za-z0-9_.-]+$/;

/**
 * Accepts `owner/name` or a github.com URL (scheme and host are stripped,
 * as are a trailing `.git` and any deeper path such as `/tree/main`).
 *
 * @example
 * parseRepositoryIdentifier('https://github.com/octocat/Hello-World.git')
 * // => { owner: 'octocat', name: 'Hello-World' }
 */
export function parseRepositoryIdentifier(input: string): RepositoryIdentifier {
  const value = input.trim();
  let path = value;

  if (/^https?:\/\//i.test(value)) {
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      throw new InvalidRepositoryError(`Invalid repository URL: ${value}`, input);
    }
    const host = url.hostname.toLowerCase();
    if (host !== 'github.com' && host !== 'www.github.com') {
      throw new InvalidRepositoryError('Only github.com repositories are supported', input);
    }
    const parts = url.pathname.split('/').filter(Boolean);
    if (parts.length < 2) {
      throw new InvalidRepositoryError(`Invalid GitHub repository URL: ${value}`, input);
    }
    path = `${parts[0]}/${parts[1]}`;
  }

  const parts = path.split('/');
  if (parts.length !== 2) {
    throw new InvalidRepositoryError(
      "Invalid repository identifier. Use a GitHub URL or 'owner/repo'",
      input
    );
  }

  const owner = parts[0];
  const name = parts[1].replace(/\.git$/i, '');
  if (!SEGMENT.test(owner) || !SEGMENT.test(name)) {
    throw new InvalidRepositoryError(
      "Invalid repository identifier. Use a GitHub URL or 'owner/repo'",
      input
    );
  }

  return { owner, name };
}
