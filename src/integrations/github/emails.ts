/**
 * Email address filtering shared by every commit-scanning strategy.
 */

import type { GitHubCommit } from './types.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

/**
 * GitHub's privacy addresses: `<id>+<login>@users.noreply.github.com`,
 * `<login>@users.noreply.github.com`, the web-flow `noreply@github.com`,
 * and anything whose local part starts with noreply/no-reply.
 */
export function isNoreplyEmail(email: string): boolean {
  const lower = email.trim().toLowerCase();
  const local = lower.split('@')[0] ?? '';
  return (
    lower.endsWith('@users.noreply.github.com') ||
    lower === 'noreply@github.com' ||
    local.startsWith('noreply') ||
    local.startsWith('no-reply')
  );
}

/** The trimmed address when it is a real, non-privacy email; otherwise null. */
export function usableEmail(email: string | null | undefined): string | null {
  const trimmed = email?.trim();
  if (!trimmed || !isValidEmail(trimmed) || isNoreplyEmail(trimmed)) return null;
  return trimmed;
}

/** First usable author email, then committer email, in commit order. */
export function firstCommitEmail(commits: readonly GitHubCommit[]): string | null {
  for (const commit of commits) {
    const email = usableEmail(commit.author?.email) ?? usableEmail(commit.committer?.email);
    if (email) return email;
  }
  return null;
}
