/**
 * UserRecord - one stargazer or forker
 *
 * Starts with the identity fields a list endpoint returns and is enriched in
 * place by the profile fetch and email resolution. Login is the key.
 */

import type { EmailSource, GitHubProfile, GitHubUser } from '../../integrations/github/index.js';

export interface UserRecord {
  // Identity (always present from list endpoints)
  login: string;
  id: number | null;
  avatarUrl: string | null;
  htmlUrl: string | null;

  // Profile detail
  name: string | null;
  location: string | null;
  company: string | null;
  bio: string | null;
  blog: string | null;
  twitterUsername: string | null;
  publicRepos: number | null;
  followers: number | null;
  following: number | null;
  createdAt: Date | null;
  updatedAt: Date | null;

  // Contact
  email: string | null;
  emailSource: EmailSource | null;
}

export function createUserRecord(user: Pick<GitHubUser, 'login'> & Partial<GitHubUser>): UserRecord {
  return {
    login: user.login,
    id: user.id ?? null,
    avatarUrl: user.avatarUrl ?? null,
    htmlUrl: user.htmlUrl ?? null,
    name: null,
    location: null,
    company: null,
    bio: null,
    blog: null,
    twitterUsername: null,
    publicRepos: null,
    followers: null,
    following: null,
    createdAt: null,
    updatedAt: null,
    email: null,
    emailSource: null,
  };
}

/**
 * Merge a fetched profile into a record. An email already on the record is
 * kept; otherwise the profile's public email is taken with source 'profile'.
 */
export function applyProfile(record: UserRecord, profile: GitHubProfile, profileEmail: string | null): UserRecord {
  const email = record.email ?? profileEmail;
  return {
    ...record,
    id: profile.id,
    avatarUrl: profile.avatarUrl ?? record.avatarUrl,
    htmlUrl: profile.htmlUrl ?? record.htmlUrl,
    name: profile.name,
    location: profile.location,
    company: profile.company,
    bio: profile.bio,
    blog: profile.blog,
    twitterUsername: profile.twitterUsername,
    publicRepos: profile.publicRepos,
    followers: profile.followers,
    following: profile.following,
    createdAt: toDate(profile.createdAt),
    updatedAt: toDate(profile.updatedAt),
    email,
    emailSource: record.email ? record.emailSource : profileEmail ? 'profile' : null,
  };
}

/** Set the email only when the record has none yet. */
export function applyEmail(record: UserRecord, email: string | null, source: EmailSource | null): UserRecord {
  if (record.email || !email) return record;
  return { ...record, email, emailSource: source };
}

export function toDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
