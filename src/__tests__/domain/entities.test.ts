/**
 * Domain Entity Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  DEFAULT_EXTRACTION_OPTIONS,
  InvalidRepositoryError,
  applyEmail,
  applyProfile,
  createUserRecord,
  extractionOptionsSchema,
  freezeExtraction,
  parseRepositoryIdentifier,
  toDate,
} from '../../domain/entities/index.js';
import type { RepositoryRecord } from '../../domain/entities/index.js';
import type { GitHubProfile } from '../../integrations/github/types.js';

const profile: GitHubProfile = {
  id: 42,
  login: 'octocat',
  avatarUrl: 'https://avatars.githubusercontent.com/u/42',
  url: 'https://api.github.com/users/octocat',
  htmlUrl: 'https://github.com/octocat',
  type: 'User',
  name: 'The Octocat',
  company: '@github',
  blog: 'https://github.blog',
  location: 'San Francisco',
  email: 'octocat@example.com',
  bio: null,
  twitterUsername: null,
  publicRepos: 8,
  followers: 9000,
  following: 9,
  createdAt: '2011-01-25T18:44:36Z',
  updatedAt: 'not a date',
};

describe('parseRepositoryIdentifier', () => {
  it('should accept owner/name', () => {
    expect(parseRepositoryIdentifier('octocat/Hello-World')).toEqual({ owner: 'octocat', name: 'Hello-World' });
  });

  it('should normalize github.com URLs', () => {
    expect(parseRepositoryIdentifier('https://github.com/octocat/Hello-World')).toEqual({
      owner: 'octocat',
      name: 'Hello-World',
    });
    expect(parseRepositoryIdentifier('http://www.github.com/octocat/Hello-World.git')).toEqual({
      owner: 'octocat',
      name: 'Hello-World',
    });
    expect(parseRepositoryIdentifier('https://github.com/octocat/Hello-World/tree/main')).toEqual({
      owner: 'octocat',
      name: 'Hello-World',
    });
  });

  it('should strip a trailing .git from owner/name', () => {
    expect(parseRepositoryIdentifier(' octocat/Hello-World.git ')).toEqual({
      owner: 'octocat',
      name: 'Hello-World',
    });
  });

  it('should reject other hosts and malformed values', () => {
    expect(() => parseRepositoryIdentifier('https://gitlab.com/octocat/Hello-World')).toThrow(
      InvalidRepositoryError
    );
    expect(() => parseRepositoryIdentifier('octocat')).toThrow(InvalidRepositoryError);
    expect(() => parseRepositoryIdentifier('a/b/c')).toThrow(InvalidRepositoryError);
    expect(() => parseRepositoryIdentifier('https://github.com/octocat')).toThrow(InvalidRepositoryError);
    expect(() => parseRepositoryIdentifier('octo cat/repo')).toThrow(InvalidRepositoryError);
  });
});

describe('UserRecord', () => {
  it('should take the profile email with source profile', () => {
    const record = applyProfile(createUserRecord({ login: 'octocat' }), profile, 'octocat@example.com');

    expect(record).toMatchObject({
      id: 42,
      name: 'The Octocat',
      company: '@github',
      email: 'octocat@example.com',
      emailSource: 'profile',
      createdAt: new Date('2011-01-25T18:44:36Z'),
      updatedAt: null,
    });
  });

  it('should never replace an email that is already set', () => {
    const resolved = applyEmail(createUserRecord({ login: 'octocat' }), 'first@example.com', 'public-events');

    expect(applyEmail(resolved, 'second@example.com', 'commit-search')).toBe(resolved);
    expect(applyProfile(resolved, profile, 'octocat@example.com')).toMatchObject({
      email: 'first@example.com',
      emailSource: 'public-events',
    });
  });

  it('should leave the email empty when nothing was found', () => {
    const record = createUserRecord({ login: 'octocat' });
    expect(applyEmail(record, null, null)).toBe(record);
    expect(applyProfile(record, { ...profile, email: null }, null)).toMatchObject({
      email: null,
      emailSource: null,
    });
  });

  it('should parse dates and reject invalid ones', () => {
    expect(toDate('2020-01-01T00:00:00Z')).toEqual(new Date('2020-01-01T00:00:00Z'));
    expect(toDate('garbage')).toBeNull();
    expect(toDate(null)).toBeNull();
  });
});

describe('extraction options', () => {
  it('should default every option', () => {
    expect(DEFAULT_EXTRACTION_OPTIONS).toEqual({
      includeStargazers: true,
      includeForkers: true,
      maxStargazers: null,
      maxForkers: null,
      detailedUserInfo: false,
      aggressiveEmailExtraction: true,
    });
  });

  it('should reject unknown keys and negative caps', () => {
    expect(extractionOptionsSchema.safeParse({ maxStargazers: -1 }).success).toBe(false);
    expect(extractionOptionsSchema.safeParse({ maxForkers: 1.5 }).success).toBe(false);
    expect(extractionOptionsSchema.safeParse({ verbose: true }).success).toBe(false);
    expect(extractionOptionsSchema.parse({ maxStargazers: 0 }).maxStargazers).toBe(0);
  });
});

describe('freezeExtraction', () => {
  it('should freeze the repository record and its topics without touching the input', () => {
    const repository: RepositoryRecord = {
      id: 1,
      name: 'Hello-World',
      fullName: 'octocat/Hello-World',
      owner: 'octocat',
      description: null,
      htmlUrl: 'https://github.com/octocat/Hello-World',
      homepage: null,
      language: null,
      topics: ['octocat'],
      defaultBranch: 'master',
      stargazersCount: 80,
      forksCount: 9,
      watchersCount: 80,
      openIssuesCount: 0,
      createdAt: null,
      updatedAt: null,
      pushedAt: null,
    };

    const result = freezeExtraction({
      id: '3b241101-e2bb-4255-8caf-4136c566a962',
      repository,
      stargazers: [],
      forkers: [],
      totalStargazers: 80,
      totalForkers: 9,
      extractedAt: new Date('2024-01-01T00:00:00Z'),
    });

    expect(Object.isFrozen(result.repository)).toBe(true);
    expect(Object.isFrozen(result.repository.topics)).toBe(true);
    expect(Reflect.set(result.repository, 'fullName', 'someone/else')).toBe(false);
    expect(result.repository.fullName).toBe('octocat/Hello-World');
    expect(Object.isFrozen(repository)).toBe(false);
  });
});
