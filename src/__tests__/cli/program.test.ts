/**
 * CLI Tests
 *
 * Flag parsing and output, with the extraction service replaced by a stub.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { InvalidArgumentError } from 'commander';
import {
  createProgram,
  describeCliError,
  parseCount,
  toExtractionOptions,
} from '../../cli/program.js';
import type { ExtractionRunner, ServiceSettings } from '../../cli/program.js';
import { applyEmail, createUserRecord, freezeExtraction } from '../../domain/entities/index.js';
import type { ExtractionResult } from '../../domain/entities/index.js';
import { loadEnvironment } from '../../infrastructure/config/environment.js';
import { silentLogger } from '../../infrastructure/logging/logger.js';
import { AuthError, NotFoundError, RateLimitError } from '../../integrations/github/errors.js';
import type { RateLimitStatus } from '../../integrations/github/types.js';

const result: ExtractionResult = freezeExtraction({
  id: '3b241101-e2bb-4255-8caf-4136c566a962',
  repository: {
    id: 1,
    name: 'Hello-World',
    fullName: 'octocat/Hello-World',
    owner: 'octocat',
    description: null,
    htmlUrl: 'https://github.com/octocat/Hello-World',
    homepage: null,
    language: null,
    topics: [],
    defaultBranch: 'master',
    stargazersCount: 80,
    forksCount: 9,
    watchersCount: 80,
    openIssuesCount: 0,
    createdAt: null,
    updatedAt: null,
    pushedAt: null,
  },
  stargazers: [applyEmail(createUserRecord({ login: 'alice' }), 'alice@example.com', 'profile')],
  forkers: [],
  totalStargazers: 80,
  totalForkers: 9,
  extractedAt: new Date('2024-01-01T00:00:00Z'),
});

const status: RateLimitStatus = {
  limit: 5000,
  remaining: 4999,
  used: 1,
  resetAt: new Date('2024-01-01T01:00:00Z'),
  resource: 'core',
};

describe('stargazer-extract', () => {
  let lines: string[];
  let extract: jest.Mock<ExtractionRunner['extract']>;
  let getRateLimitStatus: jest.Mock<ExtractionRunner['getRateLimitStatus']>;
  let createService: jest.Mock<(settings: ServiceSettings) => ExtractionRunner>;
  let writeExtraction: jest.Mock<(path: string, value: ExtractionResult) => Promise<void>>;

  const run = (args: string[], env: Record<string, string> = {}) =>
    createProgram({
      env: loadEnvironment(env),
      logger: { ...silentLogger, log: (message: unknown) => lines.push(String(message)) },
      createService,
      writeExtraction,
    }).parseAsync(args, { from: 'user' });

  beforeEach(() => {
    lines = [];
    extract = jest.fn<ExtractionRunner['extract']>().mockResolvedValue(result);
    getRateLimitStatus = jest.fn<ExtractionRunner['getRateLimitStatus']>().mockResolvedValue(status);
    createService = jest.fn<(settings: ServiceSettings) => ExtractionRunner>(() => ({
      extract,
      getRateLimitStatus,
    }));
    writeExtraction = jest.fn<(path: string, value: ExtractionResult) => Promise<void>>(async () => undefined);
  });

  describe('extract', () => {
    it('should map flags onto extraction options', async () => {
      await run(['extract', 'octocat/Hello-World', '--max-stargazers', '2', '--no-forkers', '--detailed', '--no-aggressive']);

      expect(extract).toHaveBeenCalledWith(
        'octocat/Hello-World',
        {
          includeStargazers: true,
          includeForkers: false,
          maxStargazers: 2,
          maxForkers: null,
          detailedUserInfo: true,
          aggressiveEmailExtraction: false,
        },
        undefined
      );
    });

    it('should use the defaults when no flags are given', async () => {
      await run(['extract', 'octocat/Hello-World']);

      expect(extract.mock.calls[0][1]).toEqual({
        includeStargazers: true,
        includeForkers: true,
        maxStargazers: null,
        maxForkers: null,
        detailedUserInfo: false,
        aggressiveEmailExtraction: true,
      });
      expect(createService).toHaveBeenCalledWith({ token: undefined, waitForRateLimit: true, concurrency: 1 });
    });

    it('should pass token, wait and concurrency to the service', async () => {
      await run(['extract', 'octocat/Hello-World', '--token', 'test-token', '--no-wait', '--concurrency', '4']);

      expect(createService).toHaveBeenCalledWith({ token: 'test-token', waitForRateLimit: false, concurrency: 4 });
    });

    it('should take concurrency and wait mode from the environment', async () => {
      await run(['extract', 'octocat/Hello-World'], {
        STARGAZER_CONCURRENCY: '3',
        GITHUB_WAIT_FOR_RATE_LIMIT: 'false',
      });

      expect(createService).toHaveBeenCalledWith({ token: undefined, waitForRateLimit: false, concurrency: 3 });
    });

    it('should hand a cancellation signal to the run when a timeout is set', async () => {
      await run(['extract', 'octocat/Hello-World', '--timeout', '5000']);

      expect(extract.mock.calls[0][2]).toBeInstanceOf(AbortSignal);
    });

    it('should print a summary with emails', async () => {
      await run(['extract', 'octocat/Hello-World']);

      expect(lines).toEqual([
        'Repository: octocat/Hello-World (80 stars, 9 forks)',
        'Stargazers collected: 1',
        'Forkers collected: 0',
        '\nStargazers:',
        '  alice <alice@example.com> (profile)',
      ]);
      expect(writeExtraction).not.toHaveBeenCalled();
    });

    it('should write the export when an output path is given', async () => {
      await run(['extract', 'octocat/Hello-World', '-o', 'out/result.json']);

      expect(writeExtraction).toHaveBeenCalledWith('out/result.json', result);
      expect(lines[lines.length - 1]).toBe('Wrote out/result.json');
    });

    it('should let service errors propagate', async () => {
      const failure = new NotFoundError('/repos/octocat/missing');
      extract.mockRejectedValue(failure);

      await expect(run(['extract', 'octocat/missing'])).rejects.toBe(failure);
    });
  });

  describe('rate-limit', () => {
    it('should print the remaining quota and reset time', async () => {
      await run(['rate-limit', '--token', 'test-token']);

      expect(createService).toHaveBeenCalledWith({ token: 'test-token', waitForRateLimit: true, concurrency: 1 });
      expect(lines).toEqual(['Remaining: 4999/5000', 'Resets at: 2024-01-01T01:00:00.000Z']);
    });
  });
});

describe('CLI helpers', () => {
  it('should parse counts and reject anything else', () => {
    expect(parseCount('0')).toBe(0);
    expect(parseCount('25')).toBe(25);
    expect(() => parseCount('-1')).toThrow(InvalidArgumentError);
    expect(() => parseCount('2.5')).toThrow(InvalidArgumentError);
    expect(() => parseCount('ten')).toThrow(InvalidArgumentError);
  });

  it('should leave unset caps as null', () => {
    expect(
      toExtractionOptions({ stargazers: false, forkers: true, aggressive: true, wait: true, maxForkers: 5 })
    ).toEqual({
      includeStargazers: false,
      includeForkers: true,
      maxStargazers: null,
      maxForkers: 5,
      detailedUserInfo: false,
      aggressiveEmailExtraction: true,
    });
  });

  it('should turn known failures into hints', () => {
    expect(describeCliError(new RateLimitError('spent', { resetAt: new Date('2024-01-01T01:00:00Z') }))).toBe(
      'GitHub rate limit exceeded. Resets at 2024-01-01T01:00:00.000Z. Pass --token or set GITHUB_TOKEN for 5,000 requests/hour.'
    );
    expect(describeCliError(new AuthError())).toBe('GitHub rejected the credentials. Check --token or GITHUB_TOKEN.');
    expect(describeCliError(new NotFoundError('/repos/octocat/missing'))).toBe(
      'Not found on GitHub: /repos/octocat/missing. Check the repository name and that it is public.'
    );
    expect(describeCliError(new Error('something else'))).toBe('something else');
  });
});
