import { describe, it, expect } from '@jest/globals';
import {
  ConfigurationError,
  loadEnvironment,
  resolveToken,
} from '../../infrastructure/config/environment.js';

describe('loadEnvironment', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadEnvironment({})).toEqual({
      githubToken: undefined,
      githubApiUrl: undefined,
      userAgent: undefined,
      waitForRateLimit: true,
      maxRateLimitWaitMs: undefined,
      maxRetries: undefined,
      requestTimeoutMs: undefined,
      concurrency: 1,
      debug: false,
    });
  });

  it('should parse every supported variable', () => {
    const config = loadEnvironment({
      GITHUB_TOKEN: 'test-secret',
      GITHUB_API_URL: 'https://github.example.com/api/v3',
      GITHUB_USER_AGENT: 'my-agent',
      GITHUB_WAIT_FOR_RATE_LIMIT: 'false',
      GITHUB_MAX_RATE_LIMIT_WAIT_MS: '60000',
      GITHUB_MAX_RETRIES: '5',
      GITHUB_REQUEST_TIMEOUT_MS: '10000',
      STARGAZER_CONCURRENCY: '4',
      DEBUG: '1',
    });

    expect(config).toEqual({
      githubToken: 'test-secret',
      githubApiUrl: 'https://github.example.com/api/v3',
      userAgent: 'my-agent',
      waitForRateLimit: false,
      maxRateLimitWaitMs: 60000,
      maxRetries: 5,
      requestTimeoutMs: 10000,
      concurrency: 4,
      debug: true,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should prefer GITHUB_TOKEN over GH_TOKEN and ignore blanks', () => {
    expect(loadEnvironment({ GITHUB_TOKEN: 'a', GH_TOKEN: 'b' }).githubToken).toBe('a');
    expect(loadEnvironment({ GITHUB_TOKEN: '  ', GH_TOKEN: 'b' }).githubToken).toBe('b');
    expect(loadEnvironment({ GH_TOKEN: '' }).githubToken).toBeUndefined();
  });

  it('should name every invalid key', () => {
    const error = (() => {
      try {
        loadEnvironment({ STARGAZER_CONCURRENCY: '20', GITHUB_WAIT_FOR_RATE_LIMIT: 'maybe' });
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    const keys = error instanceof ConfigurationError ? error.issues.map((issue) => issue.split(':')[0]) : [];
    expect(keys.sort()).toEqual(['GITHUB_WAIT_FOR_RATE_LIMIT', 'STARGAZER_CONCURRENCY']);
  });
});

describe('resolveToken', () => {
  it('should let an explicit token win and treat blank as absent', () => {
    const config = { githubToken: 'from-env' };
    expect(resolveToken('from-flag', config)).toBe('from-flag');
    expect(resolveToken('   ', config)).toBe('from-env');
    expect(resolveToken(undefined, config)).toBe('from-env');
    expect(resolveToken(undefined, {})).toBeUndefined();
  });
});
