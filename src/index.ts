/**
 * Stargazer Extractor - library entry point
 *
 * Collects the stargazers and forkers of a GitHub repository, optionally
 * enriches them with profile detail and a recovered contact email.
 *
 * @example
 * const client = new GitHubClient({ token: process.env.GITHUB_TOKEN });
 * const service = new ExtractionService(client);
 * const result = await service.extract('octocat/Hello-World', { maxStargazers: 50 });
 */

// GitHub transport, pagination and email resolution
export * from './integrations/github/index.js';

// Records and options
export * from './domain/entities/index.js';

// Extraction and export
export * from './domain/services/index.js';

// Configuration and logging
export {
  loadEnvironment,
  resolveToken,
  ConfigurationError,
  type EnvironmentConfig,
} from './infrastructure/config/environment.js';
export { createLogger, silentLogger } from './infrastructure/logging/logger.js';
export { runWithConcurrency, Mutex } from './infrastructure/queue/WorkerPool.js';
