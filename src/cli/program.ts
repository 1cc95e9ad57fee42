/**
 * stargazer-extract command line
 *
 *   stargazer-extract extract <repo> [options]
 *   stargazer-extract rate-limit [--token <t>]
 *
 * Commands throw; the bin entry point turns errors into a hint and exit code 1.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { EnvironmentConfig } from '../infrastructure/config/environment.js';
import { ConfigurationError } from '../infrastructure/config/environment.js';
import {
  AuthError,
  NotFoundError,
  RateLimitError,
  createGitHubClientFromEnv,
} from '../integrations/github/index.js';
import type { Logger, RateLimitStatus } from '../integrations/github/index.js';
import { InvalidRepositoryError } from '../domain/entities/index.js';
import type { ExtractionOptions, ExtractionResult, UserRecord } from '../domain/entities/index.js';
import { ExtractionService, MAX_CONCURRENCY } from '../domain/services/ExtractionService.js';
import { writeExtractionFile } from '../domain/services/ExportService.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ExtractCommandOptions {
  token?: string;
  stargazers: boolean;
  forkers: boolean;
  maxStargazers?: number;
  maxForkers?: number;
  detailed?: boolean;
  aggressive: boolean;
  concurrency?: number;
  wait: boolean;
  timeout?: number;
  output?: string;
}

export interface ServiceSettings {
  token?: string;
  waitForRateLimit: boolean;
  concurrency: number;
}

export type ExtractionRunner = Pick<ExtractionService, 'extract' | 'getRateLimitStatus'>;

export interface CliDependencies {
  env: EnvironmentConfig;
  /** Sink for command output and diagnostics */
  logger?: Logger;
  createService?: (settings: ServiceSettings) => ExtractionRunner;
  writeExtraction?: (path: string, result: ExtractionResult) => Promise<void>;
  /** Aborted by the entry point on SIGINT/SIGTERM */
  signal?: AbortSignal;
}

// =============================================================================
// PROGRAM
// =============================================================================

export function createProgram(deps: CliDependencies): Command {
  const logger = deps.logger ?? console;
  const createService = deps.createService ?? defaultServiceFactory(deps.env, logger);
  const writeExtraction = deps.writeExtraction ?? writeExtractionFile;

  const program = new Command();
  program
    .name('stargazer-extract')
    .description('Extract stargazers and forkers of a GitHub repository')
    .version('0.1.0');

  program
    .command('extract')
    .description('Collect stargazers and forkers, optionally with profiles and emails')
    .argument('<repo>', "repository as 'owner/repo' or a github.com URL")
    .option('--token <token>', 'GitHub token (defaults to GITHUB_TOKEN, then GH_TOKEN)')
    .option('--no-stargazers', 'skip the stargazer list')
    .option('--no-forkers', 'skip the forker list')
    .option('--max-stargazers <n>', 'cap on stargazers collected', parseCount)
    .option('--max-forkers <n>', 'cap on forkers collected', parseCount)
    .option('--detailed', 'fetch every profile and resolve emails')
    .option('--no-aggressive', 'skip commit search during email resolution')
    .option('--concurrency <n>', `users enriched in parallel (1-${MAX_CONCURRENCY})`, parseConcurrency)
    .option('--no-wait', 'fail instead of waiting when the rate limit is exhausted')
    .option('--timeout <ms>', 'cancel the run after this many milliseconds', parsePositive)
    .option('-o, --output <file>', 'write the result as JSON')
    .action(async (repo: string, options: ExtractCommandOptions) => {
      const service = createService({
        token: options.token,
        waitForRateLimit: options.wait && deps.env.waitForRateLimit,
        concurrency: options.concurrency ?? deps.env.concurrency,
      });

      const signal = combineSignals(
        deps.signal,
        options.timeout ? AbortSignal.timeout(options.timeout) : undefined
      );
      const result = await service.extract(repo, toExtractionOptions(options), signal);

      printSummary(result, logger);
      if (options.output) {
        await writeExtraction(options.output, result);
        logger.log(`Wrote ${options.output}`);
      }
    });

  program
    .command('rate-limit')
    .description('Show the remaining GitHub API quota')
    .option('--token <token>', 'GitHub token (defaults to GITHUB_TOKEN, then GH_TOKEN)')
    .action(async (options: { token?: string }) => {
      const service = createService({
        token: options.token,
        waitForRateLimit: deps.env.waitForRateLimit,
        concurrency: 1,
      });
      printRateLimit(await service.getRateLimitStatus(), logger);
    });

  return program;
}

/** Map parsed flags onto the extraction options the service validates. */
export function toExtractionOptions(options: ExtractCommandOptions): ExtractionOptions {
  return {
    includeStargazers: options.stargazers,
    includeForkers: options.forkers,
    maxStargazers: options.maxStargazers ?? null,
    maxForkers: options.maxForkers ?? null,
    detailedUserInfo: options.detailed ?? false,
    aggressiveEmailExtraction: options.aggressive,
  };
}

/** One-line hint for errors a user can act on; anything else keeps its message. */
export function describeCliError(error: unknown): string {
  if (error instanceof RateLimitError) {
    const reset = error.resetAt ? ` Resets at ${error.resetAt.toISOString()}.` : '';
    return `GitHub rate limit exceeded.${reset} Pass --token or set GITHUB_TOKEN for 5,000 requests/hour.`;
  }
  if (error instanceof AuthError) {
    return 'GitHub rejected the credentials. Check --token or GITHUB_TOKEN.';
  }
  if (error instanceof NotFoundError) {
    return `Not found on GitHub: ${error.resource}. Check the repository name and that it is public.`;
  }
  if (error instanceof InvalidRepositoryError || error instanceof ConfigurationError) {
    return error.message;
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return 'Extraction cancelled: --timeout elapsed.';
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return 'Extraction cancelled.';
  }
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// OUTPUT
// =============================================================================

function printSummary(result: ExtractionResult, logger: Logger): void {
  const { repository } = result;
  logger.log(
    `Repository: ${repository.fullName} (${result.totalStargazers} stars, ${result.totalForkers} forks)`
  );
  logger.log(`Stargazers collected: ${result.stargazers.length}`);
  logger.log(`Forkers collected: ${result.forkers.length}`);

  printUsers('Stargazers', result.stargazers, logger);
  printUsers('Forkers', result.forkers, logger);
}

function printUsers(title: string, users: readonly UserRecord[], logger: Logger): void {
  if (users.length === 0) return;
  logger.log(`\n${title}:`);
  for (const user of users) {
    logger.log(user.email ? `  ${user.login} <${user.email}> (${user.emailSource})` : `  ${user.login}`);
  }
}

function printRateLimit(status: RateLimitStatus, logger: Logger): void {
  logger.log(`Remaining: ${status.remaining}/${status.limit}`);
  logger.log(`Resets at: ${status.resetAt.toISOString()}`);
}

// =============================================================================
// HELPERS
// =============================================================================

function defaultServiceFactory(env: EnvironmentConfig, logger: Logger) {
  return (settings: ServiceSettings): ExtractionRunner => {
    const client = createGitHubClientFromEnv(env, {
      token: settings.token,
      waitForRateLimit: settings.waitForRateLimit,
      logger,
    });
    return new ExtractionService(client, { concurrency: settings.concurrency, logger });
  };
}

function combineSignals(...candidates: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const signals = candidates.filter((signal): signal is AbortSignal => signal !== undefined);
  if (signals.length <= 1) return signals[0];
  return AbortSignal.any(signals);
}

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a whole number of 0 or more.');
  }
  return parsed;
}

function parsePositive(value: string): number {
  const parsed = parseCount(value);
  if (parsed === 0) throw new InvalidArgumentError('Expected a number greater than 0.');
  return parsed;
}

function parseConcurrency(value: string): number {
  const parsed = parsePositive(value);
  if (parsed > MAX_CONCURRENCY) {
    throw new InvalidArgumentError(`Expected a number from 1 to ${MAX_CONCURRENCY}.`);
  }
  return parsed;
}
