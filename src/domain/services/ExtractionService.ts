/**
 * Extraction Service
 *
 * Drives one repository extraction end to end:
 * 1. Repository metadata (single call)
 * 2. Stargazers and forkers, paginated with optional caps
 * 3. Optional per-user enrichment: profile detail, then email resolution
 *
 * Repository-level failures abort the call. A failure on one user is logged
 * and that record keeps whatever it already had, except for AuthError and an
 * exhausted core quota, which would fail every remaining user the same way.
 */

import { v4 as uuidv4 } from 'uuid';
import { runWithConcurrency } from '../../infrastructure/queue/WorkerPool.js';
import {
  EmailExtractor,
  NotFoundError,
  Paginator,
  apiForkSchema,
  apiUserSchema,
  describeError,
  isRunFatal,
  normalizeUser,
  parsePayload,
  usableEmail,
} from '../../integrations/github/index.js';
import type {
  GitHubClient,
  GitHubProfile,
  GitHubUser,
  Logger,
  RateLimitStatus,
} from '../../integrations/github/index.js';
import {
  applyEmail,
  applyProfile,
  createRepositoryRecord,
  createUserRecord,
  extractionOptionsSchema,
  freezeExtraction,
  parseRepositoryIdentifier,
} from '../entities/index.js';
import type {
  ExtractionOptions,
  ExtractionOptionsInput,
  ExtractionResult,
  RepositoryIdentifier,
  UserRecord,
} from '../entities/index.js';

// =============================================================================
// TYPES
// =============================================================================

export const MAX_CONCURRENCY = 8;

export interface ExtractionServiceOptions {
  emailExtractor?: EmailExtractor;
  paginator?: Paginator;
  /** Users enriched in parallel (1..8); all of them share the client's quota */
  concurrency?: number;
  logger?: Logger;
}

type UserSource = 'stargazers' | 'forkers';

// =============================================================================
// EXTRACTION SERVICE
// =============================================================================

export class ExtractionService {
  private client: GitHubClient;
  private paginator: Paginator;
  private emailExtractor: EmailExtractor;
  private concurrency: number;
  private logger: Logger;

  constructor(client: GitHubClient, options: ExtractionServiceOptions = {}) {
    this.client = client;
    this.logger = options.logger ?? console;
    this.paginator = options.paginator ?? new Paginator(client);
    this.emailExtractor =
      options.emailExtractor ?? new EmailExtractor(client, { logger: this.logger });
    this.concurrency = clampConcurrency(options.concurrency ?? 1);
  }

  /**
   * Extract stargazers and forkers of `repositoryIdentifier` (owner/name or a
   * github.com URL).
   *
   * @throws InvalidRepositoryError for a malformed identifier
   * @throws NotFoundError when the repository does not exist
   * @throws the signal's reason once `signal` is aborted
   */
  async extract(
    repositoryIdentifier: string,
    options: ExtractionOptionsInput = {},
    signal?: AbortSignal
  ): Promise<ExtractionResult> {
    const settings = extractionOptionsSchema.parse(options);
    const identifier = parseRepositoryIdentifier(repositoryIdentifier);
    const fullName = `${identifier.owner}/${identifier.name}`;

    signal?.throwIfAborted();
    const repo = await this.client.getRepository(identifier.owner, identifier.name);
    const repository = createRepositoryRecord(repo);
    this.logger.log(
      `[ExtractionService] ${repository.fullName}: ${repository.stargazersCount} stars, ${repository.forksCount} forks`
    );

    let stargazers: UserRecord[] = [];
    if (settings.includeStargazers) {
      stargazers = await this.collectUsers('stargazers', identifier, settings.maxStargazers, signal);
      this.logger.log(`[ExtractionService] Collected ${stargazers.length} stargazers of ${fullName}`);
    }

    let forkers: UserRecord[] = [];
    if (settings.includeForkers) {
      forkers = await this.collectUsers('forkers', identifier, settings.maxForkers, signal);
      this.logger.log(`[ExtractionService] Collected ${forkers.length} forkers of ${fullName}`);
    }

    if (settings.detailedUserInfo) {
      stargazers = await this.enrichUsers(stargazers, settings, signal);
      forkers = await this.enrichUsers(forkers, settings, signal);
    }

    return freezeExtraction({
      id: uuidv4(),
      repository,
      stargazers,
      forkers,
      totalStargazers: repository.stargazersCount,
      totalForkers: repository.forksCount,
      extractedAt: new Date(),
    });
  }

  async getRateLimitStatus(): Promise<RateLimitStatus> {
    return this.client.getRateLimitStatus();
  }

  // ===========================================================================
  // LISTS
  // ===========================================================================

  private async collectUsers(
    source: UserSource,
    { owner, name }: RepositoryIdentifier,
    maxItems: number | null,
    signal?: AbortSignal
  ): Promise<UserRecord[]> {
    const path = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}/${
      source === 'stargazers' ? 'stargazers' : 'forks'
    }`;

    const records: UserRecord[] = [];
    const seen = new Set<string>();

    for await (const item of this.paginator.paginate(path, { maxItems, signal })) {
      const user = toListUser(source, item, path);
      const key = user.login.toLowerCase();
      if (seen.has(key)) {
        this.logger.debug(`[ExtractionService] Dropping repeated ${source} entry ${user.login}`);
        continue;
      }
      seen.add(key);
      records.push(createUserRecord(user));
    }

    return records;
  }

  // ===========================================================================
  // ENRICHMENT
  // ===========================================================================

  private async enrichUsers(
    users: UserRecord[],
    settings: ExtractionOptions,
    signal?: AbortSignal
  ): Promise<UserRecord[]> {
    return runWithConcurrency(
      users,
      this.concurrency,
      (user) => this.enrichUser(user, settings, signal),
      signal
    );
  }

  /**
   * Profile detail and email resolution fail independently: a user whose
   * profile cannot be fetched still goes through the resolver, unless the
   * account no longer exists.
   */
  private async enrichUser(
    user: UserRecord,
    settings: ExtractionOptions,
    signal?: AbortSignal
  ): Promise<UserRecord> {
    let record = user;
    let profile: GitHubProfile | null = null;

    signal?.throwIfAborted();
    try {
      profile = await this.client.getUser(user.login);
      record = applyProfile(record, profile, usableEmail(profile.email));
    } catch (error) {
      this.rethrowIfFatal(error, signal);
      this.logger.warn(`[ExtractionService] Could not fetch profile of ${user.login}: ${describeError(error)}`);
      if (error instanceof NotFoundError) return record;
    }

    if (record.email) return record;

    signal?.throwIfAborted();
    try {
      const found = await this.emailExtractor.extractEmail(user.login, {
        aggressive: settings.aggressiveEmailExtraction,
        profile,
      });
      record = applyEmail(record, found.email, found.source);
    } catch (error) {
      this.rethrowIfFatal(error, signal);
      this.logger.warn(`[ExtractionService] Could not resolve email of ${user.login}: ${describeError(error)}`);
    }

    return record;
  }

  private rethrowIfFatal(error: unknown, signal?: AbortSignal): void {
    if (signal?.aborted || isRunFatal(error)) throw error;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function toListUser(source: UserSource, item: unknown, path: string): GitHubUser {
  if (source === 'forkers') {
    return normalizeUser(parsePayload(apiForkSchema, item, path).owner);
  }
  return normalizeUser(parsePayload(apiUserSchema, item, path));
}

function clampConcurrency(value: number): number {
  if (!Number.isFinite(value)) return 1;
  return Math.min(MAX_CONCURRENCY, Math.max(1, Math.floor(value)));
}
