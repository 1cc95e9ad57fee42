/**
 * Email Resolution Strategies
 *
 * Each strategy is one way of recovering an address GitHub does not show on
 * the profile. Strategies spend from a shared per-user RequestBudget before
 * every call, so the driver can bound the cost of any single user.
 */

import { isRunFatal, describeError } from './errors.js';
import { firstCommitEmail, usableEmail } from './emails.js';
import type { GitHubClient } from './GitHubClient.js';
import type { EmailSource, GitHubCommit, GitHubProfile, Logger } from './types.js';

// =============================================================================
// BUDGET
// =============================================================================

export class BudgetExhaustedError extends Error {
  constructor(public limit: number) {
    super(`Request budget of ${limit} exhausted`);
    this.name = 'BudgetExhaustedError';
  }
}

export class RequestBudget {
  private used = 0;

  constructor(public readonly limit: number) {}

  get spent(): number {
    return this.used;
  }

  get remaining(): number {
    return this.limit - this.used;
  }

  /** Claim one request; throws BudgetExhaustedError once the limit is reached. */
  spend(): void {
    if (this.used >= this.limit) throw new BudgetExhaustedError(this.limit);
    this.used++;
  }
}

// =============================================================================
// CONTEXT
// =============================================================================

export type EmailLookupClient = Pick<
  GitHubClient,
  'getUser' | 'listUserRepositories' | 'listRepositoryCommits' | 'listUserPublicEvents' | 'searchCommits'
>;

export interface StrategyLimits {
  /** Owned, non-fork repositories scanned for commits */
  repositories: number;
  commitsPerRepository: number;
  eventPages: number;
  searchResults: number;
}

export const STANDARD_LIMITS: StrategyLimits = {
  repositories: 3,
  commitsPerRepository: 30,
  eventPages: 2,
  searchResults: 30,
};

export const AGGRESSIVE_LIMITS: StrategyLimits = {
  repositories: 5,
  commitsPerRepository: 30,
  eventPages: 3,
  searchResults: 50,
};

export interface ResolutionContext {
  username: string;
  client: EmailLookupClient;
  budget: RequestBudget;
  limits: StrategyLimits;
  /** Profile the caller already fetched, if any */
  profile: GitHubProfile | null;
  logger: Logger;
}

export interface EmailStrategy {
  readonly source: EmailSource;
  /** Only runs when the caller opted into aggressive extraction */
  readonly aggressiveOnly: boolean;
  attempt(context: ResolutionContext): Promise<string | null>;
}

// =============================================================================
// STRATEGIES
// =============================================================================

/** 1. The profile's public email: authoritative and at most one request. */
export class ProfileEmailStrategy implements EmailStrategy {
  readonly source = 'profile';
  readonly aggressiveOnly = false;

  async attempt({ username, client, budget, profile }: ResolutionContext): Promise<string | null> {
    if (profile) return usableEmail(profile.email);
    budget.spend();
    const fetched = await client.getUser(username);
    return usableEmail(fetched.email);
  }
}

/** 2. Commits the user authored in their most recently pushed repositories. */
export class RepositoryCommitsStrategy implements EmailStrategy {
  readonly source = 'repository-commits';
  readonly aggressiveOnly = false;

  async attempt({ username, client, budget, limits, logger }: ResolutionContext): Promise<string | null> {
    budget.spend();
    const repos = await client.listUserRepositories(username, {
      sort: 'pushed',
      perPage: Math.max(10, limits.repositories * 2),
    });

    const candidates = repos.filter((repo) => !repo.fork).slice(0, limits.repositories);
    for (const repo of candidates) {
      budget.spend();
      let commits: GitHubCommit[];
      try {
        commits = await client.listRepositoryCommits(repo.owner.login, repo.name, {
          author: username,
          perPage: limits.commitsPerRepository,
        });
      } catch (error) {
        if (isRunFatal(error)) throw error;
        // Empty or unavailable repositories are common; move to the next one
        logger.debug(`[EmailExtractor] Skipping ${repo.fullName} for ${username}: ${describeError(error)}`);
        continue;
      }

      const email = firstCommitEmail(commits);
      if (email) return email;
    }

    return null;
  }
}

/** 3. Commit authors embedded in the user's public PushEvents. */
export class PublicEventsStrategy implements EmailStrategy {
  readonly source = 'public-events';
  readonly aggressiveOnly = false;

  private static readonly PAGE_SIZE = 100;

  async attempt({ username, client, budget, limits }: ResolutionContext): Promise<string | null> {
    for (let page = 1; page <= limits.eventPages; page++) {
      budget.spend();
      const events = await client.listUserPublicEvents(username, {
        page,
        perPage: PublicEventsStrategy.PAGE_SIZE,
      });

      for (const event of events) {
        if (event.type !== 'PushEvent') continue;
        for (const commit of event.commits) {
          const email = usableEmail(commit.author?.email);
          if (email) return email;
        }
      }

      if (events.length < PublicEventsStrategy.PAGE_SIZE) break;
    }

    return null;
  }
}

/** 4. Commit search across every repository the user contributed to. */
export class CommitSearchStrategy implements EmailStrategy {
  readonly source = 'commit-search';
  readonly aggressiveOnly = true;

  async attempt({ username, client, budget, limits }: ResolutionContext): Promise<string | null> {
    budget.spend();
    const commits = await client.searchCommits(`author:${username}`, { perPage: limits.searchResults });
    return firstCommitEmail(commits);
  }
}

export function defaultStrategies(): EmailStrategy[] {
  return [
    new ProfileEmailStrategy(),
    new RepositoryCommitsStrategy(),
    new PublicEventsStrategy(),
    new CommitSearchStrategy(),
  ];
}
