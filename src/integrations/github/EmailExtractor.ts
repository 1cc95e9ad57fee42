/**
 * GitHub Email Extractor Service
 *
 * Recovers a contact email for a GitHub user by running an ordered list of
 * strategies, strongest first:
 * 1. Public profile email
 * 2. Commits in the user's own recently pushed repositories
 * 3. Commits embedded in public push events
 * 4. Commit search (aggressive mode only)
 *
 * The first usable address wins and later strategies never run. A missing
 * email is a normal outcome and comes back as null.
 */

import { NotFoundError, describeError, isRunFatal } from './errors.js';
import {
  AGGRESSIVE_LIMITS,
  BudgetExhaustedError,
  RequestBudget,
  STANDARD_LIMITS,
  defaultStrategies,
} from './EmailStrategies.js';
import type { EmailLookupClient, EmailStrategy, StrategyLimits } from './EmailStrategies.js';
import type {
  EmailExtractionResult,
  GitHubProfile,
  Logger,
  StrategyAttempt,
} from './types.js';

/** Hard cap on API requests spent resolving one user */
export const REQUEST_BUDGET = 8;
export const AGGRESSIVE_REQUEST_BUDGET = 12;

export interface EmailExtractorOptions {
  strategies?: EmailStrategy[];
  requestBudget?: number;
  aggressiveRequestBudget?: number;
  logger?: Logger;
}

export interface ResolveEmailOptions {
  /** Enable commit search and raise the request budget */
  aggressive?: boolean;
  /** Already-fetched profile; lets the profile strategy answer without a request */
  profile?: GitHubProfile | null;
}

// =============================================================================
// EMAIL EXTRACTOR
// =============================================================================

export class EmailExtractor {
  private client: EmailLookupClient;
  private strategies: EmailStrategy[];
  private requestBudget: number;
  private aggressiveRequestBudget: number;
  private logger: Logger;

  constructor(client: EmailLookupClient, options: EmailExtractorOptions = {}) {
    this.client = client;
    this.strategies = options.strategies ?? defaultStrategies();
    this.requestBudget = options.requestBudget ?? REQUEST_BUDGET;
    this.aggressiveRequestBudget = options.aggressiveRequestBudget ?? AGGRESSIVE_REQUEST_BUDGET;
    this.logger = options.logger ?? console;
  }

  async resolveEmail(username: string, options: ResolveEmailOptions = {}): Promise<string | null> {
    const result = await this.extractEmail(username, options);
    return result.email;
  }

  /**
   * Run the strategies in order until one yields a usable address.
   *
   * Strategy failures are recorded and skipped. AuthError and RateLimitError
   * propagate, since every later request would fail the same way. A user whose
   * profile is gone has nothing left to search, so resolution ends there.
   */
  async extractEmail(username: string, options: ResolveEmailOptions = {}): Promise<EmailExtractionResult> {
    const aggressive = options.aggressive ?? false;
    const limits: StrategyLimits = aggressive ? AGGRESSIVE_LIMITS : STANDARD_LIMITS;
    const budget = new RequestBudget(aggressive ? this.aggressiveRequestBudget : this.requestBudget);
    const attempts: StrategyAttempt[] = [];

    const context = {
      username,
      client: this.client,
      budget,
      limits,
      profile: options.profile ?? null,
      logger: this.logger,
    };

    for (const strategy of this.strategies) {
      if (strategy.aggressiveOnly && !aggressive) continue;

      try {
        const email = await strategy.attempt(context);
        if (email) {
          attempts.push({ source: strategy.source, outcome: 'found' });
          this.logger.debug(`[EmailExtractor] Found email for ${username} via ${strategy.source}`);
          return { email, source: strategy.source, requestsUsed: budget.spent, attempts };
        }
        attempts.push({ source: strategy.source, outcome: 'not-found' });
      } catch (error) {
        if (isRunFatal(error)) throw error;

        if (error instanceof BudgetExhaustedError) {
          attempts.push({ source: strategy.source, outcome: 'budget-exhausted' });
          this.logger.debug(`[EmailExtractor] Budget of ${budget.limit} requests spent on ${username}`);
          break;
        }

        attempts.push({ source: strategy.source, outcome: 'failed', error: describeError(error) });
        this.logger.debug(
          `[EmailExtractor] ${strategy.source} failed for ${username}: ${describeError(error)}`
        );
        if (strategy.source === 'profile' && error instanceof NotFoundError) break;
      }
    }

    return { email: null, source: null, requestsUsed: budget.spent, attempts };
  }
}
