/**
 * GitHub Integration Module
 *
 * REST access for stargazer/forker extraction:
 * - Rate-limit aware client (60/hour anonymous, 5,000/hour with a token)
 * - Page-number pagination with item caps
 * - Email recovery from profiles, commits and public events
 */

// Types
export type {
  Logger,
  FetchLike,
  GitHubClientConfig,
  HttpMethod,
  QueryParams,
  ApiRequester,
  RateLimitState,
  RateLimitStatus,
  GitHubUser,
  GitHubProfile,
  GitHubRepo,
  GitHubCommit,
  GitHubEvent,
  CommitIdentity,
  EmailSource,
  EmailExtractionResult,
  StrategyAttempt,
} from './types.js';
export { EMAIL_SOURCES, apiForkSchema, apiUserSchema } from './types.js';
export { normalizeUser, parsePayload } from './normalize.js';

// Errors
export {
  ApiError,
  AuthError,
  NotFoundError,
  RateLimitError,
  TransientApiError,
  describeError,
  isRunFatal,
} from './errors.js';
export type { ApiErrorCode } from './errors.js';

// Client
export {
  GitHubClient,
  createGitHubClientFromEnv,
  DEFAULT_BASE_URL,
  AUTHENTICATED_QUOTA,
  UNAUTHENTICATED_QUOTA,
} from './GitHubClient.js';

// Pagination
export { Paginator, MAX_PER_PAGE } from './Paginator.js';
export type { PaginateOptions } from './Paginator.js';

// Email Extractor
export {
  EmailExtractor,
  REQUEST_BUDGET,
  AGGRESSIVE_REQUEST_BUDGET,
} from './EmailExtractor.js';
export type { EmailExtractorOptions, ResolveEmailOptions } from './EmailExtractor.js';
export {
  ProfileEmailStrategy,
  RepositoryCommitsStrategy,
  PublicEventsStrategy,
  CommitSearchStrategy,
  RequestBudget,
  defaultStrategies,
} from './EmailStrategies.js';
export type { EmailStrategy, ResolutionContext, StrategyLimits } from './EmailStrategies.js';
export { isNoreplyEmail, usableEmail } from './emails.js';
