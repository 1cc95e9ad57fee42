/**
 * Domain Entities - Stargazer Extractor
 *
 * Records produced by an extraction:
 * - RepositoryRecord: the repository, fetched once
 * - UserRecord: one stargazer or forker, enriched progressively
 * - ExtractionResult: the frozen aggregate handed to the caller
 */

// Users
export * from './User.js';

// Repositories
export * from './Repository.js';

// Extraction options and result
export * from './Extraction.js';
