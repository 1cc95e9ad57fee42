/**
 * Extraction - options and result of one repository extraction
 */

import { z } from 'zod';
import type { RepositoryRecord } from './Repository.js';
import type { UserRecord } from './User.js';

// =============================================================================
// OPTIONS
// =============================================================================

const cap = z.number().int().min(0).nullable().default(null);

export const extractionOptionsSchema = z
  .object({
    includeStargazers: z.boolean().default(true),
    includeForkers: z.boolean().default(true),
    maxStargazers: cap,
    maxForkers: cap,
    // Profile fetch plus email resolution for every user (expensive)
    detailedUserInfo: z.boolean().default(false),
    // Adds commit search and raises the per-user request budget
    aggressiveEmailExtraction: z.boolean().default(true),
  })
  .strict();

export type ExtractionOptions = z.infer<typeof extractionOptionsSchema>;
export type ExtractionOptionsInput = z.input<typeof extractionOptionsSchema>;

export const DEFAULT_EXTRACTION_OPTIONS: Readonly<ExtractionOptions> = Object.freeze(
  extractionOptionsSchema.parse({})
);

// =============================================================================
// RESULT
// =============================================================================

export interface ExtractionResult {
  readonly id: string;
  readonly repository: RepositoryRecord;
  readonly stargazers: readonly UserRecord[];
  readonly forkers: readonly UserRecord[];
  /** The repository's own counts, not the number of records collected */
  readonly totalStargazers: number;
  readonly totalForkers: number;
  readonly extractedAt: Date;
}

/** Freeze the aggregate, its repository record and its lists; user records stay plain objects. */
export function freezeExtraction(result: ExtractionResult): ExtractionResult {
  return Object.freeze({
    ...result,
    repository: Object.freeze({
      ...result.repository,
      topics: Object.freeze([...result.repository.topics]),
    }),
    stargazers: Object.freeze([...result.stargazers]),
    forkers: Object.freeze([...result.forkers]),
  });
}
