/**
 * Export Service
 *
 * JSON export and re-import of an ExtractionResult. Dates travel as ISO-8601
 * strings and are restored on parse; every document carries formatVersion 1.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { EMAIL_SOURCES } from '../../integrations/github/index.js';
import { freezeExtraction } from '../entities/index.js';
import type { ExtractionResult, RepositoryRecord, UserRecord } from '../entities/index.js';

export const EXPORT_FORMAT_VERSION = 1;

// =============================================================================
// ERRORS
// =============================================================================

export class ExportFormatError extends Error {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message);
    this.name = 'ExportFormatError';
  }
}

// =============================================================================
// DOCUMENT SCHEMA
// =============================================================================

const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'expected an ISO-8601 date' })
  .transform((value) => new Date(value));

const nullableDate = isoDate.nullable();

const userSchema = z.object({
  login: z.string().min(1),
  id: z.number().int().nullable(),
  avatarUrl: z.string().nullable(),
  htmlUrl: z.string().nullable(),
  name: z.string().nullable(),
  location: z.string().nullable(),
  company: z.string().nullable(),
  bio: z.string().nullable(),
  blog: z.string().nullable(),
  twitterUsername: z.string().nullable(),
  publicRepos: z.number().int().nullable(),
  followers: z.number().int().nullable(),
  following: z.number().int().nullable(),
  createdAt: nullableDate,
  updatedAt: nullableDate,
  email: z.string().nullable(),
  emailSource: z.enum(EMAIL_SOURCES).nullable(),
});

const repositorySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  fullName: z.string(),
  owner: z.string(),
  description: z.string().nullable(),
  htmlUrl: z.string(),
  homepage: z.string().nullable(),
  language: z.string().nullable(),
  topics: z.array(z.string()),
  defaultBranch: z.string().nullable(),
  stargazersCount: z.number().int(),
  forksCount: z.number().int(),
  watchersCount: z.number().int(),
  openIssuesCount: z.number().int(),
  createdAt: nullableDate,
  updatedAt: nullableDate,
  pushedAt: nullableDate,
});

const exportDocumentSchema = z.object({
  formatVersion: z.literal(EXPORT_FORMAT_VERSION),
  id: z.string().uuid(),
  repository: repositorySchema,
  stargazers: z.array(userSchema),
  forkers: z.array(userSchema),
  totalStargazers: z.number().int(),
  totalForkers: z.number().int(),
  extractedAt: isoDate,
});

type SerializedUser = Omit<UserRecord, 'createdAt' | 'updatedAt'> & {
  createdAt: string | null;
  updatedAt: string | null;
};

type SerializedRepository = Omit<RepositoryRecord, 'createdAt' | 'updatedAt' | 'pushedAt'> & {
  createdAt: string | null;
  updatedAt: string | null;
  pushedAt: string | null;
};

export interface ExportDocument {
  formatVersion: typeof EXPORT_FORMAT_VERSION;
  id: string;
  repository: SerializedRepository;
  stargazers: SerializedUser[];
  forkers: SerializedUser[];
  totalStargazers: number;
  totalForkers: number;
  extractedAt: string;
}

// =============================================================================
// SERIALIZATION
// =============================================================================

export function toExportDocument(result: ExtractionResult): ExportDocument {
  return {
    formatVersion: EXPORT_FORMAT_VERSION,
    id: result.id,
    repository: {
      ...result.repository,
      topics: [...result.repository.topics],
      createdAt: isoOrNull(result.repository.createdAt),
      updatedAt: isoOrNull(result.repository.updatedAt),
      pushedAt: isoOrNull(result.repository.pushedAt),
    },
    stargazers: result.stargazers.map(serializeUser),
    forkers: result.forkers.map(serializeUser),
    totalStargazers: result.totalStargazers,
    totalForkers: result.totalForkers,
    extractedAt: result.extractedAt.toISOString(),
  };
}

export function serializeExtraction(result: ExtractionResult): string {
  return JSON.stringify(toExportDocument(result), null, 2);
}

/**
 * Parse an exported document back into a frozen ExtractionResult.
 *
 * @throws ExportFormatError when the text is not JSON or does not match the format
 */
export function parseExtraction(text: string): ExtractionResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ExportFormatError(
      `Export is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = exportDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ExportFormatError(`Invalid export document (${issues.length} issues)`, issues);
  }

  const document = parsed.data;
  return freezeExtraction({
    id: document.id,
    repository: document.repository,
    stargazers: document.stargazers,
    forkers: document.forkers,
    totalStargazers: document.totalStargazers,
    totalForkers: document.totalForkers,
    extractedAt: document.extractedAt,
  });
}

// =============================================================================
// FILES
// =============================================================================

export async function writeExtractionFile(path: string, result: ExtractionResult): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${serializeExtraction(result)}\n`, 'utf8');
}

export async function readExtractionFile(path: string): Promise<ExtractionResult> {
  const text = await readFile(path, 'utf8');
  return parseExtraction(text);
}

function serializeUser(user: UserRecord): SerializedUser {
  return {
    ...user,
    createdAt: isoOrNull(user.createdAt),
    updatedAt: isoOrNull(user.updatedAt),
  };
}

function isoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}
