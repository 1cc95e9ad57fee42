/**
 * Export Service Tests
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ExportFormatError,
  parseExtraction,
  readExtractionFile,
  serializeExtraction,
  toExportDocument,
  writeExtractionFile,
} from '../../domain/services/ExportService.js';
import { applyEmail, createUserRecord, freezeExtraction } from '../../domain/entities/index.js';
import type { ExtractionResult, RepositoryRecord } from '../../domain/entities/index.js';

const repository: RepositoryRecord = {
  id: 1296269,
  name: 'Hello-World',
  fullName: 'octocat/Hello-World',
  owner: 'octocat',
  description: 'My first repository on GitHub!',
  htmlUrl: 'https://github.com/octocat/Hello-World',
  homepage: null,
  language: 'C',
  topics: ['octocat'],
  defaultBranch: 'master',
  stargazersCount: 80,
  forksCount: 9,
  watchersCount: 80,
  openIssuesCount: 0,
  createdAt: new Date('2011-01-26T19:01:12Z'),
  updatedAt: null,
  pushedAt: new Date('2011-01-26T19:06:43Z'),
};

function sampleResult(): ExtractionResult {
  return freezeExtraction({
    id: '3b241101-e2bb-4255-8caf-4136c566a962',
    repository,
    stargazers: [
      applyEmail(createUserRecord({ login: 'alice', id: 1 }), 'alice@example.com', 'profile'),
      { ...createUserRecord({ login: 'bob', id: 2 }), createdAt: new Date('2020-05-01T10:00:00Z') },
    ],
    forkers: [createUserRecord({ login: 'alice', id: 1 })],
    totalStargazers: 80,
    totalForkers: 9,
    extractedAt: new Date('2024-01-01T00:00:00Z'),
  });
}

describe('ExportService', () => {
  let directory: string | null = null;

  afterEach(async () => {
    if (directory) await rm(directory, { recursive: true, force: true });
    directory = null;
  });

  it('should write dates as ISO strings with a format version', () => {
    const document = toExportDocument(sampleResult());

    expect(document.formatVersion).toBe(1);
    expect(document.extractedAt).toBe('2024-01-01T00:00:00.000Z');
    expect(document.repository.createdAt).toBe('2011-01-26T19:01:12.000Z');
    expect(document.repository.updatedAt).toBeNull();
    expect(document.stargazers[1].createdAt).toBe('2020-05-01T10:00:00.000Z');
  });

  it('should round-trip every field', () => {
    const original = sampleResult();

    const restored = parseExtraction(serializeExtraction(original));

    expect(restored.repository.name).toBe('Hello-World');
    expect(restored.stargazers).toHaveLength(2);
    expect(new Set(restored.stargazers.map((user) => user.login))).toEqual(new Set(['alice', 'bob']));
    expect(restored).toEqual(original);
    expect(Object.isFrozen(restored)).toBe(true);
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseExtraction('{not json')).toThrow(ExportFormatError);
  });

  it('should list the fields that do not match the format', () => {
    const document = { ...toExportDocument(sampleResult()), formatVersion: 2, totalForkers: 'nine' };

    const error = (() => {
      try {
        parseExtraction(JSON.stringify(document));
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ExportFormatError);
    expect(error instanceof ExportFormatError ? error.issues.map((issue) => issue.split(':')[0]) : []).toEqual([
      'formatVersion',
      'totalForkers',
    ]);
  });

  it('should write and read a file, creating parent directories', async () => {
    directory = await mkdtemp(join(tmpdir(), 'stargazer-export-'));
    const path = join(directory, 'nested', 'result.json');

    await writeExtractionFile(path, sampleResult());
    const text = await readFile(path, 'utf8');
    const restored = await readExtractionFile(path);

    expect(text.endsWith('}\n')).toBe(true);
    expect(restored.forkers.map((user) => user.login)).toEqual(['alice']);
    expect(restored.extractedAt).toEqual(new Date('2024-01-01T00:00:00Z'));
  });
});
