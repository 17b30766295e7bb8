/**
 * Context Fetcher contract
 *
 * The one external capability of the engine: metadata lookups of pull
 * requests, issues and comments for dispatch auto-detection. Hosts inject
 * an implementation; the engine never performs network access itself.
 *
 * @module context
 */

import { z } from 'zod';
import { ContextFetchError, type FetchKind } from '../errors/ContextErrors.js';

export interface PullRequestMetadata {
  number: number;
  title: string;
  url: string;
  headRef: string;
  headSha: string;
  /** null when the source repository was deleted */
  headRepoFullName: string | null;
  baseRef: string;
  baseSha: string;
  baseRepoFullName: string;
}

export interface IssueMetadata {
  number: number;
  title: string;
  url: string;
  isPullRequest: boolean;
}

export interface CommentMetadata {
  id: number;
  body: string;
  author: string | null;
  url: string;
  /** Number of the issue or pull request the comment belongs to */
  issueNumber: number;
}

export interface FetchResultMap {
  pr: PullRequestMetadata;
  issue: IssueMetadata;
  comment: CommentMetadata;
}

export interface ContextFetcher {
  /**
   * Look up one object by id
   *
   * @param signal - Aborted when the caller stops waiting
   * @throws {ContextFetchError} When the object does not exist or the lookup fails
   */
  fetch<K extends FetchKind>(kind: K, id: string, signal?: AbortSignal): Promise<FetchResultMap[K]>;
}

export type StaticRecords = {
  [K in FetchKind]?: Record<string, FetchResultMap[K]>;
};

const PullRequestSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  url: z.string(),
  headRef: z.string(),
  headSha: z.string(),
  headRepoFullName: z.string().nullable(),
  baseRef: z.string(),
  baseSha: z.string(),
  baseRepoFullName: z.string(),
});

const IssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  url: z.string(),
  isPullRequest: z.boolean(),
});

const CommentSchema = z.object({
  id: z.number().int(),
  body: z.string(),
  author: z.string().nullable(),
  url: z.string(),
  issueNumber: z.number().int(),
});

/**
 * Records as stored in a metadata file, keyed by id
 */
export const StaticRecordsSchema = z.object({
  pr: z.record(PullRequestSchema).optional(),
  issue: z.record(IssueSchema).optional(),
  comment: z.record(CommentSchema).optional(),
}).strict();

/**
 * In-memory fetcher backed by fixed records. Used by tests and by offline
 * CLI runs that supply metadata from a file.
 */
export class StaticContextFetcher implements ContextFetcher {
  private readonly calls: Array<{ kind: FetchKind; id: string }> = [];

  constructor(
    private readonly records: StaticRecords = {},
    private readonly delayMs = 0
  ) {}

  async fetch<K extends FetchKind>(kind: K, id: string, signal?: AbortSignal): Promise<FetchResultMap[K]> {
    this.calls.push({ kind, id });

    if (this.delayMs > 0) {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(resolve, this.delayMs);
        signal?.addEventListener('abort', () => {
          clearTimeout(timer);
          reject(signal.reason);
        }, { once: true });
      });
    }

    const table: StaticRecords[K] = this.records[kind];
    const record = table?.[id];
    if (!record) {
      throw ContextFetchError.notFound(kind, id);
    }
    return record;
  }

  /**
   * Build a fetcher from untrusted records (a metadata file)
   *
   * @throws {z.ZodError} If the records do not have the expected shape
   */
  static fromJson(raw: unknown): StaticContextFetcher {
    return new StaticContextFetcher(StaticRecordsSchema.parse(raw));
  }

  /**
   * Lookups performed so far, in order
   */
  getCalls(): ReadonlyArray<{ kind: FetchKind; id: string }> {
    return this.calls;
  }
}
