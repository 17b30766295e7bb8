/**
 * Octokit Context Fetcher
 *
 * ContextFetcher backed by the GitHub REST API, for dispatch
 * auto-detection inside a workflow run. A 404 becomes a not-found lookup
 * error; any other failure propagates to the detector, which records it.
 *
 * @module host
 */

import * as github from '@actions/github';
import {
  ContextFetchError,
  type CommentMetadata,
  type ContextFetcher,
  type FetchKind,
  type FetchResultMap,
  type IssueMetadata,
  type PullRequestMetadata,
} from '@pipevars/engine';

export type Octokit = ReturnType<typeof github.getOctokit>;

export interface RepositoryRef {
  owner: string;
  repo: string;
}

export class OctokitContextFetcher implements ContextFetcher {
  constructor(
    private readonly octokit: Octokit,
    private readonly repository: RepositoryRef
  ) {}

  /**
   * Build a fetcher for `owner/name` with a token
   */
  static create(token: string, repository: string): OctokitContextFetcher {
    const [owner, repo] = repository.split('/');
    if (!owner || !repo) {
      throw new Error(`Repository must be "owner/name", got "${repository}"`);
    }
    return new OctokitContextFetcher(github.getOctokit(token), { owner, repo });
  }

  async fetch<K extends FetchKind>(kind: K, id: string, signal?: AbortSignal): Promise<FetchResultMap[K]>;
  async fetch(kind: FetchKind, id: string, signal?: AbortSignal): Promise<FetchResultMap[FetchKind]> {
    try {
      switch (kind) {
        case 'pr':
          return await this.pullRequest(Number(id), signal);
        case 'issue':
          return await this.issue(Number(id), signal);
        case 'comment':
          return await this.comment(Number(id), signal);
      }
    } catch (error) {
      if (isNotFound(error)) {
        throw ContextFetchError.notFound(kind, id);
      }
      throw error;
    }
  }

  private async pullRequest(number: number, signal?: AbortSignal): Promise<PullRequestMetadata> {
    const { data } = await this.octokit.rest.pulls.get({
      ...this.repository,
      pull_number: number,
      request: { signal },
    });
    return {
      number: data.number,
      title: data.title,
      url: data.html_url,
      headRef: data.head.ref,
      headSha: data.head.sha,
      headRepoFullName: data.head.repo?.full_name ?? null,
      baseRef: data.base.ref,
      baseSha: data.base.sha,
      baseRepoFullName: data.base.repo.full_name,
    };
  }

  private async issue(number: number, signal?: AbortSignal): Promise<IssueMetadata> {
    const { data } = await this.octokit.rest.issues.get({
      ...this.repository,
      issue_number: number,
      request: { signal },
    });
    return {
      number: data.number,
      title: data.title,
      url: data.html_url,
      isPullRequest: data.pull_request !== undefined && data.pull_request !== null,
    };
  }

  private async comment(id: number, signal?: AbortSignal): Promise<CommentMetadata> {
    const { data } = await this.octokit.rest.issues.getComment({
      ...this.repository,
      comment_id: id,
      request: { signal },
    });
    return {
      id: data.id,
      body: data.body ?? '',
      author: data.user?.login ?? null,
      url: data.html_url,
      issueNumber: issueNumberFromUrl(data.issue_url),
    };
  }
}

/**
 * Issue number at the end of an API issue URL (`.../issues/17`)
 */
export function issueNumberFromUrl(url: string): number {
  const match = /\/issues\/(\d+)$/.exec(url);
  if (!match) {
    throw new Error(`Cannot read an issue number from "${url}"`);
  }
  return Number(match[1]);
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === 404;
}
