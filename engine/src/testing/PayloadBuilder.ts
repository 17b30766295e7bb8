/**
 * Payload Builder
 *
 * Synthetic pipeline contexts for tests. Every builder returns a fresh
 * object; pass overrides to change individual fields.
 *
 * @module testing
 */

import type { JsonObject, PipelineContext } from '../types/core-types.js';

export const TEST_REPOSITORY = 'octo-org/widgets';
export const TEST_SERVER = 'https://github.com';

function repository(fullName = TEST_REPOSITORY, server = TEST_SERVER): JsonObject {
  const [owner, name] = fullName.split('/');
  return {
    full_name: fullName,
    name,
    owner: { login: owner },
    html_url: `${server}/${fullName}`,
    default_branch: 'main',
  };
}

function baseContext(eventName: string, payload: JsonObject, overrides: Partial<PipelineContext>): PipelineContext {
  return {
    eventName,
    payload,
    ref: 'refs/heads/main',
    sha: 'aaaaaaa',
    serverUrl: TEST_SERVER,
    repository: TEST_REPOSITORY,
    workflow: 'ci',
    actor: 'dev-user',
    runId: '1001',
    runNumber: '7',
    runAttempt: '1',
    ...overrides,
  };
}

export interface PullRequestOptions {
  number?: number;
  headRef?: string;
  headSha?: string;
  baseRef?: string;
  baseSha?: string;
  /** Full name of the head repository; differs from the base for forks */
  headRepo?: string;
  draft?: boolean;
}

export function pullRequestPayload(options: PullRequestOptions = {}): JsonObject {
  const number = options.number ?? 42;
  return {
    action: 'opened',
    number,
    pull_request: {
      number,
      title: 'Add widget sorting',
      html_url: `${TEST_SERVER}/${TEST_REPOSITORY}/pull/${number}`,
      draft: options.draft ?? false,
      user: { login: 'pr-author' },
      head: {
        ref: options.headRef ?? 'feature/sorting',
        sha: options.headSha ?? 'bbbbbbb',
        repo: repository(options.headRepo ?? TEST_REPOSITORY),
      },
      base: {
        ref: options.baseRef ?? 'main',
        sha: options.baseSha ?? 'ccccccc',
        repo: repository(),
      },
    },
    repository: repository(),
    sender: { login: 'pr-author' },
  };
}

export function pullRequestContext(options: PullRequestOptions = {}, overrides: Partial<PipelineContext> = {}): PipelineContext {
  const number = options.number ?? 42;
  return baseContext('pull_request', pullRequestPayload(options), {
    ref: `refs/pull/${number}/merge`,
    sha: 'ddddddd',
    ...overrides,
  });
}

export function pushContext(ref = 'refs/heads/main', overrides: Partial<PipelineContext> = {}): PipelineContext {
  return baseContext('push', {
    ref,
    after: 'eeeeeee',
    repository: repository(),
    sender: { login: 'dev-user' },
  }, { ref, sha: 'eeeeeee', ...overrides });
}

export function scheduleContext(overrides: Partial<PipelineContext> = {}): PipelineContext {
  return baseContext('schedule', { schedule: '0 3 * * *', repository: repository() }, overrides);
}

export interface IssueCommentOptions {
  issueNumber?: number;
  commentId?: number;
  body?: string;
  /** Whether the issue is a pull request */
  onPullRequest?: boolean;
}

export function issueCommentContext(options: IssueCommentOptions = {}, overrides: Partial<PipelineContext> = {}): PipelineContext {
  const issueNumber = options.issueNumber ?? 17;
  const commentId = options.commentId ?? 5005;
  const issue: JsonObject = {
    number: issueNumber,
    title: 'Widgets render twice',
    html_url: `${TEST_SERVER}/${TEST_REPOSITORY}/issues/${issueNumber}`,
    user: { login: 'issue-author' },
  };
  if (options.onPullRequest) {
    issue.pull_request = { html_url: `${TEST_SERVER}/${TEST_REPOSITORY}/pull/${issueNumber}` };
  }

  return baseContext('issue_comment', {
    action: 'created',
    issue,
    comment: {
      id: commentId,
      body: options.body ?? '/deploy',
      user: { login: 'commenter' },
      html_url: `${TEST_SERVER}/${TEST_REPOSITORY}/issues/${issueNumber}#issuecomment-${commentId}`,
    },
    repository: repository(),
  }, overrides);
}

export function dispatchContext(inputs: Record<string, string>, overrides: Partial<PipelineContext> = {}): PipelineContext {
  return baseContext('workflow_dispatch', {
    inputs,
    ref: 'refs/heads/main',
    repository: repository(),
    workflow: '.github/workflows/ci.yml',
  }, overrides);
}
