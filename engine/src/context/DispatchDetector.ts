/**
 * Dispatch Detector
 *
 * On manually dispatched runs the event carries the dispatch inputs. When
 * those inputs name a pull request, issue or comment, the referenced
 * objects are looked up through the injected ContextFetcher and the
 * `resolved-*` family is overlaid with what they describe.
 *
 * Lookup chain:
 *   comment id  -> comment -> its issue -> the pull request, if the issue is one
 *   issue no.   -> issue -> the pull request, if the issue is one
 *   pr number   -> pull request
 *
 * Overlay precedence for the pull request: explicit input, then the
 * comment's, then the issue's. Every lookup is bounded by a timeout; a
 * failed lookup becomes a ContextFetchError diagnostic and its overlay is
 * skipped.
 *
 * @module context
 */

import { TimeoutManager } from '../automation/TimeoutManager.js';
import { ContextFetchError, type FetchKind } from '../errors/ContextErrors.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { JsonObject, JsonValue, ScalarValue } from '../types/core-types.js';
import type {
  CommentMetadata,
  ContextFetcher,
  FetchResultMap,
  IssueMetadata,
  PullRequestMetadata,
} from './ContextFetcher.js';

const PR_KEYS = ['pr', 'pr-number', 'pull-request', 'pull-request-number'];
const ISSUE_KEYS = ['issue', 'issue-number'];
const COMMENT_KEYS = ['comment-id', 'comment'];

/**
 * Object references found in dispatch inputs
 */
export interface DispatchReferences {
  pr?: string;
  issue?: string;
  comment?: string;
}

export interface DispatchDetection {
  references: DispatchReferences;
  /** `resolved-*` name to value; empty when nothing was detected or every lookup failed */
  overlay: Map<string, ScalarValue>;
  /** Lookup failures (warnings) */
  errors: ContextFetchError[];
}

export interface DispatchDetectorOptions {
  fetcher: ContextFetcher;
  timeoutMs: number;
}

export class DispatchDetector {
  constructor(private readonly options: DispatchDetectorOptions) {}

  /**
   * Find PR / issue / comment references in the payload's `inputs` object.
   * Keys are compared lower-cased with `_` read as `-`; values must be
   * numeric with an optional leading `#`.
   */
  static findReferences(payload: JsonObject): DispatchReferences {
    const inputs = payload.inputs;
    if (!isJsonObject(inputs)) {
      return {};
    }

    const references: DispatchReferences = {};
    for (const [key, value] of Object.entries(inputs)) {
      const normalized = key.trim().toLowerCase().replace(/_/g, '-');
      const id = toId(value);
      if (id === null) continue;

      if (PR_KEYS.includes(normalized)) references.pr ??= id;
      else if (ISSUE_KEYS.includes(normalized)) references.issue ??= id;
      else if (COMMENT_KEYS.includes(normalized)) references.comment ??= id;
    }
    return references;
  }

  async detect(payload: JsonObject): Promise<DispatchDetection> {
    const references = DispatchDetector.findReferences(payload);
    const errors: ContextFetchError[] = [];
    const overlay = new Map<string, ScalarValue>();

    if (!references.pr && !references.issue && !references.comment) {
      return { references, overlay, errors };
    }

    const logger = LoggerManager.tryGetLogger();
    logger?.info('Dispatch inputs reference other objects', { ...references }, 'context', 'DispatchDetector');

    const lookup = async <K extends FetchKind>(kind: K, id: string): Promise<FetchResultMap[K] | null> => {
      try {
        return await this.fetch(kind, id);
      } catch (error) {
        const failure = error instanceof ContextFetchError ? error : ContextFetchError.requestFailed(kind, id, error);
        logger?.warn(failure.message, { code: failure.code }, 'context', 'DispatchDetector');
        errors.push(failure);
        return null;
      }
    };

    let comment: CommentMetadata | null = null;
    let commentIssue: IssueMetadata | null = null;
    let commentPr: PullRequestMetadata | null = null;
    if (references.comment) {
      comment = await lookup('comment', references.comment);
      if (comment) {
        commentIssue = await lookup('issue', String(comment.issueNumber));
        if (commentIssue?.isPullRequest) {
          commentPr = await lookup('pr', String(commentIssue.number));
        }
      }
    }

    let issue: IssueMetadata | null = null;
    let issuePr: PullRequestMetadata | null = null;
    if (references.issue) {
      issue = await lookup('issue', references.issue);
      if (issue?.isPullRequest) {
        issuePr = await lookup('pr', String(issue.number));
      }
    }

    const explicitPr = references.pr ? await lookup('pr', references.pr) : null;

    const pr = explicitPr ?? commentPr ?? issuePr;
    if (pr) {
      overlay.set('resolved-repo-full-name', pr.headRepoFullName ?? pr.baseRepoFullName);
      overlay.set('resolved-git-ref', `refs/heads/${pr.headRef}`);
      overlay.set('resolved-git-branch', pr.headRef);
      overlay.set('resolved-git-sha', pr.headSha);
      overlay.set('resolved-pr-number', String(pr.number));
    }

    const issueNumber = issue?.number ?? commentIssue?.number ?? comment?.issueNumber ?? pr?.number;
    if (issueNumber !== undefined) {
      overlay.set('resolved-issue-number', String(issueNumber));
    }
    if (comment) {
      overlay.set('resolved-comment-id', String(comment.id));
    }

    logger?.debug('Dispatch overlay computed', Object.fromEntries(overlay), 'context', 'DispatchDetector');
    return { references, overlay, errors };
  }

  private async fetch<K extends FetchKind>(kind: K, id: string): Promise<FetchResultMap[K]> {
    const outcome = await TimeoutManager.executeWithResult(
      signal => this.options.fetcher.fetch(kind, id, signal),
      { timeoutMs: this.options.timeoutMs, operation: `${kind} ${id}` }
    );
    if (outcome.timedOut || outcome.result === undefined) {
      throw ContextFetchError.timeout(kind, id, this.options.timeoutMs);
    }
    return outcome.result;
  }
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toId(value: JsonValue): string | null {
  const text = typeof value === 'number' ? String(value) : typeof value === 'string' ? value.trim() : '';
  const match = /^#?(\d+)$/.exec(text);
  return match ? match[1] : null;
}
