import { describe, expect, it } from 'vitest';
import { PipevarsErrorCode } from '../errors/ErrorCodes.js';
import { TEST_REPOSITORY } from '../testing/PayloadBuilder.js';
import { StaticContextFetcher, type PullRequestMetadata } from './ContextFetcher.js';
import { DispatchDetector } from './DispatchDetector.js';

const pr42: PullRequestMetadata = {
  number: 42,
  title: 'Add widget sorting',
  url: `https://github.com/${TEST_REPOSITORY}/pull/42`,
  headRef: 'feature/sorting',
  headSha: 'bbbbbbb',
  headRepoFullName: 'fork-user/widgets',
  baseRef: 'main',
  baseSha: 'ccccccc',
  baseRepoFullName: TEST_REPOSITORY,
};

const pr7: PullRequestMetadata = { ...pr42, number: 7, headRef: 'fix/typo', headSha: 'fffffff', headRepoFullName: null };

function fetcher(delayMs = 0): StaticContextFetcher {
  return new StaticContextFetcher({
    pr: { '42': pr42, '7': pr7 },
    issue: {
      '7': { number: 7, title: 'Fix typo', url: 'https://github.com/octo-org/widgets/pull/7', isPullRequest: true },
      '9': { number: 9, title: 'Bug', url: 'https://github.com/octo-org/widgets/issues/9', isPullRequest: false },
    },
    comment: {
      '5005': { id: 5005, body: '/deploy', author: 'commenter', url: 'https://github.com/octo-org/widgets/pull/7#issuecomment-5005', issueNumber: 7 },
    },
  }, delayMs);
}

describe('DispatchDetector.findReferences', () => {
  it('normalizes keys and accepts a leading #', () => {
    expect(DispatchDetector.findReferences({ inputs: { PR_Number: '#42', Issue: 9, comment_id: ' 5005 ' } })).toEqual({
      pr: '42',
      issue: '9',
      comment: '5005',
    });
  });

  it('ignores non-numeric values and payloads without inputs', () => {
    expect(DispatchDetector.findReferences({ inputs: { pr: 'latest' } })).toEqual({});
    expect(DispatchDetector.findReferences({ ref: 'refs/heads/main' })).toEqual({});
  });
});

describe('DispatchDetector.detect', () => {
  it('overlays the resolved family from an explicit pull request', async () => {
    const detector = new DispatchDetector({ fetcher: fetcher(), timeoutMs: 1000 });
    const { overlay, errors } = await detector.detect({ inputs: { 'pr-number': '42' } });
    expect(errors).toEqual([]);
    expect(Object.fromEntries(overlay)).toEqual({
      'resolved-repo-full-name': 'fork-user/widgets',
      'resolved-git-ref': 'refs/heads/feature/sorting',
      'resolved-git-branch': 'feature/sorting',
      'resolved-git-sha': 'bbbbbbb',
      'resolved-pr-number': '42',
      'resolved-issue-number': '42',
    });
  });

  it('follows a comment to its issue and pull request', async () => {
    const source = fetcher();
    const detector = new DispatchDetector({ fetcher: source, timeoutMs: 1000 });
    const { overlay } = await detector.detect({ inputs: { comment: '5005' } });
    expect(source.getCalls()).toEqual([
      { kind: 'comment', id: '5005' },
      { kind: 'issue', id: '7' },
      { kind: 'pr', id: '7' },
    ]);
    expect(overlay.get('resolved-git-branch')).toBe('fix/typo');
    expect(overlay.get('resolved-repo-full-name')).toBe(TEST_REPOSITORY);
    expect(overlay.get('resolved-issue-number')).toBe('7');
    expect(overlay.get('resolved-comment-id')).toBe('5005');
  });

  it('prefers the explicit pull request over the comment one', async () => {
    const detector = new DispatchDetector({ fetcher: fetcher(), timeoutMs: 1000 });
    const { overlay } = await detector.detect({ inputs: { comment: '5005', pr: '42' } });
    expect(overlay.get('resolved-pr-number')).toBe('42');
    expect(overlay.get('resolved-issue-number')).toBe('7');
  });

  it('does not look up a pull request for a plain issue', async () => {
    const source = fetcher();
    const detector = new DispatchDetector({ fetcher: source, timeoutMs: 1000 });
    const { overlay } = await detector.detect({ inputs: { issue: '9' } });
    expect(source.getCalls()).toEqual([{ kind: 'issue', id: '9' }]);
    expect(Object.fromEntries(overlay)).toEqual({ 'resolved-issue-number': '9' });
  });

  it('records a missing object and continues', async () => {
    const detector = new DispatchDetector({ fetcher: fetcher(), timeoutMs: 1000 });
    const { overlay, errors } = await detector.detect({ inputs: { pr: '404', issue: '9' } });
    expect(errors.map(error => error.code)).toEqual([PipevarsErrorCode.CONTEXT_NOT_FOUND]);
    expect(errors[0]?.message).toBe('Pull request 404 was not found');
    expect(Object.fromEntries(overlay)).toEqual({ 'resolved-issue-number': '9' });
  });

  it('leaves the overlay empty when lookups time out', async () => {
    const detector = new DispatchDetector({ fetcher: fetcher(200), timeoutMs: 20 });
    const { overlay, errors } = await detector.detect({ inputs: { pr: '42' } });
    expect(overlay.size).toBe(0);
    expect(errors.map(error => error.code)).toEqual([PipevarsErrorCode.CONTEXT_TIMEOUT]);
    expect(errors[0]?.message).toBe('Lookup of pull request 42 timed out after 20ms');
  });
});
