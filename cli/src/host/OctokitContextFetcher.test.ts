import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ContextFetchError, PipevarsErrorCode } from '@pipevars/engine';

const api = vi.hoisted(() => ({
  getPull: vi.fn(),
  getIssue: vi.fn(),
  getComment: vi.fn(),
  getOctokit: vi.fn(),
}));

vi.mock('@actions/github', () => ({
  getOctokit: api.getOctokit,
}));

import { OctokitContextFetcher, issueNumberFromUrl } from './OctokitContextFetcher.js';

describe('OctokitContextFetcher', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    api.getOctokit.mockReturnValue({
      rest: {
        pulls: { get: api.getPull },
        issues: { get: api.getIssue, getComment: api.getComment },
      },
    });
  });

  it('rejects a repository without an owner', () => {
    expect(() => OctokitContextFetcher.create('test-token', 'widgets')).toThrow(
      'Repository must be "owner/name", got "widgets"'
    );
  });

  it('maps a pull request', async () => {
    api.getPull.mockResolvedValue({
      data: {
        number: 42,
        title: 'Add sorting',
        html_url: 'https://github.com/octo-org/widgets/pull/42',
        head: { ref: 'feature/sorting', sha: 'head-sha', repo: { full_name: 'octo-org/widgets' } },
        base: { ref: 'main', sha: 'base-sha', repo: { full_name: 'octo-org/widgets' } },
      },
    });

    const fetcher = OctokitContextFetcher.create('test-token', 'octo-org/widgets');
    const pr = await fetcher.fetch('pr', '42');

    expect(api.getOctokit).toHaveBeenCalledWith('test-token');
    expect(api.getPull).toHaveBeenCalledWith({
      owner: 'octo-org',
      repo: 'widgets',
      pull_number: 42,
      request: { signal: undefined },
    });
    expect(pr).toEqual({
      number: 42,
      title: 'Add sorting',
      url: 'https://github.com/octo-org/widgets/pull/42',
      headRef: 'feature/sorting',
      headSha: 'head-sha',
      headRepoFullName: 'octo-org/widgets',
      baseRef: 'main',
      baseSha: 'base-sha',
      baseRepoFullName: 'octo-org/widgets',
    });
  });

  it('maps a comment and reads its issue number', async () => {
    api.getComment.mockResolvedValue({
      data: {
        id: 900,
        body: null,
        user: { login: 'octocat' },
        html_url: 'https://github.com/octo-org/widgets/issues/17#issuecomment-900',
        issue_url: 'https://api.github.com/repos/octo-org/widgets/issues/17',
      },
    });

    const fetcher = OctokitContextFetcher.create('test-token', 'octo-org/widgets');
    const comment = await fetcher.fetch('comment', '900');

    expect(comment).toEqual({
      id: 900,
      body: '',
      author: 'octocat',
      url: 'https://github.com/octo-org/widgets/issues/17#issuecomment-900',
      issueNumber: 17,
    });
  });

  it('turns a 404 into a not-found lookup error', async () => {
    api.getIssue.mockRejectedValue(Object.assign(new Error('Not Found'), { status: 404 }));

    const fetcher = OctokitContextFetcher.create('test-token', 'octo-org/widgets');
    const failure = fetcher.fetch('issue', '5');

    await expect(failure).rejects.toBeInstanceOf(ContextFetchError);
    await expect(failure).rejects.toHaveProperty('code', PipevarsErrorCode.CONTEXT_NOT_FOUND);
  });

  it('passes other failures through', async () => {
    api.getIssue.mockRejectedValue(Object.assign(new Error('Bad credentials'), { status: 401 }));

    const fetcher = OctokitContextFetcher.create('test-token', 'octo-org/widgets');

    await expect(fetcher.fetch('issue', '5')).rejects.toThrow('Bad credentials');
  });
});

describe('issueNumberFromUrl', () => {
  it('reads the trailing issue number', () => {
    expect(issueNumberFromUrl('https://api.github.com/repos/octo-org/widgets/issues/17')).toBe(17);
  });

  it('rejects other URLs', () => {
    expect(() => issueNumberFromUrl('https://api.github.com/repos/octo-org/widgets')).toThrow(
      'Cannot read an issue number from "https://api.github.com/repos/octo-org/widgets"'
    );
  });
});
