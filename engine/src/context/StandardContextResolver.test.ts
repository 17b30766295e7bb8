import { describe, expect, it } from 'vitest';
import { CatalogError, NullabilityViolation } from '../errors/ContextErrors.js';
import {
  issueCommentContext,
  pullRequestContext,
  pushContext,
  scheduleContext,
} from '../testing/PayloadBuilder.js';
import { TriggerType } from '../types/core-types.js';
import { parseCatalog } from './StandardCatalog.js';
import { StandardContextResolver } from './StandardContextResolver.js';

const resolver = new StandardContextResolver({ nullability: 'strict' });

function resolve(...args: Parameters<StandardContextResolver['resolve']>) {
  return resolver.resolve(...args).values;
}

describe('StandardContextResolver', () => {
  describe('pull request events', () => {
    const values = resolve(pullRequestContext());

    it('detects the trigger', () => {
      expect(values.get('trigger-type')).toBe(TriggerType.PULL_REQUEST);
      expect(values.get('is-pr')).toBe(true);
    });

    it('separates source and target branches', () => {
      expect(values.get('pr-source-git-branch')).toBe('feature/sorting');
      expect(values.get('pr-target-git-branch')).toBe('main');
      expect(values.get('pr-source-git-ref')).toBe('refs/heads/feature/sorting');
    });

    it('collapses the resolved family to the head branch', () => {
      expect(values.get('resolved-git-branch')).toBe('feature/sorting');
      expect(values.get('resolved-git-sha')).toBe('bbbbbbb');
      expect(values.get('resolved-git-url')).toBe('https://github.com/octo-org/widgets/tree/feature/sorting');
    });

    it('renders numeric ids as text', () => {
      expect(values.get('pr-number')).toBe('42');
      expect(values.get('issue-number')).toBe('42');
      expect(values.get('resolved-pr-number')).toBe('42');
    });

    it('uses the head branch as the current branch instead of the merge ref', () => {
      expect(values.get('current-git-ref')).toBe('refs/pull/42/merge');
      expect(values.get('current-git-branch')).toBe('feature/sorting');
    });

    it('leaves comment fields empty', () => {
      expect(values.get('comment-id')).toBeNull();
    });

    it('builds URLs from the repository host', () => {
      expect(values.get('server-url')).toBe('https://github.com');
      expect(values.get('run-url')).toBe('https://github.com/octo-org/widgets/actions/runs/1001');
    });
  });

  it('recognises forks', () => {
    const values = resolve(pullRequestContext({ headRepo: 'fork-user/widgets' }));
    expect(values.get('pr-is-fork')).toBe(true);
    expect(values.get('resolved-repo-full-name')).toBe('fork-user/widgets');
    expect(values.get('pr-target-repo-full-name')).toBe('octo-org/widgets');
  });

  describe('scheduled runs', () => {
    const values = resolve(scheduleContext());

    it('null every pull request and comment field', () => {
      const prOrComment = [...values.keys()].filter(
        name => name.startsWith('pr-source-') || name.startsWith('pr-target-') || name.startsWith('comment-')
      );
      expect(prOrComment).toHaveLength(14);
      for (const name of prOrComment) {
        expect(values.get(name)).toBeNull();
      }
      expect(values.get('is-pr')).toBe(false);
    });

    it('resolve to the current ref', () => {
      expect(values.get('resolved-git-branch')).toBe('main');
      expect(values.get('resolved-git-ref')).toBe('refs/heads/main');
    });
  });

  it('derives the tag of a tag push and falls back to the commit URL', () => {
    const values = resolve(pushContext('refs/tags/v1.2.0'));
    expect(values.get('current-git-tag')).toBe('v1.2.0');
    expect(values.get('current-git-branch')).toBeNull();
    expect(values.get('resolved-git-url')).toBe('https://github.com/octo-org/widgets/tree/eeeeeee');
  });

  it('reads pull request fields of comments made on pull requests', () => {
    const values = resolve(issueCommentContext({ onPullRequest: true }));
    expect(values.get('trigger-type')).toBe(TriggerType.COMMENT);
    expect(values.get('is-pr')).toBe(true);
    expect(values.get('pr-number')).toBe('17');
    expect(values.get('comment-id')).toBe('5005');
    expect(values.get('comment-author')).toBe('commenter');
    expect(values.get('pr-source-git-branch')).toBeNull();
  });

  it('does not treat plain issue comments as pull requests', () => {
    const values = resolve(issueCommentContext());
    expect(values.get('is-pr')).toBe(false);
    expect(values.get('pr-number')).toBeNull();
    expect(values.get('issue-number')).toBe('17');
  });

  describe('comments outside issues and pull requests', () => {
    const commitComment = scheduleContext({
      eventName: 'commit_comment',
      payload: {
        action: 'created',
        comment: {
          id: 555,
          body: 'Looks good',
          user: { login: 'reviewer' },
          html_url: 'https://github.com/octo-org/widgets/commit/eeeeeee#commitcomment-555',
        },
      },
    });

    it('fills the comment fields of a commit comment', () => {
      const values = resolve(commitComment);
      expect(values.get('trigger-type')).toBe(TriggerType.OTHER);
      expect(values.get('comment-id')).toBe('555');
      expect(values.get('comment-body')).toBe('Looks good');
      expect(values.get('comment-author')).toBe('reviewer');
      expect(values.get('comment-url')).toBe('https://github.com/octo-org/widgets/commit/eeeeeee#commitcomment-555');
    });

    it('records no violation in lenient mode', () => {
      const lenient = new StandardContextResolver({ nullability: 'lenient' });
      expect(lenient.resolve({ ...commitComment, eventName: 'discussion_comment' }).violations).toEqual([]);
    });
  });

  it('falls back to the context when the payload has no repository', () => {
    const values = resolve(scheduleContext({ payload: {}, serverUrl: 'https://ghe.example.com/' }));
    expect(values.get('server-url')).toBe('https://ghe.example.com');
    expect(values.get('repo-full-name')).toBe('octo-org/widgets');
    expect(values.get('repo-owner')).toBe('octo-org');
    expect(values.get('repo-url')).toBe('https://ghe.example.com/octo-org/widgets');
  });

  it('lets overlaid values feed later templates', () => {
    const values = resolve(scheduleContext(), new Map([['resolved-git-branch', 'hotfix']]));
    expect(values.get('resolved-git-branch')).toBe('hotfix');
    expect(values.get('resolved-git-url')).toBe('https://github.com/octo-org/widgets/tree/hotfix');
  });

  describe('nullability', () => {
    const crafted = scheduleContext({ payload: { pull_request: { number: 9 } } });

    it('throws in strict mode', () => {
      expect(() => resolver.resolve(crafted)).toThrow(NullabilityViolation);
    });

    it('coerces to null in lenient mode', () => {
      const lenient = new StandardContextResolver({ nullability: 'lenient' });
      const result = lenient.resolve(crafted);
      expect(result.values.get('pr-number')).toBeNull();
      expect(result.violations.map(violation => violation.path)).toEqual(['pr-number', 'issue-number']);
    });
  });

  describe('catalog validation', () => {
    it('rejects forward references', () => {
      expect(() => parseCatalog({
        catalogVersion: 1,
        variables: [{ name: 'a', description: '', appliesTo: '*', sources: [{ path: 'vars.b' }] }],
      })).toThrow(CatalogError);
    });

    it('rejects duplicate names', () => {
      const definition = { name: 'a', description: '', appliesTo: '*', sources: [{ literal: 'x' }] };
      expect(() => parseCatalog({ catalogVersion: 1, variables: [definition, definition] })).toThrow(/duplicate definition "a"/);
    });
  });

  it('describes every definition', () => {
    const described = resolver.describeCatalog();
    expect(described).toHaveLength(resolver.names().length);
    expect(described.find(entry => entry.name === 'pr-number')?.appliesTo).toBe('pull_request, comment');
  });
});
