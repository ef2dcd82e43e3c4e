import { describe, it, expect } from 'vitest';
import {
  buildContext,
  deduplicateAndRank,
  determineAlpha,
  generateSummary,
  truncateContent,
} from '../rag/service.js';
import { buildScopeConditions } from '../rag/search-scope.js';
import { toContextText } from '../rag/context-text.js';
import type { RagContextObject } from '../rag/types.js';
import { FakeSearchBackend, hit } from './helpers/fakes.js';

describe('determineAlpha', () => {
  it('favours keywords for short queries with an issue id', () => {
    expect(determineAlpha('Fix bug #36')).toBe(0.2);
  });

  it('favours keywords for error class names', () => {
    expect(determineAlpha('NullPointerException in UserService')).toBe(0.2);
  });

  it('stays balanced for short plain-language queries', () => {
    expect(determineAlpha('login bug with special characters')).toBe(0.5);
  });

  it('favours semantics for long natural-language questions', () => {
    expect(determineAlpha('how can users reset their password when the email link has already expired')).toBe(0.7);
  });

  it('favours keywords for long queries with several identifier patterns', () => {
    expect(
      determineAlpha('the application throws a NullPointerException whenever the user_profile page is opened after login'),
    ).toBe(0.2);
  });

  it('stays balanced for long queries with a single pattern', () => {
    expect(determineAlpha('I would like to know why the release v2.1.0 broke the export for some customers')).toBe(0.5);
  });
});

describe('truncateContent', () => {
  it('returns short content unchanged', () => {
    expect(truncateContent('short text')).toBe('short text');
  });

  it('hard-cuts content without spaces', () => {
    const result = truncateContent('a'.repeat(700));
    expect(result).toBe('a'.repeat(600) + '...');
  });

  it('backs off to a word boundary in the last 20%', () => {
    expect(truncateContent('abcdefghij klmnopq rest of text', 20)).toBe('abcdefghij klmnopq...');
  });

  it('keeps the hard cut when the last space is too far back', () => {
    expect(truncateContent('alpha beta gamma delta epsilon', 20)).toBe('alpha beta gamma del...');
  });

  it('trims trailing whitespace before the ellipsis', () => {
    expect(truncateContent('abcdefghijklmnop    xyz', 18)).toBe('abcdefghijklmnop...');
  });

  it('never splits a surrogate pair at the cut', () => {
    expect(truncateContent('ab\u{1F600}cd', 3)).toBe('ab...');
    expect(truncateContent('ab\u{1F600}cd', 4)).toBe('ab\u{1F600}...');
  });
});

describe('generateSummary', () => {
  it('reports an empty result', () => {
    expect(generateSummary([])).toBe('No related objects found.');
  });

  it('counts objects per type in type order', () => {
    const items = [{ object_type: 'item' }, { object_type: 'item' }, { object_type: 'github_issue' }, { object_type: 'comment' }];
    expect(generateSummary(items)).toBe(
      'Found 4 related objects: 1 comment, 1 github_issue, 2 items. Includes GitHub issues/PRs.',
    );
  });

  it('uses the singular for one object', () => {
    expect(generateSummary([{ object_type: 'item' }])).toBe('Found 1 related object: 1 item.');
  });
});

describe('deduplicateAndRank', () => {
  it('keeps the first hit per id, drops hits without id and sorts by score then type', () => {
    const results = [
      hit({ object_id: 'a', object_type: 'item', score: 0.5 }),
      hit({ object_id: 'b', object_type: 'comment', score: 0.9 }),
      hit({ object_id: 'a', object_type: 'item', score: 0.95 }),
      hit({ object_id: 'c', object_type: 'attachment', score: 0.5 }),
      hit({ object_id: null, object_type: 'item', score: 0.99 }),
      hit({ object_id: 'd', object_type: 'github_issue', score: 0.5 }),
    ];

    const ranked = deduplicateAndRank(results, 3);

    expect(ranked.map(r => r.object_id)).toEqual(['b', 'a', 'c']);
    expect(ranked[1]?.score).toBe(0.5);
  });
});

describe('buildScopeConditions', () => {
  it('defaults to the allowed object types and requires text', () => {
    expect(buildScopeConditions({})).toEqual([
      { kind: 'any_of', property: 'type', values: ['item', 'github_issue', 'github_pr', 'attachment'] },
      { kind: 'not_null', property: 'text' },
    ]);
  });

  it('combines project, item, exclusion and type conditions', () => {
    expect(
      buildScopeConditions({ projectId: '1', itemId: '2', currentItemId: '3', objectTypes: ['comment'] }),
    ).toEqual([
      { kind: 'equal', property: 'project_id', value: '1' },
      { kind: 'equal', property: 'parent_object_id', value: '2' },
      { kind: 'not_equal', property: 'object_id', value: '3' },
      { kind: 'any_of', property: 'type', values: ['comment'] },
      { kind: 'not_null', property: 'text' },
    ]);
  });

  it('applies no type filter for an explicitly empty list', () => {
    expect(buildScopeConditions({ objectTypes: [] })).toEqual([{ kind: 'not_null', property: 'text' }]);
  });
});

describe('buildContext', () => {
  it('returns an empty context when the backend is unavailable', async () => {
    const backend = new FakeSearchBackend(() => [], false);

    const context = await buildContext({ query: 'login bug with special characters' }, { backend });

    expect(context).toEqual({
      query: 'login bug with special characters',
      alpha: 0.5,
      summary: 'Weaviate is not available.',
      items: [],
      stats: { total_results: 0, deduplicated: 0, error: 'Weaviate not configured or disabled' },
    });
    expect(backend.requests).toHaveLength(0);
  });

  it('over-fetches, deduplicates and truncates', async () => {
    const backend = new FakeSearchBackend(() => [
      hit({ object_id: '1', title: 'Login fails', content: 'x'.repeat(700), score: 0.9, link: '/items/1/' }),
      hit({ object_id: '1', title: 'Login fails', content: 'dup', score: 0.8 }),
      hit({ object_id: '2', object_type: 'github_issue', content: 'Crash on login', score: 0.7 }),
      hit({ object_id: '3', content: 'Unrelated', score: 0.1 }),
    ]);

    const context = await buildContext({ query: 'Fix bug #36', projectId: '7', limit: 2 }, { backend });

    expect(backend.requests).toEqual([
      { query: 'Fix bug #36', alpha: 0.2, limit: 4, scope: { projectId: '7' } },
    ]);
    expect(context.stats).toEqual({ total_results: 4, deduplicated: 2, error: null });
    expect(context.items.map(i => i.object_id)).toEqual(['1', '2']);
    expect(context.items[0]?.content).toBe('x'.repeat(600) + '...');
    expect(context.summary).toBe('Found 2 related objects: 1 github_issue, 1 item. Includes GitHub issues/PRs.');
    expect(context.debug).toBeUndefined();
  });

  it('uses an explicit alpha and reports debug information', async () => {
    const backend = new FakeSearchBackend();

    const context = await buildContext({ query: 'Fix bug #36', alpha: 0.9, includeDebug: true }, { backend });

    expect(context.alpha).toBe(0.9);
    expect(backend.requests[0]?.alpha).toBe(0.9);
    expect(context.debug).toEqual({ alpha_heuristic: 0.9, query_length: 11, word_count: 3 });
  });

  it('records backend errors in stats instead of throwing', async () => {
    const backend = new FakeSearchBackend(() => {
      throw new Error('connection refused');
    });

    const context = await buildContext({ query: 'Fix bug #36' }, { backend });

    expect(context.items).toEqual([]);
    expect(context.stats.error).toBe('connection refused');
    expect(context.summary).toBe('No related objects found.');
  });
});

describe('toContextText', () => {
  it('renders numbered snippets and sources', () => {
    const items: RagContextObject[] = [
      {
        object_type: 'item',
        object_id: '12',
        title: 'Login fails',
        content: 'Users cannot log in',
        source: 'agira',
        relevance_score: 0.876,
        link: '/items/12/',
        updated_at: null,
      },
      {
        object_type: 'github_pr',
        object_id: '5',
        title: null,
        content: 'Fix',
        source: 'github',
        relevance_score: null,
        link: null,
        updated_at: null,
      },
    ];

    expect(toContextText({ items })).toBe(
      [
        '[CONTEXT]',
        '1) (type=item score=0.88) Title: Login fails',
        '   Link: /items/12/',
        '   Snippet: Users cannot log in',
        '',
        '2) (type=github_pr score=N/A)',
        '   Snippet: Fix',
        '[/CONTEXT]',
        '',
        '[SOURCES]',
        '- item:12 -> /items/12/',
        '- github_pr:5',
        '[/SOURCES]',
      ].join('\n'),
    );
  });
});
