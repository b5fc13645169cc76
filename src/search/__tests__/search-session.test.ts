import { describe, expect, it } from 'vitest';
import { SearchSession, computeSourceId } from '@/search/search-session';
import type { SourceItem } from '@/search/types';

function source(url: string, title = 'Title'): SourceItem {
  return { sourceId: computeSourceId(url), url, title, domain: 'example.com', snippet: '' };
}

const T0 = new Date('2025-06-10T12:00:00Z');
const minutesLater = (minutes: number) => new Date(T0.getTime() + minutes * 60_000);

describe('computeSourceId', () => {
  it('ignores case, surrounding whitespace and trailing slashes', () => {
    const id = computeSourceId('https://Example.com/story/');
    expect(id).toMatch(/^[0-9a-f]{12}$/);
    expect(computeSourceId('  https://example.com/story  ')).toBe(id);
    expect(computeSourceId('https://example.com/story///')).toBe(id);
  });

  it('uses a fixed id for empty urls', () => {
    expect(computeSourceId('')).toBe('empty');
    expect(computeSourceId('   ')).toBe('empty');
  });
});

describe('SearchSession', () => {
  it('records results and picks the first as primary', () => {
    const session = new SearchSession();
    const results = [source('https://example.com/a'), source('https://example.com/b')];
    session.recordSearchResults('WebFactFind', 'query', 'week', results, T0);

    expect(session.lastMode).toBe('WebFactFind');
    expect(session.lastQuery).toBe('query');
    expect(session.lastRecency).toBe('week');
    expect(session.primarySourceId).toBe(results[0].sourceId);
    expect(session.findSource(results[1].sourceId)?.url).toBe('https://example.com/b');
  });

  it('expires results after the ttl', () => {
    const session = new SearchSession(10 * 60_000);
    session.recordSearchResults('NewsAggregate', 'q', 'day', [source('https://example.com/a')], T0);

    expect(session.hasRecentResults(minutesLater(9))).toBe(true);
    expect(session.hasRecentResults(minutesLater(10))).toBe(false);
  });

  it('has no recent results when the last search was empty', () => {
    const session = new SearchSession();
    session.recordSearchResults('WebFactFind', 'q', 'any', [], T0);
    expect(session.hasRecentResults(T0)).toBe(false);
    expect(session.primarySourceId).toBeNull();
  });

  it('appends only unseen sources', () => {
    const session = new SearchSession();
    session.recordSearchResults('WebFactFind', 'q', 'any', [source('https://example.com/a')], T0);
    session.appendResults([source('https://example.com/a/'), source('https://example.com/c')], minutesLater(1));

    expect(session.lastResults.map((r) => r.url)).toEqual(['https://example.com/a', 'https://example.com/c']);
    expect(session.updatedAt).toEqual(minutesLater(1));
  });

  it('keeps the entity cache across searches and drops everything on clear', () => {
    const session = new SearchSession();
    session.lastEntityCanonical = 'Boise State University';
    session.lastEntityType = 'Org';
    session.recordSearchResults('WebFactFind', 'q', 'any', [source('https://example.com/a')], T0);
    expect(session.lastEntityCanonical).toBe('Boise State University');

    session.clear();
    expect(session.lastEntityCanonical).toBeNull();
    expect(session.lastResults).toEqual([]);
    expect(session.updatedAt).toBeNull();
  });
});
