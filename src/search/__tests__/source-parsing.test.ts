import { describe, expect, it } from 'vitest';
import { computeSourceId } from '@/search/search-session';
import {
  isLowSignalContent,
  parseSourcesFromToolResult,
  parseWordCount,
  stripSourcesJson,
} from '@/search/source-parsing';
import { webSearchResult } from '@/test-support/fake-tool-client';

describe('parseSourcesFromToolResult', () => {
  it('reads the delimited source list', () => {
    const result = webSearchResult([
      {
        url: 'https://news.example.com/a',
        title: 'Story A',
        domain: 'news.example.com',
        excerpt: 'First lines',
        publishedAt: '2025-06-10T08:00:00Z',
      },
      { url: 'https://other.example.org/b', title: 'Story B' },
    ]);

    const sources = parseSourcesFromToolResult(result);

    expect(sources).toHaveLength(2);
    expect(sources[0]).toEqual({
      sourceId: computeSourceId('https://news.example.com/a'),
      url: 'https://news.example.com/a',
      title: 'Story A',
      domain: 'news.example.com',
      snippet: 'First lines',
      publishedAt: new Date('2025-06-10T08:00:00Z'),
    });
    expect(sources[1].snippet).toBe('');
    expect(sources[1].publishedAt).toBeUndefined();
  });

  it('skips entries without a url and drops unparseable dates', () => {
    const result = `text\n<!-- SOURCES_JSON -->\n${JSON.stringify([
      { title: 'no url' },
      { url: 'https://example.com/x', publishedAt: 'not a date' },
      42,
    ])}`;
    const sources = parseSourcesFromToolResult(result);
    expect(sources.map((s) => s.url)).toEqual(['https://example.com/x']);
    expect(sources[0].publishedAt).toBeUndefined();
  });

  it('returns nothing without the delimiter or with malformed json', () => {
    expect(parseSourcesFromToolResult('1. "A" — example.com')).toEqual([]);
    expect(parseSourcesFromToolResult('x\n<!-- SOURCES_JSON -->\n[{"url":')).toEqual([]);
  });
});

describe('stripSourcesJson', () => {
  it('keeps only the readable part', () => {
    expect(stripSourcesJson('1. "A" — example.com\n\n<!-- SOURCES_JSON -->\n[]')).toBe('1. "A" — example.com');
    expect(stripSourcesJson('plain  ')).toBe('plain');
  });
});

describe('word counts and low-signal pages', () => {
  it('parses grouped word counts', () => {
    expect(parseWordCount('Title: X\nWord Count: 1,234\nbody')).toBe(1234);
    expect(parseWordCount('no metadata')).toBeNull();
  });

  it('flags thin non-article pages', () => {
    expect(isLowSignalContent('Extraction: basic (non-article page)\nWord count: 80')).toBe(true);
    expect(isLowSignalContent('Extraction: basic (non-article page)\nWord count: 500')).toBe(false);
  });

  it('flags aggregator redirect pages', () => {
    expect(isLowSignalContent('Source: news.google.com\nWord count: 120')).toBe(true);
  });

  it('treats empty content as low signal', () => {
    expect(isLowSignalContent('')).toBe(true);
    expect(isLowSignalContent(null)).toBe(true);
    expect(isLowSignalContent('A normal article body')).toBe(false);
  });
});
