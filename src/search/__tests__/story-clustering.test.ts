import { describe, expect, it } from 'vitest';
import { clusterStories, extractWordSet, jaccardSimilarity } from '@/search/story-clustering';
import { computeSourceId } from '@/search/search-session';
import type { SourceItem } from '@/search/types';

function source(url: string, title: string): SourceItem {
  return { sourceId: computeSourceId(url), url, title, domain: new URL(url).hostname, snippet: '' };
}

const items = [
  source('https://a.example/fed-1', 'Fed raises interest rates again'),
  source('https://b.example/storm', 'Storm hits Florida coast'),
  source('https://c.example/fed-2', 'Fed raises rates to fight inflation'),
];

describe('extractWordSet', () => {
  it('drops stopwords and short words, then stems', () => {
    expect([...extractWordSet('The Running Dogs')].sort()).toEqual(['dogs', 'runn']);
  });

  it('returns an empty set for blank titles', () => {
    expect(extractWordSet('   ').size).toBe(0);
  });
});

describe('jaccardSimilarity', () => {
  it('is zero for two empty sets', () => {
    expect(jaccardSimilarity(new Set(), new Set())).toBe(0);
  });

  it('divides the intersection by the union', () => {
    expect(jaccardSimilarity(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3);
  });
});

describe('clusterStories', () => {
  it('groups similar headlines and puts the largest cluster first', () => {
    const clusters = clusterStories(items, 0.3);
    expect(clusters).toHaveLength(2);
    expect(clusters[0].representativeTitle).toBe('Fed raises interest rates again');
    expect(clusters[0].sources.map((s) => s.url)).toEqual(['https://a.example/fed-1', 'https://c.example/fed-2']);
    expect(clusters[1].representativeTitle).toBe('Storm hits Florida coast');
  });

  it('keeps singletons apart above the threshold', () => {
    expect(clusterStories(items, 0.9)).toHaveLength(3);
  });

  it('returns the same clusters for the same input', () => {
    expect(clusterStories(items)).toEqual(clusterStories(items));
  });

  it('handles an empty list', () => {
    expect(clusterStories([])).toEqual([]);
  });
});
