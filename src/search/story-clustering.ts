/**
 * Groups news results into story buckets by title similarity.
 *
 * Greedy single pass: each item joins the existing cluster whose word union
 * is most similar (Jaccard), or opens a new one below the threshold.
 * O(n²) over at most a page of results; no embeddings.
 */
import { z } from 'zod';
import stopwordData from '@/search/data/story-stopwords.json';
import type { SourceItem, StoryCluster } from '@/search/types';

export const DEFAULT_CLUSTER_THRESHOLD = 0.3;

const STOPWORDS: ReadonlySet<string> = new Set(z.array(z.string()).parse(stopwordData));

const WORD_SPLIT = /[\s\-–—,.:;!?'"()[\]]+/;

function stem(word: string): string {
  if (word.length <= 4) return word;

  if (word.endsWith('ing') && word.length > 5) return word.slice(0, -3);
  if (word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (word.endsWith('es')) return word.slice(0, -2);
  if (word.endsWith('ed')) return word.slice(0, -2);
  if (word.endsWith('ly')) return word.slice(0, -2);
  if (word.endsWith('s')) return word.slice(0, -1);
  return word;
}

export function extractWordSet(title: string): Set<string> {
  if (!title.trim()) return new Set();

  return new Set(
    title
      .toLowerCase()
      .split(WORD_SPLIT)
      .filter((w) => w.length > 2 && !STOPWORDS.has(w))
      .map(stem),
  );
}

/** |A ∩ B| / |A ∪ B|, 0 when both are empty. */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;

  let intersection = 0;
  for (const word of a) {
    if (b.has(word)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

interface WorkingCluster {
  indices: number[];
  words: Set<string>;
}

export function clusterStories(
  items: readonly SourceItem[],
  threshold: number = DEFAULT_CLUSTER_THRESHOLD,
): StoryCluster[] {
  if (items.length === 0) return [];

  const wordSets = items.map((item) => extractWordSet(item.title));
  const clusters: WorkingCluster[] = [];

  wordSets.forEach((words, i) => {
    let best = -1;
    let bestSim = 0;
    clusters.forEach((cluster, c) => {
      const sim = jaccardSimilarity(words, cluster.words);
      // strictly greater: ties stay with the earlier cluster
      if (sim > bestSim) {
        bestSim = sim;
        best = c;
      }
    });

    const target = best >= 0 && bestSim >= threshold ? clusters[best] : undefined;
    if (target) {
      target.indices.push(i);
      for (const w of words) target.words.add(w);
    } else {
      clusters.push({ indices: [i], words: new Set(words) });
    }
  });

  // Array.prototype.sort is stable, so equal sizes keep creation order
  return clusters
    .slice()
    .sort((a, b) => b.indices.length - a.indices.length)
    .map((cluster) => ({
      representativeTitle: items[cluster.indices[0]].title,
      sources: cluster.indices.map((i) => items[i]),
    }));
}
