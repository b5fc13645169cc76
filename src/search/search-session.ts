// src/search/search-session.ts: per-conversation search state, the anchor for follow-ups
//
// Lives beside the chat history, not inside it: trimming history never drops
// the last results or the cached entity.

import { createHash } from 'node:crypto';
import type { EntityType, Recency, SearchMode, SourceItem, StoryCluster } from '@/search/types';

export const DEFAULT_SESSION_TTL_MS = 15 * 60 * 1000;

/** First 12 hex chars of SHA-256 over the trimmed, lower-cased URL without trailing slashes. */
export function computeSourceId(url: string): string {
  if (!url || !url.trim()) return 'empty';

  const normalized = url.trim().toLowerCase().replace(/\/+$/, '');
  return createHash('sha256').update(normalized, 'utf8').digest('hex').slice(0, 12);
}

export class SearchSession {
  lastMode: SearchMode | null = null;
  lastQuery: string | null = null;
  lastRecency: Recency | null = null;

  lastEntityCanonical: string | null = null;
  lastEntityType: EntityType | null = null;
  lastEntityDisambiguation: string | null = null;

  lastResults: SourceItem[] = [];
  primarySourceId: string | null = null;
  selectedSourceId: string | null = null;
  lastClusters: StoryCluster[] = [];

  updatedAt: Date | null = null;

  constructor(private readonly ttlMs: number = DEFAULT_SESSION_TTL_MS) {}

  hasRecentResults(now: Date): boolean {
    if (this.lastResults.length === 0 || !this.updatedAt) return false;
    return now.getTime() - this.updatedAt.getTime() < this.ttlMs;
  }

  /** Overwrites mode/query/recency/results. Entity cache and selected source survive. */
  recordSearchResults(
    mode: SearchMode,
    query: string,
    recency: Recency,
    results: readonly SourceItem[],
    now: Date,
  ): void {
    this.lastMode = mode;
    this.lastQuery = query;
    this.lastRecency = recency;
    this.lastResults = [...results];
    this.updatedAt = now;
    this.primarySourceId = results.length > 0 ? results[0].sourceId : null;
  }

  /** Adds results not already present (by sourceId). */
  appendResults(newResults: readonly SourceItem[], now: Date): void {
    const seen = new Set(this.lastResults.map((r) => r.sourceId));
    for (const r of newResults) {
      if (seen.has(r.sourceId)) continue;
      seen.add(r.sourceId);
      this.lastResults.push(r);
    }
    this.updatedAt = now;
  }

  findSource(sourceId: string | null): SourceItem | undefined {
    if (!sourceId) return undefined;
    return this.lastResults.find((r) => r.sourceId === sourceId);
  }

  clear(): void {
    this.lastMode = null;
    this.lastQuery = null;
    this.lastRecency = null;
    this.lastEntityCanonical = null;
    this.lastEntityType = null;
    this.lastEntityDisambiguation = null;
    this.lastResults = [];
    this.lastClusters = [];
    this.primarySourceId = null;
    this.selectedSourceId = null;
    this.updatedAt = null;
  }
}
