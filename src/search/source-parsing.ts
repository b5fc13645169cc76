// src/search/source-parsing.ts: web_search output: readable text, then a delimited JSON source list

import { z } from 'zod';
import { logger } from '@/services/logger';
import { computeSourceId } from '@/search/search-session';
import type { SourceItem } from '@/search/types';

export const SOURCES_JSON_DELIMITER = '<!-- SOURCES_JSON -->';

const rawSourceSchema = z
  .object({
    url: z.string().nullish(),
    title: z.string().nullish(),
    domain: z.string().nullish(),
    excerpt: z.string().nullish(),
    publishedAt: z.unknown().optional(),
  })
  .passthrough();

function parsePublishedAt(value: unknown): Date | undefined {
  if (typeof value !== 'string' || !value.trim()) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Reads the JSON array after the delimiter. Items without a url are skipped;
 * malformed JSON yields whatever was parsed (usually nothing).
 */
export function parseSourcesFromToolResult(toolResult: string): SourceItem[] {
  const delimIdx = toolResult.indexOf(SOURCES_JSON_DELIMITER);
  if (delimIdx < 0) return [];

  const jsonPart = toolResult.slice(delimIdx + SOURCES_JSON_DELIMITER.length).trim();
  if (!jsonPart) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(jsonPart);
  } catch (err) {
    logger.warn('search:sources_json_malformed', { error: err instanceof Error ? err.message : String(err) });
    return [];
  }
  if (!Array.isArray(raw)) return [];

  const sources: SourceItem[] = [];
  for (const entry of raw) {
    const parsed = rawSourceSchema.safeParse(entry);
    if (!parsed.success) continue;

    const url = parsed.data.url?.trim();
    if (!url) continue;

    const publishedAt = parsePublishedAt(parsed.data.publishedAt);
    sources.push({
      sourceId: computeSourceId(url),
      url,
      title: parsed.data.title ?? '',
      domain: parsed.data.domain ?? '',
      snippet: parsed.data.excerpt ?? '',
      ...(publishedAt ? { publishedAt } : {}),
    });
  }
  return sources;
}

export function stripSourcesJson(toolResult: string): string {
  const idx = toolResult.indexOf(SOURCES_JSON_DELIMITER);
  return (idx >= 0 ? toolResult.slice(0, idx) : toolResult).trimEnd();
}

/** Reads a "Word Count: 1,234" metadata line from browse output. */
export function parseWordCount(content: string): number | null {
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed.toLowerCase().startsWith('word count:')) continue;
    const value = Number.parseInt(trimmed.slice('word count:'.length).trim().replace(/,/g, ''), 10);
    if (Number.isFinite(value)) return value;
  }
  return null;
}

/** Redirect landings and non-article wrappers are not worth summarizing. */
export function isLowSignalContent(content: string | null | undefined): boolean {
  const lower = (content ?? '').toLowerCase();
  if (!lower.trim()) return true;

  const wordCount = parseWordCount(lower) ?? 0;
  if (lower.includes('extraction: basic (non-article page)') && wordCount < 120) return true;
  if (lower.includes('source: news.google.com') && wordCount < 300) return true;
  return false;
}
