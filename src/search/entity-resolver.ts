/**
 * Entity resolver: finds the primary named entity in a message and pins down
 * its canonical name before the search query is built.
 *
 *   1. session cache (free on follow-ups about the same subject)
 *   2. one small model call -> { name, type, hint }
 *   3. one web_search call; result titles like "Name - Wikipedia" or
 *      "Name | Description" give the canonical form
 *
 * Never fails outright: any miss falls back to the raw extraction or to null.
 */
import { z } from 'zod';
import type { AuditSink } from '@/audit/audit-sink';
import { safeAppend } from '@/audit/audit-sink';
import type { ToolClient } from '@/mcp/tool-client';
import { TOOL_NAMES, callToolWithAlias } from '@/mcp/tool-alias';
import type { LlmClient } from '@/services/llm-client';
import { systemMessage, userMessage } from '@/services/llm-client';
import { logger } from '@/services/logger';
import { parseModelJson } from '@/services/safe-parse-json';
import { isFollowUpMessage } from '@/search/search-mode-router';
import type { SearchSession } from '@/search/search-session';
import type { EntityType, ResolvedEntity, ToolCallRecord } from '@/search/types';
import { isAbortError, truncate } from '@/utils/abort';

const EXTRACTION_PROMPT =
  'You extract entities. Given a user message, find the primary named entity ' +
  '(a person, organization, place or specific topic) if there is one. Reply with a JSON object only:\n' +
  '  { "name": "...", "type": "Person|Org|Place|Topic", "hint": "..." }\n' +
  'The hint is a short disambiguation such as "Prime Minister of Japan".\n' +
  'When there is no named entity reply: { "name": "", "type": "none", "hint": "" }\n' +
  'JSON only, no markdown, no commentary.';

const extractionSchema = z.object({
  name: z.string().nullish(),
  type: z.string().nullish(),
  hint: z.string().nullish(),
});

export interface ExtractedEntity {
  name: string;
  type: EntityType;
  hint: string;
}

const ENTITY_TYPES: readonly EntityType[] = ['Person', 'Org', 'Place', 'Topic'];

function toEntityType(raw: string | null | undefined): EntityType {
  const match = ENTITY_TYPES.find((t) => t.toLowerCase() === (raw ?? '').trim().toLowerCase());
  return match ?? 'unknown';
}

const fromExtraction = (e: ExtractedEntity): ResolvedEntity => ({
  canonicalName: e.name,
  type: e.type,
  disambiguation: e.hint,
});

/**
 * Scans numbered result lines (`1. "Title" — source.com`) for a canonical name.
 * Returns null when no title matches any of the known shapes.
 */
export function extractCanonicalFromResults(
  toolResult: string,
  entity: ExtractedEntity,
): ResolvedEntity | null {
  for (const line of toolResult.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.length < 5 || !/^\d/.test(trimmed)) continue;

    const dotIdx = trimmed.indexOf('.');
    if (dotIdx < 0 || dotIdx > 3) continue;

    const body = trimmed.slice(dotIdx + 1).trim().replace(/^"+|"+$/g, '');
    const sourceIdx = body.indexOf(' — ');
    const title = (sourceIdx > 0 ? body.slice(0, sourceIdx) : body).trim().replace(/^"+|"+$/g, '');

    const wikiIdx = title.toLowerCase().indexOf(' - wikipedia');
    if (wikiIdx > 0) {
      const name = title.slice(0, wikiIdx).trim();
      if (name.length >= 2) return { canonicalName: name, type: entity.type, disambiguation: entity.hint };
    }

    const pipeIdx = title.indexOf(' | ');
    if (pipeIdx > 0) {
      const name = title.slice(0, pipeIdx).trim();
      const desc = title.slice(pipeIdx + 3).trim();
      if (name.length >= 2) {
        return { canonicalName: name, type: entity.type, disambiguation: desc || entity.hint };
      }
    }

    const enDashIdx = title.indexOf(' – ');
    if (enDashIdx > 0) {
      const name = title.slice(0, enDashIdx).trim();
      if (name.length >= 2) return { canonicalName: name, type: entity.type, disambiguation: entity.hint };
    }

    if (entity.hint && title.toLowerCase().includes(entity.hint.toLowerCase())) {
      const cuts = [title.indexOf(','), title.indexOf(':')].filter((i) => i > 0);
      const cutAt = cuts.length > 0 ? Math.min(...cuts) : -1;
      const name = (cutAt > 2 ? title.slice(0, cutAt) : title).trim();
      if (name.length >= 2 && name.length <= 80) {
        return { canonicalName: name, type: entity.type, disambiguation: entity.hint };
      }
    }
  }
  return null;
}

export interface EntityResolverDeps {
  llm: LlmClient;
  tools: ToolClient;
  audit: AuditSink;
}

export class EntityResolver {
  constructor(private readonly deps: EntityResolverDeps) {}

  async resolve(
    message: string,
    session: SearchSession,
    toolCalls: ToolCallRecord[],
    signal?: AbortSignal,
  ): Promise<ResolvedEntity | null> {
    const cached = session.lastEntityCanonical;
    if (cached) {
      const lower = message.toLowerCase();
      if (lower.includes(cached.toLowerCase()) || isFollowUpMessage(lower)) {
        safeAppend(this.deps.audit, { action: 'ENTITY_RESOLVED_FROM_CACHE', result: cached });
        return {
          canonicalName: cached,
          type: session.lastEntityType ?? 'unknown',
          disambiguation: session.lastEntityDisambiguation ?? '',
        };
      }
    }

    const extracted = await this.extract(message, signal);
    if (!extracted) return null;

    safeAppend(this.deps.audit, {
      action: 'ENTITY_EXTRACTED',
      result: `${extracted.name} (${extracted.type})`,
      details: { name: extracted.name, type: extracted.type, hint: extracted.hint },
    });

    const canonical = (await this.canonicalize(extracted, toolCalls, signal)) ?? fromExtraction(extracted);

    session.lastEntityCanonical = canonical.canonicalName;
    session.lastEntityType = canonical.type;
    session.lastEntityDisambiguation = canonical.disambiguation;

    safeAppend(this.deps.audit, {
      action: 'ENTITY_RESOLVED',
      result: canonical.canonicalName,
      details: { type: canonical.type, disambiguation: canonical.disambiguation },
    });
    return canonical;
  }

  private async extract(message: string, signal?: AbortSignal): Promise<ExtractedEntity | null> {
    let content: string;
    try {
      const res = await this.deps.llm.chat([systemMessage(EXTRACTION_PROMPT), userMessage(message)], {
        maxTokens: 128,
        signal,
      });
      content = res.content;
    } catch (err) {
      if (isAbortError(err)) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn('entity:extraction_failed', { error: reason });
      safeAppend(this.deps.audit, { action: 'ENTITY_EXTRACTION_FAILED', result: reason });
      return null;
    }

    const parsed = parseModelJson(content, extractionSchema, 'entity-extraction');
    if (!parsed.ok) {
      if (parsed.reason !== 'empty') {
        safeAppend(this.deps.audit, { action: 'ENTITY_EXTRACTION_FAILED', result: parsed.reason });
      }
      return null;
    }

    const name = parsed.data.name?.trim() ?? '';
    if (!name || parsed.data.type?.trim().toLowerCase() === 'none') return null;
    return { name, type: toEntityType(parsed.data.type), hint: parsed.data.hint?.trim() ?? '' };
  }

  private async canonicalize(
    entity: ExtractedEntity,
    toolCalls: ToolCallRecord[],
    signal?: AbortSignal,
  ): Promise<ResolvedEntity | null> {
    const query = entity.hint ? `"${entity.name}" ${entity.hint}` : `"${entity.name}"`;
    const args = JSON.stringify({ query, maxResults: 3, recency: 'any' });

    const call = await callToolWithAlias(this.deps.tools, TOOL_NAMES.webSearch, args, signal);
    if (!call.success) {
      safeAppend(this.deps.audit, { action: 'ENTITY_CANONICALIZATION_FAILED', result: call.result });
      return null;
    }

    toolCalls.push({
      toolName: call.toolName,
      arguments: args,
      result: truncate(call.result, 200),
      success: true,
    });

    if (!call.result.trim()) return null;
    return extractCanonicalFromResults(call.result, entity);
  }
}
