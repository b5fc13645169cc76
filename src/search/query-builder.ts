/**
 * Query builder: constrained model construction, an independent token
 * validator, and deterministic fallback templates.
 *
 * The model proposes `{ query, recency }`. The proposal is sanitized, then
 * every token must come from the user's message, the resolved entity or a
 * small glue-word list (one stray token allowed). Anything else is thrown
 * away in favour of a template built from the entity / topic / last query.
 */
import { z } from 'zod';
import type { AuditSink } from '@/audit/audit-sink';
import { safeAppend } from '@/audit/audit-sink';
import type { ChatMessage, LlmClient } from '@/services/llm-client';
import { systemMessage, userMessage } from '@/services/llm-client';
import { logger } from '@/services/logger';
import { parseModelJson } from '@/services/safe-parse-json';
import {
  extractCanonicalInstrument,
  isMarketQuoteRequest,
  preferredQuoteRecency,
} from '@/search/market-quote-heuristics';
import type { SearchSession } from '@/search/search-session';
import type { Recency, ResolvedEntity, SearchMode } from '@/search/types';
import { isAbortError, truncate } from '@/utils/abort';
import { collapseWhitespace, trimChars, trimEndChars } from '@/utils/text';

export interface SearchQuery {
  query: string;
  recency: Recency;
  usedFallback: boolean;
}

const MIN_QUERY_LENGTH = 6;
const MAX_QUERY_LENGTH = 120;
const MAX_FALLBACK_TOPIC = 60;

const GLUE_WORDS = new Set([
  'latest', 'news', 'today', 'current', 'recent',
  'who', 'what', 'when', 'where', 'how', 'why',
  'is', 'are', 'was', 'the', 'a', 'an', 'of', 'in', 'on',
  'about', 'for', 'from', 'to', 'and', 'or',
  'prime', 'minister', 'president', 'ceo', 'leader',
  'biography', 'overview', 'background', 'history',
  'update', 'updates', 'report', 'reports',
  'headlines', 'breaking', 'forecast',
]);

const CONVERSATIONAL_NOISE = new Set([
  'wassup', 'sup', 'diggy', 'bro', 'dude', 'homie', 'home', 'yo', 'hey',
  'pls', 'please', 'thanks', 'thank', 'you', 'can', 'could', 'would', 'will', 'me',
]);

const GENERIC_NEWS_TOKENS = new Set([
  'news', 'headline', 'headlines', 'breaking', 'latest', 'recent', 'top', 'updates', 'update', 'this',
]);

const GENERIC_TOPIC_TOKENS = new Set([
  'check', 'on', 'the', 'news', 'there', 'that', 'this', 'it',
  'about', 'latest', 'recent', 'update', 'updates', 'please', 'me',
]);

const PREFACE_MARKERS = [
  ' can you ', ' could you ', ' would you ', ' will you ',
  ' please ', ' pull up ', ' bring up ', ' show me ',
  ' get me ', ' search for ', ' look up ', ' find ',
];

const STRIP_LEAD =
  /^(?:can you |could you |please |hey |hi |yo |search for |look up |find |get me |show me |pull up |bring up |what(?:'s| is| are) )+/i;
const CONVERSATION_PREFIX = /^\s*(?:not much|i'?m good|im good|thanks|thank you|okay|ok|well|alright)[\s,\-:!]*/i;
const LEADING_FILLER = /^\s*(?:well[,.!?]?\s*)?(?:i\s+(?:wanted|want|need|was hoping|would like)\s+to\s+)+/i;
const LEADING_REQUEST_VERB = /^\s*(?:check|look\s+up|look|find|get|show|pull\s+up|bring\s+up)\s+(?:on\s+)?/i;
const TAIL_POLITE = /(?:\s+for me)?(?:\s+please|\s+pls|\s+thanks|\s+thank you)+\s*$/i;

const TOKEN_SPLIT = /[\s\-–—,.:;!?'"()[\]/]+/;

const modelQuerySchema = z.object({
  query: z.string().nullish(),
  recency: z.string().nullish(),
});

// ==================================================================
// Pure helpers
// ==================================================================

export function tokenize(text: string | null | undefined): string[] {
  if (!text) return [];
  return text
    .toLowerCase()
    .split(TOKEN_SPLIT)
    .filter((t) => t.length > 1);
}

export function normalizeRecency(raw: string | null | undefined): Recency {
  switch ((raw ?? 'any').trim().toLowerCase()) {
    case 'day':
    case 'today':
    case '24h':
      return 'day';
    case 'week':
    case '7d':
      return 'week';
    case 'month':
    case '30d':
      return 'month';
    default:
      return 'any';
  }
}

export function detectRecencyFromMessage(message: string): Recency {
  const lower = message.toLowerCase();
  const has = (...markers: string[]) => markers.some((m) => lower.includes(m));

  if (has('today', 'breaking', 'right now', 'just happened')) return 'day';
  if (has('most recent', 'most recently', 'past few hours', 'last few hours', 'latest')) return 'day';
  if (has('this week', 'past week', 'last week', 'last few days')) return 'week';
  if (has('this month', 'past month', 'recently')) return 'month';
  // news default: today's news
  return 'day';
}

function hasExplicitRecencyMarker(message: string): boolean {
  const lower = message.toLowerCase();
  return [
    'last week', 'this week', 'past week',
    'last month', 'this month', 'past month',
    'today', 'yesterday', 'right now',
  ].some((m) => lower.includes(m));
}

export function looksLikeGenericHeadlineRequest(message: string): boolean {
  const lower = message.toLowerCase();
  const headlineIntent = [
    'headline', 'breaking news', 'latest news', "what's happening", 'whats happening', 'news update',
  ].some((m) => lower.includes(m));
  if (!headlineIntent) return false;
  return !lower.includes('about ') && !lower.includes(' on ') && !lower.includes(' regarding ');
}

export function sanitizeConstructedQuery(query: string): string {
  let cleaned = query.trim();
  if (!cleaned) return '';

  cleaned = cleaned.replace(CONVERSATION_PREFIX, '');
  for (let i = 0; i < 3; i++) {
    const next = cleaned.replace(STRIP_LEAD, '').trim();
    if (next === cleaned) break;
    cleaned = next;
  }

  const requestIdx = cleaned.toLowerCase().indexOf(' can you ');
  if (requestIdx >= 0) cleaned = cleaned.slice(requestIdx + ' can you '.length);

  cleaned = trimChars(cleaned.trim(), `-:;,.?!"'`);
  return collapseWhitespace(cleaned);
}

function cleanTopicCandidate(text: string): string {
  let cleaned = text.replace(LEADING_FILLER, '').trim();
  cleaned = cleaned.replace(LEADING_REQUEST_VERB, '').trim();
  cleaned = cleaned.replace(STRIP_LEAD, '').trim();
  cleaned = trimEndChars(cleaned, '?.!,');
  cleaned = cleaned.replace(TAIL_POLITE, '').trim();
  return trimEndChars(cleaned, '?.!,');
}

/** Keeps the request segment of "wassup? can you pull up X". */
function stripPrefaceBeforeRequest(message: string): string {
  const lowered = message.toLowerCase();
  for (const marker of PREFACE_MARKERS) {
    const idx = lowered.indexOf(marker);
    if (idx >= 0) return message.slice(idx + marker.length).trim();
  }
  return message;
}

/** "the Rexburg flood, can you check on the news there" -> "the Rexburg flood" */
function extractTopicBeforeRequest(message: string): string | null {
  const lowered = message.toLowerCase();
  const indices = PREFACE_MARKERS.map((m) => lowered.indexOf(m)).filter((i) => i >= 0);
  if (indices.length === 0) return null;

  const idx = Math.min(...indices);
  if (idx <= 0) return null;
  const cleaned = cleanTopicCandidate(message.slice(0, idx).trim());
  return cleaned.length >= 3 ? cleaned : null;
}

function looksLikeGenericTopic(text: string): boolean {
  const tokens = tokenize(text);
  if (tokens.length === 0) return true;
  const generic = tokens.filter((t) => GENERIC_TOPIC_TOKENS.has(t)).length;
  return generic >= tokens.length - 1;
}

export function extractTopicFromMessage(message: string): string | null {
  const normalized = collapseWhitespace(message);
  if (!normalized) return null;

  const prefixTopic = extractTopicBeforeRequest(normalized);
  let cleaned = cleanTopicCandidate(stripPrefaceBeforeRequest(normalized));
  if (looksLikeGenericTopic(cleaned) && prefixTopic) cleaned = prefixTopic;

  return cleaned.length >= 3 ? cleaned : null;
}

/** Every query token must be in the pool; at most one stranger is tolerated. */
export function validateQuery(query: string, message: string, entity: ResolvedEntity | null): boolean {
  if (query.trim().length < MIN_QUERY_LENGTH || query.length > MAX_QUERY_LENGTH) return false;

  const allowed = new Set(GLUE_WORDS);
  for (const t of tokenize(message)) allowed.add(t);
  if (entity) {
    for (const t of tokenize(entity.canonicalName)) allowed.add(t);
    for (const t of tokenize(entity.disambiguation)) allowed.add(t);
  }

  const unknown = tokenize(query).filter((t) => !allowed.has(t)).length;
  return unknown <= 1;
}

function normalizeNewsQuery(
  mode: SearchMode,
  query: string,
  message: string,
  entity: ResolvedEntity | null,
): string {
  if (mode !== 'NewsAggregate') return query;

  const cleaned = collapseWhitespace(query);
  if (!cleaned) return 'top headlines';

  const substantive = tokenize(cleaned).filter(
    (t) => !GENERIC_NEWS_TOKENS.has(t) && !CONVERSATIONAL_NOISE.has(t),
  );
  if (substantive.length === 0) return 'top headlines';
  if (!entity && looksLikeGenericHeadlineRequest(message) && substantive.length <= 2) return 'top headlines';
  return cleaned;
}

/** Message markers beat the model; market quotes always use their preferred window. */
export function resolveRecency(mode: SearchMode, message: string, modelRecency: string | null | undefined): Recency {
  if (isMarketQuoteRequest(message)) return preferredQuoteRecency(message);

  const inferred = detectRecencyFromMessage(message);
  if (hasExplicitRecencyMarker(message)) return inferred;
  if (mode === 'NewsAggregate' && !modelRecency?.trim()) return inferred;
  return normalizeRecency(modelRecency);
}

function marketQuoteFallbackQuery(message: string): string {
  const canonical = extractCanonicalInstrument(message);
  let instrument = canonical ?? (message.trim() || 'Dow Jones');
  if (instrument.length > 30) instrument = instrument.slice(0, 30).trim();
  return `${instrument} market update today`;
}

export function buildFallbackQuery(
  mode: SearchMode,
  message: string,
  entity: ResolvedEntity | null,
  session: SearchSession,
): SearchQuery {
  let topic = entity?.canonicalName ?? extractTopicFromMessage(message) ?? session.lastQuery ?? message.trim();
  if (topic.length > MAX_FALLBACK_TOPIC) topic = topic.slice(0, MAX_FALLBACK_TOPIC).trim();

  if (mode === 'NewsAggregate') {
    const query = entity
      ? `${entity.canonicalName} latest news`
      : looksLikeGenericHeadlineRequest(message)
        ? 'top headlines'
        : `${topic} news latest`;
    return { query, recency: detectRecencyFromMessage(message), usedFallback: true };
  }

  if (mode === 'WebFactFind') {
    if (isMarketQuoteRequest(message)) {
      return {
        query: marketQuoteFallbackQuery(message),
        recency: preferredQuoteRecency(message),
        usedFallback: true,
      };
    }
    return {
      query: entity ? `${entity.canonicalName} overview` : topic,
      recency: 'any',
      usedFallback: true,
    };
  }

  return { query: topic, recency: 'any', usedFallback: true };
}

// ==================================================================
// Model construction
// ==================================================================

function modeInstruction(mode: SearchMode, message: string): string {
  if (mode === 'NewsAggregate') {
    return (
      'Mode: NEWS. Build a query that finds recent news articles. ' +
      'Add a time word (latest, today, this week) when it helps. ' +
      'The query should surface news coverage, not encyclopedia pages.'
    );
  }
  if (mode === 'WebFactFind' && isMarketQuoteRequest(message)) {
    return (
      'Mode: MARKET_QUOTE. Build a query for current market quote coverage: ' +
      "today's index level, point move and percent move. " +
      'Favour live market updates from major financial outlets.'
    );
  }
  if (mode === 'WebFactFind') {
    return (
      'Mode: FACTFIND. Build a query that finds stable, encyclopedic facts ' +
      '(reference sites such as Wikipedia). Use the canonical entity name when one is given.'
    );
  }
  return 'Build a short, effective search query.';
}

function buildConstructionPrompt(
  mode: SearchMode,
  message: string,
  entity: ResolvedEntity | null,
  session: SearchSession,
  history: readonly ChatMessage[],
): string {
  const entityContext = entity
    ? `\nResolved entity: "${entity.canonicalName}" (${entity.type}, ${entity.disambiguation})`
    : '';
  const sessionContext = session.lastQuery
    ? `\nPrevious query: "${session.lastQuery}" (recency: ${session.lastRecency ?? 'any'})`
    : '';

  // user turns only; tool output in the prompt drags the query off topic
  const recentUser = history.filter((m) => m.role === 'user').slice(-3).map((m) => m.content);
  const historyContext =
    recentUser.length > 1
      ? `\nRecent user messages:\n${recentUser.map((m) => `  - ${truncate(m, 80)}`).join('\n')}`
      : '';

  return (
    'You build search queries. Given a user message and some context, write one effective search query.\n\n' +
    modeInstruction(mode, message) +
    entityContext +
    sessionContext +
    historyContext +
    '\n\nReply with a JSON object only:\n' +
    '  { "query": "your search query", "recency": "day|week|month|any" }\n\n' +
    'Rules:\n' +
    '- The query is 6 to 80 characters long\n' +
    "- Use only words from the user's message, the entity name or common search terms\n" +
    '- Never invent names or facts\n' +
    '- No URLs or domains\n' +
    '- JSON only, no commentary.'
  );
}

export interface QueryBuilderDeps {
  llm: LlmClient;
  audit: AuditSink;
}

interface ModelQuery {
  query: string;
  recency: string | null;
}

export class QueryBuilder {
  constructor(private readonly deps: QueryBuilderDeps) {}

  async build(
    mode: SearchMode,
    message: string,
    entity: ResolvedEntity | null,
    session: SearchSession,
    history: readonly ChatMessage[],
    signal?: AbortSignal,
  ): Promise<SearchQuery> {
    const proposal = await this.construct(mode, message, entity, session, history, signal);

    if (proposal) {
      const sanitized = normalizeNewsQuery(mode, sanitizeConstructedQuery(proposal.query), message, entity);
      const recency = resolveRecency(mode, message, proposal.recency);

      if (validateQuery(sanitized, message, entity)) {
        if (sanitized !== proposal.query) {
          safeAppend(this.deps.audit, {
            action: 'QUERY_SANITIZED',
            result: `"${proposal.query}" -> "${sanitized}"`,
          });
        }
        safeAppend(this.deps.audit, { action: 'QUERY_BUILT', result: `"${sanitized}" (recency=${recency})` });
        return { query: sanitized, recency, usedFallback: false };
      }

      logger.info('query:rejected', { proposed: proposal.query, sanitized });
      safeAppend(this.deps.audit, {
        action: 'QUERY_REJECTED',
        result: `model query "${proposal.query}" failed validation, using fallback`,
        details: { rejected_query: proposal.query, reason: 'token_validation_failed' },
      });
    }

    const fallback = buildFallbackQuery(mode, message, entity, session);
    safeAppend(this.deps.audit, {
      action: 'QUERY_FALLBACK',
      result: `"${fallback.query}" (recency=${fallback.recency})`,
    });
    return fallback;
  }

  private async construct(
    mode: SearchMode,
    message: string,
    entity: ResolvedEntity | null,
    session: SearchSession,
    history: readonly ChatMessage[],
    signal?: AbortSignal,
  ): Promise<ModelQuery | null> {
    const prompt = buildConstructionPrompt(mode, message, entity, session, history);

    let content: string;
    try {
      const res = await this.deps.llm.chat([systemMessage(prompt), userMessage(message)], {
        maxTokens: 96,
        signal,
      });
      content = res.content;
    } catch (err) {
      if (isAbortError(err)) throw err;
      logger.warn('query:construction_failed', { error: err instanceof Error ? err.message : String(err) });
      return null;
    }

    const parsed = parseModelJson(content, modelQuerySchema, 'query-builder');
    if (!parsed.ok) return null;

    const query = parsed.data.query?.trim();
    if (!query) return null;
    return { query, recency: parsed.data.recency ?? null };
  }
}
