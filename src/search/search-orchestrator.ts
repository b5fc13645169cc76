// src/search/search-orchestrator.ts: mode-based search pipeline
//
//   NewsAggregate : entity -> query -> web_search -> cluster -> summarize
//   WebFactFind   : entity -> query -> web_search -> top 2 articles -> summarize
//   FollowUp      : DeepDive (one stored source) | MoreSources (primary + related coverage)
//
// One summarization call per turn. Abort always propagates; every other
// failure becomes a user-facing reply.

import type { AuditSink } from '@/audit/audit-sink';
import { safeAppend } from '@/audit/audit-sink';
import { DEFAULT_SEARCH_TUNING } from '@/config/app.config';
import type { SearchTuning } from '@/config/app.config';
import type { ToolClient } from '@/mcp/tool-client';
import { TOOL_NAMES, callToolWithAlias } from '@/mcp/tool-alias';
import type { ChatMessage, LlmClient } from '@/services/llm-client';
import { systemMessage, userMessage } from '@/services/llm-client';
import { chatWithRetry } from '@/services/llm-retry';
import type { LlmRetryOptions } from '@/services/llm-retry';
import { logger } from '@/services/logger';
import { EntityResolver } from '@/search/entity-resolver';
import { isMarketQuoteRequest } from '@/search/market-quote-heuristics';
import { QueryBuilder } from '@/search/query-builder';
import {
  EMPTY_SUMMARY_REPLY,
  buildExtractiveFallback,
  stripTemplateTokens,
  trimDanglingIncompleteEnding,
} from '@/search/response-cleanup';
import { classify, classifyFollowUpBranch } from '@/search/search-mode-router';
import type { SearchSession } from '@/search/search-session';
import { isLowSignalContent, parseSourcesFromToolResult, stripSourcesJson } from '@/search/source-parsing';
import { clusterStories } from '@/search/story-clustering';
import { agentErrorResponse, agentResponse } from '@/search/types';
import type {
  AgentResponse,
  LookupModeHint,
  Recency,
  SearchMode,
  SourceItem,
  ToolCallRecord,
} from '@/search/types';
import { isAbortError, truncate } from '@/utils/abort';

// ==========================================================================
// Constants
// ==========================================================================

const SEARCH_MAX_RESULTS = 5;
const MAX_ARTICLES_TO_FETCH = 2;
const MAX_ARTICLE_CHARS = 3000;
const SUMMARY_MAX_TOKENS = 768;
const MORE_SOURCES_QUERY_MAX = 80;

const RESULTS_HEADER = '[Search results — reference only, do not display to user]\n';
const ARTICLES_HEADER = '\n[Full article content — reference only, do not display to user]\n';
const PRIMARY_HEADER = '[Primary article content — reference only, do not display to user]\n';
const RELATED_HEADER = '[Related coverage search results — reference only, do not display to user]\n';

const SWALLOW_REPLY = 'What do you mean - an African or a European swallow?';
const SEARCH_EMPTY_REPLY = 'Search returned no results.';

const SELECTION_STOPWORDS = new Set([
  'tell', 'more', 'about', 'info', 'information', 'detail', 'details', 'what', 'that', 'this',
  'please', 'could', 'would', 'want', 'need', 'know', 'give', 'show', 'find', 'search', 'look', 'pull',
]);

// ==========================================================================
// Summary instructions
// ==========================================================================

export const SUMMARY_INSTRUCTIONS = {
  news:
    'Write a short news briefing from the search results above. Group reports about the same story, ' +
    'note where outlets agree or differ, and lead with the most widely covered development. ' +
    'Use only facts from the results. Do not include URLs or a source list.',
  factFind:
    'Answer the question using the search results and article content above. Put the direct answer ' +
    'in the first sentence, then add only the supporting detail that matters. ' +
    'Use only facts from the provided material. Do not include URLs.',
  deepDive:
    'Explain the article above in more depth for the user. Rely only on the provided article content; ' +
    'if a detail the user asked about is not in it, say that the article does not cover it. Do not include URLs.',
  moreSources:
    'Compare the primary article with the related coverage above. Point out what other outlets add, ' +
    'separate what is confirmed from what is only reported or alleged, and keep it brief. Do not include URLs.',
  financeQuote:
    'Report the market quote in one sentence: the instrument, its level, the change in points or percent, ' +
    'and the time the figure is "as of". If the results do not let you verify a current figure, say so plainly. ' +
    'Do not include URLs.',
} as const;

// ==========================================================================
// Helpers (exported for tests)
// ==========================================================================

export function isSwallowQuestion(message: string): boolean {
  const lower = message.toLowerCase();
  return (
    lower.includes('airspeed velocity of an unladen swallow') ||
    lower.includes('air speed velocity of an unladen swallow')
  );
}

export function selectionKeywords(message: string): string[] {
  return message
    .toLowerCase()
    .split(/[ ,.?!:;]+/)
    .filter((w) => w.length > 3 && !SELECTION_STOPWORDS.has(w))
    .slice(0, 6);
}

/** Explicit selection, then best keyword match, then the primary, then the first result. */
export function selectSource(message: string, session: SearchSession): SourceItem | undefined {
  const selected = session.findSource(session.selectedSourceId);
  if (selected) return selected;

  const keywords = selectionKeywords(message);
  if (keywords.length > 0) {
    let best: SourceItem | undefined;
    let bestScore = 0;
    for (const source of session.lastResults) {
      const haystack = `${source.title} ${source.snippet}`.toLowerCase();
      const score = keywords.filter((k) => haystack.includes(k)).length;
      if (score > bestScore) {
        bestScore = score;
        best = source;
      }
    }
    if (best) return best;
  }

  return session.findSource(session.primarySourceId) ?? session.lastResults[0];
}

/** Appends the turn instruction to every system message, or adds one when there is none. */
export function injectInstruction(
  history: readonly ChatMessage[],
  systemPrompt: string,
  instruction: string,
): ChatMessage[] {
  const messages = history.map((m) =>
    m.role === 'system' ? systemMessage(`${m.content}\n\n${instruction}`) : { ...m },
  );
  if (messages.length === 0 || messages[0].role !== 'system') {
    messages.unshift(systemMessage(`${systemPrompt}\n\n${instruction}`));
  }
  return messages;
}

function truncateArticle(content: string): string {
  return content.length > MAX_ARTICLE_CHARS ? `${content.slice(0, MAX_ARTICLE_CHARS)}\n[…truncated]` : content;
}

function newestPublishedAt(sources: readonly SourceItem[]): Date | null {
  let newest: Date | null = null;
  for (const s of sources) {
    if (s.publishedAt && (!newest || s.publishedAt.getTime() > newest.getTime())) newest = s.publishedAt;
  }
  return newest;
}

// ==========================================================================
// Orchestrator
// ==========================================================================

export interface SearchOrchestratorDeps {
  llm: LlmClient;
  tools: ToolClient;
  audit: AuditSink;
  systemPrompt: string;
  tuning?: SearchTuning;
  retry?: LlmRetryOptions;
  now?: () => Date;
}

export interface SearchRequest {
  message: string;
  history: readonly ChatMessage[];
  session: SearchSession;
  toolCalls: ToolCallRecord[];
  modeHint?: LookupModeHint;
  signal?: AbortSignal;
}

interface TurnContext extends SearchRequest {
  mode: SearchMode;
}

export class SearchOrchestrator {
  private readonly entityResolver: EntityResolver;
  private readonly queryBuilder: QueryBuilder;
  private readonly tuning: SearchTuning;
  private readonly now: () => Date;

  constructor(private readonly deps: SearchOrchestratorDeps) {
    this.entityResolver = new EntityResolver({ llm: deps.llm, tools: deps.tools, audit: deps.audit });
    this.queryBuilder = new QueryBuilder({ llm: deps.llm, audit: deps.audit });
    this.tuning = deps.tuning ?? DEFAULT_SEARCH_TUNING;
    this.now = deps.now ?? (() => new Date());
  }

  resolveMode(message: string, session: SearchSession, modeHint: LookupModeHint = 'auto'): SearchMode {
    if (modeHint === 'fact') return 'WebFactFind';
    if (modeHint === 'news') return 'NewsAggregate';
    return classify(message, session, this.now());
  }

  async execute(request: SearchRequest): Promise<AgentResponse> {
    const modeHint = request.modeHint ?? 'auto';
    const mode = this.resolveMode(request.message, request.session, modeHint);

    safeAppend(this.deps.audit, {
      action: 'SEARCH_MODE_CLASSIFIED',
      result: mode,
      details: {
        user_message: truncate(request.message, 80),
        has_prior_results: request.session.hasRecentResults(this.now()),
        mode_hint: modeHint,
        hint_forced_mode: modeHint !== 'auto',
      },
    });
    logger.info('search:mode', { mode, modeHint });

    const ctx: TurnContext = { ...request, mode };
    let response: AgentResponse;
    try {
      switch (mode) {
        case 'NewsAggregate':
          response = await this.executeNews(ctx);
          break;
        case 'FollowUp':
          response = await this.executeFollowUp(ctx);
          break;
        default:
          response = await this.executeFactFind(ctx);
      }
    } catch (err) {
      if (isAbortError(err)) throw err;
      const name = err instanceof Error ? err.name : 'Error';
      logger.error('search:pipeline_error', { mode, error: err instanceof Error ? err.message : String(err) });
      safeAppend(this.deps.audit, { action: 'SEARCH_PIPELINE_ERROR', result: name });
      return agentErrorResponse(
        `Something went sideways with the search pipeline — try rephrasing? (${name})`,
        request.toolCalls,
      );
    }

    return applyResponseContract(mode, response);
  }

  // ------------------------------------------------------------------------
  // NewsAggregate
  // ------------------------------------------------------------------------

  private async executeNews(ctx: TurnContext): Promise<AgentResponse> {
    const { message, session, toolCalls, signal } = ctx;

    const entity = await this.entityResolver.resolve(message, session, toolCalls, signal);
    const { query, recency } = await this.queryBuilder.build('NewsAggregate', message, entity, session, ctx.history, signal);

    const result = await this.callWebSearch(query, recency, toolCalls, signal);
    if (!result.trim()) return agentErrorResponse(SEARCH_EMPTY_REPLY, toolCalls);

    const sources = parseSourcesFromToolResult(result);
    const refusal = this.checkQuoteFreshness(message, query, sources, toolCalls);
    if (refusal) return refusal;

    const clusters = clusterStories(sources, this.tuning.clusterSimilarityThreshold);
    session.recordSearchResults('NewsAggregate', query, recency, sources, this.now());
    session.lastClusters = clusters;
    // the largest story is the default target for "tell me more"
    const lead = clusters[0]?.sources[0];
    if (lead) session.primarySourceId = lead.sourceId;

    const quote = isMarketQuoteRequest(message) || isMarketQuoteRequest(query);
    const input = RESULTS_HEADER + stripSourcesJson(result);
    return this.summarize(ctx, input, quote ? SUMMARY_INSTRUCTIONS.financeQuote : SUMMARY_INSTRUCTIONS.news);
  }

  // ------------------------------------------------------------------------
  // WebFactFind
  // ------------------------------------------------------------------------

  private async executeFactFind(ctx: TurnContext): Promise<AgentResponse> {
    const { message, session, toolCalls, signal } = ctx;

    if (isSwallowQuestion(message)) {
      return agentResponse(SWALLOW_REPLY, toolCalls);
    }

    const entity = await this.entityResolver.resolve(message, session, toolCalls, signal);
    const { query, recency } = await this.queryBuilder.build('WebFactFind', message, entity, session, ctx.history, signal);

    const result = await this.callWebSearch(query, recency, toolCalls, signal);
    if (!result.trim()) return agentErrorResponse(SEARCH_EMPTY_REPLY, toolCalls);

    const sources = parseSourcesFromToolResult(result);
    const refusal = this.checkQuoteFreshness(message, query, sources, toolCalls);
    if (refusal) return refusal;

    session.recordSearchResults('WebFactFind', query, recency, sources, this.now());

    const articles = await this.fetchArticles(sources.slice(0, MAX_ARTICLES_TO_FETCH), toolCalls, signal);

    let input = RESULTS_HEADER + stripSourcesJson(result);
    if (articles) input += ARTICLES_HEADER + articles;

    const quote = isMarketQuoteRequest(message) || isMarketQuoteRequest(query);
    return this.summarize(ctx, input, quote ? SUMMARY_INSTRUCTIONS.financeQuote : SUMMARY_INSTRUCTIONS.factFind);
  }

  // ------------------------------------------------------------------------
  // FollowUp
  // ------------------------------------------------------------------------

  private async executeFollowUp(ctx: TurnContext): Promise<AgentResponse> {
    const branch = classifyFollowUpBranch(ctx.message);
    safeAppend(this.deps.audit, { action: 'FOLLOWUP_BRANCH', result: branch });

    return branch === 'MoreSources' ? this.executeMoreSources(ctx) : this.executeDeepDive(ctx);
  }

  private async executeDeepDive(ctx: TurnContext): Promise<AgentResponse> {
    const { message, session, toolCalls, signal } = ctx;

    const source = selectSource(message, session);
    if (!source) {
      safeAppend(this.deps.audit, { action: 'FOLLOWUP_NO_SOURCE', result: 'falling back to fact find' });
      return this.executeFactFind(ctx);
    }

    safeAppend(this.deps.audit, {
      action: 'FOLLOWUP_DEEPDIVE_SOURCE',
      result: source.title,
      details: { url: source.url, source_id: source.sourceId },
    });

    const content = await this.fetchArticles([source], toolCalls, signal);
    if (!content) return this.executeFactFind(ctx);

    return this.summarize(ctx, PRIMARY_HEADER + content, SUMMARY_INSTRUCTIONS.deepDive);
  }

  private async executeMoreSources(ctx: TurnContext): Promise<AgentResponse> {
    const { message, session, toolCalls, signal } = ctx;

    const primary = selectSource(message, session);
    const topic = primary?.title || session.lastQuery || message;
    const entityName = session.lastEntityCanonical ?? '';
    const query = truncate(`${topic} ${entityName}`, MORE_SOURCES_QUERY_MAX).trim();
    const recency: Recency = session.lastRecency ?? 'any';

    const primaryContent = primary ? await this.fetchArticles([primary], toolCalls, signal) : null;

    const result = await this.callWebSearch(query, recency, toolCalls, signal);
    if (result.trim()) {
      session.appendResults(parseSourcesFromToolResult(result), this.now());
    }

    let input = '';
    if (primaryContent) input += `${PRIMARY_HEADER}${primaryContent}\n\n`;
    if (result.trim()) input += RELATED_HEADER + stripSourcesJson(result);

    const instruction = primaryContent ? SUMMARY_INSTRUCTIONS.moreSources : SUMMARY_INSTRUCTIONS.news;
    return this.summarize(ctx, input, instruction);
  }

  // ------------------------------------------------------------------------
  // Tools
  // ------------------------------------------------------------------------

  private async callWebSearch(
    query: string,
    recency: Recency,
    toolCalls: ToolCallRecord[],
    signal?: AbortSignal,
  ): Promise<string> {
    const args = JSON.stringify({ query, maxResults: SEARCH_MAX_RESULTS, recency });
    const call = await callToolWithAlias(this.deps.tools, TOOL_NAMES.webSearch, args, signal);

    if (!call.success) {
      logger.warn('search:web_search_failed', { query, error: call.result });
      const failure = `Tool error: ${call.result.replace(/^Error: /, '')}`;
      toolCalls.push({ toolName: call.toolName, arguments: args, result: failure, success: false });
      return '';
    }

    toolCalls.push({ toolName: call.toolName, arguments: args, result: call.result, success: true });
    return call.result;
  }

  /** Fetches sources concurrently; failures and low-signal pages are skipped. */
  private async fetchArticles(
    sources: readonly SourceItem[],
    toolCalls: ToolCallRecord[],
    signal?: AbortSignal,
  ): Promise<string | null> {
    const fetched = await Promise.all(
      sources.map(async (source) => {
        const args = JSON.stringify({ url: source.url });
        const call = await callToolWithAlias(this.deps.tools, TOOL_NAMES.browserNavigate, args, signal);
        return { source, args, call };
      }),
    );

    let combined = '';
    for (const { source, args, call } of fetched) {
      if (!call.success) {
        toolCalls.push({ toolName: call.toolName, arguments: args, result: call.result, success: false });
        continue;
      }
      toolCalls.push({ toolName: call.toolName, arguments: args, result: truncate(call.result, 200), success: true });

      if (isLowSignalContent(call.result)) {
        logger.debug('search:article_low_signal', { url: source.url });
        continue;
      }
      combined += `=== ${source.title} ===\n${truncateArticle(call.result)}\n\n`;
    }

    const trimmed = combined.trimEnd();
    return trimmed || null;
  }

  // ------------------------------------------------------------------------
  // Freshness guard
  // ------------------------------------------------------------------------

  private checkQuoteFreshness(
    message: string,
    query: string,
    sources: readonly SourceItem[],
    toolCalls: ToolCallRecord[],
  ): AgentResponse | null {
    if (!isMarketQuoteRequest(message) && !isMarketQuoteRequest(query)) return null;

    const newest = newestPublishedAt(sources);
    if (!newest) {
      safeAppend(this.deps.audit, { action: 'FINANCE_QUOTE_FRESHNESS_UNKNOWN', result: 'no timestamps on sources' });
      return null;
    }

    const ageMs = this.now().getTime() - newest.getTime();
    const ageHours = Math.round((ageMs / 3_600_000) * 10) / 10;
    if (ageMs > this.tuning.quoteFreshnessMaxAgeMs) {
      safeAppend(this.deps.audit, {
        action: 'FINANCE_QUOTE_FRESHNESS_FAIL',
        result: `${ageHours}h old`,
        details: { newest: newest.toISOString() },
      });
      return agentResponse(
        `I cannot safely report a current market quote because the newest source is about ${ageHours} hours old. ` +
          'Ask me to refresh for a live update.',
        [...toolCalls],
      );
    }

    safeAppend(this.deps.audit, { action: 'FINANCE_QUOTE_FRESHNESS_OK', result: `${ageHours}h old` });
    return null;
  }

  // ------------------------------------------------------------------------
  // Summarization
  // ------------------------------------------------------------------------

  private async summarize(ctx: TurnContext, input: string, instruction: string): Promise<AgentResponse> {
    const { signal, toolCalls } = ctx;
    const messages = injectInstruction(ctx.history, this.deps.systemPrompt, instruction);
    messages.push(userMessage(input));

    const options = { maxTokens: SUMMARY_MAX_TOKENS, signal };
    let text: string;
    try {
      const res = await chatWithRetry(this.deps.llm, messages, options, this.deps.retry);
      text = res.finishReason === 'error' || !res.content.trim() ? buildExtractiveFallback(input) : res.content;
    } catch (err) {
      if (isAbortError(err)) throw err;
      logger.warn('search:summary_failed', { error: err instanceof Error ? err.message : String(err) });
      text = await this.summarizeMinimal(input, instruction, signal);
    }

    const cleaned = trimDanglingIncompleteEnding(stripTemplateTokens(text));
    return agentResponse(cleaned.trim() ? cleaned : EMPTY_SUMMARY_REPLY, toolCalls, { llmRoundTrips: 1 });
  }

  private async summarizeMinimal(input: string, instruction: string, signal?: AbortSignal): Promise<string> {
    try {
      const res = await this.deps.llm.chat(
        [systemMessage(`${this.deps.systemPrompt} ${instruction}`), userMessage(input)],
        { maxTokens: SUMMARY_MAX_TOKENS, signal },
      );
      return res.content.trim() ? res.content : buildExtractiveFallback(input);
    } catch (err) {
      if (isAbortError(err)) throw err;
      logger.warn('search:summary_minimal_failed', { error: err instanceof Error ? err.message : String(err) });
      return buildExtractiveFallback(input);
    }
  }
}

/** Fact answers hide source cards and tool chips; news shows both. */
export function applyResponseContract(mode: SearchMode, response: AgentResponse): AgentResponse {
  switch (mode) {
    case 'WebFactFind':
      return { ...response, suppressSourceCardsUi: true, suppressToolActivityUi: true };
    case 'NewsAggregate':
      return { ...response, suppressSourceCardsUi: false, suppressToolActivityUi: false };
    default:
      return response;
  }
}
