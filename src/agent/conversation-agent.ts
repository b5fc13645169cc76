// src/agent/conversation-agent.ts: one user turn: utilities first, then the search pipeline

import type { AuditSink } from '@/audit/audit-sink';
import { safeAppend } from '@/audit/audit-sink';
import type { SearchTuning } from '@/config/app.config';
import { DEFAULT_SEARCH_TUNING } from '@/config/app.config';
import type { ToolClient } from '@/mcp/tool-client';
import type { ChatMessage, LlmClient } from '@/services/llm-client';
import { assistantMessage, systemMessage, userMessage } from '@/services/llm-client';
import type { LlmRetryOptions } from '@/services/llm-retry';
import { logger } from '@/services/logger';
import { SearchOrchestrator } from '@/search/search-orchestrator';
import type { AgentResponse, LookupModeHint, ToolCallRecord } from '@/search/types';
import { throwIfAborted } from '@/utils/abort';
import { UtilityIntentHandler } from '@/utility/utility-intent-handler';
import type { ConversationStore } from '@/agent/conversation-store';

export const DEFAULT_HISTORY_TURNS = 10;

export interface ConversationAgentDeps {
  llm: LlmClient;
  tools: ToolClient;
  audit: AuditSink;
  store: ConversationStore;
  systemPrompt: string;
  tuning?: SearchTuning;
  retry?: LlmRetryOptions;
  historyTurns?: number;
  now?: () => Date;
}

export interface TurnRequest {
  conversationId: string;
  message: string;
  modeHint?: LookupModeHint;
  signal?: AbortSignal;
}

export class ConversationAgent {
  private readonly utilities: UtilityIntentHandler;
  private readonly search: SearchOrchestrator;
  private readonly historyTurns: number;

  constructor(private readonly deps: ConversationAgentDeps) {
    const now = deps.now ?? (() => new Date());
    this.historyTurns = deps.historyTurns ?? DEFAULT_HISTORY_TURNS;
    this.utilities = new UtilityIntentHandler({ tools: deps.tools, audit: deps.audit, now });
    this.search = new SearchOrchestrator({
      llm: deps.llm,
      tools: deps.tools,
      audit: deps.audit,
      systemPrompt: deps.systemPrompt,
      tuning: deps.tuning ?? DEFAULT_SEARCH_TUNING,
      retry: deps.retry,
      now,
    });
  }

  /** Turns on the same conversation run one at a time. */
  handleTurn(request: TurnRequest): Promise<AgentResponse> {
    return this.deps.store.runExclusive(request.conversationId, () => this.runTurn(request));
  }

  reset(conversationId: string): boolean {
    safeAppend(this.deps.audit, { action: 'CONVERSATION_RESET', result: conversationId });
    return this.deps.store.reset(conversationId);
  }

  private async runTurn({ conversationId, message, modeHint, signal }: TurnRequest): Promise<AgentResponse> {
    throwIfAborted(signal);
    const conversation = this.deps.store.getOrCreate(conversationId);
    const toolCalls: ToolCallRecord[] = [];
    const started = Date.now();

    const utility = await this.utilities.tryHandle(message, toolCalls, signal);
    if (utility) {
      this.remember(conversation.history, message, utility.text);
      logger.info('agent:turn', { conversationId, route: 'utility', ms: Date.now() - started });
      return utility;
    }

    const history: ChatMessage[] = [
      systemMessage(this.deps.systemPrompt),
      ...this.window(conversation.history),
      userMessage(message),
    ];

    const response = await this.search.execute({
      message,
      history,
      session: conversation.session,
      toolCalls,
      modeHint,
      signal,
    });

    this.remember(conversation.history, message, response.text);
    logger.info('agent:turn', {
      conversationId,
      route: 'search',
      success: response.success,
      toolCalls: response.toolCallsMade.length,
      ms: Date.now() - started,
    });
    return response;
  }

  private window(history: readonly ChatMessage[]): ChatMessage[] {
    const max = this.historyTurns * 2;
    return history.length > max ? history.slice(history.length - max) : [...history];
  }

  private remember(history: ChatMessage[], message: string, reply: string): void {
    history.push(userMessage(message), assistantMessage(reply));
    const max = this.historyTurns * 2;
    if (history.length > max) history.splice(0, history.length - max);
  }
}
