/**
 * Utility intent handler: answers the turn without the search pipeline when
 * the deterministic engine or the utility router recognizes it.
 *
 * Returns null to let the caller fall through to search.
 */
import type { AuditSink } from '@/audit/audit-sink';
import { safeAppend } from '@/audit/audit-sink';
import type { ToolClient } from '@/mcp/tool-client';
import { tryMatch } from '@/search/deterministic-utility-engine';
import { agentResponse } from '@/search/types';
import type { AgentResponse, ToolCallRecord, UtilityResult } from '@/search/types';
import { tryHandle as routeUtility } from '@/search/utility-router';
import { UtilityExecutors } from '@/utility/utility-executors';
import { buildInlineResponse, shouldSuppressUiArtifacts } from '@/utility/utility-responses';

export interface UtilityIntentHandlerDeps {
  tools: ToolClient;
  audit: AuditSink;
  now?: () => Date;
}

export class UtilityIntentHandler {
  private readonly executors: UtilityExecutors;
  private readonly now: () => Date;

  constructor(private readonly deps: UtilityIntentHandlerDeps) {
    this.now = deps.now ?? (() => new Date());
    this.executors = new UtilityExecutors({ tools: deps.tools, audit: deps.audit, now: this.now });
  }

  /** Deterministic engine first, then the pattern router. */
  resolve(message: string): UtilityResult | null {
    const match = tryMatch(message);
    if (match) {
      safeAppend(this.deps.audit, {
        action: 'DETERMINISTIC_INLINE_ROUTE',
        result: `confidence=${match.confidence}, category=${match.result.category}`,
      });
      return { category: match.result.category, answer: match.result.answer };
    }
    return routeUtility(message, this.now());
  }

  async tryHandle(message: string, toolCalls: ToolCallRecord[], signal?: AbortSignal): Promise<AgentResponse | null> {
    const utility = this.resolve(message);
    if (!utility) return null;

    safeAppend(this.deps.audit, { action: 'UTILITY_BYPASS', result: `category=${utility.category}` });

    switch (utility.category.toLowerCase()) {
      case 'weather':
        return this.executors.weather(message, utility, toolCalls, signal);
      case 'time':
        return this.executors.time(message, utility, toolCalls, signal);
      case 'holiday':
        return this.executors.holiday(utility, toolCalls, signal);
      case 'feed':
        return this.executors.feed(utility, toolCalls, signal);
      case 'status':
        return this.executors.status(utility, toolCalls, signal);
    }

    // The router only emits tool calls for the categories above; any other
    // tool-carrying result runs as-is and the turn continues into search.
    if (utility.toolName && utility.toolArgs) {
      await this.executors.generic(utility, toolCalls, signal);
      return null;
    }

    const suppress = shouldSuppressUiArtifacts(utility.category);
    return agentResponse(buildInlineResponse(utility), [...toolCalls], {
      suppressSourceCardsUi: suppress,
      suppressToolActivityUi: suppress,
    });
  }
}
