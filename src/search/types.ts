// src/search/types.ts: shared types for the search and utility pipeline

export type SearchMode = 'NewsAggregate' | 'WebFactFind' | 'FollowUp';
export type FollowUpBranch = 'DeepDive' | 'MoreSources';
export type Recency = 'day' | 'week' | 'month' | 'any';
export type LookupModeHint = 'auto' | 'fact' | 'news';

export type EntityType = 'Person' | 'Org' | 'Place' | 'Topic' | 'unknown';

export interface SourceItem {
  readonly sourceId: string;
  readonly url: string;
  readonly title: string;
  readonly domain: string;
  readonly snippet: string;
  readonly publishedAt?: Date;
  readonly wordCount?: number;
}

export interface StoryCluster {
  representativeTitle: string;
  sources: SourceItem[];
}

export interface ResolvedEntity {
  canonicalName: string;
  type: EntityType;
  disambiguation: string;
}

/** Common currency between the utility router, the deterministic engine and their executors. */
export interface UtilityResult {
  category: string;
  answer: string;
  toolName?: string;
  toolArgs?: string;
}

export interface ToolCallRecord {
  toolName: string;
  arguments: string;
  result: string;
  success: boolean;
}

export interface AgentResponse {
  text: string;
  success: boolean;
  toolCallsMade: ToolCallRecord[];
  llmRoundTrips: number;
  suppressSourceCardsUi: boolean;
  suppressToolActivityUi: boolean;
  error?: string;
}

export function agentResponse(
  text: string,
  toolCallsMade: ToolCallRecord[],
  overrides: Partial<Omit<AgentResponse, 'text' | 'toolCallsMade'>> = {},
): AgentResponse {
  return {
    text,
    success: true,
    toolCallsMade,
    llmRoundTrips: 0,
    suppressSourceCardsUi: false,
    suppressToolActivityUi: false,
    ...overrides,
  };
}

export function agentErrorResponse(
  message: string,
  toolCallsMade: ToolCallRecord[] = [],
): AgentResponse {
  return agentResponse(message, toolCallsMade, { success: false, error: message });
}
