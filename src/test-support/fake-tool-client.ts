// In-process tool server stand-in for tests.

import type { ToolClient } from '@/mcp/tool-client';
import { McpToolError } from '@/mcp/tool-client';
import { TurnAbortedError } from '@/utils/abort';

export type ToolHandler = (args: Record<string, unknown>) => string | Error | Promise<string | Error>;

export interface RecordedToolCall {
  name: string;
  args: Record<string, unknown>;
}

function parseArgs(argsJson: string): Record<string, unknown> {
  const raw: unknown = JSON.parse(argsJson);
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return {};
  return Object.fromEntries(Object.entries(raw));
}

export class FakeToolClient implements ToolClient {
  readonly calls: RecordedToolCall[] = [];
  private readonly handlers = new Map<string, ToolHandler>();

  constructor(handlers: Record<string, ToolHandler> = {}) {
    for (const [name, handler] of Object.entries(handlers)) this.handlers.set(name, handler);
  }

  on(name: string, handler: ToolHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  callsTo(name: string): RecordedToolCall[] {
    return this.calls.filter((c) => c.name === name);
  }

  async callOperation(name: string, argsJson: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw new TurnAbortedError();

    const args = parseArgs(argsJson);
    this.calls.push({ name, args });

    const handler = this.handlers.get(name);
    if (!handler) throw new McpToolError(`Unknown tool: ${name}`, 'UNKNOWN_TOOL', false);

    const out = await handler(args);
    if (out instanceof Error) throw out;
    return out;
  }
}

/** web_search output: readable lines, then the delimited JSON source list. */
export function webSearchResult(
  sources: Array<{ url: string; title: string; domain?: string; excerpt?: string; publishedAt?: string }>,
): string {
  const lines = sources.map((s, i) => `${i + 1}. "${s.title}" — ${s.domain ?? new URL(s.url).hostname}`);
  return `${lines.join('\n')}\n\n<!-- SOURCES_JSON -->\n${JSON.stringify(sources)}`;
}
