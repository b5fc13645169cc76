/**
 * Remote tool client: request a named operation with JSON arguments, get text back.
 * The HTTP implementation reuses one MCP client per server URL and retries once
 * when the failure looks like a dropped connection.
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { z } from 'zod';
import { logger } from '@/services/logger';
import { TurnAbortedError, isAbortError } from '@/utils/abort';

export interface ToolClient {
  callOperation(name: string, argsJson: string, signal?: AbortSignal): Promise<string>;
}

/** Thrown when a tool call fails; `retryable` drives the single reconnect retry. */
export class McpToolError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = 'McpToolError';
  }
}

export const UNKNOWN_TOOL_PATTERN = /unknown tool/i;

/** Normalize a thrown value into retryable (transport) vs not. */
export function toRetryable(err: unknown): boolean {
  if (err instanceof McpToolError) return err.retryable;
  if (err instanceof Error) {
    const n = err.name.toLowerCase();
    const m = err.message.toLowerCase();
    if (n === 'typeerror' || n === 'aggregateerror') return true;
    if (m.includes('timeout') || m.includes('econnrefused') || m.includes('network')) return true;
    if (m.includes('econnreset') || m.includes('etimedout')) return true;
  }
  return false;
}

const argsSchema = z.record(z.unknown());

const toolResultSchema = z
  .object({
    content: z
      .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
      .default([]),
    isError: z.boolean().optional(),
  })
  .passthrough();

export function parseToolArgs(argsJson: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(argsJson);
  } catch {
    throw new McpToolError('Tool arguments are not valid JSON', 'INVALID_ARGS', false);
  }
  const parsed = argsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new McpToolError('Tool arguments must be a JSON object', 'INVALID_ARGS', false);
  }
  return parsed.data;
}

/** Concatenates the text parts of an MCP tool result; isError results become McpToolError. */
export function getTextFromToolResult(result: unknown): string {
  const parsed = toolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new McpToolError('MCP tool returned an unexpected payload', 'INVALID_RESPONSE', false);
  }

  const text = parsed.data.content
    .filter((part) => part.type === 'text' && typeof part.text === 'string')
    .map((part) => part.text ?? '')
    .join('\n');

  if (parsed.data.isError) {
    const code = UNKNOWN_TOOL_PATTERN.test(text) ? 'UNKNOWN_TOOL' : 'TOOL_ERROR';
    throw new McpToolError(text || 'Tool failed', code, false);
  }
  return text;
}

export interface McpHttpToolClientOptions {
  serverUrl: string;
  clientName?: string;
  clientVersion?: string;
}

export class McpHttpToolClient implements ToolClient {
  private client: Client | null = null;
  private connecting: Promise<Client> | null = null;

  constructor(private readonly options: McpHttpToolClientOptions) {}

  private async getClient(): Promise<Client> {
    if (this.client) return this.client;
    if (!this.connecting) {
      this.connecting = (async () => {
        const transport = new StreamableHTTPClientTransport(new URL(this.options.serverUrl));
        const client = new Client({
          name: this.options.clientName ?? 'turn-orchestrator',
          version: this.options.clientVersion ?? '0.1.0',
        });
        await client.connect(transport);
        this.client = client;
        return client;
      })().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async reset(): Promise<void> {
    const stale = this.client;
    this.client = null;
    if (!stale) return;
    try {
      await stale.close();
    } catch (err) {
      logger.debug('mcp:close_failed', { error: err instanceof Error ? err.message : String(err) });
    }
  }

  private async callOnce(name: string, args: Record<string, unknown>, signal?: AbortSignal) {
    const client = await this.getClient();
    const result = await client.callTool({ name, arguments: args }, undefined, { signal });
    return getTextFromToolResult(result);
  }

  async callOperation(name: string, argsJson: string, signal?: AbortSignal): Promise<string> {
    const args = parseToolArgs(argsJson);
    try {
      return await this.callOnce(name, args, signal);
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) throw new TurnAbortedError();
      if (!toRetryable(err)) throw err;

      logger.warn('mcp:retrying_after_transport_error', {
        tool: name,
        error: err instanceof Error ? err.message : String(err),
      });
      await this.reset();
      try {
        return await this.callOnce(name, args, signal);
      } catch (retryErr) {
        if (signal?.aborted || isAbortError(retryErr)) throw new TurnAbortedError();
        throw retryErr;
      }
    }
  }

  async close(): Promise<void> {
    await this.reset();
  }
}

/** Stand-in when no tool server is configured: every call fails fast. */
export class UnconfiguredToolClient implements ToolClient {
  async callOperation(name: string): Promise<string> {
    throw new McpToolError(`No tool server configured for "${name}"`, 'NOT_CONFIGURED', false);
  }
}
