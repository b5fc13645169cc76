import { describe, expect, it } from 'vitest';
import {
  McpToolError,
  UnconfiguredToolClient,
  getTextFromToolResult,
  parseToolArgs,
  toRetryable,
} from '@/mcp/tool-client';

describe('parseToolArgs', () => {
  it('accepts JSON objects only', () => {
    expect(parseToolArgs('{"query":"x","maxResults":5}')).toEqual({ query: 'x', maxResults: 5 });
    expect(() => parseToolArgs('[1,2]')).toThrow('Tool arguments must be a JSON object');
    expect(() => parseToolArgs('{oops')).toThrow('Tool arguments are not valid JSON');
  });
});

describe('getTextFromToolResult', () => {
  it('joins the text parts', () => {
    const result = {
      content: [
        { type: 'text', text: 'line one' },
        { type: 'image', data: 'AAAA' },
        { type: 'text', text: 'line two' },
      ],
    };
    expect(getTextFromToolResult(result)).toBe('line one\nline two');
  });

  it('turns error results into typed errors', () => {
    const unknown = { content: [{ type: 'text', text: 'Unknown tool: WebSearch' }], isError: true };
    expect(() => getTextFromToolResult(unknown)).toThrow(McpToolError);
    try {
      getTextFromToolResult(unknown);
    } catch (err) {
      expect(err).toMatchObject({ code: 'UNKNOWN_TOOL', retryable: false });
    }
  });

  it('rejects unexpected payloads', () => {
    expect(() => getTextFromToolResult('nope')).toThrow('MCP tool returned an unexpected payload');
  });
});

describe('toRetryable', () => {
  it('retries transport-looking failures only', () => {
    expect(toRetryable(new TypeError('fetch failed'))).toBe(true);
    expect(toRetryable(new Error('connect ECONNREFUSED 127.0.0.1:8080'))).toBe(true);
    expect(toRetryable(new McpToolError('bad', 'TOOL_ERROR', false))).toBe(false);
    expect(toRetryable(new Error('validation failed'))).toBe(false);
    expect(toRetryable('string')).toBe(false);
  });
});

describe('UnconfiguredToolClient', () => {
  it('fails every call', async () => {
    await expect(new UnconfiguredToolClient().callOperation('web_search')).rejects.toMatchObject({
      code: 'NOT_CONFIGURED',
      message: 'No tool server configured for "web_search"',
    });
  });
});
