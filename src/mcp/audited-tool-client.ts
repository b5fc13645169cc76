/**
 * ToolClient decorator that writes TOOL_CALL_START / TOOL_CALL_END / TOOL_CALL_ERROR
 * audit events around every call. Errors and aborts still propagate to the caller.
 */
import { randomUUID } from 'node:crypto';
import type { AuditSink } from '@/audit/audit-sink';
import { safeAppend } from '@/audit/audit-sink';
import type { ToolClient } from '@/mcp/tool-client';
import { isAbortError, truncate } from '@/utils/abort';

const SUMMARY_MAX = 200;

export class AuditedToolClient implements ToolClient {
  constructor(
    private readonly inner: ToolClient,
    private readonly audit: AuditSink,
  ) {}

  async callOperation(name: string, argsJson: string, signal?: AbortSignal): Promise<string> {
    const requestId = randomUUID().replace(/-/g, '').slice(0, 12);
    safeAppend(this.audit, {
      action: 'TOOL_CALL_START',
      details: {
        request_id: requestId,
        tool_name: name,
        input_summary: truncate(argsJson, SUMMARY_MAX),
      },
    });

    const started = Date.now();
    try {
      const output = await this.inner.callOperation(name, argsJson, signal);
      safeAppend(this.audit, {
        action: 'TOOL_CALL_END',
        result: 'ok',
        details: {
          request_id: requestId,
          tool_name: name,
          output_summary: truncate(output, SUMMARY_MAX),
          duration_ms: Date.now() - started,
        },
      });
      return output;
    } catch (err) {
      safeAppend(this.audit, {
        action: 'TOOL_CALL_ERROR',
        result: isAbortError(err) ? 'cancelled' : 'error',
        details: {
          request_id: requestId,
          tool_name: name,
          error_message: err instanceof Error ? err.message : String(err),
          duration_ms: Date.now() - started,
        },
      });
      throw err;
    }
  }
}
