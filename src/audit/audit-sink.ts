/**
 * Audit trail for pipeline decisions (mode chosen, query rejected, tool calls…).
 * Appending is fire-and-forget: a sink that throws is logged and ignored.
 */
import { logger } from '@/services/logger';

export interface AuditEvent {
  actor: string;
  action: string;
  result?: string;
  details?: Record<string, unknown>;
  timestamp?: string;
}

export interface AuditSink {
  append(event: AuditEvent): void;
}

/** Default sink: audit events go to the structured log. */
export class LoggerAuditSink implements AuditSink {
  append(event: AuditEvent): void {
    logger.info(`audit:${event.action}`, {
      actor: event.actor,
      result: event.result,
      ...(event.details ? { details: event.details } : {}),
    });
  }
}

/** Keeps events in memory; used by the tests and handy when debugging a single turn. */
export class MemoryAuditSink implements AuditSink {
  readonly events: AuditEvent[] = [];

  append(event: AuditEvent): void {
    this.events.push(event);
  }

  actions(): string[] {
    return this.events.map((e) => e.action);
  }
}

export type AuditEventInput = Omit<AuditEvent, 'actor' | 'timestamp'> & { actor?: string };

export function safeAppend(sink: AuditSink, event: AuditEventInput): void {
  try {
    sink.append({ ...event, actor: event.actor ?? 'agent', timestamp: new Date().toISOString() });
  } catch (err) {
    logger.warn('audit:append_failed', {
      action: event.action,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
