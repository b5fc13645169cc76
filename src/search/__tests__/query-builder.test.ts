import { describe, expect, it } from 'vitest';
import { MemoryAuditSink } from '@/audit/audit-sink';
import {
  QueryBuilder,
  buildFallbackQuery,
  detectRecencyFromMessage,
  extractTopicFromMessage,
  normalizeRecency,
  sanitizeConstructedQuery,
  validateQuery,
} from '@/search/query-builder';
import { SearchSession } from '@/search/search-session';
import type { ResolvedEntity } from '@/search/types';
import { scriptedLlm } from '@/test-support/fake-llm-client';

const eiffel: ResolvedEntity = {
  canonicalName: 'Eiffel Tower',
  type: 'Place',
  disambiguation: 'landmark in Paris',
};

describe('validateQuery', () => {
  it('tolerates one token from outside the message', () => {
    expect(validateQuery('Boise weather forecast', "what's the forecast for Boise", null)).toBe(true);
  });

  it('rejects invented terms', () => {
    expect(validateQuery('Boise hotels cheap flights', "what's the forecast for Boise", null)).toBe(false);
  });

  it('rejects queries that are too short', () => {
    expect(validateQuery('abc', 'abc', null)).toBe(false);
  });

  it('allows words from the resolved entity', () => {
    expect(validateQuery('Eiffel Tower landmark Paris', 'how tall is it', eiffel)).toBe(true);
  });
});

describe('sanitizeConstructedQuery', () => {
  it('strips request lead-ins and trailing punctuation', () => {
    expect(sanitizeConstructedQuery('Can you search for Boise State football?')).toBe('Boise State football');
  });

  it('drops conversational openers', () => {
    expect(sanitizeConstructedQuery('okay, what is the capital of France')).toBe('the capital of France');
  });
});

describe('recency helpers', () => {
  it('maps model recency spellings', () => {
    expect(normalizeRecency('24h')).toBe('day');
    expect(normalizeRecency('7d')).toBe('week');
    expect(normalizeRecency('Month')).toBe('month');
    expect(normalizeRecency('yearly')).toBe('any');
    expect(normalizeRecency(null)).toBe('any');
  });

  it('reads recency markers from the message', () => {
    expect(detectRecencyFromMessage('breaking story')).toBe('day');
    expect(detectRecencyFromMessage('news this week')).toBe('week');
    expect(detectRecencyFromMessage('what happened recently')).toBe('month');
    expect(detectRecencyFromMessage('election coverage')).toBe('day');
  });
});

describe('extractTopicFromMessage', () => {
  it('prefers the topic named before a vague request', () => {
    expect(extractTopicFromMessage('the Rexburg flood, can you check on the news there')).toBe('the Rexburg flood');
  });

  it('returns null for very short messages', () => {
    expect(extractTopicFromMessage('hi')).toBeNull();
  });
});

describe('buildFallbackQuery', () => {
  it('uses the entity for news', () => {
    expect(buildFallbackQuery('NewsAggregate', 'news about it this week', eiffel, new SearchSession())).toEqual({
      query: 'Eiffel Tower latest news',
      recency: 'week',
      usedFallback: true,
    });
  });

  it('asks for top headlines on a generic headline request', () => {
    expect(buildFallbackQuery('NewsAggregate', 'top headlines please', null, new SearchSession()).query).toBe(
      'top headlines',
    );
  });

  it('builds a market update query for quotes', () => {
    expect(buildFallbackQuery('WebFactFind', 'dow jones right now', null, new SearchSession())).toEqual({
      query: 'Dow Jones market update today',
      recency: 'day',
      usedFallback: true,
    });
  });

  it('asks for an overview of the entity on fact lookups', () => {
    expect(buildFallbackQuery('WebFactFind', 'how tall is it', eiffel, new SearchSession())).toEqual({
      query: 'Eiffel Tower overview',
      recency: 'any',
      usedFallback: true,
    });
  });
});

describe('QueryBuilder', () => {
  it('accepts a valid model query', async () => {
    const audit = new MemoryAuditSink();
    const llm = scriptedLlm({ query: '{"query":"Boise State football schedule","recency":"week"}' });
    const builder = new QueryBuilder({ llm, audit });

    const result = await builder.build(
      'WebFactFind',
      'Boise State football schedule this season',
      null,
      new SearchSession(),
      [],
    );

    expect(result).toEqual({ query: 'Boise State football schedule', recency: 'week', usedFallback: false });
    expect(audit.actions()).toEqual(['QUERY_BUILT']);
    expect(llm.callsFor('query')).toHaveLength(1);
  });

  it('falls back when the model invents terms', async () => {
    const audit = new MemoryAuditSink();
    const llm = scriptedLlm({ query: '{"query":"cheap hotels in Paris France","recency":"any"}' });
    const builder = new QueryBuilder({ llm, audit });

    const result = await builder.build('WebFactFind', 'tell me about the tower', eiffel, new SearchSession(), []);

    expect(result).toEqual({ query: 'Eiffel Tower overview', recency: 'any', usedFallback: true });
    expect(audit.actions()).toEqual(['QUERY_REJECTED', 'QUERY_FALLBACK']);
    expect(audit.events[0].details).toEqual({
      rejected_query: 'cheap hotels in Paris France',
      reason: 'token_validation_failed',
    });
  });

  it('falls back when the model call fails', async () => {
    const builder = new QueryBuilder({ llm: scriptedLlm({ query: new Error('boom') }), audit: new MemoryAuditSink() });
    const result = await builder.build('WebFactFind', 'how tall is it', eiffel, new SearchSession(), []);
    expect(result.usedFallback).toBe(true);
    expect(result.query).toBe('Eiffel Tower overview');
  });

  it('turns a generic news query into top headlines', async () => {
    const audit = new MemoryAuditSink();
    const llm = scriptedLlm({ query: '{"query":"latest news","recency":""}' });
    const builder = new QueryBuilder({ llm, audit });

    const result = await builder.build('NewsAggregate', 'latest news', null, new SearchSession(), []);

    expect(result).toEqual({ query: 'top headlines', recency: 'day', usedFallback: false });
    expect(audit.actions()).toEqual(['QUERY_SANITIZED', 'QUERY_BUILT']);
  });
});
