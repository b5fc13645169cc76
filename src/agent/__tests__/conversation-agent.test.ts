import { afterEach, describe, expect, it } from 'vitest';
import { ConversationAgent } from '@/agent/conversation-agent';
import { ConversationStore } from '@/agent/conversation-store';
import { MemoryAuditSink } from '@/audit/audit-sink';
import type { FakeLlmClient } from '@/test-support/fake-llm-client';
import { scriptedLlm } from '@/test-support/fake-llm-client';
import { FakeToolClient, webSearchResult } from '@/test-support/fake-tool-client';

const NOW = new Date('2025-06-10T16:00:00Z');

let store = new ConversationStore({ cleanupIntervalMs: 0 });

function setup(llm: FakeLlmClient = scriptedLlm(), historyTurns?: number) {
  store = new ConversationStore({ cleanupIntervalMs: 0 });
  const audit = new MemoryAuditSink();
  const tools = new FakeToolClient({
    web_search: () => webSearchResult([{ url: 'https://city.example.gov/mayor', title: 'Office of the Mayor' }]),
  });
  const agent = new ConversationAgent({
    llm,
    tools,
    audit,
    store,
    systemPrompt: 'You are helpful.',
    retry: { retryDelayMs: 0 },
    historyTurns,
    now: () => NOW,
  });
  return { agent, audit, tools };
}

afterEach(() => store.destroy());

describe('ConversationAgent', () => {
  it('answers utilities without touching the model', async () => {
    const llm = scriptedLlm();
    const { agent } = setup(llm);

    const response = await agent.handleTurn({ conversationId: 'c1', message: '5 * 12' });

    expect(response.text).toBe('5 * 12 = **60**\n\nNeed another quick one? Toss over the next math step.');
    expect(llm.calls).toHaveLength(0);
    expect(store.get('c1')?.history.map((m) => m.role)).toEqual(['user', 'assistant']);
  });

  it('runs search turns with the prior conversation in context', async () => {
    const llm = scriptedLlm();
    const { agent } = setup(llm);

    await agent.handleTurn({ conversationId: 'c1', message: 'who is the mayor of Boise' });
    const response = await agent.handleTurn({ conversationId: 'c1', message: 'what is the population of Boise' });

    expect(response.text).toBe('Summary text.');
    const second = llm.callsFor('summary')[1];
    expect(second.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user', 'user']);
    expect(second.messages[1].content).toBe('who is the mayor of Boise');
    expect(second.messages[2].content).toBe('Summary text.');
  });

  it('keeps only the configured number of turns', async () => {
    const { agent } = setup(scriptedLlm(), 1);

    await agent.handleTurn({ conversationId: 'c1', message: '5 * 12' });
    await agent.handleTurn({ conversationId: 'c1', message: '6 * 7' });

    expect(store.get('c1')?.history.map((m) => m.content)).toEqual([
      '6 * 7',
      '6 * 7 = **42**\n\nNeed another quick one? Toss over the next math step.',
    ]);
  });

  it('resets a conversation', async () => {
    const { agent, audit } = setup();
    await agent.handleTurn({ conversationId: 'c1', message: '5 * 12' });

    expect(agent.reset('c1')).toBe(true);
    expect(store.get('c1')?.history).toEqual([]);
    expect(audit.actions()).toContain('CONVERSATION_RESET');
    expect(agent.reset('unknown')).toBe(false);
  });

  it('rejects a turn whose signal already fired', async () => {
    const { agent } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      agent.handleTurn({ conversationId: 'c1', message: 'who is the mayor of Boise', signal: controller.signal }),
    ).rejects.toMatchObject({ name: 'AbortError' });
  });
});
