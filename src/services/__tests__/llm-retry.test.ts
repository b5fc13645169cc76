import { describe, expect, it } from 'vitest';
import { LlmTransportError, assistantMessage, systemMessage, userMessage } from '@/services/llm-client';
import { LLM_EXHAUSTED_REPLY, chatWithRetry, minimalContext } from '@/services/llm-retry';
import { FakeLlmClient } from '@/test-support/fake-llm-client';

const messages = [
  systemMessage('You are helpful.'),
  userMessage('first question'),
  assistantMessage('first answer'),
  userMessage('second question'),
];

describe('minimalContext', () => {
  it('keeps the system prompt and the last user message', () => {
    expect(minimalContext(messages)).toEqual([systemMessage('You are helpful.'), userMessage('second question')]);
  });
});

describe('chatWithRetry', () => {
  it('retries once after a transport failure', async () => {
    let attempts = 0;
    const llm = new FakeLlmClient(() => {
      attempts++;
      return attempts === 1 ? new LlmTransportError('socket hang up') : 'ok';
    });

    const res = await chatWithRetry(llm, messages, {}, { retryDelayMs: 0 });

    expect(res).toEqual({ content: 'ok', finishReason: 'stop' });
    expect(llm.calls).toHaveLength(2);
  });

  it('tries reduced context, then gives up with a fixed reply', async () => {
    const llm = new FakeLlmClient(() => new LlmTransportError('failed to process request', 500));

    const res = await chatWithRetry(llm, messages, {}, { retryDelayMs: 0 });

    expect(res).toEqual({ content: LLM_EXHAUSTED_REPLY, finishReason: 'error' });
    expect(llm.calls).toHaveLength(3);
    expect(llm.calls[2].messages).toEqual(minimalContext(messages));
  });

  it('rethrows other errors without retrying', async () => {
    const llm = new FakeLlmClient(() => new Error('bad request'));

    await expect(chatWithRetry(llm, messages, {}, { retryDelayMs: 0 })).rejects.toThrow('bad request');
    expect(llm.calls).toHaveLength(1);
  });
});
