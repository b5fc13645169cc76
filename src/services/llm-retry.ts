/**
 * Bounded retry for model calls: one retry after a short fixed delay on the
 * transient transport class, one reduced-context attempt, then a static
 * apology with finishReason "error". Any other failure is rethrown.
 */
import { logger } from '@/services/logger';
import { LlmTransportError } from '@/services/llm-client';
import type { ChatMessage, LlmChatOptions, LlmClient, LlmResponse } from '@/services/llm-client';
import { delay } from '@/utils/abort';

export const LLM_EXHAUSTED_REPLY =
  "I'm having trouble with the language model right now, it keeps rejecting my requests. " +
  'Try sending your message again, or check whether the model needs a reload.';

export interface LlmRetryOptions {
  retryDelayMs?: number;
}

/** System prompt plus the most recent user message. */
export function minimalContext(messages: ChatMessage[]): ChatMessage[] {
  const minimal: ChatMessage[] = [];
  const system = messages.find((m) => m.role === 'system');
  let lastUser: ChatMessage | undefined;
  for (const m of messages) {
    if (m.role === 'user') lastUser = m;
  }
  if (system) minimal.push(system);
  if (lastUser) minimal.push(lastUser);
  return minimal;
}

export async function chatWithRetry(
  llm: LlmClient,
  messages: ChatMessage[],
  options: LlmChatOptions = {},
  retry: LlmRetryOptions = {},
): Promise<LlmResponse> {
  const retryDelayMs = retry.retryDelayMs ?? 500;

  try {
    return await llm.chat(messages, options);
  } catch (err) {
    if (!(err instanceof LlmTransportError)) throw err;
    logger.warn('llm:transient_failure', { attempt: 1, error: err.message });
  }

  await delay(retryDelayMs, options.signal);
  try {
    return await llm.chat(messages, options);
  } catch (err) {
    if (!(err instanceof LlmTransportError)) throw err;
    logger.warn('llm:transient_failure', { attempt: 2, error: err.message });
  }

  try {
    return await llm.chat(minimalContext(messages), options);
  } catch (err) {
    if (!(err instanceof LlmTransportError)) throw err;
    logger.error('llm:retries_exhausted', { error: err.message });
  }

  return { content: LLM_EXHAUSTED_REPLY, finishReason: 'error' };
}
