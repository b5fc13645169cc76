// In-process model stand-in for tests: a script decides each reply.

import type { ChatMessage, LlmChatOptions, LlmClient, LlmResponse } from '@/services/llm-client';
import { TurnAbortedError } from '@/utils/abort';

export type LlmPurpose = 'entity' | 'query' | 'summary' | 'other';

export type LlmScriptResult = string | LlmResponse | Error;
export type LlmScript = (
  purpose: LlmPurpose,
  messages: ChatMessage[],
  options: LlmChatOptions,
) => LlmScriptResult | Promise<LlmScriptResult>;

export interface RecordedLlmCall {
  purpose: LlmPurpose;
  messages: ChatMessage[];
  options: LlmChatOptions;
}

/** Classifies a call by its first system prompt. */
export function llmPurpose(messages: readonly ChatMessage[]): LlmPurpose {
  const system = messages.find((m) => m.role === 'system')?.content ?? '';
  if (system.startsWith('You extract entities')) return 'entity';
  if (system.startsWith('You build search queries')) return 'query';
  if (messages.some((m) => m.role === 'user' && m.content.includes('reference only, do not display to user'))) {
    return 'summary';
  }
  return 'other';
}

export class FakeLlmClient implements LlmClient {
  readonly calls: RecordedLlmCall[] = [];

  constructor(private readonly script: LlmScript) {}

  callsFor(purpose: LlmPurpose): RecordedLlmCall[] {
    return this.calls.filter((c) => c.purpose === purpose);
  }

  async chat(messages: ChatMessage[], options: LlmChatOptions = {}): Promise<LlmResponse> {
    if (options.signal?.aborted) throw new TurnAbortedError();

    const purpose = llmPurpose(messages);
    this.calls.push({ purpose, messages: [...messages], options });

    const out = await this.script(purpose, messages, options);
    if (out instanceof Error) throw out;
    return typeof out === 'string' ? { content: out, finishReason: 'stop' } : out;
  }
}

/** Entity call says "none", query call proposes nothing, summaries echo a fixed text. */
export function scriptedLlm(overrides: Partial<Record<LlmPurpose, LlmScriptResult>> = {}): FakeLlmClient {
  return new FakeLlmClient((purpose) => {
    const override = overrides[purpose];
    if (override !== undefined) return override;
    switch (purpose) {
      case 'entity':
        return '{"name":"","type":"none","hint":""}';
      case 'query':
        return '';
      default:
        return 'Summary text.';
    }
  });
}
