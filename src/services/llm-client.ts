// src/services/llm-client.ts: chat client over any OpenAI-compatible endpoint

import OpenAI from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { TurnAbortedError } from '@/utils/abort';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export const systemMessage = (content: string): ChatMessage => ({ role: 'system', content });
export const userMessage = (content: string): ChatMessage => ({ role: 'user', content });
export const assistantMessage = (content: string): ChatMessage => ({ role: 'assistant', content });

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface LlmToolCall {
  id: string;
  name: string;
  argumentsJson: string;
}

export interface LlmResponse {
  content: string;
  toolCalls?: LlmToolCall[];
  finishReason: string;
}

export interface LlmChatOptions {
  tools?: ToolDefinition[];
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LlmClient {
  chat(messages: ChatMessage[], options?: LlmChatOptions): Promise<LlmResponse>;
}

/**
 * Transport-level "failed to process request" class (connection drops, 5xx,
 * grammar/regex rejections from local servers). The only class that is retried.
 */
export class LlmTransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'LlmTransportError';
  }
}

export interface OpenAiLlmClientOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature?: number;
  defaultMaxTokens?: number;
}

function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    default:
      return { role: 'assistant', content: message.content };
  }
}

function toOpenAiTool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: 'function',
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

const TRANSIENT_MESSAGE = /failed to process|regex|grammar/i;

export class OpenAiLlmClient implements LlmClient {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAiLlmClientOptions) {}

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseUrl });
    }
    return this.client;
  }

  async chat(messages: ChatMessage[], options: LlmChatOptions = {}): Promise<LlmResponse> {
    const tools = options.tools?.length ? options.tools.map(toOpenAiTool) : undefined;

    try {
      const res = await this.getClient().chat.completions.create(
        {
          model: this.options.model,
          messages: messages.map(toOpenAiMessage),
          temperature: this.options.temperature ?? 0.4,
          max_tokens: options.maxTokens ?? this.options.defaultMaxTokens ?? 1024,
          ...(tools ? { tools } : {}),
        },
        { signal: options.signal },
      );

      const choice = res.choices[0];
      const toolCalls = (choice?.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        argumentsJson: call.function.arguments,
      }));

      return {
        content: choice?.message.content ?? '',
        ...(toolCalls.length > 0 ? { toolCalls } : {}),
        finishReason: choice?.finish_reason ?? 'stop',
      };
    } catch (err) {
      if (err instanceof OpenAI.APIUserAbortError || options.signal?.aborted) {
        throw new TurnAbortedError();
      }
      if (err instanceof OpenAI.APIConnectionError) {
        throw new LlmTransportError(err.message);
      }
      if (err instanceof OpenAI.APIError) {
        const status = err.status;
        if ((status !== undefined && status >= 500) || TRANSIENT_MESSAGE.test(err.message)) {
          throw new LlmTransportError(err.message, status);
        }
      }
      throw err;
    }
  }
}
