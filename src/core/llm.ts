import Anthropic from '@anthropic-ai/sdk';
import fetch from 'node-fetch';
import { z } from 'zod';

import type { AdvisorySourceConfig } from './config.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
}

export type LlmClientOptions = {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export type LlmClientMeta = {
  provider: AdvisorySourceConfig['provider'];
  model: string;
};

export interface LlmClient {
  complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse>;
  meta?: LlmClientMeta;
}

type ConversationMessage = ChatMessage & { role: 'user' | 'assistant' };

const isConversationMessage = (msg: ChatMessage): msg is ConversationMessage =>
  msg.role !== 'system';

export class AnthropicClient implements LlmClient {
  private client: Anthropic;
  meta: LlmClientMeta;

  constructor(private source: AdvisorySourceConfig) {
    this.client = new Anthropic({
      apiKey: process.env.ANTHROPIC_API_KEY ?? '',
      baseURL: source.apiBaseUrl,
    });
    this.meta = { provider: 'anthropic', model: source.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const system = messages
      .filter((msg) => msg.role === 'system')
      .map((msg) => msg.content)
      .join('\n\n');
    const converted = messages
      .filter(isConversationMessage)
      .map((msg) => ({ role: msg.role, content: msg.content }));

    const response = await this.client.messages.create(
      {
        model: this.source.model,
        max_tokens: options?.maxTokens ?? this.source.maxTokens,
        temperature: options?.temperature ?? this.source.temperature,
        system,
        messages: converted,
      },
      { signal: options?.signal }
    );

    const text = response.content
      .map((block) => ('text' in block ? block.text : ''))
      .join('')
      .trim();

    return { content: text, model: this.source.model };
  }
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .default([]),
});

export class OpenAiClient implements LlmClient {
  private baseUrl: string;
  meta: LlmClientMeta;

  constructor(private source: AdvisorySourceConfig) {
    this.baseUrl = (source.apiBaseUrl ?? 'https://api.openai.com').replace(/\/+$/, '');
    this.meta = { provider: 'openai', model: source.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${process.env.OPENAI_API_KEY ?? ''}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.source.model,
        temperature: options?.temperature ?? this.source.temperature,
        max_completion_tokens: options?.maxTokens ?? this.source.maxTokens,
        messages,
      }),
      signal: options?.signal,
    });

    if (!response.ok) {
      let detail = '';
      try {
        detail = await response.text();
      } catch {
        detail = '';
      }
      throw new Error(`LLM request failed: ${detail ? detail.slice(0, 300) : `status ${response.status}`}`);
    }

    const data = ChatCompletionSchema.parse(await response.json());
    const text = data.choices[0]?.message.content?.trim() ?? '';
    return { content: text, model: this.source.model };
  }
}

export function createLlmClient(source: AdvisorySourceConfig): LlmClient {
  switch (source.provider) {
    case 'anthropic':
      return new AnthropicClient(source);
    case 'openai':
      return new OpenAiClient(source);
  }
}
