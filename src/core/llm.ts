import Anthropic from '@anthropic-ai/sdk';

import type { AgentLoopConfig } from './config.js';
import { Logger } from './logger.js';

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
  stop?: string[];
  signal?: AbortSignal;
};

export type LlmClientMeta = {
  provider: 'anthropic';
  model: string;
};

export interface LlmClient {
  complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse>;
  meta?: LlmClientMeta;
}

export type AnthropicMessagesApi = Pick<Anthropic, 'messages'>;

export interface AnthropicClientOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  baseUrl?: string;
  apiKey?: string;
  /** Pre-built SDK client; one is created from apiKey/baseUrl otherwise. */
  client?: AnthropicMessagesApi;
  logger?: Logger;
}

export class AnthropicClient implements LlmClient {
  private client: AnthropicMessagesApi;
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private logger: Logger;
  meta: LlmClientMeta;

  constructor(options: AnthropicClientOptions) {
    this.client =
      options.client ??
      new Anthropic({
        apiKey: options.apiKey ?? process.env.ANTHROPIC_API_KEY ?? '',
        baseURL: options.baseUrl,
      });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1024;
    this.temperature = options.temperature ?? 0.2;
    this.logger = (options.logger ?? new Logger('info')).child('llm');
    this.meta = { provider: 'anthropic', model: this.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const system = messages
      .filter((msg) => msg.role === 'system')
      .map((msg) => msg.content)
      .join('\n\n');
    const converted = messages
      .filter((msg) => msg.role !== 'system')
      .map((msg) => ({
        role: msg.role === 'assistant' ? ('assistant' as const) : ('user' as const),
        content: msg.content,
      }));

    this.logger.debug('messages.create', { model: this.model, messages: converted.length });

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options?.maxTokens ?? this.maxTokens,
        temperature: options?.temperature ?? this.temperature,
        system: system || undefined,
        messages: converted,
        stop_sequences: options?.stop,
      },
      { signal: options?.signal }
    );

    const text = response.content
      .map((block) => ('text' in block ? block.text : ''))
      .join('')
      .trim();

    return { content: text, model: this.model };
  }
}

export function createLlmClient(config: AgentLoopConfig, logger?: Logger): LlmClient {
  return new AnthropicClient({
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    baseUrl: config.llm.baseUrl,
    logger,
  });
}
