import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { formatEvent, type Logger } from '../log.js';
import { withRetry, type RetryOptions } from './retry.js';

export interface ChatModel {
  readonly model: string;
  complete(systemPrompt: string, userMessage: string): Promise<string>;
}

export interface ChatModelOptions {
  provider: 'openai' | 'anthropic';
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
  timeoutMs?: number;
  retry?: RetryOptions;
  logger?: Logger;
}

const MAX_TOKENS = 2048;

function logRetry(model: string, logger: Logger = console): RetryOptions['onRetry'] {
  return (attempt, delay, status) => {
    logger.warn(formatEvent('analysis.retry', { model, attempt, delay_ms: delay, status: status ?? 'none' }));
  };
}

/** OpenAI and OpenAI-compatible providers (DeepSeek, Groq, Ollama) via baseURL. */
export class OpenAIChatModel implements ChatModel {
  private client: OpenAI;
  readonly model: string;

  constructor(private options: ChatModelOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
      ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
      maxRetries: 0,
    });
  }

  async complete(systemPrompt: string, userMessage: string): Promise<string> {
    const response = await withRetry(
      `Chat completion (${this.model})`,
      () => this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userMessage },
        ],
        temperature: this.options.temperature ?? 0.2,
      }),
      { onRetry: logRetry(this.model, this.options.logger), ...this.options.retry },
    );
    return response.choices[0]?.message?.content ?? '';
  }
}

export class AnthropicChatModel implements ChatModel {
  private client: Anthropic;
  readonly model: string;

  constructor(private options: ChatModelOptions) {
    this.model = options.model;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
      ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
      maxRetries: 0,
    });
  }

  async complete(systemPrompt: string, userMessage: string): Promise<string> {
    const response = await withRetry(
      `Messages call (${this.model})`,
      () => this.client.messages.create({
        model: this.model,
        max_tokens: MAX_TOKENS,
        temperature: this.options.temperature ?? 0.2,
        system: systemPrompt,
        messages: [{ role: 'user', content: userMessage }],
      }),
      { onRetry: logRetry(this.model, this.options.logger), ...this.options.retry },
    );
    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
  }
}

export function createChatModel(options: ChatModelOptions): ChatModel {
  switch (options.provider) {
    case 'anthropic':
      return new AnthropicChatModel(options);
    case 'openai':
      return new OpenAIChatModel(options);
  }
}
