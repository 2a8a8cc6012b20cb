import Anthropic from '@anthropic-ai/sdk';
import type { PersonaConfig, PromptContext, PromptMessage } from '@persona-chat/shared';
import type { ModelProvider } from './model-provider.js';
import { withRequestLog } from './request-log.js';
import { ProviderError, errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface AnthropicOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface AnthropicPrompt {
  system: string;
  messages: Anthropic.MessageParam[];
}

export class AnthropicProvider implements ModelProvider {
  readonly type = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;

  constructor(private options: AnthropicOptions) {
    this.model = options.model;
    this.client = new Anthropic({
      apiKey: options.apiKey || process.env.ANTHROPIC_API_KEY,
      ...(options.baseUrl && { baseURL: options.baseUrl })
    });
  }

  stream(_persona: PersonaConfig, context: PromptContext, signal: AbortSignal): AsyncIterable<string> {
    return withRequestLog(
      {
        service: this.type,
        model: this.model,
        context,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens
      },
      signal,
      this.streamCompletion(context.messages, signal)
    );
  }

  // The system prompt travels separately; turns must alternate and open with the user
  formatMessagesForAnthropic(messages: PromptMessage[]): AnthropicPrompt {
    const system: string[] = [];
    const formatted: Anthropic.MessageParam[] = [];

    for (const message of messages) {
      if (message.role === 'system') {
        system.push(message.content);
        continue;
      }
      if (message.content.trim() === '') continue;

      const previous = formatted[formatted.length - 1];
      if (previous && previous.role === message.role && typeof previous.content === 'string') {
        previous.content += `\n\n${message.content}`;
      } else if (formatted.length > 0 || message.role === 'user') {
        formatted.push({ role: message.role, content: message.content });
      }
    }

    return { system: system.join('\n\n'), messages: formatted };
  }

  private async *streamCompletion(messages: PromptMessage[], signal: AbortSignal): AsyncGenerator<string, void, undefined> {
    const prompt = this.formatMessagesForAnthropic(messages);
    Logger.debug(`[Anthropic] ${prompt.messages.length} messages to ${this.model}`);

    try {
      const stream = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          ...(prompt.system && { system: prompt.system }),
          messages: prompt.messages,
          stream: true
        },
        { signal }
      );

      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        } else if (event.type === 'message_delta' && event.delta.stop_reason) {
          Logger.debug(`[Anthropic] Stop reason: ${event.delta.stop_reason}`);
        }
      }
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        throw new ProviderError(`Anthropic request failed: ${error.message}`, error.status);
      }
      throw new ProviderError(`Anthropic request failed: ${errorMessage(error)}`);
    }
  }
}
