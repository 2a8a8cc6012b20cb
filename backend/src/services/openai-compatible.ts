import { z } from 'zod';
import type { PersonaConfig, PromptContext, PromptMessage } from '@persona-chat/shared';
import type { ModelProvider } from './model-provider.js';
import { withRequestLog } from './request-log.js';
import { isContentFilterBody, parseFlaggedCategories } from './content-filter.js';
import { ChatError, ContentFilteredError, ProviderError, errorMessage } from '../utils/errors.js';
import { PROVIDER_ERRORS } from '../utils/error-messages.js';
import { Logger } from '../utils/logger.js';

export interface OpenAICompatibleOptions {
  mode: 'openai' | 'azure';
  apiKey: string;
  baseUrl: string;
  model: string;
  deployment?: string; // Azure only
  apiVersion?: string; // Azure only
  temperature: number;
  maxTokens: number;
}

const StreamChunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({ content: z.string().nullish() }).optional(),
    finish_reason: z.string().nullish()
  })).optional()
});

/**
 * Chat completions over server-sent events, for OpenAI-style endpoints and
 * Azure OpenAI deployments.
 */
export class OpenAICompatibleProvider implements ModelProvider {
  readonly type: 'openai-compatible' | 'azure-openai';
  readonly model: string;
  private baseUrl: string;

  constructor(private options: OpenAICompatibleOptions) {
    this.type = options.mode === 'azure' ? 'azure-openai' : 'openai-compatible';
    this.model = options.mode === 'azure' && options.deployment ? options.deployment : options.model;
    this.baseUrl = options.baseUrl.replace(/\/$/, ''); // Remove trailing slash
  }

  getEndpoint(): string {
    if (this.options.mode === 'azure') {
      const deployment = encodeURIComponent(this.options.deployment ?? '');
      const apiVersion = encodeURIComponent(this.options.apiVersion ?? '');
      return `${this.baseUrl}/openai/deployments/${deployment}/chat/completions?api-version=${apiVersion}`;
    }
    // Don't double-add /v1
    return this.baseUrl.endsWith('/v1')
      ? `${this.baseUrl}/chat/completions`
      : `${this.baseUrl}/v1/chat/completions`;
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

  buildRequestBody(messages: PromptMessage[]) {
    return {
      // Azure takes the model from the deployment in the URL
      ...(this.options.mode === 'openai' && { model: this.options.model }),
      messages: messages.map(m => ({ role: m.role, content: m.content })),
      stream: true,
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens
    };
  }

  private headers(): Record<string, string> {
    return this.options.mode === 'azure'
      ? { 'api-key': this.options.apiKey, 'Content-Type': 'application/json' }
      : { 'Authorization': `Bearer ${this.options.apiKey}`, 'Content-Type': 'application/json' };
  }

  private async *streamCompletion(messages: PromptMessage[], signal: AbortSignal): AsyncGenerator<string, void, undefined> {
    const endpoint = this.getEndpoint();
    Logger.debug(`[OpenAI-Compatible] Making request to: ${endpoint}`);

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(this.buildRequestBody(messages)),
        signal
      });
    } catch (error) {
      throw new ProviderError(`Request to ${this.type} failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      throw await this.toUpstreamError(response);
    }
    if (!response.body) {
      throw new ProviderError(PROVIDER_ERRORS.NO_BODY);
    }

    let produced = false;
    try {
      for await (const data of readSseData(response.body)) {
        if (data === '[DONE]') return;

        let json: unknown;
        try {
          json = JSON.parse(data);
        } catch (error) {
          Logger.warn('[OpenAI-Compatible] Failed to parse SSE data:', error);
          continue;
        }

        const parsed = StreamChunkSchema.safeParse(json);
        if (!parsed.success) continue;

        const choice = parsed.data.choices?.[0];
        const content = choice?.delta?.content;
        if (content) {
          produced = true;
          yield content;
        }
        // Azure can cut a stream for policy reasons instead of failing the request
        if (choice?.finish_reason === 'content_filter') {
          if (!produced) throw new ContentFilteredError();
          throw new ProviderError('Response stopped by the content filter');
        }
      }
    } catch (error) {
      if (error instanceof ChatError) throw error;
      throw new ProviderError(`Stream from ${this.type} failed: ${errorMessage(error)}`);
    }
  }

  private async toUpstreamError(response: Response): Promise<ProviderError> {
    const errorText = await response.text();
    Logger.error(`[OpenAI-Compatible] Error response ${response.status}:`, errorText);

    let body: unknown;
    try {
      body = JSON.parse(errorText);
    } catch {
      body = undefined;
    }

    if (response.status === 400 && isContentFilterBody(body)) {
      return new ContentFilteredError(parseFlaggedCategories(body, errorText));
    }
    return new ProviderError(PROVIDER_ERRORS.UPSTREAM_STATUS(response.status, errorText), response.status);
  }
}

/**
 * Yields the payload of each `data:` line of an event stream.
 */
export async function* readSseData(body: ReadableStream<Uint8Array>): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() || '';

      for (const line of lines) {
        const trimmed = line.replace(/\r$/, '');
        if (trimmed.startsWith('data:')) {
          yield trimmed.slice(5).trimStart();
        }
      }
    }

    const rest = (buffer + decoder.decode()).replace(/\r$/, '');
    if (rest.startsWith('data:')) {
      yield rest.slice(5).trimStart();
    }
  } finally {
    // Early exit leaves the connection open unless the body is cancelled
    await reader.cancel().catch((error: unknown) => {
      Logger.debug('[OpenAI-Compatible] Body cancel failed:', error);
    });
  }
}
