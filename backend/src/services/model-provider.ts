import type { PersonaConfig, PromptContext } from '@persona-chat/shared';
import type { ProviderConfig, ProviderType } from '../config/types.js';
import { Logger } from '../utils/logger.js';
import { PROVIDER_ERRORS } from '../utils/error-messages.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import { AnthropicProvider } from './anthropic.js';
import { MockProvider } from './mock-service.js';

/**
 * A model backend. `stream` yields text chunks in order and finishes at end
 * of completion. It raises ProviderError on upstream failure and
 * ContentFilteredError on a policy rejection. Aborting `signal` cancels the
 * upstream request; callers may also stop early by calling `return()`.
 */
export interface ModelProvider {
  readonly type: ProviderType;
  readonly model: string;
  stream(persona: PersonaConfig, context: PromptContext, signal: AbortSignal): AsyncIterable<string>;
}

export function createModelProvider(config: ProviderConfig): ModelProvider {
  switch (config.type) {
    case 'mock':
      return new MockProvider({ delayMs: config.mockDelayMs });

    case 'openai-compatible':
      if (!config.baseUrl) throw new Error(PROVIDER_ERRORS.BASE_URL_MISSING(config.type));
      if (!config.apiKey) Logger.warn(PROVIDER_ERRORS.API_KEY_MISSING(config.type));
      return new OpenAICompatibleProvider({
        mode: 'openai',
        apiKey: config.apiKey ?? '',
        baseUrl: config.baseUrl,
        model: config.model,
        temperature: config.temperature,
        maxTokens: config.maxTokens
      });

    case 'azure-openai':
      if (!config.baseUrl) throw new Error(PROVIDER_ERRORS.BASE_URL_MISSING(config.type));
      if (!config.deployment) throw new Error(PROVIDER_ERRORS.DEPLOYMENT_MISSING);
      if (!config.apiKey) Logger.warn(PROVIDER_ERRORS.API_KEY_MISSING(config.type));
      return new OpenAICompatibleProvider({
        mode: 'azure',
        apiKey: config.apiKey ?? '',
        baseUrl: config.baseUrl,
        model: config.model,
        deployment: config.deployment,
        apiVersion: config.apiVersion,
        temperature: config.temperature,
        maxTokens: config.maxTokens
      });

    case 'anthropic':
      if (!config.apiKey) Logger.warn(PROVIDER_ERRORS.API_KEY_MISSING(config.type));
      return new AnthropicProvider({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        model: config.model,
        temperature: config.temperature,
        maxTokens: config.maxTokens
      });
  }
}
