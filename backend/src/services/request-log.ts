import type { PromptContext } from '@persona-chat/shared';
import type { ProviderType } from '../config/types.js';
import { llmLogger } from '../utils/llmLogger.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface RequestMeta {
  service: ProviderType;
  model: string;
  context: PromptContext;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Wraps a provider stream with request/response entries in the LLM log.
 */
export async function* withRequestLog(
  meta: RequestMeta,
  signal: AbortSignal,
  source: AsyncIterable<string>
): AsyncGenerator<string, void, undefined> {
  const requestId = `${meta.service}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  const startTime = Date.now();
  let chunkCount = 0;
  let content = '';
  let failure: string | undefined;

  await llmLogger.logRequest({
    requestId,
    service: meta.service,
    model: meta.model,
    sessionId: meta.context.sessionId,
    personaId: meta.context.persona.id,
    messageCount: meta.context.messages.length,
    messages: meta.context.messages,
    temperature: meta.temperature,
    maxTokens: meta.maxTokens
  });
  Logger.provider(`${requestId} -> ${meta.model} (${meta.context.messages.length} messages)`);

  try {
    for await (const chunk of source) {
      chunkCount++;
      content += chunk;
      yield chunk;
    }
  } catch (error) {
    failure = errorMessage(error);
    throw error;
  } finally {
    const duration = Date.now() - startTime;
    Logger.provider(`${requestId} <- ${chunkCount} chunks in ${duration}ms${failure ? ` (${failure})` : ''}`);
    await llmLogger.logResponse({
      requestId,
      service: meta.service,
      model: meta.model,
      chunkCount,
      content,
      contentLength: content.length,
      duration,
      ...(failure !== undefined && { error: failure }),
      ...(signal.aborted && { aborted: true })
    });
  }
}
