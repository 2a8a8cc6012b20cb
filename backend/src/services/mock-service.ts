import type { PersonaConfig, PromptContext } from '@persona-chat/shared';
import type { ModelProvider } from './model-provider.js';
import { withRequestLog } from './request-log.js';

export interface MockProviderOptions {
  delayMs: number;
}

/**
 * Offline provider for development and tests. Replies with a fixed,
 * persona-aware sentence streamed one word at a time.
 */
export class MockProvider implements ModelProvider {
  readonly type = 'mock' as const;
  readonly model = 'mock';

  constructor(private options: MockProviderOptions) {}

  composeReply(persona: PersonaConfig, context: PromptContext): string {
    const lastUser = [...context.messages].reverse().find(m => m.role === 'user');
    const topic = lastUser ? lastUser.content.replace(/\s+/g, ' ').trim() : 'your question';
    return `${persona.displayName} here. You asked about "${topic}". Let's take it one small step at a time.`;
  }

  stream(persona: PersonaConfig, context: PromptContext, signal: AbortSignal): AsyncIterable<string> {
    return withRequestLog(
      { service: this.type, model: this.model, context },
      signal,
      this.simulate(this.composeReply(persona, context), signal)
    );
  }

  private async *simulate(reply: string, signal: AbortSignal): AsyncGenerator<string, void, undefined> {
    const words = reply.split(' ');
    for (let i = 0; i < words.length; i++) {
      await this.sleep(this.options.delayMs, signal);
      if (signal.aborted) return;
      yield (i === 0 ? '' : ' ') + words[i];
    }
  }

  // Resolves early when the turn is aborted
  private sleep(ms: number, signal: AbortSignal): Promise<void> {
    if (ms <= 0 || signal.aborted) return Promise.resolve();
    return new Promise(resolve => {
      const timer = setTimeout(done, ms);
      function done() {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      }
      signal.addEventListener('abort', done, { once: true });
    });
  }
}
