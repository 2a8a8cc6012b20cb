import type { Message, PromptContext, PromptMessage } from '@persona-chat/shared';
import type { Database } from '../database/index.js';
import type { PersonaLookup } from './persona-registry.js';
import { InvalidPersonaError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

/**
 * ContextBuilder - assembles the prompt for one turn:
 * the persona's system prompt followed by the most recent `windowSize`
 * messages, oldest first. Older history is dropped, not summarised.
 */
export class ContextBuilder {
  constructor(
    private db: Database,
    private personas: PersonaLookup,
    private windowSize: number
  ) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new Error(`Context window must be a positive integer, got ${windowSize}`);
    }
  }

  async build(sessionId: string): Promise<PromptContext> {
    const session = await this.db.getSessionById(sessionId);
    const persona = this.personas.resolve(session.personaId);
    if (!persona) {
      throw new InvalidPersonaError(session.personaId);
    }

    const window = await this.db.getRecentMessages(sessionId, this.windowSize);
    Logger.debug(`[ContextBuilder] Session ${sessionId}: ${window.length} messages in window of ${this.windowSize}`);

    return {
      sessionId,
      persona,
      messages: [
        { role: 'system', content: persona.systemPrompt },
        ...window.map(toPromptMessage)
      ]
    };
  }
}

function toPromptMessage(message: Message): PromptMessage {
  return { role: message.role, content: message.content };
}
