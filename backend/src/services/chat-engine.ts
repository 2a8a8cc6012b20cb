import { v4 as uuidv4 } from 'uuid';
import { deriveSessionTitle } from '@persona-chat/shared';
import type { Message, PersonaConfig, Session, TurnState } from '@persona-chat/shared';
import type { Database } from '../database/index.js';
import type { PersonaLookup } from './persona-registry.js';
import type { ContextBuilder } from './context-builder.js';
import type { ModelProvider } from './model-provider.js';
import { buildRefusalMessage } from './content-filter.js';
import {
  ChatError,
  ContentFilteredError,
  InvalidPersonaError,
  ProviderError,
  TurnAbortedError,
  TurnTimeoutError,
  ValidationError,
  errorMessage
} from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface TurnRequest {
  ownerId: string;
  sessionId?: string;
  personaId?: string; // Starts a new session when sessionId is absent
  text: string;
  signal: AbortSignal;
  onChunk: (chunk: string) => void | Promise<void>;
  // Called once the user message is stored, before the model is asked
  onTurnStarted?: (session: Session, userMessage: Message) => void | Promise<void>;
  onStateChange?: (state: TurnState, previous: TurnState) => void;
}

export interface TurnResult {
  session: Session;
  userMessage: Message;
  assistantMessage?: Message;
  state: 'done' | 'errored';
  error?: ChatError;
}

export interface ChatEngineOptions {
  turnTimeoutMs: number;
}

interface StreamOutcome {
  content: string;
  error?: ChatError;
}

const STOPPED = Symbol('stopped');

class TurnStateMachine {
  state: TurnState = 'idle';

  constructor(
    private turnId: string,
    private observer?: (state: TurnState, previous: TurnState) => void
  ) {}

  transition(next: TurnState): void {
    const previous = this.state;
    this.state = next;
    Logger.engine(`Turn ${this.turnId}: ${previous} -> ${next}`);
    this.observer?.(next, previous);
  }
}

/**
 * Runs one chat turn: validate, store the user message, stream the reply,
 * store the assistant message.
 *
 * Failures before the user message is stored reject and leave nothing
 * behind. Once it is stored the turn always resolves with a TurnResult;
 * a turn that fails while streaming keeps whatever text arrived as a
 * truncated assistant message.
 */
export class StreamingChatEngine {
  constructor(
    private db: Database,
    private personas: PersonaLookup,
    private contextBuilder: ContextBuilder,
    private provider: ModelProvider,
    private options: ChatEngineOptions
  ) {}

  async runTurn(request: TurnRequest): Promise<TurnResult> {
    const machine = new TurnStateMachine(uuidv4(), request.onStateChange);

    let session: Session;
    let persona: PersonaConfig;
    let userMessage: Message;
    try {
      machine.transition('validating');
      if (request.signal.aborted) throw new TurnAbortedError();
      if (!request.text.trim()) throw new ValidationError('Message text is required');

      let existing: Session | undefined;
      if (request.sessionId) {
        existing = await this.db.getSession(request.ownerId, request.sessionId);
        persona = this.resolvePersona(existing.personaId);
      } else if (request.personaId) {
        persona = this.resolvePersona(request.personaId);
      } else {
        throw new ValidationError('Either sessionId or personaId is required');
      }

      machine.transition('persisting_user_message');
      session = existing ?? await this.db.createSession(request.ownerId, persona.id, deriveSessionTitle(request.text));
      userMessage = await this.db.appendMessage(session.id, 'user', request.text);
    } catch (error) {
      machine.transition('errored');
      throw error;
    }

    await request.onTurnStarted?.(session, userMessage);

    machine.transition('streaming');
    const outcome = await this.streamReply(persona, session.id, request);

    if (outcome.error) {
      machine.transition('errored');
      const assistantMessage = await this.persistPartial(session.id, outcome.content);
      Logger.engine(`Turn on session ${session.id} failed (${outcome.error.code}): ${outcome.error.message}`);
      return {
        session,
        userMessage,
        ...(assistantMessage && { assistantMessage }),
        state: 'errored',
        error: outcome.error
      };
    }

    machine.transition('finalizing');
    let assistantMessage: Message;
    try {
      assistantMessage = await this.db.appendMessage(session.id, 'assistant', outcome.content);
    } catch (error) {
      machine.transition('errored');
      return { session, userMessage, state: 'errored', error: toChatError(error) };
    }

    machine.transition('done');
    return { session, userMessage, assistantMessage, state: 'done' };
  }

  private resolvePersona(personaId: string): PersonaConfig {
    const persona = this.personas.resolve(personaId);
    if (!persona) {
      throw new InvalidPersonaError(personaId);
    }
    return persona;
  }

  // Never throws: every failure is reported in the outcome with the text received so far
  private async streamReply(persona: PersonaConfig, sessionId: string, request: TurnRequest): Promise<StreamOutcome> {
    const controller = new AbortController();
    const halt: { reason?: ChatError } = {};
    const stop = (reason: ChatError) => {
      if (controller.signal.aborted) return;
      halt.reason = reason;
      controller.abort(reason);
    };

    const onCallerAbort = () => stop(new TurnAbortedError());
    if (request.signal.aborted) {
      onCallerAbort();
    } else {
      request.signal.addEventListener('abort', onCallerAbort, { once: true });
    }
    const timer = setTimeout(
      () => stop(new TurnTimeoutError(this.options.turnTimeoutMs)),
      this.options.turnTimeoutMs
    );
    const stopped = new Promise<typeof STOPPED>(resolve => {
      if (controller.signal.aborted) {
        resolve(STOPPED);
      } else {
        controller.signal.addEventListener('abort', () => resolve(STOPPED), { once: true });
      }
    });

    let content = '';
    let iterator: AsyncIterator<string> | undefined;
    let finished = false;
    try {
      const context = await this.contextBuilder.build(sessionId);
      iterator = this.provider.stream(persona, context, controller.signal)[Symbol.asyncIterator]();

      while (!controller.signal.aborted) {
        // A provider stuck waiting on its upstream must not hold the turn open
        const next = await Promise.race([iterator.next(), stopped]);
        if (next === STOPPED) break;
        if (next.done) {
          finished = true;
          break;
        }
        content += next.value;
        await request.onChunk(next.value);
      }
    } catch (error) {
      if (halt.reason) return { content, error: halt.reason };

      if (error instanceof ContentFilteredError && content === '') {
        Logger.engine(`Content filter refusal on session ${sessionId}`);
        const refusal = buildRefusalMessage(persona, error.categories);
        try {
          await request.onChunk(refusal);
        } catch (chunkError) {
          return { content: refusal, error: toChatError(chunkError) };
        }
        return { content: refusal };
      }

      Logger.error(`[Engine] Stream failed for session ${sessionId}:`, error);
      return { content, error: toChatError(error) };
    } finally {
      clearTimeout(timer);
      request.signal.removeEventListener('abort', onCallerAbort);
      if (!finished && iterator?.return) {
        iterator.return().catch((error: unknown) => {
          Logger.debug(`[Engine] Provider stream for session ${sessionId} failed while closing:`, error);
        });
      }
    }

    if (halt.reason) return { content, error: halt.reason };
    return { content };
  }

  private async persistPartial(sessionId: string, content: string): Promise<Message | undefined> {
    if (!content) return undefined;
    try {
      return await this.db.appendMessage(sessionId, 'assistant', content, { truncated: true });
    } catch (error) {
      Logger.error(`[Engine] Failed to store partial reply for session ${sessionId}:`, error);
      return undefined;
    }
  }
}

function toChatError(error: unknown): ChatError {
  if (error instanceof ChatError) return error;
  return new ProviderError(`Response stream failed: ${errorMessage(error)}`);
}
