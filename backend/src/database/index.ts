import { v4 as uuidv4 } from 'uuid';
import path from 'path';
import type { Message, MessageRole, Session } from '@persona-chat/shared';
import { BulkEventStore } from './bulk-event-store.js';
import type { Event } from './persistence.js';
import type { PersonaLookup } from '../services/persona-registry.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { Logger } from '../utils/logger.js';
import { InvalidPersonaError, NotFoundError, StorageError, errorMessage } from '../utils/errors.js';
import { SUCCESS_MESSAGES } from '../utils/error-messages.js';

export interface DatabaseOptions {
  dataDir: string;
  personas: PersonaLookup;
  maxFilesOpened?: number;
}

export interface AppendMessageOptions {
  truncated?: boolean;
}

/**
 * Conversation store. Sessions and messages live in memory and are rebuilt
 * from JSON-lines event files:
 *
 *   users/<ownerId>.jsonl       session_created / renamed / touched / deleted
 *   sessions/<sessionId>.jsonl  message_created
 *
 * Session metadata is replayed at init; message files load on first access.
 * Every write reaches disk before memory changes.
 */
export class Database {
  private sessions: Map<string, Session> = new Map();
  private userSessions: Map<string, Set<string>> = new Map(); // ownerId -> sessionIds
  private sessionMessages: Map<string, Message[]> = new Map(); // sessionId -> messages, once loaded

  // per user, contains session metadata events
  private userEventStore: BulkEventStore;
  // per session, contains message events
  private sessionEventStore: BulkEventStore;
  private personas: PersonaLookup;
  // Appends, deletes and lazy loads for one session run one at a time
  private sessionLocks = new KeyedMutex();
  private initialized: boolean = false;

  constructor(options: DatabaseOptions) {
    const maxFilesOpened = options.maxFilesOpened ?? 200;
    // Split the handle budget between the two stores
    const perStore = Math.max(1, Math.floor(maxFilesOpened / 2));
    this.userEventStore = new BulkEventStore(path.join(options.dataDir, 'users'), perStore);
    this.sessionEventStore = new BulkEventStore(path.join(options.dataDir, 'sessions'), perStore);
    this.personas = options.personas;
  }

  async init(): Promise<void> {
    if (this.initialized) return;

    await this.userEventStore.init();
    await this.sessionEventStore.init();

    for await (const { events } of this.userEventStore.loadAllEvents()) {
      for (const event of events) {
        this.replayEvent(event);
      }
    }

    await this.removeOrphanedMessageFiles();

    this.initialized = true;
    Logger.store(SUCCESS_MESSAGES.DATABASE_INITIALIZED(this.sessions.size));
  }

  // Deletion removes the message file after the commit point; a crash in
  // between leaves a file that no live session references
  private async removeOrphanedMessageFiles(): Promise<void> {
    for (const sessionId of await this.sessionEventStore.listIds()) {
      if (!this.sessions.has(sessionId)) {
        Logger.store(`Removing orphaned message file for session ${sessionId}`);
        await this.sessionEventStore.deleteEvents(sessionId);
      }
    }
  }

  private replayEvent(event: Event): void {
    switch (event.type) {
      case 'session_created': {
        const session: Session = { ...event.data, updatedAt: event.data.createdAt };
        this.sessions.set(session.id, session);
        this.indexSession(session);
        break;
      }

      case 'session_renamed': {
        const session = this.sessions.get(event.data.sessionId);
        if (session) {
          session.title = event.data.title;
        }
        break;
      }

      case 'session_touched': {
        const session = this.sessions.get(event.data.sessionId);
        if (session && event.data.updatedAt > session.updatedAt) {
          session.updatedAt = event.data.updatedAt;
        }
        break;
      }

      case 'session_deleted': {
        this.forgetSession(event.data.sessionId);
        break;
      }

      case 'message_created': {
        const messages = this.sessionMessages.get(event.data.sessionId);
        messages?.push({ ...event.data });
        break;
      }
    }
  }

  private indexSession(session: Session): void {
    let ids = this.userSessions.get(session.ownerId);
    if (!ids) {
      ids = new Set();
      this.userSessions.set(session.ownerId, ids);
    }
    ids.add(session.id);
  }

  // One synchronous step: no reader can observe a session without its messages
  private forgetSession(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    this.sessions.delete(sessionId);
    this.userSessions.get(session.ownerId)?.delete(sessionId);
    this.sessionMessages.delete(sessionId);
  }

  private async writeEvent(store: BulkEventStore, id: string, event: Event): Promise<void> {
    try {
      await store.appendEvent(id, event);
    } catch (error) {
      Logger.error(`[Database] Failed to write ${event.type} for ${id}:`, error);
      throw new StorageError(`Failed to persist ${event.type}: ${errorMessage(error)}`, { cause: error });
    }
  }

  // Ownership and existence collapse into one NotFound
  private getOwnedSession(ownerId: string, sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session || session.ownerId !== ownerId) {
      throw new NotFoundError(sessionId);
    }
    return session;
  }

  // Caller holds the session lock
  private async ensureMessagesLoaded(sessionId: string): Promise<Message[]> {
    const loaded = this.sessionMessages.get(sessionId);
    if (loaded) return loaded;

    let events: Event[];
    try {
      events = await this.sessionEventStore.loadEvents(sessionId);
    } catch (error) {
      throw new StorageError(`Failed to load messages for session ${sessionId}: ${errorMessage(error)}`, { cause: error });
    }

    const messages: Message[] = [];
    for (const event of events) {
      if (event.type === 'message_created') {
        messages.push({ ...event.data });
      }
    }
    messages.sort((a, b) => a.sequence - b.sequence);
    this.sessionMessages.set(sessionId, messages);

    // A failed touch write can leave updatedAt behind the last message
    const session = this.sessions.get(sessionId);
    const last = messages[messages.length - 1];
    if (session && last && last.createdAt > session.updatedAt) {
      session.updatedAt = last.createdAt;
    }

    Logger.debug(`[Database] Loaded ${messages.length} messages for session ${sessionId}`);
    return messages;
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  async createSession(ownerId: string, personaId: string, title: string): Promise<Session> {
    if (!this.personas.has(personaId)) {
      throw new InvalidPersonaError(personaId);
    }

    const now = new Date();
    const session: Session = {
      id: uuidv4(),
      ownerId,
      title,
      personaId,
      createdAt: now,
      updatedAt: now
    };

    await this.writeEvent(this.userEventStore, ownerId, {
      type: 'session_created',
      timestamp: now,
      data: {
        id: session.id,
        ownerId,
        title,
        personaId,
        createdAt: now
      }
    });

    this.sessions.set(session.id, session);
    this.indexSession(session);
    this.sessionMessages.set(session.id, []); // Nothing on disk to load yet

    Logger.store(`Created session ${session.id} for ${ownerId} (persona ${personaId})`);
    return { ...session };
  }

  async listSessions(ownerId: string, limit?: number): Promise<Session[]> {
    const ids = this.userSessions.get(ownerId) ?? new Set<string>();
    const sessions: Session[] = [];
    for (const id of ids) {
      const session = this.sessions.get(id);
      if (session) sessions.push({ ...session });
    }

    sessions.sort((a, b) =>
      b.updatedAt.getTime() - a.updatedAt.getTime() ||
      b.createdAt.getTime() - a.createdAt.getTime() ||
      a.id.localeCompare(b.id)
    );

    return limit === undefined ? sessions : sessions.slice(0, limit);
  }

  async getSession(ownerId: string, sessionId: string): Promise<Session> {
    return { ...this.getOwnedSession(ownerId, sessionId) };
  }

  // Owner-agnostic lookup for callers that have already checked ownership
  async getSessionById(sessionId: string): Promise<Session> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError(sessionId);
    }
    return { ...session };
  }

  async renameSession(ownerId: string, sessionId: string, newTitle: string): Promise<Session> {
    return this.sessionLocks.runExclusive(sessionId, async () => {
      const session = this.getOwnedSession(ownerId, sessionId);
      await this.writeEvent(this.userEventStore, ownerId, {
        type: 'session_renamed',
        timestamp: new Date(),
        data: { sessionId, title: newTitle }
      });
      session.title = newTitle; // updatedAt tracks messages only
      return { ...session };
    });
  }

  async deleteSession(ownerId: string, sessionId: string): Promise<void> {
    await this.sessionLocks.runExclusive(sessionId, async () => {
      this.getOwnedSession(ownerId, sessionId);

      // Commit point
      await this.writeEvent(this.userEventStore, ownerId, {
        type: 'session_deleted',
        timestamp: new Date(),
        data: { sessionId }
      });
      this.forgetSession(sessionId);

      try {
        await this.sessionEventStore.deleteEvents(sessionId);
      } catch (error) {
        // Already deleted logically; the orphan sweep at next start removes the file
        Logger.error(`[Database] Failed to remove message file for session ${sessionId}:`, error);
      }
      Logger.store(`Deleted session ${sessionId}`);
    });
  }

  // ==========================================================================
  // Messages
  // ==========================================================================

  async appendMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    options: AppendMessageOptions = {}
  ): Promise<Message> {
    return this.sessionLocks.runExclusive(sessionId, async () => {
      // Re-checked under the lock: a delete may have committed while we waited
      const session = this.sessions.get(sessionId);
      if (!session) {
        throw new NotFoundError(sessionId);
      }

      const messages = await this.ensureMessagesLoaded(sessionId);
      const last = messages[messages.length - 1];
      const message: Message = {
        id: uuidv4(),
        sessionId,
        role,
        content,
        createdAt: new Date(),
        sequence: last ? last.sequence + 1 : 1,
        ...(options.truncated && { truncated: true })
      };

      await this.writeEvent(this.sessionEventStore, sessionId, {
        type: 'message_created',
        timestamp: message.createdAt,
        data: message
      });

      messages.push(message);
      // Strictly advances, even for appends within the same millisecond
      session.updatedAt = new Date(Math.max(message.createdAt.getTime(), session.updatedAt.getTime() + 1));

      // The message is committed; a lost touch only affects ordering until the file is next loaded
      try {
        await this.userEventStore.appendEvent(session.ownerId, {
          type: 'session_touched',
          timestamp: message.createdAt,
          data: { sessionId, updatedAt: session.updatedAt }
        });
      } catch (error) {
        Logger.warn(`[Database] Failed to record updatedAt for session ${sessionId}:`, error);
      }

      return { ...message };
    });
  }

  async listMessages(sessionId: string, ownerId: string): Promise<Message[]> {
    this.getOwnedSession(ownerId, sessionId);
    const messages = await this.sessionLocks.runExclusive(sessionId, async () => {
      if (!this.sessions.has(sessionId)) {
        throw new NotFoundError(sessionId);
      }
      return this.ensureMessagesLoaded(sessionId);
    });
    return messages.map(message => ({ ...message }));
  }

  // Oldest-first tail of at most `limit` messages
  async getRecentMessages(sessionId: string, limit: number): Promise<Message[]> {
    const messages = await this.sessionLocks.runExclusive(sessionId, async () => {
      if (!this.sessions.has(sessionId)) {
        throw new NotFoundError(sessionId);
      }
      return this.ensureMessagesLoaded(sessionId);
    });
    if (limit <= 0) return [];
    return messages.slice(-limit).map(message => ({ ...message }));
  }

  async close(): Promise<void> {
    await this.userEventStore.close();
    await this.sessionEventStore.close();
  }
}
