import { normalizeSessionTitle } from '@persona-chat/shared';
import type { Message, Session } from '@persona-chat/shared';
import type { Database } from '../database/index.js';
import { Logger } from '../utils/logger.js';

/**
 * Session lifecycle on top of the store. The persona is checked when a
 * session is created and never changes afterwards.
 */
export class SessionManager {
  constructor(
    private db: Database,
    private defaultListLimit: number
  ) {}

  async createSession(ownerId: string, personaId: string, title?: string): Promise<Session> {
    return this.db.createSession(ownerId, personaId, normalizeSessionTitle(title));
  }

  async listSessions(ownerId: string, limit?: number): Promise<Session[]> {
    return this.db.listSessions(ownerId, limit ?? this.defaultListLimit);
  }

  async getSession(ownerId: string, sessionId: string): Promise<Session> {
    return this.db.getSession(ownerId, sessionId);
  }

  async renameSession(ownerId: string, sessionId: string, title: string): Promise<Session> {
    return this.db.renameSession(ownerId, sessionId, normalizeSessionTitle(title));
  }

  // Irreversible: messages go with the session
  async deleteSession(ownerId: string, sessionId: string): Promise<void> {
    await this.db.deleteSession(ownerId, sessionId);
    Logger.debug(`[SessionManager] ${ownerId} deleted session ${sessionId}`);
  }

  async listMessages(ownerId: string, sessionId: string): Promise<Message[]> {
    return this.db.listMessages(sessionId, ownerId);
  }
}
