import { Router } from 'express';
import {
  CreateSessionRequestSchema,
  ListSessionsQuerySchema,
  RenameSessionRequestSchema,
  toMessageDto,
  toSessionDto
} from '@persona-chat/shared';
import type { AuthRequest } from '../middleware/auth.js';
import type { SessionManager } from '../services/session-manager.js';
import { requireUser, sendRouteError } from './route-errors.js';

export function sessionRouter(sessions: SessionManager): Router {
  const router = Router();

  // List the user's sessions, most recently active first
  router.get('/', async (req: AuthRequest, res) => {
    try {
      const userId = requireUser(req);
      const { limit } = ListSessionsQuerySchema.parse(req.query);
      const list = await sessions.listSessions(userId, limit);
      res.json(list.map(toSessionDto));
    } catch (error) {
      sendRouteError(res, error, 'List sessions');
    }
  });

  router.post('/', async (req: AuthRequest, res) => {
    try {
      const userId = requireUser(req);
      const data = CreateSessionRequestSchema.parse(req.body);
      const session = await sessions.createSession(userId, data.personaId, data.title);
      res.status(201).json(toSessionDto(session));
    } catch (error) {
      sendRouteError(res, error, 'Create session');
    }
  });

  router.get('/:id', async (req: AuthRequest, res) => {
    try {
      const userId = requireUser(req);
      const session = await sessions.getSession(userId, req.params.id);
      res.json(toSessionDto(session));
    } catch (error) {
      sendRouteError(res, error, 'Get session');
    }
  });

  // Rename only; persona and history are fixed
  router.patch('/:id', async (req: AuthRequest, res) => {
    try {
      const userId = requireUser(req);
      const { title } = RenameSessionRequestSchema.parse(req.body);
      const session = await sessions.renameSession(userId, req.params.id, title);
      res.json(toSessionDto(session));
    } catch (error) {
      sendRouteError(res, error, 'Rename session');
    }
  });

  router.delete('/:id', async (req: AuthRequest, res) => {
    try {
      const userId = requireUser(req);
      await sessions.deleteSession(userId, req.params.id);
      res.json({ success: true });
    } catch (error) {
      sendRouteError(res, error, 'Delete session');
    }
  });

  router.get('/:id/messages', async (req: AuthRequest, res) => {
    try {
      const userId = requireUser(req);
      const messages = await sessions.listMessages(userId, req.params.id);
      res.json(messages.map(toMessageDto));
    } catch (error) {
      sendRouteError(res, error, 'List messages');
    }
  });

  return router;
}
