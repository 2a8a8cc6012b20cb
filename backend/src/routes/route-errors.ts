import type { Response } from 'express';
import { z } from 'zod';
import type { AuthRequest } from '../middleware/auth.js';
import { ChatError, UnauthorizedError } from '../utils/errors.js';
import { USER_FACING_ERRORS } from '../utils/error-messages.js';
import { Logger } from '../utils/logger.js';

export function requireUser(req: AuthRequest): string {
  if (!req.userId) {
    throw new UnauthorizedError();
  }
  return req.userId;
}

// ChatError keeps its status and code; anything unexpected is logged and hidden
export function sendRouteError(res: Response, error: unknown, action: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({ error: USER_FACING_ERRORS.INVALID_INPUT.message, code: 'INVALID_INPUT', details: error.errors });
    return;
  }
  if (error instanceof ChatError) {
    if (error.status >= 500) {
      Logger.error(`${action} error:`, error);
    }
    res.status(error.status).json({ error: error.message, code: error.code });
    return;
  }
  Logger.error(`${action} error:`, error);
  res.status(500).json({ error: USER_FACING_ERRORS.INTERNAL.message, code: 'INTERNAL' });
}
