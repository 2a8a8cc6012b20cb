import { Router } from 'express';
import type { Response } from 'express';
import { ChatTurnRequestSchema, toMessageDto, toSessionDto } from '@persona-chat/shared';
import type { AuthRequest } from '../middleware/auth.js';
import type { StreamingChatEngine } from '../services/chat-engine.js';
import { toErrorPayload } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { requireUser, sendRouteError } from './route-errors.js';

function writeEvent(res: Response, event: string, data: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

/**
 * POST /send streams one turn as server-sent events:
 *
 *   event: session   the session (created on the fly when only personaId is sent)
 *   data: "<chunk>"  one JSON string per model chunk
 *   event: end       the stored assistant message
 *   event: error     {code, error, suggestion}; the stream then closes
 *
 * Errors before the user message is stored are plain JSON responses.
 */
export function chatRouter(engine: StreamingChatEngine): Router {
  const router = Router();

  router.post('/send', async (req: AuthRequest, res) => {
    let streaming = false;
    const controller = new AbortController();
    // Client went away before the reply finished
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const ownerId = requireUser(req);
      const data = ChatTurnRequestSchema.parse(req.body);

      const result = await engine.runTurn({
        ownerId,
        sessionId: data.sessionId,
        personaId: data.personaId,
        text: data.text,
        signal: controller.signal,
        onTurnStarted: session => {
          res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            'Connection': 'keep-alive'
          });
          streaming = true;
          writeEvent(res, 'session', toSessionDto(session));
        },
        onChunk: chunk => {
          res.write(`data: ${JSON.stringify(chunk)}\n\n`);
        }
      });

      if (result.error || !result.assistantMessage) {
        writeEvent(res, 'error', toErrorPayload(result.error));
      } else {
        writeEvent(res, 'end', toMessageDto(result.assistantMessage));
      }
      res.end();
    } catch (error) {
      if (!streaming) {
        sendRouteError(res, error, 'Chat turn');
        return;
      }
      Logger.error('Chat stream error:', error);
      writeEvent(res, 'error', toErrorPayload(error));
      res.end();
    }
  });

  return router;
}
