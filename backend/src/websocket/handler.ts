import { WebSocket } from 'ws';
import type { WebSocketServer } from 'ws';
import type { IncomingMessage } from 'http';
import { WsMessageSchema, toMessageDto, toSessionDto } from '@persona-chat/shared';
import type { WsMessage, WsServerMessage } from '@persona-chat/shared';
import type { StreamingChatEngine } from '../services/chat-engine.js';
import { identify } from '../middleware/auth.js';
import { ValidationError, toErrorPayload } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

// The parts of a ws socket the handler relies on
export interface ChatSocket {
  readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: unknown) => void): unknown;
  on(event: 'close' | 'pong', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

type ChatMessage = Extract<WsMessage, { type: 'chat' }>;

// A turn started from one socket. Turns on the same session run side by side,
// whether from one socket or several tabs; only the socket that started a turn
// can abort it.
interface ActiveTurn {
  controller: AbortController;
  sessionId?: string;
  abortRequested: boolean;
}

// Sockets that answered the last heartbeat ping
const alive = new WeakMap<ChatSocket, boolean>();

function send(ws: ChatSocket, message: WsServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function rawToString(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data.filter(Buffer.isBuffer)).toString('utf-8');
  return String(data);
}

export function websocketHandler(
  ws: ChatSocket,
  req: Pick<IncomingMessage, 'url' | 'headers'>,
  engine: StreamingChatEngine
): void {
  // Extract token from query params
  const url = new URL(req.url || '', `http://${req.headers.host || 'localhost'}`);

  let userId: string;
  try {
    userId = identify(url.searchParams.get('token') ?? undefined);
  } catch (error) {
    const payload = toErrorPayload(error);
    send(ws, { type: 'error', ...payload });
    ws.close(1008, payload.error);
    return;
  }

  alive.set(ws, true);
  // Turns started from this socket, aborted when it closes
  const socketTurns = new Set<ActiveTurn>();

  ws.on('pong', () => {
    alive.set(ws, true);
  });

  ws.on('message', async (data) => {
    let message: WsMessage;
    try {
      message = WsMessageSchema.parse(JSON.parse(rawToString(data)));
    } catch (error) {
      Logger.websocket(`Rejected message from ${userId}:`, error);
      const rejection = error instanceof SyntaxError ? new ValidationError('Message is not valid JSON') : error;
      send(ws, { type: 'error', ...toErrorPayload(rejection) });
      return;
    }

    switch (message.type) {
      case 'chat':
        await handleChatMessage(ws, userId, message, engine, socketTurns);
        break;

      case 'abort':
        handleAbort(ws, userId, message.sessionId, socketTurns);
        break;
    }
  });

  ws.on('close', () => {
    Logger.websocket(`WebSocket closed for user ${userId} (${socketTurns.size} turns in flight)`);
    for (const turn of socketTurns) {
      turn.controller.abort();
    }
    socketTurns.clear();
  });

  ws.on('error', (error) => {
    Logger.error('WebSocket error:', error);
  });

  // Send initial connection success
  send(ws, { type: 'connected', userId });
}

async function handleChatMessage(
  ws: ChatSocket,
  userId: string,
  message: ChatMessage,
  engine: StreamingChatEngine,
  socketTurns: Set<ActiveTurn>
): Promise<void> {
  const turn: ActiveTurn = {
    controller: new AbortController(),
    sessionId: message.sessionId,
    abortRequested: false
  };
  socketTurns.add(turn);

  try {
    const result = await engine.runTurn({
      ownerId: userId,
      sessionId: message.sessionId,
      personaId: message.personaId,
      text: message.content,
      signal: turn.controller.signal,
      onTurnStarted: (session, userMessage) => {
        // Sessions created by this turn only become abortable once they exist
        turn.sessionId = session.id;
        send(ws, {
          type: 'turn_started',
          sessionId: session.id,
          session: toSessionDto(session),
          userMessage: toMessageDto(userMessage)
        });
      },
      onChunk: (chunk) => {
        send(ws, { type: 'stream', sessionId: turn.sessionId ?? '', content: chunk });
      }
    });

    if (result.assistantMessage) {
      send(ws, { type: 'stream_end', sessionId: result.session.id, message: toMessageDto(result.assistantMessage) });
    }
    // A requested abort was already answered with generation_aborted
    if (result.error && !(result.error.code === 'ABORTED' && turn.abortRequested)) {
      send(ws, { type: 'error', sessionId: result.session.id, ...toErrorPayload(result.error) });
    }
  } catch (error) {
    Logger.websocket(`Turn rejected for ${userId}:`, error);
    send(ws, { type: 'error', ...(turn.sessionId && { sessionId: turn.sessionId }), ...toErrorPayload(error) });
  } finally {
    socketTurns.delete(turn);
  }
}

function handleAbort(ws: ChatSocket, userId: string, sessionId: string, socketTurns: Set<ActiveTurn>): void {
  let aborted = false;
  for (const turn of socketTurns) {
    if (turn.sessionId === sessionId && !turn.controller.signal.aborted) {
      turn.abortRequested = true;
      turn.controller.abort();
      aborted = true;
    }
  }
  Logger.websocket(`User ${userId} aborted generation for session ${sessionId}: ${aborted ? 'success' : 'no active generation'}`);

  send(ws, {
    type: 'generation_aborted',
    sessionId,
    success: aborted
  });
}

/**
 * Pings every client on an interval and drops the ones that did not answer
 * the previous ping.
 */
export function startHeartbeat(wss: WebSocketServer, intervalMs: number): NodeJS.Timeout {
  const timer = setInterval(() => {
    for (const client of wss.clients) {
      if (alive.get(client) === false) {
        Logger.websocket('Terminating unresponsive client');
        client.terminate();
        continue;
      }
      alive.set(client, false);
      client.ping();
    }
  }, intervalMs);
  timer.unref();
  return timer;
}
