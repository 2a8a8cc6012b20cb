import { z } from 'zod';
import { ErrorCodeSchema } from './types.js';
import type { ErrorCode, Message, Session } from './types.js';

export const DEFAULT_SESSION_TITLE = 'New Chat';
export const MAX_SESSION_TITLE_LENGTH = 200;
// Titles derived from a first message are cut to this many characters plus an ellipsis
export const DERIVED_TITLE_LENGTH = 35;

// Session CRUD
export const CreateSessionRequestSchema = z.object({
  personaId: z.string().min(1),
  title: z.string().max(MAX_SESSION_TITLE_LENGTH).optional()
});

export type CreateSessionRequest = z.infer<typeof CreateSessionRequestSchema>;

export const RenameSessionRequestSchema = z.object({
  title: z.string().trim().min(1).max(MAX_SESSION_TITLE_LENGTH)
});

export type RenameSessionRequest = z.infer<typeof RenameSessionRequestSchema>;

export const ListSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).optional()
});

// Chat turn (SSE endpoint body)
export const ChatTurnRequestSchema = z.object({
  sessionId: z.string().uuid().optional(),
  personaId: z.string().min(1).optional(), // Starts a fresh session when sessionId is absent
  text: z.string().trim().min(1)
}).refine(data => data.sessionId !== undefined || data.personaId !== undefined, {
  message: 'Either sessionId or personaId is required',
  path: ['sessionId']
});

export type ChatTurnRequest = z.infer<typeof ChatTurnRequestSchema>;

// WebSocket client -> server
export const WsMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('chat'),
    sessionId: z.string().uuid().optional(),
    personaId: z.string().min(1).optional(),
    content: z.string().trim().min(1)
  }),
  z.object({
    type: z.literal('abort'),
    sessionId: z.string().uuid()
  })
]);

export type WsMessage = z.infer<typeof WsMessageSchema>;

// JSON wire shapes (dates serialized as ISO strings)
export type SessionDto = Omit<Session, 'createdAt' | 'updatedAt'> & {
  createdAt: string;
  updatedAt: string;
};

export type MessageDto = Omit<Message, 'createdAt'> & {
  createdAt: string;
};

export function toSessionDto(session: Session): SessionDto {
  return {
    ...session,
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString()
  };
}

export function toMessageDto(message: Message): MessageDto {
  return {
    ...message,
    createdAt: message.createdAt.toISOString()
  };
}

export const ErrorResponseSchema = z.object({
  error: z.string(),
  code: ErrorCodeSchema,
  suggestion: z.string().optional()
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// WebSocket server -> client
export type WsServerMessage =
  | { type: 'connected'; userId: string }
  | { type: 'turn_started'; sessionId: string; session: SessionDto; userMessage: MessageDto }
  | { type: 'stream'; sessionId: string; content: string }
  | { type: 'stream_end'; sessionId: string; message: MessageDto }
  | { type: 'generation_aborted'; sessionId: string; success: boolean }
  | { type: 'error'; sessionId?: string; code: ErrorCode; error: string; suggestion?: string };
