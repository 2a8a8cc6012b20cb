import { z } from 'zod';
import { MessageSchema, SessionSchema } from '@persona-chat/shared';

// Dates are ISO strings on disk
const SessionCreatedData = SessionSchema.omit({ updatedAt: true }).extend({
  createdAt: z.coerce.date()
});

const StoredMessageData = MessageSchema.extend({
  createdAt: z.coerce.date()
});

export const StoredEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('session_created'),
    timestamp: z.coerce.date(),
    data: SessionCreatedData
  }),
  z.object({
    type: z.literal('session_renamed'),
    timestamp: z.coerce.date(),
    data: z.object({ sessionId: z.string(), title: z.string() })
  }),
  z.object({
    type: z.literal('session_touched'),
    timestamp: z.coerce.date(),
    data: z.object({ sessionId: z.string(), updatedAt: z.coerce.date() })
  }),
  z.object({
    type: z.literal('session_deleted'),
    timestamp: z.coerce.date(),
    data: z.object({ sessionId: z.string() })
  }),
  z.object({
    type: z.literal('message_created'),
    timestamp: z.coerce.date(),
    data: StoredMessageData
  })
]);

export type StoredEvent = z.infer<typeof StoredEventSchema>;
export type StoredEventType = StoredEvent['type'];
