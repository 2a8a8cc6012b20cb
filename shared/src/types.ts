import { z } from 'zod';

// Persona types
export const PersonaSafetySchema = z.object({
  role: z.string().min(1),
  suggestion: z.string().min(1)
});

export type PersonaSafety = z.infer<typeof PersonaSafetySchema>;

export const PersonaConfigSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'Persona ids are lowercase kebab-case'),
  displayName: z.string().min(1),
  systemPrompt: z.string().min(1),
  description: z.string().optional(),
  safety: PersonaSafetySchema.optional() // Wording used when the provider refuses on content policy
});

export type PersonaConfig = z.infer<typeof PersonaConfigSchema>;

// Public view of a persona (system prompts stay server-side)
export const PersonaSummarySchema = PersonaConfigSchema.pick({
  id: true,
  displayName: true,
  description: true
});

export type PersonaSummary = z.infer<typeof PersonaSummarySchema>;

export function toPersonaSummary(persona: PersonaConfig): PersonaSummary {
  return {
    id: persona.id,
    displayName: persona.displayName,
    ...(persona.description !== undefined && { description: persona.description })
  };
}

// Session types
export const SessionSchema = z.object({
  id: z.string().uuid(),
  ownerId: z.string().min(1),
  title: z.string(),
  personaId: z.string(),
  createdAt: z.date(),
  updatedAt: z.date() // Bumped by message appends only
});

export type Session = z.infer<typeof SessionSchema>;

// Message types
export const MessageRoleSchema = z.enum(['user', 'assistant']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export const MessageSchema = z.object({
  id: z.string().uuid(),
  sessionId: z.string().uuid(),
  role: MessageRoleSchema,
  content: z.string(),
  createdAt: z.date(),
  sequence: z.number().int().positive(), // 1-based, gapless within a session
  truncated: z.boolean().optional() // Assistant reply committed from a turn that ended early
});

export type Message = z.infer<typeof MessageSchema>;

// Prompt context handed to model providers
export const PromptRoleSchema = z.enum(['system', 'user', 'assistant']);
export type PromptRole = z.infer<typeof PromptRoleSchema>;

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface PromptContext {
  sessionId: string;
  persona: PersonaConfig;
  messages: PromptMessage[]; // [system, ...window], oldest first
}

// Chat turn lifecycle
export const TurnStateSchema = z.enum([
  'idle',
  'validating',
  'persisting_user_message',
  'streaming',
  'finalizing',
  'done',
  'errored'
]);

export type TurnState = z.infer<typeof TurnStateSchema>;

// Error codes shared by REST, SSE and WebSocket responses
export const ErrorCodeSchema = z.enum([
  'UNAUTHORIZED',
  'NOT_FOUND',
  'INVALID_PERSONA',
  'INVALID_INPUT',
  'PROVIDER_ERROR',
  'CONTENT_FILTERED',
  'STORAGE_ERROR',
  'ABORTED',
  'TIMEOUT',
  'INTERNAL'
]);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;
