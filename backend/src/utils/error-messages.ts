/**
 * Centralized error and warning messages.
 *
 * Single source of truth for user-facing wording. Review and update here
 * before deploying.
 *
 * Categories:
 * - PROVIDER: model provider configuration errors
 * - SERVER: startup and configuration errors
 * - USER_FACING: text returned to clients over HTTP, SSE and WebSocket
 */

import type { ErrorCode } from '@persona-chat/shared';

// =============================================================================
// PROVIDER ERRORS
// =============================================================================

export const PROVIDER_ERRORS = {
  API_KEY_MISSING: (provider: string) =>
    `⚠️ API KEY ERROR: No API key configured for the ${provider} provider. Set PROVIDER_API_KEY or provider.apiKey in config.json. API calls will fail.`,

  BASE_URL_MISSING: (provider: string) =>
    `⚠️ CONFIG ERROR: provider.baseUrl is required for the ${provider} provider.`,

  DEPLOYMENT_MISSING:
    '⚠️ CONFIG ERROR: provider.deployment is required for Azure OpenAI.',

  UPSTREAM_STATUS: (status: number, body: string) =>
    `Provider responded with ${status}: ${body}`,

  NO_BODY: 'Provider response has no body',
};

// =============================================================================
// SERVER ERRORS
// =============================================================================

export const SERVER_ERRORS = {
  DEFAULT_JWT_SECRET:
    '⚠️ SECURITY WARNING: auth.jwtSecret is the built-in default. Set JWT_SECRET before deploying.',

  STARTUP_FAILED: 'Failed to start server:',

  INVALID_PERSONA_FILE: (path: string) =>
    `Persona file ${path} is invalid`,

  DUPLICATE_PERSONA: (id: string) =>
    `Duplicate persona id "${id}"`,
};

// =============================================================================
// USER-FACING ERROR MESSAGES
// =============================================================================
// NOT_FOUND is deliberately the same whether the session is missing or belongs
// to someone else.
// =============================================================================

export interface UserFacingError {
  message: string;
  suggestion: string;
}

export const USER_FACING_ERRORS: Record<ErrorCode, UserFacingError> = {
  UNAUTHORIZED: {
    message: 'Authentication required',
    suggestion: 'Sign in again and retry.',
  },

  NOT_FOUND: {
    message: 'Session not found',
    suggestion: 'The session may have been deleted. Start a new one.',
  },

  INVALID_PERSONA: {
    message: 'Unknown persona',
    suggestion: 'Pick one of the personas listed by GET /api/personas.',
  },

  INVALID_INPUT: {
    message: 'Invalid input',
    suggestion: 'Check your input and try again.',
  },

  PROVIDER_ERROR: {
    message: 'Failed to generate response',
    suggestion: 'The AI provider returned an error. Please try again.',
  },

  CONTENT_FILTERED: {
    message: 'Content filtered',
    suggestion: 'The AI provider flagged this request. Try rephrasing.',
  },

  STORAGE_ERROR: {
    message: 'Failed to save message',
    suggestion: 'Your message was not stored. Please try again.',
  },

  ABORTED: {
    message: 'Generation stopped',
    suggestion: 'Any partial reply has been saved.',
  },

  TIMEOUT: {
    message: 'Request timed out',
    suggestion: 'The model took too long to respond. Any partial reply has been saved.',
  },

  INTERNAL: {
    message: 'Internal server error',
    suggestion: 'Please try again. If the problem persists, contact support.',
  },
};

// =============================================================================
// SUCCESS MESSAGES
// =============================================================================

export const SUCCESS_MESSAGES = {
  DATABASE_INITIALIZED: (sessions: number) =>
    `Database initialized (${sessions} sessions)`,

  PERSONAS_LOADED: (count: number, path: string) =>
    `Loaded ${count} personas from ${path}`,
};
