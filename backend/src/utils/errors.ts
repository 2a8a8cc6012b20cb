import { ZodError } from 'zod';
import type { ErrorCode } from '@persona-chat/shared';
import { USER_FACING_ERRORS } from './error-messages.js';
import type { FlaggedCategory } from '../services/content-filter.js';

// Base for every error the chat core raises; `code` travels to clients
export class ChatError extends Error {
  constructor(public code: ErrorCode, message: string, public status: number) {
    super(message);
    this.name = 'ChatError';
  }
}

export class UnauthorizedError extends ChatError {
  constructor(message = USER_FACING_ERRORS.UNAUTHORIZED.message) {
    super('UNAUTHORIZED', message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends ChatError {
  constructor(public sessionId: string) {
    super('NOT_FOUND', USER_FACING_ERRORS.NOT_FOUND.message, 404);
    this.name = 'NotFoundError';
  }
}

export class InvalidPersonaError extends ChatError {
  constructor(public personaId: string) {
    super('INVALID_PERSONA', `${USER_FACING_ERRORS.INVALID_PERSONA.message}: ${personaId}`, 400);
    this.name = 'InvalidPersonaError';
  }
}

export class ValidationError extends ChatError {
  constructor(message: string) {
    super('INVALID_INPUT', message, 400);
    this.name = 'ValidationError';
  }
}

export class ProviderError extends ChatError {
  constructor(message: string, public upstreamStatus?: number, code: ErrorCode = 'PROVIDER_ERROR') {
    super(code, message, 502);
    this.name = 'ProviderError';
  }
}

// Upstream refused on content policy grounds
export class ContentFilteredError extends ProviderError {
  constructor(public categories: FlaggedCategory[] = [], message = USER_FACING_ERRORS.CONTENT_FILTERED.message) {
    super(message, 400, 'CONTENT_FILTERED');
    this.name = 'ContentFilteredError';
  }
}

export class StorageError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_ERROR', message, 500);
    this.name = 'StorageError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class TurnAbortedError extends ChatError {
  constructor() {
    super('ABORTED', USER_FACING_ERRORS.ABORTED.message, 499);
    this.name = 'TurnAbortedError';
  }
}

export class TurnTimeoutError extends ChatError {
  constructor(public timeoutMs: number) {
    super('TIMEOUT', `${USER_FACING_ERRORS.TIMEOUT.message} after ${timeoutMs}ms`, 504);
    this.name = 'TurnTimeoutError';
  }
}

export interface ErrorPayload {
  code: ErrorCode;
  error: string;
  suggestion: string;
}

// Shape sent over SSE and WebSocket; unknown errors never leak their message
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof ChatError) {
    return { code: error.code, error: error.message, suggestion: USER_FACING_ERRORS[error.code].suggestion };
  }
  if (error instanceof ZodError) {
    return {
      code: 'INVALID_INPUT',
      error: USER_FACING_ERRORS.INVALID_INPUT.message,
      suggestion: USER_FACING_ERRORS.INVALID_INPUT.suggestion
    };
  }
  return {
    code: 'INTERNAL',
    error: USER_FACING_ERRORS.INTERNAL.message,
    suggestion: USER_FACING_ERRORS.INTERNAL.suggestion
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
