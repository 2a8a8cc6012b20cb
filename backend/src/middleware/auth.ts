import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import type { SignOptions } from 'jsonwebtoken';
import { z } from 'zod';
import { UnauthorizedError } from '../utils/errors.js';
import { DEFAULT_JWT_SECRET } from '../config/types.js';

export interface AuthRequest extends Request {
  userId?: string;
}

export interface AuthSettings {
  jwtSecret: string;
  tokenTtlSeconds: number;
}

const TokenPayloadSchema = z.object({
  userId: z.string().min(1)
});

let settings: AuthSettings = {
  jwtSecret: process.env.JWT_SECRET || DEFAULT_JWT_SECRET,
  tokenTtlSeconds: 7 * 24 * 60 * 60
};

// Called once at startup with the loaded config
export function configureAuth(next: AuthSettings): void {
  settings = { ...next };
}

export function getAuthSettings(): AuthSettings {
  return { ...settings };
}

export function generateToken(userId: string): string {
  const options: SignOptions = { algorithm: 'HS256', expiresIn: settings.tokenTtlSeconds };
  return jwt.sign({ userId }, settings.jwtSecret, options);
}

export function verifyToken(token: string): { userId: string } | null {
  if (!token) return null;
  try {
    const payload = jwt.verify(token, settings.jwtSecret, { algorithms: ['HS256'] });
    const parsed = TokenPayloadSchema.safeParse(payload);
    return parsed.success ? { userId: parsed.data.userId } : null;
  } catch {
    return null;
  }
}

/**
 * Authenticator: resolves bearer credentials to an owner id.
 * Accepts either a raw token or an `Authorization` header value.
 */
export function identify(credentials: string | undefined): string {
  const token = credentials?.startsWith('Bearer ') ? credentials.slice('Bearer '.length) : credentials;
  if (!token) {
    throw new UnauthorizedError('Access token required');
  }
  const verified = verifyToken(token.trim());
  if (!verified) {
    throw new UnauthorizedError('Invalid or expired token');
  }
  return verified.userId;
}

export function authenticateToken(req: AuthRequest, res: Response, next: NextFunction) {
  const authHeader = req.headers['authorization'];
  const token = authHeader && authHeader.split(' ')[1];

  if (!token) {
    return res.status(401).json({ error: 'Access token required', code: 'UNAUTHORIZED' });
  }

  const verified = verifyToken(token);
  if (!verified) {
    return res.status(403).json({ error: 'Invalid or expired token', code: 'UNAUTHORIZED' });
  }

  req.userId = verified.userId;
  next();
}
