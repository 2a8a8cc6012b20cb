import { describe, it, expect, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { generateToken, verifyToken, authenticateToken, configureAuth, identify } from './auth.js';
import type { AuthRequest } from './auth.js';
import { UnauthorizedError } from '../utils/errors.js';

const JWT_SECRET = 'test-secret';

const ClaimsSchema = z.object({ userId: z.string(), iat: z.number(), exp: z.number() });

function decodeClaims(token: string) {
  return ClaimsSchema.parse(jwt.decode(token));
}

function createApp() {
  const app = express();
  app.get('/me', authenticateToken, (req: AuthRequest, res) => {
    res.json({ userId: req.userId });
  });
  return app;
}

beforeEach(() => {
  configureAuth({ jwtSecret: JWT_SECRET, tokenTtlSeconds: 7 * 24 * 60 * 60 });
});

describe('generateToken', () => {
  it('returns a JWT containing the userId', () => {
    const token = generateToken('user-123');
    expect(decodeClaims(token).userId).toBe('user-123');
  });

  it('produces a token that jwt.verify accepts with the configured secret', () => {
    const token = generateToken('user-456');
    expect(() => jwt.verify(token, JWT_SECRET)).not.toThrow();
  });

  it('uses the configured lifetime', () => {
    configureAuth({ jwtSecret: JWT_SECRET, tokenTtlSeconds: 3600 });
    const claims = decodeClaims(generateToken('user-789'));
    expect(claims.exp - claims.iat).toBe(3600);
  });
});

describe('verifyToken', () => {
  it('returns { userId } for a valid token', () => {
    expect(verifyToken(generateToken('user-100'))).toEqual({ userId: 'user-100' });
  });

  it('returns null for a token signed with the wrong secret', () => {
    const wrongToken = jwt.sign({ userId: 'user-100' }, 'wrong-secret', { expiresIn: 60 });
    expect(verifyToken(wrongToken)).toBeNull();
  });

  it('returns null for an expired token', () => {
    const expiredToken = jwt.sign({ userId: 'user-100' }, JWT_SECRET, { expiresIn: -1 });
    expect(verifyToken(expiredToken)).toBeNull();
  });

  it('returns null for a malformed or empty token', () => {
    expect(verifyToken('not-a-real-token')).toBeNull();
    expect(verifyToken('')).toBeNull();
  });

  it('returns null when the userId claim is missing', () => {
    const token = jwt.sign({ sub: 'user-100' }, JWT_SECRET, { expiresIn: 60 });
    expect(verifyToken(token)).toBeNull();
  });

  it('returns null for a token with a tampered payload', () => {
    const parts = generateToken('user-legit').split('.');
    const payload = JSON.parse(Buffer.from(parts[1], 'base64url').toString());
    payload.userId = 'user-other';
    parts[1] = Buffer.from(JSON.stringify(payload)).toString('base64url');
    expect(verifyToken(parts.join('.'))).toBeNull();
  });
});

describe('identify', () => {
  it('accepts a bearer header value', () => {
    expect(identify(`Bearer ${generateToken('user-1')}`)).toBe('user-1');
  });

  it('accepts a raw token', () => {
    expect(identify(generateToken('user-2'))).toBe('user-2');
  });

  it('throws Unauthorized when credentials are missing', () => {
    expect(() => identify(undefined)).toThrow(UnauthorizedError);
    expect(() => identify(undefined)).toThrow('Access token required');
  });

  it('throws Unauthorized for an invalid token', () => {
    expect(() => identify('Bearer nope')).toThrow('Invalid or expired token');
  });
});

describe('authenticateToken', () => {
  it('sets req.userId for a valid token', async () => {
    const res = await request(createApp())
      .get('/me')
      .set('Authorization', `Bearer ${generateToken('user-200')}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ userId: 'user-200' });
  });

  it('returns 401 when no authorization header is present', async () => {
    const res = await request(createApp()).get('/me');
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Access token required', code: 'UNAUTHORIZED' });
  });

  it('returns 401 for "Bearer" with no token', async () => {
    const res = await request(createApp()).get('/me').set('Authorization', 'Bearer');
    expect(res.status).toBe(401);
  });

  it('returns 403 when the token is invalid', async () => {
    const res = await request(createApp()).get('/me').set('Authorization', 'Bearer invalid-token-here');
    expect(res.status).toBe(403);
    expect(res.body).toEqual({ error: 'Invalid or expired token', code: 'UNAUTHORIZED' });
  });

  it('returns 403 when the token is expired', async () => {
    const expiredToken = jwt.sign({ userId: 'user-200' }, JWT_SECRET, { expiresIn: -1 });
    const res = await request(createApp()).get('/me').set('Authorization', `Bearer ${expiredToken}`);
    expect(res.status).toBe(403);
  });
});
