import express from 'express';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import supertest from 'supertest';
import type { PersonaConfig } from '@persona-chat/shared';
import { createApp, createServices } from '../app.js';
import type { AppServices } from '../app.js';
import { AppConfigSchema } from '../config/types.js';
import type { Database } from '../database/index.js';
import { configureAuth, generateToken } from '../middleware/auth.js';
import { PersonaRegistry } from '../services/persona-registry.js';
import { MockProvider } from '../services/mock-service.js';
import type { ModelProvider } from '../services/model-provider.js';

export const TEST_JWT_SECRET = 'test-secret';

export const TEST_PERSONAS: PersonaConfig[] = [
  {
    id: 'sunbeam',
    displayName: 'Sunbeam',
    description: 'Builds confidence',
    systemPrompt: 'You help children build confidence.'
  },
  {
    id: 'growth-ray',
    displayName: 'Growth Ray',
    systemPrompt: 'You are an expert in child development.'
  }
];

export interface TestContext {
  app: express.Express;
  services: AppServices;
  db: Database;
  request: supertest.Agent;
  tmpDir: string;
}

/**
 * Create a test Express app with a real Database backed by a temp directory.
 * The model defaults to an instant mock provider.
 */
export async function createTestApp(provider: ModelProvider = new MockProvider({ delayMs: 0 })): Promise<TestContext> {
  const tmpDir = await mkdtemp(path.join(tmpdir(), 'persona-chat-route-test-'));

  configureAuth({ jwtSecret: TEST_JWT_SECRET, tokenTtlSeconds: 3600 });
  const config = AppConfigSchema.parse({ storage: { dataDir: tmpDir } });
  const services = createServices(config, new PersonaRegistry(TEST_PERSONAS), provider);
  await services.db.init();

  const app = createApp(services, config.server.frontendUrl);
  const request = supertest(app);

  return { app, services, db: services.db, request, tmpDir };
}

/**
 * Clean up test context: close file handles, remove temp dir.
 */
export async function cleanupTestApp(ctx: TestContext): Promise<void> {
  await ctx.db.close();
  await rm(ctx.tmpDir, { recursive: true, force: true });
}

/**
 * Generate a token for a user directly.
 */
export function tokenForUser(userId: string): string {
  return generateToken(userId);
}

export interface SseEvent {
  event: string;
  data: unknown;
}

// Splits a buffered text/event-stream body into its events
export function parseSse(body: string): SseEvent[] {
  return body
    .split('\n\n')
    .filter(block => block.trim() !== '')
    .map(block => {
      let event = 'message';
      let data = '';
      for (const line of block.split('\n')) {
        if (line.startsWith('event: ')) event = line.slice('event: '.length);
        else if (line.startsWith('data: ')) data += line.slice('data: '.length);
      }
      return { event, data: JSON.parse(data) };
    });
}
