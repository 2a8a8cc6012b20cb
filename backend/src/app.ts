import express from 'express';
import compression from 'compression';
import cors from 'cors';
import type { AppConfig } from './config/types.js';
import { Database } from './database/index.js';
import { authenticateToken } from './middleware/auth.js';
import { sessionRouter } from './routes/sessions.js';
import { personaRouter } from './routes/personas.js';
import { chatRouter } from './routes/chat.js';
import type { PersonaRegistry } from './services/persona-registry.js';
import { ContextBuilder } from './services/context-builder.js';
import { SessionManager } from './services/session-manager.js';
import { StreamingChatEngine } from './services/chat-engine.js';
import { createModelProvider } from './services/model-provider.js';
import type { ModelProvider } from './services/model-provider.js';

export interface AppServices {
  db: Database;
  personas: PersonaRegistry;
  provider: ModelProvider;
  sessions: SessionManager;
  engine: StreamingChatEngine;
}

// The database still needs init() before serving
export function createServices(config: AppConfig, personas: PersonaRegistry, provider?: ModelProvider): AppServices {
  const db = new Database({
    dataDir: config.storage.dataDir,
    personas,
    maxFilesOpened: config.storage.maxFilesOpened
  });
  const model = provider ?? createModelProvider(config.provider);
  const contextBuilder = new ContextBuilder(db, personas, config.chat.contextWindowMessages);

  return {
    db,
    personas,
    provider: model,
    sessions: new SessionManager(db, config.chat.sessionListLimit),
    engine: new StreamingChatEngine(db, personas, contextBuilder, model, {
      turnTimeoutMs: config.chat.turnTimeoutMs
    })
  };
}

export function createApp(services: AppServices, frontendUrl: string): express.Express {
  const app = express();

  app.use(compression({
    threshold: 1024,
    level: 6,
    // Event streams must reach the client chunk by chunk
    filter: (req, res) => {
      if (req.headers['x-no-compression']) {
        return false;
      }
      if (String(res.getHeader('Content-Type') ?? '').startsWith('text/event-stream')) {
        return false;
      }
      return compression.filter(req, res);
    }
  }));
  app.use(cors({
    origin: frontendUrl,
    credentials: true
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use('/api/personas', personaRouter(services.personas));
  app.use('/api/sessions', authenticateToken, sessionRouter(services.sessions));
  app.use('/api/chat', authenticateToken, chatRouter(services.engine));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', provider: services.provider.type, timestamp: new Date().toISOString() });
  });

  return app;
}
