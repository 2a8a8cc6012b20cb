// Loads .env before any module reads process.env
import 'dotenv/config';
import { WebSocketServer } from 'ws';
import { createServer as createHttpServer } from 'http';
import { ConfigLoader } from './config/loader.js';
import { DEFAULT_JWT_SECRET } from './config/types.js';
import { configureAuth } from './middleware/auth.js';
import { PersonaRegistry } from './services/persona-registry.js';
import { createApp, createServices } from './app.js';
import { startHeartbeat, websocketHandler } from './websocket/handler.js';
import { Logger, logSettings } from './utils/logger.js';
import { SERVER_ERRORS } from './utils/error-messages.js';

const HEARTBEAT_INTERVAL_MS = 30000;

async function startServer() {
  const config = await ConfigLoader.getInstance().loadConfig();
  logSettings();

  configureAuth(config.auth);
  if (config.auth.jwtSecret === DEFAULT_JWT_SECRET) {
    Logger.warn(SERVER_ERRORS.DEFAULT_JWT_SECRET);
  }

  const personas = await PersonaRegistry.fromFile(config.personas.file);
  const services = createServices(config, personas);
  await services.db.init();
  Logger.info(`Model provider: ${services.provider.type} (${services.provider.model})`);

  const app = createApp(services, config.server.frontendUrl);
  const server = createHttpServer(app);

  const wss = new WebSocketServer({
    server,
    perMessageDeflate: {
      zlibDeflateOptions: { level: 6 },
      // Compress messages larger than 1KB
      threshold: 1024
    }
  });
  wss.on('connection', (ws, req) => {
    websocketHandler(ws, req, services.engine);
  });
  const heartbeat = startHeartbeat(wss, HEARTBEAT_INTERVAL_MS);

  server.listen(config.server.port, config.server.host, () => {
    console.log(`HTTP Server running on ${config.server.host}:${config.server.port}`);
    console.log(`API endpoint: http://${config.server.host}:${config.server.port}/api`);
    console.log(`WebSocket endpoint: ws://${config.server.host}:${config.server.port}`);
  });

  // Handle graceful shutdown
  process.on('SIGINT', () => {
    console.log('Shutting down gracefully...');
    clearInterval(heartbeat);
    wss.close();
    server.close();
    services.db.close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        Logger.error('Failed to close database:', error);
        process.exit(1);
      });
  });
}

startServer().catch((error: unknown) => {
  Logger.error(SERVER_ERRORS.STARTUP_FAILED, error);
  process.exit(1);
});
