/**
 * Category logger. Each category is toggled through a LOG_* environment variable.
 */

export const LogCategories = {
  STORE: process.env.LOG_STORE !== 'false',        // On by default - session lifecycle, replay
  ENGINE: process.env.LOG_ENGINE !== 'false',      // On by default - turn state transitions
  PROVIDER: process.env.LOG_PROVIDER === 'true',   // Off by default - upstream requests
  WEBSOCKET: process.env.LOG_WEBSOCKET === 'true', // Off by default - socket traffic
  DEBUG: process.env.LOG_DEBUG === 'true',         // Off by default - noisy
  ALL: process.env.LOG_ALL === 'true'
} as const;

// Test runs stay quiet unless LOG_ALL is set
const quiet = process.env.NODE_ENV === 'test' && process.env.LOG_ALL !== 'true';

export class Logger {
  static store(...args: unknown[]) {
    if (!quiet && (LogCategories.ALL || LogCategories.STORE)) {
      console.log('[Store]', ...args);
    }
  }

  static engine(...args: unknown[]) {
    if (!quiet && (LogCategories.ALL || LogCategories.ENGINE)) {
      console.log('[Engine]', ...args);
    }
  }

  static provider(...args: unknown[]) {
    if (LogCategories.ALL || LogCategories.PROVIDER) {
      console.log('[Provider]', ...args);
    }
  }

  static websocket(...args: unknown[]) {
    if (LogCategories.ALL || LogCategories.WEBSOCKET) {
      console.log('[WebSocket]', ...args);
    }
  }

  static debug(...args: unknown[]) {
    if (LogCategories.ALL || LogCategories.DEBUG) {
      console.log(...args);
    }
  }

  static error(...args: unknown[]) {
    console.error(...args);
  }

  static warn(...args: unknown[]) {
    if (!quiet) {
      console.warn(...args);
    }
  }

  static info(...args: unknown[]) {
    if (!quiet) {
      console.log(...args);
    }
  }
}

export function logSettings(): void {
  console.log('📊 Log Settings:');
  console.log(`  Store: ${LogCategories.STORE ? '✅' : '❌'} (LOG_STORE)`);
  console.log(`  Engine: ${LogCategories.ENGINE ? '✅' : '❌'} (LOG_ENGINE)`);
  console.log(`  Provider: ${LogCategories.PROVIDER ? '✅' : '❌'} (LOG_PROVIDER)`);
  console.log(`  WebSocket: ${LogCategories.WEBSOCKET ? '✅' : '❌'} (LOG_WEBSOCKET)`);
  console.log(`  Debug: ${LogCategories.DEBUG ? '✅' : '❌'} (LOG_DEBUG)`);
  console.log('  To change: LOG_DEBUG=true LOG_STORE=false npm run dev\n');
}
