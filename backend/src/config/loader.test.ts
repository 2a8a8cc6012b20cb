import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigLoader, applyEnvOverrides } from './loader.js';

let scratch: string;

async function writeConfig(config: unknown): Promise<string> {
  const configPath = join(scratch, 'config.json');
  await writeFile(configPath, JSON.stringify(config, null, 2));
  return configPath;
}

describe('ConfigLoader', () => {
  beforeEach(async () => {
    scratch = await mkdtemp(join(tmpdir(), 'config-loader-test-'));
    ConfigLoader.resetInstance();
  });

  afterEach(async () => {
    ConfigLoader.resetInstance();
    await rm(scratch, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('falls back to defaults when the file is missing', async () => {
      const loader = ConfigLoader.getInstance({ CONFIG_PATH: join(scratch, 'missing.json') });
      const config = await loader.loadConfig();

      expect(config.server.port).toBe(3010);
      expect(config.chat.contextWindowMessages).toBe(20);
      expect(config.provider.type).toBe('mock');
      expect(config.storage.dataDir).toBe('./data');
    });

    it('loads values from CONFIG_PATH', async () => {
      const configPath = await writeConfig({
        chat: { contextWindowMessages: 8 },
        provider: { type: 'anthropic', model: 'claude-3-5-haiku-latest' },
      });
      const config = await ConfigLoader.getInstance({ CONFIG_PATH: configPath }).loadConfig();

      expect(config.chat.contextWindowMessages).toBe(8);
      expect(config.chat.turnTimeoutMs).toBe(120_000);
      expect(config.provider.type).toBe('anthropic');
      expect(config.provider.model).toBe('claude-3-5-haiku-latest');
    });

    it('lets environment variables override the file', async () => {
      const configPath = await writeConfig({ server: { port: 4000 }, auth: { jwtSecret: 'from-file' } });
      const config = await ConfigLoader.getInstance({
        CONFIG_PATH: configPath,
        PORT: '5000',
        JWT_SECRET: 'test-secret',
      }).loadConfig();

      expect(config.server.port).toBe(5000);
      expect(config.auth.jwtSecret).toBe('test-secret');
    });

    it('rejects an unknown provider type', async () => {
      const configPath = await writeConfig({ provider: { type: 'carrier-pigeon' } });
      await expect(ConfigLoader.getInstance({ CONFIG_PATH: configPath }).loadConfig()).rejects.toThrow();
    });

    it('rejects malformed JSON', async () => {
      const configPath = join(scratch, 'config.json');
      await writeFile(configPath, '{ not json');
      await expect(ConfigLoader.getInstance({ CONFIG_PATH: configPath }).loadConfig()).rejects.toThrow(SyntaxError);
    });

    it('caches the loaded config until reloaded', async () => {
      const configPath = await writeConfig({ chat: { contextWindowMessages: 4 } });
      const loader = ConfigLoader.getInstance({ CONFIG_PATH: configPath });
      const first = await loader.loadConfig();

      await writeConfig({ chat: { contextWindowMessages: 6 } });
      expect(await loader.loadConfig()).toBe(first);

      const reloaded = await loader.reloadConfig();
      expect(reloaded.chat.contextWindowMessages).toBe(6);
    });
  });

  describe('getInstance', () => {
    it('returns the same instance until reset', () => {
      const a = ConfigLoader.getInstance({});
      expect(ConfigLoader.getInstance({})).toBe(a);
      ConfigLoader.resetInstance();
      expect(ConfigLoader.getInstance({})).not.toBe(a);
    });
  });
});

describe('applyEnvOverrides', () => {
  it('ignores empty variables', () => {
    expect(applyEnvOverrides({ server: { host: 'a' } }, { HOST: '' })).toEqual({ server: { host: 'a' } });
  });

  it('creates a section that the file lacks', () => {
    expect(applyEnvOverrides({}, { AZURE_OPENAI_DEPLOYMENT: 'chat-prod' })).toEqual({
      provider: { deployment: 'chat-prod' },
    });
  });

  it('does not mutate the file config', () => {
    const file = { chat: { turnTimeoutMs: 10 } };
    applyEnvOverrides(file, { TURN_TIMEOUT_MS: '20' });
    expect(file).toEqual({ chat: { turnTimeoutMs: 10 } });
  });
});
