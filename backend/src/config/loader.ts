import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { AppConfigSchema } from './types.js';
import type { AppConfig } from './types.js';
import { Logger } from '../utils/logger.js';
import { isErrnoCode } from '../utils/errors.js';

type Section = keyof AppConfig;

// Environment variables that override config.json, by section and key
const ENV_OVERRIDES: Record<string, [Section, string]> = {
  PORT: ['server', 'port'],
  HOST: ['server', 'host'],
  FRONTEND_URL: ['server', 'frontendUrl'],
  JWT_SECRET: ['auth', 'jwtSecret'],
  JWT_TTL_SECONDS: ['auth', 'tokenTtlSeconds'],
  DATA_DIR: ['storage', 'dataDir'],
  MAX_FILES_OPENED: ['storage', 'maxFilesOpened'],
  CONTEXT_WINDOW_MESSAGES: ['chat', 'contextWindowMessages'],
  TURN_TIMEOUT_MS: ['chat', 'turnTimeoutMs'],
  SESSION_LIST_LIMIT: ['chat', 'sessionListLimit'],
  MODEL_PROVIDER: ['provider', 'type'],
  PROVIDER_API_KEY: ['provider', 'apiKey'],
  PROVIDER_BASE_URL: ['provider', 'baseUrl'],
  PROVIDER_MODEL: ['provider', 'model'],
  AZURE_OPENAI_DEPLOYMENT: ['provider', 'deployment'],
  AZURE_OPENAI_API_VERSION: ['provider', 'apiVersion'],
  MOCK_DELAY_MS: ['provider', 'mockDelayMs'],
  PERSONAS_FILE: ['personas', 'file']
};

const RawConfigSchema = z.record(z.string(), z.record(z.string(), z.unknown()));
type RawConfig = z.infer<typeof RawConfigSchema>;

export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private config: AppConfig | null = null;
  private configPath: string;

  private constructor(private env: NodeJS.ProcessEnv) {
    // Look for config in these locations (in order):
    // 1. Environment variable CONFIG_PATH
    // 2. ./config/config.json
    this.configPath = env.CONFIG_PATH || join(process.cwd(), 'config', 'config.json');
  }

  static getInstance(env: NodeJS.ProcessEnv = process.env): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader(env);
    }
    return ConfigLoader.instance;
  }

  // Tests build a fresh loader per case
  static resetInstance(): void {
    ConfigLoader.instance = undefined;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async loadConfig(): Promise<AppConfig> {
    if (this.config) {
      return this.config;
    }

    const fileConfig = await this.readConfigFile();
    this.config = AppConfigSchema.parse(applyEnvOverrides(fileConfig, this.env));
    return this.config;
  }

  /**
   * Reload configuration from disk
   */
  async reloadConfig(): Promise<AppConfig> {
    this.config = null;
    return this.loadConfig();
  }

  // config.json is optional; a missing file means defaults plus environment
  private async readConfigFile(): Promise<RawConfig> {
    let configData: string;
    try {
      configData = await readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        Logger.debug(`No config file at ${this.configPath}, using defaults`);
        return {};
      }
      throw error;
    }

    const parsed = RawConfigSchema.parse(JSON.parse(configData));
    Logger.info(`Loaded configuration from ${this.configPath}`);
    return parsed;
  }
}

export function applyEnvOverrides(fileConfig: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const merged: RawConfig = {};
  for (const [section, values] of Object.entries(fileConfig)) {
    merged[section] = { ...values };
  }

  for (const [name, [section, key]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    merged[section] = { ...merged[section], [key]: value };
  }
  return merged;
}
