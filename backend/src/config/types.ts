import { z } from 'zod';

/**
 * Configuration schema. Every key has a default so an empty object is a
 * working development setup (mock provider, data under ./data).
 */

export const ProviderTypeSchema = z.enum(['mock', 'openai-compatible', 'azure-openai', 'anthropic']);
export type ProviderType = z.infer<typeof ProviderTypeSchema>;

export const ServerConfigSchema = z.object({
  port: z.coerce.number().int().positive().default(3010),
  host: z.string().default('0.0.0.0'),
  frontendUrl: z.string().default('http://localhost:5173')
});

export const DEFAULT_JWT_SECRET = 'your-secret-key-change-this-in-production';

export const AuthConfigSchema = z.object({
  jwtSecret: z.string().min(1).default(DEFAULT_JWT_SECRET),
  tokenTtlSeconds: z.coerce.number().int().positive().default(7 * 24 * 60 * 60)
});

export const StorageConfigSchema = z.object({
  dataDir: z.string().default('./data'),
  maxFilesOpened: z.coerce.number().int().positive().default(200)
});

export const ChatConfigSchema = z.object({
  contextWindowMessages: z.coerce.number().int().positive().default(20),
  turnTimeoutMs: z.coerce.number().int().positive().default(120_000),
  sessionListLimit: z.coerce.number().int().positive().default(100)
});

export const ProviderConfigSchema = z.object({
  type: ProviderTypeSchema.default('mock'),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  model: z.string().default('gpt-4o-mini'),
  deployment: z.string().optional(), // Azure deployment name
  apiVersion: z.string().default('2024-10-21'),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  maxTokens: z.coerce.number().int().positive().default(1024),
  mockDelayMs: z.coerce.number().int().nonnegative().default(20)
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const PersonasConfigSchema = z.object({
  file: z.string().optional() // Defaults to the bundled config/personas.json
});

export const AppConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  auth: AuthConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  chat: ChatConfigSchema.default({}),
  provider: ProviderConfigSchema.default({}),
  personas: PersonasConfigSchema.default({})
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
