import fs from 'fs/promises';
import path from 'path';
import type { PromptMessage } from '@persona-chat/shared';
import type { ProviderType } from '../config/types.js';

export interface LlmRequestLog {
  requestId: string;
  service: ProviderType;
  model: string;
  sessionId: string;
  personaId: string;
  messageCount: number;
  messages: PromptMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface LlmResponseLog {
  requestId: string;
  service: ProviderType;
  model: string;
  chunkCount: number;
  content: string;
  contentLength: number;
  duration: number;
  error?: string;
  aborted?: boolean;
}

export class LLMLogger {
  private logDir: string;
  private dirCreated: boolean = false;
  private enabled: boolean;

  constructor(logDir = path.join(process.cwd(), 'logs', 'llm'), enabled = isEnabledByEnv()) {
    this.logDir = logDir;
    this.enabled = enabled;
  }

  private async ensureLogDirectory() {
    if (!this.dirCreated) {
      await fs.mkdir(this.logDir, { recursive: true });
      this.dirCreated = true;
    }
  }

  // Date is taken per write so long-running processes roll over at midnight
  getLogFilePath(type: 'requests' | 'responses'): string {
    const date = new Date().toISOString().split('T')[0];
    return path.join(this.logDir, `${date}-${type}.log`);
  }

  async logRequest(data: LlmRequestLog): Promise<void> {
    await this.append('requests', { timestamp: new Date().toISOString(), type: 'REQUEST', ...data });
  }

  async logResponse(data: LlmResponseLog): Promise<void> {
    await this.append('responses', { timestamp: new Date().toISOString(), type: 'RESPONSE', ...data });
  }

  private async append(type: 'requests' | 'responses', entry: object): Promise<void> {
    if (!this.enabled) return;

    // The log is advisory; a failed write must never fail a chat turn
    try {
      await this.ensureLogDirectory();
      await fs.appendFile(this.getLogFilePath(type), JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error(`Failed to log LLM ${type}:`, error);
    }
  }
}

function isEnabledByEnv(): boolean {
  return process.env.LLM_LOG !== 'false' && process.env.NODE_ENV !== 'test';
}

export const llmLogger = new LLMLogger();
