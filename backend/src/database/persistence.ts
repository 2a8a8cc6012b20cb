import fs from 'fs/promises';
import path from 'path';
import { StoredEventSchema } from './events.js';
import type { StoredEvent } from './events.js';
import { Logger } from '../utils/logger.js';
import { isErrnoCode } from '../utils/errors.js';

export type Event = StoredEvent;

function parseEvent(line: string): Event | undefined {
  try {
    const result = StoredEventSchema.safeParse(JSON.parse(line));
    return result.success ? result.data : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Append-only JSON-lines file of events. Each append is fsynced before it
 * resolves, so callers may treat a resolved append as durable.
 */
export class EventStore {
  private filePath: string;
  private writeStream: fs.FileHandle | null = null;

  constructor(dataDir: string = './data', fileName: string = 'events.jsonl') {
    this.filePath = path.join(dataDir, fileName);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await this.repairTail();
    this.writeStream = await fs.open(this.filePath, 'a');
  }

  // Appends must start on a fresh line. A complete event missing only its
  // newline is kept, since loadEvents already returns it; a partial one is cut.
  private async repairTail(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return;
      throw error;
    }
    if (content.length === 0 || content.endsWith('\n')) return;

    const keep = content.lastIndexOf('\n') + 1;
    if (parseEvent(content.slice(keep)) !== undefined) {
      await fs.appendFile(this.filePath, '\n');
      return;
    }

    Logger.warn(`[EventStore] Truncating torn last line in ${this.filePath}`);
    await fs.truncate(this.filePath, Buffer.byteLength(content.slice(0, keep), 'utf-8'));
  }

  async appendEvent(event: Event): Promise<void> {
    if (!this.writeStream) {
      throw new Error('Event store not initialized');
    }

    // Date fields serialize to ISO strings through toJSON
    const line = JSON.stringify(event) + '\n';

    await this.writeStream.write(line);
    await this.writeStream.sync();
  }

  async loadEvents(): Promise<Event[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    const lines = content.split('\n').filter(line => line.trim());
    const events: Event[] = [];
    for (const [index, line] of lines.entries()) {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        // A crash mid-append can leave a torn final line; anything earlier is corruption
        if (index === lines.length - 1) {
          Logger.warn(`[EventStore] Ignoring torn last line in ${this.filePath}`);
          break;
        }
        throw error;
      }
      events.push(StoredEventSchema.parse(raw));
    }
    return events;
  }

  async close(): Promise<void> {
    if (this.writeStream) {
      await this.writeStream.close();
      this.writeStream = null;
    }
  }
}
