import fs from 'fs/promises';
import path from 'path';
import { EventStore } from './persistence.js';
import type { Event } from './persistence.js';
import { isErrnoCode } from '../utils/errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';

export interface IdEvents {
  id: string;
  events: Event[];
}

// Ids come from outside (JWT claims); keep them filesystem-safe, including '.' and '..'
function encodeId(id: string): string {
  return encodeURIComponent(id).replace(/\./g, '%2E');
}

/**
 * One event file per id under baseDir, sharded as `ab/cd/<id>.jsonl`.
 */
export class BulkEventStore {
  baseDir: string;
  mostRecentIds: string[] = [];
  mostRecentEventStores: Map<string, EventStore> = new Map();
  // We hold handles only for the most recently written files;
  // the OS limits open files (ulimit -n)
  maxFilesOpened: number;
  // Writes and deletes per file serialize; a file being written is never purged
  private fileLocks = new KeyedMutex();

  // base dir might be like './data/sessions' or './data/users'
  constructor(baseDir: string, maxFilesOpened: number = 100) {
    this.baseDir = baseDir;
    this.maxFilesOpened = Math.max(1, maxFilesOpened);
  }

  async init() {
    await fs.mkdir(this.baseDir, { recursive: true });
  }

  // Shard so a single directory never holds hundreds of thousands of files
  getDirForId(id: string): string {
    const encoded = encodeId(id);
    let idDir = this.baseDir;
    if (encoded.length >= 2) {
      idDir = path.join(idDir, encoded.substring(0, 2));
    }
    if (encoded.length >= 4) {
      idDir = path.join(idDir, encoded.substring(2, 4));
    }
    return idDir;
  }

  getFileForId(id: string): string {
    return `${encodeId(id)}.jsonl`;
  }

  getPathForId(id: string): string {
    return path.join(this.getDirForId(id), this.getFileForId(id));
  }

  async getWritableEventStore(id: string): Promise<EventStore> {
    const existing = this.mostRecentEventStores.get(id);
    if (existing) {
      const posOfId = this.mostRecentIds.indexOf(id);
      if (posOfId !== -1) {
        this.mostRecentIds.splice(posOfId, 1);
        this.mostRecentIds.push(id);
      }
      return existing;
    }
    // Make room first so the new handle never pushes us over the limit
    await this.purgeOldFileHandles();
    const idEventStore = new EventStore(this.getDirForId(id), this.getFileForId(id));
    await idEventStore.init();
    this.mostRecentEventStores.set(id, idEventStore);
    this.mostRecentIds.push(id);
    return idEventStore;
  }

  // Closes least recently used handles; files with a write in flight are skipped,
  // so the limit can be exceeded briefly under heavy concurrency
  async purgeOldFileHandles(): Promise<void> {
    const idle = this.mostRecentIds.filter(id => !this.fileLocks.isLocked(id));
    while (this.mostRecentIds.length >= this.maxFilesOpened && idle.length > 0) {
      const purgedId = idle.shift();
      if (purgedId === undefined) break;
      const store = this.mostRecentEventStores.get(purgedId);
      this.mostRecentEventStores.delete(purgedId);
      this.mostRecentIds = this.mostRecentIds.filter(id => id !== purgedId);
      await store?.close();
    }
  }

  openHandleCount(): number {
    return this.mostRecentEventStores.size;
  }

  async appendEvent(id: string, event: Event): Promise<void> {
    await this.fileLocks.runExclusive(id, async () => {
      const eventStore = await this.getWritableEventStore(id);
      await eventStore.appendEvent(event);
    });
  }

  async loadEvents(id: string): Promise<Event[]> {
    // Reading needs no open handle
    return new EventStore(this.getDirForId(id), this.getFileForId(id)).loadEvents();
  }

  async deleteEvents(id: string): Promise<void> {
    await this.fileLocks.runExclusive(id, async () => {
      const open = this.mostRecentEventStores.get(id);
      if (open) {
        this.mostRecentEventStores.delete(id);
        this.mostRecentIds = this.mostRecentIds.filter(existing => existing !== id);
        await open.close();
      }
      try {
        await fs.unlink(this.getPathForId(id));
      } catch (error) {
        if (!isErrnoCode(error, 'ENOENT')) throw error;
      }
    });
  }

  async listIds(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.baseDir, { recursive: true });
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return [];
      throw error;
    }
    return files
      .filter(fileName => fileName.endsWith('.jsonl'))
      .map(fileName => decodeURIComponent(path.basename(fileName, '.jsonl')));
  }

  async *loadAllEvents(): AsyncGenerator<IdEvents, void, void> {
    for (const id of await this.listIds()) {
      yield { id, events: await this.loadEvents(id) };
    }
  }

  async close() {
    for (const closingId of this.mostRecentIds) {
      await this.mostRecentEventStores.get(closingId)?.close();
      this.mostRecentEventStores.delete(closingId);
    }
    this.mostRecentIds = [];
  }
}
