import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { PersonaConfigSchema } from '@persona-chat/shared';
import type { PersonaConfig } from '@persona-chat/shared';
import { Logger } from '../utils/logger.js';
import { SERVER_ERRORS, SUCCESS_MESSAGES } from '../utils/error-messages.js';

export const DEFAULT_PERSONAS_FILE = fileURLToPath(new URL('../../config/personas.json', import.meta.url));

const PersonaFileSchema = z.array(PersonaConfigSchema).min(1);

// Lookup surface the store and engine depend on
export interface PersonaLookup {
  resolve(personaId: string): PersonaConfig | undefined;
  has(personaId: string): boolean;
}

/**
 * Immutable persona id -> config mapping, built once at startup.
 */
export class PersonaRegistry implements PersonaLookup {
  private readonly personas: ReadonlyMap<string, Readonly<PersonaConfig>>;

  constructor(personas: PersonaConfig[]) {
    const byId = new Map<string, Readonly<PersonaConfig>>();
    for (const persona of personas) {
      if (byId.has(persona.id)) {
        throw new Error(SERVER_ERRORS.DUPLICATE_PERSONA(persona.id));
      }
      byId.set(persona.id, Object.freeze({
        ...persona,
        ...(persona.safety && { safety: Object.freeze({ ...persona.safety }) })
      }));
    }
    this.personas = byId;
  }

  static async fromFile(path: string = DEFAULT_PERSONAS_FILE): Promise<PersonaRegistry> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    const result = PersonaFileSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(`${SERVER_ERRORS.INVALID_PERSONA_FILE(path)}: ${result.error.message}`);
    }
    const registry = new PersonaRegistry(result.data);
    Logger.info(SUCCESS_MESSAGES.PERSONAS_LOADED(result.data.length, path));
    return registry;
  }

  resolve(personaId: string): PersonaConfig | undefined {
    return this.personas.get(personaId);
  }

  has(personaId: string): boolean {
    return this.personas.has(personaId);
  }

  // File order
  list(): PersonaConfig[] {
    return [...this.personas.values()];
  }
}
