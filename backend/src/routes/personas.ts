import { Router } from 'express';
import { toPersonaSummary } from '@persona-chat/shared';
import type { PersonaRegistry } from '../services/persona-registry.js';

// System prompts never leave the server
export function personaRouter(personas: PersonaRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json(personas.list().map(toPersonaSummary));
  });

  return router;
}
