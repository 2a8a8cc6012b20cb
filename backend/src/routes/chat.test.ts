import { describe, it, expect, afterEach } from 'vitest';
import type { PersonaConfig, PromptContext } from '@persona-chat/shared';
import { createTestApp, cleanupTestApp, parseSse, tokenForUser } from './test-helpers.js';
import type { TestContext } from './test-helpers.js';
import type { ModelProvider } from '../services/model-provider.js';
import { ProviderError } from '../utils/errors.js';

const REPLY = 'Sunbeam here. You asked about "Naps". Let\'s take it one small step at a time.';

// Yields one chunk, then fails
class FailingProvider implements ModelProvider {
  readonly type = 'mock' as const;
  readonly model = 'failing';

  async *stream(_persona: PersonaConfig, _context: PromptContext, _signal: AbortSignal): AsyncGenerator<string, void, undefined> {
    yield 'Partial';
    throw new ProviderError('Provider responded with 500: boom', 500);
  }
}

describe('Chat Routes', () => {
  let ctx: TestContext;

  afterEach(async () => {
    await cleanupTestApp(ctx);
  });

  // Tokens are signed with the secret createTestApp configures
  function send(body: object) {
    return ctx.request
      .post('/api/chat/send')
      .set('Authorization', `Bearer ${tokenForUser('alice')}`)
      .send(body);
  }

  it('streams a turn as session, chunks, then end', async () => {
    ctx = await createTestApp();

    const res = await send({ personaId: 'sunbeam', text: 'Naps' });

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain('text/event-stream');

    const events = parseSse(res.text);
    expect(events[0].event).toBe('session');
    expect(events[0].data).toMatchObject({ ownerId: 'alice', personaId: 'sunbeam', title: 'Naps' });

    const chunks = events.filter(e => e.event === 'message').map(e => e.data);
    expect(chunks[0]).toBe('Sunbeam');
    expect(chunks.join('')).toBe(REPLY);

    const end = events[events.length - 1];
    expect(end.event).toBe('end');
    expect(end.data).toMatchObject({ role: 'assistant', content: REPLY, sequence: 2 });
  });

  it('continues an existing session', async () => {
    ctx = await createTestApp();
    const session = await ctx.db.createSession('alice', 'sunbeam', 'Naps');

    const res = await send({ sessionId: session.id, text: 'Naps' });

    const events = parseSse(res.text);
    expect(events[0].data).toMatchObject({ id: session.id });
    const messages = await ctx.db.listMessages(session.id, 'alice');
    expect(messages.map(m => m.content)).toEqual(['Naps', REPLY]);
  });

  it('requires authentication', async () => {
    ctx = await createTestApp();
    const res = await ctx.request.post('/api/chat/send').send({ personaId: 'sunbeam', text: 'Hi' });
    expect(res.status).toBe(401);
  });

  it('answers JSON 400 when neither session nor persona is given', async () => {
    ctx = await createTestApp();

    const res = await send({ text: 'Hi' });

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('INVALID_INPUT');
  });

  it('answers JSON 404 for another user\'s session', async () => {
    ctx = await createTestApp();
    const session = await ctx.db.createSession('bob', 'sunbeam', 'Bob');

    const res = await send({ sessionId: session.id, text: 'Hi' });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Session not found', code: 'NOT_FOUND' });
    expect(await ctx.db.listMessages(session.id, 'bob')).toEqual([]);
  });

  it('answers JSON 400 for an unknown persona', async () => {
    ctx = await createTestApp();

    const res = await send({ personaId: 'nobody', text: 'Hi' });

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('INVALID_PERSONA');
  });

  it('reports a provider failure as an error event and keeps the partial reply', async () => {
    ctx = await createTestApp(new FailingProvider());

    const res = await send({ personaId: 'sunbeam', text: 'Hi' });

    const events = parseSse(res.text);
    expect(events.map(e => e.event)).toEqual(['session', 'message', 'error']);
    expect(events[2].data).toEqual({
      code: 'PROVIDER_ERROR',
      error: 'Provider responded with 500: boom',
      suggestion: 'The AI provider returned an error. Please try again.',
    });

    const sessionId = (await ctx.db.listSessions('alice'))[0].id;
    const messages = await ctx.db.listMessages(sessionId, 'alice');
    expect(messages[1]).toMatchObject({ role: 'assistant', content: 'Partial', truncated: true });
  });
});
