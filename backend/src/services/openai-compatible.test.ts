import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { PromptContext } from '@persona-chat/shared';

// Mock llmLogger
vi.mock('../utils/llmLogger.js', () => ({
  llmLogger: { logRequest: vi.fn(), logResponse: vi.fn() },
}));

import { OpenAICompatibleProvider, readSseData } from './openai-compatible.js';
import type { OpenAICompatibleOptions } from './openai-compatible.js';
import { llmLogger } from '../utils/llmLogger.js';
import { ContentFilteredError, ProviderError } from '../utils/errors.js';

const persona = { id: 'sunbeam', displayName: 'Sunbeam', systemPrompt: 'Build confidence.' };

const context: PromptContext = {
  sessionId: '00000000-0000-4000-a000-000000000001',
  persona,
  messages: [
    { role: 'system', content: 'Build confidence.' },
    { role: 'user', content: 'Hi' },
  ],
};

function makeProvider(overrides: Partial<OpenAICompatibleOptions> = {}) {
  return new OpenAICompatibleProvider({
    mode: 'openai',
    apiKey: 'test-key',
    baseUrl: 'https://llm.example.test/',
    model: 'test-model',
    temperature: 0.5,
    maxTokens: 256,
    ...overrides,
  });
}

// Helper to create a readable stream from text pieces
function makeReadableStream(pieces: string[], onCancel?: () => void): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream({
    start(controller) {
      for (const piece of pieces) controller.enqueue(encoder.encode(piece));
      if (!onCancel) controller.close();
    },
    cancel() {
      onCancel?.();
    },
  });
}

function chunk(content: string | null, finishReason: string | null = null) {
  return `data: ${JSON.stringify({ choices: [{ delta: content === null ? {} : { content }, finish_reason: finishReason }] })}\n\n`;
}

function sseResponse(pieces: string[]): Response {
  return new Response(makeReadableStream(pieces), {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const piece of stream) out.push(piece);
  return out;
}

const fetchMock = vi.fn<typeof fetch>();

describe('OpenAICompatibleProvider', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.mocked(llmLogger.logRequest).mockClear();
    vi.mocked(llmLogger.logResponse).mockClear();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('getEndpoint', () => {
    it('adds /v1 when the base URL lacks it', () => {
      expect(makeProvider().getEndpoint()).toBe('https://llm.example.test/v1/chat/completions');
    });

    it('does not double-add /v1', () => {
      expect(makeProvider({ baseUrl: 'https://llm.example.test/v1' }).getEndpoint())
        .toBe('https://llm.example.test/v1/chat/completions');
    });

    it('targets the deployment in Azure mode', () => {
      const provider = makeProvider({
        mode: 'azure',
        baseUrl: 'https://family.openai.azure.com',
        deployment: 'chat-prod',
        apiVersion: '2024-10-21',
      });
      expect(provider.getEndpoint())
        .toBe('https://family.openai.azure.com/openai/deployments/chat-prod/chat/completions?api-version=2024-10-21');
      expect(provider.type).toBe('azure-openai');
      expect(provider.model).toBe('chat-prod');
    });
  });

  describe('stream', () => {
    it('yields content chunks in order', async () => {
      fetchMock.mockResolvedValue(sseResponse([chunk('Hel'), chunk('lo'), chunk(null, 'stop'), 'data: [DONE]\n\n']));

      const chunks = await collect(makeProvider().stream(persona, context, new AbortController().signal));
      expect(chunks).toEqual(['Hel', 'lo']);
    });

    it('sends a bearer request with the prompt messages', async () => {
      fetchMock.mockResolvedValue(sseResponse(['data: [DONE]\n\n']));

      await collect(makeProvider().stream(persona, context, new AbortController().signal));

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://llm.example.test/v1/chat/completions');
      expect(init?.headers).toEqual({ 'Authorization': 'Bearer test-key', 'Content-Type': 'application/json' });
      expect(JSON.parse(String(init?.body))).toEqual({
        model: 'test-model',
        messages: [
          { role: 'system', content: 'Build confidence.' },
          { role: 'user', content: 'Hi' },
        ],
        stream: true,
        temperature: 0.5,
        max_tokens: 256,
      });
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('uses an api-key header and omits the model in Azure mode', async () => {
      fetchMock.mockResolvedValue(sseResponse(['data: [DONE]\n\n']));
      const provider = makeProvider({ mode: 'azure', deployment: 'chat-prod', apiVersion: '2024-10-21' });

      await collect(provider.stream(persona, context, new AbortController().signal));

      const [, init] = fetchMock.mock.calls[0];
      expect(init?.headers).toEqual({ 'api-key': 'test-key', 'Content-Type': 'application/json' });
      expect(JSON.parse(String(init?.body)).model).toBeUndefined();
    });

    it('handles lines split across network reads', async () => {
      const line = chunk('split');
      fetchMock.mockResolvedValue(sseResponse([line.slice(0, 10), line.slice(10), 'data: [DONE]\n\n']));

      const chunks = await collect(makeProvider().stream(persona, context, new AbortController().signal));
      expect(chunks).toEqual(['split']);
    });

    it('skips data lines that are not JSON', async () => {
      fetchMock.mockResolvedValue(sseResponse(['data: {oops\n\n', chunk('ok'), 'data: [DONE]\n\n']));

      const chunks = await collect(makeProvider().stream(persona, context, new AbortController().signal));
      expect(chunks).toEqual(['ok']);
    });

    it('raises ProviderError with the upstream status', async () => {
      fetchMock.mockResolvedValue(new Response('overloaded', { status: 529 }));

      const error = await collect(makeProvider().stream(persona, context, new AbortController().signal))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      if (error instanceof ProviderError) {
        expect(error.upstreamStatus).toBe(529);
        expect(error.message).toBe('Provider responded with 529: overloaded');
      }
    });

    it('raises ProviderError when the request cannot be sent', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(collect(makeProvider().stream(persona, context, new AbortController().signal)))
        .rejects.toThrow('Request to openai-compatible failed: fetch failed');
    });

    it('maps an Azure content filter rejection to ContentFilteredError', async () => {
      const body = {
        error: {
          code: 'content_filter',
          innererror: {
            code: 'ResponsibleAIPolicyViolation',
            content_filter_result: { violence: { filtered: true, severity: 'medium' } },
          },
        },
      };
      fetchMock.mockResolvedValue(new Response(JSON.stringify(body), { status: 400 }));

      const error = await collect(makeProvider({ mode: 'azure', deployment: 'd' })
        .stream(persona, context, new AbortController().signal))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ContentFilteredError);
      if (error instanceof ContentFilteredError) {
        expect(error.categories).toEqual([{ category: 'violence', severity: 'medium' }]);
      }
    });

    it('treats a content_filter finish before any content as a rejection', async () => {
      fetchMock.mockResolvedValue(sseResponse([chunk(null, 'content_filter')]));

      await expect(collect(makeProvider().stream(persona, context, new AbortController().signal)))
        .rejects.toBeInstanceOf(ContentFilteredError);
    });

    it('logs the request and response', async () => {
      fetchMock.mockResolvedValue(sseResponse([chunk('abc'), 'data: [DONE]\n\n']));

      await collect(makeProvider().stream(persona, context, new AbortController().signal));

      expect(llmLogger.logRequest).toHaveBeenCalledWith(expect.objectContaining({
        service: 'openai-compatible',
        model: 'test-model',
        sessionId: context.sessionId,
        personaId: 'sunbeam',
        messageCount: 2,
        messages: context.messages,
      }));
      expect(llmLogger.logResponse).toHaveBeenCalledWith(expect.objectContaining({
        chunkCount: 1,
        content: 'abc',
        contentLength: 3,
      }));
    });

    it('cancels the response body when the consumer stops early', async () => {
      const onCancel = vi.fn();
      fetchMock.mockResolvedValue(new Response(makeReadableStream([chunk('first')], onCancel)));

      const iterator = makeProvider().stream(persona, context, new AbortController().signal)[Symbol.asyncIterator]();
      const first = await iterator.next();
      expect(first).toEqual({ done: false, value: 'first' });

      await iterator.return?.();
      expect(onCancel).toHaveBeenCalledOnce();
    });
  });
});

describe('readSseData', () => {
  it('yields data payloads and ignores other fields', async () => {
    const body = makeReadableStream(['event: ping\n', 'data: one\r\n', ': comment\n', 'data:two\n', 'data: tail']);
    expect(await collect(readSseData(body))).toEqual(['one', 'two', 'tail']);
  });
});
