/**
 * Tests for chat dispatch and the Ollama backend
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('undici', async (importOriginal) => ({
  ...(await importOriginal<typeof import('undici')>()),
  fetch: vi.fn(),
}));

import { fetch, Response } from 'undici';
import {
  EMPTY_PROMPT_REPLY,
  NO_MODEL_REPLY,
  OllamaChatBackend,
  runChat,
  type ChatBackend,
} from '../core/chat.js';
import { ChatDispatchError } from '../types.js';

const mockFetch = vi.mocked(fetch);

function makeBackend(overrides: Partial<ChatBackend> = {}): ChatBackend {
  return {
    label: 'Ollama',
    listModels: vi.fn(async () => ['llama3']),
    send: vi.fn(async () => '  A short summary.\n'),
    ...overrides,
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

beforeEach(() => {
  mockFetch.mockReset();
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

// ---------------------------------------------------------------------------
// runChat
// ---------------------------------------------------------------------------

describe('runChat', () => {
  it('asks for a prompt before anything else', async () => {
    const backend = makeBackend();
    expect(await runChat(backend, 'llama3', '')).toBe(EMPTY_PROMPT_REPLY);
    expect(await runChat(backend, 'llama3', '   ')).toBe(EMPTY_PROMPT_REPLY);
    expect(await runChat(backend, null, null)).toBe('Please enter a prompt.');
    expect(backend.send).not.toHaveBeenCalled();
  });

  it('asks for a model when none is selected', async () => {
    const backend = makeBackend();
    expect(await runChat(backend, '', 'Summarise this')).toBe(NO_MODEL_REPLY);
    expect(await runChat(backend, undefined, 'Summarise this')).toBe('Please list the models then select a model.');
    expect(backend.send).not.toHaveBeenCalled();
  });

  it('returns the trimmed reply', async () => {
    const backend = makeBackend();
    expect(await runChat(backend, 'llama3', 'Summarise this')).toBe('A short summary.');
    expect(backend.send).toHaveBeenCalledWith('llama3', 'Summarise this');
  });

  it('returns dispatch failures as text instead of throwing', async () => {
    const backend = makeBackend({
      send: vi.fn(async () => {
        throw new ChatDispatchError('Ollama API error 404: model "ghost" not found', 404);
      }),
    });

    await expect(runChat(backend, 'ghost', 'Summarise this')).resolves.toBe(
      'Error while running Ollama: Ollama API error 404: model "ghost" not found',
    );
  });
});

// ---------------------------------------------------------------------------
// OllamaChatBackend
// ---------------------------------------------------------------------------

describe('OllamaChatBackend', () => {
  const backend = new OllamaChatBackend({ host: 'http://localhost:11434/', chatTimeoutMs: 1000, modelsTimeoutMs: 1000 });

  it('lists installed model names', async () => {
    mockFetch.mockResolvedValueOnce(json({
      models: [{ name: 'llama3:8b' }, { model: 'mistral:latest' }, { size: 1 }, 'junk'],
    }));

    await expect(backend.listModels()).resolves.toEqual(['llama3:8b', 'mistral:latest']);
    expect(mockFetch.mock.calls[0][0]).toBe('http://localhost:11434/api/tags');
    expect(mockFetch.mock.calls[0][1]?.method).toBe('GET');
  });

  it('rejects an unexpected model list', async () => {
    mockFetch.mockResolvedValueOnce(json({ tags: [] }));

    await expect(backend.listModels()).rejects.toThrow('Ollama returned an unexpected model list');
  });

  it('sends one non-streaming user message', async () => {
    mockFetch.mockResolvedValueOnce(json({ model: 'llama3', message: { role: 'assistant', content: 'Hello!' }, done: true }));

    await expect(backend.send('llama3', 'Hi')).resolves.toBe('Hello!');

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(init?.method).toBe('POST');
    const body = init?.body;
    expect(typeof body).toBe('string');
    if (typeof body === 'string') {
      expect(JSON.parse(body)).toEqual({
        model: 'llama3',
        messages: [{ role: 'user', content: 'Hi' }],
        stream: false,
      });
    }
  });

  it('reports the error field of a failed response', async () => {
    mockFetch.mockResolvedValueOnce(json({ error: 'model "ghost" not found, try pulling it first' }, 404));

    const err = await backend.send('ghost', 'Hi').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ChatDispatchError);
    expect(err).toMatchObject({
      message: 'Ollama API error 404: model "ghost" not found, try pulling it first',
      status: 404,
    });
  });

  it('falls back to the raw body of a failed response', async () => {
    mockFetch.mockResolvedValueOnce(new Response('upstream exploded', { status: 500 }));

    await expect(backend.send('llama3', 'Hi')).rejects.toThrow('Ollama API error 500: upstream exploded');
  });

  it('rejects a reply without message content', async () => {
    mockFetch.mockResolvedValueOnce(json({ done: true }));

    await expect(backend.send('llama3', 'Hi')).rejects.toThrow('Ollama returned no message content');
  });

  it('explains an unreachable server', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:11434') }));

    await expect(new OllamaChatBackend().listModels()).rejects.toThrow(
      'Could not reach Ollama at http://127.0.0.1:11434 (fetch failed: connect ECONNREFUSED 127.0.0.1:11434)',
    );
  });

  it('gives up after the chat timeout', async () => {
    const slow = new OllamaChatBackend({ chatTimeoutMs: 10 });
    mockFetch.mockImplementationOnce((_url, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
    }));

    await expect(slow.send('llama3', 'Hi')).rejects.toThrow('Ollama did not answer within 0.01s');
  });

  it('turns an unavailable model into reply text through runChat', async () => {
    mockFetch.mockResolvedValueOnce(json({ error: 'model "ghost" not found, try pulling it first' }, 404));

    await expect(runChat(backend, 'ghost', 'Summarise this')).resolves.toBe(
      'Error while running Ollama: Ollama API error 404: model "ghost" not found, try pulling it first',
    );
  });
});
