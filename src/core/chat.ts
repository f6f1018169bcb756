/**
 * Chat dispatch to a local language model.
 *
 * The pipeline only needs two things from a model server: the names of the
 * installed models and a blocking, non-streaming completion of one user
 * message. Both sit behind ChatBackend; OllamaChatBackend speaks Ollama's
 * HTTP API.
 */

import { fetch as undiciFetch } from 'undici';
import { getPath, isRecord } from './json.js';
import { ChatDispatchError, errorMessage } from '../types.js';

export interface ChatBackend {
  /** Name used in error replies, e.g. "Ollama" */
  readonly label: string;
  listModels(): Promise<string[]>;
  /** Send `prompt` as a single user message; resolves with the reply text. */
  send(model: string, prompt: string): Promise<string>;
}

export const EMPTY_PROMPT_REPLY = 'Please enter a prompt.';
export const NO_MODEL_REPLY = 'Please list the models then select a model.';

/**
 * Run one chat request and always resolve with text: the trimmed reply, a
 * validation hint, or an error message in place of the reply.
 */
export async function runChat(backend: ChatBackend, model: string | null | undefined, prompt: string | null | undefined): Promise<string> {
  if (!prompt || prompt.trim() === '') return EMPTY_PROMPT_REPLY;
  if (!model || model.trim() === '') return NO_MODEL_REPLY;

  try {
    const reply = await backend.send(model, prompt);
    return reply.trim();
  } catch (err) {
    console.error('[url-brief]', `${backend.label} chat with "${model}" failed:`, errorMessage(err));
    return `Error while running ${backend.label}: ${errorMessage(err)}`;
  }
}

// ---------------------------------------------------------------------------
// Ollama
// ---------------------------------------------------------------------------

export interface OllamaBackendOptions {
  /** Base URL, default http://127.0.0.1:11434 */
  host?: string;
  chatTimeoutMs?: number;
  modelsTimeoutMs?: number;
}

export class OllamaChatBackend implements ChatBackend {
  readonly label = 'Ollama';
  private readonly host: string;
  private readonly chatTimeoutMs: number;
  private readonly modelsTimeoutMs: number;

  constructor(options: OllamaBackendOptions = {}) {
    this.host = (options.host ?? 'http://127.0.0.1:11434').replace(/\/+$/, '');
    this.chatTimeoutMs = options.chatTimeoutMs ?? 120000;
    this.modelsTimeoutMs = options.modelsTimeoutMs ?? 10000;
  }

  async listModels(): Promise<string[]> {
    const data = await this.request('/api/tags', { method: 'GET' }, this.modelsTimeoutMs);
    const models = getPath(data, ['models']);
    if (!Array.isArray(models)) {
      throw new ChatDispatchError('Ollama returned an unexpected model list');
    }

    const names: string[] = [];
    for (const entry of models) {
      if (!isRecord(entry)) continue;
      const name = typeof entry.name === 'string' ? entry.name : typeof entry.model === 'string' ? entry.model : null;
      if (name) names.push(name);
    }
    return names;
  }

  async send(model: string, prompt: string): Promise<string> {
    const data = await this.request(
      '/api/chat',
      {
        method: 'POST',
        body: JSON.stringify({
          model,
          messages: [{ role: 'user', content: prompt }],
          stream: false,
        }),
      },
      this.chatTimeoutMs,
    );

    const content = getPath(data, ['message', 'content']);
    if (typeof content !== 'string') {
      throw new ChatDispatchError('Ollama returned no message content');
    }
    return content;
  }

  private async request(path: string, init: { method: 'GET' | 'POST'; body?: string }, timeoutMs: number): Promise<unknown> {
    const url = `${this.host}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await undiciFetch(url, {
        method: init.method,
        headers: { 'Content-Type': 'application/json' },
        body: init.body,
        signal: controller.signal,
      });

      const text = await response.text();
      if (!response.ok) {
        throw new ChatDispatchError(`Ollama API error ${response.status}: ${describeErrorBody(text)}`, response.status);
      }

      try {
        const data: unknown = JSON.parse(text);
        return data;
      } catch {
        throw new ChatDispatchError(`Ollama returned invalid JSON from ${path}`);
      }
    } catch (err) {
      if (err instanceof ChatDispatchError) throw err;
      if (controller.signal.aborted) {
        throw new ChatDispatchError(`Ollama did not answer within ${timeoutMs / 1000}s`);
      }
      const cause = err instanceof Error && err.cause instanceof Error ? `: ${err.cause.message}` : '';
      throw new ChatDispatchError(`Could not reach Ollama at ${this.host} (${errorMessage(err)}${cause})`);
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Ollama errors come back as {"error": "..."}; fall back to the raw body. */
function describeErrorBody(text: string): string {
  const fallback = text.trim() || 'empty response';
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) && typeof parsed.error === 'string' ? parsed.error : fallback;
  } catch {
    return fallback;
  }
}
