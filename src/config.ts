/**
 * Runtime configuration, read from environment variables.
 */

export interface AppConfig {
  port: number;
  host: string;
  /** Base URL of the local Ollama server */
  ollamaHost: string;
  /** Timeout for YouTube page and caption requests (ms) */
  requestTimeoutMs: number;
  /** Timeout for a single chat completion (ms) */
  chatTimeoutMs: number;
  /** Timeout for the model listing call (ms) */
  modelsTimeoutMs: number;
  /** Deepest reply nesting accepted when flattening a Reddit comment tree */
  maxCommentDepth: number;
  corsOrigins: string[];
  production: boolean;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 8050,
  host: '127.0.0.1',
  ollamaHost: 'http://127.0.0.1:11434',
  requestTimeoutMs: 30000,
  chatTimeoutMs: 120000,
  modelsTimeoutMs: 10000,
  maxCommentDepth: 500,
  corsOrigins: [],
  production: false,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const corsOrigins = env.CORS_ORIGINS
    ? env.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean)
    : DEFAULT_CONFIG.corsOrigins;

  return {
    port: readPositiveInt(env, 'PORT', DEFAULT_CONFIG.port),
    host: env.HOST?.trim() || DEFAULT_CONFIG.host,
    ollamaHost: (env.OLLAMA_HOST?.trim() || DEFAULT_CONFIG.ollamaHost).replace(/\/+$/, ''),
    requestTimeoutMs: readPositiveInt(env, 'REQUEST_TIMEOUT_MS', DEFAULT_CONFIG.requestTimeoutMs),
    chatTimeoutMs: readPositiveInt(env, 'CHAT_TIMEOUT_MS', DEFAULT_CONFIG.chatTimeoutMs),
    modelsTimeoutMs: readPositiveInt(env, 'MODELS_TIMEOUT_MS', DEFAULT_CONFIG.modelsTimeoutMs),
    maxCommentDepth: readPositiveInt(env, 'MAX_COMMENT_DEPTH', DEFAULT_CONFIG.maxCommentDepth),
    corsOrigins,
    production: env.NODE_ENV === 'production',
  };
}
