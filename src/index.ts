/**
 * url-brief - Reddit threads and YouTube videos as LLM summarisation prompts
 *
 * Main library export
 */

import { createSources, generatePrompt as runPipeline, type SourceOptions } from './core/pipeline.js';
import type { PromptOutcome } from './types.js';

export * from './types.js';
export { loadConfig, DEFAULT_CONFIG, ConfigError, type AppConfig } from './config.js';
export { createSources, successStatus, statusForError, type SourceOptions } from './core/pipeline.js';
export { classifyUrl, assertUrlProvided } from './core/classifier.js';
export type { ContentSource, SourceRegistry } from './core/sources.js';
export { MAX_PROMPT_CHARS, truncatePrompt } from './core/prompt.js';
export {
  createRedditSource,
  fetchRedditThread,
  extractThreadMetadata,
  flattenComments,
  filterComments,
  sortByScore,
  formatRedditPrompt,
} from './core/reddit.js';
export {
  createYouTubeSource,
  extractVideoId,
  fetchVideoMetadata,
  fetchTranscript,
  formatYouTubePrompt,
} from './core/youtube.js';
export {
  runChat,
  OllamaChatBackend,
  EMPTY_PROMPT_REPLY,
  NO_MODEL_REPLY,
  type ChatBackend,
  type OllamaBackendOptions,
} from './core/chat.js';
export { createApp, startServer, type AppDependencies } from './server/app.js';
export { VERSION } from './version.js';

/**
 * Build the summarisation prompt for a Reddit thread or YouTube video URL.
 *
 * @example
 * ```typescript
 * import { generatePrompt } from 'url-brief';
 *
 * const { source, prompt } = await generatePrompt('https://youtu.be/dQw4w9WgXcQ');
 * ```
 */
export async function generatePrompt(url: string, options: SourceOptions = {}): Promise<PromptOutcome> {
  return runPipeline(url, createSources(options));
}
