/**
 * URL → prompt pipeline.
 *
 * classify → fetch → toPrompt, one attempt per step. Every failure is an
 * UrlBriefError subclass; `statusForError` turns it into the banner shown to
 * the user.
 */

import { assertUrlProvided, classifyUrl } from './classifier.js';
import { createRedditSource } from './reddit.js';
import type { SourceRegistry } from './sources.js';
import { createYouTubeSource } from './youtube.js';
import {
  ExtractionError,
  FetchError,
  FormattingError,
  MissingInputError,
  UnsupportedSourceError,
  errorMessage,
  type PromptOutcome,
  type SourceKind,
  type StatusMessage,
} from '../types.js';

export interface SourceOptions {
  /** Timeout for YouTube page and caption requests (ms) */
  requestTimeoutMs?: number;
  maxCommentDepth?: number;
}

/** Reddit is listed first: it wins when a URL mentions both sites. */
export function createSources(options: SourceOptions = {}): SourceRegistry {
  return [
    createRedditSource({ maxCommentDepth: options.maxCommentDepth }),
    createYouTubeSource({ timeoutMs: options.requestTimeoutMs }),
  ];
}

const SOURCE_LABELS: Record<SourceKind, string> = {
  reddit: 'Reddit',
  youtube: 'YouTube',
};

export async function generatePrompt(
  url: string | null | undefined,
  sources: SourceRegistry = createSources(),
): Promise<PromptOutcome> {
  assertUrlProvided(url);
  const source = classifyUrl(url, sources);
  const raw = await source.fetch(url);

  let prompt: string;
  try {
    prompt = source.toPrompt(raw);
  } catch (err) {
    throw new FormattingError(`Error generating ${source.label} prompt: ${errorMessage(err)}`);
  }

  if (process.env.DEBUG) console.debug('[url-brief]', `${source.label} prompt: ${prompt.length} chars`);
  return { source: source.kind, prompt };
}

export function successStatus(outcome: PromptOutcome): StatusMessage {
  return { level: 'success', message: `✅ ${SOURCE_LABELS[outcome.source]} prompt generated!` };
}

export function statusForError(err: unknown): StatusMessage {
  if (err instanceof MissingInputError) {
    return { level: 'warning', message: '⚠️ Please enter a URL first.' };
  }
  if (err instanceof UnsupportedSourceError) {
    return { level: 'warning', message: '⚠️ Only Reddit or YouTube URLs are supported for now.' };
  }
  if (err instanceof FetchError || err instanceof ExtractionError || err instanceof FormattingError) {
    return { level: 'danger', message: `❌ ${err.message}` };
  }
  return { level: 'danger', message: `❌ Unexpected error: ${errorMessage(err)}` };
}
