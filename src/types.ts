/**
 * Core types for url-brief
 */

export type SourceKind = 'reddit' | 'youtube';

// ---------------------------------------------------------------------------
// Reddit
// ---------------------------------------------------------------------------

export interface Comment {
  author: string | null;
  body: string;
  score: number;
  /** Unix timestamp (seconds) */
  createdUtc: number;
  id: string;
  /** Fullname of the parent: `t3_…` for the submission, `t1_…` for a comment */
  parentId: string;
}

export interface ThreadMetadata {
  title: string | null;
  subreddit: string | null;
  author: string | null;
  score: number | null;
  numComments: number | null;
  /** Absolute thread URL */
  permalink: string;
}

export interface RedditThread {
  metadata: ThreadMetadata;
  comments: Comment[];
}

// ---------------------------------------------------------------------------
// YouTube
// ---------------------------------------------------------------------------

export interface TranscriptSnippet {
  text: string;
  /** Start time in seconds */
  start: number;
  /** Duration in seconds */
  duration: number;
}

export interface VideoMetadata {
  title: string | null;
  channel: string | null;
  url: string;
  lengthSeconds: number | null;
  /** Upload date as YYYYMMDD */
  publishDate: string | null;
  views: number | null;
}

export interface YouTubeVideo {
  videoId: string;
  metadata: VideoMetadata;
  transcript: TranscriptSnippet[];
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface PromptOutcome {
  source: SourceKind;
  prompt: string;
}

export type StatusLevel = 'success' | 'warning' | 'danger';

export interface StatusMessage {
  level: StatusLevel;
  message: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class UrlBriefError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'UrlBriefError';
  }
}

export class MissingInputError extends UrlBriefError {
  constructor(message = 'No URL was provided') {
    super(message, 'MISSING_INPUT');
    this.name = 'MissingInputError';
  }
}

export class UnsupportedSourceError extends UrlBriefError {
  constructor(public url: string) {
    super(`Unsupported source: ${url}`, 'UNSUPPORTED_SOURCE');
    this.name = 'UnsupportedSourceError';
  }
}

export class FetchError extends UrlBriefError {
  /** HTTP status, when the failure was a non-2xx response */
  public status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, 'FETCH_FAILED');
    this.name = 'FetchError';
    this.status = options.status;
    if (options.cause !== undefined) this.cause = options.cause;
  }
}

export class ExtractionError extends UrlBriefError {
  constructor(message: string) {
    super(message, 'EXTRACTION_FAILED');
    this.name = 'ExtractionError';
  }
}

export class FormattingError extends UrlBriefError {
  constructor(message: string) {
    super(message, 'FORMATTING_FAILED');
    this.name = 'FormattingError';
  }
}

export class ChatDispatchError extends UrlBriefError {
  constructor(message: string, public status?: number) {
    super(message, 'CHAT_FAILED');
    this.name = 'ChatDispatchError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
