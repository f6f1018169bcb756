/**
 * Reddit thread source.
 *
 * Reads a thread through Reddit's public JSON endpoint (`<thread>.json`), which
 * returns a two-element array: the submission listing and the comment listing.
 * The comment tree is flattened, filtered down to substantive top-level replies,
 * ranked by score and rendered into a summarisation prompt.
 */

import { fetchJson } from './http-fetch.js';
import { getPath, isRecord, readNumber, readString, type JsonRecord } from './json.js';
import { truncatePrompt } from './prompt.js';
import type { ContentSource } from './sources.js';
import {
  ExtractionError,
  FetchError,
  type Comment,
  type RedditThread,
  type ThreadMetadata,
} from '../types.js';

export const REDDIT_BASE_URL = 'https://www.reddit.com';
/** Fixed timeout for the thread JSON request */
export const REDDIT_TIMEOUT_MS = 10000;
export const DEFAULT_MAX_COMMENT_DEPTH = 500;

export const NO_COMMENTS_PROMPT = 'No relevant comments found.';

/** Bodies must be strictly longer than this (in characters) */
const MIN_BODY_LENGTH = 10;
const MIN_SCORE = 1;
/** Markup Reddit uses for inline image emotes, e.g. `![img](emote|t5_2th52|1234)` */
const IMAGE_EMOTE_PATTERN = /!\[img\]\(emote\|/;

const REDDIT_PREAMBLE =
  'You are an assistant that summarizes Reddit discussions.\n' +
  'Please analyze the following thread and provide a concise summary:\n' +
  '- Only include the most relevant information and opinions.\n' +
  '- Format your output as clear bullet points.\n' +
  '- Avoid unnecessary repetition or minor details.\n\n';

// ---------------------------------------------------------------------------
// Fetch
// ---------------------------------------------------------------------------

/**
 * JSON endpoint of a thread: query string and fragment dropped, trailing
 * slashes stripped, `.json` appended.
 */
export function buildRedditJsonUrl(url: string): string {
  const base = url.trim().split(/[?#]/)[0];
  return `${base.replace(/\/+$/, '')}.json`;
}

/** Fetch the raw two-element thread payload. One attempt, 10 second timeout. */
export async function fetchRedditThread(url: string): Promise<unknown> {
  const jsonUrl = buildRedditJsonUrl(url);
  try {
    return await fetchJson(jsonUrl, { timeoutMs: REDDIT_TIMEOUT_MS });
  } catch (err) {
    if (err instanceof FetchError) {
      throw new FetchError(`Could not fetch Reddit JSON: ${err.message}`, {
        status: err.status,
        cause: err,
      });
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export function extractThreadMetadata(data: unknown): ThreadMetadata {
  const post = getPath(data, [0, 'data', 'children', 0, 'data']);
  if (!isRecord(post)) {
    throw new ExtractionError('Could not extract metadata: the response has no submission listing');
  }

  return {
    title: readString(post, 'title'),
    subreddit: readString(post, 'subreddit'),
    author: readString(post, 'author'),
    score: readNumber(post, 'score'),
    numComments: readNumber(post, 'num_comments'),
    permalink: REDDIT_BASE_URL + (readString(post, 'permalink') ?? ''),
  };
}

function toComment(data: JsonRecord): Comment {
  return {
    author: readString(data, 'author'),
    // A missing body or score can never pass the filters below.
    body: readString(data, 'body') ?? '',
    score: readNumber(data, 'score') ?? 0,
    createdUtc: readNumber(data, 'created_utc') ?? 0,
    id: readString(data, 'id') ?? '',
    parentId: readString(data, 'parent_id') ?? '',
  };
}

export interface FlattenOptions {
  /** Deepest accepted nesting level; top-level comments are level 1 */
  maxDepth?: number;
}

/**
 * Flatten the comment listing (`data[1]`) depth-first, in pre-order: each
 * comment is followed by its replies before its next sibling. `more` stubs
 * are skipped.
 *
 * @throws ExtractionError when the payload has no comment listing
 * @throws FetchError when the tree is nested deeper than `maxDepth`
 */
export function flattenComments(data: unknown, options: FlattenOptions = {}): Comment[] {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_COMMENT_DEPTH;
  const roots = getPath(data, [1, 'data', 'children']);
  if (!Array.isArray(roots)) {
    throw new ExtractionError('Could not extract comments: the response has no comment listing');
  }

  const comments: Comment[] = [];
  const stack: Array<{ node: unknown; depth: number }> = [];
  const pushChildren = (children: unknown[], depth: number) => {
    // Reversed so the first child is popped first
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], depth });
    }
  };

  pushChildren(roots, 1);

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const { node, depth } = entry;
    if (!isRecord(node) || node.kind !== 't1' || !isRecord(node.data)) continue;

    if (depth > maxDepth) {
      throw new FetchError(`Reddit comment tree is too deep (more than ${maxDepth} levels)`);
    }

    comments.push(toComment(node.data));

    const replies = getPath(node.data, ['replies', 'data', 'children']);
    if (Array.isArray(replies)) pushChildren(replies, depth + 1);
  }

  return comments;
}

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

/** Stable sort, highest score first. */
export function sortByScore(comments: readonly Comment[]): Comment[] {
  return [...comments].sort((a, b) => b.score - a.score);
}

/**
 * Keep substantive top-level replies, best first. Order matters:
 * 1. body longer than 10 characters
 * 2. score of at least 1
 * 3. same parent as the first survivor of 1-2 (taken as the submission)
 * 4. no image emotes
 * 5. sort by score, descending
 */
export function filterComments(comments: readonly Comment[]): Comment[] {
  let kept = comments.filter(c => Array.from(c.body).length > MIN_BODY_LENGTH);
  kept = kept.filter(c => c.score >= MIN_SCORE);

  if (kept.length > 0) {
    const topLevelParent = kept[0].parentId;
    kept = kept.filter(c => c.parentId === topLevelParent);
  }

  kept = kept.filter(c => !IMAGE_EMOTE_PATTERN.test(c.body));
  return sortByScore(kept);
}

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

export function formatRedditPrompt(meta: ThreadMetadata, comments: readonly Comment[]): string {
  if (comments.length === 0) return NO_COMMENTS_PROMPT;

  const text = comments.map(c => `- ${c.body}`).join('\n');

  const threadInfo =
    `Subreddit: r/${meta.subreddit ?? 'unknown'}\n` +
    `Title: ${meta.title ?? 'Untitled'}\n` +
    `Author: ${meta.author ?? 'unknown'}\n` +
    `Post score: ${meta.score ?? 'N/A'} | ` +
    `Comments: ${meta.numComments ?? 'N/A'}\n` +
    `URL: ${meta.permalink}\n`;

  const prompt =
    REDDIT_PREAMBLE +
    'Thread information:\n' +
    `${threadInfo}\n` +
    'Reddit comments:\n\n' +
    text;

  return truncatePrompt(prompt);
}

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

export interface RedditSourceOptions {
  maxCommentDepth?: number;
}

export function createRedditSource(options: RedditSourceOptions = {}): ContentSource<RedditThread> {
  return {
    kind: 'reddit',
    label: 'Reddit',
    matches: (url) => url.includes('reddit.com'),
    async fetch(url) {
      const data = await fetchRedditThread(url);
      const metadata = extractThreadMetadata(data);
      const comments = filterComments(flattenComments(data, { maxDepth: options.maxCommentDepth }));
      return { metadata, comments };
    },
    toPrompt: (thread) => formatRedditPrompt(thread.metadata, thread.comments),
  };
}
