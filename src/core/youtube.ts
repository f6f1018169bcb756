/**
 * YouTube video source, no API key required.
 *
 * YouTube embeds the player response (video details, microformat, caption
 * track list) as JSON inside the watch page HTML. Metadata comes from that
 * JSON; the transcript comes from the timed-text XML of one caption track.
 */

import { load } from 'cheerio';
import { fetchText } from './http-fetch.js';
import { getPath, isRecord, readNumber, readString, type JsonRecord } from './json.js';
import { truncatePrompt } from './prompt.js';
import type { ContentSource } from './sources.js';
import {
  ExtractionError,
  FetchError,
  errorMessage,
  type TranscriptSnippet,
  type VideoMetadata,
  type YouTubeVideo,
} from '../types.js';

export const NO_TRANSCRIPT_PROMPT = 'No transcript available.';

const YOUTUBE_PREAMBLE =
  'You are an assistant that summarizes YouTube videos.\n' +
  'Please read the following transcript and provide a concise summary:\n' +
  '- Only include the most relevant information and insights.\n' +
  '- Format your output as clear bullet points.\n' +
  '- Avoid unnecessary repetition or minor details.\n\n';

export interface CaptionTrack {
  baseUrl: string;
  languageCode: string;
  name: string;
  /** Automatic speech recognition track */
  isGenerated: boolean;
}

export interface YouTubeFetchOptions {
  timeoutMs?: number;
  /** Player response already loaded from the watch page; skips a second page fetch */
  playerResponse?: JsonRecord;
}

// ---------------------------------------------------------------------------
// URL parsing
// ---------------------------------------------------------------------------

/**
 * Extract the 11-character video ID that follows `v=` or a `/`.
 * Returns an empty string when there is none.
 *
 *   https://www.youtube.com/watch?v=VIDEO_ID
 *   https://youtu.be/VIDEO_ID
 *   https://www.youtube.com/shorts/VIDEO_ID
 */
export function extractVideoId(url: string): string {
  const match = url.match(/(?:v=|\/)([0-9A-Za-z_-]{11})/);
  return match?.[1] ?? '';
}

export function buildWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

// ---------------------------------------------------------------------------
// Player response
// ---------------------------------------------------------------------------

/**
 * Extract the ytInitialPlayerResponse JSON object from page HTML.
 */
export function extractPlayerResponse(html: string): JsonRecord | null {
  const patterns = [
    // Modern: var ytInitialPlayerResponse = {...};
    /var ytInitialPlayerResponse\s*=\s*(\{.+?\});\s*(?:var|<\/script>)/s,
    // Some pages end the assignment differently
    /ytInitialPlayerResponse\s*=\s*(\{.+?\})(?:;|\s*<\/script>)/s,
  ];

  for (const pattern of patterns) {
    const match = html.match(pattern);
    if (!match) continue;

    const parsed = tryParseRecord(match[1]);
    if (parsed) return parsed;

    // The lazy match stopped inside a string; walk braces instead
    const start = html.indexOf('ytInitialPlayerResponse');
    const braceStart = start === -1 ? -1 : html.indexOf('{', start);
    if (braceStart === -1) continue;
    const jsonStr = extractJsonObject(html, braceStart);
    if (jsonStr) {
      const walked = tryParseRecord(jsonStr);
      if (walked) return walked;
    }
  }

  return null;
}

function tryParseRecord(text: string): JsonRecord | null {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : null;
  } catch (e) {
    if (process.env.DEBUG) console.debug('[url-brief]', 'player response parse failed:', errorMessage(e));
    return null;
  }
}

/**
 * Extract a complete JSON object starting at position `start` in `str`.
 * Handles nested objects/arrays and string literals.
 */
function extractJsonObject(str: string, start: number): string | null {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < str.length; i++) {
    const ch = str[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (ch === '\\' && inString) {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (ch === '{' || ch === '[') depth++;
    else if (ch === '}' || ch === ']') {
      depth--;
      if (depth === 0) return str.slice(start, i + 1);
    }
  }

  return null;
}

/**
 * Download the watch page and return its player response.
 *
 * @throws FetchError on network failure, a page without video data, or an unplayable video
 */
export async function fetchPlayerResponse(videoId: string, timeoutMs?: number): Promise<JsonRecord> {
  const page = await fetchText(buildWatchUrl(videoId), { timeoutMs });
  const playerResponse = extractPlayerResponse(page.body);
  if (!playerResponse) {
    throw new FetchError('YouTube served a page without video data (likely a consent or bot check)');
  }

  const status = getPath(playerResponse, ['playabilityStatus', 'status']);
  if (typeof status === 'string' && status !== 'OK') {
    const reason = getPath(playerResponse, ['playabilityStatus', 'reason']);
    throw new FetchError(
      `Video ${videoId} is unavailable (${status}${typeof reason === 'string' ? `: ${reason}` : ''})`,
    );
  }

  return playerResponse;
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

function recordAt(value: unknown, path: ReadonlyArray<string | number>): JsonRecord {
  const found = getPath(value, path);
  return isRecord(found) ? found : {};
}

/** "2024-01-15" or "2024-01-15T00:00:00-08:00" → "20240115" */
export function normalizeUploadDate(raw: string | null): string | null {
  if (!raw) return null;
  const match = raw.match(/^(\d{4})-(\d{2})-(\d{2})/);
  return match ? `${match[1]}${match[2]}${match[3]}` : raw;
}

export function extractVideoMetadata(playerResponse: JsonRecord, videoId: string): VideoMetadata {
  const details = recordAt(playerResponse, ['videoDetails']);
  const microformat = recordAt(playerResponse, ['microformat', 'playerMicroformatRenderer']);
  const microTitle = getPath(microformat, ['title', 'simpleText']);

  return {
    title: readString(details, 'title') ?? (typeof microTitle === 'string' ? microTitle : null),
    channel: readString(details, 'author') ?? readString(microformat, 'ownerChannelName'),
    url: buildWatchUrl(videoId),
    lengthSeconds: readNumber(details, 'lengthSeconds') ?? readNumber(microformat, 'lengthSeconds'),
    publishDate: normalizeUploadDate(readString(microformat, 'uploadDate') ?? readString(microformat, 'publishDate')),
    views: readNumber(details, 'viewCount') ?? readNumber(microformat, 'viewCount'),
  };
}

function asFetchError(prefix: string, err: unknown): FetchError {
  return new FetchError(`${prefix}: ${errorMessage(err)}`, {
    status: err instanceof FetchError ? err.status : undefined,
    cause: err,
  });
}

export async function fetchVideoMetadata(videoId: string, options: YouTubeFetchOptions = {}): Promise<VideoMetadata> {
  try {
    const playerResponse = options.playerResponse ?? (await fetchPlayerResponse(videoId, options.timeoutMs));
    return extractVideoMetadata(playerResponse, videoId);
  } catch (err) {
    throw asFetchError('Could not fetch YouTube metadata', err);
  }
}

// ---------------------------------------------------------------------------
// Captions
// ---------------------------------------------------------------------------

export function listCaptionTracks(playerResponse: JsonRecord): CaptionTrack[] {
  const tracks = getPath(playerResponse, ['captions', 'playerCaptionsTracklistRenderer', 'captionTracks']);
  if (!Array.isArray(tracks)) return [];

  const result: CaptionTrack[] = [];
  for (const track of tracks) {
    if (!isRecord(track)) continue;
    const baseUrl = readString(track, 'baseUrl');
    const languageCode = readString(track, 'languageCode');
    if (!baseUrl || !languageCode) continue;
    const simpleName = getPath(track, ['name', 'simpleText']);
    const runName = getPath(track, ['name', 'runs', 0, 'text']);
    result.push({
      baseUrl,
      languageCode,
      name: typeof simpleName === 'string' ? simpleName : typeof runName === 'string' ? runName : languageCode,
      isGenerated: track.kind === 'asr',
    });
  }
  return result;
}

/** Language codes in listing order: manually created tracks first, then generated ones. */
export function availableLanguages(tracks: readonly CaptionTrack[]): string[] {
  const ordered = [...tracks.filter(t => !t.isGenerated), ...tracks.filter(t => t.isGenerated)];
  return [...new Set(ordered.map(t => t.languageCode))];
}

/**
 * First track matching the earliest possible language in `languages`;
 * for each language a manually created track wins over a generated one.
 */
export function selectCaptionTrack(tracks: readonly CaptionTrack[], languages: readonly string[]): CaptionTrack | null {
  for (const lang of languages) {
    const manual = tracks.find(t => !t.isGenerated && t.languageCode === lang);
    if (manual) return manual;
    const generated = tracks.find(t => t.isGenerated && t.languageCode === lang);
    if (generated) return generated;
  }
  return null;
}

/** Out-of-range code points become U+FFFD instead of throwing. */
function codePointToString(cp: number): string {
  return Number.isInteger(cp) && cp >= 0 && cp <= 0x10ffff ? String.fromCodePoint(cp) : '\uFFFD';
}

/**
 * Decode entities and strip formatting tags left in caption text after XML parsing.
 *
 * Order of operations:
 * 1. Strip inline tags (e.g. <font color="...">) that were escaped in the XML
 * 2. Decode remaining entities (captions are often double-encoded)
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => codePointToString(parseInt(code, 10)))
    .replace(/&#x([0-9A-Fa-f]+);/g, (_, hex: string) => codePointToString(parseInt(hex, 16)))
    .replace(/&amp;/g, '&')
    .trim();
}

function parseNumberAttr(value: string | undefined, scale = 1): number {
  const parsed = value === undefined ? NaN : parseFloat(value);
  return Number.isFinite(parsed) ? parsed / scale : 0;
}

/**
 * Parse timed-text XML into snippets, in document order.
 *
 * Format: <transcript><text start="0.5" dur="2.1">Hello &amp;amp; world</text>...</transcript>
 * The srv3 variant (<p t="500" d="2100">, milliseconds) is accepted as well.
 */
export function parseCaptionXml(xml: string): TranscriptSnippet[] {
  const $ = load(xml, { xml: true });
  const snippets: TranscriptSnippet[] = [];

  $('text').each((_, el) => {
    const node = $(el);
    const text = decodeHtmlEntities(node.text());
    if (!text) return;
    snippets.push({
      text,
      start: parseNumberAttr(node.attr('start')),
      duration: parseNumberAttr(node.attr('dur')),
    });
  });
  if (snippets.length > 0) return snippets;

  $('p').each((_, el) => {
    const node = $(el);
    const text = decodeHtmlEntities(node.text());
    if (!text) return;
    snippets.push({
      text,
      start: parseNumberAttr(node.attr('t'), 1000),
      duration: parseNumberAttr(node.attr('d'), 1000),
    });
  });
  return snippets;
}

/**
 * Fetch the transcript of a video in the first available caption language.
 *
 * @throws FetchError when the video has no captions or a request fails
 */
export async function fetchTranscript(videoId: string, options: YouTubeFetchOptions = {}): Promise<TranscriptSnippet[]> {
  try {
    const playerResponse = options.playerResponse ?? (await fetchPlayerResponse(videoId, options.timeoutMs));
    const tracks = listCaptionTracks(playerResponse);
    const track = selectCaptionTrack(tracks, availableLanguages(tracks));
    if (!track) throw new FetchError(`No captions available for video ${videoId}`);

    const captions = await fetchText(track.baseUrl, { timeoutMs: options.timeoutMs });
    return parseCaptionXml(captions.body);
  } catch (err) {
    throw asFetchError('Could not fetch YouTube transcript', err);
  }
}

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

/** Snippet texts are joined with a single space. */
export function formatYouTubePrompt(meta: VideoMetadata, transcript: readonly TranscriptSnippet[]): string {
  if (transcript.length === 0) return NO_TRANSCRIPT_PROMPT;

  const text = transcript.map(s => s.text).join(' ');

  const prompt =
    YOUTUBE_PREAMBLE +
    'Video information:\n' +
    `- Title: ${meta.title ?? 'Untitled'}\n` +
    `- Channel: ${meta.channel ?? 'unknown'}\n` +
    `- URL: ${meta.url}\n` +
    `- Length (seconds): ${meta.lengthSeconds ?? 'N/A'}\n` +
    `- Publish date: ${meta.publishDate ?? 'N/A'}\n` +
    `- Views: ${meta.views ?? 'N/A'}\n\n` +
    'Transcript:\n\n' +
    text;

  return truncatePrompt(prompt);
}

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

export interface YouTubeSourceOptions {
  timeoutMs?: number;
}

export function createYouTubeSource(options: YouTubeSourceOptions = {}): ContentSource<YouTubeVideo> {
  return {
    kind: 'youtube',
    label: 'YouTube',
    matches: (url) => url.includes('youtube.com') || url.includes('youtu.be'),
    async fetch(url) {
      const videoId = extractVideoId(url);
      if (!videoId) throw new ExtractionError('Could not extract YouTube video ID.');

      let playerResponse: JsonRecord;
      try {
        playerResponse = await fetchPlayerResponse(videoId, options.timeoutMs);
      } catch (err) {
        throw asFetchError('Could not fetch YouTube metadata', err);
      }

      const metadata = await fetchVideoMetadata(videoId, { playerResponse });
      const transcript = await fetchTranscript(videoId, { playerResponse, timeoutMs: options.timeoutMs });
      return { videoId, metadata, transcript };
    },
    toPrompt: (video) => formatYouTubePrompt(video.metadata, video.transcript),
  };
}
