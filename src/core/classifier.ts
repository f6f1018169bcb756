/**
 * URL classification: pick the content source for a raw URL string.
 *
 * Matching is plain substring search in registry order, so a Reddit URL that
 * carries "youtube.com" in a query value still goes to the Reddit source.
 */

import type { ContentSource, SourceRegistry } from './sources.js';
import { MissingInputError, UnsupportedSourceError } from '../types.js';

export function assertUrlProvided(url: string | null | undefined): asserts url is string {
  if (typeof url !== 'string' || url.trim() === '') {
    throw new MissingInputError();
  }
}

/**
 * @throws MissingInputError for an empty or missing URL
 * @throws UnsupportedSourceError when no source matches
 */
export function classifyUrl(url: string | null | undefined, sources: SourceRegistry): ContentSource<unknown> {
  assertUrlProvided(url);
  const source = sources.find(s => s.matches(url));
  if (!source) throw new UnsupportedSourceError(url);
  return source;
}
