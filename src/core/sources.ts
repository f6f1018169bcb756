/**
 * Content sources: one per supported site.
 *
 * A source recognises its URLs, fetches the raw content behind one, and turns
 * that content into a summarisation prompt. The classifier picks a source from
 * the registry; nothing else needs to know which sites exist.
 */

import type { SourceKind } from '../types.js';

export interface ContentSource<Raw = unknown> {
  kind: SourceKind;
  /** Human-readable name used in status messages ("Reddit", "YouTube") */
  label: string;
  /** Substring test on the raw URL text */
  matches(url: string): boolean;
  fetch(url: string): Promise<Raw>;
  toPrompt(raw: Raw): string;
}

/**
 * Ordered registry; the first source whose `matches` accepts the URL wins.
 * Methods are declared with method syntax so any ContentSource<Raw> fits here.
 */
export type SourceRegistry = ReadonlyArray<ContentSource<unknown>>;
