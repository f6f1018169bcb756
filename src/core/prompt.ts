/**
 * Shared prompt limits.
 */

/** Hard cap on prompt length, in UTF-16 code units */
export const MAX_PROMPT_CHARS = 100_000;

/**
 * Cut `text` to at most `max` characters. Not word-boundary aware; a surrogate
 * pair split by the cut is dropped whole.
 */
export function truncatePrompt(text: string, max: number = MAX_PROMPT_CHARS): string {
  if (text.length <= max) return text;
  let cut = text.slice(0, max);
  const last = cut.charCodeAt(cut.length - 1);
  if (last >= 0xd800 && last <= 0xdbff) cut = cut.slice(0, -1);
  return cut;
}
