import { isNoiseLine } from './filter/noise.js';
import { DEFAULT_FALLBACK_TITLE, DEFAULT_TITLE_SCAN_LINES } from './options.js';
import type { Heading, Line } from './types.js';

const MIN_TITLE_LENGTH = 10;
const NUMBERED_PREFIX = /^\d+\./;

export interface TitleOptions {
  readonly titleScanLines?: number;
  readonly fallbackTitle?: string;
}

/**
 * Pick a document title. A document without headings gets the fallback;
 * otherwise the first substantial line near the top that is not numbered,
 * noise or a page marker, else the first heading.
 */
export function resolveTitle(
  lines: readonly Line[],
  headings: readonly Heading[],
  options?: TitleOptions,
): string {
  const fallback = options?.fallbackTitle ?? DEFAULT_FALLBACK_TITLE;
  if (headings.length === 0) return fallback;

  const scan = options?.titleScanLines ?? DEFAULT_TITLE_SCAN_LINES;

  for (const line of lines.slice(0, scan)) {
    if (isTitleLine(line.text)) return line.text;
  }

  return headings[0].text;
}

export function isTitleLine(text: string): boolean {
  return (
    Array.from(text).length > MIN_TITLE_LENGTH &&
    !NUMBERED_PREFIX.test(text) &&
    !isNoiseLine(text) &&
    !text.toLowerCase().startsWith('page ')
  );
}
