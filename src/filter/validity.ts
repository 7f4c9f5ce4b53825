/**
 * Structural plausibility of a heading match.
 *
 * A syntactic match is only trusted when the text itself looks like a heading
 * and its neighbours look like the edges of a section: a short (or missing)
 * line before it, a capitalized (or missing) line after it.
 */

import type { Line, RejectReason } from '../types.js';

export const MIN_HEADING_LENGTH = 3;
export const MAX_HEADING_LENGTH = 200;
/** Share of characters that may be neither alphanumeric nor a space */
export const MAX_SYMBOL_RATIO = 0.3;
/** A previous line shorter than this reads as a break, not body text */
export const SHORT_LINE_LENGTH = 20;

export type Verdict =
  | { readonly ok: true; readonly score: number }
  | { readonly ok: false; readonly reason: RejectReason };

const DIGITS_ONLY = /^\p{Nd}+$/u;
const ALPHANUMERIC = /[\p{L}\p{N}]/u;
const STARTS_UPPERCASE = /^\p{Lu}/u;

export function assessHeading(text: string, lines: readonly Line[], index: number): Verdict {
  const chars = Array.from(text);

  if (chars.length < MIN_HEADING_LENGTH) return { ok: false, reason: 'too-short' };
  if (chars.length > MAX_HEADING_LENGTH) return { ok: false, reason: 'too-long' };
  if (DIGITS_ONLY.test(text)) return { ok: false, reason: 'numeric' };

  const symbols = chars.filter(c => c !== ' ' && !ALPHANUMERIC.test(c)).length;
  if (symbols > chars.length * MAX_SYMBOL_RATIO) return { ok: false, reason: 'symbols' };

  const score = contextScore(lines, index);
  return score >= 1 ? { ok: true, score } : { ok: false, reason: 'context' };
}

export function isValidHeading(text: string, lines: readonly Line[], index: number): boolean {
  return assessHeading(text, lines, index).ok;
}

/** 0-2: how much the neighbouring lines look like section boundaries */
export function contextScore(lines: readonly Line[], index: number): number {
  let score = 0;

  const prev = index > 0 ? lines[index - 1].text.trim() : '';
  if (Array.from(prev).length < SHORT_LINE_LENGTH) score++;

  const next = index < lines.length - 1 ? lines[index + 1].text.trim() : '';
  if (!next || STARTS_UPPERCASE.test(next)) score++;

  return score;
}
