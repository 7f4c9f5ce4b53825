/**
 * Structural keywords: whole lines such as "Abstract" or "Revision History"
 * that open a section in most reports and course documents.
 */

import { pageAt } from '../text/segmenter.js';
import { assessHeading } from '../filter/validity.js';
import { CONFIDENCE, ignoreTrace, type Detector } from './types.js';
import type { Candidate, HeadingLevel } from '../types.js';

/** Tested in order against the lower-cased line; the first match wins */
export const STRUCTURAL_KEYWORDS: readonly (readonly [RegExp, HeadingLevel])[] = [
  [/^acknowledgements?$/, 'H1'],
  [/^abstract$/, 'H1'],
  [/^introduction$/, 'H1'],
  [/^conclusion$/, 'H1'],
  [/^references?$/, 'H1'],
  [/^revision\s+history$/, 'H1'],
  [/^table\s+of\s+contents?$/, 'H1'],

  [/^intended\s+audience$/, 'H2'],
  [/^career\s+paths?.*$/, 'H2'],
  [/^learning\s+objectives?$/, 'H2'],
  [/^entry\s+requirements?$/, 'H2'],
  [/^business\s+outcomes?$/, 'H2'],
  [/^content$/, 'H2'],
  [/^trademarks?$/, 'H2'],
];

export function matchStructuralKeyword(text: string): HeadingLevel | null {
  const lower = text.toLowerCase().trim();
  const entry = STRUCTURAL_KEYWORDS.find(([pattern]) => pattern.test(lower));
  return entry ? entry[1] : null;
}

export const detectStructuralHeadings: Detector = (lines, pages, trace = ignoreTrace) => {
  const candidates: Candidate[] = [];

  for (const line of lines) {
    const level = matchStructuralKeyword(line.text);
    if (!level) continue;

    const verdict = assessHeading(line.text, lines, line.index);
    if (!verdict.ok) {
      trace({ type: 'rejected', detector: 'structural', line, text: line.text, reason: verdict.reason });
      continue;
    }

    candidates.push({
      level,
      text: line.text,
      page: pageAt(pages, line.index),
      position: line.index,
      confidence: CONFIDENCE.structural,
      source: 'structural',
    });
  }

  return candidates;
};
