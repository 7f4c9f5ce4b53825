/**
 * Table-of-contents detector.
 *
 * A two-state machine over the line sequence:
 *
 *   NORMAL --enter--> IN_TOC    line contains "table of contents"
 *   IN_TOC --exit---> NORMAL    line starts with "page " or is a section keyword
 *
 * While IN_TOC, `num text page` lines become candidates whose page is the
 * entry's target page rather than the page the contents list is printed on.
 * The trigger lines themselves are consumed.
 */

import { CONFIDENCE, ignoreTrace, type Detector } from './types.js';
import type { Candidate, HeadingLevel, Line } from '../types.js';

export type TocState = 'NORMAL' | 'IN_TOC';

export type TocStep =
  | { readonly kind: 'enter' }
  | { readonly kind: 'exit' }
  | { readonly kind: 'entry'; readonly level: HeadingLevel; readonly text: string; readonly page: number }
  | { readonly kind: 'skip' };

const TOC_TRIGGER = 'table of contents';
const EXIT_KEYWORDS: ReadonlySet<string> = new Set(['abstract', 'introduction', 'acknowledgements']);

const ENTRY_PATTERNS: readonly RegExp[] = [
  /^(\d+)\.\s+(.+?)\s+(\d+)$/,
  /^(\d+\.\d+)\s+(.+?)\s+(\d+)$/,
];

export function isTocEnter(text: string): boolean {
  return text.toLowerCase().trim().includes(TOC_TRIGGER);
}

export function isTocExit(text: string): boolean {
  const lower = text.toLowerCase().trim();
  return lower.startsWith('page ') || EXIT_KEYWORDS.has(lower);
}

/** Parse a contents entry such as `1. Introduction 5` or `2.3 Scope 11` */
export function parseTocEntry(text: string): Extract<TocStep, { kind: 'entry' }> | null {
  for (const pattern of ENTRY_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;
    const [, num, title, page] = match;
    return {
      kind: 'entry',
      level: num.includes('.') ? 'H2' : 'H1',
      text: `${num} ${title}`,
      page: parseInt(page, 10),
    };
  }
  return null;
}

export class TocScanner {
  private _state: TocState = 'NORMAL';

  get state(): TocState {
    return this._state;
  }

  /** Feed one line and report what it meant in the current state */
  step(text: string): TocStep {
    if (isTocEnter(text)) {
      this._state = 'IN_TOC';
      return { kind: 'enter' };
    }

    if (this._state === 'NORMAL') return { kind: 'skip' };

    if (isTocExit(text)) {
      this._state = 'NORMAL';
      return { kind: 'exit' };
    }

    if (!text) return { kind: 'skip' };
    return parseTocEntry(text) ?? { kind: 'skip' };
  }
}

export function createTocScanner(): TocScanner {
  return new TocScanner();
}

export const detectTocHeadings: Detector = (lines, _pages, trace = ignoreTrace) => {
  const scanner = createTocScanner();
  const candidates: Candidate[] = [];

  for (const line of lines) {
    const result = scanner.step(line.text);
    switch (result.kind) {
      case 'enter':
      case 'exit':
        trace({ type: 'toc', transition: result.kind, line });
        break;
      case 'entry':
        candidates.push(toCandidate(result, line));
        break;
      case 'skip':
        break;
    }
  }

  return candidates;
};

function toCandidate(entry: Extract<TocStep, { kind: 'entry' }>, line: Line): Candidate {
  return {
    level: entry.level,
    text: entry.text,
    page: entry.page,
    position: line.index,
    confidence: CONFIDENCE.toc,
    source: 'toc',
  };
}
