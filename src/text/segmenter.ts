/**
 * Line/page segmentation.
 *
 * Splits raw extractor output into non-blank, trimmed lines and tags each one
 * with the page in effect. Pages come from `Page <p> of <t>` marker lines; the
 * marker line is kept and carries its own page number.
 */

import type { Line } from '../types.js';

/** Read-only lookup from line index to page number */
export type PageMap = ReadonlyMap<number, number>;

export interface Segmentation {
  readonly lines: readonly Line[];
  readonly pages: PageMap;
}

const PAGE_MARKER = /Page (\d+) of (\d+)/;

export function segmentLines(text: string): Segmentation {
  const lines: Line[] = [];
  const pages = new Map<number, number>();
  let currentPage = 1;

  for (const raw of text.split('\n')) {
    const trimmed = raw.trim();
    if (!trimmed) continue;

    const marker = PAGE_MARKER.exec(trimmed);
    if (marker) {
      currentPage = parseInt(marker[1], 10);
    }

    const index = lines.length;
    lines.push(Object.freeze({ text: trimmed, index, page: currentPage }));
    pages.set(index, currentPage);
  }

  return { lines: Object.freeze(lines), pages };
}

/** Page of a line, defaulting to the first page for unknown indices */
export function pageAt(pages: PageMap, index: number): number {
  return pages.get(index) ?? 1;
}
