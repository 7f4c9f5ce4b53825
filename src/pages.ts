/**
 * Helpers for text extractors: build the `Page <p> of <t>` marker stream
 * the segmenter reads page numbers from.
 */

export function formatPageMarker(page: number, total: number): string {
  return `Page ${page} of ${total}`;
}

/**
 * Join per-page text into a single marker-annotated string.
 * Empty pages are left out, but numbering still counts them.
 */
export function joinPages(pages: readonly string[]): string {
  let text = '';
  pages.forEach((pageText, i) => {
    if (!pageText) return;
    text += `\n${formatPageMarker(i + 1, pages.length)}\n`;
    text += pageText + '\n';
  });
  return text;
}
