const WHITESPACE_RUN = /\s+/g;
// A dot followed only by dots, whitespace and digits up to the end: TOC leaders
// and the page numbers that trail them.
const TRAILING_LEADER = /\.[.\s\d]*$/;

/** Normalize heading text. Idempotent. */
export function cleanHeadingText(text: string): string {
  return text.replace(WHITESPACE_RUN, ' ').replace(TRAILING_LEADER, '').trim();
}
