/**
 * headwise - heading outlines from page-annotated document text
 *
 * @example
 * ```typescript
 * import { extractOutline } from 'headwise';
 *
 * const { title, outline } = extractOutline(text);
 * for (const heading of outline) {
 *   console.log(`${heading.level} p.${heading.page} ${heading.text}`);
 * }
 * ```
 */

export { Outliner } from './outliner.js';
export { extractOutline } from './pipeline.js';
export { formatPageMarker, joinPages } from './pages.js';
export { cleanHeadingText } from './text/clean.js';
export { segmentLines } from './text/segmenter.js';
export { isNoiseLine } from './filter/noise.js';
export { assessHeading, isValidHeading } from './filter/validity.js';
export { detectNumberedHeadings } from './detect/numbered.js';
export { detectStructuralHeadings } from './detect/structural.js';
export { detectTocHeadings, createTocScanner, TocScanner } from './detect/toc.js';
export { rankHeadings } from './rank/dedupe.js';
export { resolveTitle } from './title.js';
export {
  HeadwiseError,
  InvalidOptionsError,
  ExtractorUnavailableError,
  ExtractionFailedError,
} from './errors.js';
export type {
  HeadingLevel,
  DetectorName,
  Line,
  Candidate,
  Heading,
  Outline,
  OutlineOptions,
  RejectReason,
  TraceEvent,
  TextExtractor,
} from './types.js';
export type { Detector } from './detect/types.js';
export type { PageMap, Segmentation } from './text/segmenter.js';
export type { TocState, TocStep } from './detect/toc.js';
export type { Verdict } from './filter/validity.js';
