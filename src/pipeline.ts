/**
 * Outline pipeline: segment → detect → rank → title.
 */

import { DETECTORS } from './detect/index.js';
import { rankHeadings } from './rank/dedupe.js';
import { segmentLines, type Segmentation } from './text/segmenter.js';
import { resolveTitle } from './title.js';
import { resolveOptions, type ResolvedOptions } from './options.js';
import type { Candidate, Heading, Outline, OutlineOptions } from './types.js';

export interface PipelineResult {
  readonly candidates: readonly Candidate[];
  readonly headings: readonly Heading[];
  readonly title: string;
}

/** Run every enabled detector; their outputs are simply concatenated. */
export function collectCandidates(segmentation: Segmentation, options: ResolvedOptions): Candidate[] {
  const { lines, pages } = segmentation;
  const candidates: Candidate[] = [];

  for (const name of options.detectors) {
    for (const candidate of DETECTORS[name](lines, pages, options.trace)) {
      options.trace({ type: 'candidate', candidate });
      candidates.push(candidate);
    }
  }

  return candidates;
}

export function runPipeline(segmentation: Segmentation, options: ResolvedOptions): PipelineResult {
  const candidates = collectCandidates(segmentation, options);
  const headings = rankHeadings(candidates, options.trace);
  const title = resolveTitle(segmentation.lines, headings, options);
  return { candidates, headings, title };
}

/**
 * Extract a title and heading outline from page-annotated text.
 * Never throws on the text itself; only invalid options are rejected.
 */
export function extractOutline(text: string, options?: OutlineOptions): Outline {
  const { headings, title } = runPipeline(segmentLines(text), resolveOptions(options));
  return { title, outline: [...headings] };
}
