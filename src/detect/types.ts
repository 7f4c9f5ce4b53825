import type { PageMap } from '../text/segmenter.js';
import type { Candidate, Line, TraceEvent } from '../types.js';

/** Fixed confidence per detector and level */
export const CONFIDENCE = {
  numberedH1: 0.9,
  numberedH2: 0.8,
  structural: 0.6,
  toc: 0.5,
} as const;

export type Trace = (event: TraceEvent) => void;

/**
 * Common detector signature. Detectors are pure and independent of each
 * other; the ranker imposes the final order.
 */
export type Detector = (lines: readonly Line[], pages: PageMap, trace?: Trace) => Candidate[];

export function ignoreTrace(): void {}
