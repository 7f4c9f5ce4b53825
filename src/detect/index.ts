import { detectNumberedHeadings } from './numbered.js';
import { detectStructuralHeadings } from './structural.js';
import { detectTocHeadings } from './toc.js';
import type { Detector } from './types.js';
import type { DetectorName } from '../types.js';

export const DETECTORS: Readonly<Record<DetectorName, Detector>> = {
  numbered: detectNumberedHeadings,
  structural: detectStructuralHeadings,
  toc: detectTocHeadings,
};
