/**
 * Numbered headings: `1. Introduction` (H1) and `1.1 Overview` (H2).
 */

import { cleanHeadingText } from '../text/clean.js';
import { pageAt } from '../text/segmenter.js';
import { isNoiseLine } from '../filter/noise.js';
import { assessHeading } from '../filter/validity.js';
import { CONFIDENCE, ignoreTrace, type Detector } from './types.js';
import type { Candidate, HeadingLevel } from '../types.js';

const SECTION = /^(\d+)\.\s+(.+)$/;
const SUBSECTION = /^(\d+\.\d+)\s+(.+)$/;

export const detectNumberedHeadings: Detector = (lines, pages, trace = ignoreTrace) => {
  const candidates: Candidate[] = [];

  for (const line of lines) {
    if (isNoiseLine(line.text)) continue;

    let level: HeadingLevel;
    let label: string;
    let rest: string;
    let confidence: number;

    const section = SECTION.exec(line.text);
    const subsection = section ? null : SUBSECTION.exec(line.text);
    if (section) {
      level = 'H1';
      label = `${section[1]}.`;
      rest = section[2];
      confidence = CONFIDENCE.numberedH1;
    } else if (subsection) {
      level = 'H2';
      label = subsection[1];
      rest = subsection[2];
      confidence = CONFIDENCE.numberedH2;
    } else {
      continue;
    }

    const text = cleanHeadingText(rest);
    const verdict = assessHeading(text, lines, line.index);
    if (!verdict.ok) {
      trace({ type: 'rejected', detector: 'numbered', line, text, reason: verdict.reason });
      continue;
    }

    candidates.push({
      level,
      text: `${label} ${text}`,
      page: pageAt(pages, line.index),
      position: line.index,
      confidence,
      source: 'numbered',
    });
  }

  return candidates;
};
