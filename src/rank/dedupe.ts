/**
 * Candidate deduplication and ranking.
 *
 * Candidates are visited from most to least confident (earlier lines first on
 * ties) and the first one seen for each (text, page) key is kept. The
 * survivors are then put back in document order by their own line position.
 */

import { ignoreTrace, type Trace } from '../detect/types.js';
import type { Candidate, Heading } from '../types.js';

export function headingKey(candidate: Pick<Candidate, 'text' | 'page'>): string {
  return `${candidate.text.toLowerCase().trim()}\u0000${candidate.page}`;
}

export function dedupeCandidates(candidates: readonly Candidate[], trace: Trace = ignoreTrace): Candidate[] {
  const ranked = [...candidates].sort(
    (a, b) => b.confidence - a.confidence || a.position - b.position,
  );

  const kept = new Map<string, Candidate>();
  for (const candidate of ranked) {
    const key = headingKey(candidate);
    const winner = kept.get(key);
    if (winner) {
      trace({ type: 'duplicate', dropped: candidate, kept: winner });
      continue;
    }
    kept.set(key, candidate);
  }

  return [...kept.values()].sort((a, b) => a.position - b.position);
}

export function toHeading(candidate: Candidate): Heading {
  return { level: candidate.level, text: candidate.text, page: candidate.page };
}

export function rankHeadings(candidates: readonly Candidate[], trace?: Trace): Heading[] {
  return dedupeCandidates(candidates, trace).map(toHeading);
}
