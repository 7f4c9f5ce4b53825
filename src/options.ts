import { InvalidOptionsError } from './errors.js';
import { ignoreTrace, type Trace } from './detect/types.js';
import type { DetectorName, OutlineOptions } from './types.js';

export const DEFAULT_TITLE_SCAN_LINES = 10;
export const DEFAULT_FALLBACK_TITLE = 'Unknown Document';
export const ALL_DETECTORS: readonly DetectorName[] = ['numbered', 'structural', 'toc'];

export interface ResolvedOptions {
  readonly titleScanLines: number;
  readonly fallbackTitle: string;
  readonly detectors: readonly DetectorName[];
  readonly trace: Trace;
}

/**
 * Fill in defaults and validate caller-supplied options.
 * Detectors always run in their canonical order.
 */
export function resolveOptions(options?: OutlineOptions): ResolvedOptions {
  const titleScanLines = options?.titleScanLines ?? DEFAULT_TITLE_SCAN_LINES;
  if (!Number.isInteger(titleScanLines) || titleScanLines < 1) {
    throw new InvalidOptionsError(
      `titleScanLines must be a positive integer, got ${titleScanLines}`,
      'titleScanLines',
    );
  }

  const requested = options?.detectors ?? ALL_DETECTORS;
  for (const name of requested) {
    if (!ALL_DETECTORS.includes(name)) {
      throw new InvalidOptionsError(`Unknown detector: ${String(name)}`, 'detectors');
    }
  }

  return Object.freeze({
    titleScanLines,
    fallbackTitle: options?.fallbackTitle ?? DEFAULT_FALLBACK_TITLE,
    detectors: ALL_DETECTORS.filter(name => requested.includes(name)),
    trace: options?.onTrace ?? ignoreTrace,
  });
}
