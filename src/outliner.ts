/**
 * Outliner - the main entry point for headwise.
 *
 * Holds the segmented lines and the resolved outline of one document.
 */

import { ExtractionFailedError, HeadwiseError } from './errors.js';
import { resolveOptions } from './options.js';
import { joinPages } from './pages.js';
import { runPipeline } from './pipeline.js';
import { segmentLines } from './text/segmenter.js';
import type { Candidate, Heading, Line, Outline, OutlineOptions, TextExtractor } from './types.js';

export class Outliner {
  /** Document title */
  readonly title: string;

  /** Deduplicated headings in document order */
  readonly headings: readonly Heading[];

  /** Non-blank source lines with their pages */
  readonly lines: readonly Line[];

  private readonly _candidates: readonly Candidate[];

  private constructor(lines: readonly Line[], candidates: readonly Candidate[], headings: readonly Heading[], title: string) {
    this.lines = lines;
    this._candidates = candidates;
    this.headings = headings;
    this.title = title;
  }

  /** Build an outline from text carrying `Page <p> of <t>` markers. */
  static fromText(text: string, options?: OutlineOptions): Outliner {
    const resolved = resolveOptions(options);
    const segmentation = segmentLines(text);
    const { candidates, headings, title } = runPipeline(segmentation, resolved);
    return new Outliner(segmentation.lines, candidates, headings, title);
  }

  /** Build an outline from already-split page texts (page 1 first). */
  static fromPages(pages: readonly string[], options?: OutlineOptions): Outliner {
    return Outliner.fromText(joinPages(pages), options);
  }

  /**
   * Run a text extractor on `source` and outline the result.
   *
   * Errors from the headwise hierarchy (e.g. ExtractorUnavailableError)
   * propagate unchanged; anything else is wrapped in ExtractionFailedError.
   */
  static async fromSource(
    source: string,
    extractor: TextExtractor,
    options?: OutlineOptions,
  ): Promise<Outliner> {
    const resolved = resolveOptions(options);
    let text: string;
    try {
      text = await extractor.extract(source);
    } catch (err) {
      if (err instanceof HeadwiseError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ExtractionFailedError(`Text extraction failed for ${source}: ${reason}`, source, { cause: err });
    }
    const segmentation = segmentLines(text);
    const { candidates, headings, title } = runPipeline(segmentation, resolved);
    return new Outliner(segmentation.lines, candidates, headings, title);
  }

  /** Every accepted candidate before deduplication, in detector order */
  candidates(): Candidate[] {
    return [...this._candidates];
  }

  /** Convert to a plain serializable object */
  toJSON(): Outline {
    return {
      title: this.title,
      outline: this.headings.map(h => ({ level: h.level, text: h.text, page: h.page })),
    };
  }
}
