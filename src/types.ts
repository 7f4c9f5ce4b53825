/**
 * Public types for the headwise library.
 */

/** Heading hierarchy level */
export type HeadingLevel = 'H1' | 'H2';

/** Names of the built-in heading detectors */
export type DetectorName = 'numbered' | 'structural' | 'toc';

/** A non-blank source line tagged with the page in effect */
export interface Line {
  readonly text: string;
  /** 0-based index among non-blank lines */
  readonly index: number;
  readonly page: number;
}

/** Unconfirmed heading proposal from a single detector */
export interface Candidate {
  readonly level: HeadingLevel;
  readonly text: string;
  readonly page: number;
  /** Index of the line the candidate came from */
  readonly position: number;
  /** Fixed per-detector weight, used only to break ties between duplicates */
  readonly confidence: number;
  readonly source: DetectorName;
}

/** Finalized outline entry */
export interface Heading {
  readonly level: HeadingLevel;
  readonly text: string;
  readonly page: number;
}

/** Serializable extraction result */
export interface Outline {
  readonly title: string;
  readonly outline: Heading[];
}

/** Why the validity filter turned a match down */
export type RejectReason = 'too-short' | 'too-long' | 'numeric' | 'symbols' | 'context';

/** Diagnostic events emitted while an outline is built */
export type TraceEvent =
  | { readonly type: 'candidate'; readonly candidate: Candidate }
  | {
      readonly type: 'rejected';
      readonly detector: DetectorName;
      readonly line: Line;
      readonly text: string;
      readonly reason: RejectReason;
    }
  | { readonly type: 'toc'; readonly transition: 'enter' | 'exit'; readonly line: Line }
  | { readonly type: 'duplicate'; readonly dropped: Candidate; readonly kept: Candidate };

/** Options for outline extraction */
export interface OutlineOptions {
  /** Number of leading lines searched for a title. Default: 10 */
  readonly titleScanLines?: number;
  /** Title of a document without headings. Default: 'Unknown Document' */
  readonly fallbackTitle?: string;
  /** Detectors to run. Default: all of them */
  readonly detectors?: readonly DetectorName[];
  /** Receives diagnostic events. Default: none */
  readonly onTrace?: (event: TraceEvent) => void;
}

/**
 * Upstream collaborator that turns a document (path, URL, id) into text with
 * `Page <p> of <t>` marker lines before each page.
 */
export interface TextExtractor {
  extract(source: string): Promise<string>;
}
