/**
 * Custom error types for headwise.
 * Extraction itself never throws on text; these cover bad options and
 * failures reported by the upstream text extractor.
 */

export class HeadwiseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HeadwiseError';
  }
}

export class InvalidOptionsError extends HeadwiseError {
  constructor(message: string, public readonly option: string) {
    super(message);
    this.name = 'InvalidOptionsError';
  }
}

/** The extractor could not run at all, e.g. an OCR engine is not installed. */
export class ExtractorUnavailableError extends HeadwiseError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractorUnavailableError';
  }
}

/** The extractor ran but failed while processing the source. */
export class ExtractionFailedError extends HeadwiseError {
  constructor(message: string, public readonly source: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionFailedError';
  }
}
