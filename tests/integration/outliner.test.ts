import { describe, it, expect } from 'vitest';
import {
  Outliner,
  ExtractionFailedError,
  ExtractorUnavailableError,
  InvalidOptionsError,
} from '../../src/index.js';
import type { TextExtractor } from '../../src/index.js';

const PAGES = ['Widget Handbook\n1. Introduction\nBody Text', '', '2. Usage\nMore Text'];

function extractorReturning(text: string): TextExtractor {
  return { extract: async () => text };
}

function extractorThrowing(err: unknown): TextExtractor {
  return {
    extract: async () => {
      throw err;
    },
  };
}

describe('Outliner.fromText', () => {
  it('exposes title, headings and lines', () => {
    const outliner = Outliner.fromText('Widget Handbook\n1. Introduction\nBody Text');
    expect(outliner.title).toBe('Widget Handbook');
    expect(outliner.headings).toEqual([{ level: 'H1', text: '1. Introduction', page: 1 }]);
    expect(outliner.lines.map(l => l.text)).toEqual(['Widget Handbook', '1. Introduction', 'Body Text']);
  });

  it('keeps every candidate for inspection', () => {
    const outliner = Outliner.fromText('Introduction\n1. Introduction\nBody Text');
    expect(outliner.candidates().map(c => [c.source, c.text, c.position])).toEqual([
      ['numbered', '1. Introduction', 1],
      ['structural', 'Introduction', 0],
    ]);
  });

  it('serializes to the outline shape', () => {
    const outliner = Outliner.fromText('Widget Handbook\n1. Introduction\nBody Text');
    expect(JSON.parse(JSON.stringify(outliner))).toEqual({
      title: 'Widget Handbook',
      outline: [{ level: 'H1', text: '1. Introduction', page: 1 }],
    });
  });

  it('rejects invalid options', () => {
    expect(() => Outliner.fromText('text', { titleScanLines: -1 })).toThrow(InvalidOptionsError);
  });
});

describe('Outliner.fromPages', () => {
  it('numbers pages from their position', () => {
    const outliner = Outliner.fromPages(PAGES);
    expect(outliner.toJSON()).toEqual({
      title: 'Widget Handbook',
      outline: [
        { level: 'H1', text: '1. Introduction', page: 1 },
        { level: 'H1', text: '2. Usage', page: 3 },
      ],
    });
  });
});

describe('Outliner.fromSource', () => {
  it('outlines the extractor output', async () => {
    const outliner = await Outliner.fromSource('handbook.pdf', extractorReturning('Page 4 of 4\nConclusion\nThe End.'));
    expect(outliner.headings).toEqual([{ level: 'H1', text: 'Conclusion', page: 4 }]);
  });

  it('passes the source to the extractor', async () => {
    const seen: string[] = [];
    const extractor: TextExtractor = {
      extract: async source => {
        seen.push(source);
        return '';
      },
    };
    const outliner = await Outliner.fromSource('handbook.pdf', extractor);
    expect(seen).toEqual(['handbook.pdf']);
    expect(outliner.title).toBe('Unknown Document');
  });

  it('wraps processing failures', async () => {
    const cause = new Error('boom');
    const promise = Outliner.fromSource('handbook.pdf', extractorThrowing(cause));
    await expect(promise).rejects.toBeInstanceOf(ExtractionFailedError);
    await expect(promise).rejects.toMatchObject({
      message: 'Text extraction failed for handbook.pdf: boom',
      source: 'handbook.pdf',
      cause,
    });
  });

  it('wraps non-Error throws', async () => {
    await expect(Outliner.fromSource('scan.png', extractorThrowing('no text layer'))).rejects.toThrow(
      'Text extraction failed for scan.png: no text layer',
    );
  });

  it('lets missing-dependency errors through unchanged', async () => {
    const missing = new ExtractorUnavailableError('OCR engine is not installed');
    await expect(Outliner.fromSource('scan.png', extractorThrowing(missing))).rejects.toBe(missing);
  });

  it('rejects invalid options before extracting', async () => {
    const seen: string[] = [];
    const extractor: TextExtractor = {
      extract: async source => {
        seen.push(source);
        return '';
      },
    };
    await expect(Outliner.fromSource('a.pdf', extractor, { detectors: [], titleScanLines: 0 })).rejects.toBeInstanceOf(
      InvalidOptionsError,
    );
    expect(seen).toEqual([]);
  });
});
