import { describe, it, expect } from 'vitest';
import { assessHeading, contextScore, isValidHeading } from '../../src/filter/validity.js';
import { segmentLines } from '../../src/text/segmenter.js';

const LONG_LOWER = 'this line is definitely longer than twenty characters';

describe('assessHeading', () => {
  const { lines } = segmentLines('Heading');

  it('rejects short and long text', () => {
    expect(assessHeading('ab', lines, 0)).toEqual({ ok: false, reason: 'too-short' });
    expect(assessHeading('a'.repeat(201), lines, 0)).toEqual({ ok: false, reason: 'too-long' });
    expect(assessHeading('a'.repeat(200), lines, 0)).toEqual({ ok: true, score: 2 });
  });

  it('rejects purely numeric text', () => {
    expect(assessHeading('12345', lines, 0)).toEqual({ ok: false, reason: 'numeric' });
  });

  it('rejects symbol-heavy text', () => {
    expect(assessHeading('a!@#$', lines, 0)).toEqual({ ok: false, reason: 'symbols' });
    expect(assessHeading('AB-CD', lines, 0)).toEqual({ ok: true, score: 2 });
  });

  it('counts accented letters as alphanumeric', () => {
    expect(assessHeading('Résumé', lines, 0)).toEqual({ ok: true, score: 2 });
  });

  it('rejects text surrounded by body text', () => {
    const body = segmentLines(`${LONG_LOWER}\nMiddle\nand it continues in lowercase`).lines;
    expect(assessHeading('Middle', body, 1)).toEqual({ ok: false, reason: 'context' });
    expect(isValidHeading('Middle', body, 1)).toBe(false);
  });
});

describe('contextScore', () => {
  it('scores missing neighbours as boundaries', () => {
    const { lines } = segmentLines(`${LONG_LOWER}\nMiddle\nand it continues in lowercase`);
    expect(contextScore(lines, 0)).toBe(2);
    expect(contextScore(lines, 1)).toBe(0);
    expect(contextScore(lines, 2)).toBe(2);
  });

  it('gives one point for a short previous line only', () => {
    const { lines } = segmentLines('Short\nMiddle\nlowercase follows');
    expect(contextScore(lines, 1)).toBe(1);
  });

  it('gives one point for a capitalized next line only', () => {
    const { lines } = segmentLines(`${LONG_LOWER}\nMiddle\nCapital follows`);
    expect(contextScore(lines, 1)).toBe(1);
  });
});
