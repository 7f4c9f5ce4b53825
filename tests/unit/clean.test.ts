import { describe, it, expect } from 'vitest';
import { cleanHeadingText } from '../../src/text/clean.js';

describe('cleanHeadingText', () => {
  it('collapses whitespace runs', () => {
    expect(cleanHeadingText('Introduction   to \t Widgets')).toBe('Introduction to Widgets');
  });

  it('strips dot leaders and trailing page numbers', () => {
    expect(cleanHeadingText('Overview ........ 12')).toBe('Overview');
    expect(cleanHeadingText('Scope.')).toBe('Scope');
    expect(cleanHeadingText('Section 2. 3. 4')).toBe('Section 2');
  });

  it('keeps text without a trailing leader', () => {
    expect(cleanHeadingText('Results 2024')).toBe('Results 2024');
    expect(cleanHeadingText('v1.2 Notes')).toBe('v1.2 Notes');
  });

  it('trims the result', () => {
    expect(cleanHeadingText('  Summary  ')).toBe('Summary');
  });

  it('is idempotent', () => {
    const samples = [
      'x . .',
      'Version 2.0',
      'Overview ....  7',
      'a. b. c.',
      '  Mixed   spacing ..  ',
      'Plain heading',
      '. 5',
      '',
    ];
    for (const sample of samples) {
      const once = cleanHeadingText(sample);
      expect(cleanHeadingText(once)).toBe(once);
    }
  });
});
