/**
 * Noise rejection: lines that are never headings (copyright notices, version
 * stamps, page markers, bare numbers, URLs).
 */

const NOISE_PATTERNS: readonly RegExp[] = [
  /^copyright\s*©?/,
  /^version\s+\d+/,
  /^page\s+\d+/,
  /^\d{4}$/,
  /^©/,
  /^\d+$/,
  /^[ivx]+$/,
  /^www\./,
  /^https?:\/\//,
  /^\s*$/,
];

export function isNoiseLine(line: string): boolean {
  const lower = line.toLowerCase();
  return NOISE_PATTERNS.some(pattern => pattern.test(lower));
}
