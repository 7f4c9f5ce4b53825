/**
 * Diagnostics example.
 * Shows why lines were accepted, rejected or merged while building the outline.
 *
 * Usage:
 *   npx tsx examples/trace-diagnostics.ts path/to/document.txt
 */

import { readFile } from 'node:fs/promises';
import { extractOutline } from '../src/index.js';
import type { TraceEvent } from '../src/index.js';

const filePath = process.argv[2];

if (!filePath) {
  console.error('Usage: npx tsx examples/trace-diagnostics.ts <path-to-text>');
  process.exit(1);
}

function describe(event: TraceEvent): string {
  switch (event.type) {
    case 'candidate':
      return `+ [${event.candidate.source}] line ${event.candidate.position}: ${event.candidate.text}`;
    case 'rejected':
      return `- [${event.detector}] line ${event.line.index}: ${event.text} (${event.reason})`;
    case 'toc':
      return `~ contents ${event.transition} at line ${event.line.index}`;
    case 'duplicate':
      return `= dropped ${event.dropped.source} "${event.dropped.text}" for ${event.kept.source} at line ${event.kept.position}`;
  }
}

const text = await readFile(filePath, 'utf8');
const { title, outline } = extractOutline(text, {
  onTrace: event => console.log(describe(event)),
});

console.log('='.repeat(60));
console.log(`Title: ${title}`);
for (const heading of outline) {
  const indent = heading.level === 'H2' ? '    ' : '  ';
  console.log(`${indent}${heading.text} (p. ${heading.page})`);
}
