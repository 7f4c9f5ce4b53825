/**
 * Basic outline example.
 * Reads text exported by an extractor (with `Page <p> of <t>` lines) and prints the outline as JSON.
 *
 * Usage:
 *   npx tsx examples/basic-outline.ts path/to/document.txt
 */

import { readFile } from 'node:fs/promises';
import { Outliner } from '../src/index.js';
import type { TextExtractor } from '../src/index.js';

const filePath = process.argv[2];

if (!filePath) {
  console.error('Usage: npx tsx examples/basic-outline.ts <path-to-text>');
  process.exit(1);
}

const textFile: TextExtractor = {
  extract: source => readFile(source, 'utf8'),
};

const outliner = await Outliner.fromSource(filePath, textFile);

console.log(JSON.stringify(outliner, null, 2));
