/**
 * Page-by-page formatting example.
 * Splits a text dump on form feeds and formats the selected pages as one
 * document.
 *
 * Usage:
 *   npx tsx examples/page-by-page.ts path/to/extracted.txt [pages]
 *   npx tsx examples/page-by-page.ts report.txt "1-3, 7"
 */

import { readFile } from 'node:fs/promises';
import { ContentFormatter, PageRangeError, selectPages } from '../src/index.js';

const filePath = process.argv[2];
const range = process.argv[3] ?? '';

if (!filePath) {
  console.error('Usage: npx tsx examples/page-by-page.ts <path-to-text> [pages]');
  process.exit(1);
}

const pages = (await readFile(filePath, 'utf8')).split('\f');

let selected: string[];
try {
  selected = selectPages(pages, range);
} catch (error) {
  if (error instanceof PageRangeError) {
    console.error(error.message);
    process.exit(1);
  }
  throw error;
}

console.log(`Total pages: ${pages.length}, formatting ${selected.length}`);
console.log('='.repeat(60));

const formatter = new ContentFormatter();
const { markdown } = formatter.formatPages(selected, '\n\n---\n\n');
console.log(markdown);
