/**
 * Format a raw text dump as markdown, or as tagged structured text.
 *
 * Usage:
 *   npx tsx examples/format-file.ts path/to/extracted.txt
 *   npx tsx examples/format-file.ts path/to/extracted.txt --structured
 *   STRUCTEXT_LOG_LEVEL=debug npx tsx examples/format-file.ts scan.txt
 */

import { readFile } from 'node:fs/promises';
import { formatDocument } from '../src/index.js';

const args = process.argv.slice(2);
const structured = args.includes('--structured');
const filePath = args.find(arg => !arg.startsWith('--'));

if (!filePath) {
  console.error('Usage: npx tsx examples/format-file.ts <path-to-text> [--structured]');
  process.exit(1);
}

const result = formatDocument(await readFile(filePath, 'utf8'));

console.log(structured ? result.structuredText : result.markdown);
console.error(`\n${result.blocks.length} blocks`);
