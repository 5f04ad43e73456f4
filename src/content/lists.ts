/**
 * List detection and formatting.
 *
 * Source numbering is not trusted: OCR drops and misreads digits, so ordered
 * items are renumbered from 1 within each block and nesting level.
 */

import type { ListBlock } from '../types.js';
import { autoLinkUrls } from './inline.js';

export interface ListMarker {
  readonly ordered: boolean;
  /** Marker as written in the source, e.g. "•", "3.", "(b)" */
  readonly marker: string;
  /** Item text with the marker removed */
  readonly content: string;
}

export interface ListFormatOptions {
  readonly autoLinkUrls: boolean;
}

const BULLET_ITEM = /^([•◦▪▫‣⁃∙●○■□►▶➢–·*+-])\s+(\S.*)$/u;
const ORDERED_ITEM = /^(\((?:\d{1,3}|[A-Za-z]|[ivx]{1,4})\)|(?:\d{1,3}|[A-Za-z]|[ivx]{2,4})[.)])\s+(\S.*)$/;

const INDENT = '  ';

/**
 * Detect a list marker at the start of a (trimmed) line.
 */
export function parseListMarker(text: string): ListMarker | null {
  const bullet = BULLET_ITEM.exec(text);
  if (bullet) return { ordered: false, marker: bullet[1], content: bullet[2] };

  const ordered = ORDERED_ITEM.exec(text);
  if (ordered) return { ordered: true, marker: ordered[1], content: ordered[2] };

  return null;
}

/**
 * Map raw indentation depths to nesting levels. A deeper indent opens one
 * level whatever its size; a shallower one closes back to the matching level.
 */
function normalizeLevels(levels: readonly number[]): number[] {
  const open: number[] = [];
  return levels.map(level => {
    while (open.length > 0 && open[open.length - 1] > level) open.pop();
    if (open.length === 0 || open[open.length - 1] < level) open.push(level);
    return open.length - 1;
  });
}

/**
 * Format a run of list items as markdown. Bullets become "- ", ordered
 * markers become "<n>. " with n counted per nesting level.
 */
export function formatListBlock(block: ListBlock, options: ListFormatOptions = { autoLinkUrls: true }): string {
  const levels = normalizeLevels(block.lines.map(line => line.level));
  const counters: number[] = [];
  const out: string[] = [];

  block.lines.forEach((line, i) => {
    const level = levels[i];
    const marker = parseListMarker(line.text) ?? { ordered: false, marker: '', content: line.text };
    const content = options.autoLinkUrls ? autoLinkUrls(marker.content) : marker.content;

    // Leaving a nested list discards its numbering
    counters.length = level + 1;

    if (marker.ordered) {
      counters[level] = (counters[level] ?? 0) + 1;
      out.push(`${INDENT.repeat(level)}${counters[level]}. ${content}`);
    } else {
      counters[level] = 0;
      out.push(`${INDENT.repeat(level)}- ${content}`);
    }
  });

  return out.join('\n');
}
