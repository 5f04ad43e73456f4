/**
 * Group classified lines into blocks: maximal runs of one role. Blank lines
 * close the current block and are dropped, so two paragraphs separated by a
 * blank line stay two blocks.
 */

import type { Block, BlockRole, HeaderLine, Line, ListItemLine, TextLine } from '../types.js';

export function isHeaderLine(line: Line): line is HeaderLine {
  return line.role === 'HEADER';
}

export function isListItemLine(line: Line): line is ListItemLine {
  return line.role === 'LIST_ITEM';
}

export function isTextLine(line: Line): line is TextLine {
  return line.role === 'TABLE_ROW' || line.role === 'BODY';
}

function toBlock(role: BlockRole, lines: readonly Line[]): Block {
  switch (role) {
    case 'HEADER':
      return { role, lines: lines.filter(isHeaderLine) };
    case 'LIST_ITEM':
      return { role, lines: lines.filter(isListItemLine) };
    case 'TABLE_ROW':
    case 'BODY':
      return { role, lines: lines.filter(isTextLine) };
  }
}

export function groupBlocks(lines: readonly Line[]): Block[] {
  const blocks: Block[] = [];
  let run: { role: BlockRole; lines: Line[] } | null = null;

  for (const line of lines) {
    if (line.role === 'BLANK') {
      if (run) blocks.push(toBlock(run.role, run.lines));
      run = null;
      continue;
    }

    if (run && run.role === line.role) {
      run.lines.push(line);
    } else {
      if (run) blocks.push(toBlock(run.role, run.lines));
      run = { role: line.role, lines: [line] };
    }
  }

  if (run) blocks.push(toBlock(run.role, run.lines));
  return blocks;
}
