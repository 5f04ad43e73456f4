/**
 * Block renderer
 *
 * Turns one block into its markdown and picks the tag it carries in the
 * structured text output:
 * - headers become ATX headings; a block opening with a level-1 header is
 *   the document title
 * - table rows become a pipe table, or a paragraph when only one column
 *   survives reconstruction
 * - list items become normalized, renumbered markdown lists
 * - body lines stay one paragraph with their line breaks, URLs linked
 */

import type { Block } from '../types.js';
import type { StructuredTag } from './structured-text.js';
import { formatHeader } from './headers.js';
import { formatListBlock } from './lists.js';
import { formatTable } from './tables.js';
import { formatParagraph } from './inline.js';

export interface RenderOptions {
  readonly tableSampleRows: number;
  readonly autoLinkUrls: boolean;
}

export interface RenderedBlock {
  readonly tag: StructuredTag;
  readonly markdown: string;
}

export function renderBlock(block: Block, options: RenderOptions): RenderedBlock {
  switch (block.role) {
    case 'HEADER':
      return {
        tag: block.lines[0].level === 1 ? 'TITLE' : 'HEADER',
        markdown: block.lines.map(line => formatHeader(line)).join('\n\n'),
      };
    case 'LIST_ITEM':
      return { tag: 'LIST', markdown: formatListBlock(block, options) };
    case 'TABLE_ROW': {
      const table = formatTable(block, options);
      return { tag: table.kind === 'table' ? 'TABLE' : 'TEXT', markdown: table.markdown };
    }
    case 'BODY':
      return { tag: 'TEXT', markdown: formatParagraph(block.lines.map(line => line.text), options) };
  }
}
