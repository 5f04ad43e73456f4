/**
 * Structured text: the tagged twin of the markdown output.
 *
 * Each block is written as an opening tag line, its repaired source lines,
 * and a closing tag line:
 *
 * ```
 * [TABLE]
 * Name  Age  City
 * Ann  30  NYC
 * [/TABLE]
 * ```
 *
 * Blocks are separated by one blank line. A content line that would read as
 * a tag gets one leading backslash, which the parser removes again.
 */

export type StructuredTag = 'TITLE' | 'HEADER' | 'TABLE' | 'LIST' | 'TEXT';

export const STRUCTURED_TAGS: readonly StructuredTag[] = ['TITLE', 'HEADER', 'TABLE', 'LIST', 'TEXT'];

export interface StructuredBlock {
  readonly tag: StructuredTag;
  readonly lines: readonly string[];
}

const TAG_LINE = /^\[(\/?)(TITLE|HEADER|TABLE|LIST|TEXT)\]$/;
const ESCAPED_TAG_LINE = /^\\+\[\/?(?:TITLE|HEADER|TABLE|LIST|TEXT)\]$/;

function escapeContentLine(line: string): string {
  return TAG_LINE.test(line) || ESCAPED_TAG_LINE.test(line) ? `\\${line}` : line;
}

function unescapeContentLine(line: string): string {
  return ESCAPED_TAG_LINE.test(line) ? line.slice(1) : line;
}

export function renderStructuredBlock(tag: StructuredTag, lines: readonly string[]): string {
  return [`[${tag}]`, ...lines.map(escapeContentLine), `[/${tag}]`].join('\n');
}

export function renderStructuredText(blocks: readonly StructuredBlock[]): string {
  return blocks.map(block => renderStructuredBlock(block.tag, block.lines)).join('\n\n');
}

/**
 * Read structured text back into blocks. Lines outside a block are ignored
 * and a block left open at the end is kept.
 */
export function parseStructuredText(text: string): StructuredBlock[] {
  const blocks: StructuredBlock[] = [];
  let open: { tag: StructuredTag; lines: string[] } | null = null;

  for (const line of text.split(/\r\n|\r|\n/)) {
    if (open) {
      if (line === `[/${open.tag}]`) {
        blocks.push(open);
        open = null;
      } else {
        open.lines.push(unescapeContentLine(line));
      }
      continue;
    }

    const match = TAG_LINE.exec(line);
    if (!match || match[1] === '/') continue;
    const tag = STRUCTURED_TAGS.find(candidate => candidate === match[2]);
    if (tag) open = { tag, lines: [] };
  }

  if (open) blocks.push(open);
  return blocks;
}
