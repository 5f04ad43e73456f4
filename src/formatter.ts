/**
 * Content formatter
 *
 * Runs raw extracted text through the whole pipeline:
 *
 *   split lines -> repair -> classify -> group blocks -> render
 *
 * and returns both markdown and the bracket-tagged structured text.
 * Formatting is total: any string comes back as some document, never an error.
 *
 * @example
 * ```typescript
 * import { ContentFormatter } from 'structext';
 *
 * const formatter = new ContentFormatter({ indentUnit: 4 });
 * const { markdown } = formatter.format(ocrText);
 * ```
 */

import type { Logger } from 'pino';
import type { Block, FormattedDocument, Line, RawDocument } from './types.js';
import type { FormatOptions, ResolvedFormatOptions } from './options.js';
import type { ClassifierState } from './content/classifier.js';
import { resolveOptions } from './options.js';
import { logger as defaultLogger } from './logger.js';
import { repairText } from './content/repair.js';
import { advanceState, classifyLine, initialClassifierState } from './content/classifier.js';
import { groupBlocks } from './content/blocks.js';
import { renderBlock } from './content/markdown.js';
import { renderStructuredBlock } from './content/structured-text.js';
import { analyzeDocumentType, detectTableDensity } from './analysis/document-type.js';

const LINE_BREAK = /\r\n|\r|\n/;
const TAB_WIDTH = 4;

interface PipelineResult {
  document: FormattedDocument;
  /** Classifier state after the last line */
  state: ClassifierState;
}

function splitLines(raw: RawDocument): string[] {
  return typeof raw === 'string'
    ? raw.split(LINE_BREAK)
    : raw.flatMap(line => line.split(LINE_BREAK));
}

/** Leading indentation of a raw line in columns, tabs counting four */
export function measureIndent(raw: string): number {
  const leading = raw.match(/^[ \t\u00A0]*/)?.[0] ?? '';
  let columns = 0;
  for (const char of leading) {
    columns += char === '\t' ? TAB_WIDTH : 1;
  }
  return columns;
}

export class ContentFormatter {
  readonly options: ResolvedFormatOptions;
  private readonly logger: Logger;

  /**
   * @throws {OptionsError} when an option is out of range or of the wrong type
   */
  constructor(options: FormatOptions = {}) {
    const { logger, ...rest } = options;
    this.options = resolveOptions(rest);
    this.logger = (logger ?? defaultLogger).child({ component: 'formatter' });
  }

  /**
   * Format one document.
   */
  format(raw: RawDocument): FormattedDocument {
    const rawLines = splitLines(raw);
    this.logProfile(rawLines);
    return this.run(rawLines, initialClassifierState()).document;
  }

  /**
   * Format pages of one document. The first header across all pages is the
   * only title; tables and paragraphs never continue over a page break.
   * Pages without content are left out.
   */
  formatPages(pages: readonly string[], separator = '\n\n'): FormattedDocument {
    let state = initialClassifierState();
    const markdown: string[] = [];
    const structured: string[] = [];
    const blocks: Block[] = [];

    this.logProfile(pages.flatMap(page => page.split(LINE_BREAK)));

    pages.forEach((page, index) => {
      const result = this.run(splitLines(page), {
        precedingRole: 'BLANK',
        tableColumns: null,
        headersSeen: state.headersSeen,
      });
      state = result.state;

      if (result.document.blocks.length === 0) {
        this.logger.debug({ page: index + 1 }, 'skipping empty page');
        return;
      }
      markdown.push(result.document.markdown);
      structured.push(result.document.structuredText);
      blocks.push(...result.document.blocks);
    });

    return {
      markdown: markdown.join(separator),
      structuredText: structured.join('\n\n'),
      blocks,
    };
  }

  private run(rawLines: readonly string[], initialState: ClassifierState): PipelineResult {
    const lines: Line[] = [];
    let state = initialState;

    for (const raw of rawLines) {
      const line = classifyLine({ text: repairText(raw), indent: measureIndent(raw) }, state, this.options);
      lines.push(line);
      state = advanceState(state, line);
    }

    const blocks = groupBlocks(lines);
    const markdown: string[] = [];
    const structured: string[] = [];

    for (const block of blocks) {
      const rendered = renderBlock(block, this.options);
      if (block.role === 'TABLE_ROW' && rendered.tag === 'TEXT') {
        this.logger.debug({ rows: block.lines.length }, 'table rows collapsed to a single column, rendering as text');
      }
      markdown.push(rendered.markdown);
      structured.push(renderStructuredBlock(rendered.tag, block.lines.map(line => line.text)));
    }

    this.logger.debug({ lines: lines.length, blocks: blocks.length }, 'formatted');

    return {
      document: {
        markdown: markdown.join('\n\n'),
        structuredText: structured.join('\n\n'),
        blocks,
      },
      state,
    };
  }

  private logProfile(rawLines: readonly string[]): void {
    if (!this.logger.isLevelEnabled('debug')) return;
    const text = rawLines.join('\n');
    this.logger.debug(
      { documentType: analyzeDocumentType(text).type, tableDensity: detectTableDensity(text).grade },
      'document profile',
    );
  }
}

/**
 * Format a document with a one-off formatter.
 *
 * @example
 * ```typescript
 * const { markdown, structuredText } = formatDocument('QUARTERLY REPORT\n\nRevenue grew.');
 * ```
 */
export function formatDocument(raw: RawDocument, options?: FormatOptions): FormattedDocument {
  return new ContentFormatter(options).format(raw);
}
