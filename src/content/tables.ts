/**
 * Heuristic Table Reconstruction
 *
 * Rebuilds tables from plain text rows, where the only column evidence is
 * what the extractor left between cells: pipes, tabs or runs of spaces.
 *
 * Algorithm:
 * 1. Vote on the dominant separator across the first few rows
 * 2. Split every row on it and take the modal cell count as the column count
 * 3. Fit rows with a different count: re-split separator-less rows word by
 *    word, pad short rows, fold long rows into the last column
 * 4. Render as a markdown pipe table, first row as header
 *
 * A table that ends up with fewer than two columns is not a table and comes
 * back as paragraph lines.
 */

import type { TextBlock } from '../types.js';
import { formatParagraph } from './inline.js';

export type ColumnSeparator = 'pipe' | 'tab' | 'spaces';

export type SignalCounts = Record<ColumnSeparator, number>;

/** A reconstructed table with every row exactly `columnCount` cells wide */
export interface TableBlock {
  /** 2D grid of cell text [row][col], trimmed and pipe-escaped */
  rows: string[][];
  columnCount: number;
  separator: ColumnSeparator;
}

export type TableReconstruction =
  | { readonly kind: 'table'; readonly table: TableBlock }
  | { readonly kind: 'paragraph'; readonly lines: readonly string[] };

export interface TableOptions {
  readonly tableSampleRows: number;
  readonly autoLinkUrls: boolean;
}

interface CellSlice {
  text: string;
  /** Offset of the cell within its row */
  start: number;
}

interface ParsedRow {
  text: string;
  slices: CellSlice[];
}

/** Strongest first: a pipe is deliberate, a space gap may be accidental */
const SEPARATOR_PRIORITY: readonly ColumnSeparator[] = ['pipe', 'tab', 'spaces'];

const UNESCAPED_PIPE = /(?<!\\)\|/g;
/** A gap right after sentence punctuation is typewriter spacing, not a column */
const SPACE_GAP = /(?<![.!?\s]) {2,}/g;
const MARKDOWN_RULE_CELL = /^\s*:?-{3,}:?\s*$/;

const DEFAULT_TABLE_OPTIONS: TableOptions = { tableSampleRows: 5, autoLinkUrls: true };

/**
 * Count column signals of each kind in a line.
 */
export function countColumnSignals(text: string): SignalCounts {
  return {
    pipe: text.match(UNESCAPED_PIPE)?.length ?? 0,
    tab: text.match(/\t/g)?.length ?? 0,
    spaces: text.match(SPACE_GAP)?.length ?? 0,
  };
}

/** Total signals; two or more mark a line as a table row */
export function columnSignalTotal(text: string): number {
  const counts = countColumnSignals(text);
  return counts.pipe + counts.tab + counts.spaces;
}

/**
 * The separator a single row votes for, or null when it has none.
 */
export function strongestSignal(text: string): ColumnSeparator | null {
  const counts = countColumnSignals(text);
  return SEPARATOR_PRIORITY.find(separator => counts[separator] > 0) ?? null;
}

/**
 * Majority vote over the first `sampleSize` rows. Ties go to the stronger
 * separator; no votes at all means spaces.
 */
export function detectSeparator(rows: readonly string[], sampleSize: number): ColumnSeparator {
  const votes: SignalCounts = { pipe: 0, tab: 0, spaces: 0 };
  for (const row of rows.slice(0, sampleSize)) {
    const signal = strongestSignal(row);
    if (signal) votes[signal]++;
  }

  let best: ColumnSeparator = 'spaces';
  let bestVotes = 0;
  for (const separator of SEPARATOR_PRIORITY) {
    if (votes[separator] > bestVotes) {
      best = separator;
      bestVotes = votes[separator];
    }
  }
  return best;
}

/**
 * Split a row into cells with their offsets. With pipes, one outer pipe on
 * each side is dropped and escaped pipes stay inside their cell.
 */
function splitWithOffsets(text: string, separator: ColumnSeparator): CellSlice[] {
  let body = text;
  let offset = 0;

  if (separator === 'pipe') {
    const leading = body.match(/^\s*\|/)?.[0] ?? '';
    offset = leading.length;
    body = body.slice(offset).replace(/(?<!\\)\|\s*$/, '');
  }

  const pattern =
    separator === 'pipe' ? UNESCAPED_PIPE :
    separator === 'tab' ? /\t+/g :
    /\s{2,}|\t/g;

  const cells: CellSlice[] = [];
  let start = 0;
  for (const match of body.matchAll(pattern)) {
    const index = match.index ?? 0;
    cells.push({ text: body.slice(start, index), start: offset + start });
    start = index + match[0].length;
  }
  cells.push({ text: body.slice(start), start: offset + start });
  return cells;
}

/**
 * Split a row into trimmed cells.
 */
export function splitCells(text: string, separator: ColumnSeparator): string[] {
  return splitWithOffsets(text.trim(), separator).map(cell => cell.text.trim());
}

/** Escape pipes that are not already escaped */
export function escapeCell(cell: string): string {
  return cell.trim().replace(UNESCAPED_PIPE, '\\|');
}

/** Most frequent count; ties go to the wider row */
function modalCount(counts: readonly number[]): number {
  const frequency = new Map<number, number>();
  for (const count of counts) {
    frequency.set(count, (frequency.get(count) ?? 0) + 1);
  }

  let best = 0;
  let bestFrequency = 0;
  for (const [count, seen] of frequency) {
    if (seen > bestFrequency || (seen === bestFrequency && count > best)) {
      best = count;
      bestFrequency = seen;
    }
  }
  return best;
}

/** Header separator rows ("|---|:--:|") already emitted by an upstream converter */
function isRuleRow(row: ParsedRow): boolean {
  return row.slices.every(slice => MARKDOWN_RULE_CELL.test(slice.text));
}

/**
 * Column starts as a fraction of the row length.
 */
function proportionalStarts(row: ParsedRow): number[] {
  const length = Math.max(row.text.length, 1);
  return row.slices.map(slice => slice.start / length);
}

function nearestColumn(ratio: number, starts: readonly number[], columnCount: number): number {
  let best = 0;
  for (let c = 1; c < columnCount; c++) {
    if (Math.abs(starts[c] - ratio) < Math.abs(starts[best] - ratio)) best = c;
  }
  return best;
}

/**
 * Distribute the words of a separator-less row over the columns. Words stay
 * in order; with at least as many words as columns every column gets one,
 * and position relative to the reference row only decides where the extra
 * words go.
 */
function resplitByPosition(text: string, columnCount: number, starts: readonly number[]): string[] {
  const columns: string[][] = Array.from({ length: columnCount }, () => []);
  const length = Math.max(text.length, 1);
  const tokens = [...text.matchAll(/\S+/g)];
  const spare = tokens.length - columnCount;

  let previous = -1;
  tokens.forEach((token, i) => {
    const nearest = nearestColumn((token.index ?? 0) / length, starts, columnCount);
    const low = spare >= 0 ? Math.max(previous, i - spare, 0) : Math.max(previous, 0);
    const high = spare >= 0 ? Math.min(previous + 1, columnCount - 1) : columnCount - 1;
    const column = Math.min(Math.max(nearest, low), high);
    columns[column].push(token[0]);
    previous = column;
  });

  return columns.map(words => words.join(' '));
}

function fitRow(row: ParsedRow, columnCount: number, starts: readonly number[]): string[] {
  const cells = row.slices.map(slice => slice.text.trim());
  if (cells.length === columnCount) return cells;

  if (cells.length === 1 && /\S\s+\S/.test(cells[0])) {
    return resplitByPosition(cells[0], columnCount, starts);
  }

  if (cells.length < columnCount) {
    return [...cells, ...new Array<string>(columnCount - cells.length).fill('')];
  }

  // Trailing overflow is more likely a wrapped last cell than a new column
  return [...cells.slice(0, columnCount - 1), cells.slice(columnCount - 1).join(' ')];
}

/**
 * Rebuild a table from its row texts.
 */
export function reconstructTable(
  rows: readonly string[],
  options: Pick<TableOptions, 'tableSampleRows'> = DEFAULT_TABLE_OPTIONS,
): TableReconstruction {
  const separator = detectSeparator(rows, options.tableSampleRows);
  const parsed: ParsedRow[] = rows
    .map(row => row.trim())
    .filter(text => text.length > 0)
    .map(text => ({ text, slices: splitWithOffsets(text, separator) }))
    .filter(row => !isRuleRow(row));

  if (parsed.length === 0) {
    return { kind: 'paragraph', lines: rows.map(row => row.trim()).filter(Boolean) };
  }

  const columnCount = modalCount(parsed.map(row => row.slices.length));
  if (columnCount < 2) {
    return {
      kind: 'paragraph',
      lines: parsed.map(row => row.slices.map(slice => slice.text.trim()).filter(Boolean).join(' ')),
    };
  }

  const reference = parsed.find(row => row.slices.length === columnCount);
  const starts = reference
    ? proportionalStarts(reference)
    : Array.from({ length: columnCount }, (_, c) => c / columnCount);

  return {
    kind: 'table',
    table: {
      rows: parsed.map(row => fitRow(row, columnCount, starts).map(escapeCell)),
      columnCount,
      separator,
    },
  };
}

/**
 * Render a reconstructed table as a markdown table string.
 */
export function renderTableAsMarkdown(table: TableBlock): string {
  if (table.rows.length === 0) return '';

  const lines: string[] = [];

  function formatRow(cells: readonly string[]): string {
    return `| ${cells.join(' | ')} |`;
  }

  // First row + separator (markdown requires a header separator row)
  lines.push(formatRow(table.rows[0]));
  lines.push(`|${new Array<string>(table.columnCount).fill('---').join('|')}|`);
  for (let r = 1; r < table.rows.length; r++) {
    lines.push(formatRow(table.rows[r]));
  }

  return lines.join('\n');
}

export interface FormattedTable {
  readonly kind: TableReconstruction['kind'];
  readonly markdown: string;
}

/**
 * Format a table block: a markdown table, or a plain paragraph when the rows
 * carry a single column.
 */
export function formatTable(block: TextBlock, options: TableOptions = DEFAULT_TABLE_OPTIONS): FormattedTable {
  const result = reconstructTable(block.lines.map(line => line.text), options);
  return result.kind === 'table'
    ? { kind: 'table', markdown: renderTableAsMarkdown(result.table) }
    : { kind: 'paragraph', markdown: formatParagraph(result.lines, options) };
}
