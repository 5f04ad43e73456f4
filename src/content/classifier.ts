/**
 * Line Classifier
 *
 * Assigns each repaired line a structural role using an ordered rule table.
 * The first rule that matches wins; a line no rule claims is body text.
 *
 * The only context a rule sees is the small state threaded through one pass:
 * the previous line's role, the column count of an open table, and how many
 * headers came before (the first unnumbered one is the document title).
 */

import type { HeaderLine, Line, LineRole, ListItemLine } from '../types.js';
import {
  clampHeaderLevel,
  isAllCaps,
  isHeaderShaped,
  isTitleCase,
  matchMarkdownHeading,
  matchNumberedHeading,
} from './headers.js';
import { parseListMarker } from './lists.js';
import { columnSignalTotal, splitCells, strongestSignal } from './tables.js';

export interface LineInput {
  /** Repaired text */
  readonly text: string;
  /** Indentation of the raw line, in columns */
  readonly indent: number;
}

export interface ClassifierState {
  readonly precedingRole: LineRole;
  /** Column count of the table being read, null when none is open */
  readonly tableColumns: number | null;
  readonly headersSeen: number;
}

export interface ClassifierOptions {
  readonly maxHeaderLength: number;
  readonly maxHeaderWords: number;
  readonly indentUnit: number;
}

export interface ClassificationRule {
  readonly name: string;
  readonly match: (input: LineInput, state: ClassifierState, options: ClassifierOptions) => Line | null;
}

export function initialClassifierState(): ClassifierState {
  return { precedingRole: 'BLANK', tableColumns: null, headersSeen: 0 };
}

function nestingDepth(indent: number, options: ClassifierOptions): number {
  return Math.floor(indent / options.indentUnit);
}

function header(input: LineInput, level: number, title: string): HeaderLine {
  return { role: 'HEADER', text: input.text, indent: input.indent, level: clampHeaderLevel(level), title };
}

/**
 * Level for a header with no numbering: the first header of the document is
 * its title; later ones are level 2, pushed deeper by indentation.
 */
function unnumberedLevel(input: LineInput, state: ClassifierState, options: ClassifierOptions): number {
  if (state.headersSeen === 0) return 1;
  if (input.indent > 0) return 2 + nestingDepth(input.indent, options);
  return 2;
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'blank',
    match: (input) =>
      input.text.trim() === '' ? { role: 'BLANK', text: '', indent: input.indent } : null,
  },
  {
    name: 'markdown-heading',
    match: (input) => {
      const heading = matchMarkdownHeading(input.text);
      return heading ? header(input, heading.level, heading.title) : null;
    },
  },
  {
    name: 'numbered-heading',
    match: (input, _state, options) => {
      const heading = matchNumberedHeading(input.text, options);
      return heading ? header(input, heading.level, heading.title) : null;
    },
  },
  {
    name: 'list-item',
    match: (input, _state, options): ListItemLine | null =>
      parseListMarker(input.text)
        ? { role: 'LIST_ITEM', text: input.text, indent: input.indent, level: nestingDepth(input.indent, options) }
        : null,
  },
  {
    name: 'table-row',
    match: (input) =>
      columnSignalTotal(input.text) >= 2 ? { role: 'TABLE_ROW', text: input.text, indent: input.indent } : null,
  },
  {
    // Rows without visible gaps still belong to an open table when their
    // word count is close to its column count
    name: 'table-continuation',
    match: (input, state) => {
      if (state.precedingRole !== 'TABLE_ROW' || state.tableColumns === null) return null;
      return Math.abs(wordCount(input.text) - state.tableColumns) <= 1
        ? { role: 'TABLE_ROW', text: input.text, indent: input.indent }
        : null;
    },
  },
  {
    name: 'caps-heading',
    match: (input, state, options) =>
      isHeaderShaped(input.text, options) && isAllCaps(input.text)
        ? header(input, unnumberedLevel(input, state, options), input.text)
        : null,
  },
  {
    name: 'title-case-heading',
    match: (input, state, options) =>
      isHeaderShaped(input.text, options) && isTitleCase(input.text, options.maxHeaderWords)
        ? header(input, unnumberedLevel(input, state, options), input.text)
        : null,
  },
];

/**
 * Classify one line. Total: anything the rules do not claim is BODY.
 */
export function classifyLine(input: LineInput, state: ClassifierState, options: ClassifierOptions): Line {
  for (const rule of CLASSIFICATION_RULES) {
    const line = rule.match(input, state, options);
    if (line) return line;
  }
  return { role: 'BODY', text: input.text, indent: input.indent };
}

/**
 * Carry the rolling state past a classified line.
 */
export function advanceState(state: ClassifierState, line: Line): ClassifierState {
  let tableColumns: number | null = null;
  if (line.role === 'TABLE_ROW') {
    const separator = strongestSignal(line.text);
    tableColumns = separator && columnSignalTotal(line.text) >= 2
      ? splitCells(line.text, separator).length
      : state.tableColumns;
  }

  return {
    precedingRole: line.role,
    tableColumns,
    headersSeen: state.headersSeen + (line.role === 'HEADER' ? 1 : 0),
  };
}
