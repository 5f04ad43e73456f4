/**
 * Public types for the structext library.
 */

/** Structural role assigned to a single line */
export type LineRole = 'HEADER' | 'TABLE_ROW' | 'LIST_ITEM' | 'BODY' | 'BLANK';

/** Roles that can open a block (blank lines only separate blocks) */
export type BlockRole = Exclude<LineRole, 'BLANK'>;

interface LineBase {
  /** Repaired line text */
  readonly text: string;
  /** Leading indentation of the raw line, in columns (tab = 4) */
  readonly indent: number;
}

export interface HeaderLine extends LineBase {
  readonly role: 'HEADER';
  /** Heading depth, 1-6 */
  readonly level: number;
  /** Display text; differs from `text` only for upstream `## ` headings */
  readonly title: string;
}

export interface ListItemLine extends LineBase {
  readonly role: 'LIST_ITEM';
  /** Raw nesting depth from indentation */
  readonly level: number;
}

export interface TextLine extends LineBase {
  readonly role: 'TABLE_ROW' | 'BODY';
}

export interface BlankLine extends LineBase {
  readonly role: 'BLANK';
}

/** A classified line */
export type Line = HeaderLine | ListItemLine | TextLine | BlankLine;

export interface HeaderBlock {
  readonly role: 'HEADER';
  readonly lines: readonly HeaderLine[];
}

export interface ListBlock {
  readonly role: 'LIST_ITEM';
  readonly lines: readonly ListItemLine[];
}

export interface TextBlock {
  readonly role: 'TABLE_ROW' | 'BODY';
  readonly lines: readonly TextLine[];
}

/** Maximal run of contiguous same-role lines */
export type Block = HeaderBlock | ListBlock | TextBlock;

/** Raw extracted text, either whole or already split into lines */
export type RawDocument = string | readonly string[];

/** Result of formatting one document */
export interface FormattedDocument {
  readonly markdown: string;
  /** Bracket-tagged blocks, see `renderStructuredBlock` */
  readonly structuredText: string;
  readonly blocks: readonly Block[];
}
