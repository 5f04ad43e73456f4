/**
 * Header detection and formatting
 *
 * Heading depth comes from explicit numbering where there is any
 * ("1.2.3 Scope" is depth 3, "Chapter 4" depth 1), from an existing markdown
 * prefix, or from position and indentation for unnumbered caps and
 * title-case lines.
 */

import type { HeaderLine } from '../types.js';

export const MIN_HEADER_LEVEL = 1;
export const MAX_HEADER_LEVEL = 6;

/** Sentence-ending punctuation disqualifies a line from being a header */
const TERMINAL_PUNCTUATION = /[.!?,;:]$/;

const MARKDOWN_HEADING = /^(#{1,6})\s+(.+?)(?:\s+#+)?$/;
/** "1.2 Scope", "4.1.3. Limits" */
const DOTTED_HEADING = /^(\d{1,3}(?:\.\d{1,3})+)\.?\s+\p{Lu}/u;
/** "Chapter 3", "SECTION 2.1", "Part IV", "Appendix B" */
const KEYWORD_HEADING =
  /^(?:Chapter|Section|Part|Article|Appendix|Annex|CHAPTER|SECTION|PART|ARTICLE|APPENDIX|ANNEX)\s+(\d{1,3}(?:\.\d{1,3})*|[IVXLC]{1,6}|[A-Z])\b/;
/** "1. INTRODUCTION", "IV) SCOPE"; needs all-caps text, otherwise it is a list item */
const SINGLE_NUMBER_HEADING = /^(?:\d{1,3}|[IVX]{1,4})[.)]\s+(\S.*)$/;

const MINOR_WORDS = new Set([
  'a', 'an', 'and', 'as', 'at', 'but', 'by', 'for', 'from', 'in', 'into',
  'nor', 'of', 'on', 'or', 'per', 'the', 'to', 'vs', 'via', 'with',
]);

export interface HeaderShapeOptions {
  readonly maxHeaderLength: number;
}

export function clampHeaderLevel(level: number): number {
  return Math.min(MAX_HEADER_LEVEL, Math.max(MIN_HEADER_LEVEL, Math.trunc(level)));
}

/**
 * Short, carries letters, and does not end like a sentence.
 */
export function isHeaderShaped(text: string, options: HeaderShapeOptions): boolean {
  if (text.length === 0 || text.length > options.maxHeaderLength) return false;
  if (TERMINAL_PUNCTUATION.test(text)) return false;
  return /\p{L}/u.test(text);
}

/** At least two uppercase letters and no lowercase ones */
export function isAllCaps(text: string): boolean {
  if (/\p{Ll}/u.test(text)) return false;
  return (text.match(/\p{Lu}/gu)?.length ?? 0) >= 2;
}

/**
 * A majority of significant words start uppercase. Minor words ("of", "the")
 * only count when they open the line.
 */
export function isTitleCase(text: string, maxWords: number): boolean {
  const words = text.split(/\s+/).filter(word => /\p{L}/u.test(word));
  if (words.length < 2 || words.length > maxWords) return false;

  const significant = words.filter((word, i) => i === 0 || !MINOR_WORDS.has(word.toLowerCase()));
  const capitalized = significant.filter(word => /^[^\p{L}]*\p{Lu}/u.test(word));
  return capitalized.length * 2 > significant.length;
}

/**
 * Depth of a section number: "1.2.3" is 3. Roman numerals and letters are 1.
 */
export function numberingDepth(token: string): number {
  if (!/^\d/.test(token)) return 1;
  return clampHeaderLevel(token.split('.').filter(Boolean).length);
}

export interface HeadingMatch {
  readonly level: number;
  readonly title: string;
}

/** An ATX heading already present in upstream markdown */
export function matchMarkdownHeading(text: string): HeadingMatch | null {
  const match = MARKDOWN_HEADING.exec(text);
  if (!match) return null;
  return { level: match[1].length, title: match[2] };
}

/**
 * A numbered heading. Numbering outranks caps detection, so
 * "1. INTRODUCTION" lands here rather than in the caps rule.
 */
export function matchNumberedHeading(text: string, options: HeaderShapeOptions): HeadingMatch | null {
  if (!isHeaderShaped(text, options)) return null;

  const dotted = DOTTED_HEADING.exec(text);
  if (dotted) return { level: numberingDepth(dotted[1]), title: text };

  const keyword = KEYWORD_HEADING.exec(text);
  if (keyword) return { level: numberingDepth(keyword[1]), title: text };

  const single = SINGLE_NUMBER_HEADING.exec(text);
  if (single && isAllCaps(single[1])) return { level: 1, title: text };

  return null;
}

/**
 * Render a header line as an ATX heading.
 */
export function formatHeader(line: HeaderLine): string {
  return `${'#'.repeat(clampHeaderLevel(line.level))} ${line.title.trim()}`;
}
