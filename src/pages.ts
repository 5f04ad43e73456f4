/**
 * Page range selection ("1-5, 10, 15-20") for multi-page input.
 * Page numbers are 1-based in the range text and 0-based in the result.
 */

import { PageRangeError } from './errors.js';

export type PageRangeValidation =
  | { readonly valid: true; readonly pages: number[] }
  | { readonly valid: false; readonly error: string };

/** Inclusive, 1-based */
interface PageSpan {
  start: number;
  end: number;
}

const RANGE = /^(\d+)\s*-\s*(\d+)$/;
const SINGLE = /^\d+$/;

function parseSpan(part: string): PageSpan {
  const range = RANGE.exec(part);
  if (range) {
    const start = Number(range[1]);
    const end = Number(range[2]);
    if (start < 1 || end < 1) throw new PageRangeError('Page numbers must be >= 1', part);
    if (start > end) throw new PageRangeError(`Invalid range: ${part} (start > end)`, part);
    return { start, end };
  }

  if (SINGLE.test(part)) {
    const page = Number(part);
    if (page < 1) throw new PageRangeError('Page numbers must be >= 1', part);
    return { start: page, end: page };
  }

  throw new PageRangeError(`Invalid page range: ${part}`, part);
}

/** Sorted, with overlapping and adjacent spans joined */
function mergeSpans(spans: readonly PageSpan[]): PageSpan[] {
  const merged: PageSpan[] = [];
  for (const span of [...spans].sort((a, b) => a.start - b.start)) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end + 1) {
      last.end = Math.max(last.end, span.end);
    } else {
      merged.push({ ...span });
    }
  }
  return merged;
}

/**
 * Parse a range string into sorted, de-duplicated 0-based page indices.
 * Blank input selects nothing. With `maxPage`, pages past it are rejected
 * before any range is expanded.
 */
export function parsePageRanges(input: string, maxPage?: number): number[] {
  const spans = mergeSpans(
    input.split(',').map(part => part.trim()).filter(Boolean).map(parseSpan),
  );

  if (maxPage !== undefined) {
    const beyond = spans
      .filter(span => span.end > maxPage)
      .map(span => {
        const start = Math.max(span.start, maxPage + 1);
        return start === span.end ? `${start}` : `${start}-${span.end}`;
      });
    if (beyond.length > 0) {
      throw new PageRangeError(
        `Pages ${beyond.join(', ')} exceed document length (${maxPage} pages)`,
        input,
      );
    }
  }

  const pages: number[] = [];
  for (const span of spans) {
    for (let page = span.start; page <= span.end; page++) pages.push(page - 1);
  }
  return pages;
}

/**
 * Check a range string against a document's page count without throwing.
 */
export function validatePageRanges(input: string, totalPages: number): PageRangeValidation {
  try {
    return { valid: true, pages: parsePageRanges(input, totalPages) };
  } catch (error) {
    if (error instanceof PageRangeError) return { valid: false, error: error.message };
    throw error;
  }
}

/**
 * Pick pages by range string. An empty selection keeps every page.
 */
export function selectPages<T>(pages: readonly T[], input: string): T[] {
  const result = validatePageRanges(input, pages.length);
  if (!result.valid) throw new PageRangeError(result.error, input);
  if (result.pages.length === 0) return [...pages];
  return result.pages.map(index => pages[index]);
}
