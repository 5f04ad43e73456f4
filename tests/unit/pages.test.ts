import { describe, it, expect } from 'vitest';
import { parsePageRanges, selectPages, validatePageRanges } from '../../src/pages.js';
import { PageRangeError } from '../../src/errors.js';

describe('parsePageRanges', () => {
  it('parses ranges and single pages into sorted 0-based indices', () => {
    expect(parsePageRanges('1-3, 5')).toEqual([0, 1, 2, 4]);
    expect(parsePageRanges('10, 2-3')).toEqual([1, 2, 9]);
  });

  it('removes duplicates', () => {
    expect(parsePageRanges('3,1,3,1-2')).toEqual([0, 1, 2]);
  });

  it('selects nothing for blank input', () => {
    expect(parsePageRanges('')).toEqual([]);
    expect(parsePageRanges(' , ')).toEqual([]);
  });

  it('rejects reversed ranges', () => {
    expect(() => parsePageRanges('5-3')).toThrow(new PageRangeError('Invalid range: 5-3 (start > end)', '5-3'));
  });

  it('rejects page zero', () => {
    expect(() => parsePageRanges('0')).toThrow('Page numbers must be >= 1');
    expect(() => parsePageRanges('0-2')).toThrow('Page numbers must be >= 1');
  });

  it('rejects pages past an upper bound', () => {
    expect(() => parsePageRanges('2, 4-9', 5)).toThrow('Pages 6-9 exceed document length (5 pages)');
    expect(parsePageRanges('2-3', 5)).toEqual([1, 2]);
  });

  it('rejects anything else', () => {
    expect(() => parsePageRanges('abc')).toThrow('Invalid page range: abc');
    expect(() => parsePageRanges('1-x')).toThrow(PageRangeError);
  });
});

describe('validatePageRanges', () => {
  it('returns the pages when they fit', () => {
    expect(validatePageRanges('2', 5)).toEqual({ valid: true, pages: [1] });
  });

  it('lists pages beyond the end', () => {
    expect(validatePageRanges('1-3, 9, 12', 5)).toEqual({
      valid: false,
      error: 'Pages 9, 12 exceed document length (5 pages)',
    });
  });

  it('reports a huge range against the page count without expanding it', () => {
    expect(validatePageRanges('1-20000000', 5)).toEqual({
      valid: false,
      error: 'Pages 6-20000000 exceed document length (5 pages)',
    });
  });

  it('reports syntax errors without throwing', () => {
    expect(validatePageRanges('x', 5)).toEqual({ valid: false, error: 'Invalid page range: x' });
  });
});

describe('selectPages', () => {
  const pages = ['a', 'b', 'c'];

  it('picks pages in document order', () => {
    expect(selectPages(pages, '3,1')).toEqual(['a', 'c']);
  });

  it('keeps every page for an empty selection', () => {
    expect(selectPages(pages, '')).toEqual(['a', 'b', 'c']);
  });

  it('throws for pages past the end', () => {
    expect(() => selectPages(pages, '4')).toThrow('Pages 4 exceed document length (3 pages)');
  });
});
