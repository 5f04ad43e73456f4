import { describe, it, expect } from 'vitest';
import {
  advanceState,
  CLASSIFICATION_RULES,
  classifyLine,
  initialClassifierState,
} from '../../src/content/classifier.js';
import type { ClassifierState } from '../../src/content/classifier.js';

const options = { maxHeaderLength: 80, maxHeaderWords: 12, indentUnit: 2 };
const fresh = initialClassifierState();

function classify(text: string, state: ClassifierState = fresh, indent = 0) {
  return classifyLine({ text, indent }, state, options);
}

describe('classifyLine', () => {
  it('classifies empty text as BLANK', () => {
    expect(classify('').role).toBe('BLANK');
  });

  it('gives numbered headers the depth of their numbering', () => {
    expect(classify('1.2.3 Title')).toMatchObject({ role: 'HEADER', level: 3 });
  });

  it('lets numbering win over caps detection', () => {
    const later: ClassifierState = { precedingRole: 'BODY', tableColumns: null, headersSeen: 2 };
    expect(classify('1. INTRODUCTION', later)).toMatchObject({ role: 'HEADER', level: 1 });
    expect(classify('INTRODUCTION', later)).toMatchObject({ role: 'HEADER', level: 2 });
  });

  it('keeps an existing markdown heading', () => {
    expect(classify('# Already Markdown')).toMatchObject({ role: 'HEADER', level: 1, title: 'Already Markdown' });
  });

  it('treats a single numbered sentence-case line as a list item', () => {
    expect(classify('3. Foo')).toMatchObject({ role: 'LIST_ITEM', level: 0 });
  });

  it('derives list depth from indentation', () => {
    expect(classify('- nested item', fresh, 4)).toMatchObject({ role: 'LIST_ITEM', level: 2 });
    expect(classify('- nested item', fresh, 3)).toMatchObject({ role: 'LIST_ITEM', level: 1 });
  });

  it('marks lines with two or more column gaps as table rows', () => {
    expect(classify('Name  Age  City').role).toBe('TABLE_ROW');
    expect(classify('a | b | c').role).toBe('TABLE_ROW');
    expect(classify('key\tvalue\tnote').role).toBe('TABLE_ROW');
  });

  it('continues an open table with a gapless row of similar width', () => {
    const inTable: ClassifierState = { precedingRole: 'TABLE_ROW', tableColumns: 3, headersSeen: 0 };
    expect(classify('Total 100 NYC', inTable).role).toBe('TABLE_ROW');
    expect(classify('this line has far too many words', inTable).role).toBe('BODY');
  });

  it('does not continue a table after another role', () => {
    expect(classify('Total 100 NYC').role).toBe('HEADER');
  });

  it('makes the first unnumbered header the title', () => {
    expect(classify('EXECUTIVE SUMMARY')).toMatchObject({ role: 'HEADER', level: 1 });
  });

  it('nests later unnumbered headers by indentation', () => {
    const later: ClassifierState = { precedingRole: 'BLANK', tableColumns: null, headersSeen: 1 };
    expect(classify('EXECUTIVE SUMMARY', later)).toMatchObject({ level: 2 });
    expect(classify('Key Findings', later, 4)).toMatchObject({ role: 'HEADER', level: 4 });
  });

  it('falls back to BODY', () => {
    expect(classify('Revenue grew by 4% this year.')).toEqual({
      role: 'BODY',
      text: 'Revenue grew by 4% this year.',
      indent: 0,
    });
  });

  it('applies its rules in priority order', () => {
    expect(CLASSIFICATION_RULES.map(rule => rule.name)).toEqual([
      'blank',
      'markdown-heading',
      'numbered-heading',
      'list-item',
      'table-row',
      'table-continuation',
      'caps-heading',
      'title-case-heading',
    ]);
  });
});

describe('advanceState', () => {
  it('records the column count of an explicit table row', () => {
    const state = advanceState(fresh, classify('Name  Age  City'));
    expect(state).toEqual({ precedingRole: 'TABLE_ROW', tableColumns: 3, headersSeen: 0 });
  });

  it('keeps the column count across continuation rows', () => {
    const inTable: ClassifierState = { precedingRole: 'TABLE_ROW', tableColumns: 3, headersSeen: 0 };
    const state = advanceState(inTable, classify('Total 100 NYC', inTable));
    expect(state.tableColumns).toBe(3);
  });

  it('closes the table and counts headers', () => {
    const inTable: ClassifierState = { precedingRole: 'TABLE_ROW', tableColumns: 3, headersSeen: 0 };
    const state = advanceState(inTable, classify('1.1 Next Section', inTable));
    expect(state).toEqual({ precedingRole: 'HEADER', tableColumns: null, headersSeen: 1 });
  });
});
