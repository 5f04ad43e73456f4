import { describe, it, expect } from 'vitest';
import { renderBlock } from '../../src/content/markdown.js';
import type { HeaderLine, TextLine } from '../../src/types.js';

const options = { tableSampleRows: 5, autoLinkUrls: true };

function header(title: string, level: number): HeaderLine {
  return { role: 'HEADER', text: title, indent: 0, level, title };
}

function text(role: 'TABLE_ROW' | 'BODY', value: string): TextLine {
  return { role, text: value, indent: 0 };
}

describe('renderBlock', () => {
  it('tags a block opening with a level-1 header as the title', () => {
    expect(renderBlock({ role: 'HEADER', lines: [header('REPORT', 1)] }, options)).toEqual({
      tag: 'TITLE',
      markdown: '# REPORT',
    });
  });

  it('renders consecutive headers as separate headings', () => {
    const block = { role: 'HEADER' as const, lines: [header('Scope', 2), header('1.1.1 Terms', 3)] };
    expect(renderBlock(block, options)).toEqual({ tag: 'HEADER', markdown: '## Scope\n\n### 1.1.1 Terms' });
  });

  it('renders table rows as a markdown table', () => {
    const block = { role: 'TABLE_ROW' as const, lines: [text('TABLE_ROW', 'a  b'), text('TABLE_ROW', '1  2')] };
    expect(renderBlock(block, options)).toEqual({ tag: 'TABLE', markdown: '| a | b |\n|---|---|\n| 1 | 2 |' });
  });

  it('renders single-column table rows as text', () => {
    const block = { role: 'TABLE_ROW' as const, lines: [text('TABLE_ROW', '| only |'), text('TABLE_ROW', '| one |')] };
    expect(renderBlock(block, options)).toEqual({ tag: 'TEXT', markdown: 'only\none' });
  });

  it('renders list items as a list', () => {
    const block = { role: 'LIST_ITEM' as const, lines: [{ role: 'LIST_ITEM' as const, text: '• x', indent: 0, level: 0 }] };
    expect(renderBlock(block, options)).toEqual({ tag: 'LIST', markdown: '- x' });
  });

  it('renders body lines as one paragraph', () => {
    const block = { role: 'BODY' as const, lines: [text('BODY', 'First line'), text('BODY', 'second line')] };
    expect(renderBlock(block, options)).toEqual({ tag: 'TEXT', markdown: 'First line\nsecond line' });
  });
});
