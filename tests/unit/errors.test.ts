import { describe, it, expect } from 'vitest';
import { OptionsError, PageRangeError, StructextError } from '../../src/errors.js';

describe('StructextError', () => {
  it('OptionsError is instanceof StructextError and Error', () => {
    const err = new OptionsError('bad');
    expect(err).toBeInstanceOf(StructextError);
    expect(err).toBeInstanceOf(Error);
  });

  it('PageRangeError is instanceof StructextError and Error', () => {
    const err = new PageRangeError('bad', '5-3');
    expect(err).toBeInstanceOf(StructextError);
    expect(err).toBeInstanceOf(Error);
  });

  it('error.name is set per class', () => {
    expect(new StructextError('x').name).toBe('StructextError');
    expect(new OptionsError('x').name).toBe('OptionsError');
    expect(new PageRangeError('x', '').name).toBe('PageRangeError');
  });

  it('OptionsError.issues defaults to empty', () => {
    expect(new OptionsError('x').issues).toEqual([]);
    expect(new OptionsError('x', ['dpi: bad']).issues).toEqual(['dpi: bad']);
  });

  it('PageRangeError.input stores the offending text', () => {
    expect(new PageRangeError('x', 'abc').input).toBe('abc');
  });
});
