/**
 * Custom error types for structext.
 * Formatting never throws; these cover option validation and page selection.
 */

export class StructextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StructextError';
  }
}

export class OptionsError extends StructextError {
  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(message);
    this.name = 'OptionsError';
  }
}

export class PageRangeError extends StructextError {
  constructor(message: string, public readonly input: string) {
    super(message);
    this.name = 'PageRangeError';
  }
}
