/**
 * structext - turn raw OCR and PDF text into clean markdown and tagged structured text
 *
 * @example
 * ```typescript
 * import { formatDocument } from 'structext';
 *
 * const { markdown, structuredText } = formatDocument(rawText);
 * ```
 */

export { ContentFormatter, formatDocument, measureIndent } from './formatter.js';
export { formatOptionsSchema, resolveOptions, DEFAULT_OPTIONS } from './options.js';
export type { FormatOptions, ResolvedFormatOptions } from './options.js';
export { createLogger, levelFromEnv, logger } from './logger.js';
export { StructextError, OptionsError, PageRangeError } from './errors.js';

export { repairText, REPAIR_RULES } from './content/repair.js';
export type { RepairRule } from './content/repair.js';
export {
  classifyLine,
  advanceState,
  initialClassifierState,
  CLASSIFICATION_RULES,
} from './content/classifier.js';
export type { ClassifierState, ClassifierOptions, ClassificationRule, LineInput } from './content/classifier.js';
export { groupBlocks } from './content/blocks.js';
export { formatHeader, isAllCaps, isTitleCase } from './content/headers.js';
export { formatListBlock, parseListMarker } from './content/lists.js';
export type { ListMarker } from './content/lists.js';
export {
  formatTable,
  reconstructTable,
  renderTableAsMarkdown,
  detectSeparator,
  splitCells,
} from './content/tables.js';
export type { ColumnSeparator, FormattedTable, TableBlock, TableReconstruction } from './content/tables.js';
export { renderBlock } from './content/markdown.js';
export type { RenderedBlock } from './content/markdown.js';
export {
  parseStructuredText,
  renderStructuredBlock,
  renderStructuredText,
  STRUCTURED_TAGS,
} from './content/structured-text.js';
export type { StructuredBlock, StructuredTag } from './content/structured-text.js';

export { analyzeDocumentType, detectTableDensity, loadDocumentProfiles } from './analysis/document-type.js';
export type { DocumentProfile, DocumentTypeResult, TableDensity, TableDensityGrade } from './analysis/document-type.js';
export { parsePageRanges, validatePageRanges, selectPages } from './pages.js';
export type { PageRangeValidation } from './pages.js';

export type {
  Block,
  BlockRole,
  BlankLine,
  FormattedDocument,
  HeaderBlock,
  HeaderLine,
  Line,
  LineRole,
  ListBlock,
  ListItemLine,
  RawDocument,
  TextBlock,
  TextLine,
} from './types.js';
