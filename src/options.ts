/**
 * Format options and their defaults.
 *
 * Options are validated once, when a formatter is built. Everything after
 * that point works on the resolved, frozen object.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { OptionsError } from './errors.js';

export const formatOptionsSchema = z.object({
  /** Only the local heuristic mode exists */
  mode: z.literal('heuristic').default('heuristic'),
  /** Resolution used by the upstream extractor; carried through, not used */
  dpi: z.number().int().positive().default(300),
  /** Lines longer than this are never headers */
  maxHeaderLength: z.number().int().positive().default(80),
  /** Word ceiling for title-case headers */
  maxHeaderWords: z.number().int().min(2).default(12),
  /** Indentation columns per nesting level */
  indentUnit: z.number().int().positive().default(2),
  /** Rows consulted when voting on a table's column separator */
  tableSampleRows: z.number().int().positive().default(5),
  /** Wrap bare URLs in body and list text as markdown links */
  autoLinkUrls: z.boolean().default(true),
});

export type ResolvedFormatOptions = Readonly<z.infer<typeof formatOptionsSchema>>;

export type FormatOptions = z.input<typeof formatOptionsSchema> & {
  /** pino logger to use instead of the package default */
  readonly logger?: Logger;
};

export const DEFAULT_OPTIONS: ResolvedFormatOptions = Object.freeze(formatOptionsSchema.parse({}));

/**
 * Apply defaults and validate. Throws `OptionsError` with one
 * `path: message` entry per invalid field.
 */
export function resolveOptions(options: FormatOptions = {}): ResolvedFormatOptions {
  const result = formatOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new OptionsError(`Invalid format options: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(result.data);
}
