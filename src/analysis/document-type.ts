/**
 * Document profile
 *
 * Cheap keyword scoring that guesses what kind of document a text comes from,
 * plus a count of lines that look tabular. Used for logging and by callers
 * that tune their extraction per document type.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const documentProfilesSchema = z.array(
  z.object({
    type: z.string().min(1),
    keywords: z.array(z.string().min(1)).min(1),
    focus: z.string(),
  }),
);

export type DocumentProfile = z.infer<typeof documentProfilesSchema>[number];

export interface DocumentTypeResult {
  /** Profile name, or 'general' when no keyword matched */
  readonly type: string;
  /** Number of the profile's keywords found in the text */
  readonly score: number;
  readonly focus: string;
}

export type TableDensityGrade = 'none' | 'tabular' | 'complex';

export interface TableDensity {
  readonly indicators: number;
  readonly grade: TableDensityGrade;
}

export const GENERAL_FOCUS = 'Extract all text maintaining original layout and structure.';

/** Resolves from both src/analysis and dist/analysis */
const PROFILES_URL = new URL('../../data/document-types.json', import.meta.url);

/** Matched over the whole text; every hit counts, so a wide row can count more than once */
const TABLE_INDICATORS: readonly RegExp[] = [
  /\s{2,}\S+\s{2,}\S+/gm,
  /\|.*\|.*\|/gm,
  /\t.*\t/gm,
  /^\s*\d+\.\d+\s+.*$/gm,
];

let profiles: readonly DocumentProfile[] | null = null;

/**
 * Keyword table, read and validated on first use.
 */
export function loadDocumentProfiles(): readonly DocumentProfile[] {
  if (!profiles) {
    const raw: unknown = JSON.parse(readFileSync(PROFILES_URL, 'utf8'));
    profiles = Object.freeze(documentProfilesSchema.parse(raw));
  }
  return profiles;
}

/**
 * Score the text against every profile; the highest score wins and ties go
 * to the profile listed first.
 */
export function analyzeDocumentType(text: string): DocumentTypeResult {
  const lower = text.toLowerCase();
  let best: DocumentTypeResult = { type: 'general', score: 0, focus: GENERAL_FOCUS };

  for (const profile of loadDocumentProfiles()) {
    const score = profile.keywords.filter(keyword => lower.includes(keyword)).length;
    if (score > best.score) {
      best = { type: profile.type, score, focus: profile.focus };
    }
  }

  return best;
}

/**
 * Count table indicators: gap-separated cells, pipe and tab rows, and rows
 * opening with a dotted number.
 */
export function detectTableDensity(text: string): TableDensity {
  const indicators = TABLE_INDICATORS.reduce(
    (count, pattern) => count + (text.match(pattern)?.length ?? 0),
    0,
  );

  const grade: TableDensityGrade = indicators > 10 ? 'complex' : indicators > 5 ? 'tabular' : 'none';
  return { indicators, grade };
}
