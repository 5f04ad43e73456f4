/**
 * Text Repairer
 *
 * Fixes character-level damage that OCR engines and PDF text layers leave
 * behind, one line at a time, before the line is classified.
 *
 * Rules run in table order. The table is idempotent as a whole: no rule can
 * produce input for a rule that ran before it.
 *
 * Runs of two or more spaces and tabs are kept (canonicalized to two spaces or
 * one tab) because the classifier reads them as table column gaps.
 */

export interface RepairRule {
  readonly name: string;
  readonly pattern: RegExp;
  readonly replace: (match: string, ...groups: string[]) => string;
}

const LIGATURES: Record<string, string> = {
  'ﬀ': 'ff',
  'ﬁ': 'fi',
  'ﬂ': 'fl',
  'ﬃ': 'ffi',
  'ﬄ': 'ffl',
  'ﬅ': 'st',
  'ﬆ': 'st',
};

const FRACTIONS: Record<string, string> = {
  '½': '1/2',
  '¼': '1/4',
  '¾': '3/4',
  '⅓': '1/3',
  '⅔': '2/3',
  '⅛': '1/8',
};

/** Letters OCR confuses with digits */
const DIGIT_LOOKALIKES: Record<string, string> = {
  O: '0',
  o: '0',
  l: '1',
  I: '1',
};

export const REPAIR_RULES: readonly RepairRule[] = [
  {
    // C0/C1 controls except tab and line breaks, zero-width chars, BOM,
    // soft hyphen, replacement char
    name: 'strip-invisible',
    pattern: /[\u0000-\u0008\u000E-\u001F\u007F-\u009F\u00AD\u200B-\u200D\u2060\uFEFF\uFFFD]/g,
    replace: () => '',
  },
  {
    name: 'plain-spaces',
    pattern: /[\u000A-\u000D\u00A0\u1680\u2000-\u200A\u2028\u2029\u202F\u205F\u3000]/g,
    replace: () => ' ',
  },
  {
    name: 'ligatures',
    pattern: /[ﬀ-ﬆ]/g,
    replace: (ligature) => LIGATURES[ligature] ?? ligature,
  },
  {
    // "1½" reads as "1 1/2", not "11/2"
    name: 'fractions',
    pattern: /(\d?)([½¼¾⅓⅔⅛])/g,
    replace: (_match, digit, fraction) => {
      const spelled = FRACTIONS[fraction] ?? fraction;
      return digit ? `${digit} ${spelled}` : spelled;
    },
  },
  {
    name: 'digit-lookalikes',
    // Whole runs, so "1Ol1" is fixed in one pass
    pattern: /(?<=\d)[OolI]+(?=\d)/g,
    replace: (run) => [...run].map(letter => DIGIT_LOOKALIKES[letter] ?? letter).join(''),
  },
  {
    // Right-to-left misreads of thousands: "$005,1" is "$1,500"
    name: 'reversed-hundreds',
    pattern: /\$005,(\d)/g,
    replace: (_match, digit) => `$${digit},500`,
  },
  {
    // "$000,005" would come out as "$005,000", which reads as a reversed
    // hundreds amount on the next pass, so it is left alone
    name: 'reversed-thousands',
    pattern: /\$000,(?!005(?!\d))(\d+)/g,
    replace: (_match, digits) => `$${digits},000`,
  },
  {
    name: 'collapse-whitespace',
    pattern: /[ \t]+/g,
    replace: (run) => {
      if (run.includes('\t')) return '\t';
      return run.length >= 2 ? '  ' : ' ';
    },
  },
  {
    name: 'trim',
    pattern: /^[ \t]+|[ \t]+$/g,
    replace: () => '',
  },
];

/**
 * Repair a single line of extracted text. Never throws; text no rule matches
 * passes through unchanged.
 */
export function repairText(line: string): string {
  let text = line;
  for (const rule of REPAIR_RULES) {
    text = text.replace(rule.pattern, rule.replace);
  }
  return text;
}
