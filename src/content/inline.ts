/**
 * Inline markdown helpers shared by the block renderers.
 */

export interface ParagraphOptions {
  readonly autoLinkUrls: boolean;
}

/**
 * Auto-detect URLs in plain text and wrap them as markdown links.
 * URLs already inside a link or angle brackets are left alone.
 */
export function autoLinkUrls(text: string): string {
  return text.replace(
    /(?<![[(<])https?:\/\/[^\s),\]]+/g,
    (url) => `[${url}](${url})`,
  );
}

/**
 * Escape line openings markdown would read as structure: headings,
 * blockquotes, ordered or bullet markers, rules and setext underlines.
 */
export function escapeLineStart(text: string): string {
  return text
    .replace(/^([#>])/, '\\$1')
    .replace(/^(\d+)([.)])(?=\s|$)/, '$1\\$2')
    .replace(/^([-+*])(?=\s)/, '\\$1')
    .replace(/^([-=_*])(?=[-=_*\s]*$)/, '\\$1');
}

/**
 * Render body lines as one paragraph, keeping the source line breaks.
 */
export function formatParagraph(lines: readonly string[], options: ParagraphOptions): string {
  return lines
    .map(line => {
      const escaped = escapeLineStart(line);
      return options.autoLinkUrls ? autoLinkUrls(escaped) : escaped;
    })
    .join('\n');
}
