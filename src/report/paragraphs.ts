import type { BlockLine } from './model.js';

/**
 * Blocks that already start with one of these tags (or an HTML comment) are
 * structural and pass through untouched.
 */
const STRUCTURAL_BLOCK_RE = /^(?:<(?:h[1-6]|ul|ol|li|blockquote|figure|hr|p|div|table)(?=[\s>/])|<!--)/i;
const BLANK_LINE_SEPARATOR_RE = /\n[ \t]*\n/;

export function isStructuralBlock(block: string): boolean {
  return STRUCTURAL_BLOCK_RE.test(block);
}

export function linesToText(lines: BlockLine[]): string {
  return lines
    .map((line) => {
      if (line.kind === 'fragment') return line.html;
      if (line.kind === 'plain') return line.text;
      return '';
    })
    .join('\n');
}

/**
 * Wrap every non-structural block in `<p>`. Newlines inside a block are kept
 * as-is; empty blocks are dropped.
 */
export function wrapParagraphs(text: string): string {
  return text
    .split(BLANK_LINE_SEPARATOR_RE)
    .map((block) => block.trim())
    .filter((block) => block.length > 0)
    .map((block) => (isStructuralBlock(block) ? block : `<p>${block}</p>`))
    .join('\n');
}
