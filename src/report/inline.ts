import type { Header, InlineLine, SubstitutedLine } from './model.js';
import { stripAnchorAnnotations } from './toc.js';

/**
 * Heading and inline rendering.
 *
 * Emphasis is matched strongest-first (`***`, then `**`, then `*`); the single
 * `*` form refuses a neighbouring `*` so leftovers of `**bold**` never turn
 * into italics.
 */
const BOLD_ITALIC_RE = /\*\*\*(.+?)\*\*\*/g;
const BOLD_RE = /\*\*(.+?)\*\*/g;
const ITALIC_RE = /(?<!\*)\*([^*\n]+?)\*(?!\*)/g;
const LINK_RE = /\[([^\]]+)\]\(([^)]+)\)/g;

/**
 * Render emphasis and links in a fragment of text. Stray `{#anchor}`
 * annotations are removed without binding.
 */
export function renderInline(text: string): string {
  return stripAnchorAnnotations(text)
    .replace(BOLD_ITALIC_RE, '<strong><em>$1</em></strong>')
    .replace(BOLD_RE, '<strong>$1</strong>')
    .replace(ITALIC_RE, '<em>$1</em>')
    .replace(LINK_RE, '<a href="$2">$1</a>');
}

export function renderHeader(header: Header): string {
  const tag = `h${header.level}`;
  const id = header.anchor ? ` id="${header.anchor}"` : '';
  return `<${tag}${id}>${renderInline(header.rawTitle)}</${tag}>`;
}

/**
 * Render headings and rules to HTML and apply inline markup to the text of
 * every other line. Block grouping is left to the next stage.
 */
export function renderInlineLines(lines: SubstitutedLine[]): InlineLine[] {
  return lines.map((line): InlineLine => {
    switch (line.kind) {
      case 'header':
        return { kind: 'fragment', line: line.line, html: renderHeader(line.header) };
      case 'rule':
        return { kind: 'fragment', line: line.line, html: '<hr/>' };
      case 'plain':
      case 'tableRow':
        return { ...line, text: renderInline(line.text) };
      case 'listItem':
      case 'blockquote':
        return { ...line, content: renderInline(line.content) };
      default:
        return line;
    }
  });
}
