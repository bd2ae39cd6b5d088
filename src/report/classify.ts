import { findImageReferences } from './images.js';
import type { Header, HeadingLevel, TaggedLine } from './model.js';
import { stripAnchorAnnotations } from './toc.js';

/**
 * Line classifier.
 *
 * Every later stage works from the tag assigned here instead of re-matching
 * the raw text, so the order of the checks below is the only place where
 * constructs compete for a line:
 *
 * 1. blank
 * 2. two or more images (column group, wins over everything else)
 * 3. heading
 * 4. horizontal rule
 * 5. table row, blockquote, list item (on the trimmed line)
 * 6. exactly one image
 * 7. plain text
 */
const HEADING_RE = /^(#{1,6})\s+(.+)$/;
const BOUND_ANCHOR_RE = /^(.*?)\s*\{#([^}]+)\}$/;
const RULE_RE = /^---+$/;
const ORDERED_ITEM_RE = /^\d+\.\s/;

function toHeadingLevel(hashes: string): HeadingLevel {
  const level = hashes.length;
  if (level === 1 || level === 2 || level === 3 || level === 4 || level === 5) return level;
  return 6;
}

/**
 * Parse a heading line into its level, title and bound anchor (if any).
 *
 * Only a `{#anchor}` annotation at the very end binds; annotations elsewhere in
 * the title are dropped.
 */
export function parseHeading(line: string): Header | undefined {
  const match = line.match(HEADING_RE);
  if (!match) return undefined;

  const level = toHeadingLevel(match[1] ?? '#');
  const title = (match[2] ?? '').trimEnd();
  const bound = title.match(BOUND_ANCHOR_RE);
  if (bound) {
    return {
      level,
      rawTitle: stripAnchorAnnotations(bound[1] ?? '').trim(),
      anchor: bound[2],
    };
  }
  return { level, rawTitle: stripAnchorAnnotations(title).trim() };
}

/**
 * Tag one physical line.
 */
export function classifyLine(text: string, line: number): TaggedLine {
  const stripped = text.trim();
  if (!stripped) return { kind: 'blank', line };

  const images = findImageReferences(text);
  if (images.length >= 2) return { kind: 'columnGroup', line, text, images };

  const header = parseHeading(text);
  if (header) return { kind: 'header', line, header };

  if (RULE_RE.test(text)) return { kind: 'rule', line };

  if (stripped.startsWith('|') && stripped.endsWith('|')) {
    return { kind: 'tableRow', line, text: stripped };
  }

  if (stripped.startsWith('> ')) {
    return { kind: 'blockquote', line, content: stripped.slice(2) };
  }

  if (stripped.startsWith('- ') || stripped.startsWith('* ')) {
    return { kind: 'listItem', line, ordered: false, content: stripped.slice(2) };
  }

  if (ORDERED_ITEM_RE.test(stripped)) {
    return { kind: 'listItem', line, ordered: true, content: stripped.replace(ORDERED_ITEM_RE, '') };
  }

  const [image] = images;
  if (image) return { kind: 'singleImage', line, text, image };

  return { kind: 'plain', line, text };
}

export function classifyLines(text: string): TaggedLine[] {
  return text.split('\n').map((line, index) => classifyLine(line, index));
}
