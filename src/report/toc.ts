import { DEFAULT_TOC_TITLE } from './constants.js';
import type { TocEntry } from './model.js';

/**
 * Table-of-contents extraction.
 *
 * Only `##` and `###` headings participate: the `#` heading is the report
 * title, which the assembler renders separately, and deeper levels are too
 * fine-grained for a printed contents page.
 */
export interface ExtractTocOptions {
  tocTitle?: string;
  anchors?: AnchorRegistry;
}

export interface ExtractTocResult {
  /** Markdown for the contents block, or '' when no heading qualifies. */
  tocMarkdown: string;
  /** Input text with every participating heading carrying `{#anchor}`. */
  text: string;
  entries: TocEntry[];
}

/**
 * Anchor collision table for one document.
 *
 * `counts` maps a base slug to the last suffix handed out; `used` holds every
 * anchor assigned so far so generated suffixes never shadow a literal heading.
 */
export interface AnchorRegistry {
  counts: Map<string, number>;
  used: Set<string>;
}

const TOC_HEADING_RE = /^(#{2,3})\s+(.+)$/;
const ANCHOR_ANNOTATION_RE = /\s*\{#[^}]+\}/g;
const NON_SLUG_CHARS_RE = /[^\p{L}\p{M}\p{N}_\s-]/gu;

export function createAnchorRegistry(): AnchorRegistry {
  return { counts: new Map(), used: new Set() };
}

/**
 * Remove every `{#anchor}` annotation from a heading title.
 */
export function stripAnchorAnnotations(title: string): string {
  return title.replace(ANCHOR_ANNOTATION_RE, '');
}

/**
 * Derive a slug: lowercase, drop punctuation (letters of any script are kept),
 * collapse whitespace runs to `-`.
 */
export function slugify(title: string): string {
  const slug = title.toLowerCase().replace(NON_SLUG_CHARS_RE, '').trim().replace(/\s+/g, '-');
  return slug || 'section';
}

/**
 * Hand out a unique anchor for `base`.
 *
 * First occurrence gets the bare slug; the Nth repeat gets `base-N`.
 */
export function assignAnchor(registry: AnchorRegistry, base: string): string {
  let anchor = base;
  if (registry.counts.has(base) || registry.used.has(base)) {
    let suffix = registry.counts.get(base) ?? 0;
    do {
      suffix += 1;
      anchor = `${base}-${suffix}`;
    } while (registry.used.has(anchor));
    registry.counts.set(base, suffix);
  } else {
    registry.counts.set(base, 0);
  }
  registry.used.add(anchor);
  return anchor;
}

/**
 * Scan `##`/`###` headings, bind each to a unique anchor and build the
 * contents list that links to them.
 *
 * Existing `{#...}` annotations are discarded before the slug is derived, so
 * running this on its own output yields the same anchors again.
 */
export function extractToc(text: string, options: ExtractTocOptions = {}): ExtractTocResult {
  const anchors = options.anchors ?? createAnchorRegistry();
  const lines = text.split('\n');
  const entries: TocEntry[] = [];
  const rewritten: string[] = [];

  for (const line of lines) {
    const match = line.match(TOC_HEADING_RE);
    if (!match) {
      rewritten.push(line);
      continue;
    }

    const hashes = match[1] ?? '##';
    const title = stripAnchorAnnotations((match[2] ?? '').trim());
    const anchor = assignAnchor(anchors, slugify(title));

    entries.push({ title, anchor, depth: hashes.length === 2 ? 0 : 1 });
    rewritten.push(`${hashes} ${title} {#${anchor}}`);
  }

  if (entries.length === 0) {
    return { tocMarkdown: '', text, entries };
  }

  return {
    tocMarkdown: buildTocMarkdown(entries, options.tocTitle ?? DEFAULT_TOC_TITLE),
    text: rewritten.join('\n'),
    entries,
  };
}

function buildTocMarkdown(entries: TocEntry[], tocTitle: string): string {
  const items = entries.map(
    (entry) => `${'  '.repeat(entry.depth)}- [${entry.title}](#${entry.anchor})`
  );
  return [`## ${tocTitle}`, '', ...items, '', '---', ''].join('\n');
}
