import { buildBlocks } from './blocks.js';
import { classifyLines } from './classify.js';
import type { Diagnostic } from './diagnostics.js';
import { createFileImageResolver } from './images.js';
import { renderInlineLines } from './inline.js';
import type { ImageResolver, RenderContext, TocEntry } from './model.js';
import { linesToText, wrapParagraphs } from './paragraphs.js';
import { substituteColumnSpans, substituteImages } from './substitute.js';
import { extractToc } from './toc.js';

/**
 * Markdown → HTML body conversion.
 *
 * Stages run strictly in order and each one only consumes the output of the
 * previous one:
 * 1. table of contents (anchors bound on `##`/`###` headings)
 * 2. block substitution (column spans, column lines, single images)
 * 3. headings and inline markup
 * 4. blockquote, table and list runs
 * 5. paragraph wrapping
 *
 * Nothing is shared between calls, so independent documents can be converted
 * concurrently.
 */
export interface MarkdownToHtmlOptions {
  /** Directory relative image references are resolved against. */
  baseDir?: string;
  /** Default true. */
  includeToc?: boolean;
  tocTitle?: string;
  resolver?: ImageResolver;
}

export interface MarkdownToHtmlResult {
  /** `tocHtml` followed by `contentHtml`. */
  html: string;
  /** `<nav class="toc">…</nav>`, or '' when disabled or no heading qualifies. */
  tocHtml: string;
  contentHtml: string;
  toc: TocEntry[];
  diagnostics: Diagnostic[];
}

/**
 * Normalize line endings so every stage can split on `\n`.
 */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * Run stages 2–5 over a text.
 */
export function renderBody(text: string, ctx: RenderContext): string {
  const spanned = substituteColumnSpans(text, ctx);
  const substituted = substituteImages(classifyLines(spanned), ctx);
  const blocks = buildBlocks(renderInlineLines(substituted), ctx);
  return wrapParagraphs(linesToText(blocks));
}

export function markdownToHtml(markdown: string, options: MarkdownToHtmlOptions = {}): MarkdownToHtmlResult {
  const ctx: RenderContext = {
    resolver: options.resolver ?? createFileImageResolver(),
    baseDir: options.baseDir,
    diagnostics: [],
  };

  let body = normalizeNewlines(markdown);
  let tocHtml = '';
  let toc: TocEntry[] = [];

  if (options.includeToc ?? true) {
    const extracted = extractToc(body, { tocTitle: options.tocTitle });
    body = extracted.text;
    toc = extracted.entries;
    if (extracted.tocMarkdown) {
      tocHtml = `<nav class="toc">${renderBody(extracted.tocMarkdown, ctx)}</nav>`;
    }
  }

  const contentHtml = renderBody(body, ctx);
  return { html: tocHtml + contentHtml, tocHtml, contentHtml, toc, diagnostics: ctx.diagnostics };
}
