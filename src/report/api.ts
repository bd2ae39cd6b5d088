import type { ReportConfig } from '../config.js';
import { assembleReport } from './assemble.js';
import { DEFAULT_AUTHOR } from './constants.js';
import type { Diagnostic } from './diagnostics.js';
import { warningDiagnostic } from './diagnostics.js';
import { parseDescriptorList } from './descriptors.js';
import { createFileImageResolver } from './images.js';
import type { ImageResolver, TocEntry } from './model.js';
import { markdownToHtml, normalizeNewlines } from './pipeline.js';
import { loadReportContent, replaceExtension, resolveWithinRoot, writeFileAtomic } from './storage.js';
import { extractToc } from './toc.js';

/**
 * Public API for report operations.
 *
 * This module is the boundary between:
 * - filesystem input/output (`storage.ts`)
 * - caller contract validation (`descriptors.ts`)
 * - the synchronous rendering pipeline (`pipeline.ts`, `assemble.ts`)
 *
 * Document irregularities come back as `warnings`; only caller contract
 * violations (bad descriptor lists, paths outside the root) throw.
 */
export interface RenderReportOptions {
  title: string;
  /** Markdown text, or a path (relative to the root) to a markdown file. */
  content: string;
  /** Unvalidated descriptor list; checked before anything is rendered. */
  figures?: unknown;
  diagrams?: unknown;
  author?: string;
  /** Defaults to today's local date (`YYYY-MM-DD`). */
  date?: string;
  includeToc?: boolean;
  /** Where to write the HTML; `.pdf` targets get an `.html` sibling instead. */
  outputPath?: string;
}

export interface RenderReportResult {
  html: string;
  /** Absolute path of the written file, when `outputPath` was given. */
  outputPath?: string;
  toc: TocEntry[];
  warnings: Diagnostic[];
}

export interface ExtractReportTocResult {
  entries: TocEntry[];
  /** Markdown of the contents block. */
  tocMarkdown: string;
  /** Content with `{#anchor}` bound on every participating heading. */
  markdown: string;
}

/**
 * Format a date as `YYYY-MM-DD` in local time.
 */
export function formatLocalDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Render a complete report and optionally write it to disk.
 */
export async function renderReport(
  config: ReportConfig,
  options: RenderReportOptions,
  resolver: ImageResolver = createFileImageResolver()
): Promise<RenderReportResult> {
  const figures = parseDescriptorList('images', options.figures ?? []);
  const diagrams = parseDescriptorList('diagrams', options.diagrams ?? []);
  const content = await loadReportContent(config, options.content);

  const body = markdownToHtml(content.text, {
    baseDir: content.baseDir,
    includeToc: options.includeToc,
    tocTitle: config.tocTitle,
    resolver,
  });
  const warnings = [...body.diagnostics];

  const html = assembleReport({
    title: options.title,
    bodyHtml: body.html,
    metadata: {
      author: options.author ?? DEFAULT_AUTHOR,
      date: options.date ?? formatLocalDate(new Date()),
    },
    figures,
    diagrams,
    lang: config.lang,
    resolver,
    baseDir: config.rootDir,
    diagnostics: warnings,
  });

  if (options.outputPath === undefined) {
    return { html, toc: body.toc, warnings };
  }

  let outputPath = resolveWithinRoot(config, options.outputPath);
  if (outputPath.toLowerCase().endsWith('.pdf')) {
    outputPath = replaceExtension(outputPath, '.html');
    warnings.push(
      warningDiagnostic('PDF_NOT_RENDERED', `PDF rendering is external; wrote HTML to ${outputPath}`)
    );
  }
  await writeFileAtomic(outputPath, html);

  return { html, outputPath, toc: body.toc, warnings };
}

/**
 * Extract the table of contents of a report without rendering it.
 */
export async function extractReportToc(
  config: ReportConfig,
  options: { content: string }
): Promise<ExtractReportTocResult> {
  const content = await loadReportContent(config, options.content);
  const extracted = extractToc(normalizeNewlines(content.text), { tocTitle: config.tocTitle });
  return { entries: extracted.entries, tocMarkdown: extracted.tocMarkdown, markdown: extracted.text };
}

/**
 * Render only the body (contents block + content) of a report.
 */
export async function previewReportBody(
  config: ReportConfig,
  options: { content: string; includeToc?: boolean },
  resolver: ImageResolver = createFileImageResolver()
): Promise<{ html: string; warnings: Diagnostic[] }> {
  const content = await loadReportContent(config, options.content);
  const body = markdownToHtml(content.text, {
    baseDir: content.baseDir,
    includeToc: options.includeToc,
    tocTitle: config.tocTitle,
    resolver,
  });
  return { html: body.html, warnings: body.diagnostics };
}
