import { DEFAULT_DOCUMENT_LANG } from './constants.js';
import type { Diagnostic } from './diagnostics.js';
import { warningDiagnostic } from './diagnostics.js';
import { createFileImageResolver, toDataUri } from './images.js';
import type { ImageDescriptor, ImageResolver, ReportMetadata } from './model.js';
import { REPORT_STYLES } from './styles.js';

/**
 * Document assembly: wraps a rendered body into one self-contained HTML page.
 *
 * Section order is fixed: title, metadata, content (TOC first), diagrams,
 * figures.
 */
export interface AssembleReportInput {
  title: string;
  /** Rendered body, TOC included. */
  bodyHtml: string;
  metadata: ReportMetadata;
  figures: ImageDescriptor[];
  diagrams: ImageDescriptor[];
  lang?: string;
  resolver?: ImageResolver;
  /** Directory descriptor paths are resolved against (default: cwd). */
  baseDir?: string;
  /** Receives a warning per descriptor that could not be embedded. */
  diagnostics?: Diagnostic[];
}

interface DescriptorSection {
  className: string;
  heading: string;
  label: string;
}

const DIAGRAMS_SECTION: DescriptorSection = {
  className: 'diagrams-section',
  heading: 'Diagrams',
  label: 'Diagram',
};

const FIGURES_SECTION: DescriptorSection = {
  className: 'images-section',
  heading: 'Figures',
  label: 'Figure',
};

/**
 * Render one descriptor section. Descriptors whose image cannot be resolved
 * are skipped; numbering still follows their position in the list.
 */
function renderDescriptorSection(
  section: DescriptorSection,
  descriptors: ImageDescriptor[],
  resolver: ImageResolver,
  baseDir: string | undefined,
  diagnostics: Diagnostic[]
): string {
  if (descriptors.length === 0) return '';

  const figures: string[] = [];
  descriptors.forEach((descriptor, index) => {
    const payload = resolver.resolve(descriptor.path, baseDir);
    if (!payload) {
      diagnostics.push(
        warningDiagnostic('MISSING_FIGURE', `${section.label} ${index + 1} not found: ${descriptor.path}`)
      );
      return;
    }
    figures.push(
      `<figure><img src="${toDataUri(payload)}" alt="${descriptor.caption}"/>` +
        `<figcaption>${section.label} ${index + 1}: ${descriptor.caption}</figcaption></figure>`
    );
  });

  return [`<div class="${section.className}"><h2>${section.heading}</h2>`, ...figures, '</div>'].join('\n');
}

export function assembleReport(input: AssembleReportInput): string {
  const resolver = input.resolver ?? createFileImageResolver();
  const diagnostics = input.diagnostics ?? [];
  const diagramsHtml = renderDescriptorSection(
    DIAGRAMS_SECTION,
    input.diagrams,
    resolver,
    input.baseDir,
    diagnostics
  );
  const figuresHtml = renderDescriptorSection(
    FIGURES_SECTION,
    input.figures,
    resolver,
    input.baseDir,
    diagnostics
  );

  return [
    '<!DOCTYPE html>',
    `<html lang="${input.lang ?? DEFAULT_DOCUMENT_LANG}">`,
    '<head>',
    '<meta charset="UTF-8">',
    `<title>${input.title}</title>`,
    `<style>${REPORT_STYLES}</style>`,
    '</head>',
    '<body>',
    `<h1>${input.title}</h1>`,
    `<div class="metadata"><p>Date: ${input.metadata.date} | Author: ${input.metadata.author}</p></div>`,
    '<div class="content">',
    input.bodyHtml,
    '</div>',
    diagramsHtml,
    figuresHtml,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
