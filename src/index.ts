export type { ReportConfig } from './config.js';
export { defaultConfig, loadConfigFromArgs } from './config.js';
export type {
  ExtractReportTocResult,
  RenderReportOptions,
  RenderReportResult,
} from './report/api.js';
export { extractReportToc, previewReportBody, renderReport } from './report/api.js';
export type { AssembleReportInput } from './report/assemble.js';
export { assembleReport } from './report/assemble.js';
export type { Diagnostic, DiagnosticCode } from './report/diagnostics.js';
export { parseDescriptorList, parseDescriptorListJson } from './report/descriptors.js';
export { createFileImageResolver, toDataUri } from './report/images.js';
export type {
  EmbeddablePayload,
  Header,
  ImageDescriptor,
  ImageKind,
  ImageReference,
  ImageResolver,
  ReportMetadata,
  TaggedLine,
  TocEntry,
} from './report/model.js';
export type { MarkdownToHtmlOptions, MarkdownToHtmlResult } from './report/pipeline.js';
export { markdownToHtml } from './report/pipeline.js';
export { extractToc, slugify } from './report/toc.js';
