/**
 * Value types shared by the report rendering pipeline.
 *
 * Notes:
 * - Line numbers are 0-based to match typical array indexing in JS/TS.
 * - Nothing here outlives a single render; every stage returns fresh values.
 */
import type { Diagnostic } from './diagnostics.js';

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface Header {
  level: HeadingLevel;
  /** Heading text with any `{#anchor}` annotation removed (trimmed). */
  rawTitle: string;
  /** Anchor bound through a trailing `{#anchor}` annotation. */
  anchor?: string;
}

export interface TocEntry {
  title: string;
  anchor: string;
  /** 0 for `##` headings, 1 for `###` headings. */
  depth: 0 | 1;
}

export interface ImageReference {
  altText: string;
  pathOrUrl: string;
}

export type ImageKind = 'svg' | 'png' | 'jpeg' | 'gif' | 'webp';

/**
 * An image ready for inline embedding (base64 payload plus its MIME type).
 */
export interface EmbeddablePayload {
  kind: ImageKind;
  mimeType: string;
  /** Base64-encoded file contents. */
  data: string;
}

/**
 * Locates and encodes an image reference.
 *
 * Returns `undefined` when the image cannot be found or is not a supported kind;
 * callers degrade to a placeholder rather than failing.
 */
export interface ImageResolver {
  resolve(reference: string, baseDir?: string): EmbeddablePayload | undefined;
}

/**
 * Caller-supplied figure or diagram to append after the report body.
 */
export interface ImageDescriptor {
  path: string;
  caption: string;
}

export interface ReportMetadata {
  author: string;
  /** Free-form date string, typically `YYYY-MM-DD`. */
  date: string;
}

/**
 * One physical line of the document, tagged with the construct it belongs to.
 *
 * Stages consume and narrow this union:
 * - classification produces every kind except `fragment`
 * - block substitution removes `singleImage` and `columnGroup`
 * - inline rendering turns `header` and `rule` into `fragment`
 * - block building turns quote, table and list runs into `fragment`
 */
export type TaggedLine =
  | { kind: 'blank'; line: number }
  | { kind: 'plain'; line: number; text: string }
  | { kind: 'singleImage'; line: number; text: string; image: ImageReference }
  | { kind: 'columnGroup'; line: number; text: string; images: ImageReference[] }
  | { kind: 'tableRow'; line: number; text: string }
  | { kind: 'listItem'; line: number; ordered: boolean; content: string }
  | { kind: 'blockquote'; line: number; content: string }
  | { kind: 'header'; line: number; header: Header }
  | { kind: 'rule'; line: number }
  | { kind: 'fragment'; line: number; html: string };

export type LineKind = TaggedLine['kind'];

/** Lines left after images and column groups are substituted. */
export type SubstitutedLine = Exclude<TaggedLine, { kind: 'singleImage' | 'columnGroup' }>;

/** Lines left after headings and rules are rendered. */
export type InlineLine = Exclude<SubstitutedLine, { kind: 'header' | 'rule' }>;

/** Lines left after quote, table and list runs are grouped. */
export type BlockLine = Extract<TaggedLine, { kind: 'blank' | 'plain' | 'fragment' }>;

/**
 * Per-render state threaded through the stages that need it.
 */
export interface RenderContext {
  resolver: ImageResolver;
  baseDir?: string;
  diagnostics: Diagnostic[];
}
