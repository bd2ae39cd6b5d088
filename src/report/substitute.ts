import { COLUMNS_BEGIN_MARKER, COLUMNS_END_MARKER } from './constants.js';
import { warningDiagnostic } from './diagnostics.js';
import { findImageReferences, replaceImageReferences, toDataUri } from './images.js';
import type {
  EmbeddablePayload,
  ImageReference,
  RenderContext,
  SubstitutedLine,
  TaggedLine,
} from './model.js';

/**
 * Block substitution: images and column groups.
 *
 * Must run before paragraph wrapping so generated `<figure>`/`<div>` blocks are
 * recognized as structural and never wrapped in `<p>`.
 *
 * Order matters:
 * 1. explicit `<!-- columns -->` spans (may cross lines)
 * 2. lines holding two or more images (inferred column groups)
 * 3. every remaining single image, wherever it appears
 * Step 2 consumes its image tokens, so step 3 never sees them twice.
 */
const COLUMN_SPAN_RE = /<!--\s*columns\s*-->([\s\S]*?)<!--\s*\/columns\s*-->/g;

function resolveImage(image: ImageReference, ctx: RenderContext): EmbeddablePayload | undefined {
  const payload = ctx.resolver.resolve(image.pathOrUrl, ctx.baseDir);
  if (!payload) {
    ctx.diagnostics.push(
      warningDiagnostic('MISSING_IMAGE', `Image not found: ${image.pathOrUrl}`)
    );
  }
  return payload;
}

function renderCaption(image: ImageReference): string {
  return image.altText ? `<figcaption>${image.altText}</figcaption>` : '';
}

function renderPlaceholder(image: ImageReference): string {
  return `<div class="missing-image-box">[Image: ${image.altText}]</div>`;
}

/**
 * Render a standalone image as a `<figure>`, or a visible placeholder when it
 * cannot be resolved.
 */
export function renderFigure(image: ImageReference, ctx: RenderContext): string {
  const payload = resolveImage(image, ctx);
  if (!payload) {
    return `<figure class="missing-image">${renderPlaceholder(image)}</figure>`;
  }
  return `<figure><img src="${toDataUri(payload)}" alt="${image.altText}"/>${renderCaption(image)}</figure>`;
}

function renderColumnItem(image: ImageReference, ctx: RenderContext): string {
  const payload = resolveImage(image, ctx);
  if (!payload) {
    return `<figure class="column-item missing-image">${renderPlaceholder(image)}</figure>`;
  }
  return `<figure class="column-item"><img src="${toDataUri(payload)}" alt="${image.altText}"/>${renderCaption(image)}</figure>`;
}

/**
 * Render images side by side. Always a single line of HTML.
 */
export function renderColumnGroup(images: ImageReference[], ctx: RenderContext): string {
  const items = images.map((image) => renderColumnItem(image, ctx)).join('');
  return `<div class="image-columns">${items}</div>`;
}

/**
 * Replace explicit column spans with column groups.
 *
 * A span without any image is left exactly as written, markers included.
 */
export function substituteColumnSpans(text: string, ctx: RenderContext): string {
  return text.replace(COLUMN_SPAN_RE, (span: string, content: string) => {
    const images = findImageReferences(content);
    if (images.length === 0) {
      ctx.diagnostics.push(
        warningDiagnostic(
          'EMPTY_COLUMN_GROUP',
          `${COLUMNS_BEGIN_MARKER} … ${COLUMNS_END_MARKER} contains no images; left as-is`
        )
      );
      return span;
    }
    return renderColumnGroup(images, ctx);
  });
}

/**
 * Substitute images on classified lines.
 *
 * Column-group lines are replaced wholesale; single images are replaced in
 * place inside any construct (paragraphs, list items, table cells, quotes,
 * headings).
 */
export function substituteImages(lines: TaggedLine[], ctx: RenderContext): SubstitutedLine[] {
  const figure = (image: ImageReference): string => renderFigure(image, ctx);

  return lines.map((line): SubstitutedLine => {
    switch (line.kind) {
      case 'columnGroup':
        return { kind: 'plain', line: line.line, text: renderColumnGroup(line.images, ctx) };
      case 'singleImage':
      case 'plain':
        return { kind: 'plain', line: line.line, text: replaceImageReferences(line.text, figure) };
      case 'tableRow':
        return { ...line, text: replaceImageReferences(line.text, figure) };
      case 'listItem':
      case 'blockquote':
        return { ...line, content: replaceImageReferences(line.content, figure) };
      case 'header':
        return {
          ...line,
          header: { ...line.header, rawTitle: replaceImageReferences(line.header.rawTitle, figure) },
        };
      default:
        return line;
    }
  });
}
