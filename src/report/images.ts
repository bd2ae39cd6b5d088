import { existsSync, readFileSync, statSync } from 'node:fs';
import { extname, isAbsolute, resolve } from 'node:path';
import type { EmbeddablePayload, ImageKind, ImageReference, ImageResolver } from './model.js';

/**
 * Image references and their embedding.
 *
 * Reports must be self-contained, so every image that can be found is inlined
 * as a base64 data URI. Lookups are plain synchronous reads: fetching remote
 * images (and retrying) happens before rendering, not here.
 */
const IMAGE_KINDS_BY_EXTENSION: Record<string, ImageKind> = {
  '.svg': 'svg',
  '.png': 'png',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.gif': 'gif',
  '.webp': 'webp',
};

const MIME_TYPES: Record<ImageKind, string> = {
  svg: 'image/svg+xml',
  png: 'image/png',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
};

const IMAGE_REFERENCE_RE = /!\[([^\]]*)\]\(([^)]+)\)/g;
const REMOTE_REFERENCE_RE = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Map a file name to a supported image kind by extension (case-insensitive).
 */
export function imageKindFromPath(path: string): ImageKind | undefined {
  return IMAGE_KINDS_BY_EXTENSION[extname(path).toLowerCase()];
}

export function toDataUri(payload: EmbeddablePayload): string {
  return `data:${payload.mimeType};base64,${payload.data}`;
}

/**
 * Find every `![alt](path)` reference in a text, in order of appearance.
 */
export function findImageReferences(text: string): ImageReference[] {
  const references: ImageReference[] = [];
  for (const match of text.matchAll(IMAGE_REFERENCE_RE)) {
    references.push({ altText: match[1] ?? '', pathOrUrl: match[2] ?? '' });
  }
  return references;
}

/**
 * Replace every `![alt](path)` reference using `render`.
 */
export function replaceImageReferences(
  text: string,
  render: (image: ImageReference) => string
): string {
  return text.replace(IMAGE_REFERENCE_RE, (_match, altText: string, pathOrUrl: string) =>
    render({ altText, pathOrUrl })
  );
}

/**
 * Resolver backed by the local filesystem.
 *
 * Relative references are joined with `baseDir` (or the process cwd when no
 * base is known); absolute references are used as-is. Remote URLs and
 * unsupported extensions resolve to `undefined`.
 */
export function createFileImageResolver(): ImageResolver {
  return {
    resolve(reference: string, baseDir?: string): EmbeddablePayload | undefined {
      if (REMOTE_REFERENCE_RE.test(reference)) return undefined;

      const absolutePath = isAbsolute(reference) || !baseDir ? resolve(reference) : resolve(baseDir, reference);
      const kind = imageKindFromPath(absolutePath);
      if (!kind) return undefined;
      if (!existsSync(absolutePath) || !statSync(absolutePath).isFile()) return undefined;

      return {
        kind,
        mimeType: MIME_TYPES[kind],
        data: readFileSync(absolutePath).toString('base64'),
      };
    },
  };
}
