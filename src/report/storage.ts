import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import { dirname, extname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { ReportConfig } from '../config.js';

/**
 * Filesystem helpers for report input and output.
 *
 * Responsibilities:
 * - Ensure content reads and output writes stay within `config.rootDir`.
 * - Distinguish literal markdown from a path to a markdown file.
 * - Provide atomic writes.
 */
export interface ReportContent {
  text: string;
  /** Directory relative image references resolve against. */
  baseDir: string;
  /** Absolute path of the content file; unset for literal markdown. */
  sourcePath?: string;
}

/**
 * Enforce that `absolutePath` does not escape `rootDir`.
 *
 * We check via `relative()` rather than string prefix matching to handle path
 * normalization correctly across platforms. Symlinks are not resolved.
 */
function assertPathWithinRoot(rootDir: string, absolutePath: string): void {
  const rel = relative(rootDir, absolutePath);
  if (rel === '' || rel === '.') return;

  // On Windows, `path.relative()` can return an absolute path if drives differ.
  if (isAbsolute(rel)) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }

  const parts = rel.split(sep);
  if (parts.includes('..')) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }
}

/**
 * Resolve a user-supplied path against `rootDir` and ensure it stays inside.
 */
export function resolveWithinRoot(config: ReportConfig, path: string): string {
  const rootDir = resolve(config.rootDir);
  const absolutePath = resolve(rootDir, path);
  assertPathWithinRoot(rootDir, absolutePath);
  return absolutePath;
}

/** `stat()` failures that mean "this string does not name a file". */
const NOT_A_PATH_CODES = new Set(['ENOENT', 'ENAMETOOLONG', 'ENOTDIR', 'EINVAL']);

async function isFile(absolutePath: string): Promise<boolean> {
  try {
    return (await stat(absolutePath)).isFile();
  } catch (error) {
    const code = (error as NodeJS.ErrnoException | undefined)?.code;
    if (code && NOT_A_PATH_CODES.has(code)) return false;
    throw error;
  }
}

/**
 * Load report content.
 *
 * `content` is either markdown or a path (relative to `rootDir`) to a markdown
 * file. A single-line value naming an existing file is read, and the file's
 * directory becomes the base for relative image references; anything else is
 * taken as literal markdown, with images resolved against `rootDir`.
 */
export async function loadReportContent(config: ReportConfig, content: string): Promise<ReportContent> {
  const literal: ReportContent = { text: content, baseDir: resolve(config.rootDir) };
  if (content.includes('\n') || content.trim() === '') return literal;

  const candidate = resolve(config.rootDir, content);
  if (!(await isFile(candidate))) return literal;

  const sourcePath = resolveWithinRoot(config, content);
  const text = await readFile(sourcePath, 'utf8');
  return { text, baseDir: dirname(sourcePath), sourcePath };
}

/**
 * Swap the extension of a path (`report.pdf` → `report.html`).
 */
export function replaceExtension(path: string, extension: string): string {
  const current = extname(path);
  return `${current ? path.slice(0, -current.length) : path}${extension}`;
}

/**
 * Write a file via a temporary path and atomic rename.
 *
 * This pattern avoids torn writes of the report file.
 */
export async function writeFileAtomic(absolutePath: string, text: string): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  await rename(tmpPath, absolutePath);
}
