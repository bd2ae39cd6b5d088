import { resolve } from 'node:path';
import { DEFAULT_DOCUMENT_LANG, DEFAULT_TOC_TITLE } from './report/constants.js';

/**
 * Runtime configuration shared by the CLI and the stdio server.
 *
 * `rootDir` is treated as a trust boundary: content files read by path and
 * output files written must resolve within it.
 */
export interface ReportConfig {
  rootDir: string;
  /** Heading of the generated table of contents. */
  tocTitle: string;
  /** `lang` attribute of assembled documents. */
  lang: string;
}

export function defaultConfig(cwd: string): ReportConfig {
  return { rootDir: cwd, tocTitle: DEFAULT_TOC_TITLE, lang: DEFAULT_DOCUMENT_LANG };
}

/**
 * Parse CLI args into a `ReportConfig`.
 *
 * Supported flags:
 * - `--root <dir>`: filesystem root (defaults to `cwd`).
 * - `--toc-title <text>`: contents heading (defaults to `Contents`).
 * - `--lang <code>`: document language (defaults to `en`).
 */
export function loadConfigFromArgs(argv: string[], cwd: string): ReportConfig {
  const args = [...argv];
  const config = defaultConfig(cwd);

  while (args.length > 0) {
    const flag = args.shift();
    if (!flag) break;

    if (flag === '--root') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --root');
      config.rootDir = resolve(cwd, value);
      continue;
    }

    if (flag === '--toc-title') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --toc-title');
      config.tocTitle = value;
      continue;
    }

    if (flag === '--lang') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --lang');
      config.lang = value;
      continue;
    }

    throw new Error(`Unknown argument: ${flag}`);
  }

  return config;
}
