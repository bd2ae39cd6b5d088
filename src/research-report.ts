#!/usr/bin/env node

/**
 * `research-report` - local CLI for rendering markdown research reports.
 *
 * This CLI is a first-class interface alongside the stdio server. Both share
 * the same report API so behavior stays in sync.
 *
 * Important: this module is imported by tests, so it must NOT auto-run when
 * imported. The bottom-of-file "isMain" guard ensures that.
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { ReportConfig } from './config.js';
import { defaultConfig } from './config.js';
import { extractReportToc, renderReport } from './report/api.js';
import { DEFAULT_AUTHOR, DEFAULT_DOCUMENT_LANG, DEFAULT_TOC_TITLE } from './report/constants.js';
import { parseDescriptorListJson } from './report/descriptors.js';

export interface ReportIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Render CLI help text.
 *
 * Keep this stable and human-readable: tests and users often depend on it.
 */
function helpText(defaultRoot: string): string {
  return [
    'research-report — render markdown research reports to print-ready HTML',
    '',
    'Usage:',
    '  research-report [--root <dir>] [--toc-title <text>] [--lang <code>] <cmd>',
    '',
    'Commands:',
    '  research-report render --title <text> --content <markdown|path> --output <path>',
    '      [--images <json>] [--diagrams <json>] [--author <text>] [--date <text>] [--no-toc]',
    '  research-report toc --content <markdown|path>',
    '',
    'Notes:',
    `  Defaults: --root=${defaultRoot} --toc-title=${DEFAULT_TOC_TITLE} --lang=${DEFAULT_DOCUMENT_LANG} --author="${DEFAULT_AUTHOR}"`,
    '  --images/--diagrams take a JSON array of {"path": "...", "caption": "..."} objects.',
    '  An --output ending in .pdf is written as .html; PDF rendering happens outside this tool.',
    '  Output: JSON to stdout; errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: ReportIo, defaultRoot: string): void {
  io.stdout.write(helpText(defaultRoot));
}

/**
 * Write a JSON value to stdout (pretty-printed).
 */
function writeJson(io: ReportIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Consume a boolean flag from argv.
 *
 * Returns true if the flag was present and removed.
 */
function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value. A
 * separate value starting with `--` is taken as the next flag unless
 * `acceptDashValue` is set (markdown may open with a `---` rule).
 */
function takeOption(argv: string[], flag: string, acceptDashValue = false): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || (!acceptDashValue && value.startsWith('--'))) throw new Error(`Missing value for ${flag}`);
  return value;
}

/**
 * Ensure there are no remaining `--unknown` flags in argv.
 */
function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

/**
 * Parse global CLI options (`--root`, `--toc-title`, `--lang`) into a config.
 */
function takeCliConfig(argv: string[], defaultRoot: string): ReportConfig {
  const config = defaultConfig(defaultRoot);

  const rootArg = takeOption(argv, '--root');
  if (rootArg) config.rootDir = resolvePath(defaultRoot, rootArg);

  const tocTitle = takeOption(argv, '--toc-title');
  if (tocTitle) config.tocTitle = tocTitle;

  const lang = takeOption(argv, '--lang');
  if (lang) config.lang = lang;

  return config;
}

async function handleRenderCommand(config: ReportConfig, argv: string[], io: ReportIo): Promise<number> {
  const title = takeOption(argv, '--title');
  const content = takeOption(argv, '--content', true);
  const output = takeOption(argv, '--output');
  const imagesJson = takeOption(argv, '--images');
  const diagramsJson = takeOption(argv, '--diagrams');
  const author = takeOption(argv, '--author');
  const date = takeOption(argv, '--date');
  const noToc = takeFlag(argv, '--no-toc');
  assertNoUnknownFlags(argv);
  if (!title) throw new Error('Missing --title');
  if (!content) throw new Error('Missing --content');
  if (!output) throw new Error('Missing --output');

  const figures = parseDescriptorListJson('images', imagesJson ?? '[]');
  const diagrams = parseDescriptorListJson('diagrams', diagramsJson ?? '[]');

  const result = await renderReport(config, {
    title,
    content,
    figures,
    diagrams,
    author,
    date,
    includeToc: !noToc,
    outputPath: output,
  });
  writeJson(io, { outputPath: result.outputPath, toc: result.toc, warnings: result.warnings });
  return 0;
}

async function handleTocCommand(config: ReportConfig, argv: string[], io: ReportIo): Promise<number> {
  const content = takeOption(argv, '--content', true);
  assertNoUnknownFlags(argv);
  if (!content) throw new Error('Missing --content');

  const { entries, markdown } = await extractReportToc(config, { content });
  writeJson(io, { entries, markdown });
  return 0;
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`. This keeps the CLI
 * testable without relying on spawning child processes.
 */
export async function runReportCli(
  args: string[],
  io: ReportIo = { stdout: process.stdout, stderr: process.stderr },
  cwd: string = process.cwd()
): Promise<number> {
  const argv = [...args];
  const defaultRoot = cwd;

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io, defaultRoot);
      return 0;
    }

    const config = takeCliConfig(argv, defaultRoot);
    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io, defaultRoot);
      return 0;
    }

    if (cmd === 'render') {
      return await handleRenderCommand(config, argv, io);
    }

    if (cmd === 'toc') {
      return await handleTocCommand(config, argv, io);
    }

    throw new Error(`Unknown command: ${cmd}`);
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    io.stderr.write('\n');
    writeHelp(io, defaultRoot);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runReportCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
