#!/usr/bin/env node

/**
 * Entry point of the stdio MCP server.
 *
 * Flag handling lives in `runServerCli` so it can be exercised without
 * starting a transport; the bottom-of-file guard only runs it when this file
 * is executed directly.
 */
import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { ReportConfig } from './config.js';
import { loadConfigFromArgs } from './config.js';
import { DEFAULT_DOCUMENT_LANG, DEFAULT_TOC_TITLE, REPORT_VERSION } from './report/constants.js';
import type { ReportIo } from './research-report.js';
import { runStdioServer, SERVER_NAME } from './server.js';

export type StartServer = (config: ReportConfig) => Promise<void>;

function helpText(): string {
  return [
    `${SERVER_NAME} (stdio MCP server)`,
    '',
    'Usage:',
    `  ${SERVER_NAME} [--root <dir>] [--toc-title <text>] [--lang <code>]`,
    '',
    'Options:',
    '  --root       Directory content paths and output paths must stay inside (default: cwd)',
    `  --toc-title  Heading of the table of contents (default: ${DEFAULT_TOC_TITLE})`,
    `  --lang       Document language attribute (default: ${DEFAULT_DOCUMENT_LANG})`,
    '  --version    Show version',
    '  --help       Show help',
    '',
    'Tools: report.render, report.preview, report.toc',
    '',
  ].join('\n');
}

/**
 * Parse server flags and start serving, or answer `--help`/`--version`.
 *
 * Returns an exit code. Bad flags are reported on stderr and never reach the
 * transport.
 */
export async function runServerCli(
  args: string[],
  io: ReportIo = { stdout: process.stdout, stderr: process.stderr },
  cwd: string = process.cwd(),
  start: StartServer = runStdioServer
): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    io.stdout.write(helpText());
    return 0;
  }

  if (args.includes('--version') || args.includes('-v')) {
    io.stdout.write(`${SERVER_NAME} ${REPORT_VERSION}\n`);
    return 0;
  }

  let config: ReportConfig;
  try {
    config = loadConfigFromArgs(args, cwd);
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n\n`);
    io.stdout.write(helpText());
    return 1;
  }

  await start(config);
  return 0;
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runServerCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
