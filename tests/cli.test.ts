import { resolve } from 'node:path';
import { describe, expect, it } from 'vitest';
import { runServerCli } from '../src/cli.js';
import type { ReportConfig } from '../src/config.js';
import { captureIo } from './helpers.js';

function recordingStart(): { start: (config: ReportConfig) => Promise<void>; started: ReportConfig[] } {
  const started: ReportConfig[] = [];
  return {
    started,
    start: async (config) => {
      started.push(config);
    },
  };
}

describe('research-report-mcp entry', () => {
  it('prints help without starting the server', async () => {
    const capture = captureIo();
    const server = recordingStart();

    expect(await runServerCli(['--help'], capture.io, '/work', server.start)).toBe(0);
    expect(capture.stdout()).toContain('Tools: report.render, report.preview, report.toc');
    expect(server.started).toEqual([]);
  });

  it('prints the version', async () => {
    const capture = captureIo();
    const server = recordingStart();

    expect(await runServerCli(['-v'], capture.io, '/work', server.start)).toBe(0);
    expect(capture.stdout()).toBe('research-report-mcp 0.1.0\n');
    expect(server.started).toEqual([]);
  });

  it('starts the server with the parsed config', async () => {
    const capture = captureIo();
    const server = recordingStart();

    expect(await runServerCli(['--root', 'reports', '--lang', 'ja'], capture.io, '/work', server.start)).toBe(0);
    expect(server.started).toEqual([{ rootDir: resolve('/work', 'reports'), tocTitle: 'Contents', lang: 'ja' }]);
  });

  it('reports bad flags instead of starting', async () => {
    const capture = captureIo();
    const server = recordingStart();

    expect(await runServerCli(['--verbose'], capture.io, '/work', server.start)).toBe(1);
    expect(capture.stderr()).toBe('Unknown argument: --verbose\n\n');
    expect(server.started).toEqual([]);
  });
});
