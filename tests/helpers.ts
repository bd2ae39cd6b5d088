import { Writable } from 'node:stream';
import type { ImageResolver, RenderContext } from '../src/report/model.js';

/**
 * In-memory resolver: every known reference resolves to a PNG payload with the
 * given base64 data. Records every lookup in `calls`.
 */
export function fakeResolver(known: Record<string, string>): ImageResolver & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    resolve(reference: string) {
      calls.push(reference);
      const data = known[reference];
      if (data === undefined) return undefined;
      return { kind: 'png', mimeType: 'image/png', data };
    },
  };
}

export function createContext(resolver: ImageResolver = fakeResolver({})): RenderContext {
  return { resolver, diagnostics: [] };
}

export function captureIo(): {
  io: { stdout: Writable; stderr: Writable };
  stdout: () => string;
  stderr: () => string;
} {
  const out: string[] = [];
  const err: string[] = [];
  const stream = (target: string[]): Writable =>
    new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        target.push(chunk.toString());
        callback();
      },
    });
  return {
    io: { stdout: stream(out), stderr: stream(err) },
    stdout: () => out.join(''),
    stderr: () => err.join(''),
  };
}
