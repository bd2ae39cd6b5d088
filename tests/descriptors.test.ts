import { describe, expect, it } from 'vitest';
import { parseDescriptorList, parseDescriptorListJson } from '../src/report/descriptors.js';

describe('parseDescriptorList', () => {
  it('defaults a missing caption to empty', () => {
    expect(parseDescriptorList('images', [{ path: 'a.png' }, { path: 'b.svg', caption: 'Flow' }])).toEqual([
      { path: 'a.png', caption: '' },
      { path: 'b.svg', caption: 'Flow' },
    ]);
  });

  it('names the offending entry', () => {
    expect(() => parseDescriptorList('images', [{ path: 1 }])).toThrow(
      'Invalid images: images[0].path: Expected string, received number'
    );
    expect(() => parseDescriptorList('images', [{ caption: 'x' }])).toThrow('images[0].path: Required');
  });

  it('rejects a non-array value', () => {
    expect(() => parseDescriptorList('diagrams', { path: 'a.png' })).toThrow(
      'Invalid diagrams: Expected array, received object'
    );
  });
});

describe('parseDescriptorListJson', () => {
  it('parses JSON input', () => {
    expect(parseDescriptorListJson('images', '[{"path":"a.png","caption":"A"}]')).toEqual([
      { path: 'a.png', caption: 'A' },
    ]);
  });

  it('reports unparseable JSON', () => {
    expect(() => parseDescriptorListJson('diagrams', '[{')).toThrow('Invalid diagrams: not valid JSON');
  });
});
