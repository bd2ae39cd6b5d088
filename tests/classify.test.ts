import { describe, expect, it } from 'vitest';
import { classifyLine, classifyLines, parseHeading } from '../src/report/classify.js';

describe('classifyLine', () => {
  it('tags blank and plain lines', () => {
    expect(classifyLine('   ', 3)).toEqual({ kind: 'blank', line: 3 });
    expect(classifyLine('**bold** start', 0)).toEqual({ kind: 'plain', line: 0, text: '**bold** start' });
  });

  it('tags two images on one line as a column group', () => {
    expect(classifyLine('![a](x.png) and ![b](y.png)', 0)).toEqual({
      kind: 'columnGroup',
      line: 0,
      text: '![a](x.png) and ![b](y.png)',
      images: [
        { altText: 'a', pathOrUrl: 'x.png' },
        { altText: 'b', pathOrUrl: 'y.png' },
      ],
    });
  });

  it('tags exactly one image as a single image, never a column group', () => {
    expect(classifyLine('See ![a](x.png)', 1)).toEqual({
      kind: 'singleImage',
      line: 1,
      text: 'See ![a](x.png)',
      image: { altText: 'a', pathOrUrl: 'x.png' },
    });
  });

  it('prefers a column group over other constructs on the same line', () => {
    expect(classifyLine('- ![a](x.png) ![b](y.png)', 0).kind).toBe('columnGroup');
  });

  it('tags headings, rules and table rows', () => {
    expect(classifyLine('#### Deep dive', 0)).toEqual({
      kind: 'header',
      line: 0,
      header: { level: 4, rawTitle: 'Deep dive' },
    });
    expect(classifyLine('---', 2)).toEqual({ kind: 'rule', line: 2 });
    expect(classifyLine('  | a | b |  ', 0)).toEqual({ kind: 'tableRow', line: 0, text: '| a | b |' });
  });

  it('only treats an unindented run of hyphens as a rule', () => {
    expect(classifyLine('  ---', 0)).toEqual({ kind: 'plain', line: 0, text: '  ---' });
  });

  it('tags quotes and both list marker kinds', () => {
    expect(classifyLine('  > quoted', 0)).toEqual({ kind: 'blockquote', line: 0, content: 'quoted' });
    expect(classifyLine('* item', 0)).toEqual({ kind: 'listItem', line: 0, ordered: false, content: 'item' });
    expect(classifyLine('- item', 0)).toEqual({ kind: 'listItem', line: 0, ordered: false, content: 'item' });
    expect(classifyLine('12. twelve', 0)).toEqual({
      kind: 'listItem',
      line: 0,
      ordered: true,
      content: 'twelve',
    });
  });
});

describe('parseHeading', () => {
  it('binds a trailing anchor annotation', () => {
    expect(parseHeading('## Intro {#intro}')).toEqual({ level: 2, rawTitle: 'Intro', anchor: 'intro' });
  });

  it('drops annotations that are not trailing', () => {
    expect(parseHeading('### A {#x} B')).toEqual({ level: 3, rawTitle: 'A B' });
  });

  it('requires whitespace after the hashes', () => {
    expect(parseHeading('#hashtag')).toBeUndefined();
    expect(parseHeading('####### seven')).toBeUndefined();
  });
});

describe('classifyLines', () => {
  it('keeps one tag per physical line', () => {
    expect(classifyLines('a\n\n> b').map((line) => line.kind)).toEqual(['plain', 'blank', 'blockquote']);
  });
});
