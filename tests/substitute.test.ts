import { describe, expect, it } from 'vitest';
import { classifyLines } from '../src/report/classify.js';
import {
  renderColumnGroup,
  renderFigure,
  substituteColumnSpans,
  substituteImages,
} from '../src/report/substitute.js';
import { createContext, fakeResolver } from './helpers.js';

const FIGURE_A =
  '<figure><img src="data:image/png;base64,QUFB" alt="A"/><figcaption>A</figcaption></figure>';
const COLUMNS_AB =
  '<div class="image-columns">' +
  '<figure class="column-item"><img src="data:image/png;base64,QUFB" alt="A"/><figcaption>A</figcaption></figure>' +
  '<figure class="column-item"><img src="data:image/png;base64,QkJC" alt="B"/><figcaption>B</figcaption></figure>' +
  '</div>';

function knownImages() {
  return fakeResolver({ 'a.png': 'QUFB', 'b.png': 'QkJC' });
}

describe('renderFigure', () => {
  it('embeds a resolved image with its alt text as caption', () => {
    const ctx = createContext(knownImages());
    expect(renderFigure({ altText: 'A', pathOrUrl: 'a.png' }, ctx)).toBe(FIGURE_A);
    expect(ctx.diagnostics).toEqual([]);
  });

  it('omits the caption when the alt text is empty', () => {
    const ctx = createContext(knownImages());
    expect(renderFigure({ altText: '', pathOrUrl: 'a.png' }, ctx)).toBe(
      '<figure><img src="data:image/png;base64,QUFB" alt=""/></figure>'
    );
  });

  it('falls back to a placeholder carrying the alt text', () => {
    const ctx = createContext(knownImages());
    expect(renderFigure({ altText: 'Ghost', pathOrUrl: 'nope.png' }, ctx)).toBe(
      '<figure class="missing-image"><div class="missing-image-box">[Image: Ghost]</div></figure>'
    );
    expect(ctx.diagnostics).toEqual([
      { severity: 'warning', code: 'MISSING_IMAGE', message: 'Image not found: nope.png', line: undefined },
    ]);
  });
});

describe('renderColumnGroup', () => {
  it('keeps missing images visible inside the group', () => {
    const ctx = createContext(knownImages());
    expect(
      renderColumnGroup(
        [
          { altText: 'A', pathOrUrl: 'a.png' },
          { altText: 'Gone', pathOrUrl: 'gone.png' },
        ],
        ctx
      )
    ).toBe(
      '<div class="image-columns">' +
        '<figure class="column-item"><img src="data:image/png;base64,QUFB" alt="A"/><figcaption>A</figcaption></figure>' +
        '<figure class="column-item missing-image"><div class="missing-image-box">[Image: Gone]</div></figure>' +
        '</div>'
    );
  });
});

describe('substituteColumnSpans', () => {
  it('replaces an explicit span across lines', () => {
    const ctx = createContext(knownImages());
    const text = 'Before\n<!-- columns -->\n![A](a.png)\n\n![B](b.png)\n<!-- /columns -->\nAfter';
    expect(substituteColumnSpans(text, ctx)).toBe(`Before\n${COLUMNS_AB}\nAfter`);
  });

  it('leaves a span without images untouched', () => {
    const ctx = createContext(knownImages());
    const text = '<!--columns-->\njust text\n<!-- /columns -->';
    expect(substituteColumnSpans(text, ctx)).toBe(text);
    expect(ctx.diagnostics.map((d) => d.code)).toEqual(['EMPTY_COLUMN_GROUP']);
  });
});

describe('substituteImages', () => {
  it('turns a line with two images into one column group and resolves each once', () => {
    const resolver = knownImages();
    const ctx = createContext(resolver);
    const lines = substituteImages(classifyLines('![A](a.png) ![B](b.png)'), ctx);

    expect(lines).toEqual([{ kind: 'plain', line: 0, text: COLUMNS_AB }]);
    expect(resolver.calls).toEqual(['a.png', 'b.png']);
  });

  it('substitutes a lone image as a figure', () => {
    const ctx = createContext(knownImages());
    expect(substituteImages(classifyLines('![A](a.png)'), ctx)).toEqual([
      { kind: 'plain', line: 0, text: FIGURE_A },
    ]);
  });

  it('substitutes images inside list items and table rows', () => {
    const ctx = createContext(knownImages());
    const lines = substituteImages(classifyLines('- ![A](a.png)\n| ![A](a.png) | x |'), ctx);

    expect(lines).toEqual([
      { kind: 'listItem', line: 0, ordered: false, content: FIGURE_A },
      { kind: 'tableRow', line: 1, text: `| ${FIGURE_A} | x |` },
    ]);
  });
});
