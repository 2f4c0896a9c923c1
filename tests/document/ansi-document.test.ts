import { describe, expect, it } from 'vitest';
import { addLayer, createDocument, sampleCell, setCell } from '../../src/document/ansi-document.js';
import { UNSET_INDEX } from '../../src/color/palettes.js';

describe('ansi document', () => {
  it('creates a blank base layer', () => {
    const doc = createDocument(4, 2);
    expect(doc.layers.length).toBe(1);
    expect(doc.layers[0]?.name).toBe('Base');
    expect(sampleCell(doc, 1, 3)).toEqual({ glyph: 0x20, fg: UNSET_INDEX, bg: UNSET_INDEX, attrs: 0 });
  });

  it('clamps dimensions to at least one cell', () => {
    const doc = createDocument(0, -3);
    expect(doc.columns).toBe(1);
    expect(doc.rows).toBe(1);
  });

  it('ignores writes outside the grid', () => {
    const doc = createDocument(2, 2);
    setCell(doc, 0, 2, 0, { glyph: 0x41 });
    setCell(doc, 5, 0, 0, { glyph: 0x41 });
    expect(Array.from(doc.layers[0]?.glyphs ?? [])).toEqual([0x20, 0x20, 0x20, 0x20]);
  });

  it('composites glyphs and backgrounds from different layers', () => {
    const doc = createDocument(2, 1);
    setCell(doc, 0, 0, 0, { glyph: 0x41, fg: 1, bg: 4, attrs: 1 });
    addLayer(doc, 'Top');
    setCell(doc, 1, 0, 0, { bg: 2 });
    setCell(doc, 1, 0, 1, { glyph: 0x42, fg: 3 });

    expect(sampleCell(doc, 0, 0)).toEqual({ glyph: 0x41, fg: 1, bg: 2, attrs: 1 });
    expect(sampleCell(doc, 0, 1)).toEqual({ glyph: 0x42, fg: 3, bg: UNSET_INDEX, attrs: 0 });
  });

  it('skips hidden layers and samples the active layer on request', () => {
    const doc = createDocument(1, 1);
    setCell(doc, 0, 0, 0, { glyph: 0x41 });
    const top = addLayer(doc, 'Top');
    setCell(doc, 1, 0, 0, { glyph: 0x42 });
    top.visible = false;

    expect(sampleCell(doc, 0, 0).glyph).toBe(0x41);
    doc.activeLayer = 1;
    expect(sampleCell(doc, 0, 0, 'active-layer').glyph).toBe(0x42);
  });
});
