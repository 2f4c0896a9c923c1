/**
 * Layered cell grid that the importer fills and the exporter reads.
 *
 * Layers are ordered bottom to top. Colors are palette indices into
 * `palette`, with UNSET_INDEX for cells that carry no explicit color.
 */

import { isBlankishGlyph, SPACE, type GlyphId } from '../encoding/glyph.js';
import { UNSET_INDEX, type BuiltinPaletteId } from '../color/palettes.js';
import { emptySauceRecord, type SauceRecord } from '../sauce/sauce.js';

export type AnsiLayer = {
  name: string;
  visible: boolean;
  glyphs: Uint32Array;
  fg: Uint16Array;
  bg: Uint16Array;
  attrs: Uint8Array;
};

export type AnsiDocument = {
  columns: number;
  rows: number;
  layers: AnsiLayer[];
  activeLayer: number;
  palette: BuiltinPaletteId;
  paletteTitle: string;
  sauce: SauceRecord;
};

export type SampledCell = {
  glyph: GlyphId;
  fg: number;
  bg: number;
  attrs: number;
};

export type SampleSource = 'composite' | 'active-layer';

export function createLayer(name: string, columns: number, rows: number): AnsiLayer {
  const size = columns * rows;
  return {
    name,
    visible: true,
    glyphs: new Uint32Array(size).fill(SPACE),
    fg: new Uint16Array(size).fill(UNSET_INDEX),
    bg: new Uint16Array(size).fill(UNSET_INDEX),
    attrs: new Uint8Array(size),
  };
}

export function createDocument(columns: number, rows: number, palette: BuiltinPaletteId = 'vga16'): AnsiDocument {
  const safeColumns = Math.max(1, Math.floor(columns));
  const safeRows = Math.max(1, Math.floor(rows));
  return {
    columns: safeColumns,
    rows: safeRows,
    layers: [createLayer('Base', safeColumns, safeRows)],
    activeLayer: 0,
    palette,
    paletteTitle: '',
    sauce: emptySauceRecord(),
  };
}

export function addLayer(doc: AnsiDocument, name: string): AnsiLayer {
  const layer = createLayer(name, doc.columns, doc.rows);
  for (let i = 0; i < layer.glyphs.length; i += 1) layer.glyphs[i] = 0;
  doc.layers.push(layer);
  return layer;
}

export function setCell(doc: AnsiDocument, layerIndex: number, row: number, col: number, cell: Partial<SampledCell>): void {
  const layer = doc.layers[layerIndex];
  if (!layer || row < 0 || col < 0 || row >= doc.rows || col >= doc.columns) return;
  const at = row * doc.columns + col;
  if (cell.glyph !== undefined) layer.glyphs[at] = cell.glyph;
  if (cell.fg !== undefined) layer.fg[at] = cell.fg;
  if (cell.bg !== undefined) layer.bg[at] = cell.bg;
  if (cell.attrs !== undefined) layer.attrs[at] = cell.attrs;
}

function readLayer(layer: AnsiLayer, at: number): SampledCell {
  return {
    glyph: layer.glyphs[at] ?? SPACE,
    fg: layer.fg[at] ?? UNSET_INDEX,
    bg: layer.bg[at] ?? UNSET_INDEX,
    attrs: layer.attrs[at] ?? 0,
  };
}

/**
 * Composite: glyph, fg and attributes from the topmost visible layer with a
 * non-blank glyph; background from the topmost visible layer with a set one.
 */
export function sampleCell(doc: AnsiDocument, row: number, col: number, source: SampleSource = 'composite'): SampledCell {
  const at = row * doc.columns + col;
  if (source === 'active-layer') {
    const layer = doc.layers[doc.activeLayer];
    return layer ? readLayer(layer, at) : { glyph: SPACE, fg: UNSET_INDEX, bg: UNSET_INDEX, attrs: 0 };
  }

  const out: SampledCell = { glyph: SPACE, fg: UNSET_INDEX, bg: UNSET_INDEX, attrs: 0 };
  let glyphFound = false;
  let bgFound = false;
  for (let i = doc.layers.length - 1; i >= 0 && !(glyphFound && bgFound); i -= 1) {
    const layer = doc.layers[i];
    if (!layer?.visible) continue;
    const cell = readLayer(layer, at);
    if (!glyphFound && !isBlankishGlyph(cell.glyph)) {
      out.glyph = cell.glyph;
      out.fg = cell.fg;
      out.attrs = cell.attrs;
      glyphFound = true;
    }
    if (!bgFound && cell.bg !== UNSET_INDEX) {
      out.bg = cell.bg;
      bgFound = true;
    }
  }
  return out;
}
