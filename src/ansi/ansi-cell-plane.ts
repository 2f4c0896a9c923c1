/**
 * Importer cell planes using the state-bag pattern.
 *
 * Four parallel row-major arrays (glyph, fg, bg, attrs) with a fixed
 * column count. Rows are materialized on demand; a new row is filled with
 * the blank glyph, unset foreground and the pen background at that moment.
 */

import type { Color32 } from '../color/color32.js';
import type { GlyphId } from '../encoding/glyph.js';

export interface CellPlanes {
  readonly columns: number;
  /** Rows materialized so far. */
  rows: number;
  glyphs: Uint32Array;
  fg: Uint32Array;
  bg: Uint32Array;
  attrs: Uint8Array;
  readonly blankGlyph: GlyphId;
}

export function createCellPlanes(columns: number, blankGlyph: GlyphId, background: Color32): CellPlanes {
  const planes: CellPlanes = {
    columns,
    rows: 0,
    glyphs: new Uint32Array(columns * 8),
    fg: new Uint32Array(columns * 8),
    bg: new Uint32Array(columns * 8),
    attrs: new Uint8Array(columns * 8),
    blankGlyph,
  };
  ensureRows(planes, 1, background);
  return planes;
}

function reallocate(p: CellPlanes, capacityRows: number): void {
  const size = capacityRows * p.columns;
  const used = p.rows * p.columns;
  const glyphs = new Uint32Array(size);
  const fg = new Uint32Array(size);
  const bg = new Uint32Array(size);
  const attrs = new Uint8Array(size);
  glyphs.set(p.glyphs.subarray(0, used));
  fg.set(p.fg.subarray(0, used));
  bg.set(p.bg.subarray(0, used));
  attrs.set(p.attrs.subarray(0, used));
  p.glyphs = glyphs;
  p.fg = fg;
  p.bg = bg;
  p.attrs = attrs;
}

export function ensureRows(p: CellPlanes, rowsNeeded: number, background: Color32): void {
  const need = Math.max(1, rowsNeeded);
  if (need <= p.rows) return;

  const capacityRows = p.glyphs.length / p.columns;
  if (need > capacityRows) reallocate(p, Math.max(need, capacityRows * 2));

  const from = p.rows * p.columns;
  const to = need * p.columns;
  p.glyphs.fill(p.blankGlyph, from, to);
  p.fg.fill(0, from, to);
  p.bg.fill(background, from, to);
  p.attrs.fill(0, from, to);
  p.rows = need;
}

/** Drop every row and start over with a single blank row. */
export function resetPlanes(p: CellPlanes, background: Color32): void {
  p.rows = 0;
  ensureRows(p, 1, background);
}

export function writeCell(p: CellPlanes, row: number, col: number, glyph: GlyphId, fg: Color32, bg: Color32, attrs: number): void {
  const r = Math.max(0, row);
  const c = Math.max(0, Math.min(p.columns - 1, col));
  const at = r * p.columns + c;
  p.glyphs[at] = glyph;
  p.fg[at] = fg;
  p.bg[at] = bg;
  p.attrs[at] = attrs;
}

export function cellIndex(p: CellPlanes, row: number, col: number): number {
  return row * p.columns + col;
}
