/**
 * ANSI byte stream -> layered cell document.
 *
 * A three-state machine (Text, Sequence, End) drives a Pen and writes into
 * growable cell planes; colors are quantized into the document palette at
 * the end.
 */

import { readFileSync } from 'fs';
import { defaultColorService, type ColorService } from '../color/color-service.js';
import type { Color32 } from '../color/color32.js';
import { inferPaletteTitle } from '../color/palette-catalog.js';
import type { BuiltinPaletteId } from '../color/palettes.js';
import { createDocument, type AnsiDocument } from '../document/ansi-document.js';
import { byteToUnicode, type ByteEncoding } from '../encoding/codepages.js';
import { makeBitmapIndexGlyph, makeUnicodeGlyph, SPACE, type GlyphId } from '../encoding/glyph.js';
import { decodeUtf8At } from '../encoding/utf8.js';
import { DEFAULT_FONT, encodingForFont, toSauceName } from '../fonts/font-registry.js';
import { emptySauceRecord, parseSauce, type SauceRecord } from '../sauce/sauce.js';
import { createCellPlanes, ensureRows, resetPlanes, writeCell, type CellPlanes } from './ansi-cell-plane.js';
import { clampColumns, determineAutoColumns, resolveSauceFont, shouldDecodeAsUtf8, type DetectContext } from './ansi-detect.js';
import { recordCodecEvent } from './ansi-diagnostics.js';
import { applySgrTracked, applyTruecolorTriplet, defaultPen, penAttributes, type Pen } from './ansi-pen.js';
import { classifyCsi, scanSequence } from './ansi-sequence.js';
import {
  DEFAULT_IMPORT_OPTIONS,
  errorMessage,
  type CodecDeps,
  type ImportOptions,
  type ImportResult,
} from './ansi-types.js';

const LF = 0x0a;
const CR = 0x0d;
const TAB = 0x09;
const SUB = 0x1a;
const ESC = 0x1b;
const LBRACKET = 0x5b;
const BOM_CP = 0xfeff;
const REPLACEMENT_CP = 0xfffd;

export const XBIN_REJECTION =
  'File appears to be XBin (XBIN header). Use the XBin (.xb) importer.';

type ImportState = {
  planes: CellPlanes;
  pen: Pen;
  row: number;
  col: number;
  rowMax: number;
  colMax: number;
  savedRow: number;
  savedCol: number;
  sawXterm256: boolean;
  sawTruecolor: boolean;
};

export function isXBinHeader(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 5 &&
    bytes[0] === 0x58 &&
    bytes[1] === 0x42 &&
    bytes[2] === 0x49 &&
    bytes[3] === 0x4e &&
    bytes[4] === SUB
  );
}

function putGlyph(s: ImportState, glyph: GlyphId): void {
  const { columns } = s.planes;
  if (s.col === columns) {
    s.row += 1;
    s.col = 0;
  }
  s.row = Math.max(0, s.row);
  s.col = Math.max(0, Math.min(columns - 1, s.col));

  ensureRows(s.planes, s.row + 1, s.pen.bg);
  writeCell(s.planes, s.row, s.col, glyph, s.pen.fg, s.pen.bg, penAttributes(s.pen));

  s.rowMax = Math.max(s.rowMax, s.row);
  s.colMax = Math.max(s.colMax, s.col);
  s.col += 1;
}

function applySequence(s: ImportState, params: number[], final: string, options: ImportOptions): void {
  const { columns } = s.planes;
  const cmd = classifyCsi(params, final);
  switch (cmd.type) {
    case 'cursor-position':
      s.row = cmd.row;
      s.col = cmd.col;
      return;
    case 'cursor-up':
      s.row = Math.max(0, s.row - cmd.count);
      return;
    case 'cursor-down':
      s.row += cmd.count;
      return;
    case 'cursor-forward':
      s.col = Math.min(columns, s.col + cmd.count);
      return;
    case 'cursor-back':
      s.col = Math.max(0, s.col - cmd.count);
      return;
    case 'cursor-column':
      s.col = cmd.col;
      return;
    case 'save-cursor':
      s.savedRow = s.row;
      s.savedCol = s.col;
      return;
    case 'restore-cursor':
      s.row = s.savedRow;
      s.col = s.savedCol;
      return;
    case 'erase-display':
      if (cmd.mode === 2) {
        s.row = 0;
        s.col = 0;
        s.savedRow = 0;
        s.savedCol = 0;
        s.rowMax = 0;
        s.colMax = 0;
        s.pen = defaultPen(options);
        resetPlanes(s.planes, s.pen.bg);
      }
      return;
    case 'sgr': {
      const outcome = applySgrTracked(s.pen, cmd.params, options);
      s.pen = outcome.pen;
      s.sawXterm256 = s.sawXterm256 || outcome.sawXterm256;
      s.sawTruecolor = s.sawTruecolor || outcome.sawTruecolor;
      return;
    }
    case 'truecolor-triplet':
      if (cmd.which === 0 || cmd.which === 1) {
        s.pen = applyTruecolorTriplet(s.pen, cmd.which, cmd.r, cmd.g, cmd.b);
        s.sawTruecolor = true;
      }
      return;
    case 'ignored':
      recordCodecEvent({ kind: 'sequence-ignored', final: cmd.final });
      return;
  }
}

function colorHistogram(planes: CellPlanes, cells: number): Map<Color32, number> {
  const hist = new Map<Color32, number>();
  for (const plane of [planes.fg, planes.bg]) {
    for (let i = 0; i < cells; i += 1) {
      const c = plane[i] ?? 0;
      if (c !== 0) hist.set(c, (hist.get(c) ?? 0) + 1);
    }
  }
  return hist;
}

function buildDocument(
  s: ImportState,
  palette: BuiltinPaletteId,
  sauce: SauceRecord,
  colors: ColorService,
): AnsiDocument {
  const { planes } = s;
  const rows = Math.max(1, s.rowMax + 1);
  ensureRows(planes, rows, s.pen.bg);
  const cells = rows * planes.columns;

  const doc = createDocument(planes.columns, rows, palette);
  const layer = doc.layers[0];
  if (layer) {
    layer.glyphs.set(planes.glyphs.subarray(0, cells));
    layer.attrs.set(planes.attrs.subarray(0, cells));
    for (let i = 0; i < cells; i += 1) {
      layer.fg[i] = colors.color32ToIndex(palette, planes.fg[i] ?? 0);
      layer.bg[i] = colors.color32ToIndex(palette, planes.bg[i] ?? 0);
    }
  }

  const hist = colorHistogram(planes, cells);
  if (hist.size >= 2) doc.paletteTitle = inferPaletteTitle(hist);
  doc.sauce = sauce;
  return doc;
}

/**
 * Decode ANSI art bytes into a document. Never throws.
 */
export function importAnsiBytes(
  bytes: Uint8Array,
  options: Partial<ImportOptions> = {},
  deps: CodecDeps = { colors: defaultColorService },
): ImportResult {
  try {
    return importInternal(bytes, { ...DEFAULT_IMPORT_OPTIONS, ...options }, deps.colors);
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

function importInternal(bytes: Uint8Array, options: ImportOptions, colors: ColorService): ImportResult {
  if (isXBinHeader(bytes)) {
    recordCodecEvent({ kind: 'xbin-rejected' });
    return { ok: false, error: XBIN_REJECTION };
  }

  const sauce = parseSauce(bytes, true);
  const payloadEnd = sauce.record.present ? Math.min(sauce.payloadSize, bytes.length) : bytes.length;
  const sauceFont = resolveSauceFont(sauce);
  const byteEncoding: ByteEncoding = sauceFont ? encodingForFont(sauceFont) : options.byteEncoding;

  const ctx: DetectContext = {
    bytes,
    payloadEnd,
    sauce,
    sauceFont,
    textEncoding: options.textEncoding,
    byteEncoding,
  };
  const columns = clampColumns(options.columns > 0 ? options.columns : determineAutoColumns(ctx));

  if (bytes.length === 0) {
    return {
      ok: true,
      document: createDocument(columns, 1),
      detected: { columns, utf8: false, byteEncoding, payloadSize: 0 },
    };
  }

  const utf8 = shouldDecodeAsUtf8(ctx);
  const bitmapBytes = !utf8 && options.glyphBytesPolicy === 'bitmap-index';
  const blankGlyph = bitmapBytes ? makeBitmapIndexGlyph(SPACE) : makeUnicodeGlyph(SPACE);

  const pen = defaultPen(options);
  const s: ImportState = {
    planes: createCellPlanes(columns, blankGlyph, pen.bg),
    pen,
    row: 0,
    col: 0,
    rowMax: 0,
    colMax: 0,
    savedRow: 0,
    savedCol: 0,
    sawXterm256: false,
    sawTruecolor: false,
  };

  let i = 0;
  while (i < payloadEnd) {
    const b = bytes[i] ?? 0;

    if (options.wrapPolicy === 'eager' && s.col === columns && b !== LF && b !== CR) {
      s.row += 1;
      s.col = 0;
    }

    // Rows exist once a cell is written on them; a trailing line break adds none.
    if (b === LF) {
      s.row += 1;
      s.col = 0;
      i += 1;
      continue;
    }
    if (b === CR) {
      s.col = 0;
      i += 1;
      continue;
    }
    if (b === TAB) {
      const stop = Math.min((Math.floor(s.col / 8) + 1) * 8, columns);
      while (s.col < stop) putGlyph(s, blankGlyph);
      i += 1;
      continue;
    }
    if (b === SUB) break;

    if (b === ESC) {
      if (i + 1 >= payloadEnd || bytes[i + 1] !== LBRACKET) {
        recordCodecEvent({ kind: 'escape-skipped' });
        i += 1;
        continue;
      }
      const start = i + 2;
      const scan = scanSequence(bytes, start, payloadEnd);
      if (scan.kind === 'unterminated') {
        recordCodecEvent({ kind: 'sequence-abandoned' });
        i = Math.min(payloadEnd, start + scan.consumed + 1);
        continue;
      }
      applySequence(s, scan.params, scan.final, options);
      i = scan.next;
      continue;
    }

    if (!utf8) {
      if (bitmapBytes) putGlyph(s, makeBitmapIndexGlyph(b < 0x20 ? SPACE : b));
      else putGlyph(s, makeUnicodeGlyph(b < 0x20 ? SPACE : byteToUnicode(byteEncoding, b)));
      i += 1;
      continue;
    }

    const step = decodeUtf8At(bytes, i);
    const cp = step.ok ? step.cp : REPLACEMENT_CP;
    i = step.next;
    if (cp === BOM_CP && s.row === 0 && s.col === 0) continue;
    if (cp >= 0x20) putGlyph(s, makeUnicodeGlyph(cp));
  }

  const palette: BuiltinPaletteId = s.sawXterm256 || s.sawTruecolor ? 'xterm256' : 'vga16';
  const record: SauceRecord = sauce.record.present
    ? sauce.record
    : { ...emptySauceRecord(), present: true, tinfos: toSauceName(utf8 ? DEFAULT_FONT : 'pc-80x25') };

  return {
    ok: true,
    document: buildDocument(s, palette, record, colors),
    detected: { columns, utf8, byteEncoding, payloadSize: payloadEnd },
  };
}

export function importAnsiFile(
  path: string,
  options: Partial<ImportOptions> = {},
  deps: CodecDeps = { colors: defaultColorService },
): ImportResult {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (error) {
    return { ok: false, error: `Failed to read ${path}: ${errorMessage(error)}` };
  }
  return importAnsiBytes(bytes, options, deps);
}
