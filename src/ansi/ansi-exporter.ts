/**
 * Cell document -> ANSI byte stream.
 *
 * Tracks the terminal's pen as it will be after each emitted sequence and
 * emits only the SGR changes each cell needs.
 */

import { writeFileSync } from 'fs';
import { defaultColorService, type ColorService } from '../color/color-service.js';
import { unpackRgb, type Color32 } from '../color/color32.js';
import { UNSET_INDEX, vga16Color32, xtermColor32, type BuiltinPaletteId } from '../color/palettes.js';
import { sampleCell, type AnsiDocument } from '../document/ansi-document.js';
import { unicodeToByteOr } from '../encoding/codepages.js';
import { glyphIndex, glyphKind, isBlankGlyph, isBlankishGlyph, toUnicodeRepresentative, type GlyphId } from '../encoding/glyph.js';
import { appendUtf8, UTF8_BOM } from '../encoding/utf8.js';
import { appendSauce, SauceDataType, type SauceRecord } from '../sauce/sauce.js';
import {
  ATTR_BLINK,
  ATTR_BOLD,
  ATTR_DIM,
  ATTR_ITALIC,
  ATTR_REVERSE,
  ATTR_STRIKE,
  ATTR_UNDERLINE,
  DEFAULT_EXPORT_OPTIONS,
  errorMessage,
  type CodecDeps,
  type ExportOptions,
  type ExportResult,
} from './ansi-types.js';

const ESC = 0x1b;
const QUESTION = 0x3f;

const CLASSIC_DOS_ATTRS = ATTR_BOLD | ATTR_BLINK | ATTR_REVERSE;
const MODERN_ATTRS = ATTR_BOLD | ATTR_DIM | ATTR_ITALIC | ATTR_UNDERLINE | ATTR_BLINK | ATTR_REVERSE | ATTR_STRIKE;

export type ExportCell = {
  glyph: GlyphId;
  /** Unicode representative of the glyph. */
  cp: number;
  fgIndex: number;
  bgIndex: number;
  /** Resolved colors, filled only for truecolor modes. 0 = unset. */
  fg: Color32;
  bg: Color32;
  attrs: number;
};

type PenOut = {
  bold: boolean;
  dim: boolean;
  italic: boolean;
  underline: boolean;
  blink: boolean;
  invert: boolean;
  strike: boolean;
  hasFg: boolean;
  hasBg: boolean;
  /** Last fg was set through a `...t` overlay. */
  fgTc: boolean;
  bgTc: boolean;
  fgIndex: number;
  bgIndex: number;
  fg: Color32;
  bg: Color32;
};

type PenFlag = 'italic' | 'underline' | 'blink' | 'invert' | 'strike';

function initialPen(): PenOut {
  return {
    bold: false,
    dim: false,
    italic: false,
    underline: false,
    blink: false,
    invert: false,
    strike: false,
    hasFg: false,
    hasBg: false,
    fgTc: false,
    bgTc: false,
    fgIndex: 7,
    bgIndex: 0,
    fg: 0,
    bg: 0,
  };
}

export function digits10(value: number): number {
  return String(Math.max(0, Math.floor(value))).length;
}

function defaultFgForExport(options: ExportOptions): Color32 {
  return options.defaultFg !== 0 ? options.defaultFg : xtermColor32(7);
}

function defaultBgForExport(options: ExportOptions): Color32 {
  return options.defaultBg !== 0 ? options.defaultBg : xtermColor32(0);
}

function isTruecolorMode(options: ExportOptions): boolean {
  return options.colorMode === 'truecolor-sgr' || options.colorMode === 'truecolor-pablo';
}

/** Per-export color lookups from the document palette into the output palettes. */
class ColorMapper {
  private readonly toVga16: readonly number[];
  private readonly toXterm256: readonly number[];
  private readonly toXterm240: readonly number[];
  private readonly xterm240Parent: readonly number[];
  readonly defaultFgXterm: number;
  readonly defaultBgXterm: number;

  constructor(
    private readonly colors: ColorService,
    private readonly source: BuiltinPaletteId,
    private readonly options: ExportOptions,
  ) {
    this.toVga16 = colors.getOrBuildRemap(source, 'vga16');
    this.toXterm256 = colors.getOrBuildRemap(source, 'xterm256');
    this.toXterm240 = options.xterm240Safe ? colors.getOrBuildRemap(source, 'xterm240-safe') : [];
    this.xterm240Parent = colors.getPalette('xterm240-safe').derived?.toParent ?? [];

    if (options.xterm240Safe) {
      this.defaultFgXterm = this.color32ToXterm240(options.defaultFg !== 0 ? options.defaultFg : xtermColor32(7), 16);
      this.defaultBgXterm = this.color32ToXterm240(options.defaultBg !== 0 ? options.defaultBg : xtermColor32(0), 16);
    } else {
      this.defaultFgXterm = options.defaultFg !== 0 ? this.color32ToXterm256(options.defaultFg, 7) : 7;
      this.defaultBgXterm = options.defaultBg !== 0 ? this.color32ToXterm256(options.defaultBg, 0) : 0;
    }
  }

  indexToColor32(index: number): Color32 {
    return this.colors.indexToColor32(this.source, index);
  }

  toVga16Index(index: number, fallback: number): number {
    if (index === UNSET_INDEX) return fallback;
    return this.toVga16[index] ?? fallback;
  }

  /** xterm index honoring the 240-safe sub-mode. */
  toXtermIndex(index: number, fallback: number): number {
    if (index === UNSET_INDEX) return fallback;
    if (this.options.xterm240Safe) {
      const derived = this.toXterm240[index];
      return derived === undefined ? fallback : this.xterm240ToParent(derived);
    }
    return this.toXterm256[index] ?? fallback;
  }

  private xterm240ToParent(derived: number): number {
    return this.xterm240Parent[derived] ?? 16 + derived;
  }

  private color32ToXterm256(color: Color32, fallback: number): number {
    const idx = this.colors.color32ToIndex('xterm256', color);
    return idx === UNSET_INDEX ? fallback : idx;
  }

  private color32ToXterm240(color: Color32, fallback: number): number {
    const idx = this.colors.color32ToIndex('xterm240-safe', color);
    return idx === UNSET_INDEX ? fallback : this.xterm240ToParent(idx);
  }
}

class AnsiWriter {
  readonly out: number[] = [];
  pen: PenOut = initialPen();

  constructor(
    private readonly options: ExportOptions,
    private readonly mapper: ColorMapper,
  ) {}

  ascii(text: string): void {
    for (let i = 0; i < text.length; i += 1) this.out.push(text.charCodeAt(i));
  }

  csi(params: string, final: string): void {
    this.out.push(ESC);
    this.ascii(`[${params}${final}`);
  }

  sgr(params: readonly (number | string)[]): void {
    if (params.length > 0) this.csi(params.join(';'), 'm');
  }

  reset(): void {
    this.csi('0', 'm');
    this.pen = initialPen();
  }

  triplet(which: 0 | 1, color: Color32): void {
    const rgb = unpackRgb(color) ?? { r: 0, g: 0, b: 0 };
    this.csi(`${which};${rgb.r};${rgb.g};${rgb.b}`, 't');
  }

  newline(): void {
    if (this.options.newline === 'crlf') this.out.push(0x0d);
    this.out.push(0x0a);
  }

  isBgDefaultish(c: ExportCell): boolean {
    if (c.bgIndex === UNSET_INDEX) return true;
    switch (this.options.colorMode) {
      case 'truecolor-sgr':
      case 'truecolor-pablo':
        return c.bg === defaultBgForExport(this.options);
      case 'ansi16':
        return this.mapper.toVga16Index(c.bgIndex, 0) === 0;
      case 'xterm256': {
        const def = this.mapper.defaultBgXterm;
        return this.mapper.toXtermIndex(c.bgIndex, def) === def;
      }
    }
  }

  /**
   * Classic 16-color baseline shared by `ansi16` and the Pablo fallback.
   * With `forceAfterOverlay`, a channel last set by `...t` always re-emits.
   */
  private emitAnsi16(c: ExportCell, wantInvert: boolean, forceAfterOverlay: boolean): { fg16: number; bg16: number } {
    const o = this.options;
    const fgUnset = c.fgIndex === UNSET_INDEX;
    const bgUnset = c.bgIndex === UNSET_INDEX;
    const fg16 = fgUnset ? 7 : this.mapper.toVga16Index(c.fgIndex, 7);
    const bg16 = bgUnset ? 0 : this.mapper.toVga16Index(c.bgIndex, 0);

    let wantBold = false;
    let wantBlink = false;
    let fgBase = fg16;
    let bgBase = bg16;
    if (o.ansi16Bright === 'bold-and-ice-blink') {
      if (fgBase >= 8) {
        wantBold = true;
        fgBase -= 8;
      }
      // Without iCE colors a bright background has no SGR form; it degrades to its base color.
      if (bgBase >= 8) {
        wantBlink = o.iceColors;
        bgBase -= 8;
      }
    }

    if ((this.pen.bold && !wantBold) || (this.pen.blink && !wantBlink)) this.reset();

    const pen = this.pen;
    const params: number[] = [];
    if (wantInvert && !pen.invert) params.push(7);
    if (!wantInvert && pen.invert) params.push(27);

    const fgChanged = (forceAfterOverlay && pen.fgTc) || !pen.hasFg || pen.fgIndex !== fg16;
    const bgChanged = (forceAfterOverlay && pen.bgTc) || !pen.hasBg || pen.bgIndex !== bg16;
    if (o.ansi16Bright === 'sgr-90-100') {
      if (fgChanged) params.push(fg16 < 8 ? 30 + fg16 : 90 + (fg16 - 8));
      if (bgChanged) params.push(bg16 < 8 ? 40 + bg16 : 100 + (bg16 - 8));
    } else {
      if (wantBold && !pen.bold) params.push(1);
      if (wantBlink && !pen.blink) params.push(5);
      if (fgChanged) params.push(30 + fgBase);
      if (bgChanged) params.push(40 + bgBase);
    }
    this.sgr(params);

    pen.bold = wantBold;
    pen.blink = wantBlink;
    pen.invert = wantInvert;
    pen.hasFg = true;
    pen.hasBg = true;
    pen.fgIndex = fg16;
    pen.bgIndex = bg16;
    pen.fgTc = false;
    pen.bgTc = false;
    return { fg16, bg16 };
  }

  private emitPablo(c: ExportCell, wantInvert: boolean): void {
    const o = this.options;
    const fgUnset = c.fgIndex === UNSET_INDEX;
    const bgUnset = c.bgIndex === UNSET_INDEX;
    const wantFg = fgUnset ? defaultFgForExport(o) : c.fg;
    const wantBg = bgUnset ? defaultBgForExport(o) : c.bg;

    const resets: number[] = [];
    if (fgUnset && o.useDefaultFg39 && (this.pen.hasFg || this.pen.fgTc)) {
      resets.push(39);
      this.pen.hasFg = false;
      this.pen.fgTc = false;
    }
    if (bgUnset && o.useDefaultBg49 && (this.pen.hasBg || this.pen.bgTc)) {
      resets.push(49);
      this.pen.hasBg = false;
      this.pen.bgTc = false;
    }
    this.sgr(resets);

    if (o.pabloWithAnsi16Fallback) {
      const { fg16, bg16 } = this.emitAnsi16(c, wantInvert, true);
      this.pen.fg = wantFg;
      this.pen.bg = wantBg;
      if (!fgUnset && wantFg !== vga16Color32(fg16)) {
        this.triplet(1, wantFg);
        this.pen.fgTc = true;
      }
      if (!bgUnset && wantBg !== vga16Color32(bg16)) {
        this.triplet(0, wantBg);
        this.pen.bgTc = true;
      }
      return;
    }

    const pen = this.pen;
    if (wantInvert !== pen.invert) {
      this.sgr([wantInvert ? 7 : 27]);
      pen.invert = wantInvert;
    }
    if (!fgUnset && (!pen.hasFg || pen.fg !== wantFg || !pen.fgTc)) {
      this.triplet(1, wantFg);
      pen.hasFg = true;
      pen.fg = wantFg;
      pen.fgTc = true;
    }
    if (!bgUnset && (!pen.hasBg || pen.bg !== wantBg || !pen.bgTc)) {
      this.triplet(0, wantBg);
      pen.hasBg = true;
      pen.bg = wantBg;
      pen.bgTc = true;
    }
  }

  private emitModern(c: ExportCell, want: number): void {
    const o = this.options;
    const pen = this.pen;
    const params: (number | string)[] = [];

    const wantBold = (want & ATTR_BOLD) !== 0;
    const wantDim = (want & ATTR_DIM) !== 0;
    if ((pen.bold && !wantBold) || (pen.dim && !wantDim)) {
      params.push(22);
      pen.bold = false;
      pen.dim = false;
    }
    if (wantBold && !pen.bold) {
      params.push(1);
      pen.bold = true;
    }
    if (wantDim && !pen.dim) {
      params.push(2);
      pen.dim = true;
    }

    const toggles: ReadonlyArray<[PenFlag, number, number, number]> = [
      ['italic', ATTR_ITALIC, 3, 23],
      ['underline', ATTR_UNDERLINE, 4, 24],
      ['blink', ATTR_BLINK, 5, 25],
      ['invert', ATTR_REVERSE, 7, 27],
      ['strike', ATTR_STRIKE, 9, 29],
    ];
    for (const [key, bit, on, off] of toggles) {
      const wanted = (want & bit) !== 0;
      if (pen[key] !== wanted) {
        params.push(wanted ? on : off);
        pen[key] = wanted;
      }
    }

    const fgUnset = c.fgIndex === UNSET_INDEX;
    if (fgUnset && o.useDefaultFg39) {
      if (pen.hasFg) {
        params.push(39);
        pen.hasFg = false;
        pen.fgTc = false;
      }
    } else if (o.colorMode === 'xterm256') {
      const def = this.mapper.defaultFgXterm;
      const idx = fgUnset ? def : this.mapper.toXtermIndex(c.fgIndex, def);
      if (!pen.hasFg || pen.fgIndex !== idx) {
        params.push(38, 5, idx);
        pen.hasFg = true;
        pen.fgIndex = idx;
        pen.fgTc = false;
      }
    } else {
      const wantFg = fgUnset ? defaultFgForExport(o) : c.fg;
      if (!pen.hasFg || pen.fg !== wantFg) {
        const rgb = unpackRgb(wantFg) ?? { r: 0, g: 0, b: 0 };
        params.push(38, 2, rgb.r, rgb.g, rgb.b);
        pen.hasFg = true;
        pen.fg = wantFg;
        pen.fgTc = false;
      }
    }

    const bgUnset = c.bgIndex === UNSET_INDEX;
    if (bgUnset && o.useDefaultBg49) {
      if (pen.hasBg) {
        params.push(49);
        pen.hasBg = false;
        pen.bgTc = false;
      }
    } else if (o.colorMode === 'xterm256') {
      const def = this.mapper.defaultBgXterm;
      const idx = bgUnset ? def : this.mapper.toXtermIndex(c.bgIndex, def);
      if (!pen.hasBg || pen.bgIndex !== idx) {
        params.push(48, 5, idx);
        pen.hasBg = true;
        pen.bgIndex = idx;
        pen.bgTc = false;
      }
    } else {
      const wantBg = bgUnset ? defaultBgForExport(o) : c.bg;
      if (!pen.hasBg || pen.bg !== wantBg) {
        const rgb = unpackRgb(wantBg) ?? { r: 0, g: 0, b: 0 };
        params.push(48, 2, rgb.r, rgb.g, rgb.b);
        pen.hasBg = true;
        pen.bg = wantBg;
        pen.bgTc = false;
      }
    }

    this.sgr(params);
  }

  ensureSgrForCell(c: ExportCell): void {
    const allowed = this.options.attributeMode === 'classic-dos' ? CLASSIC_DOS_ATTRS : MODERN_ATTRS;
    const want = c.attrs & allowed;
    const wantInvert = (want & ATTR_REVERSE) !== 0;

    switch (this.options.colorMode) {
      case 'truecolor-pablo':
        this.emitPablo(c, wantInvert);
        return;
      case 'ansi16':
        this.emitAnsi16(c, wantInvert, false);
        return;
      case 'xterm256':
      case 'truecolor-sgr':
        this.emitModern(c, want);
        return;
    }
  }

  /** Skip a run of blank cells with `ESC[nC`, restoring default colors first. */
  cursorForward(run: number): void {
    const o = this.options;
    if (o.colorMode === 'ansi16') {
      if (this.pen.hasBg && this.pen.bgIndex !== 0) this.reset();
    } else {
      const params: number[] = [];
      if (this.pen.hasFg && o.useDefaultFg39) {
        params.push(39);
        this.pen.hasFg = false;
      }
      if (this.pen.hasBg && o.useDefaultBg49) {
        params.push(49);
        this.pen.hasBg = false;
      }
      this.sgr(params);
    }
    this.csi(String(run), 'C');
  }

  glyph(c: ExportCell): void {
    const o = this.options;
    if (o.textEncoding === 'cp437') {
      const kind = glyphKind(c.glyph);
      if (kind === 'bitmap-index' || kind === 'embedded-index') {
        const idx = glyphIndex(c.glyph);
        this.out.push(idx <= 0xff ? idx : QUESTION);
      } else {
        this.out.push(unicodeToByteOr(o.byteEncoding, c.cp, QUESTION));
      }
      return;
    }
    appendUtf8(c.cp < 0x20 ? 0x20 : c.cp, this.out);
  }
}

function sampleExportCell(doc: AnsiDocument, row: number, col: number, options: ExportOptions, mapper: ColorMapper): ExportCell {
  const cell = sampleCell(doc, row, col, options.source);
  const truecolor = isTruecolorMode(options);
  return {
    glyph: cell.glyph,
    cp: toUnicodeRepresentative(cell.glyph),
    fgIndex: cell.fg,
    bgIndex: cell.bg,
    fg: truecolor && cell.fg !== UNSET_INDEX ? mapper.indexToColor32(cell.fg) : 0,
    bg: truecolor && cell.bg !== UNSET_INDEX ? mapper.indexToColor32(cell.bg) : 0,
    attrs: cell.attrs,
  };
}

function buildSauce(doc: AnsiDocument, fileSize: number): SauceRecord {
  const meta = doc.sauce;
  return {
    ...meta,
    present: true,
    fileSize,
    dataType: SauceDataType.Character,
    fileType: 1,
    tinfo1: Math.min(65535, doc.columns),
    tinfo2: Math.min(65535, doc.rows),
  };
}

/**
 * Encode a document as ANSI art bytes. Never throws.
 */
export function exportAnsiBytes(
  doc: AnsiDocument,
  options: Partial<ExportOptions> = {},
  deps: CodecDeps = { colors: defaultColorService },
): ExportResult {
  try {
    return { ok: true, bytes: exportInternal(doc, { ...DEFAULT_EXPORT_OPTIONS, ...options }, deps.colors) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

function exportInternal(doc: AnsiDocument, o: ExportOptions, colors: ColorService): Uint8Array {
  const cols = Math.max(1, doc.columns);
  const rows = Math.max(1, doc.rows);
  const mapper = new ColorMapper(colors, doc.palette, o);
  const w = new AnsiWriter(o, mapper);

  if (o.textEncoding === 'utf8-bom') w.out.push(...UTF8_BOM);
  if (o.screenPrep === 'clear' || o.screenPrep === 'clear-and-home') w.csi('2', 'J');
  if (o.screenPrep === 'home' || o.screenPrep === 'clear-and-home') w.csi('', 'H');

  const sample = (y: number, x: number): ExportCell => sampleExportCell(doc, y, x, o, mapper);

  for (let y = 0; y < rows; y += 1) {
    let xEnd = cols - 1;
    if (!o.preserveLineLength) {
      xEnd = -1;
      for (let x = cols - 1; x >= 0; x -= 1) {
        const c = sample(y, x);
        if (!isBlankishGlyph(c.glyph) || !w.isBgDefaultish(c) || c.attrs !== 0) {
          xEnd = x;
          break;
        }
      }
    }

    let x = 0;
    while (x <= xEnd) {
      const c = sample(y, x);

      if (o.compress && o.useCursorForward && isBlankGlyph(c.glyph) && w.isBgDefaultish(c) && c.attrs === 0) {
        let run = 1;
        while (x + run <= xEnd) {
          const n = sample(y, x + run);
          if (!isBlankGlyph(n.glyph) || !w.isBgDefaultish(n) || n.attrs !== 0) break;
          run += 1;
        }
        if (3 + digits10(run) < run) {
          w.cursorForward(run);
          x += run;
          continue;
        }
      }

      w.ensureSgrForCell(c);
      w.glyph(c);
      x += 1;
    }

    w.newline();
  }

  if (o.finalReset) w.reset();

  const bytes = Uint8Array.from(w.out);
  if (!o.writeSauce) return bytes;
  return appendSauce(bytes, buildSauce(doc, bytes.length), o.sauceWrite);
}

export function exportAnsiFile(
  path: string,
  doc: AnsiDocument,
  options: Partial<ExportOptions> = {},
  deps: CodecDeps = { colors: defaultColorService },
): ExportResult {
  const result = exportAnsiBytes(doc, options, deps);
  if (!result.ok) return result;
  try {
    writeFileSync(path, result.bytes);
  } catch (error) {
    return { ok: false, error: `Failed to write ${path}: ${errorMessage(error)}` };
  }
  return result;
}
