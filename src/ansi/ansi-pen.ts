/**
 * SGR (Select Graphic Rendition) state for the importer.
 *
 * Pure: every transition returns a new Pen without mutating the input.
 * Tracks the scene conventions where SGR 1 brightens 30-37 foregrounds and,
 * with iCE colors, SGR 5 brightens 40-47 backgrounds instead of blinking.
 */

import { packRgb, type Color32 } from '../color/color32.js';
import { vga16Color32, xtermColor32 } from '../color/palettes.js';
import { recordCodecEvent } from './ansi-diagnostics.js';
import { param } from './ansi-sequence.js';
import {
  ATTR_BLINK,
  ATTR_BOLD,
  ATTR_DIM,
  ATTR_ITALIC,
  ATTR_REVERSE,
  ATTR_STRIKE,
  ATTR_UNDERLINE,
  type ImportOptions,
} from './ansi-types.js';

export type ColorChannelMode = 'palette16' | 'xterm256' | 'truecolor';

export type Pen = {
  readonly fgMode: ColorChannelMode;
  readonly bgMode: ColorChannelMode;
  readonly fgIndex: number;
  readonly bgIndex: number;
  readonly fg: Color32;
  readonly bg: Color32;
  readonly bold: boolean;
  readonly dim: boolean;
  readonly italic: boolean;
  readonly underline: boolean;
  readonly blink: boolean;
  readonly inverse: boolean;
  readonly strike: boolean;
  /** fgIndex currently carries the +8 applied because of SGR 1. */
  readonly fgBrightFromBold: boolean;
  /** iCE bright-background latch armed by SGR 5. */
  readonly iceBg: boolean;
  /** bgIndex currently carries the +8 applied because of the iCE latch. */
  readonly bgBrightFromIce: boolean;
};

export type PenOptions = Pick<ImportOptions, 'iceColors' | 'defaultFg' | 'defaultBg' | 'defaultBgUnset'>;

export type SgrOutcome = {
  pen: Pen;
  sawXterm256: boolean;
  sawTruecolor: boolean;
};

function defaultFgColor(options: PenOptions): Color32 {
  return options.defaultFg !== 0 ? options.defaultFg : vga16Color32(7);
}

function defaultBgColor(options: PenOptions): Color32 {
  if (options.defaultBgUnset) return 0;
  return options.defaultBg !== 0 ? options.defaultBg : vga16Color32(0);
}

export function defaultPen(options: PenOptions): Pen {
  return {
    fgMode: 'palette16',
    bgMode: 'palette16',
    fgIndex: 7,
    bgIndex: 0,
    fg: defaultFgColor(options),
    bg: defaultBgColor(options),
    bold: false,
    dim: false,
    italic: false,
    underline: false,
    blink: false,
    inverse: false,
    strike: false,
    fgBrightFromBold: false,
    iceBg: false,
    bgBrightFromIce: false,
  };
}

function withFg16(pen: Pen, index: number, fromBold: boolean): Pen {
  return { ...pen, fgMode: 'palette16', fgIndex: index, fg: vga16Color32(index), fgBrightFromBold: fromBold };
}

function withBg16(pen: Pen, index: number, fromIce: boolean): Pen {
  return { ...pen, bgMode: 'palette16', bgIndex: index, bg: vga16Color32(index), bgBrightFromIce: fromIce };
}

function applyCode(pen: Pen, code: number, options: PenOptions): Pen {
  if (code === 0) return defaultPen(options);

  if (code === 1) {
    if (pen.fgMode === 'palette16' && pen.fgIndex >= 0 && pen.fgIndex < 8) {
      return { ...withFg16(pen, pen.fgIndex + 8, true), bold: true };
    }
    return { ...pen, bold: true };
  }
  if (code === 2) return { ...pen, dim: true };
  if (code === 3) return { ...pen, italic: true };
  if (code === 4) return { ...pen, underline: true };
  if (code === 5) {
    if (!options.iceColors || pen.bgMode !== 'palette16') return { ...pen, blink: true };
    if (pen.bgIndex >= 0 && pen.bgIndex < 8) {
      return { ...withBg16(pen, pen.bgIndex + 8, true), iceBg: true, blink: false };
    }
    return { ...pen, iceBg: true, bgBrightFromIce: false, blink: false };
  }
  if (code === 7) return { ...pen, inverse: true };
  if (code === 9) return { ...pen, strike: true };
  if (code === 27) return { ...pen, inverse: false };
  if (code === 22) {
    const base = pen.fgBrightFromBold && pen.fgMode === 'palette16' && pen.fgIndex >= 8 && pen.fgIndex < 16
      ? withFg16(pen, pen.fgIndex - 8, false)
      : pen;
    return { ...base, bold: false, dim: false, fgBrightFromBold: false };
  }
  if (code === 23) return { ...pen, italic: false };
  if (code === 24) return { ...pen, underline: false };
  if (code === 25) {
    if (!(pen.iceBg && options.iceColors)) return { ...pen, blink: false };
    const base = pen.bgBrightFromIce && pen.bgMode === 'palette16' && pen.bgIndex >= 8 && pen.bgIndex < 16
      ? withBg16(pen, pen.bgIndex - 8, false)
      : pen;
    return { ...base, iceBg: false, bgBrightFromIce: false, blink: false };
  }
  if (code === 29) return { ...pen, strike: false };
  if (code === 39) {
    return { ...pen, fgMode: 'palette16', fgIndex: 7, fg: defaultFgColor(options), fgBrightFromBold: false };
  }
  if (code === 49) {
    return { ...pen, bgMode: 'palette16', bgIndex: 0, bg: defaultBgColor(options), bgBrightFromIce: false };
  }
  if (code >= 30 && code <= 37) {
    return pen.bold ? withFg16(pen, code - 30 + 8, true) : withFg16(pen, code - 30, false);
  }
  if (code >= 90 && code <= 97) return withFg16(pen, code - 90 + 8, false);
  if (code >= 40 && code <= 47) {
    return pen.iceBg && options.iceColors ? withBg16(pen, code - 40 + 8, true) : withBg16(pen, code - 40, false);
  }
  if (code >= 100 && code <= 107) return withBg16(pen, code - 100 + 8, false);

  recordCodecEvent({ kind: 'sgr-unknown', code });
  return pen;
}

/**
 * Apply an SGR parameter list, reporting whether extended colors were used.
 */
export function applySgrTracked(pen: Pen, params: readonly number[], options: PenOptions): SgrOutcome {
  const list = params.length === 0 ? [0] : params;
  let next = pen;
  let sawXterm256 = false;
  let sawTruecolor = false;

  for (let k = 0; k < list.length; k += 1) {
    const code = list[k] ?? 0;
    if (code !== 38 && code !== 48) {
      next = applyCode(next, code, options);
      continue;
    }

    const isFg = code === 38;
    const mode = param(list, k + 1, -1);
    if (mode === 5) {
      const idx = param(list, k + 2, -1);
      if (idx >= 0 && idx <= 255) {
        const color = xtermColor32(idx);
        next = isFg
          ? { ...next, fgMode: 'xterm256', fgIndex: idx, fg: color, fgBrightFromBold: false }
          : { ...next, bgMode: 'xterm256', bgIndex: idx, bg: color, bgBrightFromIce: false };
        sawXterm256 = true;
      }
      k += 2;
    } else if (mode === 2) {
      const r = param(list, k + 2, -1);
      const g = param(list, k + 3, -1);
      const b = param(list, k + 4, -1);
      if (r >= 0 && g >= 0 && b >= 0) {
        const color = packRgb(r, g, b);
        next = isFg
          ? { ...next, fgMode: 'truecolor', fg: color, fgBrightFromBold: false }
          : { ...next, bgMode: 'truecolor', bg: color, bgBrightFromIce: false };
        sawTruecolor = true;
      }
      k += 4;
    }
  }

  return { pen: next, sawXterm256, sawTruecolor };
}

export function applySgr(pen: Pen, params: readonly number[], options: PenOptions): Pen {
  return applySgrTracked(pen, params, options).pen;
}

/** Positional 24-bit color: which 0 = background, 1 = foreground. */
export function applyTruecolorTriplet(pen: Pen, which: number, r: number, g: number, b: number): Pen {
  const color = packRgb(r, g, b);
  if (which === 0) return { ...pen, bgMode: 'truecolor', bg: color };
  if (which === 1) return { ...pen, fgMode: 'truecolor', fg: color };
  return pen;
}

export function penAttributes(pen: Pen): number {
  let a = 0;
  if (pen.bold) a |= ATTR_BOLD;
  if (pen.dim) a |= ATTR_DIM;
  if (pen.italic) a |= ATTR_ITALIC;
  if (pen.underline) a |= ATTR_UNDERLINE;
  if (pen.blink) a |= ATTR_BLINK;
  if (pen.inverse) a |= ATTR_REVERSE;
  if (pen.strike) a |= ATTR_STRIKE;
  return a;
}
