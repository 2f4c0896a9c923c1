/**
 * Builtin palettes. Derived palettes carry an index mapping into their parent.
 */

import { packRgb, rgbDistanceSq, type Color32, type Rgb } from './color32.js';

export type BuiltinPaletteId = 'vga16' | 'vga8' | 'xterm256' | 'xterm16' | 'xterm240-safe';

export const BUILTIN_PALETTE_IDS: readonly BuiltinPaletteId[] = ['vga8', 'vga16', 'xterm16', 'xterm240-safe', 'xterm256'];

/** Palette index sentinel for "no explicit color". */
export const UNSET_INDEX = 0xffff;

export interface DerivedMapping {
  parent: BuiltinPaletteId;
  toParent: readonly number[];
}

export interface Palette {
  id: BuiltinPaletteId;
  title: string;
  colors: readonly Color32[];
  derived?: DerivedMapping;
}

export function isBuiltinPaletteId(value: unknown): value is BuiltinPaletteId {
  return typeof value === 'string' && BUILTIN_PALETTE_IDS.some((id) => id === value);
}

// ANSI order: black, red, green, yellow/brown, blue, magenta, cyan, white; then bright.
const VGA16_RGB: ReadonlyArray<readonly [number, number, number]> = [
  [0x00, 0x00, 0x00], [0xaa, 0x00, 0x00], [0x00, 0xaa, 0x00], [0xaa, 0x55, 0x00],
  [0x00, 0x00, 0xaa], [0xaa, 0x00, 0xaa], [0x00, 0xaa, 0xaa], [0xaa, 0xaa, 0xaa],
  [0x55, 0x55, 0x55], [0xff, 0x55, 0x55], [0x55, 0xff, 0x55], [0xff, 0xff, 0x55],
  [0x55, 0x55, 0xff], [0xff, 0x55, 0xff], [0x55, 0xff, 0xff], [0xff, 0xff, 0xff],
];

const XTERM16_RGB: ReadonlyArray<readonly [number, number, number]> = [
  [0x00, 0x00, 0x00], [0xcd, 0x00, 0x00], [0x00, 0xcd, 0x00], [0xcd, 0xcd, 0x00],
  [0x00, 0x00, 0xee], [0xcd, 0x00, 0xcd], [0x00, 0xcd, 0xcd], [0xe5, 0xe5, 0xe5],
  [0x7f, 0x7f, 0x7f], [0xff, 0x00, 0x00], [0x00, 0xff, 0x00], [0xff, 0xff, 0x00],
  [0x5c, 0x5c, 0xff], [0xff, 0x00, 0xff], [0x00, 0xff, 0xff], [0xff, 0xff, 0xff],
];

const CUBE_LEVELS = [0, 95, 135, 175, 215, 255];

export function xtermRgb(index: number): Rgb {
  if (index < 16) {
    const [r, g, b] = XTERM16_RGB[index] ?? [0, 0, 0];
    return { r, g, b };
  }
  if (index >= 232) {
    const v = 8 + (index - 232) * 10;
    return { r: v, g: v, b: v };
  }
  const i = index - 16;
  return {
    r: CUBE_LEVELS[Math.floor(i / 36)] ?? 0,
    g: CUBE_LEVELS[Math.floor((i % 36) / 6)] ?? 0,
    b: CUBE_LEVELS[i % 6] ?? 0,
  };
}

export function xtermColor32(index: number): Color32 {
  const { r, g, b } = xtermRgb(Math.max(0, Math.min(255, Math.floor(index))));
  return packRgb(r, g, b);
}

export function vga16Color32(index: number): Color32 {
  const [r, g, b] = VGA16_RGB[index & 15] ?? [0, 0, 0];
  return packRgb(r, g, b);
}

function cubeLevel(v: number): number {
  if (v < 48) return 0;
  if (v < 115) return 1;
  if (v < 155) return 2;
  if (v < 195) return 3;
  if (v < 235) return 4;
  return 5;
}

/**
 * Nearest xterm-256 index: cube candidate first, then the grey ramp and
 * the base 16 only when strictly closer.
 */
export function nearestXtermIndex(rgb: Rgb): number {
  const cube = 16 + 36 * cubeLevel(rgb.r) + 6 * cubeLevel(rgb.g) + cubeLevel(rgb.b);
  let best = cube;
  let bestDist = rgbDistanceSq(rgb, xtermRgb(cube));

  const avg = Math.floor((rgb.r + rgb.g + rgb.b + 1) / 3);
  let grey: number;
  if (avg <= 8) grey = 232;
  else if (avg >= 238) grey = 255;
  else grey = 232 + Math.max(0, Math.min(23, Math.floor((avg - 8 + 5) / 10)));
  const greyDist = rgbDistanceSq(rgb, xtermRgb(grey));
  if (greyDist < bestDist) {
    best = grey;
    bestDist = greyDist;
  }

  for (let i = 0; i < 16; i += 1) {
    const d = rgbDistanceSq(rgb, xtermRgb(i));
    if (d < bestDist) {
      best = i;
      bestDist = d;
    }
  }
  return best;
}

function fromTriplets(rows: ReadonlyArray<readonly [number, number, number]>): Color32[] {
  return rows.map(([r, g, b]) => packRgb(r, g, b));
}

function xtermRange(from: number, to: number): Color32[] {
  const out: Color32[] = [];
  for (let i = from; i <= to; i += 1) out.push(xtermColor32(i));
  return out;
}

function identity(n: number, offset = 0): number[] {
  return Array.from({ length: n }, (_, i) => i + offset);
}

function buildBuiltinPalettes(): Map<BuiltinPaletteId, Palette> {
  const vga16 = fromTriplets(VGA16_RGB);
  return new Map<BuiltinPaletteId, Palette>([
    ['vga16', { id: 'vga16', title: 'VGA 16', colors: vga16 }],
    ['vga8', { id: 'vga8', title: 'VGA 8', colors: vga16.slice(0, 8), derived: { parent: 'vga16', toParent: identity(8) } }],
    ['xterm256', { id: 'xterm256', title: 'Xterm 256', colors: xtermRange(0, 255) }],
    ['xterm16', { id: 'xterm16', title: 'Xterm 16', colors: xtermRange(0, 15), derived: { parent: 'xterm256', toParent: identity(16) } }],
    [
      'xterm240-safe',
      { id: 'xterm240-safe', title: 'Xterm 240 Safe', colors: xtermRange(16, 255), derived: { parent: 'xterm256', toParent: identity(240, 16) } },
    ],
  ]);
}

let builtins: Map<BuiltinPaletteId, Palette> | undefined;

export function builtinPalette(id: BuiltinPaletteId): Palette {
  if (!builtins) builtins = buildBuiltinPalettes();
  const palette = builtins.get(id);
  if (!palette) throw new Error(`Unknown builtin palette: ${id}`);
  return palette;
}
