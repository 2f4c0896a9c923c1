/**
 * Packed 0xFFRRGGBB colors. Zero means "unset" (no explicit color).
 */

export type Color32 = number;

export const UNSET_COLOR: Color32 = 0;

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export function clampByte(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(255, Math.floor(value)));
}

export function packRgb(r: number, g: number, b: number): Color32 {
  return ((0xff << 24) | (clampByte(r) << 16) | (clampByte(g) << 8) | clampByte(b)) >>> 0;
}

export function unpackRgb(color: Color32): Rgb | undefined {
  if (color === UNSET_COLOR) return undefined;
  return { r: (color >>> 16) & 0xff, g: (color >>> 8) & 0xff, b: color & 0xff };
}

export function rgbDistanceSq(a: Rgb, b: Rgb): number {
  const dr = a.r - b.r;
  const dg = a.g - b.g;
  const db = a.b - b.b;
  return dr * dr + dg * dg + db * db;
}

export function colorDistanceSq(a: Color32, b: Color32): number {
  return rgbDistanceSq(
    { r: (a >>> 16) & 0xff, g: (a >>> 8) & 0xff, b: a & 0xff },
    { r: (b >>> 16) & 0xff, g: (b >>> 8) & 0xff, b: b & 0xff },
  );
}

export function parseHexColor(text: string): Color32 | undefined {
  const match = /^#?([0-9a-fA-F]{6})$/.exec(text.trim());
  if (!match?.[1]) return undefined;
  const value = parseInt(match[1], 16);
  return packRgb((value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff);
}

export function toHexColor(color: Color32): string {
  return `#${(color & 0xffffff).toString(16).padStart(6, '0')}`;
}
