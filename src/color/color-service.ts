import { rgbDistanceSq, unpackRgb, UNSET_COLOR, type Color32, type Rgb } from './color32.js';
import { builtinPalette, nearestXtermIndex, UNSET_INDEX, type BuiltinPaletteId, type Palette } from './palettes.js';

/**
 * Palette lookups used by the importer and exporter. Passed explicitly so
 * callers can substitute their own palette store.
 */
export interface ColorService {
  getPalette(id: BuiltinPaletteId): Palette;
  /** Unset or out-of-range indices give the unset color. */
  indexToColor32(palette: BuiltinPaletteId, index: number): Color32;
  /** Unset color gives UNSET_INDEX. */
  color32ToIndex(palette: BuiltinPaletteId, color: Color32): number;
  nearestIndex(palette: BuiltinPaletteId, rgb: Rgb): number;
  /** Table mapping every index of `src` to the nearest index of `dst`. */
  getOrBuildRemap(src: BuiltinPaletteId, dst: BuiltinPaletteId): readonly number[];
}

export class DefaultColorService implements ColorService {
  private readonly remaps = new Map<string, readonly number[]>();

  getPalette(id: BuiltinPaletteId): Palette {
    return builtinPalette(id);
  }

  indexToColor32(palette: BuiltinPaletteId, index: number): Color32 {
    if (index === UNSET_INDEX || index < 0) return UNSET_COLOR;
    return this.getPalette(palette).colors[index] ?? UNSET_COLOR;
  }

  color32ToIndex(palette: BuiltinPaletteId, color: Color32): number {
    const rgb = unpackRgb(color);
    if (!rgb) return UNSET_INDEX;
    return this.nearestIndex(palette, rgb);
  }

  nearestIndex(palette: BuiltinPaletteId, rgb: Rgb): number {
    if (palette === 'xterm256') return nearestXtermIndex(rgb);
    const colors = this.getPalette(palette).colors;
    let best = 0;
    let bestDist = Number.POSITIVE_INFINITY;
    colors.forEach((c, i) => {
      const d = rgbDistanceSq(rgb, { r: (c >>> 16) & 0xff, g: (c >>> 8) & 0xff, b: c & 0xff });
      if (d < bestDist) {
        best = i;
        bestDist = d;
      }
    });
    return best;
  }

  getOrBuildRemap(src: BuiltinPaletteId, dst: BuiltinPaletteId): readonly number[] {
    const key = `${src}->${dst}`;
    const cached = this.remaps.get(key);
    if (cached) return cached;

    const source = this.getPalette(src);
    let table: number[];
    if (src === dst) {
      table = source.colors.map((_, i) => i);
    } else if (source.derived?.parent === dst) {
      table = [...source.derived.toParent];
    } else {
      table = source.colors.map((c) => this.color32ToIndex(dst, c));
    }
    this.remaps.set(key, table);
    return table;
  }
}

export const defaultColorService: ColorService = new DefaultColorService();
