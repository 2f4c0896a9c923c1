/**
 * Named palette catalog used to label imported art with the palette it was
 * most likely drawn in.
 */

import { readDataJson } from '../infra/data-files.js';
import { colorDistanceSq, parseHexColor, type Color32 } from './color32.js';

export interface CatalogPalette {
  title: string;
  colors: readonly Color32[];
}

export type ColorHistogram = ReadonlyMap<Color32, number>;

export function parsePaletteCatalog(raw: unknown): CatalogPalette[] {
  if (!Array.isArray(raw)) return [];
  const out: CatalogPalette[] = [];
  for (const item of raw) {
    if (typeof item !== 'object' || item === null) continue;
    const title: unknown = Reflect.get(item, 'title');
    const colors: unknown = Reflect.get(item, 'colors');
    if (typeof title !== 'string' || !Array.isArray(colors)) continue;
    const parsed: Color32[] = [];
    for (const c of colors) {
      if (typeof c !== 'string') continue;
      const value = parseHexColor(c);
      if (value !== undefined) parsed.push(value);
    }
    if (parsed.length > 0) out.push({ title, colors: parsed });
  }
  return out;
}

let catalog: CatalogPalette[] | undefined;

export function loadPaletteCatalog(): readonly CatalogPalette[] {
  if (!catalog) catalog = parsePaletteCatalog(readDataJson('color-palettes.json'));
  return catalog;
}

/**
 * Smallest palette containing every used color exactly; otherwise the palette
 * minimizing count-weighted squared distance plus its size.
 */
export function inferPaletteTitle(hist: ColorHistogram, palettes: readonly CatalogPalette[] = loadPaletteCatalog()): string {
  if (hist.size === 0 || palettes.length === 0) return '';

  const bySize = [...palettes].sort((a, b) =>
    a.colors.length !== b.colors.length ? a.colors.length - b.colors.length : a.title < b.title ? -1 : a.title > b.title ? 1 : 0,
  );
  for (const p of bySize) {
    const set = new Set(p.colors);
    let contained = true;
    for (const color of hist.keys()) {
      if (!set.has(color)) {
        contained = false;
        break;
      }
    }
    if (contained) return p.title;
  }

  let bestScore = Number.POSITIVE_INFINITY;
  let bestTitle = '';
  for (const p of palettes) {
    let score = 0;
    for (const [used, count] of hist) {
      let nearest = Number.POSITIVE_INFINITY;
      for (const pc of p.colors) nearest = Math.min(nearest, colorDistanceSq(used, pc));
      score += nearest * count;
      if (score >= bestScore) break;
    }
    score += p.colors.length;
    if (score < bestScore) {
      bestScore = score;
      bestTitle = p.title;
    }
  }
  return bestTitle;
}
