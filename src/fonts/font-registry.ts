/**
 * Font registry: declared font names (as stored in the metadata trailer)
 * mapped to a byte encoding and a rendering kind.
 *
 * Only the naming/encoding side lives here; glyph bitmaps are rendered elsewhere.
 */

import type { ByteEncoding } from '../encoding/codepages.js';

export type FontKind = 'bitmap' | 'unicode';

export type FontId =
  | 'unscii'
  | 'pc-80x25'
  | 'pc-80x50'
  | 'pc-latin1'
  | 'pc-latin2'
  | 'pc-cyrillic'
  | 'pc-russian'
  | 'pc-greek'
  | 'pc-greek-869'
  | 'pc-turkish'
  | 'pc-hebrew'
  | 'pc-icelandic'
  | 'pc-nordic'
  | 'pc-portuguese'
  | 'pc-french-canadian'
  | 'pc-baltic'
  | 'terminus'
  | 'spleen'
  | 'amiga-topaz-1'
  | 'amiga-topaz-1-plus'
  | 'amiga-topaz-2'
  | 'amiga-topaz-2-plus'
  | 'amiga-pot-noodle'
  | 'amiga-microknight'
  | 'amiga-microknight-plus'
  | 'amiga-mosoul';

export interface FontInfo {
  id: FontId;
  kind: FontKind;
  label: string;
  sauceName: string;
  encoding: ByteEncoding;
}

function bitmap(id: FontId, sauceName: string, encoding: ByteEncoding): FontInfo {
  return { id, kind: 'bitmap', label: sauceName, sauceName, encoding };
}

const FONTS: readonly FontInfo[] = [
  { id: 'unscii', kind: 'unicode', label: 'Unscii 2.1 8x16', sauceName: 'unscii-16-full', encoding: 'cp437' },
  bitmap('pc-80x25', 'IBM VGA 437', 'cp437'),
  bitmap('pc-80x50', 'IBM VGA50 437', 'cp437'),
  bitmap('pc-latin1', 'IBM VGA 850', 'cp850'),
  bitmap('pc-latin2', 'IBM VGA 852', 'cp852'),
  bitmap('pc-cyrillic', 'IBM VGA 855', 'cp855'),
  bitmap('pc-russian', 'IBM VGA 866', 'cp866'),
  bitmap('pc-greek', 'IBM VGA 737', 'cp737'),
  bitmap('pc-greek-869', 'IBM VGA 869', 'cp869'),
  bitmap('pc-turkish', 'IBM VGA 857', 'cp857'),
  bitmap('pc-hebrew', 'IBM VGA 862', 'cp862'),
  bitmap('pc-icelandic', 'IBM VGA 861', 'cp861'),
  bitmap('pc-nordic', 'IBM VGA 865', 'cp865'),
  bitmap('pc-portuguese', 'IBM VGA 860', 'cp860'),
  bitmap('pc-french-canadian', 'IBM VGA 863', 'cp863'),
  bitmap('pc-baltic', 'IBM VGA 775', 'cp775'),
  bitmap('terminus', 'Terminus', 'cp437'),
  bitmap('spleen', 'Spleen', 'cp437'),
  bitmap('amiga-topaz-1', 'Amiga Topaz 1', 'amiga-latin1'),
  bitmap('amiga-topaz-1-plus', 'Amiga Topaz 1+', 'amiga-latin1'),
  bitmap('amiga-topaz-2', 'Amiga Topaz 2', 'amiga-latin1'),
  bitmap('amiga-topaz-2-plus', 'Amiga Topaz 2+', 'amiga-latin1'),
  bitmap('amiga-pot-noodle', 'Amiga P0T-NOoDLE', 'amiga-latin1'),
  bitmap('amiga-microknight', 'Amiga MicroKnight', 'amiga-latin1'),
  bitmap('amiga-microknight-plus', 'Amiga MicroKnight+', 'amiga-latin1'),
  bitmap('amiga-mosoul', 'Amiga mOsOul', 'amiga-latin1'),
];

const IBM_VGA_CODEPAGES: Record<number, FontId> = {
  437: 'pc-80x25',
  775: 'pc-baltic',
  850: 'pc-latin1',
  852: 'pc-latin2',
  855: 'pc-cyrillic',
  857: 'pc-turkish',
  860: 'pc-portuguese',
  861: 'pc-icelandic',
  862: 'pc-hebrew',
  863: 'pc-french-canadian',
  865: 'pc-nordic',
  866: 'pc-russian',
  737: 'pc-greek',
  869: 'pc-greek-869',
};

const ALIASES: Record<string, FontId> = {
  'unscii': 'unscii',
  'unscii-16-full': 'unscii',
  'cp437': 'pc-80x25',
  'dos': 'pc-80x25',
  'ibm': 'pc-80x25',
  'cp437-80x50': 'pc-80x50',
  '80x50': 'pc-80x50',
  'vga50': 'pc-80x50',
  'terminus': 'terminus',
  'spleen': 'spleen',
  'topaz': 'amiga-topaz-2',
  'topaz1200': 'amiga-topaz-2',
  'microknight': 'amiga-microknight',
  'microknight+': 'amiga-microknight-plus',
};

export const DEFAULT_FONT: FontId = 'unscii';

export function listFonts(): readonly FontInfo[] {
  return FONTS;
}

export function getFont(id: FontId): FontInfo {
  return FONTS.find((font) => font.id === id) ?? FONTS[0];
}

export function encodingForFont(id: FontId): ByteEncoding {
  return getFont(id).encoding;
}

export function toSauceName(id: FontId): string {
  return getFont(id).sauceName;
}

function parseCodepage(rest: string): number | undefined {
  const trimmed = rest.trim();
  if (!/^[0-9]+$/.test(trimmed)) return undefined;
  return parseInt(trimmed, 10);
}

/**
 * Resolve a declared font name. Returns undefined when the name is not recognized.
 */
export function fontFromSauceName(name: string): FontId | undefined {
  const trimmed = name.trim();
  if (!trimmed) return undefined;
  const lowered = trimmed.toLowerCase();

  if (lowered.startsWith('ibm vga50')) {
    const cp = parseCodepage(trimmed.slice('ibm vga50'.length));
    if (cp === undefined || cp === 437) return 'pc-80x50';
    return IBM_VGA_CODEPAGES[cp] ?? 'pc-80x50';
  }
  if (lowered.startsWith('ibm vga')) {
    const cp = parseCodepage(trimmed.slice('ibm vga'.length));
    if (cp === undefined) return 'pc-80x25';
    return IBM_VGA_CODEPAGES[cp] ?? 'pc-80x25';
  }

  const exact = FONTS.find((font) => font.sauceName.toLowerCase() === lowered);
  if (exact) return exact.id;

  return ALIASES[lowered];
}
