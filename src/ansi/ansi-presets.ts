/**
 * Named option profiles for common ANSI art targets.
 */

import type { SauceWriteOptions } from '../sauce/sauce.js';
import {
  DEFAULT_EXPORT_OPTIONS,
  DEFAULT_IMPORT_OPTIONS,
  type ExportOptions,
  type ImportOptions,
  type ImportTextEncoding,
} from './ansi-types.js';

export const PRESET_IDS = [
  'scene-classic',
  'modern-utf8-240-safe',
  'modern-utf8-256',
  'truecolor-sgr-utf8',
  'truecolor-pablo-cp437',
  'durdraw-utf8-256',
  'moebius-classic',
  'pablodraw-classic',
  'icydraw-modern',
] as const;

export type PresetId = (typeof PRESET_IDS)[number];

export type Preset = {
  readonly id: PresetId;
  readonly name: string;
  readonly description: string;
  readonly importOptions: Readonly<ImportOptions>;
  readonly exportOptions: Readonly<ExportOptions>;
};

export type PresetOverrides = {
  importOptions?: Partial<ImportOptions>;
  exportOptions?: Partial<Omit<ExportOptions, 'sauceWrite'>> & { sauceWrite?: Partial<SauceWriteOptions> };
};

const SAUCE_ALL = { includeEofByte: true, includeComments: true, encodeCp437: true } as const;

/** UTF-8 targets read their own output back as UTF-8; byte targets keep sniffing. */
function importTextEncodingFor(options: ExportOptions): ImportTextEncoding {
  return options.textEncoding === 'cp437' ? 'auto' : 'utf8';
}

function preset(id: PresetId, name: string, description: string, exportOverrides: Partial<ExportOptions>): Preset {
  const exportOptions: ExportOptions = {
    ...DEFAULT_EXPORT_OPTIONS,
    ...exportOverrides,
    sauceWrite: Object.freeze({ ...(exportOverrides.sauceWrite ?? DEFAULT_EXPORT_OPTIONS.sauceWrite) }),
  };
  return Object.freeze({
    id,
    name,
    description,
    importOptions: Object.freeze({ ...DEFAULT_IMPORT_OPTIONS, textEncoding: importTextEncodingFor(exportOptions) }),
    exportOptions: Object.freeze(exportOptions),
  });
}

const PRESETS: readonly Preset[] = Object.freeze([
  preset(
    'scene-classic',
    'Scene Classic (CP437 + ANSI16)',
    'Classic ANSI art interchange: CP437 bytes, 16-color SGR, CRLF, optional SAUCE.',
    {
      textEncoding: 'cp437',
      colorMode: 'ansi16',
      attributeMode: 'classic-dos',
      ansi16Bright: 'bold-and-ice-blink',
      iceColors: true,
      newline: 'crlf',
      preserveLineLength: true,
      writeSauce: true,
      sauceWrite: SAUCE_ALL,
    },
  ),
  preset(
    'modern-utf8-240-safe',
    'Modern Terminal (UTF-8 + 240-color safe)',
    'UTF-8 text with xterm indexed colors, remapping the low 16 colors into the stable 16..255 range; LF; no SAUCE.',
    {
      textEncoding: 'utf8',
      colorMode: 'xterm256',
      attributeMode: 'modern',
      xterm240Safe: true,
      newline: 'lf',
      preserveLineLength: false,
      writeSauce: false,
    },
  ),
  preset(
    'modern-utf8-256',
    'Modern Terminal (UTF-8 + 256-color)',
    'UTF-8 text with xterm indexed colors 0..255; LF; no SAUCE.',
    {
      textEncoding: 'utf8',
      colorMode: 'xterm256',
      attributeMode: 'modern',
      xterm240Safe: false,
      newline: 'lf',
      preserveLineLength: false,
      writeSauce: false,
    },
  ),
  preset(
    'truecolor-sgr-utf8',
    'Truecolor (UTF-8 + 38;2/48;2)',
    'UTF-8 text with 24-bit SGR colors; LF; no SAUCE.',
    {
      textEncoding: 'utf8',
      colorMode: 'truecolor-sgr',
      attributeMode: 'modern',
      newline: 'lf',
      preserveLineLength: false,
      writeSauce: false,
    },
  ),
  preset(
    'truecolor-pablo-cp437',
    'Pablo/Icy Truecolor (CP437 + ANSI16 fallback + ...t)',
    'CP437 with an ANSI16 baseline (bold/iCE) and a `...t` RGB overlay where needed; CRLF; SAUCE on.',
    {
      textEncoding: 'cp437',
      colorMode: 'truecolor-pablo',
      attributeMode: 'classic-dos',
      pabloWithAnsi16Fallback: true,
      ansi16Bright: 'bold-and-ice-blink',
      iceColors: true,
      newline: 'crlf',
      preserveLineLength: true,
      writeSauce: true,
      sauceWrite: SAUCE_ALL,
    },
  ),
  preset(
    'durdraw-utf8-256',
    'Durdraw (UTF-8 + 256-color)',
    'Durdraw-style terminal output: UTF-8 + 38;5/48;5, LF, no SAUCE.',
    {
      textEncoding: 'utf8',
      colorMode: 'xterm256',
      attributeMode: 'modern',
      newline: 'lf',
      preserveLineLength: true,
      writeSauce: false,
      compress: false,
    },
  ),
  preset(
    'moebius-classic',
    'Moebius (Classic)',
    'Moebius classic: CP437 + ANSI16 + CRLF + SAUCE (+^Z).',
    {
      textEncoding: 'cp437',
      colorMode: 'ansi16',
      attributeMode: 'classic-dos',
      ansi16Bright: 'bold-and-ice-blink',
      newline: 'crlf',
      writeSauce: true,
    },
  ),
  preset(
    'pablodraw-classic',
    'PabloDraw (Classic)',
    'PabloDraw-friendly: CP437 + ANSI16 with cursor-forward compression on safe spaces; CRLF; SAUCE.',
    {
      textEncoding: 'cp437',
      colorMode: 'ansi16',
      attributeMode: 'classic-dos',
      ansi16Bright: 'bold-and-ice-blink',
      newline: 'crlf',
      preserveLineLength: false,
      compress: true,
      useCursorForward: true,
      writeSauce: true,
    },
  ),
  preset(
    'icydraw-modern',
    'Icy Draw (Modern)',
    'Modern output: UTF-8 with BOM + xterm256; LF; no SAUCE.',
    {
      textEncoding: 'utf8-bom',
      colorMode: 'xterm256',
      attributeMode: 'modern',
      newline: 'lf',
      preserveLineLength: false,
      compress: true,
      useCursorForward: true,
      writeSauce: false,
    },
  ),
]);

export function isPresetId(value: unknown): value is PresetId {
  return typeof value === 'string' && PRESET_IDS.some((id) => id === value);
}

export function listPresets(): readonly Preset[] {
  return PRESETS;
}

export function findPreset(id: string): Preset | undefined {
  return PRESETS.find((p) => p.id === id);
}

/**
 * Preset options with field-level overrides applied. The preset itself is not modified.
 */
export function resolvePresetOptions(
  id: string,
  overrides: PresetOverrides = {},
): { importOptions: ImportOptions; exportOptions: ExportOptions } | undefined {
  const p = findPreset(id);
  if (!p) return undefined;
  return {
    importOptions: { ...p.importOptions, ...overrides.importOptions },
    exportOptions: {
      ...p.exportOptions,
      ...overrides.exportOptions,
      sauceWrite: { ...p.exportOptions.sauceWrite, ...overrides.exportOptions?.sauceWrite },
    },
  };
}
