/**
 * Option and result types shared by the ANSI importer and exporter.
 */

import type { Color32 } from '../color/color32.js';
import type { ByteEncoding } from '../encoding/codepages.js';
import type { AnsiDocument, SampleSource } from '../document/ansi-document.js';
import type { SauceWriteOptions } from '../sauce/sauce.js';
import type { ColorService } from '../color/color-service.js';

export const ATTR_BOLD = 1;
export const ATTR_DIM = 2;
export const ATTR_ITALIC = 4;
export const ATTR_UNDERLINE = 8;
export const ATTR_BLINK = 16;
export const ATTR_REVERSE = 32;
export const ATTR_STRIKE = 64;

export const MAX_COLUMNS = 4096;

export type WrapPolicy = 'eager' | 'put-only';
export type ImportTextEncoding = 'auto' | 'utf8';
export type GlyphBytesPolicy = 'unicode' | 'bitmap-index';

export type ImportOptions = {
  /** 0 = auto-detect. */
  columns: number;
  iceColors: boolean;
  /** 0 = VGA 7. */
  defaultFg: Color32;
  /** 0 = VGA 0. */
  defaultBg: Color32;
  defaultBgUnset: boolean;
  wrapPolicy: WrapPolicy;
  textEncoding: ImportTextEncoding;
  byteEncoding: ByteEncoding;
  glyphBytesPolicy: GlyphBytesPolicy;
};

export const DEFAULT_IMPORT_OPTIONS: Readonly<ImportOptions> = Object.freeze({
  columns: 0,
  iceColors: true,
  defaultFg: 0,
  defaultBg: 0,
  defaultBgUnset: false,
  wrapPolicy: 'eager',
  textEncoding: 'auto',
  byteEncoding: 'cp437',
  glyphBytesPolicy: 'unicode',
});

export type ExportTextEncoding = 'cp437' | 'utf8' | 'utf8-bom';
export type ColorMode = 'ansi16' | 'xterm256' | 'truecolor-sgr' | 'truecolor-pablo';
export type AttributeMode = 'classic-dos' | 'modern';
export type Ansi16Bright = 'bold-and-ice-blink' | 'sgr-90-100';
export type NewlineMode = 'crlf' | 'lf';
export type ScreenPrep = 'none' | 'clear' | 'home' | 'clear-and-home';

export type ExportOptions = {
  source: SampleSource;
  textEncoding: ExportTextEncoding;
  byteEncoding: ByteEncoding;
  colorMode: ColorMode;
  attributeMode: AttributeMode;
  ansi16Bright: Ansi16Bright;
  iceColors: boolean;
  xterm240Safe: boolean;
  pabloWithAnsi16Fallback: boolean;
  useDefaultFg39: boolean;
  useDefaultBg49: boolean;
  defaultFg: Color32;
  defaultBg: Color32;
  newline: NewlineMode;
  screenPrep: ScreenPrep;
  preserveLineLength: boolean;
  compress: boolean;
  useCursorForward: boolean;
  finalReset: boolean;
  writeSauce: boolean;
  sauceWrite: SauceWriteOptions;
};

export const DEFAULT_EXPORT_OPTIONS: Readonly<ExportOptions> = Object.freeze({
  source: 'composite',
  textEncoding: 'cp437',
  byteEncoding: 'cp437',
  colorMode: 'ansi16',
  attributeMode: 'modern',
  ansi16Bright: 'bold-and-ice-blink',
  iceColors: true,
  xterm240Safe: false,
  pabloWithAnsi16Fallback: true,
  useDefaultFg39: true,
  useDefaultBg49: true,
  defaultFg: 0,
  defaultBg: 0,
  newline: 'crlf',
  screenPrep: 'none',
  preserveLineLength: false,
  compress: true,
  useCursorForward: false,
  finalReset: true,
  writeSauce: false,
  sauceWrite: { includeEofByte: true, includeComments: true, encodeCp437: true },
});

export type DetectedInput = {
  columns: number;
  utf8: boolean;
  byteEncoding: ByteEncoding;
  payloadSize: number;
};

export type ImportResult =
  | { ok: true; document: AnsiDocument; detected: DetectedInput }
  | { ok: false; error: string };

export type ExportResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; error: string };

export type CodecDeps = {
  colors: ColorService;
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
