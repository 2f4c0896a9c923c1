/**
 * Main entry point for ansiloom
 */

export { importAnsiBytes, importAnsiFile, isXBinHeader, XBIN_REJECTION } from './ansi/ansi-importer.js';
export { exportAnsiBytes, exportAnsiFile, type ExportCell } from './ansi/ansi-exporter.js';
export {
  applySgr,
  applySgrTracked,
  applyTruecolorTriplet,
  defaultPen,
  type ColorChannelMode,
  type Pen,
  type PenOptions,
  type SgrOutcome,
} from './ansi/ansi-pen.js';
export { classifyCsi, parseParams, scanSequence, type CsiCommand, type CsiScan } from './ansi/ansi-sequence.js';
export {
  determineAutoColumns,
  looksLikeUtf8,
  normalizeInferredColumns,
  shouldDecodeAsUtf8,
  type DetectContext,
} from './ansi/ansi-detect.js';
export {
  findPreset,
  isPresetId,
  listPresets,
  PRESET_IDS,
  resolvePresetOptions,
  type Preset,
  type PresetId,
  type PresetOverrides,
} from './ansi/ansi-presets.js';
export { canExportExtension, canImportExtension, EXPORT_EXTENSIONS, IMPORT_EXTENSIONS } from './ansi/ansi-format.js';
export {
  codecEventCount,
  describeCodecDiagnostics,
  getCodecDiagnostics,
  resetCodecDiagnostics,
  type CodecDiagnostics,
  type CodecEvent,
  type CodecEventKind,
} from './ansi/ansi-diagnostics.js';
export * from './ansi/ansi-types.js';

export {
  addLayer,
  createDocument,
  createLayer,
  sampleCell,
  setCell,
  type AnsiDocument,
  type AnsiLayer,
  type SampledCell,
  type SampleSource,
} from './document/ansi-document.js';

export { packRgb, unpackRgb, UNSET_COLOR, type Color32, type Rgb } from './color/color32.js';
export { DefaultColorService, defaultColorService, type ColorService } from './color/color-service.js';
export { builtinPalette, UNSET_INDEX, xtermColor32, vga16Color32, type BuiltinPaletteId, type Palette } from './color/palettes.js';
export { inferPaletteTitle, loadPaletteCatalog, type CatalogPalette } from './color/palette-catalog.js';

export {
  appendSauce,
  computePayloadSize,
  emptySauceRecord,
  parseSauce,
  SauceDataType,
  stripSauce,
  type ParsedSauce,
  type SauceRecord,
  type SauceWriteOptions,
} from './sauce/sauce.js';

export { BYTE_ENCODINGS, byteToUnicode, unicodeToByte, type ByteEncoding } from './encoding/codepages.js';
export {
  glyphKind,
  makeBitmapIndexGlyph,
  makeEmbeddedIndexGlyph,
  makeUnicodeGlyph,
  toUnicodeRepresentative,
  type GlyphId,
  type GlyphKind,
} from './encoding/glyph.js';
export { fontFromSauceName, getFont, listFonts, toSauceName, type FontId, type FontInfo } from './fonts/font-registry.js';

export { loadConfig, type AppConfig } from './config/index.js';
