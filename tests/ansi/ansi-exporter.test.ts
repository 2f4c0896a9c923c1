import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { exportAnsiBytes, exportAnsiFile } from '../../src/ansi/ansi-exporter.js';
import { importAnsiBytes } from '../../src/ansi/ansi-importer.js';
import { ATTR_BOLD, ATTR_ITALIC, type ExportOptions } from '../../src/ansi/ansi-types.js';
import type { BuiltinPaletteId } from '../../src/color/palettes.js';
import { createDocument, setCell, type AnsiDocument, type SampledCell } from '../../src/document/ansi-document.js';
import { parseSauce } from '../../src/sauce/sauce.js';

const latin = (text: string): Uint8Array => Uint8Array.from(text, (ch) => ch.charCodeAt(0));
const text = (bytes: Uint8Array): string => String.fromCharCode(...bytes);

function docWith(columns: number, cells: Array<[number, Partial<SampledCell>]>, palette: BuiltinPaletteId = 'vga16'): AnsiDocument {
  const doc = createDocument(columns, 1, palette);
  for (const [col, cell] of cells) setCell(doc, 0, 0, col, cell);
  return doc;
}

function encode(doc: AnsiDocument, options: Partial<ExportOptions> = {}): Uint8Array {
  const result = exportAnsiBytes(doc, options);
  if (!result.ok) throw new Error(result.error);
  return result.bytes;
}

describe('exportAnsiBytes ansi16', () => {
  it('uses bold for bright foregrounds', () => {
    const doc = docWith(3, [[0, { glyph: 0x41, fg: 12, bg: 0 }]]);
    expect(text(encode(doc))).toBe('\x1b[1;34;40mA\r\n\x1b[0m');
  });

  it('uses 90-97 codes when asked', () => {
    const doc = docWith(3, [[0, { glyph: 0x41, fg: 12, bg: 0 }]]);
    expect(text(encode(doc, { ansi16Bright: 'sgr-90-100' }))).toBe('\x1b[94;40mA\r\n\x1b[0m');
  });

  it('uses blink for bright backgrounds with iCE colors', () => {
    const doc = docWith(1, [[0, { glyph: 0x41, fg: 7, bg: 12 }]]);
    expect(text(encode(doc))).toBe('\x1b[5;37;44mA\r\n\x1b[0m');
    expect(text(encode(doc, { iceColors: false }))).toBe('\x1b[37;44mA\r\n\x1b[0m');
  });

  it('emits only changed colors', () => {
    const doc = docWith(3, [
      [0, { glyph: 0x41, fg: 1, bg: 0 }],
      [1, { glyph: 0x42, fg: 1, bg: 0 }],
      [2, { glyph: 0x43, fg: 2, bg: 0 }],
    ]);
    expect(text(encode(doc))).toBe('\x1b[31;40mAB\x1b[32mC\r\n\x1b[0m');
  });

  it('resets before dropping bold', () => {
    const doc = docWith(2, [
      [0, { glyph: 0x41, fg: 9, bg: 0 }],
      [1, { glyph: 0x42, fg: 1, bg: 0 }],
    ]);
    expect(text(encode(doc))).toBe('\x1b[1;31;40mA\x1b[0m\x1b[31;40mB\r\n\x1b[0m');
  });
});

describe('exportAnsiBytes line handling', () => {
  it('trims blank rows', () => {
    const doc = createDocument(3, 2);
    expect(text(encode(doc, { finalReset: false }))).toBe('\r\n\r\n');
    expect(text(encode(doc, { finalReset: false, newline: 'lf' }))).toBe('\n\n');
  });

  it('keeps the full width when preserving line length', () => {
    const doc = createDocument(2, 1);
    expect(text(encode(doc, { finalReset: false, preserveLineLength: true }))).toBe('\x1b[37;40m  \r\n');
  });

  it('replaces long blank runs with cursor forward', () => {
    const doc = docWith(10, [[0, { glyph: 0x41 }], [9, { glyph: 0x42 }]]);
    expect(text(encode(doc, { useCursorForward: true }))).toBe('\x1b[37;40mA\x1b[8CB\r\n\x1b[0m');
  });

  it('writes short blank runs as spaces', () => {
    const doc = docWith(6, [[0, { glyph: 0x41 }], [5, { glyph: 0x42 }]]);
    expect(text(encode(doc, { useCursorForward: true }))).toBe('\x1b[37;40mA    B\r\n\x1b[0m');
  });

  it('prepares the screen', () => {
    const doc = createDocument(1, 1);
    expect(text(encode(doc, { screenPrep: 'clear-and-home', finalReset: false }))).toBe('\x1b[2J\x1b[H\r\n');
  });
});

describe('exportAnsiBytes modern modes', () => {
  it('writes xterm indices', () => {
    const doc = docWith(1, [[0, { glyph: 0x41, fg: 1 }]]);
    expect(text(encode(doc, { colorMode: 'xterm256' }))).toBe('\x1b[38;5;124mA\r\n\x1b[0m');
  });

  it('remaps into the 240-color safe range', () => {
    const doc = docWith(1, [[0, { glyph: 0x41, fg: 196 }]], 'xterm256');
    expect(text(encode(doc, { colorMode: 'xterm256', xterm240Safe: true }))).toBe('\x1b[38;5;196mA\r\n\x1b[0m');
    const base = docWith(1, [[0, { glyph: 0x41, fg: 0 }]], 'xterm256');
    expect(text(encode(base, { colorMode: 'xterm256', xterm240Safe: true }))).toBe('\x1b[38;5;16mA\r\n\x1b[0m');
  });

  it('writes 24-bit SGR colors', () => {
    const doc = docWith(1, [[0, { glyph: 0x41, fg: 1, bg: 4 }]]);
    expect(text(encode(doc, { colorMode: 'truecolor-sgr' }))).toBe('\x1b[38;2;170;0;0;48;2;0;0;170mA\r\n\x1b[0m');
  });

  it('filters attributes by mode', () => {
    const doc = docWith(1, [[0, { glyph: 0x41, attrs: ATTR_BOLD | ATTR_ITALIC }]]);
    expect(text(encode(doc, { colorMode: 'xterm256' }))).toBe('\x1b[1;3mA\r\n\x1b[0m');
    expect(text(encode(doc, { colorMode: 'xterm256', attributeMode: 'classic-dos' }))).toBe('\x1b[1mA\r\n\x1b[0m');
  });
});

describe('exportAnsiBytes pablo', () => {
  it('overlays a triplet when the 16-color baseline is inexact', () => {
    const doc = docWith(1, [[0, { glyph: 0x41, fg: 196 }]], 'xterm256');
    expect(text(encode(doc, { colorMode: 'truecolor-pablo' }))).toBe('\x1b[31;40m\x1b[1;255;0;0tA\r\n\x1b[0m');
  });

  it('writes triplets only without the fallback', () => {
    const doc = docWith(1, [[0, { glyph: 0x41, fg: 196 }]], 'xterm256');
    const bytes = encode(doc, { colorMode: 'truecolor-pablo', pabloWithAnsi16Fallback: false });
    expect(text(bytes)).toBe('\x1b[1;255;0;0tA\r\n\x1b[0m');
  });

  it('skips the overlay for exact palette colors', () => {
    const doc = docWith(1, [[0, { glyph: 0x41, fg: 1, bg: 4 }]]);
    expect(text(encode(doc, { colorMode: 'truecolor-pablo' }))).toBe('\x1b[31;44mA\r\n\x1b[0m');
  });
});

describe('exportAnsiBytes text encoding', () => {
  const doc = docWith(1, [[0, { glyph: 0x2588 }]]);

  it('writes cp437 bytes', () => {
    expect(Array.from(encode(doc, { finalReset: false }))).toEqual([...latin('\x1b[37;40m'), 0xdb, 0x0d, 0x0a]);
  });

  it('writes UTF-8 with an optional byte order mark', () => {
    expect(Array.from(encode(doc, { finalReset: false, textEncoding: 'utf8' }))).toEqual([
      ...latin('\x1b[37;40m'),
      0xe2,
      0x96,
      0x88,
      0x0d,
      0x0a,
    ]);
    expect(Array.from(encode(doc, { textEncoding: 'utf8-bom' }).subarray(0, 3))).toEqual([0xef, 0xbb, 0xbf]);
  });

  it('replaces unmappable glyphs', () => {
    const emoji = docWith(1, [[0, { glyph: 0x1f600 }]]);
    expect(Array.from(encode(emoji, { finalReset: false })).at(-3)).toBe(0x3f);
  });
});

describe('exportAnsiBytes SAUCE', () => {
  it('appends a record with the document size', () => {
    const doc = docWith(3, [[0, { glyph: 0x41 }]]);
    doc.sauce.title = 'Example';
    const bytes = encode(doc, { writeSauce: true });
    const parsed = parseSauce(bytes);
    expect(parsed.record.present).toBe(true);
    expect(parsed.record.title).toBe('Example');
    expect(parsed.record.tinfo1).toBe(3);
    expect(parsed.record.tinfo2).toBe(1);
    expect(parsed.record.fileSize).toBe(parsed.payloadSize);
    expect(parsed.hasEofByte).toBe(true);
  });
});

describe('round trip', () => {
  it('re-imports exported cells', () => {
    const first = importAnsiBytes(latin('\x1b[1;31mHi'));
    expect(first.ok).toBe(true);
    if (!first.ok) return;
    const bytes = encode(first.document);
    expect(text(bytes)).toBe('\x1b[1;31;40mHi\r\n\x1b[0m');

    const second = importAnsiBytes(bytes);
    expect(second.ok).toBe(true);
    if (!second.ok) return;
    const a = first.document.layers[0];
    const b = second.document.layers[0];
    expect(Array.from(b?.glyphs.subarray(0, 80) ?? [])).toEqual(Array.from(a?.glyphs.subarray(0, 80) ?? []));
    expect(Array.from(b?.fg.subarray(0, 2) ?? [])).toEqual([9, 9]);
  });

  it('reaches a fixed point over repeated cycles', () => {
    const cycle = (bytes: Uint8Array): { bytes: Uint8Array; doc: AnsiDocument } => {
      const imported = importAnsiBytes(bytes);
      if (!imported.ok) throw new Error(imported.error);
      return { bytes: encode(imported.document), doc: imported.document };
    };

    const first = cycle(latin('\x1b[1;31mHi\r\n\x1b[0m\x1b[32mG\x1b[44;5mo\x1b[0m\r\n'));
    const second = cycle(first.bytes);
    const third = cycle(second.bytes);

    expect(first.doc.rows).toBe(2);
    expect(second.doc.rows).toBe(2);
    expect(third.doc.rows).toBe(2);
    expect(text(second.bytes)).toBe(text(first.bytes));
    expect(text(third.bytes)).toBe(text(second.bytes));

    const layer = third.doc.layers[0];
    expect(layer?.fg[80]).toBe(2);
    expect(layer?.bg[80]).toBe(0);
    expect(layer?.fg[81]).toBe(2);
    expect(layer?.bg[81]).toBe(12);
  });
});

describe('exportAnsiFile', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('writes the encoded bytes', () => {
    dir = mkdtempSync(join(tmpdir(), 'ansiloom-export-'));
    const path = join(dir, 'out.ans');
    const result = exportAnsiFile(path, docWith(1, [[0, { glyph: 0x41 }]]));
    expect(result.ok).toBe(true);
    expect(text(readFileSync(path))).toBe('\x1b[37;40mA\r\n\x1b[0m');
  });

  it('reports unwritable paths', () => {
    dir = mkdtempSync(join(tmpdir(), 'ansiloom-export-'));
    const path = join(dir, 'missing', 'out.ans');
    const result = exportAnsiFile(path, createDocument(1, 1));
    expect(!result.ok && result.error.startsWith(`Failed to write ${path}: `)).toBe(true);
  });
});
