/**
 * Width and text-encoding inference for ANSI streams that do not declare them.
 */

import { byteToUnicode, type ByteEncoding } from '../encoding/codepages.js';
import { decodeUtf8At, hasUtf8Bom } from '../encoding/utf8.js';
import { fontFromSauceName, getFont, type FontId } from '../fonts/font-registry.js';
import { SauceDataType, type ParsedSauce } from '../sauce/sauce.js';
import { classifyCsi, param, scanSequence } from './ansi-sequence.js';
import { MAX_COLUMNS, type ImportTextEncoding } from './ansi-types.js';

const LF = 0x0a;
const CR = 0x0d;
const TAB = 0x09;
const SUB = 0x1a;
const ESC = 0x1b;
const LBRACKET = 0x5b;
const BOM_CP = 0xfeff;

export const UTF8_MIN_VALID_RATIO = 0.95;
export const UTF8_MIN_VALID_SEQUENCES = 4;

export type DetectContext = {
  bytes: Uint8Array;
  /** Bytes before the SAUCE trailer. */
  payloadEnd: number;
  sauce: ParsedSauce;
  sauceFont: FontId | undefined;
  textEncoding: ImportTextEncoding;
  byteEncoding: ByteEncoding;
};

export function clampColumns(columns: number): number {
  if (!Number.isFinite(columns)) return 1;
  return Math.max(1, Math.min(MAX_COLUMNS, Math.floor(columns)));
}

export function isValidColumns(columns: number): boolean {
  return columns >= 1 && columns <= MAX_COLUMNS;
}

/** Snap inferred widths up to common terminal widths. */
export function normalizeInferredColumns(columns: number): number {
  const c = clampColumns(columns);
  if (c <= 80) return 80;
  if (c <= 100) return 100;
  if (c <= 132) return 132;
  if (c <= 160) return 160;
  return c;
}

export function resolveSauceFont(sauce: ParsedSauce): FontId | undefined {
  return sauce.record.present ? fontFromSauceName(sauce.record.tinfos) : undefined;
}

export function sauceDimensions(sauce: ParsedSauce): { columns: number; rows: number } {
  const { record } = sauce;
  if (!record.present) return { columns: 0, rows: 0 };
  if (record.dataType === SauceDataType.BinaryText) {
    const columns = record.fileType * 2;
    if (columns <= 0) return { columns: 0, rows: 0 };
    return { columns, rows: Math.floor(sauce.payloadSize / (columns * 2)) };
  }
  if (record.dataType === SauceDataType.Character || record.dataType === SauceDataType.XBin) {
    return { columns: record.tinfo1, rows: record.tinfo2 };
  }
  return { columns: 0, rows: 0 };
}

/**
 * Text payload for encoding sniffing: CSI sequences removed, stops at SUB,
 * keeps printable ASCII and every byte >= 0x80.
 */
export function extractTextBytes(bytes: Uint8Array, end: number): Uint8Array {
  const out: number[] = [];
  let i = 0;
  while (i < end) {
    const b = bytes[i] ?? 0;
    if (b === SUB) break;
    if (b !== ESC) {
      if (b >= 0x20) out.push(b);
      i += 1;
      continue;
    }
    if (i + 1 < end && bytes[i + 1] === LBRACKET) {
      const scan = scanSequence(bytes, i + 2, end);
      i = scan.kind === 'complete' ? scan.next : i + 2 + scan.consumed;
      continue;
    }
    i += 1;
  }
  return Uint8Array.from(out);
}

export function looksLikeUtf8(bytes: Uint8Array): boolean {
  if (!bytes.some((b) => b >= 0x80)) return false;

  let ok = 0;
  let bad = 0;
  let i = 0;
  while (i < bytes.length) {
    if ((bytes[i] ?? 0) < 0x80) {
      i += 1;
      continue;
    }
    const step = decodeUtf8At(bytes, i);
    if (step.ok) ok += 1;
    else bad += 1;
    i = step.next;
  }

  const total = ok + bad;
  if (total === 0) return false;
  return ok / total >= UTF8_MIN_VALID_RATIO && ok >= UTF8_MIN_VALID_SEQUENCES;
}

export function shouldDecodeAsUtf8(ctx: DetectContext): boolean {
  if (ctx.textEncoding === 'utf8') return true;

  if (hasUtf8Bom(extractTextBytes(ctx.bytes, ctx.payloadEnd))) return true;

  const { record } = ctx.sauce;
  if (record.present && (record.dataType === SauceDataType.BinaryText || record.dataType === SauceDataType.XBin)) {
    return false;
  }

  if (ctx.sauceFont) {
    return getFont(ctx.sauceFont).kind === 'unicode';
  }

  return looksLikeUtf8(extractTextBytes(ctx.bytes, ctx.payloadEnd));
}

/** Largest 1-based column referenced by CUP/HVP (second parameter) or CHA. 0 when none. */
export function maxExplicitColumn(bytes: Uint8Array, end: number): number {
  let max = 0;
  let i = 0;
  while (i < end) {
    if (bytes[i] !== ESC || i + 1 >= end || bytes[i + 1] !== LBRACKET) {
      i += 1;
      continue;
    }
    const scan = scanSequence(bytes, i + 2, end);
    if (scan.kind === 'unterminated') {
      i += 1;
      continue;
    }
    if (scan.final === 'H' || scan.final === 'f') max = Math.max(max, param(scan.params, 1, 1));
    else if (scan.final === 'G') max = Math.max(max, param(scan.params, 0, 1));
    i = scan.next;
  }
  return max;
}

/**
 * Replay the stream on an unbounded line and return the largest 0-based
 * column holding a non-space glyph, or -1 when nothing visible was printed.
 * Trailing padding spaces do not widen the result.
 */
export function maxColumnUsedWithNewlines(bytes: Uint8Array, end: number, utf8: boolean, byteEncoding: ByteEncoding): number {
  let row = 0;
  let col = 0;
  let savedRow = 0;
  let savedCol = 0;
  let maxLastNonSpace = -1;
  let lineLastNonSpace = -1;
  let i = 0;

  while (i < end) {
    const b = bytes[i] ?? 0;
    if (b === LF) {
      row += 1;
      maxLastNonSpace = Math.max(maxLastNonSpace, lineLastNonSpace);
      lineLastNonSpace = -1;
      col = 0;
      i += 1;
      continue;
    }
    if (b === CR) {
      col = 0;
      i += 1;
      continue;
    }
    if (b === TAB) {
      col = (Math.floor(col / 8) + 1) * 8;
      i += 1;
      continue;
    }
    if (b === SUB) break;
    if (b === ESC) {
      if (i + 1 >= end || bytes[i + 1] !== LBRACKET) {
        i += 1;
        continue;
      }
      const start = i + 2;
      const scan = scanSequence(bytes, start, end);
      if (scan.kind === 'unterminated') {
        i = Math.min(end, start + scan.consumed + 1);
        continue;
      }
      const cmd = classifyCsi(scan.params, scan.final);
      switch (cmd.type) {
        case 'cursor-position':
          row = cmd.row;
          col = cmd.col;
          break;
        case 'cursor-up':
          row = Math.max(0, row - cmd.count);
          break;
        case 'cursor-down':
          row += cmd.count;
          break;
        case 'cursor-forward':
          col += cmd.count;
          break;
        case 'cursor-back':
          col = Math.max(0, col - cmd.count);
          break;
        case 'cursor-column':
          col = cmd.col;
          break;
        case 'save-cursor':
          savedRow = row;
          savedCol = col;
          break;
        case 'restore-cursor':
          row = savedRow;
          col = savedCol;
          break;
        default:
          break;
      }
      i = scan.next;
      continue;
    }

    let cp: number;
    if (utf8) {
      const step = decodeUtf8At(bytes, i);
      cp = step.ok ? step.cp : 0xfffd;
      i = step.next;
      if (cp === BOM_CP && row === 0 && col === 0) continue;
      if (cp < 0x20) continue;
    } else {
      cp = b < 0x20 ? 0x20 : byteToUnicode(byteEncoding, b);
      i += 1;
    }
    if (cp !== 0x20) lineLastNonSpace = Math.max(lineLastNonSpace, col);
    col += 1;
  }

  return Math.max(maxLastNonSpace, lineLastNonSpace);
}

/**
 * Auto width: SAUCE dimensions, then explicit cursor columns, then the
 * newline replay, then 80.
 */
export function determineAutoColumns(ctx: DetectContext): number {
  const dims = sauceDimensions(ctx.sauce);
  if (isValidColumns(dims.columns)) return normalizeInferredColumns(dims.columns);

  const explicit = maxExplicitColumn(ctx.bytes, ctx.payloadEnd);
  if (explicit > 0) return normalizeInferredColumns(explicit);

  if (ctx.bytes.subarray(0, ctx.payloadEnd).some((b) => b === LF || b === CR)) {
    const maxCol = maxColumnUsedWithNewlines(ctx.bytes, ctx.payloadEnd, shouldDecodeAsUtf8(ctx), ctx.byteEncoding);
    return normalizeInferredColumns(maxCol >= 0 ? maxCol + 1 : 1);
  }

  return 80;
}
