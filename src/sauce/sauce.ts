/**
 * SAUCE metadata trailer codec.
 *
 * Layout (SAUCE00, 128 bytes, appended after the payload):
 *   0   "SAUCE"        5     90  FileSize  u32 LE
 *   5   "00"           2     94  DataType  u8
 *   7   Title         35     95  FileType  u8
 *   42  Author        20     96  TInfo1-4  u16 LE x4
 *   62  Group         20     104 Comments  u8
 *   82  Date (CCYYMMDD) 8    105 TFlags    u8
 *                            106 TInfoS    22 (zero-terminated)
 *
 * An optional "COMNT" block (64 bytes per line) and an EOF byte (0x1A)
 * may precede the record.
 */

import { byteToUnicode, unicodeToByte } from '../encoding/codepages.js';
import { recordCodecEvent } from '../ansi/ansi-diagnostics.js';

export const SAUCE_RECORD_SIZE = 128;
export const SAUCE_COMMENT_HEADER_SIZE = 5;
export const SAUCE_COMMENT_LINE_SIZE = 64;
export const SAUCE_MAX_COMMENT_LINES = 255;
const SUB = 0x1a;

export const SauceDataType = {
  None: 0,
  Character: 1,
  Bitmap: 2,
  Vector: 3,
  Audio: 4,
  BinaryText: 5,
  XBin: 6,
  Archive: 7,
  Executable: 8,
} as const;

export type SauceDataTypeName = keyof typeof SauceDataType;

const OFF_TITLE = 7;
const OFF_AUTHOR = 42;
const OFF_GROUP = 62;
const OFF_DATE = 82;
const OFF_FILESIZE = 90;
const OFF_DATATYPE = 94;
const OFF_FILETYPE = 95;
const OFF_TINFO1 = 96;
const OFF_TINFO2 = 98;
const OFF_TINFO3 = 100;
const OFF_TINFO4 = 102;
const OFF_COMMENTS = 104;
const OFF_TFLAGS = 105;
const OFF_TINFOS = 106;
const TINFOS_SIZE = 22;

export interface SauceRecord {
  present: boolean;
  title: string;
  author: string;
  group: string;
  /** CCYYMMDD, or empty. */
  date: string;
  fileSize: number;
  dataType: number;
  fileType: number;
  tinfo1: number;
  tinfo2: number;
  tinfo3: number;
  tinfo4: number;
  commentsCount: number;
  tflags: number;
  /** Declared font name. */
  tinfos: string;
  comments: string[];
}

export interface ParsedSauce {
  record: SauceRecord;
  /** Length of the art bytes, excluding EOF byte, comment block and record. */
  payloadSize: number;
  hasEofByte: boolean;
  hasCommentBlock: boolean;
}

export interface SauceWriteOptions {
  includeEofByte: boolean;
  includeComments: boolean;
  encodeCp437: boolean;
}

export const DEFAULT_SAUCE_WRITE_OPTIONS: Readonly<SauceWriteOptions> = Object.freeze({
  includeEofByte: true,
  includeComments: true,
  encodeCp437: true,
});

export function emptySauceRecord(): SauceRecord {
  return {
    present: false,
    title: '',
    author: '',
    group: '',
    date: '',
    fileSize: 0,
    dataType: SauceDataType.Character,
    fileType: 1,
    tinfo1: 0,
    tinfo2: 0,
    tinfo3: 0,
    tinfo4: 0,
    commentsCount: 0,
    tflags: 0,
    tinfos: '',
    comments: [],
  };
}

function readU16LE(bytes: Uint8Array, at: number): number {
  return (bytes[at] ?? 0) | ((bytes[at + 1] ?? 0) << 8);
}

function readU32LE(bytes: Uint8Array, at: number): number {
  return (
    ((bytes[at] ?? 0) |
      ((bytes[at + 1] ?? 0) << 8) |
      ((bytes[at + 2] ?? 0) << 16) |
      ((bytes[at + 3] ?? 0) << 24)) >>> 0
  );
}

function writeU16LE(out: Uint8Array, at: number, value: number): void {
  out[at] = value & 0xff;
  out[at + 1] = (value >> 8) & 0xff;
}

function writeU32LE(out: Uint8Array, at: number, value: number): void {
  out[at] = value & 0xff;
  out[at + 1] = (value >>> 8) & 0xff;
  out[at + 2] = (value >>> 16) & 0xff;
  out[at + 3] = (value >>> 24) & 0xff;
}

function decodeCharField(field: Uint8Array, decodeCp437: boolean): string {
  let n = field.length;
  while (n > 0 && (field[n - 1] === 0 || field[n - 1] === 0x20)) n -= 1;
  let out = '';
  for (let i = 0; i < n; i += 1) {
    const b = field[i] ?? 0;
    out += decodeCp437 ? String.fromCodePoint(byteToUnicode('cp437', b)) : String.fromCharCode(b);
  }
  return out;
}

function matchesAscii(bytes: Uint8Array, at: number, text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (bytes[at + i] !== text.charCodeAt(i)) return false;
  }
  return true;
}

/**
 * Parse an optional trailer from the end of `bytes`. Absent or malformed
 * trailers yield `record.present === false` and the full length as payload.
 */
export function parseSauce(bytes: Uint8Array, decodeCp437 = true): ParsedSauce {
  const none: ParsedSauce = {
    record: emptySauceRecord(),
    payloadSize: bytes.length,
    hasEofByte: false,
    hasCommentBlock: false,
  };
  if (bytes.length < SAUCE_RECORD_SIZE) return none;

  const recordOffset = bytes.length - SAUCE_RECORD_SIZE;
  if (!matchesAscii(bytes, recordOffset, 'SAUCE00')) return none;

  const rec = bytes.subarray(recordOffset);
  const field = (offset: number, size: number): Uint8Array => rec.subarray(offset, offset + size);

  let tinfosLength = 0;
  while (tinfosLength < TINFOS_SIZE && rec[OFF_TINFOS + tinfosLength] !== 0) tinfosLength += 1;

  const record: SauceRecord = {
    present: true,
    title: decodeCharField(field(OFF_TITLE, 35), decodeCp437),
    author: decodeCharField(field(OFF_AUTHOR, 20), decodeCp437),
    group: decodeCharField(field(OFF_GROUP, 20), decodeCp437),
    date: decodeCharField(field(OFF_DATE, 8), false),
    fileSize: readU32LE(rec, OFF_FILESIZE),
    dataType: rec[OFF_DATATYPE] ?? 0,
    fileType: rec[OFF_FILETYPE] ?? 0,
    tinfo1: readU16LE(rec, OFF_TINFO1),
    tinfo2: readU16LE(rec, OFF_TINFO2),
    tinfo3: readU16LE(rec, OFF_TINFO3),
    tinfo4: readU16LE(rec, OFF_TINFO4),
    commentsCount: rec[OFF_COMMENTS] ?? 0,
    tflags: rec[OFF_TFLAGS] ?? 0,
    tinfos: decodeCharField(field(OFF_TINFOS, tinfosLength), decodeCp437),
    comments: [],
  };

  let payloadEnd = recordOffset;
  let hasCommentBlock = false;

  if (record.commentsCount > 0) {
    const need = SAUCE_COMMENT_HEADER_SIZE + record.commentsCount * SAUCE_COMMENT_LINE_SIZE;
    const commentOffset = payloadEnd - need;
    if (commentOffset >= 0 && matchesAscii(bytes, commentOffset, 'COMNT')) {
      hasCommentBlock = true;
      const linesStart = commentOffset + SAUCE_COMMENT_HEADER_SIZE;
      for (let i = 0; i < record.commentsCount; i += 1) {
        const start = linesStart + i * SAUCE_COMMENT_LINE_SIZE;
        record.comments.push(decodeCharField(bytes.subarray(start, start + SAUCE_COMMENT_LINE_SIZE), decodeCp437));
      }
      payloadEnd = commentOffset;
    } else {
      recordCodecEvent({ kind: 'sauce-comments-missing' });
    }
  }

  let hasEofByte = false;
  if (payloadEnd > 0 && bytes[payloadEnd - 1] === SUB) {
    hasEofByte = true;
    payloadEnd -= 1;
  }

  return { record, payloadSize: payloadEnd, hasEofByte, hasCommentBlock };
}

export function computePayloadSize(bytes: Uint8Array): number {
  const parsed = parseSauce(bytes);
  return parsed.record.present ? parsed.payloadSize : bytes.length;
}

export function stripSauce(bytes: Uint8Array): Uint8Array {
  return bytes.slice(0, computePayloadSize(bytes));
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

export function filterControlChars(text: string): string {
  let out = '';
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp >= 0x20 && cp !== 0x7f) out += ch;
  }
  return out;
}

export interface SauceDate {
  year: number;
  month: number;
  day: number;
}

function isLeapYear(year: number): boolean {
  return year % 400 === 0 || (year % 4 === 0 && year % 100 !== 0);
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function parseSauceDate(text: string): SauceDate | undefined {
  if (!/^[0-9]{8}$/.test(text)) return undefined;
  const year = parseInt(text.slice(0, 4), 10);
  const month = parseInt(text.slice(4, 6), 10);
  const day = parseInt(text.slice(6, 8), 10);
  if (year < 1900 || year > 9999 || month < 1 || month > 12 || day < 1 || day > 31) return undefined;
  const maxDay = month === 2 && isLeapYear(year) ? 29 : (DAYS_IN_MONTH[month - 1] ?? 31);
  if (day > maxDay) return undefined;
  return { year, month, day };
}

export function formatSauceDate(date: SauceDate): string {
  return `${String(date.year).padStart(4, '0')}${String(date.month).padStart(2, '0')}${String(date.day).padStart(2, '0')}`;
}

export function todaySauceDate(now: Date = new Date()): string {
  return formatSauceDate({ year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() });
}

export function sanitizeRecordForWrite(record: SauceRecord): SauceRecord {
  const digits = record.date.replace(/[^0-9]/g, '');
  return {
    ...record,
    title: filterControlChars(record.title),
    author: filterControlChars(record.author),
    group: filterControlChars(record.group),
    tinfos: filterControlChars(record.tinfos),
    comments: record.comments.map(filterControlChars),
    date: parseSauceDate(digits) ? digits : '',
  };
}

/**
 * Split comment lines into 64 code point chunks, capped at 255 lines.
 */
export function chunkComments(lines: readonly string[]): string[] {
  const out: string[] = [];
  for (const line of lines) {
    const cps = Array.from(line);
    if (cps.length === 0) {
      out.push('');
      continue;
    }
    for (let i = 0; i < cps.length; i += SAUCE_COMMENT_LINE_SIZE) {
      out.push(cps.slice(i, i + SAUCE_COMMENT_LINE_SIZE).join(''));
    }
  }
  return out.slice(0, SAUCE_MAX_COMMENT_LINES);
}

/**
 * Encode a text field into a fixed-width, space-padded byte field.
 * Characters that cannot be represented become '?'.
 */
export function encodeCharField(text: string, width: number, encodeCp437: boolean): Uint8Array {
  const out = new Uint8Array(width).fill(0x20);
  let o = 0;
  for (const ch of text) {
    if (o >= width) break;
    const cp = ch.codePointAt(0) ?? 0x3f;
    if (cp < 0x80) {
      out[o] = cp;
    } else if (encodeCp437) {
      out[o] = unicodeToByte('cp437', cp) ?? 0x3f;
    } else {
      out[o] = 0x3f;
    }
    o += 1;
  }
  return out;
}

export function encodeSauceRecord(record: SauceRecord, commentLines: number, payloadLength: number, encodeCp437: boolean): Uint8Array {
  const rec = new Uint8Array(SAUCE_RECORD_SIZE).fill(0x20);
  for (let i = 0; i < 7; i += 1) rec[i] = 'SAUCE00'.charCodeAt(i);

  rec.set(encodeCharField(record.title, 35, encodeCp437), OFF_TITLE);
  rec.set(encodeCharField(record.author, 20, encodeCp437), OFF_AUTHOR);
  rec.set(encodeCharField(record.group, 20, encodeCp437), OFF_GROUP);
  rec.set(encodeCharField(record.date, 8, false), OFF_DATE);

  writeU32LE(rec, OFF_FILESIZE, record.fileSize || payloadLength);
  rec[OFF_DATATYPE] = record.dataType & 0xff;
  rec[OFF_FILETYPE] = record.fileType & 0xff;
  writeU16LE(rec, OFF_TINFO1, record.tinfo1);
  writeU16LE(rec, OFF_TINFO2, record.tinfo2);
  writeU16LE(rec, OFF_TINFO3, record.tinfo3);
  writeU16LE(rec, OFF_TINFO4, record.tinfo4);
  rec[OFF_COMMENTS] = commentLines & 0xff;
  rec[OFF_TFLAGS] = record.tflags & 0xff;

  const tinfos = encodeCharField(record.tinfos, TINFOS_SIZE, encodeCp437);
  let n = tinfos.length;
  while (n > 0 && tinfos[n - 1] === 0x20) n -= 1;
  rec.fill(0, OFF_TINFOS, OFF_TINFOS + TINFOS_SIZE);
  rec.set(tinfos.subarray(0, n), OFF_TINFOS);

  return rec;
}

/**
 * Append a trailer to `payload`. Returns the payload unchanged when the record is not present.
 */
export function appendSauce(
  payload: Uint8Array,
  record: SauceRecord,
  options: Partial<SauceWriteOptions> = {},
): Uint8Array {
  if (!record.present) return payload;
  const opts: SauceWriteOptions = { ...DEFAULT_SAUCE_WRITE_OPTIONS, ...options };
  const r = sanitizeRecordForWrite(record);

  const commentLines = opts.includeComments && r.comments.length > 0 ? chunkComments(r.comments) : [];
  const commentBlockSize = commentLines.length > 0
    ? SAUCE_COMMENT_HEADER_SIZE + commentLines.length * SAUCE_COMMENT_LINE_SIZE
    : 0;

  const out = new Uint8Array(payload.length + (opts.includeEofByte ? 1 : 0) + commentBlockSize + SAUCE_RECORD_SIZE);
  out.set(payload, 0);
  let at = payload.length;

  if (opts.includeEofByte) {
    out[at] = SUB;
    at += 1;
  }

  if (commentLines.length > 0) {
    for (let i = 0; i < SAUCE_COMMENT_HEADER_SIZE; i += 1) out[at + i] = 'COMNT'.charCodeAt(i);
    at += SAUCE_COMMENT_HEADER_SIZE;
    for (const line of commentLines) {
      out.set(encodeCharField(line, SAUCE_COMMENT_LINE_SIZE, opts.encodeCp437), at);
      at += SAUCE_COMMENT_LINE_SIZE;
    }
  }

  out.set(encodeSauceRecord(r, commentLines.length, payload.length, opts.encodeCp437), at);
  return out;
}
