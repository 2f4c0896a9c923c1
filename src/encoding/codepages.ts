/**
 * Fixed byte <-> Unicode tables for legacy 8-bit character sets.
 *
 * Tables map every byte to one scalar. DOS/OEM tables render 0x01..0x1F and
 * 0x7F as the PC BIOS glyphs (smileys, arrows, house) rather than controls.
 */

import { readDataJson } from '../infra/data-files.js';

export const BYTE_ENCODINGS = [
  'cp437',
  'cp850',
  'cp852',
  'cp855',
  'cp857',
  'cp860',
  'cp861',
  'cp862',
  'cp863',
  'cp865',
  'cp866',
  'cp775',
  'cp737',
  'cp869',
  'amiga-latin1',
  'amiga-iso8859-15',
  'amiga-iso8859-2',
] as const;

export type ByteEncoding = (typeof BYTE_ENCODINGS)[number];

const forwardTables = new Map<ByteEncoding, readonly number[]>();
const reverseTables = new Map<ByteEncoding, Map<number, number>>();

export function isByteEncoding(value: unknown): value is ByteEncoding {
  return typeof value === 'string' && BYTE_ENCODINGS.some((id) => id === value);
}

let rawTables: unknown;

function loadTable(encoding: ByteEncoding): readonly number[] {
  if (rawTables === undefined) rawTables = readDataJson('codepage-tables.json');
  const table: unknown = typeof rawTables === 'object' && rawTables !== null ? Reflect.get(rawTables, encoding) : undefined;
  if (!Array.isArray(table) || table.length !== 256 || !table.every((cp): cp is number => typeof cp === 'number')) {
    throw new Error(`Codepage table missing or malformed: ${encoding}`);
  }
  return table;
}

function forwardTable(encoding: ByteEncoding): readonly number[] {
  const cached = forwardTables.get(encoding);
  if (cached) return cached;
  const table = loadTable(encoding);
  forwardTables.set(encoding, table);
  return table;
}

function reverseTable(encoding: ByteEncoding): Map<number, number> {
  const cached = reverseTables.get(encoding);
  if (cached) return cached;

  // Not every table is bijective; the first byte for a scalar wins.
  const map = new Map<number, number>();
  forwardTable(encoding).forEach((cp, byte) => {
    if (!map.has(cp)) map.set(cp, byte);
  });
  reverseTables.set(encoding, map);
  return map;
}

export function byteToUnicode(encoding: ByteEncoding, byte: number): number {
  return forwardTable(encoding)[byte & 0xff] ?? 0xfffd;
}

export function unicodeToByte(encoding: ByteEncoding, cp: number): number | undefined {
  return reverseTable(encoding).get(cp);
}

export function unicodeToByteOr(encoding: ByteEncoding, cp: number, fallback: number): number {
  return unicodeToByte(encoding, cp) ?? fallback;
}

export function cp437ToUnicode(byte: number): number {
  return byteToUnicode('cp437', byte);
}

/**
 * Decode a byte run into a string, one scalar per byte.
 */
export function decodeBytes(encoding: ByteEncoding, bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += String.fromCodePoint(byteToUnicode(encoding, b));
  return out;
}
