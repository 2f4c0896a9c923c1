/**
 * Glyph ids: a 32-bit value that is either a Unicode scalar or a token.
 *
 * Token layout: bit 31 set, bits 28-30 kind, bits 0-11 index.
 */

import { cp437ToUnicode } from './codepages.js';

export type GlyphId = number;

export type GlyphKind = 'unicode' | 'bitmap-index' | 'embedded-index';

const TOKEN_BIT = 0x80000000;
const KIND_MASK = 0x70000000;
const KIND_SHIFT = 28;
const INDEX_MASK = 0x0fff;

const KIND_BITMAP = 1;
const KIND_EMBEDDED = 2;

export const SPACE = 0x20;

export function isToken(g: GlyphId): boolean {
  return (g & TOKEN_BIT) !== 0;
}

export function glyphKind(g: GlyphId): GlyphKind {
  if (!isToken(g)) return 'unicode';
  const kind = (g & KIND_MASK) >>> KIND_SHIFT;
  if (kind === KIND_BITMAP) return 'bitmap-index';
  if (kind === KIND_EMBEDDED) return 'embedded-index';
  return 'unicode';
}

export function makeUnicodeGlyph(cp: number): GlyphId {
  return cp >>> 0;
}

export function makeBitmapIndexGlyph(index: number): GlyphId {
  return (TOKEN_BIT | (KIND_BITMAP << KIND_SHIFT) | (index & INDEX_MASK)) >>> 0;
}

export function makeEmbeddedIndexGlyph(index: number): GlyphId {
  return (TOKEN_BIT | (KIND_EMBEDDED << KIND_SHIFT) | (index & INDEX_MASK)) >>> 0;
}

export function glyphIndex(g: GlyphId): number {
  return g & INDEX_MASK;
}

export function isBlankGlyph(g: GlyphId): boolean {
  if (!isToken(g)) return g === SPACE;
  const kind = glyphKind(g);
  if (kind === 'bitmap-index' || kind === 'embedded-index') return glyphIndex(g) === SPACE;
  return false;
}

/** Blank, or the empty glyph 0 left by layers that never wrote the cell. */
export function isBlankishGlyph(g: GlyphId): boolean {
  return g === 0 || isBlankGlyph(g);
}

export function toUnicodeRepresentative(g: GlyphId): number {
  if (!isToken(g)) return g;
  const kind = glyphKind(g);
  if (kind === 'bitmap-index' || kind === 'embedded-index') return cp437ToUnicode(glyphIndex(g) & 0xff);
  return 0x3f;
}
