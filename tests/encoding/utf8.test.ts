import { describe, expect, it } from 'vitest';
import { appendUtf8, decodeUtf8At, hasUtf8Bom } from '../../src/encoding/utf8.js';

describe('decodeUtf8At', () => {
  it('decodes ASCII', () => {
    expect(decodeUtf8At(new Uint8Array([0x41]), 0)).toEqual({ ok: true, cp: 0x41, next: 1 });
  });

  it('decodes a three-byte sequence', () => {
    const bytes = new Uint8Array([0xe2, 0x96, 0x88]);
    expect(decodeUtf8At(bytes, 0)).toEqual({ ok: true, cp: 0x2588, next: 3 });
  });

  it('decodes a four-byte sequence', () => {
    const bytes = new Uint8Array([0xf0, 0x9f, 0x98, 0x80]);
    expect(decodeUtf8At(bytes, 0)).toEqual({ ok: true, cp: 0x1f600, next: 4 });
  });

  it('rejects a stray continuation byte', () => {
    expect(decodeUtf8At(new Uint8Array([0x80, 0x41]), 0)).toEqual({ ok: false, next: 1 });
  });

  it('rejects a truncated sequence', () => {
    expect(decodeUtf8At(new Uint8Array([0xe2, 0x96]), 0)).toEqual({ ok: false, next: 1 });
  });

  it('rejects a bad continuation', () => {
    expect(decodeUtf8At(new Uint8Array([0xc3, 0x41]), 0)).toEqual({ ok: false, next: 1 });
  });

  it('reports end of input', () => {
    expect(decodeUtf8At(new Uint8Array([0x41]), 1)).toEqual({ ok: false, next: 1 });
  });
});

describe('appendUtf8', () => {
  it('encodes each length class', () => {
    const out: number[] = [];
    appendUtf8(0x41, out);
    appendUtf8(0xe9, out);
    appendUtf8(0x2588, out);
    appendUtf8(0x1f600, out);
    expect(out).toEqual([0x41, 0xc3, 0xa9, 0xe2, 0x96, 0x88, 0xf0, 0x9f, 0x98, 0x80]);
  });
});

describe('hasUtf8Bom', () => {
  it('detects the byte order mark', () => {
    expect(hasUtf8Bom(new Uint8Array([0xef, 0xbb, 0xbf, 0x41]))).toBe(true);
    expect(hasUtf8Bom(new Uint8Array([0xef, 0xbb]))).toBe(false);
  });
});
