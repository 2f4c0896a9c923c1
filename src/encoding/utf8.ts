/**
 * Minimal UTF-8 step decoder/encoder used by the codec.
 *
 * Only lead/continuation bit patterns are checked; overlong forms and
 * surrogates decode as-is.
 */

export type Utf8Step =
  | { ok: true; cp: number; next: number }
  | { ok: false; next: number };

export const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

export function decodeUtf8At(bytes: Uint8Array, index: number): Utf8Step {
  const len = bytes.length;
  const c = bytes[index];
  if (c === undefined) return { ok: false, next: len };
  if ((c & 0x80) === 0) return { ok: true, cp: c, next: index + 1 };

  let cp: number;
  let remaining: number;
  if ((c & 0xe0) === 0xc0) { cp = c & 0x1f; remaining = 1; }
  else if ((c & 0xf0) === 0xe0) { cp = c & 0x0f; remaining = 2; }
  else if ((c & 0xf8) === 0xf0) { cp = c & 0x07; remaining = 3; }
  else return { ok: false, next: index + 1 };

  if (index + remaining >= len) return { ok: false, next: index + 1 };

  for (let j = 1; j <= remaining; j += 1) {
    const cc = bytes[index + j] ?? 0;
    if ((cc & 0xc0) !== 0x80) return { ok: false, next: index + 1 };
    cp = (cp << 6) | (cc & 0x3f);
  }

  return { ok: true, cp, next: index + 1 + remaining };
}

export function appendUtf8(cp: number, out: number[]): void {
  if (cp <= 0x7f) {
    out.push(cp);
    return;
  }
  if (cp <= 0x7ff) {
    out.push(0xc0 | ((cp >> 6) & 0x1f), 0x80 | (cp & 0x3f));
    return;
  }
  if (cp <= 0xffff) {
    out.push(0xe0 | ((cp >> 12) & 0x0f), 0x80 | ((cp >> 6) & 0x3f), 0x80 | (cp & 0x3f));
    return;
  }
  out.push(
    0xf0 | ((cp >> 18) & 0x07),
    0x80 | ((cp >> 12) & 0x3f),
    0x80 | ((cp >> 6) & 0x3f),
    0x80 | (cp & 0x3f),
  );
}

export function hasUtf8Bom(bytes: ArrayLike<number>): boolean {
  return bytes.length >= 3 && bytes[0] === UTF8_BOM[0] && bytes[1] === UTF8_BOM[1] && bytes[2] === UTF8_BOM[2];
}
