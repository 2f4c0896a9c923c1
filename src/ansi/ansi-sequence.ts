/**
 * CSI scanning and classification.
 *
 * The scanner starts right after `ESC [`. A sequence ends at the first byte
 * in 0x40..0x7E or at '!' (emitted by some DOS-era editors); at most 64
 * bytes are examined.
 */

export const SEQUENCE_MAX_LENGTH = 64;

export type CsiScan =
  | { kind: 'complete'; params: number[]; final: string; next: number }
  | { kind: 'unterminated'; consumed: number };

export type CsiCommand =
  | { type: 'cursor-position'; row: number; col: number }
  | { type: 'cursor-up'; count: number }
  | { type: 'cursor-down'; count: number }
  | { type: 'cursor-forward'; count: number }
  | { type: 'cursor-back'; count: number }
  | { type: 'cursor-column'; col: number }
  | { type: 'save-cursor' }
  | { type: 'restore-cursor' }
  | { type: 'erase-display'; mode: number }
  | { type: 'sgr'; params: number[] }
  | { type: 'truecolor-triplet'; which: number; r: number; g: number; b: number }
  | { type: 'ignored'; final: string };

export function isSequenceTerminator(byte: number): boolean {
  return (byte >= 0x40 && byte <= 0x7e) || byte === 0x21;
}

/**
 * Digits accumulate, ';' separates (empty field = 0), anything else is
 * skipped. Always yields at least one value.
 */
export function parseParams(bytes: ArrayLike<number>, start = 0, end = bytes.length): number[] {
  const out: number[] = [];
  let cur = 0;
  let have = false;
  for (let i = start; i < end; i += 1) {
    const b = bytes[i] ?? 0;
    if (b >= 0x30 && b <= 0x39) {
      have = true;
      cur = cur * 10 + (b - 0x30);
      continue;
    }
    if (b === 0x3b) {
      out.push(have ? cur : 0);
      cur = 0;
      have = false;
    }
  }
  out.push(have ? cur : 0);
  return out;
}

export function scanSequence(bytes: Uint8Array, start: number, end: number = bytes.length): CsiScan {
  let j = start;
  let consumed = 0;
  while (j < end && consumed < SEQUENCE_MAX_LENGTH) {
    const b = bytes[j] ?? 0;
    if (isSequenceTerminator(b)) {
      return {
        kind: 'complete',
        params: parseParams(bytes, start, j),
        final: String.fromCharCode(b),
        next: j + 1,
      };
    }
    j += 1;
    consumed += 1;
  }
  return { kind: 'unterminated', consumed };
}

export function param(params: readonly number[], index: number, fallback: number): number {
  return index < params.length ? (params[index] ?? fallback) : fallback;
}

function count(params: readonly number[]): number {
  return param(params, 0, 0) || 1;
}

export function classifyCsi(params: readonly number[], final: string): CsiCommand {
  switch (final) {
    case 'H':
    case 'f':
      return {
        type: 'cursor-position',
        row: Math.max(0, (param(params, 0, 1) || 1) - 1),
        col: Math.max(0, (param(params, 1, 1) || 1) - 1),
      };
    case 'A':
      return { type: 'cursor-up', count: count(params) };
    case 'B':
      return { type: 'cursor-down', count: count(params) };
    case 'C':
      return { type: 'cursor-forward', count: count(params) };
    case 'D':
      return { type: 'cursor-back', count: count(params) };
    case 'G':
      return { type: 'cursor-column', col: Math.max(0, (param(params, 0, 1) || 1) - 1) };
    case 's':
      return { type: 'save-cursor' };
    case 'u':
      return { type: 'restore-cursor' };
    case 'J':
      return { type: 'erase-display', mode: param(params, 0, 0) };
    case 'm':
      return { type: 'sgr', params: [...params] };
    case 't':
      if (params.length < 4) return { type: 'ignored', final };
      return {
        type: 'truecolor-triplet',
        which: param(params, 0, 0),
        r: param(params, 1, 0),
        g: param(params, 2, 0),
        b: param(params, 3, 0),
      };
    default:
      return { type: 'ignored', final };
  }
}
