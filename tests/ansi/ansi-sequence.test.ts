import { describe, expect, it } from 'vitest';
import { classifyCsi, parseParams, scanSequence } from '../../src/ansi/ansi-sequence.js';

const bytesOf = (text: string): Uint8Array => Uint8Array.from(text, (ch) => ch.charCodeAt(0));

describe('parseParams', () => {
  it('splits on semicolons with empty fields as zero', () => {
    expect(parseParams(bytesOf('1;22;333'))).toEqual([1, 22, 333]);
    expect(parseParams(bytesOf(';5'))).toEqual([0, 5]);
    expect(parseParams(bytesOf(''))).toEqual([0]);
  });

  it('skips private markers', () => {
    expect(parseParams(bytesOf('?25'))).toEqual([25]);
  });
});

describe('scanSequence', () => {
  it('returns params, final byte and the next offset', () => {
    expect(scanSequence(bytesOf('1;2Hx'), 0)).toEqual({ kind: 'complete', params: [1, 2], final: 'H', next: 4 });
  });

  it('accepts bang as a terminator', () => {
    const scan = scanSequence(bytesOf('0!'), 0);
    expect(scan.kind === 'complete' && scan.final).toBe('!');
  });

  it('reports unterminated input', () => {
    expect(scanSequence(bytesOf('12;3'), 0)).toEqual({ kind: 'unterminated', consumed: 4 });
  });

  it('gives up after 64 bytes', () => {
    expect(scanSequence(bytesOf('1'.repeat(70) + 'm'), 0)).toEqual({ kind: 'unterminated', consumed: 64 });
  });
});

describe('classifyCsi', () => {
  it('converts cursor positions to 0-based', () => {
    expect(classifyCsi([0], 'H')).toEqual({ type: 'cursor-position', row: 0, col: 0 });
    expect(classifyCsi([5, 10], 'f')).toEqual({ type: 'cursor-position', row: 4, col: 9 });
    expect(classifyCsi([12], 'G')).toEqual({ type: 'cursor-column', col: 11 });
  });

  it('treats a zero count as one', () => {
    expect(classifyCsi([0], 'A')).toEqual({ type: 'cursor-up', count: 1 });
    expect(classifyCsi([3], 'C')).toEqual({ type: 'cursor-forward', count: 3 });
  });

  it('classifies erase, save and restore', () => {
    expect(classifyCsi([2], 'J')).toEqual({ type: 'erase-display', mode: 2 });
    expect(classifyCsi([0], 's')).toEqual({ type: 'save-cursor' });
    expect(classifyCsi([0], 'u')).toEqual({ type: 'restore-cursor' });
  });

  it('needs four parameters for a truecolor triplet', () => {
    expect(classifyCsi([1, 255, 0, 0], 't')).toEqual({ type: 'truecolor-triplet', which: 1, r: 255, g: 0, b: 0 });
    expect(classifyCsi([1, 2, 3], 't')).toEqual({ type: 'ignored', final: 't' });
  });

  it('ignores unsupported finals', () => {
    expect(classifyCsi([1], 'K')).toEqual({ type: 'ignored', final: 'K' });
  });
});
