import { beforeEach, describe, expect, it } from 'vitest';
import {
  codecEventCount,
  describeCodecDiagnostics,
  getCodecDiagnostics,
  recordCodecEvent,
  resetCodecDiagnostics,
} from '../../src/ansi/ansi-diagnostics.js';

describe('codec diagnostics', () => {
  beforeEach(() => {
    resetCodecDiagnostics();
  });

  it('counts events by kind with per-code and per-final breakdowns', () => {
    recordCodecEvent({ kind: 'sgr-unknown', code: 8 });
    recordCodecEvent({ kind: 'sgr-unknown', code: 8 });
    recordCodecEvent({ kind: 'sgr-unknown', code: 60 });
    recordCodecEvent({ kind: 'sequence-ignored', final: 'K' });
    recordCodecEvent({ kind: 'escape-skipped' });

    expect(codecEventCount('sgr-unknown')).toBe(3);
    expect(getCodecDiagnostics()).toEqual({
      totals: {
        'xbin-rejected': 0,
        'escape-skipped': 1,
        'sequence-abandoned': 0,
        'sequence-ignored': 1,
        'sgr-unknown': 3,
        'sauce-comments-missing': 0,
      },
      ignoredFinals: { K: 1 },
      unknownSgrCodes: { '8': 2, '60': 1 },
    });
  });

  it('returns a detached snapshot', () => {
    const snapshot = getCodecDiagnostics();
    recordCodecEvent({ kind: 'xbin-rejected' });
    expect(snapshot.totals['xbin-rejected']).toBe(0);
    expect(codecEventCount('xbin-rejected')).toBe(1);
  });

  it('describes non-zero kinds only', () => {
    recordCodecEvent({ kind: 'sgr-unknown', code: 60 });
    recordCodecEvent({ kind: 'sgr-unknown', code: 8 });
    recordCodecEvent({ kind: 'sequence-abandoned' });
    expect(describeCodecDiagnostics(getCodecDiagnostics())).toEqual([
      'sequence-abandoned 1',
      'sgr-unknown 2 (60x1 8x1)',
    ]);
  });

  it('resets counters and breakdowns', () => {
    recordCodecEvent({ kind: 'sequence-ignored', final: 'h' });
    resetCodecDiagnostics();
    expect(codecEventCount('sequence-ignored')).toBe(0);
    expect(getCodecDiagnostics().ignoredFinals).toEqual({});
  });
});
