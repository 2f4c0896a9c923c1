/**
 * Recoverable conditions met while decoding art, counted in process.
 * Nothing recorded here changes codec output.
 */

export type CodecEvent =
  | { kind: 'xbin-rejected' }
  | { kind: 'escape-skipped' }
  | { kind: 'sequence-abandoned' }
  | { kind: 'sequence-ignored'; final: string }
  | { kind: 'sgr-unknown'; code: number }
  | { kind: 'sauce-comments-missing' };

export type CodecEventKind = CodecEvent['kind'];

export type CodecDiagnostics = {
  totals: Record<CodecEventKind, number>;
  /** Ignored CSI sequences keyed by final byte. */
  ignoredFinals: Record<string, number>;
  /** Unrecognized SGR parameters keyed by decimal code. */
  unknownSgrCodes: Record<string, number>;
};

function emptyTotals(): Record<CodecEventKind, number> {
  return {
    'xbin-rejected': 0,
    'escape-skipped': 0,
    'sequence-abandoned': 0,
    'sequence-ignored': 0,
    'sgr-unknown': 0,
    'sauce-comments-missing': 0,
  };
}

let totals = emptyTotals();
const ignoredFinals = new Map<string, number>();
const unknownSgrCodes = new Map<string, number>();

function bump(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

export function recordCodecEvent(event: CodecEvent): void {
  totals[event.kind] += 1;
  if (event.kind === 'sequence-ignored') bump(ignoredFinals, event.final);
  else if (event.kind === 'sgr-unknown') bump(unknownSgrCodes, String(event.code));
}

export function codecEventCount(kind: CodecEventKind): number {
  return totals[kind];
}

export function getCodecDiagnostics(): CodecDiagnostics {
  return {
    totals: { ...totals },
    ignoredFinals: Object.fromEntries(ignoredFinals),
    unknownSgrCodes: Object.fromEntries(unknownSgrCodes),
  };
}

/** One line per non-zero kind, e.g. `sgr-unknown 2 (8x2)`. */
export function describeCodecDiagnostics(d: CodecDiagnostics): string[] {
  const breakdown = (entries: Record<string, number>): string =>
    Object.entries(entries)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, count]) => `${key}x${count}`)
      .join(' ');

  const lines: string[] = [];
  for (const [kind, count] of Object.entries(d.totals)) {
    if (count === 0) continue;
    let detail = '';
    if (kind === 'sequence-ignored') detail = ` (${breakdown(d.ignoredFinals)})`;
    else if (kind === 'sgr-unknown') detail = ` (${breakdown(d.unknownSgrCodes)})`;
    lines.push(`${kind} ${count}${detail}`);
  }
  return lines;
}

export function resetCodecDiagnostics(): void {
  totals = emptyTotals();
  ignoredFinals.clear();
  unknownSgrCodes.clear();
}
