import { beforeEach, describe, expect, it } from 'vitest';
import {
  appendSauce,
  chunkComments,
  computePayloadSize,
  emptySauceRecord,
  encodeCharField,
  filterControlChars,
  formatSauceDate,
  parseSauce,
  parseSauceDate,
  SAUCE_RECORD_SIZE,
  SauceDataType,
  sanitizeRecordForWrite,
  stripSauce,
  todaySauceDate,
  type SauceRecord,
} from '../../src/sauce/sauce.js';
import { codecEventCount, resetCodecDiagnostics } from '../../src/ansi/ansi-diagnostics.js';

function sampleRecord(overrides: Partial<SauceRecord> = {}): SauceRecord {
  return {
    ...emptySauceRecord(),
    present: true,
    title: 'Test Title',
    author: 'someone',
    group: 'crew',
    date: '20240229',
    tinfo1: 80,
    tinfo2: 1,
    tinfos: 'IBM VGA',
    ...overrides,
  };
}

const PAYLOAD = new Uint8Array([0x41, 0x42]);

describe('parseSauce', () => {
  beforeEach(() => {
    resetCodecDiagnostics();
  });

  it('reports no record for short input', () => {
    const parsed = parseSauce(PAYLOAD);
    expect(parsed.record.present).toBe(false);
    expect(parsed.payloadSize).toBe(2);
  });

  it('reads back a written record with comments', () => {
    const bytes = appendSauce(PAYLOAD, sampleRecord({ comments: ['hello'] }));
    expect(bytes.length).toBe(2 + 1 + 5 + 64 + SAUCE_RECORD_SIZE);

    const parsed = parseSauce(bytes);
    expect(parsed.payloadSize).toBe(2);
    expect(parsed.hasEofByte).toBe(true);
    expect(parsed.hasCommentBlock).toBe(true);
    expect(parsed.record).toMatchObject({
      present: true,
      title: 'Test Title',
      author: 'someone',
      group: 'crew',
      date: '20240229',
      fileSize: 2,
      dataType: SauceDataType.Character,
      fileType: 1,
      tinfo1: 80,
      tinfo2: 1,
      commentsCount: 1,
      tinfos: 'IBM VGA',
      comments: ['hello'],
    });
  });

  it('decodes cp437 bytes in text fields', () => {
    const bytes = appendSauce(PAYLOAD, sampleRecord({ title: 'café' }));
    expect(parseSauce(bytes).record.title).toBe('café');
    expect(parseSauce(bytes, false).record.title).toBe('caf\u0082');
  });

  it('counts a declared comment block that is missing', () => {
    const bytes = appendSauce(PAYLOAD, sampleRecord());
    bytes[bytes.length - SAUCE_RECORD_SIZE + 104] = 2;

    const parsed = parseSauce(bytes);
    expect(parsed.hasCommentBlock).toBe(false);
    expect(parsed.record.comments).toEqual([]);
    expect(parsed.payloadSize).toBe(2);
    expect(codecEventCount('sauce-comments-missing')).toBe(1);
  });

  it('keeps the stored file size', () => {
    const bytes = appendSauce(PAYLOAD, sampleRecord({ fileSize: 1234 }));
    expect(parseSauce(bytes).record.fileSize).toBe(1234);
  });
});

describe('appendSauce', () => {
  it('returns the payload unchanged when no record is present', () => {
    expect(appendSauce(PAYLOAD, emptySauceRecord())).toBe(PAYLOAD);
  });

  it('omits the EOF byte and comments on request', () => {
    const bytes = appendSauce(PAYLOAD, sampleRecord({ comments: ['x'] }), { includeEofByte: false, includeComments: false });
    expect(bytes.length).toBe(2 + SAUCE_RECORD_SIZE);
    expect(bytes[2]).toBe(0x53);
    const parsed = parseSauce(bytes);
    expect(parsed.hasEofByte).toBe(false);
    expect(parsed.record.commentsCount).toBe(0);
  });

  it('drops an invalid date', () => {
    const bytes = appendSauce(PAYLOAD, sampleRecord({ date: '20230229' }));
    expect(parseSauce(bytes).record.date).toBe('');
  });

  it('zero-pads the font name field', () => {
    const bytes = appendSauce(PAYLOAD, sampleRecord({ tinfos: 'Spleen' }), { includeEofByte: false });
    const at = 2 + 106;
    expect(Array.from(bytes.subarray(at, at + 7))).toEqual([0x53, 0x70, 0x6c, 0x65, 0x65, 0x6e, 0]);
  });
});

describe('stripSauce', () => {
  it('removes the trailer', () => {
    const bytes = appendSauce(PAYLOAD, sampleRecord({ comments: ['a', 'b'] }));
    expect(computePayloadSize(bytes)).toBe(2);
    expect(Array.from(stripSauce(bytes))).toEqual([0x41, 0x42]);
  });

  it('leaves plain payloads alone', () => {
    expect(Array.from(stripSauce(PAYLOAD))).toEqual([0x41, 0x42]);
  });
});

describe('dates', () => {
  it('validates calendar dates', () => {
    expect(parseSauceDate('20240229')).toEqual({ year: 2024, month: 2, day: 29 });
    expect(parseSauceDate('20000229')).toEqual({ year: 2000, month: 2, day: 29 });
    expect(parseSauceDate('19000229')).toBeUndefined();
    expect(parseSauceDate('20240431')).toBeUndefined();
    expect(parseSauceDate('18991231')).toBeUndefined();
    expect(parseSauceDate('2024-01-01')).toBeUndefined();
  });

  it('formats dates as CCYYMMDD', () => {
    expect(formatSauceDate({ year: 1996, month: 3, day: 7 })).toBe('19960307');
    expect(todaySauceDate(new Date(2024, 0, 5))).toBe('20240105');
  });
});

describe('text helpers', () => {
  it('filters control characters', () => {
    expect(filterControlChars('a\tb\nc\u007fd')).toBe('abcd');
  });

  it('sanitizes a record for writing', () => {
    const record = sanitizeRecordForWrite(sampleRecord({ title: 'a\u0001b', date: '2024-02-29' }));
    expect(record.title).toBe('ab');
    expect(record.date).toBe('20240229');
  });

  it('chunks long comment lines', () => {
    const lines = chunkComments(['a'.repeat(130), '']);
    expect(lines.map((line) => line.length)).toEqual([64, 64, 2, 0]);
  });

  it('caps comment lines', () => {
    expect(chunkComments(Array.from({ length: 300 }, () => 'x')).length).toBe(255);
  });

  it('encodes fields with a replacement character', () => {
    expect(Array.from(encodeCharField('é☺', 4, true))).toEqual([0x82, 0x01, 0x20, 0x20]);
    expect(Array.from(encodeCharField('é', 2, false))).toEqual([0x3f, 0x20]);
    expect(Array.from(encodeCharField('abc', 2, true))).toEqual([0x61, 0x62]);
  });
});
