import { describe, expect, it } from 'vitest';
import { sanitizePath, stripControlChars, truncateContent } from '../../src/infra/log-sanitizer.js';

describe('log sanitizer', () => {
  it('truncates long content', () => {
    expect(truncateContent('abcdef', 3)).toBe('abc...');
    expect(truncateContent('abc', 3)).toBe('abc');
  });

  it('replaces the home directory', () => {
    expect(sanitizePath('/home/tester/art/a.ans', '/home/tester')).toBe('~/art/a.ans');
    expect(sanitizePath('/tmp/a.ans', '')).toBe('/tmp/a.ans');
  });

  it('masks control characters but keeps tabs and newlines', () => {
    expect(stripControlChars('a\x1b[31mb\tc\nd\x7f')).toBe('a.[31mb\tc\nd.');
  });
});
