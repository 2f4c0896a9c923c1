import { describe, expect, it } from 'vitest';
import { parseConvertCommand, parseInfoCommand } from '../../src/cli/common/arg-parsers.js';

describe('parseConvertCommand', () => {
  it('reads positionals and flags', () => {
    expect(parseConvertCommand(['in.ans', 'out.ans', '--preset', 'modern-utf8-256', '--columns=132', '--utf8', '--no-ice', '--sauce'])).toEqual({
      utf8: true,
      preset: 'modern-utf8-256',
      columns: 132,
      iceColors: false,
      writeSauce: true,
      input: 'in.ans',
      output: 'out.ans',
    });
  });

  it('reports usage requests', () => {
    expect(parseConvertCommand(['-h']).showUsage).toBe(true);
  });

  it('rejects bad values and unknown options', () => {
    expect(parseConvertCommand(['--preset']).error).toBe('Missing value for --preset');
    expect(parseConvertCommand(['--columns', 'wide']).error).toBe('Invalid value for --columns: wide');
    expect(parseConvertCommand(['--bogus']).error).toBe('Unknown option: --bogus');
  });

  it('does not take a following flag as a value', () => {
    expect(parseConvertCommand(['--preset', '--utf8']).error).toBe('Missing value for --preset');
  });
});

describe('parseInfoCommand', () => {
  it('reads the input path', () => {
    expect(parseInfoCommand(['art.ans'])).toEqual({ input: 'art.ans' });
    expect(parseInfoCommand(['--help'])).toEqual({ showUsage: true });
  });
});
