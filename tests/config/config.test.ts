import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CONFIG,
  loadConfig,
  normalizeLogLevel,
  normalizePreset,
  normalizeTextEncoding,
  parseBooleanInput,
  parseColumnsInput,
} from '../../src/config/index.js';

describe('config parsing', () => {
  it('parses boolean switches', () => {
    expect(parseBooleanInput('ON')).toBe(true);
    expect(parseBooleanInput(' no ')).toBe(false);
    expect(parseBooleanInput('maybe')).toBeUndefined();
    expect(parseBooleanInput(undefined)).toBeUndefined();
  });

  it('parses and clamps columns', () => {
    expect(parseColumnsInput(' 132 ')).toBe(132);
    expect(parseColumnsInput('0')).toBe(0);
    expect(parseColumnsInput('9999')).toBe(4096);
    expect(parseColumnsInput('-5')).toBeUndefined();
    expect(parseColumnsInput('abc')).toBeUndefined();
  });

  it('normalizes enumerations with fallbacks', () => {
    expect(normalizeTextEncoding('UTF-8')).toBe('utf8');
    expect(normalizeTextEncoding('latin1')).toBe('auto');
    expect(normalizePreset(' Moebius-Classic ')).toBe('moebius-classic');
    expect(normalizePreset('nope')).toBe('scene-classic');
    expect(normalizeLogLevel('WARN')).toBe('warn');
    expect(normalizeLogLevel(3)).toBe('info');
  });
});

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads every variable', () => {
    expect(
      loadConfig({
        ANSILOOM_PRESET: 'modern-utf8-256',
        ANSILOOM_COLUMNS: '160',
        ANSILOOM_ICE_COLORS: 'off',
        ANSILOOM_LOG_LEVEL: 'debug',
        ANSILOOM_TEXT_ENCODING: 'utf8',
      }),
    ).toEqual({
      preset: 'modern-utf8-256',
      columns: 160,
      iceColors: false,
      logLevel: 'debug',
      textEncoding: 'utf8',
    });
  });
});
