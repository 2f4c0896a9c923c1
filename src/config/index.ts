/**
 * Environment-driven defaults for the command line.
 */

import { isLogLevel, type LogLevel } from '../infra/logger.js';
import { isPresetId, type PresetId } from '../ansi/ansi-presets.js';
import { MAX_COLUMNS, type ImportTextEncoding } from '../ansi/ansi-types.js';

export type AppConfig = {
  preset: PresetId;
  /** 0 = auto-detect. */
  columns: number;
  iceColors: boolean;
  logLevel: LogLevel;
  textEncoding: ImportTextEncoding;
};

export const DEFAULT_CONFIG: Readonly<AppConfig> = Object.freeze({
  preset: 'scene-classic',
  columns: 0,
  iceColors: true,
  logLevel: 'info',
  textEncoding: 'auto',
});

export function parseBooleanInput(value: unknown): boolean | undefined {
  if (typeof value !== 'string') return undefined;
  const lowered = value.trim().toLowerCase();
  if (lowered === 'on' || lowered === 'true' || lowered === '1' || lowered === 'yes' || lowered === 'y') return true;
  if (lowered === 'off' || lowered === 'false' || lowered === '0' || lowered === 'no' || lowered === 'n') return false;
  return undefined;
}

export function parseColumnsInput(value: unknown): number | undefined {
  if (typeof value !== 'string' || !/^\s*\d+\s*$/.test(value)) return undefined;
  const n = parseInt(value, 10);
  if (n === 0) return 0;
  return Math.max(1, Math.min(MAX_COLUMNS, n));
}

export function normalizeTextEncoding(value: unknown): ImportTextEncoding {
  if (typeof value !== 'string') return 'auto';
  const lowered = value.trim().toLowerCase();
  if (lowered === 'utf8' || lowered === 'utf-8') return 'utf8';
  return 'auto';
}

export function normalizePreset(value: unknown): PresetId {
  const trimmed = typeof value === 'string' ? value.trim().toLowerCase() : value;
  return isPresetId(trimmed) ? trimmed : DEFAULT_CONFIG.preset;
}

export function normalizeLogLevel(value: unknown): LogLevel {
  const trimmed = typeof value === 'string' ? value.trim().toLowerCase() : value;
  return isLogLevel(trimmed) ? trimmed : DEFAULT_CONFIG.logLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    preset: normalizePreset(env.ANSILOOM_PRESET),
    columns: parseColumnsInput(env.ANSILOOM_COLUMNS) ?? DEFAULT_CONFIG.columns,
    iceColors: parseBooleanInput(env.ANSILOOM_ICE_COLORS) ?? DEFAULT_CONFIG.iceColors,
    logLevel: normalizeLogLevel(env.ANSILOOM_LOG_LEVEL),
    textEncoding: normalizeTextEncoding(env.ANSILOOM_TEXT_ENCODING),
  };
}
