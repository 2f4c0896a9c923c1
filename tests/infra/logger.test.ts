import chalk from 'chalk';
import { beforeAll, describe, expect, it } from 'vitest';
import { createLogger, isLogLevel, type LogSink } from '../../src/infra/logger.js';

function memorySink(): LogSink & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return { lines, errors, out: (line) => lines.push(line), err: (line) => errors.push(line) };
}

describe('createLogger', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('routes levels to the right stream', () => {
    const sink = memorySink();
    const logger = createLogger('debug', sink);
    logger.debug('d');
    logger.info('i');
    logger.success('s');
    logger.warn('w');
    logger.error('e');
    expect(sink.lines).toEqual(['d', 'i', 's']);
    expect(sink.errors).toEqual(['w', 'e']);
  });

  it('drops messages below the threshold', () => {
    const sink = memorySink();
    const logger = createLogger('warn', sink);
    logger.info('hidden');
    logger.warn('shown');
    expect(sink.lines).toEqual([]);
    expect(sink.errors).toEqual(['shown']);
  });

  it('stays quiet when silent', () => {
    const sink = memorySink();
    createLogger('silent', sink).error('nope');
    expect(sink.errors).toEqual([]);
  });

  it('sanitizes messages', () => {
    const sink = memorySink();
    createLogger('info', sink).info('title\x07');
    expect(sink.lines).toEqual(['title.']);
  });

  it('recognizes level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
