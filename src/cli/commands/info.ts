import { importAnsiFile } from '../../ansi/ansi-importer.js';
import type { AppConfig } from '../../config/index.js';
import { truncateContent } from '../../infra/log-sanitizer.js';
import type { Logger } from '../../infra/logger.js';
import { parseInfoCommand } from '../common/arg-parsers.js';

export const INFO_USAGE = 'Usage: ansiloom info <input>';

export function describeFields(fields: ReadonlyArray<readonly [string, string | number]>): string[] {
  const width = Math.max(...fields.map(([label]) => label.length));
  return fields.map(([label, value]) => `${label.padEnd(width)}  ${value}`);
}

export function infoCommand(args: readonly string[], config: AppConfig, logger: Logger): number {
  const parsed = parseInfoCommand(args);
  if (parsed.showUsage) {
    logger.info(INFO_USAGE);
    return 0;
  }
  if (!parsed.input) {
    logger.error(INFO_USAGE);
    return 1;
  }

  const result = importAnsiFile(parsed.input, {
    columns: config.columns,
    iceColors: config.iceColors,
    textEncoding: config.textEncoding,
  });
  if (!result.ok) {
    logger.error(result.error);
    return 1;
  }

  const { document, detected } = result;
  const sauce = document.sauce;
  const fields: Array<readonly [string, string | number]> = [
    ['File', parsed.input],
    ['Columns', document.columns],
    ['Rows', document.rows],
    ['Encoding', detected.utf8 ? 'utf-8' : detected.byteEncoding],
    ['Palette', document.paletteTitle ? `${document.palette} (${document.paletteTitle})` : document.palette],
    ['Payload', `${detected.payloadSize} bytes`],
  ];
  if (sauce.title) fields.push(['Title', sauce.title]);
  if (sauce.author) fields.push(['Author', sauce.author]);
  if (sauce.group) fields.push(['Group', sauce.group]);
  if (sauce.date) fields.push(['Date', sauce.date]);
  if (sauce.tinfos) fields.push(['Font', sauce.tinfos]);

  for (const line of describeFields(fields)) logger.info(line);
  for (const comment of sauce.comments) logger.info(`  ${truncateContent(comment)}`);
  return 0;
}
