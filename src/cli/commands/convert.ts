import { describeCodecDiagnostics, getCodecDiagnostics, resetCodecDiagnostics } from '../../ansi/ansi-diagnostics.js';
import { importAnsiFile } from '../../ansi/ansi-importer.js';
import { exportAnsiFile } from '../../ansi/ansi-exporter.js';
import { resolvePresetOptions } from '../../ansi/ansi-presets.js';
import type { ExportOptions, ImportOptions } from '../../ansi/ansi-types.js';
import type { AppConfig } from '../../config/index.js';
import type { Logger } from '../../infra/logger.js';
import { parseConvertCommand } from '../common/arg-parsers.js';

export const CONVERT_USAGE =
  'Usage: ansiloom convert <input> <output> [--preset id] [--columns n] [--utf8] [--no-ice] [--sauce|--no-sauce]';

export function convertCommand(args: readonly string[], config: AppConfig, logger: Logger): number {
  const parsed = parseConvertCommand(args);
  if (parsed.showUsage) {
    logger.info(CONVERT_USAGE);
    return 0;
  }
  if (parsed.error) {
    logger.error(parsed.error);
    return 1;
  }
  if (!parsed.input || !parsed.output) {
    logger.error(CONVERT_USAGE);
    return 1;
  }

  const presetId = parsed.preset ?? config.preset;
  const importOverrides: Partial<ImportOptions> = {
    columns: parsed.columns ?? config.columns,
    iceColors: parsed.iceColors ?? config.iceColors,
  };
  if (parsed.utf8 || config.textEncoding === 'utf8') importOverrides.textEncoding = 'utf8';
  const exportOverrides: Partial<ExportOptions> = {};
  if (parsed.iceColors !== undefined) exportOverrides.iceColors = parsed.iceColors;
  if (parsed.writeSauce !== undefined) exportOverrides.writeSauce = parsed.writeSauce;

  const options = resolvePresetOptions(presetId, { importOptions: importOverrides, exportOptions: exportOverrides });
  if (!options) {
    logger.error(`Unknown preset: ${presetId}`);
    return 1;
  }

  resetCodecDiagnostics();
  const imported = importAnsiFile(parsed.input, options.importOptions);
  if (!imported.ok) {
    logger.error(imported.error);
    return 1;
  }
  const { document, detected } = imported;
  logger.debug(
    `Imported ${parsed.input}: ${document.columns}x${document.rows}, ${detected.utf8 ? 'utf-8' : detected.byteEncoding}, palette ${document.palette}`,
  );
  for (const line of describeCodecDiagnostics(getCodecDiagnostics())) logger.debug(`  ${line}`);

  const exported = exportAnsiFile(parsed.output, document, options.exportOptions);
  if (!exported.ok) {
    logger.error(exported.error);
    return 1;
  }

  logger.success(`Wrote ${parsed.output} (${exported.bytes.length} bytes, preset ${presetId})`);
  return 0;
}
