import { listPresets } from '../../ansi/ansi-presets.js';
import type { Logger } from '../../infra/logger.js';

export function presetsCommand(logger: Logger): number {
  const presets = listPresets();
  const width = Math.max(...presets.map((p) => p.id.length));
  for (const p of presets) {
    logger.info(`${p.id.padEnd(width)}  ${p.name}`);
  }
  return 0;
}
