import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * Read a JSON table shipped in the package's `data/` directory.
 * Resolves from the source tree and from the bundled `dist/` entries.
 */
export function readDataJson(name: string): unknown {
  const candidates = [
    new URL(`../../data/${name}`, import.meta.url),
    new URL(`../data/${name}`, import.meta.url),
  ];
  for (const candidate of candidates) {
    const candidatePath = fileURLToPath(candidate);
    if (!existsSync(candidatePath)) continue;
    const parsed: unknown = JSON.parse(readFileSync(candidatePath, 'utf-8'));
    return parsed;
  }
  throw new Error(`Data file not found: ${name}`);
}
