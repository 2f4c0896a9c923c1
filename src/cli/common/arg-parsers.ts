export type ParsedConvertCommand = {
  input?: string;
  output?: string;
  preset?: string;
  columns?: number;
  utf8: boolean;
  iceColors?: boolean;
  writeSauce?: boolean;
  showUsage?: boolean;
  error?: string;
};

export type ParsedInfoCommand = {
  input?: string;
  showUsage?: boolean;
};

/**
 * Parse `convert` arguments (everything after the command name).
 */
export function parseConvertCommand(args: readonly string[]): ParsedConvertCommand {
  const parsed: ParsedConvertCommand = { utf8: false };
  const values: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const part = args[i] ?? '';
    if (part === '--help' || part === '-h') return { ...parsed, showUsage: true };

    const eqIndex = part.indexOf('=');
    const flag = eqIndex >= 0 ? part.slice(0, eqIndex) : part;
    const inlineValue = eqIndex >= 0 ? part.slice(eqIndex + 1) : undefined;
    const readValue = (): string | undefined => {
      if (inlineValue !== undefined) return inlineValue;
      const next = args[i + 1];
      if (!next || next.startsWith('--')) return undefined;
      i += 1;
      return next;
    };

    if (flag === '--preset') {
      const value = readValue();
      if (!value) return { ...parsed, error: 'Missing value for --preset' };
      parsed.preset = value;
      continue;
    }
    if (flag === '--columns') {
      const value = readValue();
      const n = value !== undefined && /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
      if (!Number.isFinite(n)) return { ...parsed, error: `Invalid value for --columns: ${value ?? ''}` };
      parsed.columns = n;
      continue;
    }
    if (flag === '--utf8') {
      parsed.utf8 = true;
      continue;
    }
    if (flag === '--no-ice') {
      parsed.iceColors = false;
      continue;
    }
    if (flag === '--sauce') {
      parsed.writeSauce = true;
      continue;
    }
    if (flag === '--no-sauce') {
      parsed.writeSauce = false;
      continue;
    }
    if (part.startsWith('--')) return { ...parsed, error: `Unknown option: ${flag}` };
    values.push(part);
  }

  parsed.input = values[0];
  parsed.output = values[1];
  return parsed;
}

export function parseInfoCommand(args: readonly string[]): ParsedInfoCommand {
  if (args.includes('--help') || args.includes('-h')) return { showUsage: true };
  return { input: args.find((a) => !a.startsWith('--')) };
}
