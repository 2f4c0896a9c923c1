/** File extensions handled by the ANSI codec. */

export const IMPORT_EXTENSIONS: readonly string[] = ['ans', 'nfo', 'diz'];
export const EXPORT_EXTENSIONS: readonly string[] = ['ans'];

function extensionOf(pathOrExt: string): string {
  const base = pathOrExt.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return (dot >= 0 ? base.slice(dot + 1) : base).toLowerCase();
}

export function canImportExtension(pathOrExt: string): boolean {
  return IMPORT_EXTENSIONS.includes(extensionOf(pathOrExt));
}

export function canExportExtension(pathOrExt: string): boolean {
  return EXPORT_EXTENSIONS.includes(extensionOf(pathOrExt));
}
