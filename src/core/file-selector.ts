import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { fileExists, isDirectory } from '../utils/fs.js';
import { NotADirectoryError, PathNotFoundError } from '../utils/errors.js';

export type FilePattern = 'prod' | 'yaml';

export const FILE_PATTERNS: readonly FilePattern[] = ['prod', 'yaml'];

const PATTERNS: Record<FilePattern, RegExp> = {
  prod: /^prod\d+\.(yml|yaml)$/i,
  yaml: /^.+\.(yml|yaml)$/i,
};

export interface SelectedFile {
  /** Absolute path. */
  path: string;
  name: string;
  /** Short name used in reports: `prod12` or the base name without extension. */
  label: string;
}

export async function resolveScanDirectory(path: string): Promise<string> {
  const absolute = resolve(path);
  if (!(await fileExists(absolute))) {
    throw new PathNotFoundError(path);
  }
  if (!(await isDirectory(absolute))) {
    throw new NotADirectoryError(path);
  }
  return absolute;
}

export function matchesPattern(name: string, pattern: FilePattern): boolean {
  return PATTERNS[pattern].test(name);
}

export function fileLabel(name: string, pattern: FilePattern): string {
  if (pattern === 'prod') {
    const match = /(prod\d+)/i.exec(name);
    return match ? match[1].toLowerCase() : 'unknown';
  }
  return name.replace(/\.(yml|yaml)$/i, '') || 'unknown';
}

/** Lists matching files directly inside `dir`, sorted by name. Dotfiles are skipped. */
export async function selectFiles(dir: string, pattern: FilePattern): Promise<SelectedFile[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.') && matchesPattern(entry.name, pattern))
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({ path: join(dir, name), name, label: fileLabel(name, pattern) }));
}
