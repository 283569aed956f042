import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
}

const FALLBACK: PackageInfo = { name: 'stackscan', version: '0.0.0', description: '' };

function readPackageJson(dir: string): PackageInfo | null {
  try {
    const pkg = JSON.parse(readFileSync(join(dir, 'package.json'), 'utf-8')) as Record<string, unknown>;
    if (typeof pkg.version !== 'string') return null;
    return {
      name: typeof pkg.name === 'string' ? pkg.name : FALLBACK.name,
      version: pkg.version,
      description: typeof pkg.description === 'string' ? pkg.description : '',
    };
  } catch {
    return null;
  }
}

/**
 * Finds the nearest package.json above this module, which is the project's own
 * both from src/ and from dist/.
 */
export function getPackageInfo(): PackageInfo {
  let dir = dirname(fileURLToPath(import.meta.url));

  for (;;) {
    const info = readPackageJson(dir);
    if (info) return info;

    const parent = dirname(dir);
    if (parent === dir) return FALLBACK;
    dir = parent;
  }
}
