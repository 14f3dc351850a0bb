import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { getErrorMessage } from '@/utils/errors.js';

/**
 * Get the package version.
 * Reads package.json once and caches the result.
 */
let cachedVersion: string = '';

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const currentDir = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(currentDir, '../../package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    cachedVersion =
      typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : '0.0.0';
  } catch (error) {
    // package.json is not shipped next to every build layout
    process.emitWarning(`Could not read package version: ${getErrorMessage(error)}`);
    cachedVersion = '0.0.0';
  }

  return cachedVersion;
}

export const VERSION: string = getVersion();
