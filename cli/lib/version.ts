/**
 * CLI/package version
 */
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const here = path.dirname(fileURLToPath(import.meta.url));

/**
 * Read the version from the nearest package.json.
 * Checks the repo layout (tsx) and the dist layout.
 */
export function getCliVersion(): string {
  const candidates = [
    path.resolve(here, '../../package.json'),    // cli/lib → repo root
    path.resolve(here, '../../../package.json')  // dist/cli/lib → repo root
  ];
  for (const pkgPath of candidates) {
    if (!fs.existsSync(pkgPath)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}
