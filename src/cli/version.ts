import { readFileSync } from 'node:fs';

// Resolves to the package root from both src/cli and dist/cli.
const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(PACKAGE_JSON_URL, 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

export const VERSION = readPackageVersion();
