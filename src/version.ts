import { readFileSync } from 'fs';
import { join } from 'path';

function readPackageVersion(): string {
  // package.json sits one level above both src/ and dist/
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  throw new Error('package.json has no version');
}

export const VERSION = readPackageVersion();
