import fs from 'fs';
import path from 'path';

export const APP_NAME = 'LLM Launcher Control Server';

const FALLBACK_VERSION = '0.0.0';

let cachedVersion: string | null = null;

/**
 * Version from the package manifest. Resolves the same from `src/` under
 * ts-jest and from the compiled `dist/` tree.
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const manifest: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, '../../package.json'), 'utf-8')
    );

    if (
      typeof manifest === 'object' &&
      manifest !== null &&
      'version' in manifest &&
      typeof manifest.version === 'string'
    ) {
      cachedVersion = manifest.version;
      return cachedVersion;
    }
  } catch {
    // Running outside the package tree
  }

  return FALLBACK_VERSION;
}
