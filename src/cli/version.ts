/**
 * CLI verze - načtená z package.json.
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const FALLBACK_VERSION = '0.0.0';

function loadVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli i dist/cli leží dvě úrovně pod kořenem balíčku
  const packagePath = resolve(here, '../../package.json');

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(packagePath, 'utf-8'));
  } catch {
    return FALLBACK_VERSION;
  }

  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return FALLBACK_VERSION;
}

export const version = loadVersion();
