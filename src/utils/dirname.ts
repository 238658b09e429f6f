/**
 * ESM replacement for __dirname
 */

import { dirname } from 'path';
import { fileURLToPath } from 'url';

export function getDirname(metaUrl: string): string {
  return dirname(fileURLToPath(metaUrl));
}
