import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url));

/**
 * Find a file shipped with the package (data/, scripts/) by walking up from
 * this module. Works from both src/ and the compiled dist/src/ tree.
 */
export function findPackageFile(relativePath: string, startDir: string = MODULE_DIR): string | null {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    const candidate = path.join(currentDir, relativePath);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export const LEXICON_FILE = path.join('data', 'lexicon.json');
export const DOCTOR_SCRIPT_FILE = path.join('scripts', 'doctor.json');
