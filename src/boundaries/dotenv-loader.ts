import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { DOTENV_FILENAMES } from '../config/constants';
import { handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';

function parseValue(raw: string): string {
  if ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'"))) {
    return raw.slice(1, -1);
  }
  const hashAt = raw.indexOf(' #');
  return hashAt === -1 ? raw : raw.slice(0, hashAt).trim();
}

export function parseDotEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
    if (!match || !match[1] || match[2] === undefined) continue;
    values[match[1]] = parseValue(match[2]);
  }
  return values;
}

/*
 * Loads the first of .env / .env.local found in `cwd` into `env`.
 * Variables already present in `env` are left untouched.
 * Returns the path of the file that was loaded, if any.
 */
export function loadDotEnv(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  for (const filename of DOTENV_FILENAMES) {
    const full = path.resolve(cwd, filename);
    if (!existsSync(full)) continue;
    try {
      const values = parseDotEnv(readFileSync(full, 'utf-8'));
      for (const [key, value] of Object.entries(values)) {
        if (env[key] === undefined) {
          env[key] = value;
        }
      }
      return full;
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Loading ${filename}`);
      warn(`[docslice] Warning: ${err.message}`);
    }
  }
  return undefined;
}
