import fg from 'fast-glob';
import micromatch from 'micromatch';
import path from 'path';
import { ALLOWED_EXTS, MATCH_ALL_FILTER } from '../config/constants';

function byName(a: string, b: string): number {
  const nameA = path.basename(a);
  const nameB = path.basename(b);
  if (nameA < nameB) return -1;
  if (nameA > nameB) return 1;
  return 0;
}

/**
 * List the text files directly inside `dataDir`, sorted by file name.
 * Extensions are compared case-insensitively; subdirectories are not searched.
 */
export function listTextFiles(dataDir: string): string[] {
  const found = fg.sync('*', {
    cwd: dataDir,
    absolute: true,
    onlyFiles: true,
    dot: true,
    deep: 1,
  });

  const files = found
    .filter((f) => ALLOWED_EXTS.has(path.extname(f).toLowerCase()))
    .map((f) => path.resolve(f));
  return files.sort(byName);
}

// Keep files whose name matches the glob; `*` keeps everything
export function filterByPattern(files: string[], pattern: string): string[] {
  if (!pattern || pattern === MATCH_ALL_FILTER) return files;
  return files.filter((f) => micromatch.isMatch(path.basename(f), pattern, { dot: true }));
}
