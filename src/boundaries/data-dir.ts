import { existsSync, statSync } from 'fs';
import * as path from 'path';
import { DEFAULT_DATA_DIRNAME } from '../config/constants';
import { EnvironmentError } from '../errors/index';

/**
 * Resolve the data directory: explicit option first, then the
 * DOCSLICE_DATA_DIR environment value, then `Data/` under `cwd`.
 *
 * @throws EnvironmentError when the path is missing or not a directory
 */
export function resolveDataDir(args: {
  cwd: string;
  option?: string | undefined;
  envValue?: string | undefined;
}): string {
  const { cwd, option, envValue } = args;
  const dataDir = path.resolve(cwd, option ?? envValue ?? DEFAULT_DATA_DIRNAME);

  if (!existsSync(dataDir)) {
    throw new EnvironmentError(`Data directory not found at expected location: ${dataDir}`, dataDir);
  }
  if (!statSync(dataDir).isDirectory()) {
    throw new EnvironmentError(`Data path exists but is not a directory: ${dataDir}`, dataDir);
  }
  return dataDir;
}
