/**
 * Configuration constants
 */

export const APP_NAME = 'docslice';
export const APP_VERSION = '0.1.0';

export const DEFAULT_DATA_DIRNAME = 'Data';
export const ALLOWED_EXTS = new Set(['.txt']);
export const DOTENV_FILENAMES = ['.env', '.env.local'];

export const DEFAULT_PREVIEW_CHARS = 400;
export const DEFAULT_CHUNK_SIZE = 200;
export const DEFAULT_OVERLAP = 50;
export const DEFAULT_PREVIEW_CHUNKS = 3;
export const MATCH_ALL_FILTER = '*';
