export { parseCliOptions } from './cli-parser';
export { parseEnvironment } from './env-parser';
export { loadDotEnv } from './dotenv-loader';
export { resolveDataDir } from './data-dir';
export { loadTextFile } from './document-loader';
