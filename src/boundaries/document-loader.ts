import { readFileSync } from 'fs';
import * as path from 'path';
import { ProcessingError, handleUnknownError } from '../errors/index';

const UTF8 = new TextDecoder('utf-8', { fatal: true });

// Read a whole file as strict UTF-8; invalid byte sequences are an error
export function loadTextFile(filePath: string): string {
  const name = path.basename(filePath);
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reading ${name}`);
    throw new ProcessingError(err.message, name, e);
  }
  try {
    return UTF8.decode(bytes);
  } catch (e: unknown) {
    throw new ProcessingError(`'${name}' is not valid UTF-8 text`, name, e);
  }
}
