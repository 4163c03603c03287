import * as path from "path";
import { chunkDocument } from "../chunking/index";
import { loadTextFile } from "../boundaries/document-loader";
import { handleUnknownError } from "../errors/index";
import { JsonFormatter } from "../output/json-formatter";
import { debug } from "../output/logger";
import {
  printChunkSummary,
  printFileError,
  printFileSummary,
} from "../output/reporter";
import type { ProcessOptions, ProcessResult } from "./types";

/*
 * Loads, previews and (optionally) chunks each file in order.
 * A failure on one file is reported and the next file is processed.
 * With a formatter, results are collected for JSON output instead of printed.
 */
export function processFiles(
  files: string[],
  options: ProcessOptions,
  formatter?: JsonFormatter
): ProcessResult {
  const { previewChars, chunking } = options;

  let totalFiles = 0;
  let totalChunks = 0;
  let failures = 0;

  for (const file of files) {
    const name = path.basename(file);
    try {
      const content = loadTextFile(file);
      totalFiles += 1;
      debug(`Loaded ${name}`);

      if (formatter) formatter.addDocument(name, file, content);
      else printFileSummary(name, file, content, previewChars);

      if (!chunking) continue;

      const result = chunkDocument(content, chunking.method, chunking);
      if (!result.ok) throw result.error;
      totalChunks += result.chunks.length;
      debug(`Chunked ${name} by ${chunking.method}: ${result.chunks.length} chunk(s)`);

      if (formatter) formatter.addChunks(name, chunking.method, result.chunks);
      else printChunkSummary(result.chunks, chunking.previewChunks, previewChars);
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Processing file ${name}`);
      printFileError(name, err.message);
      formatter?.addFailure(name, file, err.message);
      failures += 1;
    }
  }

  return { totalFiles, totalChunks, failures };
}
