import type { Command } from 'commander';
import { parseCliOptions, parseEnvironment, resolveDataDir } from '../boundaries/index';
import { validateChunkingConfig } from '../chunking/index';
import { ChunkingMethod } from '../chunking/types';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_OVERLAP,
  DEFAULT_PREVIEW_CHUNKS,
  MATCH_ALL_FILTER,
} from '../config/constants';
import { handleUnknownError } from '../errors/index';
import { JsonFormatter } from '../output/json-formatter';
import { debug, error, setSilentMode, setVerboseMode } from '../output/logger';
import { printGlobalSummary, printNotice } from '../output/reporter';
import { filterByPattern, listTextFiles } from '../scan/file-resolver';
import { processFiles } from './orchestrator';
import { OutputFormat, type ProcessOptions, type ProcessResult } from './types';

/*
 * Runs one load/preview/chunk pass over the data directory.
 * Every failure is printed; nothing here exits the process.
 * Returns undefined when the run stopped before processing files.
 */
export function runMain(
  rawOptions: unknown,
  cwd: string = process.cwd(),
  rawEnv: unknown = process.env
): ProcessResult | undefined {
  let cliOptions;
  try {
    cliOptions = parseCliOptions(rawOptions);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing CLI options');
    error(`Error: ${err.message}`);
    return undefined;
  }

  let env;
  try {
    env = parseEnvironment(rawEnv);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Validating environment variables');
    error(`Error: ${err.message}`);
    return undefined;
  }

  const isJson = cliOptions.output === OutputFormat.Json;
  setSilentMode(isJson);
  setVerboseMode(cliOptions.verbose);

  // Reject a bad chunking config before any file is touched
  if (cliOptions.chunk) {
    const invalid = validateChunkingConfig(cliOptions);
    if (invalid) {
      error(`Error: ${invalid.message}`);
      return undefined;
    }
  }

  let dataDir: string;
  try {
    dataDir = resolveDataDir({ cwd, option: cliOptions.dataDir, envValue: env.DOCSLICE_DATA_DIR });
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Resolving data directory');
    error(`Error: ${err.message}`);
    return undefined;
  }
  debug(`Data directory: ${dataDir}`);

  let files = listTextFiles(dataDir);
  if (files.length === 0) {
    printNotice(`No .txt files found in ${dataDir}`);
    return undefined;
  }

  if (cliOptions.filter !== MATCH_ALL_FILTER) {
    files = filterByPattern(files, cliOptions.filter);
    if (files.length === 0) {
      printNotice(`No files matched the filter '${cliOptions.filter}' in ${dataDir}`);
      return undefined;
    }
  }
  debug(`${files.length} file(s) selected`);

  const options: ProcessOptions = { previewChars: env.DOCSLICE_PREVIEW_CHARS };
  if (cliOptions.chunk) {
    options.chunking = {
      method: cliOptions.method,
      chunkSize: cliOptions.chunkSize,
      overlap: cliOptions.overlap,
      previewChunks: cliOptions.previewChunks,
    };
  }

  const formatter = isJson ? new JsonFormatter(dataDir) : undefined;
  const result = processFiles(files, options, formatter);

  if (formatter) {
    console.log(formatter.toJson());
  } else {
    printGlobalSummary(result.totalFiles, result.totalChunks, result.failures);
  }
  return result;
}

/*
 * Registers the main command with Commander.
 * Previews every .txt file in the data directory and, with --chunk, splits it into chunks.
 */
export function registerMainCommand(program: Command): void {
  program
    .option('--chunk', 'Also chunk files after loading')
    .option('--chunk-size <words>', 'Chunk size in words', String(DEFAULT_CHUNK_SIZE))
    .option('--overlap <words>', 'Overlap size in words', String(DEFAULT_OVERLAP))
    .option('--method <method>', `Chunking method: ${ChunkingMethod.Sentence} (default) or ${ChunkingMethod.Word}`, ChunkingMethod.Sentence)
    .option('--preview-chunks <count>', 'Number of chunk previews to show', String(DEFAULT_PREVIEW_CHUNKS))
    .option('--filter <glob>', "Glob pattern to filter file names (e.g. '*Summary*.txt')", MATCH_ALL_FILTER)
    .option('--data-dir <path>', 'Directory containing the .txt files (default: ./Data)')
    .option('--output <format>', 'Output format: line (default) or json', OutputFormat.Line)
    .option('-v, --verbose', 'Enable verbose logging')
    .action(() => {
      runMain(program.opts());
    });
}
