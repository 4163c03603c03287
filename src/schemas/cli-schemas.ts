import { z } from 'zod';
import { ChunkingMethod } from '../chunking/types';
import { OutputFormat } from '../cli/types';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_OVERLAP,
  DEFAULT_PREVIEW_CHUNKS,
  MATCH_ALL_FILTER,
} from '../config/constants';

// CLI options schema for command line argument validation
export const CLI_OPTIONS_SCHEMA = z.object({
  chunk: z.boolean().default(false),
  chunkSize: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  overlap: z.coerce.number().int().nonnegative().default(DEFAULT_OVERLAP),
  method: z.nativeEnum(ChunkingMethod).default(ChunkingMethod.Sentence),
  previewChunks: z.coerce.number().int().nonnegative().default(DEFAULT_PREVIEW_CHUNKS),
  filter: z.string().min(1).default(MATCH_ALL_FILTER),
  dataDir: z.string().min(1).optional(),
  output: z.nativeEnum(OutputFormat).default(OutputFormat.Line),
  verbose: z.boolean().default(false),
});

// Inferred types
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
