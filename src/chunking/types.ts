import type { ConfigError } from '../errors/index';

export enum ChunkingMethod {
  Sentence = 'sentence',
  Word = 'word',
}

export interface ChunkingConfig {
  chunkSize: number; // Word budget per chunk
  overlap: number; // Words repeated between consecutive chunks
}

export type ChunkingResult =
  | { ok: true; chunks: string[] }
  | { ok: false; error: ConfigError };

export interface ChunkingStrategy {
  readonly method: ChunkingMethod;
  chunk(content: string, config: ChunkingConfig): ChunkingResult;
}
