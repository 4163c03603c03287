import type { ChunkingConfig, ChunkingMethod } from "../chunking/types";

export enum OutputFormat {
  Line = "line",
  Json = "json",
}

export interface ChunkingOptions extends ChunkingConfig {
  method: ChunkingMethod;
  previewChunks: number;
}

export interface ProcessOptions {
  previewChars: number;
  // Absent when chunking is disabled
  chunking?: ChunkingOptions;
}

export interface ProcessResult {
  totalFiles: number;
  totalChunks: number;
  failures: number;
}
