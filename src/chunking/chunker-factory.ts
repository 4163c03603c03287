import { SentenceWindowChunker } from "./sentence-chunker";
import {
  ChunkingMethod,
  type ChunkingConfig,
  type ChunkingResult,
  type ChunkingStrategy,
} from "./types";
import { WordWindowChunker } from "./word-chunker";

export function createChunker(method: ChunkingMethod): ChunkingStrategy {
  switch (method) {
    case ChunkingMethod.Sentence:
      return new SentenceWindowChunker();
    case ChunkingMethod.Word:
      return new WordWindowChunker();
    default: {
      const exhaustive: never = method;
      throw new Error(`Unsupported chunking method: ${String(exhaustive)}`);
    }
  }
}

export function chunkDocument(
  content: string,
  method: ChunkingMethod,
  config: ChunkingConfig
): ChunkingResult {
  return createChunker(method).chunk(content, config);
}
