export { ChunkingMethod } from "./types";
export type { ChunkingConfig, ChunkingResult, ChunkingStrategy } from "./types";
export { splitIntoWords, countWords, splitSentences } from "./utils";
export { validateChunkingConfig } from "./validation";
export { WordWindowChunker } from "./word-chunker";
export { SentenceWindowChunker } from "./sentence-chunker";
export { createChunker, chunkDocument } from "./chunker-factory";
