import { ConfigError } from "../errors/index";
import {
  ChunkingMethod,
  type ChunkingConfig,
  type ChunkingResult,
  type ChunkingStrategy,
} from "./types";
import { splitIntoWords } from "./utils";
import { validateChunkingConfig } from "./validation";

/**
 * Fixed-size word windows. Each window starts `chunkSize - overlap` words
 * after the previous one; the last window may be shorter.
 */
export class WordWindowChunker implements ChunkingStrategy {
  readonly method = ChunkingMethod.Word;

  chunk(content: string, config: ChunkingConfig): ChunkingResult {
    const invalid = validateChunkingConfig(config);
    if (invalid) return { ok: false, error: invalid };

    const { chunkSize, overlap } = config;
    const words = splitIntoWords(content);
    if (words.length === 0) return { ok: true, chunks: [] };

    const step = chunkSize - overlap;
    if (step <= 0) {
      return {
        ok: false,
        error: new ConfigError("chunkSize must be greater than overlap"),
      };
    }

    const chunks: string[] = [];
    for (let i = 0; i < words.length; i += step) {
      const windowWords = words.slice(i, i + chunkSize);
      if (windowWords.length === 0) break;
      chunks.push(windowWords.join(" "));
      // Window reached the end of the document
      if (i + chunkSize >= words.length) break;
    }

    return { ok: true, chunks };
  }
}
