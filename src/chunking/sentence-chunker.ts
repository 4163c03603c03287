import {
  ChunkingMethod,
  type ChunkingConfig,
  type ChunkingResult,
  type ChunkingStrategy,
} from "./types";
import { countWords, splitSentences } from "./utils";
import { validateChunkingConfig } from "./validation";

/**
 * Groups whole sentences into windows sized by cumulative word count.
 *
 * A window keeps taking sentences until it holds at least `chunkSize` words,
 * so a single long sentence becomes its own (oversized) chunk. The next window
 * starts after roughly `chunkSize - overlap` words' worth of sentences, and
 * always at least one sentence further on.
 */
export class SentenceWindowChunker implements ChunkingStrategy {
  readonly method = ChunkingMethod.Sentence;

  chunk(content: string, config: ChunkingConfig): ChunkingResult {
    const invalid = validateChunkingConfig(config);
    if (invalid) return { ok: false, error: invalid };

    const { chunkSize, overlap } = config;
    const sentences = splitSentences(content);
    if (sentences.length === 0) return { ok: true, chunks: [] };

    const wordsPerSentence = sentences.map(countWords);
    const wordsToAdvance = Math.max(1, chunkSize - overlap);
    const total = sentences.length;
    const chunks: string[] = [];

    let start = 0;
    while (start < total) {
      const end = this.windowEnd(wordsPerSentence, start, chunkSize);
      const chunk = sentences.slice(start, end).join(" ").trim();
      if (chunk) chunks.push(chunk);

      let next = this.windowEnd(wordsPerSentence, start, wordsToAdvance);
      if (next <= start) next = start + 1;
      start = next;
    }

    return { ok: true, chunks };
  }

  // Index one past the last sentence needed to reach `budget` words from `start`
  private windowEnd(
    wordsPerSentence: number[],
    start: number,
    budget: number
  ): number {
    let end = start;
    let accumulated = 0;
    while (end < wordsPerSentence.length && accumulated < budget) {
      accumulated += wordsPerSentence[end] ?? 0;
      end += 1;
    }
    return end;
  }
}
