import { describe, it, expect } from 'vitest';
import { createChunker, chunkDocument } from '../../src/chunking/chunker-factory';
import { SentenceWindowChunker } from '../../src/chunking/sentence-chunker';
import { WordWindowChunker } from '../../src/chunking/word-chunker';
import { ChunkingMethod } from '../../src/chunking/types';
import { validateChunkingConfig } from '../../src/chunking/validation';

describe('createChunker', () => {
  it('maps each method to its strategy', () => {
    expect(createChunker(ChunkingMethod.Sentence)).toBeInstanceOf(SentenceWindowChunker);
    expect(createChunker(ChunkingMethod.Word)).toBeInstanceOf(WordWindowChunker);
  });
});

describe('chunkDocument', () => {
  const text = 'One two three. Four five six.';

  it('chunks by sentence', () => {
    expect(chunkDocument(text, ChunkingMethod.Sentence, { chunkSize: 3, overlap: 0 })).toEqual({
      ok: true,
      chunks: ['One two three.', 'Four five six.'],
    });
  });

  it('chunks by word', () => {
    expect(chunkDocument(text, ChunkingMethod.Word, { chunkSize: 4, overlap: 0 })).toEqual({
      ok: true,
      chunks: ['One two three. Four', 'five six.'],
    });
  });

  it('fails both methods on the same bad configuration', () => {
    for (const method of [ChunkingMethod.Sentence, ChunkingMethod.Word]) {
      const result = chunkDocument(text, method, { chunkSize: 2, overlap: 5 });
      expect(result.ok).toBe(false);
    }
  });
});

describe('validateChunkingConfig', () => {
  it('accepts overlap smaller than chunkSize', () => {
    expect(validateChunkingConfig({ chunkSize: 200, overlap: 50 })).toBeUndefined();
    expect(validateChunkingConfig({ chunkSize: 1, overlap: 0 })).toBeUndefined();
  });

  it('rejects non-positive or fractional chunk sizes', () => {
    expect(validateChunkingConfig({ chunkSize: 0, overlap: 0 })?.message).toBe(
      'chunkSize must be a positive integer (received 0)'
    );
    expect(validateChunkingConfig({ chunkSize: 2.5, overlap: 0 })?.message).toBe(
      'chunkSize must be a positive integer (received 2.5)'
    );
  });

  it('rejects negative overlap', () => {
    expect(validateChunkingConfig({ chunkSize: 10, overlap: -1 })?.message).toBe(
      'overlap must be a non-negative integer (received -1)'
    );
  });

  it('rejects overlap at or above chunkSize', () => {
    expect(validateChunkingConfig({ chunkSize: 10, overlap: 10 })?.message).toBe(
      'overlap must be smaller than chunkSize (overlap=10, chunkSize=10)'
    );
  });
});
