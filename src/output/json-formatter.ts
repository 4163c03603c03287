import { APP_VERSION } from '../config/constants';
import type { ChunkingMethod } from '../chunking/types';
import { countWords } from '../chunking/utils';
import { countCharacters } from './reporter';

export interface ChunkRecord {
  index: number;
  words: number;
  text: string;
}

export interface DocumentReport {
  path: string;
  characters: number;
  method?: ChunkingMethod;
  chunks?: ChunkRecord[];
}

export interface FailureReport {
  path: string;
  error: string;
}

export type FileReport = DocumentReport | FailureReport;

export interface Result {
  dataDir: string;
  files: Record<string, FileReport>;
  summary: {
    files: number;
    chunks: number;
    failures: number;
  };
  metadata: {
    version: string;
    timestamp: string;
  };
}

export class JsonFormatter {
  private files: Record<string, FileReport> = {};
  private chunkCount = 0;
  private failureCount = 0;

  constructor(private readonly dataDir: string) {}

  addDocument(name: string, absPath: string, content: string): void {
    this.files[name] = { path: absPath, characters: countCharacters(content) };
  }

  addChunks(name: string, method: ChunkingMethod, chunks: string[]): void {
    const report = this.files[name];
    if (!report || 'error' in report) return;
    report.method = method;
    report.chunks = chunks.map((text, index) => ({ index, words: countWords(text), text }));
    this.chunkCount += chunks.length;
  }

  addFailure(name: string, absPath: string, message: string): void {
    this.files[name] = { path: absPath, error: message };
    this.failureCount++;
  }

  toJson(now: Date = new Date()): string {
    const result: Result = {
      dataDir: this.dataDir,
      files: this.files,
      summary: {
        files: Object.keys(this.files).length,
        chunks: this.chunkCount,
        failures: this.failureCount,
      },
      metadata: {
        version: APP_VERSION,
        timestamp: now.toISOString(),
      },
    };
    return JSON.stringify(result, null, 2);
  }
}
