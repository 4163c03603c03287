import { ConfigError } from "../errors/index";
import type { ChunkingConfig } from "./types";

export function validateChunkingConfig(
  config: ChunkingConfig
): ConfigError | undefined {
  const { chunkSize, overlap } = config;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    return new ConfigError(
      `chunkSize must be a positive integer (received ${chunkSize})`
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    return new ConfigError(
      `overlap must be a non-negative integer (received ${overlap})`
    );
  }
  if (overlap >= chunkSize) {
    return new ConfigError(
      `overlap must be smaller than chunkSize (overlap=${overlap}, chunkSize=${chunkSize})`
    );
  }
  return undefined;
}
