import type { ChunkUnit } from "@collabrag/types";
import { ConfigurationError } from "@collabrag/errors";
import type { IChunker } from "./chunker.interface.js";
import { CharChunker } from "./char-chunker.js";
import { WordChunker } from "./word-chunker.js";

export function createChunker(unit: ChunkUnit): IChunker {
  switch (unit) {
    case "char":
      return new CharChunker();
    case "word":
      return new WordChunker();
    default:
      throw new ConfigurationError(`Unknown chunk unit: ${String(unit)}`);
  }
}

/**
 * Split text into ordered window strings.
 */
export function chunkText(
  text: string,
  chunkSize: number,
  chunkOverlap: number,
  unit: ChunkUnit = "char",
): string[] {
  return createChunker(unit)
    .chunk(text, { chunkSize, chunkOverlap })
    .map((result) => result.content);
}
