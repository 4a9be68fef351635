import type { ChunkResult } from "@collabrag/types";
import type { ChunkWindow, IChunker } from "./chunker.interface.js";
import { windowBounds } from "./window.js";

/**
 * Fixed windows over whitespace-separated words, re-joined with single spaces.
 * `start`/`end` in the metadata are word offsets.
 */
export class WordChunker implements IChunker {
  readonly unit = "word";

  chunk(content: string, window: ChunkWindow): ChunkResult[] {
    const words = content.split(/\s+/).filter((word) => word.length > 0);

    return windowBounds(words.length, window).map(([start, end], index) => ({
      content: words.slice(start, end).join(" "),
      index,
      metadata: { start, end },
    }));
  }
}
