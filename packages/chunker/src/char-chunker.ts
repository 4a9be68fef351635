import type { ChunkResult } from "@collabrag/types";
import type { ChunkWindow, IChunker } from "./chunker.interface.js";
import { windowBounds } from "./window.js";

/**
 * Fixed character windows. Characters are Unicode code points, so a window
 * never splits a surrogate pair. Boundaries depend only on the text length
 * and the window parameters, never on content.
 */
export class CharChunker implements IChunker {
  readonly unit = "char";

  chunk(content: string, window: ChunkWindow): ChunkResult[] {
    const chars = content.trim().length === 0 ? [] : Array.from(content);

    return windowBounds(chars.length, window).map(([start, end], index) => ({
      content: chars.slice(start, end).join(""),
      index,
      metadata: { start, end },
    }));
  }
}
