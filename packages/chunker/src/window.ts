import { ConfigurationError } from "@collabrag/errors";
import type { ChunkWindow } from "./chunker.interface.js";

export function validateWindow({ chunkSize, chunkOverlap }: ChunkWindow): void {
  const issues: string[] = [];
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    issues.push(`chunkSize must be a positive integer (got ${String(chunkSize)})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    issues.push(`chunkOverlap must be a non-negative integer (got ${String(chunkOverlap)})`);
  }
  if (issues.length === 0 && chunkOverlap >= chunkSize) {
    issues.push(
      `chunkOverlap (${String(chunkOverlap)}) must be smaller than chunkSize (${String(chunkSize)})`,
    );
  }
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid chunking parameters", issues);
  }
}

/**
 * Start/end offsets of every window over `length` units.
 * Window i starts at i * (chunkSize - chunkOverlap); the last window is the
 * first one that reaches the end.
 */
export function windowBounds(length: number, window: ChunkWindow): Array<[number, number]> {
  validateWindow(window);
  const bounds: Array<[number, number]> = [];
  if (length === 0) return bounds;

  const step = window.chunkSize - window.chunkOverlap;
  for (let start = 0; ; start += step) {
    const end = Math.min(start + window.chunkSize, length);
    bounds.push([start, end]);
    if (end >= length) break;
  }
  return bounds;
}
