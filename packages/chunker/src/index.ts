export type { IChunker, ChunkWindow } from "./chunker.interface.js";
export { CharChunker } from "./char-chunker.js";
export { WordChunker } from "./word-chunker.js";
export { createChunker, chunkText } from "./factory.js";
export { validateWindow, windowBounds } from "./window.js";
export { fingerprint, chunkId, documentId, chunkDocument } from "./fingerprint.js";
