import { createHash } from "node:crypto";
import type { CanonicalDocument, Chunk, SourceType } from "@collabrag/types";
import type { ChunkWindow, IChunker } from "./chunker.interface.js";

/**
 * Change-detection digest of a chunk's text (MD5, hex). Not a security
 * boundary and not a dedup key for untrusted input.
 */
export function fingerprint(text: string): string {
  return createHash("md5").update(text, "utf8").digest("hex");
}

export function documentId(source: SourceType, externalId: string): string {
  return `${source}-${externalId}`;
}

export function chunkId(source: SourceType, externalId: string, index: number): string {
  return `${documentId(source, externalId)}-chunk-${String(index)}`;
}

/**
 * Chunk a canonical document into fingerprinted chunks. Pure: the same
 * document and window always give the same (chunkId, contentHash) sequence.
 */
export function chunkDocument(
  document: CanonicalDocument,
  chunker: IChunker,
  window: ChunkWindow,
): Chunk[] {
  const results = chunker.chunk(document.body, window);
  const docId = documentId(document.source, document.externalId);

  return results.map((result) => ({
    chunkId: chunkId(document.source, document.externalId, result.index),
    text: result.content,
    contentHash: fingerprint(result.content),
    metadata: {
      ...document.metadata,
      source: document.source,
      documentId: docId,
      title: document.title,
      chunkIndex: result.index,
    },
  }));
}
