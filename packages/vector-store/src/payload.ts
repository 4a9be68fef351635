import { z } from "zod";
import type { ChunkMetadata } from "@collabrag/types";
import type { StoredChunk } from "./vector-store.interface.js";

const metadataSchema = z
  .object({
    source: z.enum(["jira", "confluence", "sharepoint", "teams"]),
    documentId: z.string(),
    title: z.string(),
    chunkIndex: z.number().int().nonnegative(),
  })
  .catchall(z.union([z.string(), z.number(), z.boolean()]));

const storedChunkSchema = z.object({
  chunkId: z.string(),
  text: z.string(),
  contentHash: z.string(),
  metadata: metadataSchema,
});

/** Read a stored payload back; anything not written by this pipeline gives undefined. */
export function parseStoredChunk(payload: unknown): StoredChunk | undefined {
  const parsed = storedChunkSchema.safeParse(payload);
  if (!parsed.success) return undefined;

  const { source, documentId, title, chunkIndex, ...rest } = parsed.data.metadata;
  const metadata: ChunkMetadata = { source, documentId, title, chunkIndex };
  for (const [key, value] of Object.entries(rest)) {
    metadata[key] = value;
  }

  return {
    chunkId: parsed.data.chunkId,
    text: parsed.data.text,
    contentHash: parsed.data.contentHash,
    metadata,
  };
}

export function toPayload(entry: StoredChunk): Record<string, unknown> {
  return {
    chunkId: entry.chunkId,
    text: entry.text,
    contentHash: entry.contentHash,
    metadata: entry.metadata,
  };
}
