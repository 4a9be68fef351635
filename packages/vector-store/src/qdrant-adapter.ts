import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import type { IndexEntry, ScoredChunk } from "@collabrag/types";
import { IndexWriteError, errorMessage } from "@collabrag/errors";
import type { IndexStats, IVectorStore, StoredChunk } from "./vector-store.interface.js";
import { parseStoredChunk, toPayload } from "./payload.js";

const BATCH_SIZE = 100;

/**
 * Qdrant point ids must be unsigned integers or UUIDs, so the chunkId maps to
 * a name-based (version 5 layout) UUID derived from its SHA-1. The chunkId
 * itself is kept in the payload.
 */
export function pointId(chunkId: string): string {
  const hex = createHash("sha1").update(chunkId, "utf8").digest("hex").slice(0, 32).split("");
  hex[12] = "5";
  hex[16] = ((parseInt(hex[16] ?? "0", 16) & 0x3) | 0x8).toString(16);
  const h = hex.join("");
  return `${h.slice(0, 8)}-${h.slice(8, 12)}-${h.slice(12, 16)}-${h.slice(16, 20)}-${h.slice(20, 32)}`;
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;

  constructor(
    private readonly collectionName: string,
    url: string,
    apiKey?: string,
  ) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async get(chunkId: string): Promise<StoredChunk | undefined> {
    const points = await this.guard("read", () =>
      this.client.retrieve(this.collectionName, {
        ids: [pointId(chunkId)],
        with_payload: true,
        with_vector: false,
      }),
    );
    const stored = parseStoredChunk(points[0]?.payload);
    return stored?.chunkId === chunkId ? stored : undefined;
  }

  async upsert(entries: IndexEntry[]): Promise<void> {
    for (let i = 0; i < entries.length; i += BATCH_SIZE) {
      const batch = entries.slice(i, i + BATCH_SIZE);

      await this.guard("write", () =>
        this.client.upsert(this.collectionName, {
          wait: true,
          points: batch.map((entry) => ({
            id: pointId(entry.chunkId),
            vector: entry.vector,
            payload: toPayload(entry),
          })),
        }),
      );
    }
  }

  async query(vector: number[], k: number): Promise<ScoredChunk[]> {
    const results = await this.guard("query", () =>
      this.client.search(this.collectionName, {
        vector,
        limit: k,
        with_payload: true,
      }),
    );

    return results.flatMap((result) => {
      const stored = parseStoredChunk(result.payload);
      return stored ? [{ chunk: stored, score: result.score }] : [];
    });
  }

  async stats(): Promise<IndexStats> {
    const { count } = await this.guard("count", () =>
      this.client.count(this.collectionName, { exact: true }),
    );
    return { count };
  }

  async ensureCollection(dimensions: number): Promise<void> {
    const collections = await this.guard("read", () => this.client.getCollections());
    const exists = collections.collections.some((c) => c.name === this.collectionName);
    if (exists) return;

    await this.guard("create", async () => {
      await this.client.createCollection(this.collectionName, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
      });

      // Payload indexes for filtering by origin
      await this.client.createPayloadIndex(this.collectionName, {
        field_name: "metadata.source",
        field_schema: "keyword",
      });
      await this.client.createPayloadIndex(this.collectionName, {
        field_name: "metadata.documentId",
        field_schema: "keyword",
      });
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new IndexWriteError(
        `Qdrant ${operation} on "${this.collectionName}" failed: ${errorMessage(error)}`,
        { cause: error, details: { collection: this.collectionName, operation } },
      );
    }
  }
}
