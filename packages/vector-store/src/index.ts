import type { AppConfig } from "@collabrag/types";
import { QdrantVectorStore } from "./qdrant-adapter.js";

export type { IVectorStore, IndexStats, StoredChunk } from "./vector-store.interface.js";
export { QdrantVectorStore, pointId } from "./qdrant-adapter.js";
export { InMemoryVectorStore } from "./memory-store.js";
export { parseStoredChunk } from "./payload.js";

export function createVectorStore(config: Pick<AppConfig, "collectionName" | "qdrant">): QdrantVectorStore {
  return new QdrantVectorStore(config.collectionName, config.qdrant.url, config.qdrant.apiKey);
}
