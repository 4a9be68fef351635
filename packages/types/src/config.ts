import type { ChunkUnit } from "./chunk.js";
import type { TargetModel } from "./pipeline.js";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  collectionName: string;
  qdrant: QdrantConfig;
  cohere: CohereConfig;
  embedding: EmbeddingConfig;
  http: HttpConfig;
  chunking: ChunkingSettings;
  retrieval: RetrievalConfig;
  sources: SourcesConfig;
  redis: RedisConfig;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
}

export interface EmbeddingConfig {
  dimensions: number;
  batchSize: number;
  timeoutMs: number;
}

export interface HttpConfig {
  timeoutMs: number;
  maxRetries: number;
}

export interface ChunkingSettings {
  unit: ChunkUnit;
  chunkSize: number;
  chunkOverlap: number;
}

export interface RetrievalConfig {
  topK: number;
  promptMaxChars: number;
  targetModel: TargetModel;
}

export interface RedisConfig {
  url: string;
  syncCron: string;
}

export interface AtlassianCredentials {
  baseUrl: string;
  email: string;
  apiToken: string;
}

export interface JiraSourceConfig extends AtlassianCredentials {
  projectKeys: string[];
  maxResults: number;
}

export interface ConfluenceSourceConfig extends AtlassianCredentials {
  spaceKeys: string[];
  pageLimit: number;
}

export interface M365Credentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface SharePointSourceConfig extends M365Credentials {
  siteName?: string;
}

export interface TeamsSourceConfig extends M365Credentials {
  groupName?: string;
}

/** A source is present only when its credentials are configured. */
export interface SourcesConfig {
  lookbackDays?: number;
  jira?: JiraSourceConfig;
  confluence?: ConfluenceSourceConfig;
  sharepoint?: SharePointSourceConfig;
  teams?: TeamsSourceConfig;
}
