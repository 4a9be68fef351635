export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { ResilientEmbeddingProvider } from "./resilient-provider.js";
export type { ResilienceOptions } from "./resilient-provider.js";
export { createEmbeddingProvider } from "./factory.js";
