import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@collabrag/types";
import { EmbeddingProviderError, errorMessage } from "@collabrag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

type InputType = "search_document" | "search_query";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.embedTexts([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedTexts(texts, "search_document");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async embedTexts(texts: string[], inputType: InputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      let response: Awaited<ReturnType<CohereClient["v2"]["embed"]>>;
      try {
        response = await this.client.v2.embed({
          texts: batch,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
        });
      } catch (error) {
        throw new EmbeddingProviderError(`Cohere embed failed: ${errorMessage(error)}`, this.name, {
          cause: error,
        });
      }

      const vectors = response.embeddings.float;
      if (!vectors || vectors.length !== batch.length) {
        throw new EmbeddingProviderError(
          `Cohere returned ${String(vectors?.length ?? 0)} embeddings for ${String(batch.length)} texts`,
          this.name,
        );
      }
      allEmbeddings.push(...vectors);

      // Billed tokens, when reported
      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}
