import type CircuitBreaker from "opossum";
import type { EmbeddingResult } from "@collabrag/types";
import { EmbeddingProviderError, createCircuitBreaker, errorMessage } from "@collabrag/errors";
import type { Logger } from "@collabrag/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

type Purpose = "query" | "document";

export interface ResilienceOptions {
  /** Upper bound for one embedding call. */
  timeoutMs: number;
  errorThresholdPercentage?: number;
  resetTimeoutMs?: number;
  volumeThreshold?: number;
  logger?: Logger;
}

/**
 * Bounds every call of the wrapped provider with a timeout and a circuit
 * breaker. Any failure, including a timeout or an open breaker, surfaces as
 * EmbeddingProviderError.
 */
export class ResilientEmbeddingProvider implements IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  private readonly breaker: CircuitBreaker<[string[], Purpose], EmbeddingResult>;

  constructor(
    private readonly inner: IEmbeddingProvider,
    options: ResilienceOptions,
  ) {
    this.name = inner.name;
    this.dimensions = inner.dimensions;
    this.breaker = createCircuitBreaker(
      `embeddings:${inner.name}`,
      (texts: string[], purpose: Purpose) =>
        purpose === "query" ? inner.embed(texts[0] ?? "") : inner.batchEmbed(texts),
      {
        timeout: options.timeoutMs,
        errorThresholdPercentage: options.errorThresholdPercentage,
        resetTimeout: options.resetTimeoutMs,
        volumeThreshold: options.volumeThreshold,
        onStateChange: (name, state) => {
          options.logger?.warn({ breaker: name, state }, "Embedding circuit breaker state changed");
        },
      },
    );
  }

  embed(text: string): Promise<EmbeddingResult> {
    return this.call([text], "query");
  }

  batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.call(texts, "document");
  }

  healthCheck(): Promise<boolean> {
    return this.inner.healthCheck();
  }

  /** Stops the breaker's rolling-window timers. */
  shutdown(): void {
    this.breaker.shutdown();
  }

  private async call(texts: string[], purpose: Purpose): Promise<EmbeddingResult> {
    try {
      return await this.breaker.fire(texts, purpose);
    } catch (error) {
      if (error instanceof EmbeddingProviderError) throw error;
      throw new EmbeddingProviderError(`Embedding request failed: ${errorMessage(error)}`, this.name, {
        cause: error,
      });
    }
  }
}
