import type { EmbeddingResult, RawRecord } from "@collabrag/types";
import { EmbeddingProviderError } from "@collabrag/errors";
import type { IEmbeddingProvider } from "@collabrag/embeddings";

export interface FakeEmbeddingOptions {
  /** Texts for which batchEmbed fails with EmbeddingProviderError. */
  failOn?: (text: string) => boolean;
  /** Defaults to [length, number of "a"s, 1]. */
  vectorFor?: (text: string) => number[];
}

/** Deterministic in-process embedding provider that records every call. */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly dimensions = 3;
  readonly batchCalls: string[][] = [];
  readonly queries: string[] = [];

  constructor(private readonly options: FakeEmbeddingOptions = {}) {}

  async embed(text: string): Promise<EmbeddingResult> {
    this.queries.push(text);
    return this.result([this.vector(text)]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.batchCalls.push([...texts]);
    if (this.options.failOn && texts.some(this.options.failOn)) {
      throw new EmbeddingProviderError("fake provider unavailable", this.name);
    }
    return this.result(texts.map((text) => this.vector(text)));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Total texts embedded across batch calls. */
  get embeddedCount(): number {
    return this.batchCalls.reduce((sum, batch) => sum + batch.length, 0);
  }

  private vector(text: string): number[] {
    if (this.options.vectorFor) return this.options.vectorFor(text);
    return [text.length, text.split("a").length - 1, 1];
  }

  private result(embeddings: number[][]): EmbeddingResult {
    return { embeddings, model: "fake", tokensUsed: 0, dimensions: this.dimensions };
  }
}

export async function* recordStream(records: RawRecord[]): AsyncGenerator<RawRecord> {
  for (const record of records) {
    yield record;
  }
}

export function confluencePage(id: string, body: string, title = `Page ${id}`): RawRecord {
  return {
    source: "confluence",
    payload: { id, title, body: { storage: { value: body } } },
  };
}
