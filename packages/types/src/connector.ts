import type { RawRecord, SourceType } from "./document.js";

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * A source connector yields every raw record of its source lazily.
 * Iteration restarts from the first page; there is no mid-stream resume.
 */
export interface IConnector {
  readonly source: SourceType;
  fetchAll(options?: FetchOptions): AsyncGenerator<RawRecord>;
}

/** Obtains bearer tokens for providers that use OAuth client credentials. */
export interface AccessTokenProvider {
  /** Must settle or reject once `signal` aborts. */
  getAccessToken(signal?: AbortSignal): Promise<string>;
}
