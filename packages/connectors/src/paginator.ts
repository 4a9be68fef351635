import type { FetchOptions } from "@collabrag/types";
import { ConfigurationError } from "@collabrag/errors";

export interface TokenCursorPage<T> {
  records: T[];
  isLastPage?: boolean;
  nextToken?: string;
}

export interface SizeThresholdPage<T> {
  records: T[];
  returnedSize: number;
}

export interface LinkPage<T> {
  records: T[];
  nextLink?: string;
}

/**
 * How a provider pages its results. Fixed per connector at construction.
 *
 * - token-cursor: opaque continuation token plus an explicit last-page flag
 * - size-threshold: offset/limit; a short page is the last one
 * - link: each page carries the URL of the next one
 */
export type PaginationStrategy<T> =
  | {
      kind: "token-cursor";
      fetchPage: (nextToken: string | undefined, signal?: AbortSignal) => Promise<TokenCursorPage<T>>;
    }
  | {
      kind: "size-threshold";
      pageSize: number;
      fetchPage: (startOffset: number, pageSize: number, signal?: AbortSignal) => Promise<SizeThresholdPage<T>>;
    }
  | {
      kind: "link";
      fetchPage: (link: string | undefined, signal?: AbortSignal) => Promise<LinkPage<T>>;
    };

/**
 * Lazily yield every record the strategy reaches. Total-count fields are
 * never consulted. An error from `fetchPage` ends the iteration; records
 * already yielded stay yielded.
 */
export async function* paginate<T>(
  strategy: PaginationStrategy<T>,
  options: FetchOptions = {},
): AsyncGenerator<T> {
  switch (strategy.kind) {
    case "token-cursor":
      yield* paginateTokenCursor(strategy.fetchPage, options.signal);
      return;
    case "size-threshold":
      yield* paginateSizeThreshold(strategy.fetchPage, strategy.pageSize, options.signal);
      return;
    case "link":
      yield* paginateLinks(strategy.fetchPage, options.signal);
      return;
  }
}

async function* paginateTokenCursor<T>(
  fetchPage: (nextToken: string | undefined, signal?: AbortSignal) => Promise<TokenCursorPage<T>>,
  signal?: AbortSignal,
): AsyncGenerator<T> {
  let token: string | undefined;

  for (;;) {
    signal?.throwIfAborted();
    const page = await fetchPage(token, signal);
    if (page.records.length === 0) return;
    yield* page.records;

    if (page.isLastPage === true) return;
    const next = page.nextToken;
    if (next === undefined || next === "" || next === token) return;
    token = next;
  }
}

async function* paginateSizeThreshold<T>(
  fetchPage: (startOffset: number, pageSize: number, signal?: AbortSignal) => Promise<SizeThresholdPage<T>>,
  pageSize: number,
  signal?: AbortSignal,
): AsyncGenerator<T> {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new ConfigurationError("Invalid pagination settings", [
      `pageSize must be a positive integer, got ${String(pageSize)}`,
    ]);
  }

  let offset = 0;
  for (;;) {
    signal?.throwIfAborted();
    const page = await fetchPage(offset, pageSize, signal);
    if (page.records.length === 0) return;
    yield* page.records;

    if (page.returnedSize < pageSize) return;
    offset += page.returnedSize;
  }
}

async function* paginateLinks<T>(
  fetchPage: (link: string | undefined, signal?: AbortSignal) => Promise<LinkPage<T>>,
  signal?: AbortSignal,
): AsyncGenerator<T> {
  let link: string | undefined;
  const visited = new Set<string>();

  do {
    signal?.throwIfAborted();
    const page = await fetchPage(link, signal);
    yield* page.records;

    link = page.nextLink;
    if (link !== undefined) {
      if (visited.has(link)) return;
      visited.add(link);
    }
  } while (link !== undefined && link !== "");
}
