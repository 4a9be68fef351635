import type { ConfluenceSourceConfig, FetchOptions, IConnector, RawRecord } from "@collabrag/types";
import type { HttpClient } from "./http-client.js";
import { paginate, type SizeThresholdPage } from "./paginator.js";
import { confluenceResults, confluenceSpaceKey } from "./schemas.js";

const PAGE_EXPAND = "body.storage,version,history,space";
const COMMENT_EXPAND = "body.storage,version,history";
/** Confluence caps `limit` at this on the server; a larger request comes back short. */
export const CONFLUENCE_MAX_LIMIT = 100;

export interface ConfluenceConnectorOptions {
  http: HttpClient;
  lookbackDays?: number;
}

/**
 * Confluence pages with their comments attached under `comments`.
 * All listings page by start/limit and stop on a short page. Pages use the
 * configured limit; comments and spaces always ask for the server maximum.
 */
export class ConfluenceConnector implements IConnector {
  readonly source = "confluence" as const;
  private readonly http: HttpClient;
  private readonly lookbackDays?: number;

  constructor(
    private readonly config: ConfluenceSourceConfig,
    options: ConfluenceConnectorOptions,
  ) {
    this.http = options.http;
    this.lookbackDays = options.lookbackDays;
  }

  async *fetchAll(options: FetchOptions = {}): AsyncGenerator<RawRecord> {
    const spaceKeys =
      this.config.spaceKeys.length > 0 ? this.config.spaceKeys : await this.discoverSpaces(options);

    for (const spaceKey of spaceKeys) {
      for await (const page of this.listPages(spaceKey, options)) {
        const comments = await this.collect(this.listComments(page, options));
        yield { source: this.source, payload: { ...page, comments } };
      }
    }
  }

  private get pageLimit(): number {
    return Math.min(this.config.pageLimit, CONFLUENCE_MAX_LIMIT);
  }

  private listPages(spaceKey: string, options: FetchOptions): AsyncGenerator<Record<string, unknown>> {
    if (this.lookbackDays !== undefined) {
      const cql = `space = "${spaceKey}" AND type = page AND lastmodified >= now("-${String(this.lookbackDays)}d")`;
      return this.listing("/rest/api/content/search", { cql, expand: PAGE_EXPAND }, this.pageLimit, options);
    }
    return this.listing(
      "/rest/api/content",
      { spaceKey, type: "page", expand: PAGE_EXPAND },
      this.pageLimit,
      options,
    );
  }

  private listComments(
    page: Record<string, unknown>,
    options: FetchOptions,
  ): AsyncGenerator<Record<string, unknown>> | undefined {
    const id = page["id"];
    if (typeof id !== "string" && typeof id !== "number") return undefined;
    return this.listing(
      `/rest/api/content/${encodeURIComponent(String(id))}/child/comment`,
      { expand: COMMENT_EXPAND },
      CONFLUENCE_MAX_LIMIT,
      options,
    );
  }

  private async discoverSpaces(options: FetchOptions): Promise<string[]> {
    const spaces = await this.collect(
      this.listing("/rest/api/space", { type: "global" }, CONFLUENCE_MAX_LIMIT, options),
    );
    return spaces.flatMap((space) => {
      const parsed = confluenceSpaceKey.safeParse(space);
      return parsed.success ? [parsed.data.key] : [];
    });
  }

  private listing(
    path: string,
    query: Record<string, string>,
    pageSize: number,
    options: FetchOptions,
  ): AsyncGenerator<Record<string, unknown>> {
    return paginate(
      {
        kind: "size-threshold",
        pageSize,
        fetchPage: (start, limit, signal) => this.fetchListing(path, query, start, limit, signal),
      },
      options,
    );
  }

  private async fetchListing(
    path: string,
    query: Record<string, string>,
    start: number,
    limit: number,
    signal?: AbortSignal,
  ): Promise<SizeThresholdPage<Record<string, unknown>>> {
    const page = await this.http.get(path, confluenceResults, {
      query: { ...query, start, limit },
      signal,
    });
    return { records: page.results, returnedSize: page.size ?? page.results.length };
  }

  private async collect<T>(items: AsyncGenerator<T> | undefined): Promise<T[]> {
    const collected: T[] = [];
    if (items === undefined) return collected;
    for await (const item of items) collected.push(item);
    return collected;
  }
}
