import type { HttpClient, QueryParams } from "./http-client.js";
import type { PaginationStrategy } from "./paginator.js";
import { graphCollection } from "./schemas.js";

export const GRAPH_BASE_URL = "https://graph.microsoft.com/v1.0";

/** Link-style paging over a Graph collection, following `@odata.nextLink`. */
export function graphLinkStrategy(
  http: HttpClient,
  path: string,
  query?: QueryParams,
): PaginationStrategy<Record<string, unknown>> {
  return {
    kind: "link",
    fetchPage: async (link, signal) => {
      // nextLink already carries the original query
      const page = await http.get(link ?? path, graphCollection, {
        query: link === undefined ? query : undefined,
        signal,
      });
      return { records: page.value, nextLink: page["@odata.nextLink"] };
    },
  };
}
