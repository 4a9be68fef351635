import type { FetchOptions, IConnector, JiraSourceConfig, RawRecord } from "@collabrag/types";
import type { HttpClient } from "./http-client.js";
import { paginate, type TokenCursorPage } from "./paginator.js";
import { jiraProjects, jiraSearchPage } from "./schemas.js";

const ISSUE_FIELDS = [
  "summary",
  "description",
  "comment",
  "created",
  "updated",
  "reporter",
  "assignee",
  "status",
  "priority",
  "issuetype",
  "project",
].join(",");

export interface JiraConnectorOptions {
  http: HttpClient;
  lookbackDays?: number;
}

/**
 * Jira Cloud issues via the enhanced JQL search, one query per project.
 * Pages with `nextPageToken` until `isLast`.
 */
export class JiraConnector implements IConnector {
  readonly source = "jira" as const;
  private readonly http: HttpClient;
  private readonly lookbackDays?: number;

  constructor(
    private readonly config: JiraSourceConfig,
    options: JiraConnectorOptions,
  ) {
    this.http = options.http;
    this.lookbackDays = options.lookbackDays;
  }

  async *fetchAll(options: FetchOptions = {}): AsyncGenerator<RawRecord> {
    const projectKeys =
      this.config.projectKeys.length > 0
        ? this.config.projectKeys
        : await this.discoverProjects(options.signal);

    for (const projectKey of projectKeys) {
      const jql = this.buildJql(projectKey);
      const issues = paginate<Record<string, unknown>>(
        { kind: "token-cursor", fetchPage: (token, signal) => this.searchPage(jql, token, signal) },
        options,
      );
      for await (const payload of issues) {
        yield { source: this.source, payload };
      }
    }
  }

  buildJql(projectKey: string): string {
    const clauses = [`project = "${projectKey.replace(/"/g, '\\"')}"`];
    if (this.lookbackDays !== undefined) {
      clauses.push(`updated >= "-${String(this.lookbackDays)}d"`);
    }
    return `${clauses.join(" AND ")} ORDER BY key ASC`;
  }

  private async searchPage(
    jql: string,
    nextPageToken: string | undefined,
    signal?: AbortSignal,
  ): Promise<TokenCursorPage<Record<string, unknown>>> {
    const page = await this.http.get("/rest/api/3/search/jql", jiraSearchPage, {
      query: { jql, maxResults: this.config.maxResults, fields: ISSUE_FIELDS, nextPageToken },
      signal,
    });
    return { records: page.issues, isLastPage: page.isLast, nextToken: page.nextPageToken };
  }

  private async discoverProjects(signal?: AbortSignal): Promise<string[]> {
    const projects = await this.http.get("/rest/api/3/project", jiraProjects, { signal });
    return projects.map((project) => project.key);
  }
}
