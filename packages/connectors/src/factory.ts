import type { AccessTokenProvider, AppConfig, IConnector, SourceType } from "@collabrag/types";
import { SOURCE_TYPES } from "@collabrag/types";
import { ConfigurationError } from "@collabrag/errors";
import type { Logger } from "@collabrag/logger";
import { HttpClient, type HttpAuth } from "./http-client.js";
import { ClientCredentialsTokenProvider } from "./token-provider.js";
import { GRAPH_BASE_URL } from "./graph.js";
import { JiraConnector } from "./jira-connector.js";
import { ConfluenceConnector } from "./confluence-connector.js";
import { SharePointConnector } from "./sharepoint-connector.js";
import { TeamsConnector } from "./teams-connector.js";

export interface ConnectorDependencies {
  logger?: Logger;
  fetch?: typeof fetch;
  /** Overrides the client-credentials flow for Microsoft Graph sources. */
  tokenProvider?: AccessTokenProvider;
}

function notConfigured(source: SourceType): ConfigurationError {
  return new ConfigurationError(`Source "${source}" is not configured`);
}

/** Sources whose credentials are present, in canonical order. */
export function configuredSources(config: AppConfig): SourceType[] {
  return SOURCE_TYPES.filter((source) => config.sources[source] !== undefined);
}

/**
 * Build the connector for `source` from the application config.
 * Throws ConfigurationError when that source has no credentials.
 */
export function createConnector(
  source: SourceType,
  config: AppConfig,
  deps: ConnectorDependencies = {},
): IConnector {
  const { sources } = config;
  const logger = deps.logger?.child({ source });
  const http = (service: string, baseUrl: string, auth: HttpAuth) =>
    new HttpClient({
      service,
      baseUrl,
      auth,
      timeoutMs: config.http.timeoutMs,
      maxRetries: config.http.maxRetries,
      fetch: deps.fetch,
      logger,
    });

  switch (source) {
    case "jira": {
      const jira = sources.jira;
      if (!jira) throw notConfigured(source);
      return new JiraConnector(jira, {
        http: http("jira", jira.baseUrl, { type: "basic", email: jira.email, apiToken: jira.apiToken }),
        lookbackDays: sources.lookbackDays,
      });
    }
    case "confluence": {
      const confluence = sources.confluence;
      if (!confluence) throw notConfigured(source);
      return new ConfluenceConnector(confluence, {
        http: http("confluence", confluence.baseUrl, {
          type: "basic",
          email: confluence.email,
          apiToken: confluence.apiToken,
        }),
        lookbackDays: sources.lookbackDays,
      });
    }
    case "sharepoint": {
      const sharepoint = sources.sharepoint;
      if (!sharepoint) throw notConfigured(source);
      const tokenProvider =
        deps.tokenProvider ?? new ClientCredentialsTokenProvider(sharepoint, {
          fetch: deps.fetch,
          timeoutMs: config.http.timeoutMs,
        });
      return new SharePointConnector(sharepoint, {
        http: http("sharepoint", GRAPH_BASE_URL, { type: "bearer", tokenProvider }),
        lookbackDays: sources.lookbackDays,
        logger,
      });
    }
    case "teams": {
      const teams = sources.teams;
      if (!teams) throw notConfigured(source);
      const tokenProvider =
        deps.tokenProvider ?? new ClientCredentialsTokenProvider(teams, {
          fetch: deps.fetch,
          timeoutMs: config.http.timeoutMs,
        });
      return new TeamsConnector(teams, {
        http: http("teams", GRAPH_BASE_URL, { type: "bearer", tokenProvider }),
        lookbackDays: sources.lookbackDays,
      });
    }
  }
}
