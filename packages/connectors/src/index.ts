/**
 * @collabrag/connectors
 *
 * Source connectors for Jira, Confluence, SharePoint and Teams, and the
 * pagination strategies they share.
 */

export { HttpClient } from "./http-client.js";
export type { HttpAuth, HttpClientConfig, QueryParams, RequestOptions } from "./http-client.js";
export { ClientCredentialsTokenProvider } from "./token-provider.js";
export type { ClientCredentials } from "./token-provider.js";
export { paginate } from "./paginator.js";
export type { LinkPage, PaginationStrategy, SizeThresholdPage, TokenCursorPage } from "./paginator.js";
export { GRAPH_BASE_URL, graphLinkStrategy } from "./graph.js";
export { JiraConnector } from "./jira-connector.js";
export type { JiraConnectorOptions } from "./jira-connector.js";
export { ConfluenceConnector } from "./confluence-connector.js";
export type { ConfluenceConnectorOptions } from "./confluence-connector.js";
export { SharePointConnector, DOWNLOADABLE_MIME_TYPES } from "./sharepoint-connector.js";
export type { SharePointConnectorOptions } from "./sharepoint-connector.js";
export { TeamsConnector } from "./teams-connector.js";
export type { TeamsConnectorOptions } from "./teams-connector.js";
export { createConnector, configuredSources } from "./factory.js";
export type { ConnectorDependencies } from "./factory.js";
