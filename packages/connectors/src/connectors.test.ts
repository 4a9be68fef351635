import { describe, it, expect, vi } from "vitest";
import type { AppConfig, RawRecord, SourcesConfig } from "@collabrag/types";
import { ConfigurationError } from "@collabrag/errors";
import { createConnector, configuredSources } from "./factory.js";
import { HttpClient } from "./http-client.js";
import { JiraConnector } from "./jira-connector.js";
import { TeamsConnector } from "./teams-connector.js";

type Route = (url: URL, init: RequestInit | undefined) => Response | undefined;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/** In-process stand-in for the provider APIs: first matching route answers, others 404. */
function fakeFetch(route: Route) {
  return vi.fn<typeof fetch>(async (input, init) => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    return route(url, init) ?? new Response("not found", { status: 404, statusText: "Not Found" });
  });
}

function makeConfig(sources: SourcesConfig): AppConfig {
  return {
    nodeEnv: "test",
    logLevel: "info",
    collectionName: "test_chunks",
    qdrant: { url: "http://localhost:6333" },
    cohere: { apiKey: "test-cohere-key", embedModel: "embed-v4.0" },
    embedding: { dimensions: 4, batchSize: 2, timeoutMs: 1000 },
    http: { timeoutMs: 1000, maxRetries: 0 },
    chunking: { unit: "char", chunkSize: 10, chunkOverlap: 2 },
    retrieval: { topK: 3, promptMaxChars: 1000, targetModel: "generic" },
    sources,
    redis: { url: "redis://localhost:6379", syncCron: "0 2 * * *" },
  };
}

async function collect(records: AsyncIterable<RawRecord>): Promise<RawRecord[]> {
  const out: RawRecord[] = [];
  for await (const record of records) out.push(record);
  return out;
}

const atlassian = { email: "bot@example.test", apiToken: "test-token" };
const m365 = { tenantId: "tenant-1", clientId: "client-1", clientSecret: "test-secret" };

describe("JiraConnector", () => {
  it("pages through the JQL search with nextPageToken", async () => {
    const fetchFn = fakeFetch((url) => {
      if (url.pathname !== "/rest/api/3/search/jql") return undefined;
      return url.searchParams.get("nextPageToken") === "t1"
        ? jsonResponse({ issues: [{ id: "3", key: "OPS-3" }], isLast: true })
        : jsonResponse({
            issues: [
              { id: "1", key: "OPS-1" },
              { id: "2", key: "OPS-2" },
            ],
            nextPageToken: "t1",
            isLast: false,
          });
    });
    const connector = createConnector(
      "jira",
      makeConfig({
        jira: { baseUrl: "https://jira.example.test", ...atlassian, projectKeys: ["OPS"], maxResults: 2 },
      }),
      { fetch: fetchFn },
    );

    const records = await collect(connector.fetchAll());

    expect(records.map((r) => r.source)).toEqual(["jira", "jira", "jira"]);
    expect(records.map((r) => r.payload["key"])).toEqual(["OPS-1", "OPS-2", "OPS-3"]);

    const firstUrl = new URL(String(fetchFn.mock.calls[0]?.[0]));
    expect(firstUrl.searchParams.get("jql")).toBe('project = "OPS" ORDER BY key ASC');
    expect(firstUrl.searchParams.get("maxResults")).toBe("2");
    expect(firstUrl.searchParams.has("nextPageToken")).toBe(false);
  });

  it("discovers projects when none are configured", async () => {
    const fetchFn = fakeFetch((url) => {
      if (url.pathname === "/rest/api/3/project") return jsonResponse([{ key: "A" }, { key: "B" }]);
      if (url.pathname === "/rest/api/3/search/jql") {
        return jsonResponse({ issues: [{ key: url.searchParams.get("jql") }], isLast: true });
      }
      return undefined;
    });
    const connector = createConnector(
      "jira",
      makeConfig({
        jira: { baseUrl: "https://jira.example.test", ...atlassian, projectKeys: [], maxResults: 50 },
      }),
      { fetch: fetchFn },
    );

    const records = await collect(connector.fetchAll());

    expect(records.map((r) => r.payload["key"])).toEqual([
      'project = "A" ORDER BY key ASC',
      'project = "B" ORDER BY key ASC',
    ]);
  });

  it("restricts the query to the lookback window", () => {
    const connector = new JiraConnector(
      { baseUrl: "https://jira.example.test", ...atlassian, projectKeys: ["OPS"], maxResults: 50 },
      {
        http: new HttpClient({ service: "jira", baseUrl: "https://jira.example.test", auth: { type: "none" } }),
        lookbackDays: 7,
      },
    );

    expect(connector.buildJql("OPS")).toBe('project = "OPS" AND updated >= "-7d" ORDER BY key ASC');
  });
});

describe("ConfluenceConnector", () => {
  it("pages by start/limit and attaches each page's comments", async () => {
    const fetchFn = fakeFetch((url) => {
      const start = Number(url.searchParams.get("start"));
      if (url.pathname === "/wiki/rest/api/content") {
        expect(url.searchParams.get("spaceKey")).toBe("OPS");
        return start === 0
          ? jsonResponse({ results: [{ id: "1", title: "A" }, { id: "2", title: "B" }], size: 2 })
          : jsonResponse({ results: [{ id: "3", title: "C" }], size: 1 });
      }
      if (url.pathname === "/wiki/rest/api/content/1/child/comment") {
        return jsonResponse({ results: [{ id: "c1" }], size: 1 });
      }
      if (url.pathname.endsWith("/child/comment")) return jsonResponse({ results: [], size: 0 });
      return undefined;
    });
    const connector = createConnector(
      "confluence",
      makeConfig({
        confluence: {
          baseUrl: "https://acme.example.test/wiki",
          ...atlassian,
          spaceKeys: ["OPS"],
          pageLimit: 2,
        },
      }),
      { fetch: fetchFn },
    );

    const records = await collect(connector.fetchAll());

    expect(records.map((r) => r.payload["title"])).toEqual(["A", "B", "C"]);
    expect(records.map((r) => r.payload["comments"])).toEqual([[{ id: "c1" }], [], []]);
  });

  it("lists comments and spaces at the server maximum rather than the page limit", async () => {
    const fetchFn = fakeFetch((url) => {
      switch (url.pathname) {
        case "/wiki/rest/api/space":
          return jsonResponse({ results: [{ key: "OPS" }], size: 1 });
        case "/wiki/rest/api/content":
          return url.searchParams.get("start") === "0"
            ? jsonResponse({ results: [{ id: "1", title: "A" }], size: 1 })
            : jsonResponse({ results: [], size: 0 });
        case "/wiki/rest/api/content/1/child/comment":
          return jsonResponse({ results: [{ id: "c1" }, { id: "c2" }], size: 2 });
        default:
          return undefined;
      }
    });
    const connector = createConnector(
      "confluence",
      makeConfig({
        confluence: { baseUrl: "https://acme.example.test/wiki", ...atlassian, spaceKeys: [], pageLimit: 1 },
      }),
      { fetch: fetchFn },
    );

    const records = await collect(connector.fetchAll());

    expect(records.map((r) => r.payload["comments"])).toEqual([[{ id: "c1" }, { id: "c2" }]]);
    const limits = fetchFn.mock.calls.map(([input]) => {
      const url = new URL(String(input));
      return `${url.pathname} limit=${url.searchParams.get("limit") ?? ""}`;
    });
    expect(limits).toEqual([
      "/wiki/rest/api/space limit=100",
      "/wiki/rest/api/content limit=1",
      "/wiki/rest/api/content/1/child/comment limit=100",
      "/wiki/rest/api/content limit=1",
    ]);
  });
});

describe("SharePointConnector", () => {
  it("walks the site drive recursively and downloads text files", async () => {
    const fetchFn = fakeFetch((url) => {
      if (url.hostname === "login.microsoftonline.com") {
        return jsonResponse({ access_token: "test-access-token", expires_in: 3600 });
      }
      if (url.hostname === "download.example.test") {
        return url.pathname === "/i1"
          ? new Response("# Readme", { status: 200 })
          : new Response("boom", { status: 500 });
      }
      switch (url.pathname) {
        case "/v1.0/sites":
          return jsonResponse({
            value: [
              { id: "site-2", displayName: "Engineering Archive" },
              { id: "site-1", displayName: "Engineering" },
            ],
          });
        case "/v1.0/sites/site-1/drive":
          return jsonResponse({ id: "drive-1" });
        case "/v1.0/drives/drive-1/root/children":
          return url.searchParams.get("$skiptoken") === "p2"
            ? jsonResponse({
                value: [{ id: "i2", name: "deck.pptx", file: { mimeType: "application/vnd.ms-powerpoint" } }],
              })
            : jsonResponse({
                value: [
                  { id: "f1", name: "Docs", folder: { childCount: 1 } },
                  {
                    id: "i1",
                    name: "readme.md",
                    file: { mimeType: "text/markdown" },
                    "@microsoft.graph.downloadUrl": "https://download.example.test/i1",
                  },
                ],
                "@odata.nextLink": "https://graph.microsoft.com/v1.0/drives/drive-1/root/children?$skiptoken=p2",
              });
        case "/v1.0/drives/drive-1/items/f1/children":
          return jsonResponse({
            value: [
              {
                id: "i3",
                name: "notes.txt",
                file: { mimeType: "text/plain" },
                "@microsoft.graph.downloadUrl": "https://download.example.test/i3",
              },
            ],
          });
        default:
          return undefined;
      }
    });
    const connector = createConnector(
      "sharepoint",
      makeConfig({ sharepoint: { ...m365, siteName: "Engineering" } }),
      { fetch: fetchFn },
    );

    const records = await collect(connector.fetchAll());

    expect(records.map((r) => r.payload["name"])).toEqual(["notes.txt", "readme.md", "deck.pptx"]);
    expect(records.map((r) => r.payload["content"])).toEqual([undefined, "# Readme", undefined]);
    expect(records[0]?.payload["_context"]).toEqual({ siteName: "Engineering" });

    const tokenCalls = fetchFn.mock.calls.filter(([input]) => String(input).includes("login.microsoftonline.com"));
    expect(tokenCalls).toHaveLength(1);
    const siteCall = fetchFn.mock.calls.find(([input]) => String(input).includes("/v1.0/sites?"));
    expect(new Headers(siteCall?.[1]?.headers).get("authorization")).toBe("Bearer test-access-token");
    const downloadCall = fetchFn.mock.calls.find(([input]) => String(input) === "https://download.example.test/i1");
    expect(downloadCall).toBeDefined();
    expect(new Headers(downloadCall?.[1]?.headers).get("authorization")).toBeNull();
  });
});

describe("TeamsConnector", () => {
  const teamsRoutes = (messages: unknown[]) =>
    fakeFetch((url) => {
      switch (url.pathname) {
        case "/v1.0/groups":
          return jsonResponse({ value: [{ id: "team-1", displayName: "Ops" }] });
        case "/v1.0/teams/team-1/channels":
          return jsonResponse({ value: [{ id: "chan-1", displayName: "incidents" }] });
        case "/v1.0/teams/team-1/channels/chan-1/messages":
          expect(url.searchParams.get("$expand")).toBe("replies");
          return jsonResponse({ value: messages });
        default:
          return undefined;
      }
    });

  it("emits replies as records of their own after the root message", async () => {
    const fetchFn = teamsRoutes([
      {
        id: "m1",
        body: { content: "root" },
        replies: [
          { id: "r1", replyToId: "m1", body: { content: "reply" } },
          { id: "r2", body: { content: "reply 2" } },
        ],
      },
    ]);
    const connector = createConnector("teams", makeConfig({ teams: { ...m365 } }), {
      fetch: fetchFn,
      tokenProvider: { getAccessToken: async () => "test-access-token" },
    });

    const records = await collect(connector.fetchAll());

    expect(records.map((r) => r.payload["id"])).toEqual(["m1", "r1", "r2"]);
    expect(records[0]?.payload).not.toHaveProperty("replies");
    expect(records[2]?.payload["replyToId"]).toBe("m1");
    expect(records[1]?.payload["_context"]).toEqual({ teamName: "Ops", channelName: "incidents" });
  });

  it("skips messages outside the lookback window", async () => {
    const fetchFn = teamsRoutes([
      {
        id: "m1",
        lastModifiedDateTime: "2024-05-01T00:00:00Z",
        replies: [{ id: "r1", replyToId: "m1", lastModifiedDateTime: "2024-05-09T12:00:00Z" }],
      },
    ]);
    const connector = new TeamsConnector(
      { ...m365 },
      {
        http: new HttpClient({
          service: "teams",
          baseUrl: "https://graph.microsoft.com/v1.0",
          auth: { type: "none" },
          fetch: fetchFn,
        }),
        lookbackDays: 1,
        now: () => new Date("2024-05-10T00:00:00Z"),
      },
    );

    const records = await collect(connector.fetchAll());

    expect(records.map((r) => r.payload["id"])).toEqual(["r1"]);
  });
});

describe("createConnector", () => {
  it("rejects a source without credentials", () => {
    expect(() => createConnector("jira", makeConfig({}))).toThrow(ConfigurationError);
    expect(() => createConnector("jira", makeConfig({}))).toThrow('Source "jira" is not configured');
  });

  it("lists configured sources in canonical order", () => {
    expect(
      configuredSources(
        makeConfig({
          teams: { ...m365 },
          jira: { baseUrl: "https://jira.example.test", ...atlassian, projectKeys: [], maxResults: 50 },
        }),
      ),
    ).toEqual(["jira", "teams"]);
  });
});
