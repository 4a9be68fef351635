import type { FetchOptions, IConnector, RawRecord, SharePointSourceConfig } from "@collabrag/types";
import { TransportError, errorMessage } from "@collabrag/errors";
import type { Logger } from "@collabrag/logger";
import type { HttpClient } from "./http-client.js";
import { paginate } from "./paginator.js";
import { graphDrive, graphSite } from "./schemas.js";
import { graphLinkStrategy } from "./graph.js";
import { isOlderThan, lookbackCutoff } from "./lookback.js";

/** Files whose bytes are read as text; everything else keeps a placeholder body. */
export const DOWNLOADABLE_MIME_TYPES: ReadonlySet<string> = new Set([
  "text/plain",
  "text/markdown",
  "text/html",
  "text/csv",
  "application/json",
  "application/xml",
]);

interface Site {
  id: string;
  name: string;
}

export interface SharePointConnectorOptions {
  http: HttpClient;
  lookbackDays?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Files in the default document library of one SharePoint site (or of every
 * site the app can see), walked folder by folder through Microsoft Graph.
 */
export class SharePointConnector implements IConnector {
  readonly source = "sharepoint" as const;
  private readonly http: HttpClient;
  private readonly lookbackDays?: number;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly config: SharePointSourceConfig,
    options: SharePointConnectorOptions,
  ) {
    this.http = options.http;
    this.lookbackDays = options.lookbackDays;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async *fetchAll(options: FetchOptions = {}): AsyncGenerator<RawRecord> {
    const sites = await this.resolveSites(options);
    const cutoff = lookbackCutoff(this.lookbackDays, this.now());

    for (const site of sites) {
      const drive = await this.http.get(`/sites/${site.id}/drive`, graphDrive, { signal: options.signal });
      for await (const item of this.walk(drive.id, undefined, options)) {
        if (isOlderThan(item, cutoff)) continue;

        const content = await this.download(item, options.signal);
        yield {
          source: this.source,
          payload: {
            ...item,
            ...(content !== undefined ? { content } : {}),
            _context: { siteName: site.name },
          },
        };
      }
    }
  }

  private async resolveSites(options: FetchOptions): Promise<Site[]> {
    const { siteName } = this.config;
    const search = siteName ?? "*";
    const found: Site[] = [];

    for await (const raw of paginate(graphLinkStrategy(this.http, "/sites", { search }), options)) {
      const parsed = graphSite.safeParse(raw);
      if (!parsed.success) continue;
      const { id, name, displayName } = parsed.data;
      found.push({ id, name: displayName ?? name ?? id });
    }

    if (siteName === undefined) return found;

    const wanted = siteName.toLowerCase();
    const exact = found.find((site) => site.name.toLowerCase() === wanted);
    const site = exact ?? found[0];
    if (site === undefined) {
      throw new TransportError(`SharePoint site "${siteName}" was not found`, "sharepoint", {
        status: 404,
      });
    }
    return [site];
  }

  private async *walk(
    driveId: string,
    folderId: string | undefined,
    options: FetchOptions,
  ): AsyncGenerator<Record<string, unknown>> {
    const path =
      folderId === undefined
        ? `/drives/${driveId}/root/children`
        : `/drives/${driveId}/items/${encodeURIComponent(folderId)}/children`;

    for await (const item of paginate(graphLinkStrategy(this.http, path), options)) {
      if ("folder" in item) {
        const id = item["id"];
        if (typeof id === "string") yield* this.walk(driveId, id, options);
      } else if ("file" in item) {
        yield item;
      }
    }
  }

  private async download(item: Record<string, unknown>, signal?: AbortSignal): Promise<string | undefined> {
    const file = item["file"];
    const mimeType =
      typeof file === "object" && file !== null && "mimeType" in file ? file.mimeType : undefined;
    const downloadUrl = item["@microsoft.graph.downloadUrl"];

    if (typeof mimeType !== "string" || !DOWNLOADABLE_MIME_TYPES.has(mimeType)) return undefined;
    if (typeof downloadUrl !== "string") return undefined;

    try {
      // Pre-signed URL outside Graph: the bearer token must not travel with it
      return await this.http.getText(downloadUrl, { signal, authenticated: false });
    } catch (error) {
      if (!(error instanceof TransportError)) throw error;
      // One unreadable file does not end the walk; it keeps its placeholder body
      this.logger?.warn(
        { source: this.source, itemId: item["id"], err: errorMessage(error) },
        "Could not download SharePoint file",
      );
      return undefined;
    }
  }
}
