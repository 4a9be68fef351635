import { z } from "zod";
import type { FetchOptions, IConnector, RawRecord, TeamsSourceConfig } from "@collabrag/types";
import type { HttpClient } from "./http-client.js";
import { paginate } from "./paginator.js";
import { graphLinkStrategy } from "./graph.js";
import { isOlderThan, lookbackCutoff } from "./lookback.js";
import { rawRecord } from "./schemas.js";

const TEAM_FILTER = "resourceProvisioningOptions/Any(x:x eq 'Team')";

const replyList = z.array(rawRecord);

export interface TeamsConnectorOptions {
  http: HttpClient;
  lookbackDays?: number;
  now?: () => Date;
}

interface NamedEntity {
  id: string;
  name: string;
}

function named(raw: Record<string, unknown>): NamedEntity | undefined {
  const id = raw["id"];
  const displayName = raw["displayName"];
  if (typeof id !== "string") return undefined;
  return { id, name: typeof displayName === "string" ? displayName : id };
}

/**
 * Teams channel messages. Replies arrive inline (`$expand=replies`) and are
 * emitted as records of their own after their root message, each carrying
 * `replyToId`.
 */
export class TeamsConnector implements IConnector {
  readonly source = "teams" as const;
  private readonly http: HttpClient;
  private readonly lookbackDays?: number;
  private readonly now: () => Date;

  constructor(
    private readonly config: TeamsSourceConfig,
    options: TeamsConnectorOptions,
  ) {
    this.http = options.http;
    this.lookbackDays = options.lookbackDays;
    this.now = options.now ?? (() => new Date());
  }

  async *fetchAll(options: FetchOptions = {}): AsyncGenerator<RawRecord> {
    const cutoff = lookbackCutoff(this.lookbackDays, this.now());

    for await (const team of this.listTeams(options)) {
      for await (const channel of this.listNamed(`/teams/${team.id}/channels`, undefined, options)) {
        const context = { teamName: team.name, channelName: channel.name };
        const path = `/teams/${team.id}/channels/${channel.id}/messages`;

        for await (const message of paginate(
          graphLinkStrategy(this.http, path, { $expand: "replies" }),
          options,
        )) {
          const { replies, ...root } = message;
          if (!isOlderThan(root, cutoff)) {
            yield { source: this.source, payload: { ...root, _context: context } };
          }

          const parsed = replyList.safeParse(replies ?? []);
          for (const reply of parsed.success ? parsed.data : []) {
            if (isOlderThan(reply, cutoff)) continue;
            yield {
              source: this.source,
              payload: { replyToId: root["id"], ...reply, _context: context },
            };
          }
        }
      }
    }
  }

  private listTeams(options: FetchOptions): AsyncGenerator<NamedEntity> {
    const { groupName } = this.config;
    const filter =
      groupName === undefined
        ? TEAM_FILTER
        : `displayName eq '${groupName.replace(/'/g, "''")}' and ${TEAM_FILTER}`;
    return this.listNamed("/groups", { $filter: filter, $select: "id,displayName" }, options);
  }

  private async *listNamed(
    path: string,
    query: Record<string, string> | undefined,
    options: FetchOptions,
  ): AsyncGenerator<NamedEntity> {
    for await (const raw of paginate(graphLinkStrategy(this.http, path, query), options)) {
      const entity = named(raw);
      if (entity !== undefined) yield entity;
    }
  }
}
