import { z } from "zod";
import type { CanonicalDocument } from "@collabrag/types";
import { MalformedRecordError } from "@collabrag/errors";
import type { INormalizer } from "./normalizer.interface.js";
import { normalizeWhitespace, stripHtml } from "./markup.js";
import { contextSchema, identitySet, identityName, looseId, looseString } from "./fields.js";

const messageSchema = z.object({
  id: looseId,
  replyToId: looseId,
  subject: looseString,
  webUrl: looseString,
  createdDateTime: looseString,
  lastModifiedDateTime: looseString,
  lastEditedDateTime: looseString,
  from: identitySet,
  body: z
    .object({ contentType: looseString, content: z.string().optional().catch(undefined) })
    .optional()
    .catch(undefined),
  channelIdentity: z
    .object({ teamId: looseString, channelId: looseString })
    .optional()
    .catch(undefined),
  _context: contextSchema,
});

/**
 * A Teams channel message or reply. Replies arrive as separate records whose
 * `replyToId` names the root message; both ids are scoped by channel.
 */
export class TeamsNormalizer implements INormalizer {
  readonly source = "teams" as const;

  normalize(payload: Record<string, unknown>): CanonicalDocument {
    const message = messageSchema.parse(payload);
    if (message.id === undefined) {
      throw new MalformedRecordError("Teams message has no id", {
        details: { source: this.source },
      });
    }

    const channelId = message.channelIdentity?.channelId;
    const scoped = (id: string): string => (channelId !== undefined ? `${channelId}:${id}` : id);

    const content = message.body?.content ?? "";
    const body =
      message.body?.contentType === "text" ? normalizeWhitespace(content) : stripHtml(content);
    const channelName = message._context?.channelName;
    const updatedAt =
      message.lastEditedDateTime ?? message.lastModifiedDateTime ?? message.createdDateTime;

    return {
      source: this.source,
      externalId: scoped(message.id),
      title: message.subject ?? `Teams message in ${channelName ?? "channel"}`,
      body,
      metadata: {
        contentType: "message",
        author: identityName(message.from),
        url: message.webUrl,
        createdAt: message.createdDateTime,
        updatedAt,
        parentId: message.replyToId !== undefined ? scoped(message.replyToId) : undefined,
        threadId: scoped(message.replyToId ?? message.id),
        team: message._context?.teamName,
        channel: channelName,
      },
      updatedAt,
    };
  }
}
