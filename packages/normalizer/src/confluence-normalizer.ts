import { z } from "zod";
import type { CanonicalDocument } from "@collabrag/types";
import { MalformedRecordError } from "@collabrag/errors";
import type { INormalizer } from "./normalizer.interface.js";
import { stripHtml } from "./markup.js";
import { baseFromSelf, formatComment, joinSections, looseId, looseString, personRef } from "./fields.js";

const storageBody = z
  .object({
    storage: z.object({ value: looseString }).optional().catch(undefined),
  })
  .optional()
  .catch(undefined);

const version = z
  .object({ when: looseString, by: personRef, number: z.number().optional().catch(undefined) })
  .optional()
  .catch(undefined);

const history = z
  .object({ createdDate: looseString, createdBy: personRef })
  .optional()
  .catch(undefined);

const commentSchema = z.object({
  body: storageBody,
  version,
  history,
});

const pageSchema = z.object({
  id: looseId,
  type: looseString,
  title: looseString,
  body: storageBody,
  version,
  history,
  space: z.object({ key: looseString, name: looseString }).optional().catch(undefined),
  _links: z
    .object({ webui: looseString, self: looseString, base: looseString })
    .optional()
    .catch(undefined),
  comments: z.array(z.unknown()).optional().catch(undefined),
});

export class ConfluenceNormalizer implements INormalizer {
  readonly source = "confluence" as const;

  normalize(payload: Record<string, unknown>): CanonicalDocument {
    const page = pageSchema.parse(payload);
    if (page.id === undefined) {
      throw new MalformedRecordError("Confluence page has no id", {
        details: { source: this.source },
      });
    }

    const comments = (page.comments ?? []).flatMap((raw) => {
      const parsed = commentSchema.safeParse(raw);
      if (!parsed.success) return [];
      const { body, history: commentHistory, version: commentVersion } = parsed.data;
      const text = stripHtml(body?.storage?.value ?? "");
      if (text.length === 0) return [];
      return [
        formatComment(
          commentHistory?.createdBy?.displayName ?? commentVersion?.by?.displayName,
          commentHistory?.createdDate ?? commentVersion?.when,
          text,
        ),
      ];
    });

    const links = page._links;
    const base = links?.base ?? baseFromSelf(links?.self, "/rest/api");
    const updatedAt = page.version?.when;

    return {
      source: this.source,
      externalId: page.id,
      title: page.title ?? `Untitled page ${page.id}`,
      body: joinSections(stripHtml(page.body?.storage?.value ?? ""), comments),
      metadata: {
        contentType: "page",
        author: page.history?.createdBy?.displayName ?? page.version?.by?.displayName,
        lastEditor: page.version?.by?.displayName,
        url: base !== undefined && links?.webui !== undefined ? `${base}${links.webui}` : undefined,
        createdAt: page.history?.createdDate,
        updatedAt,
        space: page.space?.key,
        version: page.version?.number,
      },
      updatedAt,
    };
  }
}
