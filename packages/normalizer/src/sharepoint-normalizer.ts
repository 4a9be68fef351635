import { z } from "zod";
import type { CanonicalDocument } from "@collabrag/types";
import { MalformedRecordError } from "@collabrag/errors";
import type { INormalizer } from "./normalizer.interface.js";
import { normalizeWhitespace, stripHtml } from "./markup.js";
import { contextSchema, identitySet, identityName, looseId, looseString } from "./fields.js";

const driveItemSchema = z.object({
  id: looseId,
  name: looseString,
  webUrl: looseString,
  createdDateTime: looseString,
  lastModifiedDateTime: looseString,
  createdBy: identitySet,
  lastModifiedBy: identitySet,
  size: z.number().optional().catch(undefined),
  file: z.object({ mimeType: looseString }).optional().catch(undefined),
  parentReference: z.object({ path: looseString }).optional().catch(undefined),
  /** Downloaded file text, attached by the connector for text-like files. */
  content: z.string().optional().catch(undefined),
  _context: contextSchema,
});

/**
 * A SharePoint drive item (file). Files the connector did not download keep a
 * placeholder body so their name and location stay searchable.
 */
export class SharePointNormalizer implements INormalizer {
  readonly source = "sharepoint" as const;

  normalize(payload: Record<string, unknown>): CanonicalDocument {
    const item = driveItemSchema.parse(payload);
    if (item.id === undefined) {
      throw new MalformedRecordError("SharePoint item has no id", {
        details: { source: this.source },
      });
    }

    const mimeType = item.file?.mimeType;
    const content = item.content;
    const body =
      content === undefined
        ? `[Content not extracted: unsupported type ${mimeType ?? "unknown"}]`
        : mimeType === "text/html"
          ? stripHtml(content)
          : normalizeWhitespace(content);
    const updatedAt = item.lastModifiedDateTime;

    return {
      source: this.source,
      externalId: item.id,
      title: item.name ?? `Untitled file ${item.id}`,
      body,
      metadata: {
        contentType: "file",
        author: identityName(item.createdBy),
        lastEditor: identityName(item.lastModifiedBy),
        url: item.webUrl,
        createdAt: item.createdDateTime,
        updatedAt,
        mimeType,
        size: item.size,
        path: item.parentReference?.path,
        site: item._context?.siteName,
      },
      updatedAt,
    };
  }
}
