import { z } from "zod";
import type { CanonicalDocument } from "@collabrag/types";
import { MalformedRecordError } from "@collabrag/errors";
import type { INormalizer } from "./normalizer.interface.js";
import { adfToText } from "./markup.js";
import {
  baseFromSelf,
  formatComment,
  joinSections,
  looseId,
  looseString,
  namedRef,
  personRef,
} from "./fields.js";

const commentSchema = z.object({
  author: personRef,
  created: looseString,
  body: z.unknown(),
});

const issueSchema = z.object({
  id: looseId,
  key: looseString,
  self: looseString,
  fields: z
    .object({
      summary: looseString,
      description: z.unknown(),
      created: looseString,
      updated: looseString,
      reporter: personRef,
      assignee: personRef,
      status: namedRef,
      priority: namedRef,
      issuetype: namedRef,
      project: z.object({ key: looseString }).optional().catch(undefined),
      comment: z
        .object({ comments: z.array(z.unknown()).catch([]) })
        .optional()
        .catch(undefined),
    })
    .optional()
    .catch(undefined),
});

export class JiraNormalizer implements INormalizer {
  readonly source = "jira" as const;

  normalize(payload: Record<string, unknown>): CanonicalDocument {
    const issue = issueSchema.parse(payload);
    const externalId = issue.key ?? issue.id;
    if (externalId === undefined) {
      throw new MalformedRecordError("Jira issue has neither key nor id", {
        details: { source: this.source },
      });
    }

    const fields = issue.fields;
    const comments = (fields?.comment?.comments ?? []).flatMap((raw) => {
      const parsed = commentSchema.safeParse(raw);
      if (!parsed.success) return [];
      const text = adfToText(parsed.data.body);
      return text.length > 0
        ? [formatComment(parsed.data.author?.displayName, parsed.data.created, text)]
        : [];
    });

    const site = baseFromSelf(issue.self, "/rest/api");
    const updatedAt = fields?.updated;

    return {
      source: this.source,
      externalId,
      title: fields?.summary ?? externalId,
      body: joinSections(adfToText(fields?.description), comments),
      metadata: {
        contentType: "issue",
        author: fields?.reporter?.displayName,
        assignee: fields?.assignee?.displayName,
        url: site !== undefined && issue.key !== undefined ? `${site}/browse/${issue.key}` : undefined,
        createdAt: fields?.created,
        updatedAt,
        status: fields?.status?.name,
        priority: fields?.priority?.name,
        issueType: fields?.issuetype?.name,
        project: fields?.project?.key,
      },
      updatedAt,
    };
  }
}
