import { z } from "zod";

/** Provider records are passed through untouched; only the envelope is validated. */
export const rawRecord = z.record(z.unknown());

export const jiraSearchPage = z.object({
  issues: z.array(rawRecord).default([]),
  nextPageToken: z.string().optional(),
  isLast: z.boolean().optional(),
});

export const jiraProjects = z.array(z.object({ key: z.string() }));

/** `/rest/api/content`, `/rest/api/space` and child-content listings. */
export const confluenceResults = z.object({
  results: z.array(rawRecord).default([]),
  size: z.number().int().nonnegative().optional(),
});

export const confluenceSpaceKey = z.object({ key: z.string() });

/** Any Microsoft Graph collection. */
export const graphCollection = z.object({
  value: z.array(rawRecord).default([]),
  "@odata.nextLink": z.string().optional(),
});

export const graphSite = z.object({
  id: z.string(),
  name: z.string().optional(),
  displayName: z.string().optional(),
});

export const graphDrive = z.object({ id: z.string() });
