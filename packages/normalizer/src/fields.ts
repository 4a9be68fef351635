import { z } from "zod";

/**
 * Lenient field schemas: a field of the wrong shape degrades to `undefined`
 * instead of failing the whole record.
 */
export const looseString = z
  .string()
  .optional()
  .catch(undefined)
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val));

export const looseId = z
  .union([z.string(), z.number()])
  .optional()
  .catch(undefined)
  .transform((val) => (val === undefined ? undefined : String(val).trim() || undefined));

export const personRef = z
  .object({ displayName: looseString, emailAddress: looseString })
  .optional()
  .catch(undefined);

export const namedRef = z.object({ name: looseString }).optional().catch(undefined);

/** Graph identity set: `{ user: { displayName } }` or `{ application: { displayName } }`. */
export const identitySet = z
  .object({ user: personRef, application: personRef })
  .optional()
  .catch(undefined);

export const contextSchema = z
  .object({
    siteName: looseString,
    teamName: looseString,
    channelName: looseString,
  })
  .optional()
  .catch(undefined);

export function identityName(identity: z.infer<typeof identitySet>): string | undefined {
  return identity?.user?.displayName ?? identity?.application?.displayName;
}

/** Everything before `marker` in a REST `self` link, e.g. the site root before "/rest/api". */
export function baseFromSelf(self: string | undefined, marker: string): string | undefined {
  if (self === undefined) return undefined;
  const at = self.indexOf(marker);
  return at > 0 ? self.slice(0, at) : undefined;
}

export function formatComment(author: string | undefined, date: string | undefined, text: string): string {
  return `Comment by ${author ?? "Unknown"} on ${date ?? "unknown date"}: ${text}`;
}

/** Append rendered comments under the body, separated by blank lines. */
export function joinSections(body: string, comments: string[]): string {
  return [body, ...comments].filter((section) => section.length > 0).join("\n\n");
}
