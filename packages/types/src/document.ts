export type SourceType = "jira" | "confluence" | "sharepoint" | "teams";

export const SOURCE_TYPES: readonly SourceType[] = ["jira", "confluence", "sharepoint", "teams"];

/**
 * Provider-native record as returned by a connector. Only the normalizer for
 * `source` looks inside `payload`.
 */
export interface RawRecord {
  source: SourceType;
  payload: Record<string, unknown>;
}

export type ContentType = "issue" | "page" | "file" | "message";

export interface DocumentMetadata {
  author?: string;
  url?: string;
  createdAt?: string;
  updatedAt?: string;
  contentType?: ContentType;
  /** Chat replies point at the message they answer. */
  parentId?: string;
  /** Id of the root message of a chat thread (the message itself for roots). */
  threadId?: string;
  [key: string]: string | number | boolean | undefined;
}

/**
 * Provider-agnostic representation of one source record.
 * `(source, externalId)` identifies the document across ingestion runs.
 */
export interface CanonicalDocument {
  source: SourceType;
  externalId: string;
  title: string;
  body: string;
  metadata: DocumentMetadata;
  updatedAt?: string;
}
