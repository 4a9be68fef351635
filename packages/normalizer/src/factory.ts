import type { CanonicalDocument, RawRecord, SourceType } from "@collabrag/types";
import type { INormalizer } from "./normalizer.interface.js";
import { JiraNormalizer } from "./jira-normalizer.js";
import { ConfluenceNormalizer } from "./confluence-normalizer.js";
import { SharePointNormalizer } from "./sharepoint-normalizer.js";
import { TeamsNormalizer } from "./teams-normalizer.js";

const normalizers: Record<SourceType, INormalizer> = {
  jira: new JiraNormalizer(),
  confluence: new ConfluenceNormalizer(),
  sharepoint: new SharePointNormalizer(),
  teams: new TeamsNormalizer(),
};

export function getNormalizer(source: SourceType): INormalizer {
  return normalizers[source];
}

/**
 * Dispatch a raw record to the normalizer for its source.
 * Throws MalformedRecordError when the payload has no identifier.
 */
export function normalize(record: RawRecord): CanonicalDocument {
  return getNormalizer(record.source).normalize(record.payload);
}
