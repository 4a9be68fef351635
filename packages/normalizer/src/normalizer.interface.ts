import type { CanonicalDocument, SourceType } from "@collabrag/types";

/**
 * Maps one provider-native payload to a canonical document.
 * Implementations are pure; they throw MalformedRecordError only when the
 * payload has no usable identifier.
 */
export interface INormalizer {
  readonly source: SourceType;
  normalize(payload: Record<string, unknown>): CanonicalDocument;
}
