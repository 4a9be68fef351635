const DAY_MS = 86_400_000;

/** Epoch millis before which records fall outside the lookback window. */
export function lookbackCutoff(lookbackDays: number | undefined, now: Date): number | undefined {
  return lookbackDays === undefined ? undefined : now.getTime() - lookbackDays * DAY_MS;
}

/**
 * True when the record's `lastModifiedDateTime` is older than the cutoff.
 * Records without a parseable timestamp are kept.
 */
export function isOlderThan(record: Record<string, unknown>, cutoff: number | undefined): boolean {
  if (cutoff === undefined) return false;
  const modified = record["lastModifiedDateTime"];
  if (typeof modified !== "string") return false;
  const time = Date.parse(modified);
  return !Number.isNaN(time) && time < cutoff;
}
