import type { SourceType } from "./document.js";
import type { RunSummary } from "./pipeline.js";

export interface SyncJobData {
  type: "sync";
  /** Sources to ingest; every configured source when omitted. */
  sources?: SourceType[];
  reason: "scheduled" | "manual";
}

export interface JobResult {
  success: boolean;
  processedAt: Date;
  duration: number;
  error?: string;
  metrics?: RunSummary;
}
