import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { SyncJobData } from "@collabrag/types";

export const QUEUE_NAMES = {
  SYNC: "collabrag:sync",
} as const;

/** Job id of the repeatable scheduled sync; re-adding it replaces the schedule. */
export const SCHEDULED_SYNC_JOB_ID = "scheduled-sync";

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    db: Number(parsed.pathname.slice(1)) || 0,
  };
}

export function createSyncQueue(config: QueueConfig) {
  return new Queue<SyncJobData>(QUEUE_NAMES.SYNC, {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 2,
      backoff: {
        type: "exponential" as const,
        delay: 60_000,
      },
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 500 },
    },
  });
}

export type SyncQueue = ReturnType<typeof createSyncQueue>;

/** Register (or replace) the repeatable sync job that runs on `cron`. */
export async function scheduleSync(queue: SyncQueue, cron: string): Promise<void> {
  await queue.add(
    "sync",
    { type: "sync", reason: "scheduled" },
    { repeat: { pattern: cron }, jobId: SCHEDULED_SYNC_JOB_ID },
  );
}

/** Queue a one-off sync of the given sources, or of every configured source. */
export async function enqueueSync(queue: SyncQueue, sources?: SyncJobData["sources"]): Promise<string | undefined> {
  const job = await queue.add("sync", { type: "sync", reason: "manual", ...(sources ? { sources } : {}) });
  return job.id;
}
